/**
 * Kind-specific mapping from (tags, content) to record fields.
 *
 * Every mapper is pure and total: missing or malformed tags become nulls,
 * never errors. Where a tag may repeat, the first occurrence wins unless
 * the field is a list.
 */
import { ARTICLE_KINDS, Kinds, MEDIA_KINDS } from "../core/Kinds.js"
import type { Tag } from "../core/Schema.js"
import { ParsedTag, parseTags } from "../core/Tags.js"
import type {
  ArticleFields,
  CommentFields,
  CommentRef,
  GenericEventFields,
  HighlightFields,
  MediaFields,
  RecordFields,
} from "./Records.js"

type Variant<T extends ParsedTag["_tag"]> = Extract<ParsedTag, { readonly _tag: T }>

const first = <T extends ParsedTag["_tag"]>(
  tags: ReadonlyArray<ParsedTag>,
  tag: T,
  where: (value: Variant<T>) => boolean = () => true
): Variant<T> | undefined => {
  const is = ParsedTag.$is(tag)
  for (const parsed of tags) {
    if (is(parsed) && where(parsed)) return parsed
  }
  return undefined
}

const all = <T extends ParsedTag["_tag"]>(tags: ReadonlyArray<ParsedTag>, tag: T): Array<Variant<T>> =>
  tags.filter(ParsedTag.$is(tag))

const unique = (values: ReadonlyArray<string>): Array<string> => [...new Set(values)]

const isHttpUrl = (value: string): boolean => {
  try {
    const url = new URL(value.trim())
    return url.protocol === "http:" || url.protocol === "https:"
  } catch {
    return false
  }
}

// =============================================================================
// Articles
// =============================================================================

export const mapArticle = (
  tags: ReadonlyArray<Tag>,
  _content: string,
  address: { readonly kind: number; readonly pubkey: string }
): ArticleFields => {
  const parsed = parseTags(tags)
  const slug = first(parsed, "Identifier")?.value ?? null
  return {
    _tag: "Article",
    slug,
    title: first(parsed, "Title")?.value ?? null,
    summary: first(parsed, "Summary")?.value ?? null,
    image: first(parsed, "Image")?.url ?? null,
    publishedAt: first(parsed, "PublishedAt")?.timestamp ?? null,
    topics: unique(all(parsed, "Topic").map((topic) => topic.value)),
    coordinate: slug !== null ? `${address.kind}:${address.pubkey}:${slug}` : null,
  }
}

// =============================================================================
// Comments
// =============================================================================

const commentRef = (parsed: ReadonlyArray<ParsedTag>, scope: "root" | "parent"): CommentRef | null => {
  const inScope = <T extends { readonly scope: "root" | "parent" }>(tag: T) => tag.scope === scope

  // addresses first: a comment on an article points at its coordinate
  const address = first(parsed, "AddressRef", inScope)
  if (address) return { type: "address", value: address.coordinate, relay: address.relay ?? null }

  const event = first(parsed, "EventRef", inScope)
  if (event) return { type: "event", value: event.id, relay: event.relay ?? null }

  const external = first(parsed, "ExternalRef", inScope)
  if (external) return { type: "external", value: external.value, relay: null }

  return null
}

export const mapComment = (tags: ReadonlyArray<Tag>, _content: string): CommentFields => {
  const parsed = parseTags(tags)
  const kindOf = (scope: "root" | "parent") =>
    first(parsed, "KindRef", (tag) => tag.scope === scope)?.kind ?? null
  const authorOf = (scope: "root" | "parent") =>
    first(parsed, "PubkeyRef", (tag) => tag.scope === scope)?.pubkey ?? null

  return {
    _tag: "Comment",
    root: commentRef(parsed, "root"),
    parent: commentRef(parsed, "parent"),
    rootKind: kindOf("root"),
    parentKind: kindOf("parent"),
    rootAuthor: authorOf("root"),
    parentAuthor: authorOf("parent"),
  }
}

// =============================================================================
// Highlights
// =============================================================================

export const mapHighlight = (tags: ReadonlyArray<Tag>, _content: string): HighlightFields => {
  const parsed = parseTags(tags)
  return {
    _tag: "Highlight",
    articleCoordinate: first(parsed, "AddressRef", (tag) => tag.scope === "parent")?.coordinate ?? null,
    eventRef: first(parsed, "EventRef", (tag) => tag.scope === "parent")?.id ?? null,
    url: first(parsed, "Url", (tag) => tag.source === "r")?.url ?? null,
    context: first(parsed, "Context")?.value ?? null,
    authors: unique(
      all(parsed, "PubkeyRef")
        .filter((tag) => tag.scope === "parent")
        .map((tag) => tag.pubkey)
    ),
  }
}

// =============================================================================
// Media
// =============================================================================

const NSFW_HASHTAGS: ReadonlySet<string> = new Set(["nsfw", "adult", "explicit", "18+", "nsfl"])

const mediaUrlOf = (parsed: ReadonlyArray<ParsedTag>, content: string): string | null => {
  const urlTag = first(parsed, "Url", (tag) => tag.source === "url")
  if (urlTag) return urlTag.url

  const image = first(parsed, "Image")
  if (image) return image.url

  for (const meta of all(parsed, "ImageMeta")) {
    const entry = meta.entries.find(([key]) => key === "url")
    if (entry) return entry[1]
  }

  return isHttpUrl(content) ? content.trim() : null
}

export const isNsfw = (parsed: ReadonlyArray<ParsedTag>): boolean =>
  parsed.some((tag) => {
    switch (tag._tag) {
      case "ContentWarning":
        return true
      case "LabelNamespace":
        return tag.namespace.toLowerCase() === "nsfw"
      case "Topic":
        return NSFW_HASHTAGS.has(tag.value.toLowerCase())
      default:
        return false
    }
  })

export const mapMedia = (tags: ReadonlyArray<Tag>, content: string): MediaFields => {
  const parsed = parseTags(tags)
  return {
    _tag: "Media",
    title: first(parsed, "Title")?.value ?? null,
    mediaUrl: mediaUrlOf(parsed, content),
    hashtags: unique(all(parsed, "Topic").map((topic) => topic.value)),
    nsfw: isNsfw(parsed),
  }
}

// =============================================================================
// Everything else
// =============================================================================

export const mapGeneric = (tags: ReadonlyArray<Tag>, _content: string): GenericEventFields => {
  const parsed = parseTags(tags)
  return {
    _tag: "GenericEvent",
    slug: first(parsed, "Identifier")?.value ?? null,
    title: first(parsed, "Title")?.value ?? null,
    summary: first(parsed, "Summary")?.value ?? null,
  }
}

/**
 * Pick the mapper for an event's kind.
 */
export const mapRecordFields = (event: {
  readonly kind: number
  readonly pubkey: string
  readonly tags: ReadonlyArray<Tag>
  readonly content: string
}): RecordFields => {
  if (ARTICLE_KINDS.has(event.kind)) return mapArticle(event.tags, event.content, event)
  if (MEDIA_KINDS.has(event.kind)) return mapMedia(event.tags, event.content)
  switch (event.kind) {
    case Kinds.Comment:
      return mapComment(event.tags, event.content)
    case Kinds.Highlight:
      return mapHighlight(event.tags, event.content)
    default:
      return mapGeneric(event.tags, event.content)
  }
}
