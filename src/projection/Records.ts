/**
 * Projected domain records
 *
 * One record per distinct event id. Every record carries the raw event
 * fields, the relay it was first seen on and when it was projected, plus
 * the fields of its kind. Records are schemas so rows read back from the
 * store are decoded, not trusted.
 */
import { Schema } from "@effect/schema"
import { EventId, EventKind, PublicKey, Signature, Tag, UnixTimestamp } from "../core/Schema.js"

const OptionalText = Schema.NullOr(Schema.String)

// =============================================================================
// Kind-specific fields
// =============================================================================

/** Long-form article or draft (NIP-23) */
export const ArticleFields = Schema.TaggedStruct("Article", {
  slug: OptionalText,
  title: OptionalText,
  summary: OptionalText,
  image: OptionalText,
  publishedAt: Schema.NullOr(Schema.Number),
  topics: Schema.Array(Schema.String),
  /** kind:pubkey:slug when a slug exists */
  coordinate: OptionalText,
})
export type ArticleFields = typeof ArticleFields.Type

/** What a comment points at: an event id, an address or an external id */
export const CommentRef = Schema.Struct({
  type: Schema.Literal("event", "address", "external"),
  value: Schema.String,
  relay: OptionalText,
})
export type CommentRef = typeof CommentRef.Type

/** Threaded comment (NIP-22) */
export const CommentFields = Schema.TaggedStruct("Comment", {
  root: Schema.NullOr(CommentRef),
  parent: Schema.NullOr(CommentRef),
  rootKind: Schema.NullOr(Schema.Number),
  parentKind: Schema.NullOr(Schema.Number),
  rootAuthor: OptionalText,
  parentAuthor: OptionalText,
})
export type CommentFields = typeof CommentFields.Type

/** Highlight (NIP-84) */
export const HighlightFields = Schema.TaggedStruct("Highlight", {
  articleCoordinate: OptionalText,
  eventRef: OptionalText,
  url: OptionalText,
  context: OptionalText,
  authors: Schema.Array(Schema.String),
})
export type HighlightFields = typeof HighlightFields.Type

/** Picture or video post (NIP-68, NIP-71) */
export const MediaFields = Schema.TaggedStruct("Media", {
  title: OptionalText,
  mediaUrl: OptionalText,
  hashtags: Schema.Array(Schema.String),
  nsfw: Schema.Boolean,
})
export type MediaFields = typeof MediaFields.Type

/** Any other kind */
export const GenericEventFields = Schema.TaggedStruct("GenericEvent", {
  slug: OptionalText,
  title: OptionalText,
  summary: OptionalText,
})
export type GenericEventFields = typeof GenericEventFields.Type

export const RecordFields = Schema.Union(
  ArticleFields,
  CommentFields,
  HighlightFields,
  MediaFields,
  GenericEventFields
)
export type RecordFields = typeof RecordFields.Type

export type RecordType = RecordFields["_tag"]

// =============================================================================
// Records
// =============================================================================

/** Raw event fields plus provenance */
export const RecordMeta = Schema.Struct({
  id: EventId,
  pubkey: PublicKey,
  createdAt: UnixTimestamp,
  kind: EventKind,
  tags: Schema.Array(Tag),
  content: Schema.String,
  sig: Signature,
  sourceRelay: Schema.String,
  /** Unix milliseconds */
  projectedAt: Schema.Number,
})
export type RecordMeta = typeof RecordMeta.Type

export const DomainRecord = Schema.extend(RecordFields, RecordMeta)
export type DomainRecord = typeof DomainRecord.Type

export const encodeStoredRecord = Schema.encodeSync(Schema.parseJson(DomainRecord))
