/**
 * Tag parsing
 *
 * Turns the stringly-typed tag arrays of an event into a tagged union at the
 * projection boundary. Reference tags follow the NIP-22 convention:
 * uppercase names (A/E/I/K/P) point at the root of a thread, lowercase
 * names (a/e/i/k/p) at the direct parent. Tags we do not know pass through
 * as `Unknown` with their values untouched.
 */
import { Data } from "effect"
import type { Tag } from "./Schema.js"

export type RefScope = "root" | "parent"

export type ParsedTag = Data.TaggedEnum<{
  Identifier: { readonly value: string }
  Title: { readonly value: string }
  Summary: { readonly value: string }
  Image: { readonly url: string }
  PublishedAt: { readonly timestamp: number }
  Topic: { readonly value: string }
  /** `url` (media) or `r` (web reference) */
  Url: { readonly url: string; readonly source: "url" | "r" }
  Context: { readonly value: string }
  EventRef: {
    readonly scope: RefScope
    readonly id: string
    readonly relay?: string
    readonly marker?: string
    readonly pubkey?: string
  }
  AddressRef: { readonly scope: RefScope; readonly coordinate: string; readonly relay?: string }
  ExternalRef: { readonly scope: RefScope; readonly value: string; readonly hint?: string }
  KindRef: { readonly scope: RefScope; readonly kind: number }
  PubkeyRef: { readonly scope: RefScope; readonly pubkey: string; readonly relay?: string }
  ContentWarning: { readonly reason?: string }
  LabelNamespace: { readonly namespace: string }
  Label: { readonly value: string; readonly namespace?: string }
  ImageMeta: { readonly entries: ReadonlyArray<readonly [string, string]> }
  Unknown: { readonly name: string; readonly values: ReadonlyArray<string> }
}>

export const ParsedTag = Data.taggedEnum<ParsedTag>()

const scopeOf = (name: string): RefScope => (name === name.toUpperCase() ? "root" : "parent")

/** Optional positional value; empty strings count as absent */
const opt = (value: string | undefined): string | undefined =>
  value !== undefined && value.length > 0 ? value : undefined

const isUnsignedInteger = (value: string): boolean => /^\d+$/.test(value)

/**
 * Parse a single tag. Tags missing their value fall back to `Unknown`.
 */
export const parseTag = (tag: Tag): ParsedTag => {
  const [name = "", value, third, fourth] = tag
  const unknown = ParsedTag.Unknown({ name, values: tag.slice(1) })

  // value-less tags first
  if (name === "content-warning") return ParsedTag.ContentWarning({ reason: opt(value) })
  if (value === undefined) return unknown

  switch (name) {
    case "d":
      return ParsedTag.Identifier({ value })
    case "title":
      return ParsedTag.Title({ value })
    case "summary":
      return ParsedTag.Summary({ value })
    case "image":
      return ParsedTag.Image({ url: value })
    case "published_at":
      return isUnsignedInteger(value) ? ParsedTag.PublishedAt({ timestamp: Number(value) }) : unknown
    case "t":
      return ParsedTag.Topic({ value })
    case "url":
      return ParsedTag.Url({ url: value, source: "url" })
    case "r":
      return ParsedTag.Url({ url: value, source: "r" })
    case "context":
      return ParsedTag.Context({ value })
    case "e":
    case "E":
      return ParsedTag.EventRef({
        scope: scopeOf(name),
        id: value,
        relay: opt(third),
        // NIP-10 puts a marker in position 3, NIP-22 a pubkey
        marker: fourth !== undefined && !/^[a-f0-9]{64}$/.test(fourth) ? opt(fourth) : undefined,
        pubkey: fourth !== undefined && /^[a-f0-9]{64}$/.test(fourth) ? fourth : undefined,
      })
    case "a":
    case "A":
      return ParsedTag.AddressRef({ scope: scopeOf(name), coordinate: value, relay: opt(third) })
    case "i":
    case "I":
      return ParsedTag.ExternalRef({ scope: scopeOf(name), value, hint: opt(third) })
    case "k":
    case "K":
      return isUnsignedInteger(value) ? ParsedTag.KindRef({ scope: scopeOf(name), kind: Number(value) }) : unknown
    case "p":
    case "P":
      return ParsedTag.PubkeyRef({ scope: scopeOf(name), pubkey: value, relay: opt(third) })
    case "L":
      return ParsedTag.LabelNamespace({ namespace: value })
    case "l":
      return ParsedTag.Label({ value, namespace: opt(third) })
    case "imeta":
      return ParsedTag.ImageMeta({ entries: parseImageMeta(tag.slice(1)) })
    default:
      return unknown
  }
}

/** NIP-92 imeta entries are "key value" strings; entries without a space are skipped */
const parseImageMeta = (entries: ReadonlyArray<string>): Array<readonly [string, string]> => {
  const parsed: Array<readonly [string, string]> = []
  for (const entry of entries) {
    const space = entry.indexOf(" ")
    if (space <= 0) continue
    parsed.push([entry.slice(0, space), entry.slice(space + 1)])
  }
  return parsed
}

export const parseTags = (tags: ReadonlyArray<Tag>): ReadonlyArray<ParsedTag> => tags.map(parseTag)
