/**
 * Signed test events. Keys are derived from placeholder strings.
 */
import { sha256 } from "@noble/hashes/sha256"
import { utf8ToBytes } from "@noble/hashes/utils"
import { Schema } from "@effect/schema"
import { finalizeEvent, getPublicKey, type SignedEventLike } from "../core/EventCodec.js"
import { NostrEvent } from "../core/Schema.js"

export const secretKeyFrom = (placeholder: string): Uint8Array => sha256(utf8ToBytes(placeholder))

export const TEST_SECRET_KEY = secretKeyFrom("test-secret")
export const TEST_PUBKEY = getPublicKey(TEST_SECRET_KEY)

export interface FixtureTemplate {
  readonly kind?: number
  readonly created_at?: number
  readonly tags?: ReadonlyArray<ReadonlyArray<string>>
  readonly content?: string
}

/** Sign a template with the test key; defaults to a kind 1 note */
export const signed = (template: FixtureTemplate = {}, secretKey: Uint8Array = TEST_SECRET_KEY): NostrEvent =>
  Schema.decodeUnknownSync(NostrEvent)(
    finalizeEvent(
      {
        kind: template.kind ?? 1,
        created_at: template.created_at ?? 1_700_000_000,
        tags: template.tags ?? [],
        content: template.content ?? "",
      },
      secretKey
    )
  )

/** Distinct notes, told apart by their content */
export const notes = (count: number, prefix = "note"): Array<NostrEvent> =>
  Array.from({ length: count }, (_, i) => signed({ content: `${prefix} ${i + 1}` }))

/** Same id and signature, different content */
export const tampered = (event: SignedEventLike): SignedEventLike => ({ ...event, content: `${event.content}!` })

export const zeroSignature = (event: SignedEventLike): SignedEventLike => ({ ...event, sig: "0".repeat(128) })
