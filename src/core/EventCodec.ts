/**
 * Pure functions for event id computation and verification.
 *
 * Nothing here touches the network or the store, so every function can be
 * tested against fixed vectors.
 *
 * @example
 * ```typescript
 * const id = computeId({ pubkey, created_at, kind: 1, tags: [], content: "hi" })
 * verify({ ...fields, id, sig }) // true when sig is a valid schnorr signature over id
 * ```
 */
import { schnorr } from "@noble/curves/secp256k1"
import { sha256 } from "@noble/hashes/sha256"
import { bytesToHex, hexToBytes } from "@noble/hashes/utils"

/** The plain shape hashed into an id; looser than the branded schema types */
export interface EventFieldsLike {
  readonly pubkey: string
  readonly created_at: number
  readonly kind: number
  readonly tags: ReadonlyArray<ReadonlyArray<string>>
  readonly content: string
}

export interface SignedEventLike extends EventFieldsLike {
  readonly id: string
  readonly sig: string
}

export type EventTemplate = Omit<EventFieldsLike, "pubkey">

// =============================================================================
// Serialization
// =============================================================================

/** Serialize an event for hashing (NIP-01): compact JSON of [0, pubkey, created_at, kind, tags, content] */
export function serializeEvent(evt: EventFieldsLike): string {
  return JSON.stringify([0, evt.pubkey, evt.created_at, evt.kind, evt.tags, evt.content])
}

/** Compute the event id: lowercase hex sha256 of the serialized event */
export function computeId(evt: EventFieldsLike): string {
  return bytesToHex(sha256(new TextEncoder().encode(serializeEvent(evt))))
}

// =============================================================================
// Verification
// =============================================================================

export type VerifyFailure = "id-mismatch" | "bad-signature"

/**
 * Check an event and report the first failing step, or null when it verifies.
 */
export function checkEvent(event: SignedEventLike): VerifyFailure | null {
  if (computeId(event) !== event.id) return "id-mismatch"
  try {
    return schnorr.verify(hexToBytes(event.sig), hexToBytes(event.id), hexToBytes(event.pubkey))
      ? null
      : "bad-signature"
  } catch {
    // malformed hex or a point off the curve
    return "bad-signature"
  }
}

/** Recompute the id, compare it, then verify the schnorr signature over it */
export function verify(event: SignedEventLike): boolean {
  return checkEvent(event) === null
}

// =============================================================================
// Signing (fixtures and tooling)
// =============================================================================

export function getPublicKey(secretKey: Uint8Array): string {
  return bytesToHex(schnorr.getPublicKey(secretKey))
}

/** Fill in pubkey, id and sig for a template */
export function finalizeEvent(template: EventTemplate, secretKey: Uint8Array): SignedEventLike {
  const fields: EventFieldsLike = {
    pubkey: getPublicKey(secretKey),
    created_at: template.created_at,
    kind: template.kind,
    tags: template.tags.map((tag) => [...tag]),
    content: template.content,
  }
  const id = computeId(fields)
  const sig = bytesToHex(schnorr.sign(hexToBytes(id), secretKey))
  return { ...fields, id, sig }
}
