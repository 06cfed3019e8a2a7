/**
 * NIP-01 Core Schemas
 *
 * Type-safe Nostr event, filter and wire-message types using Effect Schema.
 * Only the client side of the protocol is modelled: what we send to a relay
 * and what a relay sends back.
 * @see https://github.com/nostr-protocol/nips/blob/master/01.md
 */
import { Schema } from "@effect/schema"

// =============================================================================
// Branded Primitive Types
// =============================================================================

/** 64-character lowercase hex string (sha256 hash) */
export const EventId = Schema.String.pipe(
  Schema.pattern(/^[a-f0-9]{64}$/),
  Schema.brand("EventId")
)
export type EventId = typeof EventId.Type

/** 64-character lowercase hex string (secp256k1 x-only public key) */
export const PublicKey = Schema.String.pipe(
  Schema.pattern(/^[a-f0-9]{64}$/),
  Schema.brand("PublicKey")
)
export type PublicKey = typeof PublicKey.Type

/** 128-character lowercase hex string (schnorr signature) */
export const Signature = Schema.String.pipe(
  Schema.pattern(/^[a-f0-9]{128}$/),
  Schema.brand("Signature")
)
export type Signature = typeof Signature.Type

/** Unix timestamp in seconds (can be 0) */
export const UnixTimestamp = Schema.Number.pipe(
  Schema.int(),
  Schema.greaterThanOrEqualTo(0),
  Schema.brand("UnixTimestamp")
)
export type UnixTimestamp = typeof UnixTimestamp.Type

/** Event kind (0-65535) */
export const EventKind = Schema.Number.pipe(
  Schema.int(),
  Schema.greaterThanOrEqualTo(0),
  Schema.lessThanOrEqualTo(65535),
  Schema.brand("EventKind")
)
export type EventKind = typeof EventKind.Type

/** Tag array (at least one element, the tag name) */
export const Tag = Schema.Array(Schema.String).pipe(Schema.minItems(1))
export type Tag = typeof Tag.Type

/** Subscription ID (1-64 characters) */
export const SubscriptionId = Schema.String.pipe(
  Schema.minLength(1),
  Schema.maxLength(64),
  Schema.brand("SubscriptionId")
)
export type SubscriptionId = typeof SubscriptionId.Type

// =============================================================================
// Event Types
// =============================================================================

/** Signed Nostr event (NIP-01). Decoding checks shape only, never the signature. */
export const NostrEvent = Schema.Struct({
  id: EventId,
  pubkey: PublicKey,
  created_at: UnixTimestamp,
  kind: EventKind,
  tags: Schema.Array(Tag),
  content: Schema.String,
  sig: Signature,
})
export type NostrEvent = typeof NostrEvent.Type

// =============================================================================
// Filter Type
// =============================================================================

/** Event filter for subscriptions (NIP-01) */
export const Filter = Schema.Struct({
  ids: Schema.optional(Schema.Array(EventId)),
  authors: Schema.optional(Schema.Array(PublicKey)),
  kinds: Schema.optional(Schema.Array(EventKind)),
  since: Schema.optional(UnixTimestamp),
  until: Schema.optional(UnixTimestamp),
  limit: Schema.optional(Schema.Number.pipe(Schema.int(), Schema.positive())),
  // Tag filters (#e, #p, #a, #d, #t, and the NIP-22 root/kind scopes)
  "#e": Schema.optional(Schema.Array(EventId)),
  "#p": Schema.optional(Schema.Array(PublicKey)),
  "#a": Schema.optional(Schema.Array(Schema.String)),
  "#d": Schema.optional(Schema.Array(Schema.String)),
  "#t": Schema.optional(Schema.Array(Schema.String)),
  "#A": Schema.optional(Schema.Array(Schema.String)),
  "#E": Schema.optional(Schema.Array(EventId)),
  "#k": Schema.optional(Schema.Array(Schema.String)),
  "#K": Schema.optional(Schema.Array(Schema.String)),
}).pipe(Schema.brand("Filter"))
export type Filter = typeof Filter.Type

// =============================================================================
// Client Messages (Client -> Relay)
// =============================================================================

/** EVENT message: publish an event */
export const ClientEventMessage = Schema.Tuple(Schema.Literal("EVENT"), NostrEvent)
export type ClientEventMessage = typeof ClientEventMessage.Type

/** REQ message: subscribe with filters (variadic: ["REQ", subId, filter, filter, ...]) */
export const ClientReqMessage = Schema.Tuple([Schema.Literal("REQ"), SubscriptionId], Filter)
export type ClientReqMessage = typeof ClientReqMessage.Type

/** CLOSE message: close subscription */
export const ClientCloseMessage = Schema.Tuple(Schema.Literal("CLOSE"), SubscriptionId)
export type ClientCloseMessage = typeof ClientCloseMessage.Type

export const ClientMessage = Schema.Union(
  ClientEventMessage,
  ClientReqMessage,
  ClientCloseMessage
)
export type ClientMessage = typeof ClientMessage.Type

// =============================================================================
// Relay Messages (Relay -> Client)
// =============================================================================

/**
 * EVENT message: relay sends a matching event.
 * The payload stays unknown here; it is untrusted until EventService
 * decodes and verifies it.
 */
export const RelayEventMessage = Schema.Tuple(
  Schema.Literal("EVENT"),
  SubscriptionId,
  Schema.Unknown
)
export type RelayEventMessage = typeof RelayEventMessage.Type

/** OK message: event accepted/rejected */
export const RelayOkMessage = Schema.Tuple(
  Schema.Literal("OK"),
  Schema.String,
  Schema.Boolean,
  Schema.String // reason
)
export type RelayOkMessage = typeof RelayOkMessage.Type

/** EOSE message: end of stored events */
export const RelayEoseMessage = Schema.Tuple(Schema.Literal("EOSE"), SubscriptionId)
export type RelayEoseMessage = typeof RelayEoseMessage.Type

/** CLOSED message: subscription closed by relay (reason optional in the wild) */
export const RelayClosedMessage = Schema.Tuple(
  [Schema.Literal("CLOSED"), SubscriptionId],
  Schema.String
)
export type RelayClosedMessage = typeof RelayClosedMessage.Type

/** NOTICE message: human-readable message */
export const RelayNoticeMessage = Schema.Tuple(Schema.Literal("NOTICE"), Schema.String)
export type RelayNoticeMessage = typeof RelayNoticeMessage.Type

/** AUTH message: authentication challenge (NIP-42) */
export const RelayAuthMessage = Schema.Tuple(Schema.Literal("AUTH"), Schema.String)
export type RelayAuthMessage = typeof RelayAuthMessage.Type

export const RelayMessage = Schema.Union(
  RelayEventMessage,
  RelayOkMessage,
  RelayEoseMessage,
  RelayClosedMessage,
  RelayNoticeMessage,
  RelayAuthMessage
)
export type RelayMessage = typeof RelayMessage.Type

// =============================================================================
// Helpers
// =============================================================================

export const decodeFilter = Schema.decodeUnknownSync(Filter)
