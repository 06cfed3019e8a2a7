/**
 * EventService
 *
 * Turns untrusted relay payloads into trusted events per NIP-01.
 * Shape is checked with the NostrEvent schema, then the id is recomputed
 * and the schnorr signature verified. Nothing that fails here may reach
 * persistence.
 */
import { Context, Effect, Either, Layer } from "effect"
import { Schema, TreeFormatter } from "@effect/schema"
import { InvalidEventError, VerificationError } from "../core/Errors.js"
import { NostrEvent } from "../core/Schema.js"
import { checkEvent } from "../core/EventCodec.js"

// =============================================================================
// Service Interface
// =============================================================================

export interface EventService {
  readonly _tag: "EventService"

  /**
   * Decode an unknown payload and verify it.
   * Fails InvalidEventError on a missing or malformed field and
   * VerificationError on an id or signature mismatch.
   */
  validate(raw: unknown): Effect.Effect<NostrEvent, InvalidEventError | VerificationError>
}

// =============================================================================
// Service Tag
// =============================================================================

export const EventService = Context.GenericTag<EventService>("EventService")

// =============================================================================
// Service Implementation
// =============================================================================

const REQUIRED_FIELDS = ["id", "pubkey", "kind"] as const

const decodeEvent = Schema.decodeUnknownEither(NostrEvent)

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value)

/** Best-effort id for log context; untrusted */
export const rawEventId = (raw: unknown): string | undefined =>
  isRecord(raw) && typeof raw.id === "string" ? raw.id : undefined

const make: EventService = {
  _tag: "EventService",

  validate: (raw) =>
    Effect.gen(function* () {
      if (!isRecord(raw)) {
        return yield* Effect.fail(
          new InvalidEventError({ message: "Event payload is not an object", reason: "malformed" })
        )
      }

      const missing = REQUIRED_FIELDS.filter((field) => raw[field] === undefined || raw[field] === null)
      if (missing.length > 0) {
        return yield* Effect.fail(
          new InvalidEventError({
            message: `Event missing required fields (${missing.join(", ")})`,
            reason: "missing-field",
            eventId: rawEventId(raw),
          })
        )
      }

      const decoded = decodeEvent(raw)
      if (Either.isLeft(decoded)) {
        return yield* Effect.fail(
          new InvalidEventError({
            message: `Malformed event: ${TreeFormatter.formatErrorSync(decoded.left)}`,
            reason: "malformed",
            eventId: rawEventId(raw),
          })
        )
      }

      const event = decoded.right
      const failure = checkEvent(event)
      if (failure !== null) {
        return yield* Effect.fail(
          new VerificationError({
            message: `Event ${event.id} failed verification (${failure})`,
            eventId: event.id,
            reason: failure,
          })
        )
      }

      return event
    }),
}

// =============================================================================
// Service Layer
// =============================================================================

export const EventServiceLive = Layer.succeed(EventService, make)
