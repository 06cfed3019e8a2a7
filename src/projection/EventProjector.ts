/**
 * EventProjector
 *
 * The only writer of domain records. Every path into the store (backfill,
 * live subscription, manual re-fetch) goes through `project`, which
 * validates, looks up the id and maps the event by kind. The same event
 * id always ends up as exactly one record.
 */
import { Clock, Context, Effect, Layer, Option } from "effect"
import { InvalidEventError, StorageError, VerificationError } from "../core/Errors.js"
import type { NostrEvent } from "../core/Schema.js"
import { EventService, rawEventId } from "../services/EventService.js"
import { mapRecordFields } from "./Mappers.js"
import type { DomainRecord } from "./Records.js"
import { RecordStore } from "./RecordStore.js"

// =============================================================================
// Types
// =============================================================================

export type ProjectionOutcome = "saved" | "duplicate"

export interface ProjectionResult {
  readonly record: DomainRecord
  readonly outcome: ProjectionOutcome
}

export interface BatchSummary {
  readonly saved: number
  /** Duplicates of records already stored */
  readonly skipped: number
  /** Invalid events and storage failures */
  readonly errors: number
}

// =============================================================================
// Service Interface
// =============================================================================

export interface EventProjector {
  readonly _tag: "EventProjector"

  /**
   * Validate and persist one raw event. Returns the stored record, which is
   * the existing one when the id was seen before.
   */
  project(raw: unknown, sourceRelayUrl: string): Effect.Effect<DomainRecord, InvalidEventError | StorageError>

  projectWithOutcome(
    raw: unknown,
    sourceRelayUrl: string
  ): Effect.Effect<ProjectionResult, InvalidEventError | StorageError>

  /**
   * Project many events, committing every batchSize events.
   * Never fails; failures are counted.
   */
  projectBatch(
    events: ReadonlyArray<unknown>,
    sourceRelayUrl: string,
    batchSize: number
  ): Effect.Effect<BatchSummary>
}

// =============================================================================
// Service Tag
// =============================================================================

export const EventProjector = Context.GenericTag<EventProjector>("EventProjector")

// =============================================================================
// Service Implementation
// =============================================================================

const toInvalid = (error: VerificationError): InvalidEventError =>
  new InvalidEventError({ message: error.message, reason: "verification", eventId: error.eventId })

const make = Effect.gen(function* () {
  const store = yield* RecordStore
  const eventService = yield* EventService

  const buildRecord = (event: NostrEvent, sourceRelay: string, projectedAt: number): DomainRecord => ({
    ...mapRecordFields(event),
    id: event.id,
    pubkey: event.pubkey,
    createdAt: event.created_at,
    kind: event.kind,
    tags: event.tags,
    content: event.content,
    sig: event.sig,
    sourceRelay,
    projectedAt,
  })

  const projectWithOutcome: EventProjector["projectWithOutcome"] = (raw, sourceRelayUrl) =>
    Effect.gen(function* () {
      const event = yield* eventService.validate(raw).pipe(
        Effect.catchTag("VerificationError", (error) => Effect.fail(toInvalid(error)))
      )

      const existing = yield* store.findById(event.id)
      if (Option.isSome(existing)) {
        yield* Effect.logDebug("Event already projected")
        return { record: existing.value, outcome: "duplicate" as const }
      }

      const record = buildRecord(event, sourceRelayUrl, yield* Clock.currentTimeMillis)
      const inserted = yield* store.insertOrIgnore(record)
      if (inserted) {
        yield* Effect.logDebug(`Projected ${record._tag}`)
        return { record, outcome: "saved" as const }
      }

      // another writer stored the same id between our lookup and insert
      const stored = yield* store.findById(event.id)
      return { record: Option.getOrElse(stored, () => record), outcome: "duplicate" as const }
    }).pipe(Effect.annotateLogs({ event_id: rawEventId(raw) ?? "unknown", relay: sourceRelayUrl }))

  const project: EventProjector["project"] = (raw, sourceRelayUrl) =>
    Effect.map(projectWithOutcome(raw, sourceRelayUrl), (result) => result.record)

  const projectBatch: EventProjector["projectBatch"] = (events, sourceRelayUrl, batchSize) =>
    Effect.gen(function* () {
      const size = Math.max(1, Math.floor(batchSize))
      let saved = 0
      let skipped = 0
      let errors = 0

      for (let offset = 0; offset < events.length; offset += size) {
        const chunk = events.slice(offset, offset + size)
        const tally = { saved: 0, skipped: 0, invalid: 0 }

        const committed = yield* store
          .batch(
            Effect.forEach(
              chunk,
              (raw) =>
                projectWithOutcome(raw, sourceRelayUrl).pipe(
                  Effect.tap((result) =>
                    Effect.sync(() => {
                      if (result.outcome === "saved") tally.saved++
                      else tally.skipped++
                    })
                  ),
                  Effect.catchTag("InvalidEventError", (error) =>
                    Effect.gen(function* () {
                      tally.invalid++
                      yield* Effect.logWarning(`Skipping invalid event: ${error.message}`).pipe(
                        Effect.annotateLogs({ reason: error.reason, event_id: error.eventId ?? "unknown" })
                      )
                    })
                  )
                ),
              { discard: true }
            )
          )
          .pipe(
            Effect.as(true),
            // a storage failure rolls back and loses the whole chunk
            Effect.catchTag("StorageError", (error) =>
              Effect.logError(`Batch failed: ${error.message}`).pipe(Effect.as(false))
            )
          )

        if (committed) {
          saved += tally.saved
          skipped += tally.skipped
          errors += tally.invalid
        } else {
          errors += chunk.length
        }
      }

      yield* Effect.logInfo("Batch projected").pipe(
        Effect.annotateLogs({ relay: sourceRelayUrl, saved, skipped, errors })
      )
      return { saved, skipped, errors }
    })

  return {
    _tag: "EventProjector" as const,
    project,
    projectWithOutcome,
    projectBatch,
  } satisfies EventProjector
})

// =============================================================================
// Service Layer
// =============================================================================

export const EventProjectorLive = Layer.effect(EventProjector, make)
