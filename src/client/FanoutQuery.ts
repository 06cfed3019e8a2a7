/**
 * FanoutQuery
 *
 * Sends one filter set to many relays at once and merges what comes back.
 * Every relay is an independent leg: a relay that is down, slow or hostile
 * only ever costs its own leg. Events are verified before they are buffered,
 * and the merge keeps the first verified occurrence of each id, walking the
 * legs in relay order.
 */
import { Clock, Context, Duration, Effect, Fiber, Layer, Ref } from "effect"
import { ConnectionError } from "../core/Errors.js"
import type { Filter, NostrEvent } from "../core/Schema.js"
import { normalizeRelayUrl } from "../core/RelayUrl.js"
import { EventService, rawEventId } from "../services/EventService.js"
import { RelayPool } from "./RelayPool.js"
import { closeMessage, generateSubscriptionId, reqMessage } from "./RelayConnection.js"

// =============================================================================
// Types
// =============================================================================

export interface QueryOptions {
  /** Budget for one relay leg, handshake included */
  readonly perRelayTimeoutMs: number
  /** Budget for the whole query; legs still running are abandoned */
  readonly overallTimeoutMs: number
}

/** How a leg ended */
export type LegOutcome = "eose" | "closed" | "timeout" | "failed" | "abandoned"

export interface LegReport {
  readonly url: string
  readonly outcome: LegOutcome
  /** EVENT frames seen for the leg's subscription */
  readonly received: number
  readonly accepted: number
  readonly rejected: number
  readonly error?: string
}

export interface FanoutResult {
  readonly events: ReadonlyArray<NostrEvent>
  /** Event id to the relay whose copy was kept */
  readonly origins: ReadonlyMap<string, string>
  /** Events dropped by verification during this call */
  readonly rejected: number
  readonly legs: ReadonlyArray<LegReport>
}

/** Mutable progress of one running leg */
interface LegProgress {
  readonly url: string
  outcome: LegOutcome | null
  received: number
  rejected: number
  error: string | undefined
  readonly events: NostrEvent[]
}

// =============================================================================
// Service Interface
// =============================================================================

export interface FanoutQuery {
  readonly _tag: "FanoutQuery"

  /**
   * Query relays concurrently. Never fails: unreachable relays show up as
   * legs with outcome "failed".
   */
  query(
    relays: ReadonlyArray<string>,
    filters: ReadonlyArray<Filter>,
    options: QueryOptions
  ): Effect.Effect<FanoutResult>

  /**
   * Rejected events across every query made by this service
   */
  rejectedTotal(): Effect.Effect<number>
}

// =============================================================================
// Service Tag
// =============================================================================

export const FanoutQuery = Context.GenericTag<FanoutQuery>("FanoutQuery")

// =============================================================================
// Service Implementation
// =============================================================================

const make = Effect.gen(function* () {
  const pool = yield* RelayPool
  const eventService = yield* EventService
  const rejectedTotalRef = yield* Ref.make(0)

  const runLeg = (progress: LegProgress, filters: ReadonlyArray<Filter>, perRelayTimeoutMs: number) =>
    Effect.gen(function* () {
      const deadline = (yield* Clock.currentTimeMillis) + perRelayTimeoutMs
      const connection = yield* pool.getConnection(progress.url).pipe(
        Effect.timeoutFail({
          duration: Duration.millis(perRelayTimeoutMs),
          onTimeout: () =>
            new ConnectionError({ message: "Connect exceeded the relay budget", url: progress.url }),
        })
      )

      const subscriptionId = generateSubscriptionId("fanout")
      yield* connection.send(reqMessage(subscriptionId, filters))

      let outcome: LegOutcome = "timeout"
      reading: while (true) {
        const remaining = deadline - (yield* Clock.currentTimeMillis)
        if (remaining <= 0) break

        const frame = yield* connection.receive(remaining)
        switch (frame._tag) {
          case "Timeout":
            break reading
          case "Event": {
            if (frame.subscriptionId !== subscriptionId) continue
            progress.received++
            const validated = yield* Effect.either(eventService.validate(frame.event))
            if (validated._tag === "Right") {
              progress.events.push(validated.right)
            } else {
              progress.rejected++
              yield* Ref.update(rejectedTotalRef, (n) => n + 1)
              yield* Effect.logDebug(`Rejected event: ${validated.left.message}`).pipe(
                Effect.annotateLogs({ event_id: rawEventId(frame.event) ?? "unknown" })
              )
            }
            continue
          }
          case "Eose":
            if (frame.subscriptionId !== subscriptionId) continue
            outcome = "eose"
            break reading
          case "Closed":
            if (frame.subscriptionId !== subscriptionId) continue
            yield* Effect.logInfo(`Subscription closed by relay: ${frame.reason}`)
            outcome = "closed"
            break reading
          case "Auth":
            yield* Effect.logDebug("Relay sent an AUTH challenge; not answering")
            continue
          default:
            continue
        }
      }

      if (outcome !== "closed") {
        // best effort, the relay may already be gone
        yield* connection.send(closeMessage(subscriptionId)).pipe(Effect.ignore)
      }
      yield* pool.markActive(progress.url)
      progress.outcome = outcome
    }).pipe(
      Effect.catchAll((error) =>
        Effect.gen(function* () {
          progress.outcome = "failed"
          progress.error = error.message
          yield* Effect.logWarning(`Relay leg failed: ${error.message}`)
        })
      ),
      Effect.annotateLogs({ relay: progress.url })
    )

  const query: FanoutQuery["query"] = (relays, filters, options) =>
    Effect.gen(function* () {
      const urls = [...new Set(relays.map(normalizeRelayUrl))]
      const progress: LegProgress[] = urls.map((url) => ({
        url,
        outcome: null,
        received: 0,
        rejected: 0,
        error: undefined,
        events: [],
      }))

      // Daemon fibers: the overall timeout abandons legs, it never interrupts them
      const fibers = yield* Effect.forEach(progress, (leg) =>
        Effect.forkDaemon(runLeg(leg, filters, options.perRelayTimeoutMs))
      )
      const settled = yield* Fiber.joinAll(fibers).pipe(
        Effect.timeoutOption(Duration.millis(options.overallTimeoutMs))
      )
      if (settled._tag === "None") {
        yield* Effect.logWarning("Overall query timeout reached; abandoning unfinished legs")
      }

      const origins = new Map<string, string>()
      const events: NostrEvent[] = []
      const legs: LegReport[] = []
      let rejected = 0

      for (const leg of progress) {
        // snapshot now: abandoned legs keep running until their own deadline
        const buffered = [...leg.events]
        for (const event of buffered) {
          if (origins.has(event.id)) continue
          origins.set(event.id, leg.url)
          events.push(event)
        }
        rejected += leg.rejected
        legs.push({
          url: leg.url,
          outcome: leg.outcome ?? "abandoned",
          received: leg.received,
          accepted: buffered.length,
          rejected: leg.rejected,
          ...(leg.error !== undefined ? { error: leg.error } : {}),
        })
      }

      yield* Effect.logInfo("Fan-out query complete").pipe(
        Effect.annotateLogs({
          relays: urls.length,
          events: events.length,
          rejected,
          failed: legs.filter((leg) => leg.outcome === "failed").length,
        })
      )

      return { events, origins, rejected, legs }
    })

  return {
    _tag: "FanoutQuery" as const,
    query,
    rejectedTotal: () => Ref.get(rejectedTotalRef),
  } satisfies FanoutQuery
})

// =============================================================================
// Service Layer
// =============================================================================

export const FanoutQueryLive = Layer.effect(FanoutQuery, make)
