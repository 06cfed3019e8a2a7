/**
 * Backfill
 *
 * Bulk hydration: one fan-out query over the configured relays, then
 * batched projection of everything that came back. Individual relay
 * outages only show up in the summary; the run fails only when there is
 * nothing to ask or nobody answered.
 */
import { Effect } from "effect"
import { AllRelaysUnreachable, ConfigError } from "../core/Errors.js"
import type { Filter, NostrEvent } from "../core/Schema.js"
import { FanoutQuery } from "../client/FanoutQuery.js"
import { EventProjector } from "../projection/EventProjector.js"

export interface BackfillOptions {
  readonly relays: ReadonlyArray<string>
  readonly filters: ReadonlyArray<Filter>
  readonly batchSize: number
  readonly perRelayTimeoutMs: number
  readonly overallTimeoutMs: number
}

export interface BackfillSummary {
  /** Distinct verified events returned by the query */
  readonly fetched: number
  readonly saved: number
  readonly skipped: number
  readonly errors: number
  /** Events dropped by verification */
  readonly rejected: number
  readonly relaysReached: number
  readonly relaysFailed: number
}

export const backfill = (
  options: BackfillOptions
): Effect.Effect<BackfillSummary, ConfigError | AllRelaysUnreachable, FanoutQuery | EventProjector> =>
  Effect.gen(function* () {
    if (options.relays.length === 0) {
      return yield* Effect.fail(new ConfigError({ message: "No relay configured" }))
    }

    const fanout = yield* FanoutQuery
    const projector = yield* EventProjector

    const result = yield* fanout.query(options.relays, options.filters, {
      perRelayTimeoutMs: options.perRelayTimeoutMs,
      overallTimeoutMs: options.overallTimeoutMs,
    })

    const failed = result.legs.filter((leg) => leg.outcome === "failed")
    if (result.legs.length > 0 && failed.length === result.legs.length) {
      return yield* Effect.fail(
        new AllRelaysUnreachable({
          message: `None of ${failed.length} relays could be reached`,
          relays: failed.map((leg) => leg.url),
        })
      )
    }

    // group by the relay whose copy was kept, preserving merge order
    const byRelay = new Map<string, NostrEvent[]>()
    for (const event of result.events) {
      const relay = result.origins.get(event.id) ?? "unknown"
      const group = byRelay.get(relay)
      if (group) group.push(event)
      else byRelay.set(relay, [event])
    }

    let saved = 0
    let skipped = 0
    let errors = 0
    for (const [relay, events] of byRelay) {
      const batch = yield* projector.projectBatch(events, relay, options.batchSize)
      saved += batch.saved
      skipped += batch.skipped
      errors += batch.errors
    }

    const summary: BackfillSummary = {
      fetched: result.events.length,
      saved,
      skipped,
      errors,
      rejected: result.rejected,
      relaysReached: result.legs.length - failed.length,
      relaysFailed: failed.length,
    }
    yield* Effect.logInfo("Backfill complete").pipe(Effect.annotateLogs({ ...summary }))
    return summary
  })
