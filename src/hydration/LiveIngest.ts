/**
 * Live ingestion: a subscription worker whose callback projects each event.
 */
import { Deferred, Effect } from "effect"
import type { Filter } from "../core/Schema.js"
import { normalizeRelayUrl } from "../core/RelayUrl.js"
import { SubscriptionWorker, type WorkerReport } from "../client/SubscriptionWorker.js"
import { EventProjector } from "../projection/EventProjector.js"

export interface LiveIngestOptions {
  readonly relayUrl: string
  readonly filters: ReadonlyArray<Filter>
  readonly shutdown: Deferred.Deferred<void>
  readonly receiveTimeoutMs?: number
  readonly backoffMs?: number
  readonly maxIterations?: number
}

export const ingestLive = (
  options: LiveIngestOptions
): Effect.Effect<WorkerReport, never, SubscriptionWorker | EventProjector> =>
  Effect.gen(function* () {
    const worker = yield* SubscriptionWorker
    const projector = yield* EventProjector
    const relayUrl = normalizeRelayUrl(options.relayUrl)

    return yield* worker.run({
      ...options,
      relayUrl,
      // projection failures surface as handler failures in the report
      onEvent: (event) =>
        projector.projectWithOutcome(event, relayUrl).pipe(
          Effect.tap((result) =>
            result.outcome === "saved"
              ? Effect.logInfo(`Saved ${result.record._tag}`).pipe(
                  Effect.annotateLogs({ event_id: result.record.id, kind: result.record.kind })
                )
              : Effect.void
          ),
          Effect.asVoid
        ),
    })
  })
