/**
 * SubscriptionWorker
 *
 * Holds one persistent subscription on one relay and hands every verified
 * event to a callback. The run loop is an explicit state machine:
 *
 *   Connecting -> Subscribed -> Receiving -> Reconnecting -> Connecting ...
 *
 * and ends in Stopped once the shutdown signal fires or the optional
 * iteration bound is reached. Connection loss never ends the run; it costs
 * one backoff and a fresh subscription id.
 */
import { Cause, Context, Deferred, Duration, Effect, Layer, Option, Ref } from "effect"
import type { Filter, NostrEvent, SubscriptionId } from "../core/Schema.js"
import { normalizeRelayUrl } from "../core/RelayUrl.js"
import { EventService, rawEventId } from "../services/EventService.js"
import { RelayPool } from "./RelayPool.js"
import {
  closeMessage,
  generateSubscriptionId,
  reqMessage,
  type RelayConnection,
} from "./RelayConnection.js"

// =============================================================================
// Types
// =============================================================================

export type WorkerState = "Connecting" | "Subscribed" | "Receiving" | "Reconnecting" | "Stopped"

export interface WorkerOptions<E = never> {
  readonly relayUrl: string
  readonly filters: ReadonlyArray<Filter>
  /** Called once per verified event; failures are logged, never fatal */
  readonly onEvent: (event: NostrEvent) => Effect.Effect<void, E>
  /** Completing this deferred stops the worker */
  readonly shutdown: Deferred.Deferred<void>
  readonly receiveTimeoutMs?: number
  readonly backoffMs?: number
  /** Stop after this many loop steps */
  readonly maxIterations?: number
}

export interface WorkerReport {
  readonly delivered: number
  readonly rejected: number
  readonly handlerFailures: number
  readonly reconnects: number
  readonly iterations: number
}

export interface WorkerHandle {
  state(): Effect.Effect<WorkerState>
  /** Drive the loop until Stopped */
  run(): Effect.Effect<WorkerReport>
}

// =============================================================================
// Service Interface
// =============================================================================

export interface SubscriptionWorker {
  readonly _tag: "SubscriptionWorker"

  /**
   * Prepare a worker without starting it, so its state can be observed
   */
  create<E>(options: WorkerOptions<E>): Effect.Effect<WorkerHandle>

  /**
   * Create and run a worker until it stops
   */
  run<E>(options: WorkerOptions<E>): Effect.Effect<WorkerReport>
}

// =============================================================================
// Service Tag
// =============================================================================

export const SubscriptionWorker = Context.GenericTag<SubscriptionWorker>("SubscriptionWorker")

// =============================================================================
// Service Implementation
// =============================================================================

const DEFAULT_RECEIVE_TIMEOUT_MS = 1_000
const DEFAULT_BACKOFF_MS = 5_000

const make = Effect.gen(function* () {
  const pool = yield* RelayPool
  const eventService = yield* EventService

  const create = <E>(options: WorkerOptions<E>) =>
    Effect.gen(function* () {
      const url = normalizeRelayUrl(options.relayUrl)
      const receiveTimeoutMs = options.receiveTimeoutMs ?? DEFAULT_RECEIVE_TIMEOUT_MS
      const backoffMs = options.backoffMs ?? DEFAULT_BACKOFF_MS
      const stateRef = yield* Ref.make<WorkerState>("Connecting")

      const transition = (next: WorkerState, detail?: string) =>
        Effect.gen(function* () {
          const previous = yield* Ref.getAndSet(stateRef, next)
          if (previous !== next) {
            yield* Effect.logInfo(`Worker ${previous} -> ${next}${detail ? `: ${detail}` : ""}`)
          }
        })

      const deliver = (event: NostrEvent) =>
        options.onEvent(event).pipe(
          Effect.as(true),
          Effect.catchAllCause((cause) =>
            Effect.logError("Event handler failed").pipe(
              Effect.annotateLogs({ event_id: event.id, cause: Cause.pretty(cause) }),
              Effect.as(false)
            )
          )
        )

      const run = () =>
        Effect.gen(function* () {
          let connection: RelayConnection | null = null
          let subscriptionId: SubscriptionId | null = null
          let delivered = 0
          let rejected = 0
          let handlerFailures = 0
          let reconnects = 0
          let iterations = 0

          const finish = Effect.gen(function* () {
            if (connection && subscriptionId) {
              yield* connection.send(closeMessage(subscriptionId)).pipe(Effect.ignore)
            }
            yield* pool.closeRelay(url)
            yield* transition("Stopped")
          })

          const loop = Effect.gen(function* () {
            while (true) {
              if (yield* Deferred.isDone(options.shutdown)) return
              if (options.maxIterations !== undefined && iterations >= options.maxIterations) return
              iterations++

              const state = yield* Ref.get(stateRef)
              switch (state) {
                case "Connecting": {
                  // a stalled handshake must not outlive the shutdown signal
                  const opened = yield* Effect.raceFirst(
                    Effect.either(
                      Effect.gen(function* () {
                        const conn = yield* pool.getConnection(url)
                        const subId = generateSubscriptionId("live")
                        yield* conn.send(reqMessage(subId, options.filters))
                        return [conn, subId] as const
                      })
                    ),
                    Deferred.await(options.shutdown).pipe(Effect.as(null))
                  )
                  if (opened === null) return
                  if (opened._tag === "Left") {
                    yield* transition("Reconnecting", opened.left.message)
                  } else {
                    ;[connection, subscriptionId] = opened.right
                    yield* transition("Subscribed", subscriptionId)
                  }
                  break
                }

                case "Subscribed":
                case "Receiving": {
                  if (!connection || !subscriptionId) {
                    yield* transition("Connecting")
                    break
                  }
                  const received = yield* Effect.either(connection.receive(receiveTimeoutMs))
                  if (received._tag === "Left") {
                    connection = null
                    subscriptionId = null
                    yield* transition("Reconnecting", received.left.message)
                    break
                  }

                  // timeouts count as activity too
                  yield* pool.markActive(url)
                  const frame = received.right
                  switch (frame._tag) {
                    case "Event": {
                      if (frame.subscriptionId !== subscriptionId) break
                      yield* transition("Receiving")
                      const validated = yield* Effect.either(eventService.validate(frame.event))
                      if (validated._tag === "Left") {
                        rejected++
                        yield* Effect.logDebug(`Rejected event: ${validated.left.message}`).pipe(
                          Effect.annotateLogs({ event_id: rawEventId(frame.event) ?? "unknown" })
                        )
                        break
                      }
                      if (yield* deliver(validated.right)) {
                        delivered++
                      } else {
                        handlerFailures++
                      }
                      break
                    }
                    case "Eose":
                      if (frame.subscriptionId !== subscriptionId) break
                      yield* Effect.logDebug("Stored events delivered; streaming live")
                      yield* transition("Receiving")
                      break
                    case "Closed":
                      if (frame.subscriptionId !== subscriptionId) break
                      subscriptionId = null
                      yield* transition("Reconnecting", `closed by relay: ${frame.reason}`)
                      break
                    case "Auth":
                      yield* Effect.logDebug("Relay sent an AUTH challenge; not answering")
                      break
                    default:
                      break
                  }
                  break
                }

                case "Reconnecting": {
                  reconnects++
                  const stopped = yield* Deferred.await(options.shutdown).pipe(
                    Effect.timeoutOption(Duration.millis(backoffMs))
                  )
                  if (Option.isSome(stopped)) return
                  yield* transition("Connecting")
                  break
                }

                case "Stopped":
                  return
              }
            }
          })

          yield* loop.pipe(Effect.ensuring(finish))

          const report: WorkerReport = { delivered, rejected, handlerFailures, reconnects, iterations }
          yield* Effect.logInfo("Worker stopped").pipe(
            Effect.annotateLogs({ ...report })
          )
          return report
        }).pipe(Effect.annotateLogs({ relay: url }))

      return {
        state: () => Ref.get(stateRef),
        run,
      } satisfies WorkerHandle
    })

  return {
    _tag: "SubscriptionWorker" as const,
    create,
    run: <E>(options: WorkerOptions<E>) => Effect.flatMap(create(options), (handle) => handle.run()),
  } satisfies SubscriptionWorker
})

// =============================================================================
// Service Layer
// =============================================================================

export const SubscriptionWorkerLive = Layer.effect(SubscriptionWorker, make)
