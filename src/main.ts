#!/usr/bin/env node
/**
 * Command line entry point
 * Usage: nostr-hydrate <backfill|subscribe|pool-stats>
 *
 * Configuration comes from HYDRATE_* environment variables (see core/Config.ts).
 * Exit code 1 means the run could not start (configuration, storage) or a
 * backfill reached no relay at all. Single relay outages never fail a run.
 */
import { Console, Deferred, Duration, Effect, Exit, Layer, Logger } from "effect"
import { Schema } from "@effect/schema"
import { loadConfig, type HydrateConfig } from "./core/Config.js"
import { AllRelaysUnreachable, ConfigError } from "./core/Errors.js"
import { Filter } from "./core/Schema.js"
import { FanoutQueryLive } from "./client/FanoutQuery.js"
import { RelayPool, makeRelayPool } from "./client/RelayPool.js"
import { SubscriptionWorkerLive } from "./client/SubscriptionWorker.js"
import { backfill } from "./hydration/Backfill.js"
import { ingestLive } from "./hydration/LiveIngest.js"
import { EventProjectorLive } from "./projection/EventProjector.js"
import { SqliteRecordStoreLive } from "./projection/RecordStore.js"
import { EventServiceLive } from "./services/EventService.js"

const USAGE = "Usage: nostr-hydrate <backfill|subscribe|pool-stats>"

const makeLayer = (config: HydrateConfig) => {
  const base = Layer.merge(makeRelayPool({ connectTimeoutMs: config.connectTimeoutMs }), EventServiceLive)
  const clients = Layer.merge(FanoutQueryLive, SubscriptionWorkerLive).pipe(Layer.provideMerge(base))
  const projection = EventProjectorLive.pipe(
    Layer.provide(Layer.merge(SqliteRecordStoreLive(config.dbPath), EventServiceLive))
  )
  return Layer.merge(clients, projection)
}

type HydrateServices = Layer.Layer.Success<ReturnType<typeof makeLayer>>

const decodeFilter = (input: unknown) =>
  Schema.decodeUnknown(Filter)(input).pipe(
    Effect.mapError((error) => new ConfigError({ message: `Invalid filter: ${error.message}` }))
  )

const runBackfill = (config: HydrateConfig) =>
  Effect.gen(function* () {
    const filter = yield* decodeFilter({ kinds: config.kinds, limit: config.limit })
    const summary = yield* backfill({
      relays: config.relays,
      filters: [filter],
      batchSize: config.batchSize,
      perRelayTimeoutMs: config.perRelayTimeoutMs,
      overallTimeoutMs: config.overallTimeoutMs,
    })
    yield* Console.log(JSON.stringify(summary, null, 2))
  })

const runSubscribe = (config: HydrateConfig) =>
  Effect.gen(function* () {
    const pool = yield* RelayPool
    const filter = yield* decodeFilter({ kinds: config.kinds })
    const relayUrl = config.relays[0]
    if (relayUrl === undefined) {
      return yield* Effect.fail(new ConfigError({ message: "No relay configured" }))
    }

    const shutdown = yield* Deferred.make<void>()
    const stop = () => Deferred.unsafeDone(shutdown, Exit.void)
    process.once("SIGINT", stop)
    process.once("SIGTERM", stop)

    yield* Effect.sleep(Duration.millis(config.cleanupIntervalMs)).pipe(
      Effect.zipRight(pool.cleanupStale(config.staleMaxAgeSeconds)),
      Effect.tap((removed) => (removed > 0 ? Effect.logInfo(`Cleaned up ${removed} stale connections`) : Effect.void)),
      Effect.forever,
      Effect.fork
    )

    yield* Effect.logInfo(`Subscribing to ${relayUrl}; press Ctrl+C to stop`)
    const report = yield* ingestLive({
      relayUrl,
      filters: [filter],
      shutdown,
      receiveTimeoutMs: config.receiveTimeoutMs,
      backoffMs: config.backoffMs,
    })
    yield* Console.log(JSON.stringify(report, null, 2))
  })

const runPoolStats = (config: HydrateConfig) =>
  Effect.gen(function* () {
    const pool = yield* RelayPool
    yield* Effect.forEach(config.relays, (url) => Effect.either(pool.getConnection(url)), {
      concurrency: "unbounded",
      discard: true,
    })
    const stats = yield* pool.stats()
    yield* Console.log(JSON.stringify(stats, null, 2))
  })

const commandFor = (
  command: string | undefined,
  config: HydrateConfig
): Effect.Effect<void, ConfigError | AllRelaysUnreachable, HydrateServices> => {
  switch (command) {
    case "backfill":
      return runBackfill(config)
    case "subscribe":
      return runSubscribe(config)
    case "pool-stats":
      return runPoolStats(config)
    default:
      return Effect.fail(new ConfigError({ message: `Unknown command "${command ?? ""}". ${USAGE}` }))
  }
}

const program = (command: string | undefined) =>
  Effect.gen(function* () {
    const config = yield* loadConfig
    yield* commandFor(command, config).pipe(
      Effect.provide(makeLayer(config)),
      Logger.withMinimumLogLevel(config.logLevel)
    )
  })

const main = program(process.argv[2]).pipe(
  Effect.catchAll((error) =>
    Console.error(`${error._tag}: ${error.message}`).pipe(
      Effect.zipRight(
        Effect.sync(() => {
          process.exitCode = 1
        })
      )
    )
  )
)

await Effect.runPromise(main)
