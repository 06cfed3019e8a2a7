import { describe, expect, test, vi } from "vitest"
import { Deferred, Duration, Effect, Fiber, Layer, TestClock, TestContext } from "effect"
import { decodeFilter, type NostrEvent } from "../core/Schema.js"
import { EventServiceLive } from "../services/EventService.js"
import { ReceiveTimeout, type ConnectionState, type RelayConnection } from "./RelayConnection.js"
import { RelayPool, makeRelayPool } from "./RelayPool.js"
import { SubscriptionWorker, SubscriptionWorkerLive } from "./SubscriptionWorker.js"
import { replyWith, silent, startTestRelay, unreachableRelayUrl } from "../testing/TestRelay.js"
import { notes, signed, zeroSignature } from "../testing/fixtures.js"

const TestLayer = SubscriptionWorkerLive.pipe(
  Layer.provideMerge(Layer.merge(makeRelayPool({ keepAliveMs: 0, connectTimeoutMs: 2000 }), EventServiceLive))
)

const filters = [decodeFilter({ kinds: [1] })]

const runWorker = <A, E>(effect: Effect.Effect<A, E, SubscriptionWorker>): Promise<A> =>
  Effect.runPromise(effect.pipe(Effect.provide(TestLayer)))

/** Collects delivered contents and fires shutdown once `stopAfter` have arrived */
const collector = (shutdown: Deferred.Deferred<void>, stopAfter: number) => {
  const seen: Array<string> = []
  const onEvent = (event: NostrEvent) =>
    Effect.gen(function* () {
      seen.push(event.content)
      if (seen.length >= stopAfter) yield* Deferred.succeed(shutdown, undefined)
    })
  return { seen, onEvent }
}

describe("SubscriptionWorker", () => {
  test("delivers verified events and stops on shutdown", async () => {
    const relay = await startTestRelay(replyWith(notes(2)))
    try {
      const result = await runWorker(
        Effect.gen(function* () {
          const workers = yield* SubscriptionWorker
          const shutdown = yield* Deferred.make<void>()
          const { seen, onEvent } = collector(shutdown, 2)
          const handle = yield* workers.create({ relayUrl: relay.url, filters, onEvent, shutdown })
          const report = yield* handle.run()
          return { seen, report, state: yield* handle.state() }
        })
      )
      expect(result.seen).toEqual(["note 1", "note 2"])
      expect(result.report).toEqual({ delivered: 2, rejected: 0, handlerFailures: 0, reconnects: 0, iterations: 3 })
      expect(result.state).toBe("Stopped")
      await vi.waitFor(() => expect(relay.closes).toEqual([relay.requests[0]?.subscriptionId]))
    } finally {
      await relay.close()
    }
  })

  test("resubscribes on a fresh connection after the relay disconnects", async () => {
    const [e1, e2] = notes(2)
    const relay = await startTestRelay((ctx) => {
      if (ctx.connectionIndex === 0) {
        ctx.sendEvent(e1)
        ctx.disconnect()
      } else {
        ctx.sendEvent(e2)
        ctx.eose()
      }
    })
    try {
      const result = await runWorker(
        Effect.gen(function* () {
          const workers = yield* SubscriptionWorker
          const shutdown = yield* Deferred.make<void>()
          const { seen, onEvent } = collector(shutdown, 2)
          const report = yield* workers.run({ relayUrl: relay.url, filters, onEvent, shutdown, backoffMs: 50 })
          return { seen, report }
        })
      )
      expect(result.seen).toEqual(["note 1", "note 2"])
      expect(result.report.delivered).toBe(2)
      expect(result.report.reconnects).toBe(1)
      expect(relay.requests.map((request) => request.connectionIndex)).toEqual([0, 1])
      expect(relay.requests[0]?.subscriptionId).not.toBe(relay.requests[1]?.subscriptionId)
    } finally {
      await relay.close()
    }
  })

  test("counts handler failures and rejected events without stopping", async () => {
    const failing = signed({ content: "explodes" })
    const forged = signed({ content: "forged" })
    const last = signed({ content: "last" })
    const relay = await startTestRelay(replyWith([failing, zeroSignature(forged), last]))
    try {
      const report = await runWorker(
        Effect.gen(function* () {
          const workers = yield* SubscriptionWorker
          const shutdown = yield* Deferred.make<void>()
          return yield* workers.run({
            relayUrl: relay.url,
            filters,
            shutdown,
            onEvent: (event): Effect.Effect<void, string> =>
              event.content === "explodes"
                ? Effect.fail("handler exploded")
                : Deferred.succeed(shutdown, undefined).pipe(Effect.asVoid),
          })
        })
      )
      expect(report).toEqual({ delivered: 1, rejected: 1, handlerFailures: 1, reconnects: 0, iterations: 4 })
    } finally {
      await relay.close()
    }
  })

  test("stops after maxIterations against an unreachable relay", async () => {
    const report = await runWorker(
      Effect.gen(function* () {
        const workers = yield* SubscriptionWorker
        const shutdown = yield* Deferred.make<void>()
        return yield* workers.run({
          relayUrl: unreachableRelayUrl,
          filters,
          shutdown,
          onEvent: () => Effect.void,
          backoffMs: 10,
          maxIterations: 6,
        })
      })
    )
    expect(report).toEqual({ delivered: 0, rejected: 0, handlerFailures: 0, reconnects: 3, iterations: 6 })
  })

  test("does nothing when shutdown has already fired", async () => {
    const result = await runWorker(
      Effect.gen(function* () {
        const workers = yield* SubscriptionWorker
        const shutdown = yield* Deferred.make<void>()
        yield* Deferred.succeed(shutdown, undefined)
        const handle = yield* workers.create({ relayUrl: unreachableRelayUrl, filters, onEvent: () => Effect.void, shutdown })
        const report = yield* handle.run()
        return { report, state: yield* handle.state() }
      })
    )
    expect(result.report.iterations).toBe(0)
    expect(result.state).toBe("Stopped")
  })

  test("shutdown ends a worker stuck in its handshake", async () => {
    const relay = await startTestRelay(silent, { upgradeDelayMs: 60_000 })
    const layer = SubscriptionWorkerLive.pipe(
      Layer.provideMerge(Layer.merge(makeRelayPool({ keepAliveMs: 0, connectTimeoutMs: 3000 }), EventServiceLive))
    )
    try {
      const started = Date.now()
      const result = await Effect.runPromise(
        Effect.gen(function* () {
          const workers = yield* SubscriptionWorker
          const shutdown = yield* Deferred.make<void>()
          const handle = yield* workers.create({
            relayUrl: relay.url,
            filters,
            shutdown,
            onEvent: () => Effect.void,
            receiveTimeoutMs: 200,
          })
          const running = yield* Effect.fork(handle.run())
          yield* Effect.sleep("100 millis")
          yield* Deferred.succeed(shutdown, undefined)
          const report = yield* Fiber.join(running)
          return { report, state: yield* handle.state() }
        }).pipe(Effect.provide(layer))
      )
      expect(Date.now() - started).toBeLessThan(1000)
      expect(result.state).toBe("Stopped")
      expect(result.report.iterations).toBe(1)
      await vi.waitFor(() => expect(relay.openSockets()).toBe(0))
    } finally {
      await relay.close()
    }
  })

  test("a quiet subscription is not swept as stale", async () => {
    const firstReceive = Effect.runSync(Deferred.make<void>())
    const quiet = (url: string): RelayConnection => ({
      _tag: "RelayConnection",
      url,
      state: () => Effect.succeed<ConnectionState>("connected"),
      connect: () => Effect.void,
      send: () => Effect.void,
      receive: (timeoutMs) =>
        Deferred.succeed(firstReceive, undefined).pipe(
          Effect.zipRight(Effect.sleep(Duration.millis(timeoutMs))),
          Effect.as(ReceiveTimeout)
        ),
      close: () => Effect.void,
      counters: () => Effect.succeed({ framesReceived: 0, protocolErrors: 0 }),
    })
    const layer = SubscriptionWorkerLive.pipe(
      Layer.provideMerge(
        Layer.merge(makeRelayPool({ connector: (url) => Effect.succeed(quiet(url)) }), EventServiceLive)
      )
    )

    const result = await Effect.runPromise(
      Effect.gen(function* () {
        const workers = yield* SubscriptionWorker
        const pool = yield* RelayPool
        const shutdown = yield* Deferred.make<void>()
        const running = yield* Effect.fork(
          workers.run({
            relayUrl: "wss://quiet.example",
            filters,
            shutdown,
            onEvent: () => Effect.void,
            receiveTimeoutMs: 60_000,
          })
        )
        yield* Deferred.await(firstReceive)
        yield* Effect.yieldNow()

        yield* TestClock.adjust("420 seconds")
        const cleaned = yield* pool.cleanupStale(300)
        const stats = yield* pool.stats()

        yield* Deferred.succeed(shutdown, undefined)
        yield* TestClock.adjust("60 seconds")
        const report = yield* Fiber.join(running)
        return { cleaned, relays: stats.perRelay.map((relay) => relay.state), report }
      }).pipe(Effect.provide(Layer.merge(layer, TestContext.TestContext)))
    )
    expect(result.cleaned).toBe(0)
    expect(result.relays).toEqual(["connected"])
    expect(result.report.delivered).toBe(0)
  })
})
