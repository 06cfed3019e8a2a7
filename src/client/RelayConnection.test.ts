import { describe, expect, test, vi } from "vitest"
import { Effect, Either } from "effect"
import {
  Frame,
  closeMessage,
  generateSubscriptionId,
  makeRelayConnection,
  reqMessage,
  type ReceiveTimeout,
} from "./RelayConnection.js"
import { decodeFilter } from "../core/Schema.js"
import { replyWith, silent, startTestRelay, unreachableRelayUrl, type ReqHandler } from "../testing/TestRelay.js"
import { notes } from "../testing/fixtures.js"

const notesFilter = decodeFilter({ kinds: [1] })

const withRelay = async <A>(handler: ReqHandler, body: (url: string) => Effect.Effect<A, unknown>) => {
  const relay = await startTestRelay(handler)
  try {
    return await Effect.runPromise(body(relay.url))
  } finally {
    await relay.close()
  }
}

const tagOf = (frame: Frame | ReceiveTimeout) => frame._tag

describe("RelayConnection", () => {
  test("subscribes and receives events followed by EOSE", async () => {
    const [event] = notes(1)
    const result = await withRelay(replyWith([event]), (url) =>
      Effect.gen(function* () {
        const connection = yield* makeRelayConnection({ url, keepAliveMs: 0 })
        yield* connection.connect()
        const subscriptionId = generateSubscriptionId("test")
        yield* connection.send(reqMessage(subscriptionId, [notesFilter]))
        const first = yield* connection.receive(2000)
        const second = yield* connection.receive(2000)
        yield* connection.close()
        return { subscriptionId, first, second, state: yield* connection.state() }
      })
    )

    expect(result.first).toMatchObject({ _tag: "Event", subscriptionId: result.subscriptionId, event })
    expect(result.second).toMatchObject({ _tag: "Eose", subscriptionId: result.subscriptionId })
    expect(result.state).toBe("closed")
  })

  test("send before connect fails with NotConnectedError", async () => {
    const result = await Effect.runPromise(
      Effect.gen(function* () {
        const connection = yield* makeRelayConnection({ url: unreachableRelayUrl })
        return yield* Effect.either(connection.send(closeMessage(generateSubscriptionId())))
      })
    )
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) expect(result.left._tag).toBe("NotConnectedError")
  })

  test("a silent relay yields a timeout", async () => {
    const frame = await withRelay(silent, (url) =>
      Effect.gen(function* () {
        const connection = yield* makeRelayConnection({ url, keepAliveMs: 0 })
        yield* connection.connect()
        yield* connection.send(reqMessage(generateSubscriptionId(), [notesFilter]))
        const received = yield* connection.receive(100)
        yield* connection.close()
        return received
      })
    )
    expect(tagOf(frame)).toBe("Timeout")
  })

  test("drops undecodable frames and counts them", async () => {
    const result = await withRelay(
      (ctx) => {
        ctx.raw("not json")
        ctx.raw(JSON.stringify(["COUNT", ctx.subscriptionId, { count: 3 }]))
        ctx.closed("error: shutting down")
      },
      (url) =>
        Effect.gen(function* () {
          const connection = yield* makeRelayConnection({ url, keepAliveMs: 0 })
          yield* connection.connect()
          yield* connection.send(reqMessage(generateSubscriptionId(), [notesFilter]))
          const frame = yield* connection.receive(2000)
          const counters = yield* connection.counters()
          yield* connection.close()
          return { frame, counters }
        })
    )
    expect(result.frame).toMatchObject({ _tag: "Closed", reason: "error: shutting down" })
    expect(result.counters).toEqual({ framesReceived: 1, protocolErrors: 2 })
  })

  test("concurrent connects share one socket", async () => {
    const relay = await startTestRelay(silent)
    try {
      await Effect.runPromise(
        Effect.gen(function* () {
          const connection = yield* makeRelayConnection({ url: relay.url, keepAliveMs: 0 })
          yield* Effect.all([connection.connect(), connection.connect(), connection.connect()], {
            concurrency: "unbounded",
          })
          expect(yield* connection.state()).toBe("connected")
          yield* connection.close()
        })
      )
      expect(relay.connectionCount()).toBe(1)
    } finally {
      await relay.close()
    }
  })

  test("an unreachable relay fails with ConnectionError", async () => {
    const result = await Effect.runPromise(
      Effect.gen(function* () {
        const connection = yield* makeRelayConnection({ url: unreachableRelayUrl, connectTimeoutMs: 2000 })
        const connected = yield* Effect.either(connection.connect())
        return { connected, state: yield* connection.state() }
      })
    )
    expect(Either.isLeft(result.connected)).toBe(true)
    if (Either.isLeft(result.connected)) expect(result.connected.left._tag).toBe("ConnectionError")
    expect(result.state).toBe("closed")
  })

  test("receive fails after the relay disconnects, once buffered frames are drained", async () => {
    const [event] = notes(1)
    const result = await withRelay(
      (ctx) => {
        ctx.sendEvent(event)
        ctx.disconnect()
      },
      (url) =>
        Effect.gen(function* () {
          const connection = yield* makeRelayConnection({ url, keepAliveMs: 0 })
          yield* connection.connect()
          yield* connection.send(reqMessage(generateSubscriptionId(), [notesFilter]))
          const first = yield* connection.receive(2000)
          const second = yield* Effect.either(connection.receive(2000))
          const third = yield* Effect.either(connection.receive(2000))
          return { first, second, third }
        })
    )
    expect(tagOf(result.first)).toBe("Event")
    expect(Either.isLeft(result.second)).toBe(true)
    expect(Either.isLeft(result.third)).toBe(true)
    if (Either.isLeft(result.second)) expect(result.second.left._tag).toBe("ConnectionError")
  })

  test("answers a PING without surfacing it", async () => {
    const relay = await startTestRelay((ctx) => {
      ctx.ping()
      ctx.eose()
    })
    try {
      const frames = await Effect.runPromise(
        Effect.gen(function* () {
          const connection = yield* makeRelayConnection({ url: relay.url, keepAliveMs: 0 })
          yield* connection.connect()
          yield* connection.send(reqMessage(generateSubscriptionId(), [notesFilter]))
          const first = yield* connection.receive(2000)
          const second = yield* connection.receive(100)
          yield* connection.close()
          return [tagOf(first), tagOf(second)]
        })
      )
      expect(frames).toEqual(["Eose", "Timeout"])
      await vi.waitFor(() => expect(relay.pongs()).toBe(1))
    } finally {
      await relay.close()
    }
  })

  test("surfaces an AUTH challenge and sends nothing back", async () => {
    const relay = await startTestRelay((ctx) => {
      ctx.auth("challenge-1")
      ctx.eose()
    })
    try {
      const result = await Effect.runPromise(
        Effect.gen(function* () {
          const connection = yield* makeRelayConnection({ url: relay.url, keepAliveMs: 0 })
          yield* connection.connect()
          const subscriptionId = generateSubscriptionId("auth")
          yield* connection.send(reqMessage(subscriptionId, [notesFilter]))
          const first = yield* connection.receive(2000)
          const second = yield* connection.receive(2000)
          yield* connection.close()
          return { subscriptionId, first, second }
        })
      )
      expect(result.first).toEqual(Frame.Auth({ challenge: "challenge-1" }))
      expect(result.second).toMatchObject({ _tag: "Eose", subscriptionId: result.subscriptionId })
      expect(relay.frameTypes).toEqual(["REQ"])
    } finally {
      await relay.close()
    }
  })

  test("an interrupted handshake closes the socket", async () => {
    const relay = await startTestRelay(silent, { upgradeDelayMs: 500 })
    try {
      const result = await Effect.runPromise(
        Effect.gen(function* () {
          const connection = yield* makeRelayConnection({ url: relay.url, keepAliveMs: 0, connectTimeoutMs: 3000 })
          const attempt = yield* connection.connect().pipe(Effect.timeoutOption("100 millis"))
          return { attempt, state: yield* connection.state() }
        })
      )
      expect(result.attempt._tag).toBe("None")
      expect(result.state).toBe("closed")
      await vi.waitFor(() => expect(relay.openSockets()).toBe(0))
    } finally {
      await relay.close()
    }
  })
})
