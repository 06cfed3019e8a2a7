/**
 * RelayConnection
 *
 * One WebSocket session to one relay: connect, send, receive demultiplexed
 * frames, keep-alive, close. A connection is single-use: once its socket has
 * closed it stays closed, and the pool replaces it with a fresh one.
 *
 * Frames are buffered in a queue as they arrive and handed out by
 * `receive(timeoutMs)`, so callers drive the read loop at their own pace.
 * WebSocket PING control frames are answered by the transport and never
 * surface as frames. AUTH challenges are surfaced, never answered.
 */
import { Data, Deferred, Duration, Effect, Option, Queue, Runtime } from "effect"
import { Schema } from "@effect/schema"
import WebSocket from "ws"
import { ConnectionError, NotConnectedError, ProtocolError } from "../core/Errors.js"
import {
  RelayMessage,
  type ClientMessage,
  type Filter,
  type SubscriptionId,
} from "../core/Schema.js"

// =============================================================================
// Types
// =============================================================================

/** Connection state */
export type ConnectionState = "disconnected" | "connecting" | "connected" | "closed"

/** Configuration for relay connection */
export interface RelayConnectionConfig {
  readonly url: string
  readonly connectTimeoutMs?: number
  /** Interval between keep-alive pings while open; 0 disables them */
  readonly keepAliveMs?: number
}

/** A decoded relay-to-client frame */
export type Frame = Data.TaggedEnum<{
  Event: { readonly subscriptionId: SubscriptionId; readonly event: unknown }
  Eose: { readonly subscriptionId: SubscriptionId }
  Notice: { readonly message: string }
  Ok: { readonly eventId: string; readonly accepted: boolean; readonly message: string }
  Auth: { readonly challenge: string }
  Closed: { readonly subscriptionId: SubscriptionId; readonly reason: string }
}>

export const Frame = Data.taggedEnum<Frame>()

/** Returned by receive() when nothing arrived within the timeout */
export interface ReceiveTimeout {
  readonly _tag: "Timeout"
}

export const ReceiveTimeout: ReceiveTimeout = { _tag: "Timeout" }

/** Counters for observability */
export interface ConnectionCounters {
  readonly framesReceived: number
  readonly protocolErrors: number
}

/** Queue marker pushed once the socket has gone away */
interface SocketGone {
  readonly _tag: "SocketGone"
  readonly reason: string
}

type Inbound = Frame | SocketGone

// =============================================================================
// Service Interface
// =============================================================================

export interface RelayConnection {
  readonly _tag: "RelayConnection"

  /**
   * Normalized relay URL
   */
  readonly url: string

  /**
   * Get current connection state
   */
  state(): Effect.Effect<ConnectionState>

  /**
   * Open the socket. Idempotent while connecting or connected.
   */
  connect(): Effect.Effect<void, ConnectionError>

  /**
   * Send a client message
   */
  send(message: ClientMessage): Effect.Effect<void, NotConnectedError>

  /**
   * Wait up to timeoutMs for the next frame.
   * Fails once the socket has closed and every buffered frame was handed out.
   */
  receive(timeoutMs: number): Effect.Effect<Frame | ReceiveTimeout, ConnectionError>

  /**
   * Close the socket. Idempotent.
   */
  close(): Effect.Effect<void>

  counters(): Effect.Effect<ConnectionCounters>
}

// =============================================================================
// Helpers
// =============================================================================

let subCounter = 0

/** Fresh subscription id, unique within the process */
export const generateSubscriptionId = (prefix = "sub"): SubscriptionId => {
  subCounter++
  // at most 64 characters per NIP-01
  return `${prefix.slice(0, 24)}_${Date.now()}_${subCounter}` as SubscriptionId
}

export const reqMessage = (
  subscriptionId: SubscriptionId,
  filters: ReadonlyArray<Filter>
): ClientMessage => ["REQ", subscriptionId, ...filters]

export const closeMessage = (subscriptionId: SubscriptionId): ClientMessage => ["CLOSE", subscriptionId]

const decodeRelayMessage = Schema.decodeUnknownEither(RelayMessage)

const toFrame = (message: RelayMessage): Frame => {
  switch (message[0]) {
    case "EVENT":
      return Frame.Event({ subscriptionId: message[1], event: message[2] })
    case "EOSE":
      return Frame.Eose({ subscriptionId: message[1] })
    case "NOTICE":
      return Frame.Notice({ message: message[1] })
    case "OK":
      return Frame.Ok({ eventId: message[1], accepted: message[2], message: message[3] })
    case "AUTH":
      return Frame.Auth({ challenge: message[1] })
    case "CLOSED":
      return Frame.Closed({ subscriptionId: message[1], reason: message[2] ?? "" })
  }
}

const rawDataToString = (data: WebSocket.RawData): string => {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8")
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8")
  return data.toString("utf8")
}

// =============================================================================
// Implementation
// =============================================================================

export const makeRelayConnection = (config: RelayConnectionConfig) =>
  Effect.gen(function* () {
    const runtime = yield* Effect.runtime<never>()
    const runFork = Runtime.runFork(runtime)
    const inbound = yield* Queue.unbounded<Inbound>()

    const connectTimeoutMs = config.connectTimeoutMs ?? 10_000
    const keepAliveMs = config.keepAliveMs ?? 30_000

    // Plain JS state for WebSocket callbacks
    let state: ConnectionState = "disconnected"
    let socket: WebSocket | null = null
    let opened: Deferred.Deferred<void, ConnectionError> | null = null
    let keepAlive: ReturnType<typeof setInterval> | null = null
    let framesReceived = 0
    let protocolErrors = 0

    const log = (effect: Effect.Effect<void>) =>
      runFork(effect.pipe(Effect.annotateLogs({ relay: config.url })))

    const stopKeepAlive = () => {
      if (keepAlive) {
        clearInterval(keepAlive)
        keepAlive = null
      }
    }

    const markGone = (reason: string) => {
      if (state === "closed") return
      state = "closed"
      stopKeepAlive()
      Effect.runSync(Queue.offer(inbound, { _tag: "SocketGone", reason }))
      if (opened) {
        Effect.runSync(
          Deferred.fail(opened, new ConnectionError({ message: reason, url: config.url }))
        )
      }
    }

    // Handle incoming text (called synchronously from the socket)
    const handleMessage = (data: string): void => {
      let parsed: unknown
      try {
        parsed = JSON.parse(data)
      } catch {
        reportProtocolError(new ProtocolError({ message: "Frame is not JSON", raw: data.slice(0, 200) }))
        return
      }

      const decoded = decodeRelayMessage(parsed)
      if (decoded._tag === "Left") {
        reportProtocolError(
          new ProtocolError({ message: "Unrecognized frame", raw: data.slice(0, 200) })
        )
        return
      }

      framesReceived++
      const frame = toFrame(decoded.right)
      if (frame._tag === "Notice") {
        log(Effect.logWarning(`Relay notice: ${frame.message}`))
      }
      Effect.runSync(Queue.offer(inbound, frame))
    }

    const reportProtocolError = (error: ProtocolError): void => {
      protocolErrors++
      log(Effect.logDebug("Dropped frame").pipe(Effect.annotateLogs({ error: error.message, raw: error.raw })))
    }

    const openSocket = (deferred: Deferred.Deferred<void, ConnectionError>): void => {
      state = "connecting"
      let ws: WebSocket
      try {
        ws = new WebSocket(config.url, { handshakeTimeout: connectTimeoutMs })
      } catch (error) {
        // invalid URL and friends are thrown synchronously
        markGone(error instanceof Error ? error.message : "Connection failed")
        return
      }
      socket = ws

      ws.on("open", () => {
        state = "connected"
        if (keepAliveMs > 0) {
          keepAlive = setInterval(() => {
            if (ws.readyState === WebSocket.OPEN) ws.ping()
          }, keepAliveMs)
          keepAlive.unref()
        }
        Effect.runSync(Deferred.succeed(deferred, undefined))
      })

      ws.on("message", (data, isBinary) => {
        if (isBinary) {
          reportProtocolError(new ProtocolError({ message: "Binary frame", raw: "" }))
          return
        }
        handleMessage(rawDataToString(data))
      })

      ws.on("error", (error) => {
        log(Effect.logDebug(`WebSocket error: ${error.message}`))
        markGone(error.message || "WebSocket error")
      })

      ws.on("close", (code) => {
        markGone(`Socket closed (${code})`)
      })
    }

    // Public API
    const connect: RelayConnection["connect"] = () =>
      Effect.suspend(() => {
        if (state === "connected") return Effect.void
        if (state === "closed") {
          return Effect.fail(new ConnectionError({ message: "Connection closed", url: config.url }))
        }
        if (opened) return Deferred.await(opened)

        return Effect.gen(function* () {
          const deferred = yield* Deferred.make<void, ConnectionError>()
          opened = deferred
          openSocket(deferred)
          yield* Deferred.await(deferred).pipe(
            Effect.timeoutFail({
              duration: Duration.millis(connectTimeoutMs),
              onTimeout: () =>
                new ConnectionError({
                  message: `Handshake timed out after ${connectTimeoutMs}ms`,
                  url: config.url,
                }),
            }),
            Effect.tapError(() => close()),
            Effect.onInterrupt(() => close())
          )
        })
      })

    const send: RelayConnection["send"] = (message) =>
      Effect.suspend(() => {
        const ws = socket
        if (state !== "connected" || !ws || ws.readyState !== WebSocket.OPEN) {
          return Effect.fail(new NotConnectedError({ message: "Not connected", url: config.url }))
        }
        return Effect.try({
          try: () => ws.send(JSON.stringify(message)),
          catch: (error) =>
            new NotConnectedError({
              message: error instanceof Error ? error.message : "Send failed",
              url: config.url,
            }),
        })
      })

    const receive: RelayConnection["receive"] = (timeoutMs) =>
      Effect.suspend(() => {
        if (state === "disconnected") {
          return Effect.fail(new ConnectionError({ message: "Not connected", url: config.url }))
        }
        return Queue.take(inbound).pipe(
          Effect.timeoutOption(Duration.millis(timeoutMs)),
          Effect.flatMap((next): Effect.Effect<Frame | ReceiveTimeout, ConnectionError> => {
            if (Option.isNone(next)) return Effect.succeed(ReceiveTimeout)
            const item = next.value
            if (item._tag !== "SocketGone") return Effect.succeed(item)
            // keep the marker for later receives
            return Queue.offer(inbound, item).pipe(
              Effect.zipRight(Effect.fail(new ConnectionError({ message: item.reason, url: config.url })))
            )
          })
        )
      })

    const close: RelayConnection["close"] = () =>
      Effect.sync(() => {
        const ws = socket
        socket = null
        markGone("Closed by client")
        if (!ws) return
        if (ws.readyState === WebSocket.OPEN) {
          ws.close(1000)
        } else if (ws.readyState === WebSocket.CONNECTING) {
          ws.terminate()
        }
      })

    const counters: RelayConnection["counters"] = () =>
      Effect.sync(() => ({ framesReceived, protocolErrors }))

    return {
      _tag: "RelayConnection" as const,
      url: config.url,
      state: () => Effect.sync(() => state),
      connect,
      send,
      receive,
      close,
      counters,
    } satisfies RelayConnection
  })
