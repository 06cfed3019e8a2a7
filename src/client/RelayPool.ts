/**
 * RelayPool
 *
 * Resource cache of relay connections keyed by normalized URL. Creates a
 * connection on first use, hands out the live one afterwards, tracks
 * consecutive connect failures and last activity, and closes idle
 * connections when asked to. It never retries and runs no timers of its
 * own: retry scheduling belongs to callers, cleanup to an external task.
 *
 * Handshakes run on their own fiber. A caller that gives up waiting (a
 * timeout, a shutdown) only stops waiting; the handshake either finishes
 * into the pool or is cancelled by closeRelay/closeAll.
 */
import { Clock, Context, Deferred, Effect, Exit, Fiber, Layer, SynchronizedRef } from "effect"
import { ConnectionError } from "../core/Errors.js"
import { normalizeRelayUrl } from "../core/RelayUrl.js"
import { makeRelayConnection, type ConnectionState, type RelayConnection } from "./RelayConnection.js"

// =============================================================================
// Types
// =============================================================================

/** Opens a connected RelayConnection for a normalized URL */
export type RelayConnector = (url: string) => Effect.Effect<RelayConnection, ConnectionError>

/** Pool configuration */
export interface RelayPoolConfig {
  readonly connectTimeoutMs?: number
  readonly keepAliveMs?: number
  /** Replaces the WebSocket connector */
  readonly connector?: RelayConnector
}

/** Per-relay statistics */
export interface RelayStats {
  readonly url: string
  readonly state: ConnectionState
  readonly failedAttempts: number
  /** Unix seconds of the last successful connect or activity */
  readonly lastConnected: number | null
  readonly ageSeconds: number | null
}

export interface PoolStats {
  readonly activeConnections: number
  readonly perRelay: ReadonlyArray<RelayStats>
}

/** Internal relay entry */
interface RelayEntry {
  readonly url: string
  readonly connection: RelayConnection | null
  readonly pending: Handshake | null
  readonly failedAttempts: number
  readonly lastConnectedAt: number | null
}

/** An in-flight handshake; every caller for the URL awaits the same deferred */
interface Handshake {
  readonly deferred: Deferred.Deferred<RelayConnection, ConnectionError>
  readonly fiber: Fiber.RuntimeFiber<RelayConnection, ConnectionError>
}

type Acquire =
  | { readonly _tag: "Ready"; readonly connection: RelayConnection }
  | { readonly _tag: "Wait"; readonly deferred: Deferred.Deferred<RelayConnection, ConnectionError> }

// =============================================================================
// Service Interface
// =============================================================================

export interface RelayPool {
  readonly _tag: "RelayPool"

  /**
   * Get the live connection for a relay, opening one if absent or dead.
   * Concurrent callers for the same relay share one handshake.
   */
  getConnection(url: string): Effect.Effect<RelayConnection, ConnectionError>

  /**
   * Record successful traffic on a relay
   */
  markActive(url: string): Effect.Effect<void>

  /**
   * Close and remove connections idle for longer than maxAgeSeconds.
   * Returns how many connections were removed.
   */
  cleanupStale(maxAgeSeconds: number): Effect.Effect<number>

  /**
   * Close a relay connection and forget its entry
   */
  closeRelay(url: string): Effect.Effect<void>

  /**
   * Close all connections and cleanup
   */
  closeAll(): Effect.Effect<void>

  stats(): Effect.Effect<PoolStats>
}

// =============================================================================
// Service Tag
// =============================================================================

export const RelayPool = Context.GenericTag<RelayPool>("RelayPool")

// =============================================================================
// Service Implementation
// =============================================================================

const emptyEntry = (url: string): RelayEntry => ({
  url,
  connection: null,
  pending: null,
  failedAttempts: 0,
  lastConnectedAt: null,
})

export const webSocketConnector =
  (config: Pick<RelayPoolConfig, "connectTimeoutMs" | "keepAliveMs"> = {}): RelayConnector =>
  (url) =>
    Effect.gen(function* () {
      const connection = yield* makeRelayConnection({
        url,
        connectTimeoutMs: config.connectTimeoutMs,
        keepAliveMs: config.keepAliveMs,
      })
      yield* connection.connect()
      return connection
    })

const make = (config: RelayPoolConfig = {}) =>
  Effect.gen(function* () {
    const connector = config.connector ?? webSocketConnector(config)
    const entriesRef = yield* SynchronizedRef.make<Map<string, RelayEntry>>(new Map())

    const updateEntry = (url: string, f: (entry: RelayEntry) => RelayEntry) =>
      SynchronizedRef.update(entriesRef, (entries) => {
        const next = new Map(entries)
        next.set(url, f(entries.get(url) ?? emptyEntry(url)))
        return next
      })

    // Settle a handshake: record the outcome, then wake every waiter
    const settle = (
      url: string,
      deferred: Deferred.Deferred<RelayConnection, ConnectionError>,
      exit: Exit.Exit<RelayConnection, ConnectionError>
    ) =>
      Effect.gen(function* () {
        const now = yield* Clock.currentTimeMillis
        const current = yield* SynchronizedRef.modify(entriesRef, (entries) => {
          const entry = entries.get(url)
          // closed or replaced while the handshake ran
          if (!entry || entry.pending?.deferred !== deferred) return [false, entries] as const
          const next = new Map(entries)
          next.set(
            url,
            Exit.isSuccess(exit)
              ? { ...entry, connection: exit.value, pending: null, failedAttempts: 0, lastConnectedAt: now }
              : {
                  ...entry,
                  connection: null,
                  pending: null,
                  failedAttempts: entry.failedAttempts + (Exit.isInterrupted(exit) ? 0 : 1),
                }
          )
          return [true, next] as const
        })

        if (!current && Exit.isSuccess(exit)) {
          yield* exit.value.close()
        }
        if (Exit.isInterrupted(exit)) {
          yield* Deferred.fail(deferred, new ConnectionError({ message: "Handshake cancelled", url }))
        } else {
          yield* Deferred.done(deferred, exit)
        }
      })

    const handshake = (
      url: string,
      deferred: Deferred.Deferred<RelayConnection, ConnectionError>,
      stale: RelayConnection | null
    ) =>
      Effect.gen(function* () {
        if (stale) {
          yield* Effect.logDebug("Replacing dead relay connection")
          yield* stale.close()
        } else {
          yield* Effect.logDebug("Creating new relay connection")
        }
        return yield* connector(url)
      }).pipe(
        Effect.tapError((error) => Effect.logWarning(`Relay connection failed: ${error.message}`)),
        Effect.onExit((exit) => settle(url, deferred, exit))
      )

    const getConnection: RelayPool["getConnection"] = (rawUrl) =>
      Effect.gen(function* () {
        const url = normalizeRelayUrl(rawUrl)

        const acquire = yield* SynchronizedRef.modifyEffect<Map<string, RelayEntry>, Acquire, never, never>(entriesRef, (entries) =>
          Effect.gen(function* () {
            const entry = entries.get(url)
            if (entry?.connection) {
              const state = yield* entry.connection.state()
              if (state === "connected") {
                const ready: Acquire = { _tag: "Ready", connection: entry.connection }
                return [ready, entries] as const
              }
            }
            if (entry?.pending) {
              const wait: Acquire = { _tag: "Wait", deferred: entry.pending.deferred }
              return [wait, entries] as const
            }

            const deferred = yield* Deferred.make<RelayConnection, ConnectionError>()
            const fiber = yield* Effect.forkDaemon(handshake(url, deferred, entry?.connection ?? null))
            const next = new Map(entries)
            next.set(url, { ...(entry ?? emptyEntry(url)), connection: null, pending: { deferred, fiber } })
            const wait: Acquire = { _tag: "Wait", deferred }
            return [wait, next] as const
          })
        )

        return acquire._tag === "Ready" ? acquire.connection : yield* Deferred.await(acquire.deferred)
      }).pipe(Effect.annotateLogs({ relay: normalizeRelayUrl(rawUrl) }))

    const release = (entry: RelayEntry) =>
      Effect.gen(function* () {
        if (entry.pending) {
          yield* Fiber.interrupt(entry.pending.fiber)
          // a handshake interrupted before it started never settles
          yield* Deferred.fail(
            entry.pending.deferred,
            new ConnectionError({ message: "Handshake cancelled", url: entry.url })
          )
        }
        if (entry.connection) yield* entry.connection.close()
      })

    const markActive: RelayPool["markActive"] = (rawUrl) =>
      Effect.gen(function* () {
        const url = normalizeRelayUrl(rawUrl)
        const now = yield* Clock.currentTimeMillis
        yield* SynchronizedRef.update(entriesRef, (entries) => {
          const entry = entries.get(url)
          if (!entry) return entries
          const next = new Map(entries)
          next.set(url, { ...entry, lastConnectedAt: now })
          return next
        })
      })

    const cleanupStale: RelayPool["cleanupStale"] = (maxAgeSeconds) =>
      Effect.gen(function* () {
        const now = yield* Clock.currentTimeMillis
        const maxAgeMs = maxAgeSeconds * 1000

        const removed = yield* SynchronizedRef.modify(entriesRef, (entries) => {
          const stale: RelayEntry[] = []
          const next = new Map(entries)
          for (const [url, entry] of entries) {
            if (entry.pending || entry.lastConnectedAt === null) continue
            if (now - entry.lastConnectedAt > maxAgeMs) {
              stale.push(entry)
              next.delete(url)
            }
          }
          return [stale, next] as const
        })

        let cleaned = 0
        for (const entry of removed) {
          if (!entry.connection) continue
          yield* Effect.logInfo("Removing stale relay connection").pipe(
            Effect.annotateLogs({
              relay: entry.url,
              age: Math.floor((now - (entry.lastConnectedAt ?? now)) / 1000),
            })
          )
          yield* entry.connection.close()
          cleaned++
        }
        return cleaned
      })

    const closeRelay: RelayPool["closeRelay"] = (rawUrl) =>
      Effect.gen(function* () {
        const url = normalizeRelayUrl(rawUrl)
        const entry = yield* SynchronizedRef.modify(entriesRef, (entries) => {
          const found = entries.get(url)
          if (!found) return [undefined, entries] as const
          const next = new Map(entries)
          next.delete(url)
          return [found, next] as const
        })
        if (entry) {
          yield* Effect.logDebug("Closing relay connection").pipe(Effect.annotateLogs({ relay: url }))
          yield* release(entry)
        }
      })

    const closeAll: RelayPool["closeAll"] = () =>
      Effect.gen(function* () {
        const entries = yield* SynchronizedRef.getAndSet(entriesRef, new Map())
        if (entries.size > 0) {
          yield* Effect.logInfo("Closing all relay connections").pipe(
            Effect.annotateLogs({ count: entries.size })
          )
        }
        yield* Effect.forEach(entries.values(), release, { discard: true })
      })

    const stats: RelayPool["stats"] = () =>
      Effect.gen(function* () {
        const now = yield* Clock.currentTimeMillis
        const entries = yield* SynchronizedRef.get(entriesRef)
        const perRelay: RelayStats[] = []

        for (const entry of entries.values()) {
          const state: ConnectionState = entry.connection
            ? yield* entry.connection.state()
            : entry.pending
              ? "connecting"
              : "disconnected"
          perRelay.push({
            url: entry.url,
            state,
            failedAttempts: entry.failedAttempts,
            lastConnected: entry.lastConnectedAt === null ? null : Math.floor(entry.lastConnectedAt / 1000),
            ageSeconds: entry.lastConnectedAt === null ? null : Math.floor((now - entry.lastConnectedAt) / 1000),
          })
        }

        return {
          activeConnections: perRelay.filter((relay) => relay.state === "connected").length,
          perRelay,
        }
      })

    return {
      _tag: "RelayPool" as const,
      getConnection,
      markActive,
      cleanupStale,
      closeRelay,
      closeAll,
      stats,
    } satisfies RelayPool
  })

// =============================================================================
// Layer Constructor
// =============================================================================

/**
 * Create a RelayPool layer. Connections are closed when the layer is released.
 */
export const makeRelayPool = (config?: RelayPoolConfig): Layer.Layer<RelayPool> =>
  Layer.scoped(
    RelayPool,
    Effect.acquireRelease(make(config), (pool) => pool.closeAll())
  )
