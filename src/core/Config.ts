/**
 * HydrateConfig
 *
 * Runtime configuration read from the environment through Effect's Config.
 * Every value has a default except the relay list, which falls back to a
 * small set of public relays when neither HYDRATE_RELAYS nor
 * HYDRATE_LOCAL_RELAY is set, unless HYDRATE_PUBLIC_FALLBACK=false.
 */
import { Config, ConfigError as EffectConfigError, Effect, LogLevel, Option } from "effect"
import { ConfigError } from "./Errors.js"
import { prioritizeRelays } from "./RelayUrl.js"

export const PUBLIC_RELAYS: ReadonlyArray<string> = [
  "wss://theforest.nostr1.com",
  "wss://nostr.land",
  "wss://relay.primal.net",
]

export interface HydrateConfig {
  /** Effective relay list, local relay first */
  readonly relays: ReadonlyArray<string>
  readonly localRelay: Option.Option<string>
  readonly kinds: ReadonlyArray<number>
  readonly dbPath: string
  readonly perRelayTimeoutMs: number
  readonly overallTimeoutMs: number
  readonly connectTimeoutMs: number
  readonly receiveTimeoutMs: number
  readonly backoffMs: number
  readonly staleMaxAgeSeconds: number
  readonly cleanupIntervalMs: number
  readonly batchSize: number
  readonly limit: number
  readonly logLevel: LogLevel.LogLevel
}

const positiveInt = (name: string, fallback: number) =>
  Config.integer(name).pipe(
    Config.withDefault(fallback),
    Config.validate({ message: `${name} must be a positive integer`, validation: (n) => n > 0 })
  )

export const HydrateConfigSpec = Config.all({
  relays: Config.array(Config.string(), "HYDRATE_RELAYS").pipe(Config.withDefault([])),
  localRelay: Config.option(Config.string("HYDRATE_LOCAL_RELAY")),
  publicFallback: Config.boolean("HYDRATE_PUBLIC_FALLBACK").pipe(Config.withDefault(true)),
  kinds: Config.array(Config.integer(), "HYDRATE_KINDS").pipe(Config.withDefault([30023])),
  dbPath: Config.string("HYDRATE_DB_PATH").pipe(Config.withDefault("./hydrate.db")),
  perRelayTimeoutMs: positiveInt("HYDRATE_PER_RELAY_TIMEOUT_MS", 15_000),
  overallTimeoutMs: positiveInt("HYDRATE_OVERALL_TIMEOUT_MS", 30_000),
  connectTimeoutMs: positiveInt("HYDRATE_CONNECT_TIMEOUT_MS", 10_000),
  receiveTimeoutMs: positiveInt("HYDRATE_RECEIVE_TIMEOUT_MS", 1_000),
  backoffMs: positiveInt("HYDRATE_BACKOFF_MS", 5_000),
  staleMaxAgeSeconds: positiveInt("HYDRATE_STALE_MAX_AGE_S", 300),
  cleanupIntervalMs: positiveInt("HYDRATE_CLEANUP_INTERVAL_MS", 60_000),
  batchSize: positiveInt("HYDRATE_BATCH_SIZE", 50),
  limit: positiveInt("HYDRATE_LIMIT", 100),
  logLevel: Config.logLevel("HYDRATE_LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info)),
})

/**
 * Load the configuration. Malformed values and an empty relay list are
 * reported as ConfigError, the only fatal error class besides total relay
 * unreachability.
 */
export const loadConfig: Effect.Effect<HydrateConfig, ConfigError> = Effect.gen(function* () {
  const raw = yield* HydrateConfigSpec
  const trimmed = raw.relays.map((url) => url.trim()).filter((url) => url.length > 0)
  const useFallback = trimmed.length === 0 && Option.isNone(raw.localRelay) && raw.publicFallback
  const relays = prioritizeRelays(useFallback ? PUBLIC_RELAYS : trimmed, Option.getOrUndefined(raw.localRelay))

  if (relays.length === 0) {
    return yield* Effect.fail(new ConfigError({ message: "No relay configured" }))
  }

  const { publicFallback: _publicFallback, ...rest } = raw
  return { ...rest, relays }
}).pipe(
  Effect.catchIf(
    (error): error is EffectConfigError.ConfigError => EffectConfigError.isConfigError(error),
    (error) => Effect.fail(new ConfigError({ message: `Invalid configuration: ${String(error)}` }))
  )
)
