/**
 * nostr-hydrate
 *
 * Hydrates a local store from Nostr relays: fan-out backfill, long-lived
 * subscriptions and an idempotent projector, built with Effect.
 */

// Core schemas and types
export * from "./core/Schema.js"
export * from "./core/Errors.js"
export * from "./core/EventCodec.js"
export * from "./core/Kinds.js"
export * from "./core/Tags.js"
export * from "./core/RelayUrl.js"
export * from "./core/Config.js"

// Services
export * from "./services/EventService.js"

// Client
export * from "./client/RelayConnection.js"
export * from "./client/RelayPool.js"
export * from "./client/FanoutQuery.js"
export * from "./client/SubscriptionWorker.js"

// Projection
export * from "./projection/Records.js"
export * from "./projection/Mappers.js"
export * from "./projection/RecordStore.js"
export * from "./projection/EventProjector.js"

// Hydration jobs
export * from "./hydration/Backfill.js"
export * from "./hydration/LiveIngest.js"
