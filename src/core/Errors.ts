/**
 * Typed Error Classes
 *
 * All errors extend Schema.TaggedError for serialization support.
 * Network and protocol errors are recoverable: callers turn them into
 * per-relay or per-event skip decisions. Only ConfigError and
 * AllRelaysUnreachable end a bulk run.
 */
import { Schema } from "@effect/schema"

// =============================================================================
// Validation Errors
// =============================================================================

/** Why an event was refused before it could be trusted */
export const InvalidEventReason = Schema.Literal(
  "missing-field",
  "malformed",
  "verification",
  "unsupported-kind"
)
export type InvalidEventReason = typeof InvalidEventReason.Type

export class InvalidEventError extends Schema.TaggedError<InvalidEventError>()(
  "InvalidEventError",
  {
    message: Schema.String,
    reason: InvalidEventReason,
    eventId: Schema.optional(Schema.String),
  }
) {}

export class VerificationError extends Schema.TaggedError<VerificationError>()(
  "VerificationError",
  {
    message: Schema.String,
    eventId: Schema.String,
    reason: Schema.Literal("id-mismatch", "bad-signature"),
  }
) {}

// =============================================================================
// Connection Errors
// =============================================================================

export class ConnectionError extends Schema.TaggedError<ConnectionError>()(
  "ConnectionError",
  {
    message: Schema.String,
    url: Schema.String,
  }
) {}

export class NotConnectedError extends Schema.TaggedError<NotConnectedError>()(
  "NotConnectedError",
  {
    message: Schema.String,
    url: Schema.String,
  }
) {}

export class ProtocolError extends Schema.TaggedError<ProtocolError>()(
  "ProtocolError",
  {
    message: Schema.String,
    raw: Schema.String,
  }
) {}

// =============================================================================
// Storage Errors
// =============================================================================

export class StorageError extends Schema.TaggedError<StorageError>()(
  "StorageError",
  {
    message: Schema.String,
    operation: Schema.Literal("insert", "query", "init", "batch"),
  }
) {}

// =============================================================================
// Fatal Errors
// =============================================================================

export class ConfigError extends Schema.TaggedError<ConfigError>()(
  "ConfigError",
  { message: Schema.String }
) {}

export class AllRelaysUnreachable extends Schema.TaggedError<AllRelaysUnreachable>()(
  "AllRelaysUnreachable",
  {
    message: Schema.String,
    relays: Schema.Array(Schema.String),
  }
) {}
