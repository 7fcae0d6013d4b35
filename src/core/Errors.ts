/**
 * Typed Error Classes
 *
 * All errors extend Schema.TaggedError for serialization support.
 */
import { Schema } from "@effect/schema"

// =============================================================================
// Event Validation Errors
// =============================================================================

/** Stored id does not equal the digest of the event's own fields */
export class EventIdMismatch extends Schema.TaggedError<EventIdMismatch>()(
  "EventIdMismatch",
  {
    message: Schema.String,
    expected: Schema.String,
    actual: Schema.String,
  }
) {}

export class InvalidSignature extends Schema.TaggedError<InvalidSignature>()(
  "InvalidSignature",
  {
    message: Schema.String,
    eventId: Schema.String,
  }
) {}

/** Event object with a missing or ill-typed field */
export class MalformedEvent extends Schema.TaggedError<MalformedEvent>()(
  "MalformedEvent",
  { message: Schema.String }
) {}

export type EventValidationError = EventIdMismatch | InvalidSignature | MalformedEvent

/** Caller tried to publish an event that fails local validation */
export class InvalidEvent extends Schema.TaggedError<InvalidEvent>()(
  "InvalidEvent",
  {
    message: Schema.String,
    eventId: Schema.String,
    reason: Schema.Literal("IdMismatch", "SignatureInvalid", "MalformedField"),
  }
) {}

// =============================================================================
// Crypto Errors
// =============================================================================

export class CryptoError extends Schema.TaggedError<CryptoError>()(
  "CryptoError",
  {
    message: Schema.String,
    operation: Schema.Literal("sign", "verify", "hash", "generateKey"),
  }
) {}

export class InvalidPrivateKey extends Schema.TaggedError<InvalidPrivateKey>()(
  "InvalidPrivateKey",
  { message: Schema.String }
) {}

export class InvalidPublicKey extends Schema.TaggedError<InvalidPublicKey>()(
  "InvalidPublicKey",
  { message: Schema.String }
) {}

// =============================================================================
// Encoding Errors
// =============================================================================

export class EncodingError extends Schema.TaggedError<EncodingError>()(
  "EncodingError",
  { message: Schema.String }
) {}

export class DecodingError extends Schema.TaggedError<DecodingError>()(
  "DecodingError",
  { message: Schema.String }
) {}

// =============================================================================
// Protocol Errors
// =============================================================================

/** A wire frame that is not valid JSON, has an unknown tag or the wrong shape */
export class ProtocolError extends Schema.TaggedError<ProtocolError>()(
  "ProtocolError",
  {
    message: Schema.String,
    raw: Schema.String,
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

export class TimeoutError extends Schema.TaggedError<TimeoutError>()(
  "TimeoutError",
  {
    message: Schema.String,
    durationMs: Schema.Number,
  }
) {}

// =============================================================================
// Pool Errors
// =============================================================================

export class InvalidRelayUrl extends Schema.TaggedError<InvalidRelayUrl>()(
  "InvalidRelayUrl",
  {
    message: Schema.String,
    url: Schema.String,
  }
) {}

export class UnknownSubscription extends Schema.TaggedError<UnknownSubscription>()(
  "UnknownSubscription",
  {
    message: Schema.String,
    subscriptionId: Schema.String,
  }
) {}

export class UnknownRelay extends Schema.TaggedError<UnknownRelay>()(
  "UnknownRelay",
  {
    message: Schema.String,
    url: Schema.String,
  }
) {}
