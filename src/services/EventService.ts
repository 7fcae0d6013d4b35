/**
 * EventService
 *
 * Creates, signs and validates Nostr events per NIP-01.
 * Handles canonical serialization and event ID computation.
 */
import { Context, Effect, Layer } from "effect"
import { Schema, TreeFormatter } from "@effect/schema"
import { CryptoService } from "./CryptoService.js"
import {
  CryptoError,
  EventIdMismatch,
  InvalidPrivateKey,
  InvalidSignature,
  MalformedEvent,
  type EventValidationError,
} from "../core/Errors.js"
import {
  NostrEvent,
  type EventKind,
  type Tag,
  type PrivateKey,
  type PublicKey,
  type EventId,
  type UnixTimestamp,
  type UnsignedEvent,
} from "../core/Schema.js"

// =============================================================================
// Event Parameters
// =============================================================================

export interface CreateEventParams {
  readonly kind: EventKind
  readonly content: string
  readonly tags?: readonly Tag[]
  readonly created_at?: UnixTimestamp
}

// =============================================================================
// Canonical Serialization
// =============================================================================

/**
 * Serialize the fields that make up the event ID:
 * `[0, pubkey, created_at, kind, tags, content]` with no whitespace.
 *
 * JSON.stringify already produces the NIP-01 form: `"` and `\` escaped,
 * `\b \t \n \f \r` as short escapes, other control characters as `\u00XX`,
 * `/` and non-ASCII text left as is, integers with minimal digits.
 */
export const serializeEvent = (event: UnsignedEvent): string =>
  JSON.stringify([0, event.pubkey, event.created_at, event.kind, event.tags, event.content])

/** Current time as a Unix timestamp in seconds */
export const now = (): UnixTimestamp => Math.floor(Date.now() / 1000) as UnixTimestamp

// =============================================================================
// Service Interface
// =============================================================================

export interface EventService {
  readonly _tag: "EventService"

  /**
   * Create and sign a Nostr event
   */
  createEvent(
    params: CreateEventParams,
    privateKey: PrivateKey
  ): Effect.Effect<NostrEvent, CryptoError | InvalidPrivateKey>

  /**
   * Sign an unsigned event: set `id`, then compute `sig` over it
   */
  signEvent(
    event: UnsignedEvent,
    privateKey: PrivateKey
  ): Effect.Effect<NostrEvent, CryptoError | InvalidPrivateKey>

  /**
   * Compute the event ID from event fields
   * ID = sha256(serialized([0, pubkey, created_at, kind, tags, content]))
   */
  computeEventId(
    pubkey: PublicKey,
    created_at: UnixTimestamp,
    kind: EventKind,
    tags: readonly Tag[],
    content: string
  ): Effect.Effect<EventId, CryptoError>

  /**
   * Verify an event's signature and ID
   */
  verifyEvent(event: NostrEvent): Effect.Effect<boolean, CryptoError>

  /**
   * Recompute the ID and verify the signature, failing with the first broken invariant
   */
  validateEvent(
    event: NostrEvent
  ): Effect.Effect<NostrEvent, EventIdMismatch | InvalidSignature | CryptoError>

  /**
   * Decode an untrusted value into an event and validate it
   */
  decodeEvent(input: unknown): Effect.Effect<NostrEvent, EventValidationError | CryptoError>
}

// =============================================================================
// Service Tag
// =============================================================================

export const EventService = Context.GenericTag<EventService>("EventService")

// =============================================================================
// Service Implementation
// =============================================================================

const decodeNostrEvent = Schema.decodeUnknown(NostrEvent)

const make = Effect.gen(function* () {
  const crypto = yield* CryptoService

  const computeEventId: EventService["computeEventId"] = (
    pubkey,
    created_at,
    kind,
    tags,
    content
  ) => crypto.hash(serializeEvent({ pubkey, created_at, kind, tags, content }))

  const signEvent: EventService["signEvent"] = (event, privateKey) =>
    Effect.gen(function* () {
      const id = yield* computeEventId(
        event.pubkey,
        event.created_at,
        event.kind,
        event.tags,
        event.content
      )
      const sig = yield* crypto.sign(id, privateKey)

      return {
        id,
        pubkey: event.pubkey,
        created_at: event.created_at,
        kind: event.kind,
        tags: event.tags,
        content: event.content,
        sig,
      }
    })

  const createEvent: EventService["createEvent"] = (params, privateKey) =>
    Effect.gen(function* () {
      const pubkey = yield* crypto.getPublicKey(privateKey)

      return yield* signEvent(
        {
          pubkey,
          created_at: params.created_at ?? now(),
          kind: params.kind,
          tags: params.tags ?? [],
          content: params.content,
        },
        privateKey
      )
    })

  const validateEvent: EventService["validateEvent"] = (event) =>
    Effect.gen(function* () {
      const computedId = yield* computeEventId(
        event.pubkey,
        event.created_at,
        event.kind,
        event.tags,
        event.content
      )

      if (computedId !== event.id) {
        return yield* Effect.fail(
          new EventIdMismatch({
            message: `Event id ${event.id} does not match its content`,
            expected: computedId,
            actual: event.id,
          })
        )
      }

      const valid = yield* crypto.verify(event.sig, event.id, event.pubkey)
      if (!valid) {
        return yield* Effect.fail(
          new InvalidSignature({
            message: `Signature of event ${event.id} does not verify`,
            eventId: event.id,
          })
        )
      }

      return event
    })

  const verifyEvent: EventService["verifyEvent"] = (event) =>
    validateEvent(event).pipe(
      Effect.as(true),
      Effect.catchTags({
        EventIdMismatch: () => Effect.succeed(false),
        InvalidSignature: () => Effect.succeed(false),
      })
    )

  const decodeEvent: EventService["decodeEvent"] = (input) =>
    decodeNostrEvent(input).pipe(
      Effect.mapError(
        (error) => new MalformedEvent({ message: TreeFormatter.formatErrorSync(error) })
      ),
      Effect.flatMap(validateEvent)
    )

  return {
    _tag: "EventService" as const,
    createEvent,
    signEvent,
    computeEventId,
    verifyEvent,
    validateEvent,
    decodeEvent,
  }
})

// =============================================================================
// Service Layer
// =============================================================================

export const EventServiceLive = Layer.effect(EventService, make)
