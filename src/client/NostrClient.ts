/**
 * NostrClient
 *
 * High-level client bound to one keypair: builds, signs and publishes the common
 * event kinds through a RelayPool and exposes its subscriptions.
 */
import { Context, Effect, Layer, type Stream } from "effect"
import {
  authentication,
  contactList,
  deletion,
  metadata as metadataParams,
  reaction,
  recommendRelay as recommendRelayParams,
  textNote,
  type Contact,
} from "../core/EventBuilder.js"
import type {
  CryptoError,
  InvalidEvent,
  InvalidPrivateKey,
  InvalidRelayUrl,
  TimeoutError,
  UnknownRelay,
} from "../core/Errors.js"
import type { Metadata } from "../core/Metadata.js"
import type { EventId, NostrEvent, SubscriptionId, Tag } from "../core/Schema.js"
import { CryptoService, CryptoServiceLive, type Keys } from "../services/CryptoService.js"
import { EventService, EventServiceLive, type CreateEventParams } from "../services/EventService.js"
import {
  RelayPool,
  makeRelayPool,
  normalizeRelayUrl,
  type PoolNotification,
  type RelayAnswer,
  type RelayPoolConfig,
  type SubscriptionHandle,
} from "./RelayPool.js"
import type { SubscriptionFilters } from "./RelaySession.js"
import { WebSocketTransportLive } from "./Transport.js"

/** Why a publish did not go out */
export type PublishError = InvalidEvent | CryptoError | InvalidPrivateKey

// =============================================================================
// Service Interface
// =============================================================================

export interface NostrClient {
  readonly _tag: "NostrClient"

  /** Keypair every event is signed with */
  readonly keys: Keys

  addRelay(url: string): Effect.Effect<void, InvalidRelayUrl>
  removeRelay(url: string): Effect.Effect<void>
  relays(): Effect.Effect<ReadonlyArray<string>>

  /**
   * Sign and publish arbitrary event parameters
   */
  publish(params: CreateEventParams): Effect.Effect<NostrEvent, PublishError>

  /**
   * Publish a short text note (kind 1)
   */
  publishTextNote(content: string, tags?: readonly Tag[]): Effect.Effect<NostrEvent, PublishError>

  /**
   * Replace the profile metadata (kind 0)
   */
  setMetadata(metadata: Metadata): Effect.Effect<NostrEvent, PublishError>

  /**
   * Request deletion of own events (kind 5)
   */
  deleteEvent(ids: readonly EventId[], reason?: string): Effect.Effect<NostrEvent, PublishError>

  /**
   * Like (`+`) or dislike (`-`) an event (kind 7)
   */
  react(event: NostrEvent, positive?: boolean): Effect.Effect<NostrEvent, PublishError>

  /**
   * Replace the follow list (kind 3)
   */
  setContactList(contacts: readonly Contact[]): Effect.Effect<NostrEvent, PublishError>

  /**
   * Recommend a relay (kind 2)
   */
  recommendRelay(url: string): Effect.Effect<NostrEvent, PublishError>

  /**
   * Sign an answer to `challenge` and send it to the relay at `url`
   */
  authenticate(
    url: string,
    challenge: string,
    timeoutMs?: number
  ): Effect.Effect<RelayAnswer, PublishError | InvalidRelayUrl | UnknownRelay | TimeoutError>

  subscribe(filters: SubscriptionFilters): Effect.Effect<SubscriptionHandle>
  unsubscribe(id: SubscriptionId): Effect.Effect<void>

  readonly notifications: Stream.Stream<PoolNotification>

  /**
   * Disconnect from every relay and end all subscriptions
   */
  close(): Effect.Effect<void>
}

export const NostrClient = Context.GenericTag<NostrClient>("NostrClient")

// =============================================================================
// Service Implementation
// =============================================================================

const make = (keys: Keys) =>
  Effect.gen(function* () {
    const pool = yield* RelayPool
    const events = yield* EventService

    const publish: NostrClient["publish"] = (params) =>
      Effect.gen(function* () {
        const event = yield* events.createEvent(params, keys.secretKey)
        yield* pool.publish(event)
        yield* Effect.logDebug(`Published kind ${event.kind} event ${event.id}`)
        return event
      })

    const authenticate: NostrClient["authenticate"] = (url, challenge, timeoutMs) =>
      Effect.gen(function* () {
        const relayUrl = yield* normalizeRelayUrl(url)
        const event = yield* events.createEvent(authentication(relayUrl, challenge), keys.secretKey)
        const answer = yield* pool.authenticate(relayUrl, event, timeoutMs)
        yield* Effect.logDebug(`AUTH to ${relayUrl} ${answer.accepted ? "accepted" : "rejected"}`)
        return answer
      })

    return {
      _tag: "NostrClient" as const,
      keys,
      addRelay: pool.addRelay,
      removeRelay: pool.removeRelay,
      relays: pool.getRelays,
      publish,
      publishTextNote: (content, tags) => publish(textNote(content, tags)),
      setMetadata: (value) => publish(metadataParams(value)),
      deleteEvent: (ids, reason) => publish(deletion(ids, reason)),
      react: (event, positive = true) => publish(reaction(event, positive)),
      setContactList: (contacts) => publish(contactList(contacts)),
      recommendRelay: (url) => publish(recommendRelayParams(url)),
      authenticate,
      subscribe: pool.subscribe,
      unsubscribe: pool.unsubscribe,
      notifications: pool.notifications,
      close: pool.close,
    } satisfies NostrClient
  })

// =============================================================================
// Layers
// =============================================================================

/**
 * Client for `keys` on top of an existing RelayPool
 */
export const makeNostrClient = (
  keys: Keys
): Layer.Layer<NostrClient, never, RelayPool | EventService> =>
  Layer.effect(NostrClient, make(keys))

/**
 * Client over WebSockets for a secret key given as bytes, hex or `nsec`
 */
export const NostrClientLive = (
  secret: Uint8Array | string,
  config?: RelayPoolConfig
): Layer.Layer<NostrClient, InvalidPrivateKey> => {
  const EventLayer = EventServiceLive.pipe(Layer.provide(CryptoServiceLive))
  const PoolLayer = makeRelayPool(config).pipe(
    Layer.provide(Layer.merge(EventLayer, WebSocketTransportLive))
  )

  return Layer.unwrapEffect(
    Effect.gen(function* () {
      const crypto = yield* CryptoService
      const keys = yield* crypto.keysFromSecret(secret)
      return makeNostrClient(keys)
    }).pipe(Effect.provide(CryptoServiceLive))
  ).pipe(Layer.provide(Layer.merge(PoolLayer, EventLayer)))
}
