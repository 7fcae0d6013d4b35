/**
 * RelayPool
 *
 * Multi-relay orchestration: owns one RelaySession per relay URL, fans publishes and
 * subscriptions out to every session and routes inbound events back to subscribers.
 *
 * Sessions report to the pool only through its inbox queue. A single coordinator
 * fiber drains that queue and is the sole owner of the de-duplication cache and the
 * end-of-stored-events bookkeeping.
 */
import {
  Context,
  Duration,
  Effect,
  ExecutionStrategy,
  Exit,
  Layer,
  Option,
  PubSub,
  Queue,
  Ref,
  Scope,
  Stream,
} from "effect"
import {
  InvalidEvent,
  InvalidRelayUrl,
  TimeoutError,
  UnknownRelay,
  UnknownSubscription,
  type CryptoError,
  type EventValidationError,
} from "../core/Errors.js"
import { matchesFilters } from "../core/FilterMatcher.js"
import { authMessage, eventMessage } from "../core/Messages.js"
import {
  AUTH_EVENT_KIND,
  SubscriptionId,
  type ClientMessage,
  type EventId,
  type NostrEvent,
  type RelayMessage,
} from "../core/Schema.js"
import { CryptoServiceLive } from "../services/CryptoService.js"
import { EventService, EventServiceLive } from "../services/EventService.js"
import {
  makeRelaySession,
  type ConnectionState,
  type RelaySession,
  type RelaySessionConfig,
  type SessionMessage,
  type SubscriptionFilters,
} from "./RelaySession.js"
import { SeenEventCache } from "./SeenEventCache.js"
import { Transport, WebSocketTransportLive } from "./Transport.js"

// =============================================================================
// Types
// =============================================================================

/** Status of a specific relay */
export type RelayStatus =
  | { readonly status: "connected" }
  | { readonly status: "connecting" }
  | { readonly status: "disconnected"; readonly reconnectAttempts: number }

/** Failure info for a relay */
export interface RelayFailure {
  readonly url: string
  readonly reason: string
}

/** A relay's OK answer to one event */
export interface RelayAnswer {
  readonly accepted: boolean
  readonly message: string
}

/** Result of publishing to multiple relays and waiting for their answers */
export interface PoolPublishResult {
  readonly successes: ReadonlyArray<string>
  readonly failures: ReadonlyArray<RelayFailure>
}

/** Pool configuration */
export interface RelayPoolConfig {
  /** Connect sessions as soon as relays are added (default: true) */
  readonly autoConnect?: boolean
  /** Deliver an event id at most once per subscription (default: true) */
  readonly deduplicateEvents?: boolean
  /** Drop inbound events that do not match the subscription's filters (default: true) */
  readonly matchFilters?: boolean
  /** Capacity of the recently-seen event id cache (default: 10000) */
  readonly seenCacheSize?: number
  /** Notifications kept for slow observers before the oldest is dropped (default: 1024) */
  readonly notificationBufferSize?: number
  /** Settings applied to every relay session */
  readonly relaySession?: Omit<RelaySessionConfig, "url">
}

/** Item delivered on a subscription */
export type SubscriptionMessage =
  | { readonly _tag: "Event"; readonly relay: string; readonly event: NostrEvent }
  | { readonly _tag: "EndOfStoredEvents"; readonly relay: string }
  | { readonly _tag: "AllEndOfStoredEvents" }
  | { readonly _tag: "Closed"; readonly relay: string; readonly reason: string }

/** Subscription handle returned by subscribe */
export interface SubscriptionHandle {
  readonly id: SubscriptionId
  readonly filters: SubscriptionFilters
  /**
   * Everything delivered on the subscription; ends after unsubscribe.
   * `messages` and `events` read from the same queue: consume one of them.
   */
  readonly messages: Stream.Stream<SubscriptionMessage>
  /** Only the de-duplicated, validated events */
  readonly events: Stream.Stream<NostrEvent>
  readonly unsubscribe: () => Effect.Effect<void>
}

/** Diagnostics emitted by the pool */
export type PoolNotification =
  | { readonly _tag: "Inbound"; readonly url: string; readonly message: RelayMessage }
  | { readonly _tag: "Outbound"; readonly url: string; readonly message: ClientMessage }
  | { readonly _tag: "StatusChanged"; readonly url: string; readonly state: ConnectionState }
  | {
      readonly _tag: "PublishResult"
      readonly url: string
      readonly eventId: EventId
      readonly accepted: boolean
      readonly message: string
    }

/** Marks the end of a subscription's queue */
type QueueItem = SubscriptionMessage | { readonly _tag: "End" }

/** Internal subscription state */
interface PoolSubscription {
  readonly id: SubscriptionId
  readonly filters: SubscriptionFilters
  readonly queue: Queue.Queue<QueueItem>
  /** Relays the subscription was sent to when it was opened */
  readonly relays: ReadonlySet<string>
}

/** Internal relay entry */
interface RelayEntry {
  readonly url: string
  readonly session: RelaySession
  readonly scope: Scope.CloseableScope
}

type PoolInbox =
  | SessionMessage
  | { readonly _tag: "SubscriptionOpened"; readonly subscription: PoolSubscription }
  | { readonly _tag: "SubscriptionEnded"; readonly subscription: PoolSubscription }

// =============================================================================
// Service Interface
// =============================================================================

export interface RelayPool {
  readonly _tag: "RelayPool"

  /**
   * Add a relay to the pool (no-op when already present)
   */
  addRelay(url: string): Effect.Effect<void, InvalidRelayUrl>

  /**
   * Remove a relay from the pool, terminating its session (no-op when absent)
   */
  removeRelay(url: string): Effect.Effect<void>

  /**
   * Get list of all relay URLs in the pool
   */
  getRelays(): Effect.Effect<ReadonlyArray<string>>

  /**
   * Get connection status for a specific relay
   */
  getRelayStatus(url: string): Effect.Effect<RelayStatus | null>

  /**
   * Get list of connected relay URLs
   */
  getConnectedRelays(): Effect.Effect<ReadonlyArray<string>>

  /**
   * Validate an event and hand it to every relay session.
   * Returns the relays it was queued for without waiting for their answers.
   */
  publish(event: NostrEvent): Effect.Effect<ReadonlyArray<string>, InvalidEvent>

  /**
   * Publish and collect each relay's OK answer until all answered or the timeout passed
   */
  publishAndWait(
    event: NostrEvent,
    timeoutMs?: number
  ): Effect.Effect<PoolPublishResult, InvalidEvent>

  /**
   * Answer a relay's AUTH challenge with a signed kind 22242 event and wait for its OK
   */
  authenticate(
    url: string,
    event: NostrEvent,
    timeoutMs?: number
  ): Effect.Effect<RelayAnswer, InvalidEvent | InvalidRelayUrl | UnknownRelay | TimeoutError>

  /**
   * Subscribe to events matching any of the filters on every relay, now and after reconnects
   */
  subscribe(filters: SubscriptionFilters): Effect.Effect<SubscriptionHandle>

  /**
   * Close a subscription on every relay (no-op when already closed)
   */
  unsubscribe(id: SubscriptionId): Effect.Effect<void>

  /**
   * Look up the filters of an open subscription
   */
  getSubscription(
    id: SubscriptionId
  ): Effect.Effect<{ readonly id: SubscriptionId; readonly filters: SubscriptionFilters }, UnknownSubscription>

  /**
   * Inbound and outbound wire messages, state changes and publish results
   */
  readonly notifications: Stream.Stream<PoolNotification>

  /**
   * Queue-backed view of the notifications, live for the enclosing scope
   */
  subscribeNotifications(): Effect.Effect<Queue.Dequeue<PoolNotification>, never, Scope.Scope>

  /**
   * Close all connections and end every subscription
   */
  close(): Effect.Effect<void>
}

// =============================================================================
// Service Tag
// =============================================================================

export const RelayPool = Context.GenericTag<RelayPool>("RelayPool")

// =============================================================================
// Helpers
// =============================================================================

const SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i

/**
 * Normalize a relay URL: default to wss://, lowercase host, no trailing slash
 */
export const normalizeRelayUrl = (url: string): Effect.Effect<string, InvalidRelayUrl> =>
  Effect.try({
    try: () => {
      const trimmed = url.trim()
      const parsed = new URL(SCHEME.test(trimmed) ? trimmed : `wss://${trimmed}`)
      if (parsed.protocol !== "ws:" && parsed.protocol !== "wss:") {
        throw new Error(`unsupported scheme ${parsed.protocol}`)
      }
      const normalized = parsed.toString()
      return normalized.endsWith("/") ? normalized.slice(0, -1) : normalized
    },
    catch: (error) =>
      new InvalidRelayUrl({
        message: `Invalid relay URL: ${error instanceof Error ? error.message : String(error)}`,
        url,
      }),
  })

const rejectionReason = (
  error: EventValidationError | CryptoError
): InvalidEvent["reason"] => {
  switch (error._tag) {
    case "EventIdMismatch":
      return "IdMismatch"
    case "InvalidSignature":
      return "SignatureInvalid"
    default:
      return "MalformedField"
  }
}

// =============================================================================
// Service Implementation
// =============================================================================

const make = (config: RelayPoolConfig = {}) =>
  Effect.gen(function* () {
    const eventService = yield* EventService
    const transport = yield* Transport
    const poolScope = yield* Effect.scope

    const relaysRef = yield* Ref.make<ReadonlyMap<string, RelayEntry>>(new Map())
    const subscriptionsRef = yield* Ref.make<ReadonlyMap<SubscriptionId, PoolSubscription>>(
      new Map()
    )
    const counterRef = yield* Ref.make(0)
    const lifecycle = yield* Effect.makeSemaphore(1)
    const inbox = yield* Queue.unbounded<PoolInbox>()
    const notifications = yield* PubSub.sliding<PoolNotification>(
      config.notificationBufferSize ?? 1024
    )

    // -------------------------------------------------------------------------
    // Coordinator: the only code touching `seen`, `finished` and `completed`
    // -------------------------------------------------------------------------

    const seen = new SeenEventCache(config.seenCacheSize ?? 10_000)
    const finished = new Map<SubscriptionId, Set<string>>()
    const completed = new Set<SubscriptionId>()

    const lookupSubscription = (id: SubscriptionId) =>
      Ref.get(subscriptionsRef).pipe(Effect.map((subs) => subs.get(id)))

    /** Record that `url` finished replaying stored events; emit the aggregate signal once */
    const recordFinished = (
      subscription: PoolSubscription,
      url: string,
      item?: SubscriptionMessage
    ): Effect.Effect<void> =>
      Effect.gen(function* () {
        const relays = finished.get(subscription.id) ?? new Set<string>()
        if (relays.has(url)) return
        relays.add(url)
        finished.set(subscription.id, relays)
        if (item) yield* Queue.offer(subscription.queue, item)

        if (completed.has(subscription.id)) return
        if (Array.from(subscription.relays).every((relay) => relays.has(relay))) {
          completed.add(subscription.id)
          yield* Queue.offer(subscription.queue, { _tag: "AllEndOfStoredEvents" })
        }
      })

    const handleEvent = (
      url: string,
      subscriptionId: SubscriptionId,
      event: NostrEvent
    ): Effect.Effect<void> =>
      Effect.gen(function* () {
        const subscription = yield* lookupSubscription(subscriptionId)
        if (!subscription) {
          return yield* Effect.logDebug(`Event for unknown subscription ${subscriptionId}`)
        }

        const key = `${subscriptionId}:${event.id}`
        if (config.deduplicateEvents !== false && seen.has(key)) return

        const validation = yield* Effect.either(eventService.validateEvent(event))
        if (validation._tag === "Left") {
          return yield* Effect.logWarning(`Dropped event ${event.id}: ${validation.left.message}`)
        }

        if (config.matchFilters !== false && !matchesFilters(event, subscription.filters)) {
          return yield* Effect.logWarning(
            `Dropped event ${event.id}: does not match subscription ${subscriptionId}`
          )
        }

        if (config.deduplicateEvents !== false) seen.add(key)
        yield* Queue.offer(subscription.queue, { _tag: "Event", relay: url, event })
      }).pipe(Effect.annotateLogs({ relay: url }))

    const handleRelayMessage = (url: string, message: RelayMessage): Effect.Effect<void> => {
      switch (message[0]) {
        case "EVENT":
          return handleEvent(url, message[1], message[2])

        case "EOSE":
          return lookupSubscription(message[1]).pipe(
            Effect.flatMap((subscription) =>
              subscription
                ? recordFinished(subscription, url, { _tag: "EndOfStoredEvents", relay: url })
                : Effect.void
            )
          )

        case "CLOSED": {
          const [, subscriptionId, reason] = message
          return Effect.gen(function* () {
            yield* Effect.logInfo(`Subscription ${subscriptionId} closed by relay: ${reason}`)
            const subscription = yield* lookupSubscription(subscriptionId)
            if (!subscription) return
            yield* Queue.offer(subscription.queue, { _tag: "Closed", relay: url, reason })
            yield* recordFinished(subscription, url)
          }).pipe(Effect.annotateLogs({ relay: url }))
        }

        case "OK": {
          const [, eventId, accepted, reason] = message
          return Effect.gen(function* () {
            if (!accepted) {
              yield* Effect.logWarning(`Event ${eventId} rejected: ${reason}`)
            }
            yield* PubSub.publish(notifications, {
              _tag: "PublishResult",
              url,
              eventId,
              accepted,
              message: reason,
            })
          }).pipe(Effect.annotateLogs({ relay: url }))
        }

        case "NOTICE":
          return Effect.logInfo(`Relay notice: ${message[1]}`).pipe(
            Effect.annotateLogs({ relay: url })
          )

        case "AUTH":
          return Effect.logDebug("Relay requested authentication").pipe(
            Effect.annotateLogs({ relay: url })
          )
      }
    }

    const handleInbox = (item: PoolInbox): Effect.Effect<void> =>
      Effect.gen(function* () {
        switch (item._tag) {
          case "Received":
            yield* PubSub.publish(notifications, {
              _tag: "Inbound",
              url: item.url,
              message: item.message,
            })
            return yield* handleRelayMessage(item.url, item.message)

          case "Sent":
            yield* PubSub.publish(notifications, {
              _tag: "Outbound",
              url: item.url,
              message: item.message,
            })
            return

          case "StatusChanged":
            yield* PubSub.publish(notifications, {
              _tag: "StatusChanged",
              url: item.url,
              state: item.state,
            })
            if (item.state === "terminated") {
              // A removed relay will never finish its replay
              const subs = yield* Ref.get(subscriptionsRef)
              for (const subscription of subs.values()) {
                if (subscription.relays.has(item.url)) {
                  yield* recordFinished(subscription, item.url)
                }
              }
            }
            return

          case "SubscriptionOpened":
            if (item.subscription.relays.size === 0) {
              completed.add(item.subscription.id)
              yield* Queue.offer(item.subscription.queue, { _tag: "AllEndOfStoredEvents" })
            }
            return

          case "SubscriptionEnded":
            finished.delete(item.subscription.id)
            completed.delete(item.subscription.id)
            // Readers drain what was delivered before the end marker
            yield* Queue.offer(item.subscription.queue, { _tag: "End" })
            return
        }
      })

    yield* Queue.take(inbox).pipe(
      Effect.flatMap(handleInbox),
      Effect.forever,
      Effect.annotateLogs({ component: "RelayPool" }),
      Effect.forkScoped
    )

    // -------------------------------------------------------------------------
    // Relay management
    // -------------------------------------------------------------------------

    const addRelay: RelayPool["addRelay"] = (url) =>
      lifecycle.withPermits(1)(
        Effect.gen(function* () {
          const normalizedUrl = yield* normalizeRelayUrl(url)
          const relays = yield* Ref.get(relaysRef)

          // Check if relay already exists
          if (relays.has(normalizedUrl)) {
            return
          }

          const scope = yield* Scope.fork(poolScope, ExecutionStrategy.sequential)
          const session = yield* makeRelaySession(
            { ...config.relaySession, url: normalizedUrl },
            inbox
          ).pipe(Effect.provideService(Transport, transport), Scope.extend(scope))

          // Mirror every open subscription; the session sends them once connected
          const subs = yield* Ref.get(subscriptionsRef)
          for (const subscription of subs.values()) {
            yield* session.openSubscription(subscription.id, subscription.filters)
          }

          yield* Ref.update(relaysRef, (current) =>
            new Map(current).set(normalizedUrl, { url: normalizedUrl, session, scope })
          )
          yield* Effect.logDebug(`Added relay ${normalizedUrl}`)

          if (config.autoConnect !== false) {
            yield* session.connect
          }
        })
      )

    const removeRelay: RelayPool["removeRelay"] = (url) =>
      lifecycle.withPermits(1)(
        Effect.gen(function* () {
          const normalized = yield* Effect.option(normalizeRelayUrl(url))
          if (normalized._tag === "None") return

          const relays = yield* Ref.get(relaysRef)
          const entry = relays.get(normalized.value)
          if (!entry) {
            return
          }

          yield* entry.session.terminate
          yield* Scope.close(entry.scope, Exit.void)

          yield* Ref.update(relaysRef, (current) => {
            const next = new Map(current)
            next.delete(normalized.value)
            return next
          })
          yield* Effect.logDebug(`Removed relay ${normalized.value}`)
        })
      )

    const getRelays: RelayPool["getRelays"] = () =>
      Ref.get(relaysRef).pipe(Effect.map((relays) => Array.from(relays.keys())))

    const getRelayStatus: RelayPool["getRelayStatus"] = (url) =>
      Effect.gen(function* () {
        const normalized = yield* Effect.option(normalizeRelayUrl(url))
        if (normalized._tag === "None") return null

        const relays = yield* Ref.get(relaysRef)
        const entry = relays.get(normalized.value)
        if (!entry) {
          return null
        }

        const state = yield* entry.session.state

        switch (state) {
          case "connected":
            return { status: "connected" as const }
          case "connecting":
            return { status: "connecting" as const }
          case "disconnected":
          case "terminated": {
            const backoff = yield* entry.session.backoff
            return { status: "disconnected" as const, reconnectAttempts: backoff.attempts }
          }
        }
      })

    const getConnectedRelays: RelayPool["getConnectedRelays"] = () =>
      Effect.gen(function* () {
        const relays = yield* Ref.get(relaysRef)
        const connected: string[] = []

        for (const [url, entry] of relays.entries()) {
          const state = yield* entry.session.state
          if (state === "connected") {
            connected.push(url)
          }
        }

        return connected
      })

    // -------------------------------------------------------------------------
    // Publishing
    // -------------------------------------------------------------------------

    const validateOutgoing = (event: NostrEvent): Effect.Effect<NostrEvent, InvalidEvent> =>
      eventService.decodeEvent(event).pipe(
        Effect.mapError(
          (error) =>
            new InvalidEvent({
              message: `Refusing to publish invalid event: ${error.message}`,
              eventId: String(event.id),
              reason: rejectionReason(error),
            })
        )
      )

    const publish: RelayPool["publish"] = (event) =>
      Effect.gen(function* () {
        const valid = yield* validateOutgoing(event)

        const relays = yield* Ref.get(relaysRef)
        for (const entry of relays.values()) {
          yield* entry.session.send(eventMessage(valid))
        }

        yield* Effect.logDebug(`Published event ${valid.id} to ${relays.size} relays`)
        return Array.from(relays.keys())
      })

    const publishAndWait: RelayPool["publishAndWait"] = (event, timeoutMs = 10_000) =>
      Effect.scoped(
        Effect.gen(function* () {
          // Subscribe before publishing so no answer is missed
          const answers = yield* PubSub.subscribe(notifications)
          const relays = yield* publish(event)
          const results = new Map<string, { readonly accepted: boolean; readonly message: string }>()

          const collect = Effect.gen(function* () {
            while (results.size < relays.length) {
              const notification = yield* Queue.take(answers)
              if (
                notification._tag === "PublishResult" &&
                notification.eventId === event.id &&
                relays.includes(notification.url) &&
                !results.has(notification.url)
              ) {
                results.set(notification.url, {
                  accepted: notification.accepted,
                  message: notification.message,
                })
              }
            }
          })

          yield* collect.pipe(Effect.timeout(Duration.millis(timeoutMs)), Effect.ignore)

          const successes: string[] = []
          const failures: RelayFailure[] = []
          for (const url of relays) {
            const result = results.get(url)
            if (result === undefined) {
              failures.push({ url, reason: `no answer within ${timeoutMs}ms` })
            } else if (result.accepted) {
              successes.push(url)
            } else {
              failures.push({ url, reason: result.message })
            }
          }

          return { successes, failures }
        })
      )

    const authenticate: RelayPool["authenticate"] = (url, event, timeoutMs = 10_000) =>
      Effect.scoped(
        Effect.gen(function* () {
          const normalized = yield* normalizeRelayUrl(url)
          const entry = (yield* Ref.get(relaysRef)).get(normalized)
          if (!entry) {
            return yield* Effect.fail(
              new UnknownRelay({ message: `Relay ${normalized} is not in the pool`, url: normalized })
            )
          }

          const valid = yield* validateOutgoing(event)
          if (valid.kind !== AUTH_EVENT_KIND) {
            return yield* Effect.fail(
              new InvalidEvent({
                message: `Authentication events have kind ${AUTH_EVENT_KIND}, got ${valid.kind}`,
                eventId: valid.id,
                reason: "MalformedField",
              })
            )
          }

          const answers = yield* PubSub.subscribe(notifications)
          yield* entry.session.send(authMessage(valid))

          const answer = Effect.gen(function* () {
            while (true) {
              const notification = yield* Queue.take(answers)
              if (
                notification._tag === "PublishResult" &&
                notification.url === normalized &&
                notification.eventId === valid.id
              ) {
                return { accepted: notification.accepted, message: notification.message }
              }
            }
          })

          return yield* answer.pipe(
            Effect.timeoutFail({
              duration: Duration.millis(timeoutMs),
              onTimeout: () =>
                new TimeoutError({
                  message: `${normalized} did not answer AUTH within ${timeoutMs}ms`,
                  durationMs: timeoutMs,
                }),
            })
          )
        }).pipe(Effect.annotateLogs({ relay: url }))
      )

    // -------------------------------------------------------------------------
    // Subscriptions
    // -------------------------------------------------------------------------

    const endSubscription = (subscription: PoolSubscription): Effect.Effect<void> =>
      Effect.gen(function* () {
        const relays = yield* Ref.get(relaysRef)
        for (const entry of relays.values()) {
          yield* entry.session.closeSubscription(subscription.id)
        }
        // The coordinator ends the queue once it has handled everything before this
        yield* Queue.offer(inbox, { _tag: "SubscriptionEnded", subscription })
      })

    const unsubscribe: RelayPool["unsubscribe"] = (id) =>
      lifecycle.withPermits(1)(
        Effect.gen(function* () {
          const removed = yield* Ref.modify(
            subscriptionsRef,
            (subs): [PoolSubscription | undefined, ReadonlyMap<SubscriptionId, PoolSubscription>] => {
              const subscription = subs.get(id)
              if (!subscription) return [undefined, subs]
              const next = new Map(subs)
              next.delete(id)
              return [subscription, next]
            }
          )
          if (!removed) return
          yield* endSubscription(removed)
        })
      )

    const subscribe: RelayPool["subscribe"] = (filters) =>
      lifecycle.withPermits(1)(
        Effect.gen(function* () {
          const counter = yield* Ref.updateAndGet(counterRef, (n) => n + 1)
          const id = SubscriptionId.make(`pool_${counter}`)
          const queue = yield* Queue.unbounded<QueueItem>()
          const relays = yield* Ref.get(relaysRef)

          const subscription: PoolSubscription = {
            id,
            filters,
            queue,
            relays: new Set(relays.keys()),
          }
          yield* Ref.update(subscriptionsRef, (subs) => new Map(subs).set(id, subscription))
          yield* Queue.offer(inbox, { _tag: "SubscriptionOpened", subscription })

          for (const entry of relays.values()) {
            yield* entry.session.openSubscription(id, filters)
          }

          const messages: Stream.Stream<SubscriptionMessage> = Stream.fromQueue(queue).pipe(
            Stream.takeWhile<QueueItem>((item) => item._tag !== "End"),
            Stream.filterMap((item) => (item._tag === "End" ? Option.none() : Option.some(item)))
          )
          const events = messages.pipe(
            Stream.filterMap((message) =>
              message._tag === "Event" ? Option.some(message.event) : Option.none()
            )
          )

          return {
            id,
            filters,
            messages,
            events,
            unsubscribe: () => unsubscribe(id),
          }
        })
      )

    const getSubscription: RelayPool["getSubscription"] = (id) =>
      Effect.gen(function* () {
        const subscription = yield* lookupSubscription(id)
        if (!subscription) {
          return yield* Effect.fail(
            new UnknownSubscription({ message: `Unknown subscription ${id}`, subscriptionId: id })
          )
        }
        return { id: subscription.id, filters: subscription.filters }
      })

    const close: RelayPool["close"] = () =>
      lifecycle.withPermits(1)(
        Effect.gen(function* () {
          const relays = yield* Ref.getAndSet(relaysRef, new Map())
          const subs = yield* Ref.getAndSet(subscriptionsRef, new Map())

          // Disconnect all relays
          for (const entry of relays.values()) {
            yield* entry.session.terminate
            yield* Scope.close(entry.scope, Exit.void)
          }

          for (const subscription of subs.values()) {
            yield* Queue.offer(inbox, { _tag: "SubscriptionEnded", subscription })
          }
        })
      )

    return {
      _tag: "RelayPool" as const,
      addRelay,
      removeRelay,
      getRelays,
      getRelayStatus,
      getConnectedRelays,
      publish,
      publishAndWait,
      authenticate,
      subscribe,
      unsubscribe,
      getSubscription,
      notifications: Stream.fromPubSub(notifications),
      subscribeNotifications: () => PubSub.subscribe(notifications),
      close,
    }
  })

// =============================================================================
// Layer Constructor
// =============================================================================

/**
 * Create a RelayPool layer; sessions live as long as the layer
 */
export const makeRelayPool = (
  config?: RelayPoolConfig
): Layer.Layer<RelayPool, never, EventService | Transport> => Layer.scoped(RelayPool, make(config))

/**
 * Create a RelayPool with initial relays
 */
export const makeRelayPoolWithRelays = (
  urls: readonly string[],
  config?: RelayPoolConfig
): Layer.Layer<RelayPool, InvalidRelayUrl, EventService | Transport> =>
  Layer.scoped(
    RelayPool,
    Effect.gen(function* () {
      const pool = yield* make(config)

      yield* Effect.all(
        urls.map((url) => pool.addRelay(url)),
        { discard: true }
      )

      return pool
    })
  )

/**
 * RelayPool over WebSockets with the default crypto and event services
 */
export const RelayPoolLive = (config?: RelayPoolConfig): Layer.Layer<RelayPool> =>
  makeRelayPool(config).pipe(
    Layer.provide(
      Layer.merge(EventServiceLive.pipe(Layer.provide(CryptoServiceLive)), WebSocketTransportLive)
    )
  )
