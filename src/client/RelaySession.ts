/**
 * RelaySession
 *
 * One relay connection's state machine: connects over a Transport, reconnects with
 * capped, jittered exponential backoff, keeps outbound frames in submission order
 * until they are written and re-issues every active subscription whenever a
 * connection is established.
 *
 *   disconnected → connecting → connected → disconnected → … → terminated
 */
import {
  Clock,
  Duration,
  Effect,
  Fiber,
  Option,
  Queue,
  Random,
  Ref,
  Scope,
  Stream,
  SubscriptionRef,
} from "effect"
import { ConnectionError } from "../core/Errors.js"
import {
  closeMessage,
  parseRelayMessage,
  reqMessage,
  serializeClientMessage,
} from "../core/Messages.js"
import type { ClientMessage, Filter, RelayMessage, SubscriptionId } from "../core/Schema.js"
import { Transport, type TransportConnection } from "./Transport.js"

// =============================================================================
// Types
// =============================================================================

/** Connection state */
export type ConnectionState = "disconnected" | "connecting" | "connected" | "terminated"

/** Filters of one subscription as sent in a REQ frame */
export type SubscriptionFilters = readonly [Filter, ...Filter[]]

/** Configuration for a relay session */
export interface RelaySessionConfig {
  readonly url: string
  /** Reconnect after a failed attempt or a lost connection (default: true) */
  readonly reconnect?: boolean
  /** First reconnect delay in ms (default: 1000) */
  readonly initialReconnectDelay?: number
  /** Upper bound of the reconnect delay in ms (default: 60000) */
  readonly maxReconnectDelay?: number
  /** Fraction of the delay randomly added or removed (default: 0.2) */
  readonly reconnectJitter?: number
  /** A connection that lasted this long in ms resets the backoff (default: 10000) */
  readonly stableConnectionThreshold?: number
  /** Handshake timeout in ms (default: 10000) */
  readonly connectTimeout?: number
  /** EVENT and AUTH frames kept while not connected; the oldest is dropped beyond this (default: 1000) */
  readonly maxQueuedMessages?: number
}

export type ResolvedRelaySessionConfig = Required<RelaySessionConfig>

/** Backoff bookkeeping, carried as plain data */
export interface BackoffState {
  /** Consecutive reconnect attempts since the last stable connection */
  readonly attempts: number
  /** When the current or last connection was established (epoch ms) */
  readonly connectedAt: number | undefined
}

/** What a session reports to its pool */
export type SessionMessage =
  | { readonly _tag: "Received"; readonly url: string; readonly message: RelayMessage }
  | { readonly _tag: "Sent"; readonly url: string; readonly message: ClientMessage }
  | { readonly _tag: "StatusChanged"; readonly url: string; readonly state: ConnectionState }

export interface RelaySession {
  readonly url: string

  /**
   * Current connection state
   */
  readonly state: Effect.Effect<ConnectionState>

  /**
   * Current state followed by every later change
   */
  readonly stateChanges: Stream.Stream<ConnectionState>

  /**
   * Current backoff bookkeeping
   */
  readonly backoff: Effect.Effect<BackoffState>

  /**
   * Start the connect/reconnect loop. No-op when already running or terminated.
   */
  readonly connect: Effect.Effect<void>

  /**
   * Queue a frame behind everything submitted before it. Never waits for the relay.
   */
  send(message: ClientMessage): Effect.Effect<void>

  /**
   * Mirror a subscription and queue its REQ; re-issued on every reconnect
   */
  openSubscription(id: SubscriptionId, filters: SubscriptionFilters): Effect.Effect<void>

  /**
   * Forget a subscription: withdraws a REQ still queued, otherwise queues CLOSE
   * when the current connection holds it
   */
  closeSubscription(id: SubscriptionId): Effect.Effect<void>

  /**
   * Subscriptions that will be re-issued on reconnect
   */
  readonly subscriptions: Effect.Effect<ReadonlyMap<SubscriptionId, SubscriptionFilters>>

  /**
   * Cancel the session loop and any pending reconnect, release the transport. Final.
   */
  readonly terminate: Effect.Effect<void>
}

// =============================================================================
// Configuration
// =============================================================================

export const resolveSessionConfig = (config: RelaySessionConfig): ResolvedRelaySessionConfig => ({
  url: config.url,
  reconnect: config.reconnect ?? true,
  initialReconnectDelay: config.initialReconnectDelay ?? 1_000,
  maxReconnectDelay: config.maxReconnectDelay ?? 60_000,
  reconnectJitter: config.reconnectJitter ?? 0.2,
  stableConnectionThreshold: config.stableConnectionThreshold ?? 10_000,
  connectTimeout: config.connectTimeout ?? 10_000,
  maxQueuedMessages: config.maxQueuedMessages ?? 1_000,
})

/**
 * Delay before reconnect attempt number `attempts` (0-based).
 * `random` is a sample from [0, 1) that spreads the delay by ±`reconnectJitter`.
 */
export const nextReconnectDelay = (
  config: Pick<
    ResolvedRelaySessionConfig,
    "initialReconnectDelay" | "maxReconnectDelay" | "reconnectJitter"
  >,
  attempts: number,
  random: number
): number => {
  const base = Math.min(config.initialReconnectDelay * 2 ** attempts, config.maxReconnectDelay)
  const jittered = base * (1 + config.reconnectJitter * (2 * random - 1))
  return Math.round(Math.min(Math.max(jittered, 0), config.maxReconnectDelay))
}

/**
 * Backoff state after a connection ended or an attempt failed at `now`
 */
export const nextBackoffState = (
  state: BackoffState,
  now: number,
  stableConnectionThreshold: number
): BackoffState => {
  const stable =
    state.connectedAt !== undefined && now - state.connectedAt >= stableConnectionThreshold
  return { attempts: stable ? 0 : state.attempts, connectedAt: undefined }
}

/** Subscription a REQ or CLOSE frame refers to */
const subscriptionOf = (message: ClientMessage): SubscriptionId | undefined =>
  message[0] === "REQ" || message[0] === "CLOSE" ? message[1] : undefined

// =============================================================================
// Implementation
// =============================================================================

/**
 * Create a session for one relay. Frames, state changes and sent messages are
 * reported on `outbox`. The session loop is forked into the current scope.
 */
export const makeRelaySession = (
  config: RelaySessionConfig,
  outbox: Queue.Enqueue<SessionMessage>
): Effect.Effect<RelaySession, never, Transport | Scope.Scope> =>
  Effect.gen(function* () {
    const transport = yield* Transport
    const scope = yield* Effect.scope
    const settings = resolveSessionConfig(config)
    const url = settings.url

    const stateRef = yield* SubscriptionRef.make<ConnectionState>("disconnected")
    const backoffRef = yield* Ref.make<BackoffState>({ attempts: 0, connectedAt: undefined })
    const subscriptionsRef = yield* Ref.make<ReadonlyMap<SubscriptionId, SubscriptionFilters>>(
      new Map()
    )
    // Frames not yet written, oldest first
    const pendingRef = yield* Ref.make<ReadonlyArray<ClientMessage>>([])
    const wakeup = yield* Queue.sliding<true>(1)
    // Subscriptions the relay holds on the current connection
    const liveRef = yield* Ref.make<ReadonlySet<SubscriptionId>>(new Set())
    const outboundLock = yield* Effect.makeSemaphore(1)
    const fiberRef = yield* Ref.make<Option.Option<Fiber.RuntimeFiber<void>>>(Option.none())
    const lifecycle = yield* Effect.makeSemaphore(1)

    // Terminated is final: later transitions are ignored
    const setState = (next: ConnectionState): Effect.Effect<void> =>
      Effect.gen(function* () {
        const changed = yield* SubscriptionRef.modify(
          stateRef,
          (current): [boolean, ConnectionState] =>
            current === "terminated" || current === next ? [false, current] : [true, next]
        )
        if (!changed) return
        yield* Effect.logDebug(`Relay state: ${next}`)
        yield* Queue.offer(outbox, { _tag: "StatusChanged", url, state: next })
      })

    /** Append a frame; past the bound the oldest EVENT or AUTH frame is dropped */
    const enqueue = (message: ClientMessage): Effect.Effect<void> =>
      Effect.gen(function* () {
        if ((yield* SubscriptionRef.get(stateRef)) === "terminated") return

        const dropped = yield* Ref.modify(
          pendingRef,
          (pending): [boolean, ReadonlyArray<ClientMessage>] => {
            const next = [...pending, message]
            const published = next.filter((frame) => subscriptionOf(frame) === undefined)
            if (published.length <= settings.maxQueuedMessages) return [false, next]
            const oldest = next.findIndex((frame) => subscriptionOf(frame) === undefined)
            return [true, [...next.slice(0, oldest), ...next.slice(oldest + 1)]]
          }
        )
        if (dropped) {
          yield* Effect.logWarning("Outbound queue full, dropping the oldest message").pipe(
            Effect.annotateLogs({ relay: url })
          )
        }
        yield* Queue.offer(wakeup, true)
      })

    const write = (
      connection: TransportConnection,
      message: ClientMessage
    ): Effect.Effect<void, ConnectionError> =>
      connection
        .send(serializeClientMessage(message))
        .pipe(Effect.zipRight(Queue.offer(outbox, { _tag: "Sent", url, message })))

    /** A REQ for a subscription closed since, or a CLOSE for one this connection never opened */
    const isStale = (message: ClientMessage): Effect.Effect<boolean> => {
      const id = subscriptionOf(message)
      if (id === undefined) return Effect.succeed(false)
      return message[0] === "REQ"
        ? Ref.get(subscriptionsRef).pipe(Effect.map((subs) => !subs.has(id)))
        : Ref.get(liveRef).pipe(Effect.map((live) => !live.has(id)))
    }

    const markWritten = (message: ClientMessage): Effect.Effect<void> => {
      const id = subscriptionOf(message)
      if (id === undefined) return Effect.void
      return Ref.update(liveRef, (live) => {
        const next = new Set(live)
        if (message[0] === "REQ") next.add(id)
        else next.delete(id)
        return next
      })
    }

    /** Write the oldest pending frame; false when nothing is pending */
    const writeNext = (connection: TransportConnection): Effect.Effect<boolean, ConnectionError> =>
      outboundLock
        .withPermits(1)(
          Effect.gen(function* () {
            const message = (yield* Ref.get(pendingRef))[0]
            if (message === undefined) return false

            if (!(yield* isStale(message))) {
              yield* write(connection, message)
              yield* markWritten(message)
            }
            // Removed only once written: a failed write is retried on the next connection
            yield* Ref.update(pendingRef, (pending) =>
              pending[0] === message ? pending.slice(1) : pending
            )
            return true
          })
        )
        .pipe(Effect.uninterruptible)

    const readLoop = (connection: TransportConnection): Effect.Effect<void, ConnectionError> =>
      connection.frames.pipe(
        Stream.runForEach((frame) =>
          parseRelayMessage(frame).pipe(
            Effect.flatMap((message) => Queue.offer(outbox, { _tag: "Received", url, message })),
            Effect.catchTag("ProtocolError", (error) =>
              Effect.logWarning(`Dropped frame: ${error.message}`)
            )
          )
        )
      )

    const writeLoop = (connection: TransportConnection): Effect.Effect<never, ConnectionError> =>
      Effect.gen(function* () {
        // Re-issue what the relay forgot; subscriptions with a pending REQ go out in order
        yield* outboundLock.withPermits(1)(
          Effect.gen(function* () {
            const queued = new Set(
              (yield* Ref.get(pendingRef)).flatMap((message) =>
                message[0] === "REQ" ? [message[1]] : []
              )
            )
            for (const [id, filters] of yield* Ref.get(subscriptionsRef)) {
              if (queued.has(id)) continue
              yield* write(connection, reqMessage(id, filters))
              yield* Ref.update(liveRef, (live) => new Set(live).add(id))
            }
          })
        )
        return yield* writeNext(connection).pipe(
          Effect.flatMap((wrote) => (wrote ? Effect.void : Queue.take(wakeup))),
          Effect.forever
        )
      })

    const connectOnce: Effect.Effect<void, ConnectionError> = Effect.scoped(
      Effect.gen(function* () {
        yield* setState("connecting")
        const connection = yield* Effect.acquireRelease(
          transport.connect(url).pipe(
            Effect.timeoutFail({
              duration: Duration.millis(settings.connectTimeout),
              onTimeout: () => new ConnectionError({ message: "Connection timed out", url }),
            }),
            Effect.withLogSpan("connect")
          ),
          (connection) => connection.close
        )

        const connectedAt = yield* Clock.currentTimeMillis
        yield* Ref.update(backoffRef, (backoff) => ({ ...backoff, connectedAt }))
        yield* setState("connected")
        yield* Effect.logInfo("Connected")

        yield* Effect.raceFirst(readLoop(connection), writeLoop(connection))
        yield* Effect.logInfo("Connection closed by relay")
      })
    ).pipe(Effect.ensuring(Ref.set(liveRef, new Set())))

    /** Wait out the backoff; false when the session should stop instead */
    const backOff: Effect.Effect<boolean> = Effect.gen(function* () {
      yield* setState("disconnected")
      if (!settings.reconnect) return false

      const now = yield* Clock.currentTimeMillis
      const state = nextBackoffState(
        yield* Ref.get(backoffRef),
        now,
        settings.stableConnectionThreshold
      )
      const delay = nextReconnectDelay(settings, state.attempts, yield* Random.next)
      yield* Ref.set(backoffRef, { attempts: state.attempts + 1, connectedAt: undefined })

      yield* Effect.logDebug(`Reconnecting in ${delay}ms (attempt ${state.attempts + 1})`)
      yield* Effect.sleep(Duration.millis(delay))
      return true
    })

    const run: Effect.Effect<void> = Effect.gen(function* () {
      while (true) {
        yield* connectOnce.pipe(
          Effect.catchTag("ConnectionError", (error) =>
            Effect.logWarning(`Connection failed: ${error.message}`)
          )
        )
        const again = yield* backOff
        if (!again) return
      }
    }).pipe(
      Effect.ensuring(Ref.set(fiberRef, Option.none())),
      Effect.annotateLogs({ relay: url })
    )

    const connect: RelaySession["connect"] = lifecycle.withPermits(1)(
      Effect.gen(function* () {
        const state = yield* SubscriptionRef.get(stateRef)
        if (state === "terminated") return
        const running = yield* Ref.get(fiberRef)
        if (Option.isSome(running) && Option.isNone(yield* Fiber.poll(running.value))) return

        const fiber = yield* Effect.forkIn(run, scope)
        yield* Ref.set(fiberRef, Option.some(fiber))
      })
    )

    const send: RelaySession["send"] = enqueue

    const openSubscription: RelaySession["openSubscription"] = (id, filters) =>
      outboundLock.withPermits(1)(
        Effect.gen(function* () {
          yield* Ref.update(subscriptionsRef, (subs) => new Map(subs).set(id, filters))
          yield* enqueue(reqMessage(id, filters))
        })
      )

    const closeSubscription: RelaySession["closeSubscription"] = (id) =>
      outboundLock.withPermits(1)(
        Effect.gen(function* () {
          const existed = yield* Ref.modify(
            subscriptionsRef,
            (subs): [boolean, ReadonlyMap<SubscriptionId, SubscriptionFilters>] => {
              if (!subs.has(id)) return [false, subs]
              const next = new Map(subs)
              next.delete(id)
              return [true, next]
            }
          )
          if (!existed) return

          // A REQ that never left is withdrawn rather than closed
          yield* Ref.update(pendingRef, (pending) =>
            pending.filter((message) => !(message[0] === "REQ" && message[1] === id))
          )
          if ((yield* Ref.get(liveRef)).has(id)) {
            yield* enqueue(closeMessage(id))
          }
        })
      )

    const terminate: RelaySession["terminate"] = lifecycle.withPermits(1)(
      Effect.gen(function* () {
        yield* setState("terminated")
        const running = yield* Ref.get(fiberRef)
        if (Option.isSome(running)) {
          yield* Fiber.interrupt(running.value)
        }
        yield* Ref.set(pendingRef, [])
      })
    )

    return {
      url,
      state: SubscriptionRef.get(stateRef),
      stateChanges: stateRef.changes,
      backoff: Ref.get(backoffRef),
      connect,
      send,
      openSubscription,
      closeSubscription,
      subscriptions: Ref.get(subscriptionsRef),
      terminate,
    }
  })
