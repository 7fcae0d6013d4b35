/**
 * Transport
 *
 * The bidirectional text-frame channel a relay session runs over.
 * `WebSocketTransportLive` implements it with the `ws` package.
 */
import { Context, Deferred, Effect, Layer, Queue, Stream } from "effect"
import WebSocket from "ws"
import { ConnectionError } from "../core/Errors.js"

// =============================================================================
// Types
// =============================================================================

/** One open connection to a relay */
export interface TransportConnection {
  /**
   * Inbound text frames in arrival order.
   * Ends when the peer closes cleanly and fails with ConnectionError on a transport error.
   */
  readonly frames: Stream.Stream<string, ConnectionError>

  /**
   * Write one outbound text frame
   */
  send(frame: string): Effect.Effect<void, ConnectionError>

  /**
   * Close the connection; safe to call more than once
   */
  readonly close: Effect.Effect<void>
}

// =============================================================================
// Service Interface
// =============================================================================

export interface Transport {
  readonly _tag: "Transport"

  /**
   * Open a connection, completing once the handshake has finished
   */
  connect(url: string): Effect.Effect<TransportConnection, ConnectionError>
}

// =============================================================================
// Service Tag
// =============================================================================

export const Transport = Context.GenericTag<Transport>("Transport")

// =============================================================================
// WebSocket Implementation
// =============================================================================

/** Item on a connection's inbound queue */
type Inbound =
  | { readonly _tag: "Frame"; readonly data: string }
  | { readonly _tag: "Closed"; readonly error?: ConnectionError }

const rawToString = (data: WebSocket.RawData): string => {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8")
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8")
  return data.toString("utf8")
}

const openWebSocket = (url: string): Effect.Effect<TransportConnection, ConnectionError> =>
  Effect.gen(function* () {
    const inbound = yield* Queue.unbounded<Inbound>()
    const opened = yield* Deferred.make<void, ConnectionError>()

    const socket = yield* Effect.try({
      try: () => new WebSocket(url),
      catch: (error) =>
        new ConnectionError({
          message: error instanceof Error ? error.message : "Connection failed",
          url,
        }),
    })

    const finish = (item: Inbound) => {
      Queue.unsafeOffer(inbound, item)
      const error =
        item._tag === "Closed" && item.error !== undefined
          ? item.error
          : new ConnectionError({ message: "Connection closed during handshake", url })
      // No-op once the handshake has completed
      Deferred.unsafeDone(opened, Effect.fail(error))
    }

    socket.on("open", () => {
      Deferred.unsafeDone(opened, Effect.void)
    })
    socket.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
      if (isBinary) return
      Queue.unsafeOffer(inbound, { _tag: "Frame", data: rawToString(data) })
    })
    socket.on("error", (error: Error) => {
      finish({ _tag: "Closed", error: new ConnectionError({ message: error.message, url }) })
    })
    socket.on("close", () => {
      finish({ _tag: "Closed" })
    })

    yield* Deferred.await(opened).pipe(
      Effect.onInterrupt(() => Effect.sync(() => socket.terminate()))
    )

    const frames: Stream.Stream<string, ConnectionError> = Stream.fromQueue(inbound).pipe(
      Stream.takeUntil((item) => item._tag === "Closed"),
      Stream.flatMap((item): Stream.Stream<string, ConnectionError> => {
        if (item._tag === "Frame") return Stream.succeed(item.data)
        return item.error ? Stream.fail(item.error) : Stream.empty
      })
    )

    const send = (frame: string): Effect.Effect<void, ConnectionError> =>
      Effect.async<void, ConnectionError>((resume) => {
        if (socket.readyState !== WebSocket.OPEN) {
          resume(Effect.fail(new ConnectionError({ message: "Not connected", url })))
          return
        }
        socket.send(frame, (error?: Error) => {
          resume(
            error ? Effect.fail(new ConnectionError({ message: error.message, url })) : Effect.void
          )
        })
      })

    const close = Effect.sync(() => {
      if (socket.readyState === WebSocket.CONNECTING) {
        socket.terminate()
      } else if (socket.readyState === WebSocket.OPEN) {
        socket.close()
      }
    })

    return { frames, send, close }
  })

export const makeWebSocketTransport = (): Transport => ({
  _tag: "Transport",
  connect: openWebSocket,
})

export const WebSocketTransportLive = Layer.succeed(Transport, makeWebSocketTransport())
