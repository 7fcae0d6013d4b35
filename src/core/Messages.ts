/**
 * Wire messages
 *
 * Parsing and serialization of NIP-01 frames. Every frame is a JSON array
 * whose first element names the message type.
 */
import { Effect } from "effect"
import { Schema, TreeFormatter, type ParseResult } from "@effect/schema"
import { ProtocolError } from "./Errors.js"
import {
  ClientAuthMessage,
  ClientCloseMessage,
  ClientEventMessage,
  ClientReqMessage,
  RelayAuthMessage,
  RelayClosedMessage,
  RelayEoseMessage,
  RelayEventMessage,
  RelayNoticeMessage,
  RelayOkMessage,
  type ClientMessage,
  type EventId,
  type Filter,
  type NostrEvent,
  type RelayMessage,
  type SubscriptionId,
} from "./Schema.js"

// =============================================================================
// Decoders by message type
// =============================================================================

type Decoder<A> = (input: unknown) => Effect.Effect<A, ParseResult.ParseError>

const relayDecoders: Record<RelayMessage[0], Decoder<RelayMessage>> = {
  EVENT: Schema.decodeUnknown(RelayEventMessage),
  OK: Schema.decodeUnknown(RelayOkMessage),
  EOSE: Schema.decodeUnknown(RelayEoseMessage),
  CLOSED: Schema.decodeUnknown(RelayClosedMessage),
  NOTICE: Schema.decodeUnknown(RelayNoticeMessage),
  AUTH: Schema.decodeUnknown(RelayAuthMessage),
}

const clientDecoders: Record<ClientMessage[0], Decoder<ClientMessage>> = {
  EVENT: Schema.decodeUnknown(ClientEventMessage),
  REQ: Schema.decodeUnknown(ClientReqMessage),
  CLOSE: Schema.decodeUnknown(ClientCloseMessage),
  AUTH: Schema.decodeUnknown(ClientAuthMessage),
}

const hasDecoder = <K extends string>(
  decoders: Record<K, unknown>,
  type: string
): type is K => Object.prototype.hasOwnProperty.call(decoders, type)

const parseFrame = <K extends string, A>(
  decoders: Record<K, Decoder<A>>,
  raw: string
): Effect.Effect<A, ProtocolError> =>
  Effect.gen(function* () {
    const parsed = yield* Effect.try({
      try: (): unknown => JSON.parse(raw),
      catch: () => new ProtocolError({ message: "Frame is not valid JSON", raw }),
    })

    if (!Array.isArray(parsed) || parsed.length === 0 || typeof parsed[0] !== "string") {
      return yield* Effect.fail(
        new ProtocolError({ message: "Frame must be an array starting with a message type", raw })
      )
    }

    const type: string = parsed[0]
    if (!hasDecoder(decoders, type)) {
      return yield* Effect.fail(new ProtocolError({ message: `Unknown message type: ${type}`, raw }))
    }

    return yield* decoders[type](parsed).pipe(
      Effect.mapError(
        (error) =>
          new ProtocolError({
            message: `Malformed ${type} message: ${TreeFormatter.formatErrorSync(error)}`,
            raw,
          })
      )
    )
  })

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse a relay → client frame
 */
export const parseRelayMessage = (raw: string): Effect.Effect<RelayMessage, ProtocolError> =>
  parseFrame(relayDecoders, raw)

/**
 * Parse a client → relay frame
 */
export const parseClientMessage = (raw: string): Effect.Effect<ClientMessage, ProtocolError> =>
  parseFrame(clientDecoders, raw)

// =============================================================================
// Serialization
// =============================================================================

export const serializeClientMessage = (message: ClientMessage): string => JSON.stringify(message)

export const serializeRelayMessage = (message: RelayMessage): string => JSON.stringify(message)

// =============================================================================
// Client Message Builders
// =============================================================================

export const eventMessage = (event: NostrEvent): ClientEventMessage => ["EVENT", event]

export const reqMessage = (
  subscriptionId: SubscriptionId,
  filters: readonly [Filter, ...Filter[]]
): ClientReqMessage => ["REQ", subscriptionId, ...filters]

export const closeMessage = (subscriptionId: SubscriptionId): ClientCloseMessage => [
  "CLOSE",
  subscriptionId,
]

export const authMessage = (event: NostrEvent): ClientAuthMessage => ["AUTH", event]

// =============================================================================
// Relay Message Builders
// =============================================================================

export const relayEventMessage = (
  subscriptionId: SubscriptionId,
  event: NostrEvent
): RelayEventMessage => ["EVENT", subscriptionId, event]

export const okMessage = (eventId: EventId, accepted: boolean, message: string): RelayOkMessage => [
  "OK",
  eventId,
  accepted,
  message,
]

export const eoseMessage = (subscriptionId: SubscriptionId): RelayEoseMessage => [
  "EOSE",
  subscriptionId,
]

export const closedMessage = (subscriptionId: SubscriptionId, reason: string): RelayClosedMessage => [
  "CLOSED",
  subscriptionId,
  reason,
]

export const noticeMessage = (message: string): RelayNoticeMessage => ["NOTICE", message]
