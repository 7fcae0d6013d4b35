/**
 * NIP-01 Core Schemas
 *
 * Type-safe Nostr event, filter and wire message types using Effect Schema.
 * @see https://github.com/nostr-protocol/nips/blob/master/01.md
 */
import { Schema } from "@effect/schema"

// =============================================================================
// Branded Primitive Types
// =============================================================================

/** 64-character lowercase hex string (sha256 hash) */
export const EventId = Schema.String.pipe(
  Schema.pattern(/^[a-f0-9]{64}$/),
  Schema.brand("EventId")
)
export type EventId = typeof EventId.Type

/** 64-character lowercase hex string (x-only secp256k1 public key) */
export const PublicKey = Schema.String.pipe(
  Schema.pattern(/^[a-f0-9]{64}$/),
  Schema.brand("PublicKey")
)
export type PublicKey = typeof PublicKey.Type

/** 64-character lowercase hex string (secp256k1 private key) */
export const PrivateKey = Schema.String.pipe(
  Schema.pattern(/^[a-f0-9]{64}$/),
  Schema.brand("PrivateKey")
)
export type PrivateKey = typeof PrivateKey.Type

/** 128-character lowercase hex string (schnorr signature) */
export const Signature = Schema.String.pipe(
  Schema.pattern(/^[a-f0-9]{128}$/),
  Schema.brand("Signature")
)
export type Signature = typeof Signature.Type

/** Unix timestamp in seconds (can be 0) */
export const UnixTimestamp = Schema.Number.pipe(
  Schema.int(),
  Schema.greaterThanOrEqualTo(0),
  Schema.brand("UnixTimestamp")
)
export type UnixTimestamp = typeof UnixTimestamp.Type

/** Event kind (0-65535) */
export const EventKind = Schema.Number.pipe(
  Schema.int(),
  Schema.greaterThanOrEqualTo(0),
  Schema.lessThanOrEqualTo(65535),
  Schema.brand("EventKind")
)
export type EventKind = typeof EventKind.Type

/** Tag array (at least one element, the first is the tag name) */
export const Tag = Schema.Array(Schema.String).pipe(
  Schema.minItems(1),
  Schema.brand("Tag")
)
export type Tag = typeof Tag.Type

/** Subscription ID (1-64 characters) */
export const SubscriptionId = Schema.String.pipe(
  Schema.minLength(1),
  Schema.maxLength(64),
  Schema.brand("SubscriptionId")
)
export type SubscriptionId = typeof SubscriptionId.Type

// =============================================================================
// Event Types
// =============================================================================

/** Signed Nostr event (NIP-01) */
export const NostrEvent = Schema.Struct({
  id: EventId,
  pubkey: PublicKey,
  created_at: UnixTimestamp,
  kind: EventKind,
  tags: Schema.Array(Tag),
  content: Schema.String,
  sig: Signature,
})
export type NostrEvent = typeof NostrEvent.Type

/** Unsigned event (before signing) */
export const UnsignedEvent = Schema.Struct({
  pubkey: PublicKey,
  created_at: UnixTimestamp,
  kind: EventKind,
  tags: Schema.Array(Tag),
  content: Schema.String,
})
export type UnsignedEvent = typeof UnsignedEvent.Type

/** Event creation parameters */
export const EventParams = Schema.Struct({
  kind: EventKind,
  tags: Schema.Array(Tag),
  content: Schema.String,
})
export type EventParams = typeof EventParams.Type

// =============================================================================
// Filter Type
// =============================================================================

/** Key of a tag constraint: `#` followed by the tag name, e.g. `#e`, `#p`, `#t` */
export const TagFilterKey = Schema.TemplateLiteral(Schema.Literal("#"), Schema.String)
export type TagFilterKey = typeof TagFilterKey.Type

/**
 * Event filter for subscriptions (NIP-01)
 *
 * Present fields are AND-ed, values within one field are OR-ed.
 * `limit` is guidance for the relay's historical query and is not a matching predicate.
 */
export const Filter = Schema.Struct(
  {
    ids: Schema.optional(Schema.Array(EventId)),
    authors: Schema.optional(Schema.Array(PublicKey)),
    kinds: Schema.optional(Schema.Array(EventKind)),
    since: Schema.optional(UnixTimestamp),
    until: Schema.optional(UnixTimestamp),
    limit: Schema.optional(Schema.Number.pipe(Schema.int(), Schema.greaterThanOrEqualTo(0))),
  },
  Schema.Record({ key: TagFilterKey, value: Schema.Array(Schema.String) })
)
export type Filter = typeof Filter.Type

// =============================================================================
// Relay Messages (Client → Relay)
// =============================================================================

/** EVENT message: publish an event */
export const ClientEventMessage = Schema.Tuple(
  Schema.Literal("EVENT"),
  NostrEvent
)
export type ClientEventMessage = typeof ClientEventMessage.Type

/** REQ message: subscribe with filters (variadic: ["REQ", subId, filter, filter, ...]) */
export const ClientReqMessage = Schema.Tuple(
  [Schema.Literal("REQ"), SubscriptionId, Filter],
  Filter
)
export type ClientReqMessage = typeof ClientReqMessage.Type

/** CLOSE message: close subscription */
export const ClientCloseMessage = Schema.Tuple(
  Schema.Literal("CLOSE"),
  SubscriptionId
)
export type ClientCloseMessage = typeof ClientCloseMessage.Type

/** AUTH message: client authentication (NIP-42) */
export const ClientAuthMessage = Schema.Tuple(
  Schema.Literal("AUTH"),
  NostrEvent // kind 22242 signed event
)
export type ClientAuthMessage = typeof ClientAuthMessage.Type

/** All client message types */
export const ClientMessage = Schema.Union(
  ClientEventMessage,
  ClientReqMessage,
  ClientCloseMessage,
  ClientAuthMessage
)
export type ClientMessage = typeof ClientMessage.Type

// =============================================================================
// Relay Messages (Relay → Client)
// =============================================================================

/** EVENT message: relay sends matching event */
export const RelayEventMessage = Schema.Tuple(
  Schema.Literal("EVENT"),
  SubscriptionId,
  NostrEvent
)
export type RelayEventMessage = typeof RelayEventMessage.Type

/** OK message: event accepted/rejected */
export const RelayOkMessage = Schema.Tuple(
  Schema.Literal("OK"),
  EventId,
  Schema.Boolean,
  Schema.String // reason
)
export type RelayOkMessage = typeof RelayOkMessage.Type

/** EOSE message: end of stored events */
export const RelayEoseMessage = Schema.Tuple(
  Schema.Literal("EOSE"),
  SubscriptionId
)
export type RelayEoseMessage = typeof RelayEoseMessage.Type

/** CLOSED message: subscription closed by relay */
export const RelayClosedMessage = Schema.Tuple(
  Schema.Literal("CLOSED"),
  SubscriptionId,
  Schema.String // reason
)
export type RelayClosedMessage = typeof RelayClosedMessage.Type

/** NOTICE message: human-readable message */
export const RelayNoticeMessage = Schema.Tuple(
  Schema.Literal("NOTICE"),
  Schema.String
)
export type RelayNoticeMessage = typeof RelayNoticeMessage.Type

/** AUTH message: authentication challenge (NIP-42) */
export const RelayAuthMessage = Schema.Tuple(
  Schema.Literal("AUTH"),
  Schema.String // challenge string
)
export type RelayAuthMessage = typeof RelayAuthMessage.Type

/** All relay message types */
export const RelayMessage = Schema.Union(
  RelayEventMessage,
  RelayOkMessage,
  RelayEoseMessage,
  RelayClosedMessage,
  RelayNoticeMessage,
  RelayAuthMessage
)
export type RelayMessage = typeof RelayMessage.Type

// =============================================================================
// Well-known Event Kinds
// =============================================================================

/** User metadata (NIP-01) */
export const METADATA_KIND = 0 as EventKind

/** Short text note (NIP-01) */
export const TEXT_NOTE_KIND = 1 as EventKind

/** Recommend relay (deprecated NIP-01 kind, still emitted by older clients) */
export const RECOMMEND_RELAY_KIND = 2 as EventKind

/** Follow list (NIP-02) */
export const CONTACT_LIST_KIND = 3 as EventKind

/** Deletion request (NIP-09) */
export const DELETION_KIND = 5 as EventKind

/** Reaction (NIP-25) */
export const REACTION_KIND = 7 as EventKind

/** Auth event kind (NIP-42) */
export const AUTH_EVENT_KIND = 22242 as EventKind

/**
 * Get the first value of a tag by name
 */
export const getTagValue = (event: Pick<NostrEvent, "tags">, name: string): string | undefined => {
  const tag = event.tags.find((t) => t[0] === name)
  return tag?.[1]
}
