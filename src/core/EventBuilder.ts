/**
 * EventBuilder
 *
 * Parameter builders for the common event kinds. Each returns
 * {@link CreateEventParams} ready for `EventService.createEvent`.
 */
import type { CreateEventParams } from "../services/EventService.js"
import { serializeMetadata, type Metadata } from "./Metadata.js"
import {
  AUTH_EVENT_KIND,
  CONTACT_LIST_KIND,
  DELETION_KIND,
  METADATA_KIND,
  REACTION_KIND,
  RECOMMEND_RELAY_KIND,
  TEXT_NOTE_KIND,
  type EventId,
  Tag,
  type NostrEvent,
  type PublicKey,
} from "./Schema.js"

/** An entry of a follow list (NIP-02) */
export interface Contact {
  readonly pubkey: PublicKey
  readonly relayUrl?: string
  readonly alias?: string
}

const tag = (...values: [string, ...string[]]): Tag => Tag.make(values)

/**
 * Short text note (kind 1)
 */
export const textNote = (content: string, tags: readonly Tag[] = []): CreateEventParams => ({
  kind: TEXT_NOTE_KIND,
  content,
  tags,
})

/**
 * Profile metadata (kind 0)
 */
export const metadata = (value: Metadata): CreateEventParams => ({
  kind: METADATA_KIND,
  content: serializeMetadata(value),
  tags: [],
})

/**
 * Recommend a relay to followers (kind 2)
 */
export const recommendRelay = (url: string): CreateEventParams => ({
  kind: RECOMMEND_RELAY_KIND,
  content: url,
  tags: [],
})

/**
 * Follow list (kind 3): one `p` tag per contact, `["p", pubkey, relay, alias]`
 */
export const contactList = (contacts: readonly Contact[]): CreateEventParams => ({
  kind: CONTACT_LIST_KIND,
  content: "",
  tags: contacts.map((contact) =>
    tag("p", contact.pubkey, contact.relayUrl ?? "", contact.alias ?? "")
  ),
})

/**
 * Deletion request (kind 5, NIP-09) for the given event ids
 */
export const deletion = (ids: readonly EventId[], reason?: string): CreateEventParams => ({
  kind: DELETION_KIND,
  content: reason ?? "",
  tags: ids.map((id) => tag("e", id)),
})

/**
 * Reaction (kind 7, NIP-25): `+` for a like, `-` for a dislike.
 * Keeps the reacted event's `e` and `p` tags and appends its own id and author.
 */
export const reaction = (event: NostrEvent, positive: boolean): CreateEventParams => ({
  kind: REACTION_KIND,
  content: positive ? "+" : "-",
  tags: [
    ...event.tags.filter((t) => t.length >= 2 && (t[0] === "e" || t[0] === "p")),
    tag("e", event.id),
    tag("p", event.pubkey),
  ],
})

/**
 * Answer to a relay's AUTH challenge (kind 22242, NIP-42)
 */
export const authentication = (relayUrl: string, challenge: string): CreateEventParams => ({
  kind: AUTH_EVENT_KIND,
  content: "",
  tags: [tag("relay", relayUrl), tag("challenge", challenge)],
})
