import { describe, expect, test } from "vitest"
import { matchesFilter, matchesFilters, tagConstraints } from "./FilterMatcher.js"
import {
  EventId,
  EventKind,
  PublicKey,
  Signature,
  Tag,
  UnixTimestamp,
  type Filter,
  type NostrEvent,
} from "./Schema.js"

const ALICE = PublicKey.make("a".repeat(64))
const BOB = PublicKey.make("b".repeat(64))

const makeEvent = (overrides: Partial<NostrEvent> = {}): NostrEvent => ({
  id: EventId.make("1".repeat(64)),
  pubkey: ALICE,
  created_at: UnixTimestamp.make(1000),
  kind: EventKind.make(1),
  tags: [],
  content: "",
  sig: Signature.make("0".repeat(128)),
  ...overrides,
})

describe("matchesFilter", () => {
  test("selects only the event matching both kind and author", () => {
    const filter: Filter = { kinds: [EventKind.make(1)], authors: [ALICE] }
    const candidates = [
      makeEvent({ id: EventId.make("2".repeat(64)), pubkey: BOB }),
      makeEvent({ id: EventId.make("3".repeat(64)), pubkey: PublicKey.make("c".repeat(64)) }),
      makeEvent({ id: EventId.make("4".repeat(64)), pubkey: ALICE }),
    ]

    const selected = candidates.filter((event) => matchesFilter(event, filter))
    expect(selected.map((event) => event.id)).toEqual(["4".repeat(64)])
  })

  test("empty filter matches everything", () => {
    expect(matchesFilter(makeEvent(), {})).toBe(true)
  })

  test("values within a field are alternatives", () => {
    const filter: Filter = { kinds: [EventKind.make(0), EventKind.make(1)] }
    expect(matchesFilter(makeEvent({ kind: EventKind.make(0) }), filter)).toBe(true)
    expect(matchesFilter(makeEvent({ kind: EventKind.make(7) }), filter)).toBe(false)
  })

  test("ids and authors need exact matches, not prefixes", () => {
    expect(matchesFilter(makeEvent(), { ids: [EventId.make("1".repeat(64))] })).toBe(true)
    expect(matchesFilter(makeEvent(), { authors: [BOB] })).toBe(false)
  })

  test("a present but empty list matches nothing", () => {
    expect(matchesFilter(makeEvent(), { kinds: [] })).toBe(false)
    expect(matchesFilter(makeEvent(), { "#t": [] })).toBe(false)
  })

  test("since and until are inclusive", () => {
    const event = makeEvent({ created_at: UnixTimestamp.make(1000) })
    expect(matchesFilter(event, { since: UnixTimestamp.make(1000) })).toBe(true)
    expect(matchesFilter(event, { until: UnixTimestamp.make(1000) })).toBe(true)
    expect(matchesFilter(event, { since: UnixTimestamp.make(1001) })).toBe(false)
    expect(matchesFilter(event, { until: UnixTimestamp.make(999) })).toBe(false)
  })

  test("limit is not a matching predicate", () => {
    expect(matchesFilter(makeEvent(), { limit: 0 })).toBe(true)
  })

  test("tag constraints look at the first value of tags with that name", () => {
    const event = makeEvent({
      tags: [Tag.make(["t", "nostr", "extra"]), Tag.make(["e", "x".repeat(64)]), Tag.make(["p"])],
    })
    expect(matchesFilter(event, { "#t": ["bitcoin", "nostr"] })).toBe(true)
    expect(matchesFilter(event, { "#t": ["extra"] })).toBe(false)
    expect(matchesFilter(event, { "#p": ["anything"] })).toBe(false)
    expect(matchesFilter(event, { "#t": ["nostr"], "#e": ["x".repeat(64)] })).toBe(true)
    expect(matchesFilter(event, { "#t": ["nostr"], "#e": ["y".repeat(64)] })).toBe(false)
  })

  test("tag names are case-sensitive", () => {
    const event = makeEvent({ tags: [Tag.make(["T", "nostr"])] })
    expect(matchesFilter(event, { "#t": ["nostr"] })).toBe(false)
    expect(matchesFilter(event, { "#T": ["nostr"] })).toBe(true)
  })
})

describe("matchesFilters", () => {
  test("matches when any filter matches", () => {
    const filters: Filter[] = [{ authors: [BOB] }, { kinds: [EventKind.make(1)] }]
    expect(matchesFilters(makeEvent(), filters)).toBe(true)
  })

  test("no filters match nothing", () => {
    expect(matchesFilters(makeEvent(), [])).toBe(false)
  })
})

describe("tagConstraints", () => {
  test("lists only the tag keys", () => {
    expect(
      tagConstraints({ kinds: [EventKind.make(1)], "#e": ["x"], "#p": ["y", "z"], limit: 5 })
    ).toEqual([
      ["e", ["x"]],
      ["p", ["y", "z"]],
    ])
  })
})
