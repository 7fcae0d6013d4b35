import { describe, expect, expectTypeOf, test } from "vitest"
import { FilterBuilder } from "./FilterBuilder.js"
import {
  EventId,
  EventKind,
  PublicKey,
  TEXT_NOTE_KIND,
  UnixTimestamp,
  type Filter,
} from "./Schema.js"

const ALICE = PublicKey.make("a".repeat(64))
const NOTE = EventId.make("e".repeat(64))

describe("FilterBuilder", () => {
  test("builds an empty filter", () => {
    expect(FilterBuilder.empty().build()).toEqual({})
  })

  test("accumulates values across calls", () => {
    const filter = FilterBuilder.empty()
      .kinds(TEXT_NOTE_KIND)
      .kinds(EventKind.make(7))
      .authors(ALICE)
      .events(NOTE)
      .pubkeys(ALICE)
      .tag("t", "nostr", "relay")
      .since(UnixTimestamp.make(10))
      .until(UnixTimestamp.make(20))
      .limit(50)
      .build()

    expect(filter).toEqual({
      kinds: [1, 7],
      authors: [ALICE],
      "#e": [NOTE],
      "#p": [ALICE],
      "#t": ["nostr", "relay"],
      since: 10,
      until: 20,
      limit: 50,
    })
  })

  test("builds a Filter from fixed fields and tags", () => {
    const filter = FilterBuilder.empty()
      .ids(NOTE)
      .limit(5)
      .since(UnixTimestamp.make(10))
      .tag("t", "nostr")
      .build()
    expectTypeOf(filter).toEqualTypeOf<Filter>()
    expect(filter).toEqual({ ids: [NOTE], limit: 5, since: 10, "#t": ["nostr"] })
  })

    test("is immutable", () => {
    const base = FilterBuilder.empty().kinds(TEXT_NOTE_KIND)
    const extended = base.authors(ALICE)
    expect(base.build()).toEqual({ kinds: [1] })
    expect(extended.build()).toEqual({ kinds: [1], authors: [ALICE] })
  })

  test("extends an existing filter", () => {
    expect(FilterBuilder.from({ "#t": ["a"] }).tag("t", "b").build()).toEqual({ "#t": ["a", "b"] })
  })

  test("since equal to until is allowed", () => {
    const filter = FilterBuilder.empty()
      .since(UnixTimestamp.make(5))
      .until(UnixTimestamp.make(5))
      .build()
    expect(filter).toEqual({ since: 5, until: 5 })
  })

  test("rejects since later than until", () => {
    const builder = FilterBuilder.empty().since(UnixTimestamp.make(20)).until(UnixTimestamp.make(10))
    expect(() => builder.build()).toThrow("Contradictory filter: since (20) is later than until (10)")
  })

  test("rejects invalid limits and tag names", () => {
    expect(() => FilterBuilder.empty().limit(-1)).toThrow(
      "Filter limit must be a non-negative integer, got -1"
    )
    expect(() => FilterBuilder.empty().limit(1.5)).toThrow()
    expect(() => FilterBuilder.empty().tag("")).toThrow("Tag filter name must not be empty")
  })
})
