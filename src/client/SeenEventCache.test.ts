import { describe, expect, test } from "vitest"
import { SeenEventCache } from "./SeenEventCache.js"

describe("SeenEventCache", () => {
  test("add reports whether the key was new", () => {
    const cache = new SeenEventCache(10)
    expect(cache.add("a")).toBe(true)
    expect(cache.add("a")).toBe(false)
    expect(cache.has("a")).toBe(true)
    expect(cache.size).toBe(1)
  })

  test("evicts the oldest key once over capacity", () => {
    const cache = new SeenEventCache(2)
    cache.add("a")
    cache.add("b")
    cache.add("c")
    expect(cache.has("a")).toBe(false)
    expect(cache.has("b")).toBe(true)
    expect(cache.has("c")).toBe(true)
    expect(cache.size).toBe(2)
    // An evicted key counts as new again
    expect(cache.add("a")).toBe(true)
  })

  test("delete and clear", () => {
    const cache = new SeenEventCache(3)
    cache.add("a")
    cache.add("b")
    cache.delete("a")
    expect(cache.has("a")).toBe(false)
    cache.clear()
    expect(cache.size).toBe(0)
  })

  test("rejects a capacity that is not a positive integer", () => {
    expect(() => new SeenEventCache(0)).toThrow(
      "SeenEventCache capacity must be a positive integer, got 0"
    )
    expect(() => new SeenEventCache(2.5)).toThrow()
  })
})
