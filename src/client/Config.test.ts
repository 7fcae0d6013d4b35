import { describe, expect, test } from "vitest"
import { ConfigProvider, Effect, Either } from "effect"
import { loadRelayPoolConfig } from "./Config.js"

const load = (entries: ReadonlyArray<readonly [string, string]>) =>
  Effect.runPromise(
    loadRelayPoolConfig.pipe(
      Effect.either,
      Effect.withConfigProvider(ConfigProvider.fromMap(new Map(entries)))
    )
  )

describe("loadRelayPoolConfig", () => {
  test("falls back to defaults", async () => {
    const result = await load([])
    expect(Either.getOrThrow(result)).toEqual({
      seenCacheSize: 10_000,
      relaySession: { initialReconnectDelay: 1_000, maxReconnectDelay: 60_000, maxQueuedMessages: 1_000 },
    })
  })

  test("reads overrides", async () => {
    const result = await load([
      ["NOSTR_RECONNECT_INITIAL_MS", "250"],
      ["NOSTR_RECONNECT_MAX_MS", "5000"],
      ["NOSTR_SEEN_CACHE_SIZE", "64"],
      ["NOSTR_MAX_QUEUED", "10"],
    ])
    expect(Either.getOrThrow(result)).toEqual({
      seenCacheSize: 64,
      relaySession: { initialReconnectDelay: 250, maxReconnectDelay: 5_000, maxQueuedMessages: 10 },
    })
  })

  test("rejects values that are not positive integers", async () => {
    const results = await Promise.all([
      load([["NOSTR_SEEN_CACHE_SIZE", "0"]]),
      load([["NOSTR_MAX_QUEUED", "many"]]),
    ])
    for (const result of results) {
      expect(Either.isLeft(result)).toBe(true)
    }
  })
})
