/**
 * Pool configuration from the environment
 *
 *   NOSTR_RECONNECT_INITIAL_MS  first reconnect delay (1000)
 *   NOSTR_RECONNECT_MAX_MS      reconnect delay cap (60000)
 *   NOSTR_SEEN_CACHE_SIZE       event ids remembered for de-duplication (10000)
 *   NOSTR_MAX_QUEUED            outbound frames kept per relay while offline (1000)
 */
import { Config, Effect, type ConfigError } from "effect"
import type { RelayPoolConfig } from "./RelayPool.js"

const positive = (name: string, fallback: number) =>
  Config.integer(name).pipe(
    Config.validate({ message: `${name} must be a positive integer`, validation: (n) => n > 0 }),
    Config.withDefault(fallback)
  )

export const RelayPoolEnvConfig: Config.Config<RelayPoolConfig> = Config.all({
  initialReconnectDelay: positive("NOSTR_RECONNECT_INITIAL_MS", 1_000),
  maxReconnectDelay: positive("NOSTR_RECONNECT_MAX_MS", 60_000),
  seenCacheSize: positive("NOSTR_SEEN_CACHE_SIZE", 10_000),
  maxQueuedMessages: positive("NOSTR_MAX_QUEUED", 1_000),
}).pipe(
  Config.map(
    ({ initialReconnectDelay, maxReconnectDelay, seenCacheSize, maxQueuedMessages }) => ({
      seenCacheSize,
      relaySession: { initialReconnectDelay, maxReconnectDelay, maxQueuedMessages },
    })
  )
)

/**
 * Read pool settings through the current ConfigProvider (environment by default)
 */
export const loadRelayPoolConfig: Effect.Effect<RelayPoolConfig, ConfigError.ConfigError> =
  Effect.gen(function* () {
    const config = yield* RelayPoolEnvConfig
    yield* Effect.logDebug(
      `Relay pool config: reconnect ${config.relaySession?.initialReconnectDelay}ms..${config.relaySession?.maxReconnectDelay}ms`
    )
    return config
  })
