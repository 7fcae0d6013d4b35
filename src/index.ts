/**
 * nostr-courier
 *
 * A type-safe Nostr relay client built with Effect.
 */

// Core schemas and types
export * from "./core/Schema.js"
export * from "./core/Errors.js"
export * from "./core/Nip19.js"
export * from "./core/Messages.js"
export * from "./core/FilterMatcher.js"
export * from "./core/FilterBuilder.js"
export * from "./core/Metadata.js"
// Event parameter builders under a namespace: their names are generic
export * as EventBuilder from "./core/EventBuilder.js"
export type { Contact } from "./core/EventBuilder.js"

// Services
export * from "./services/CryptoService.js"
export * from "./services/EventService.js"

// Client
export * from "./client/Transport.js"
export * from "./client/RelaySession.js"
export * from "./client/SeenEventCache.js"
export * from "./client/RelayPool.js"
export * from "./client/NostrClient.js"
export * from "./client/Config.js"
