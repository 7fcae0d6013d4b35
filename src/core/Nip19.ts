/**
 * NIP-19: bech32-encoded keys and ids
 *
 * Encodes and decodes `npub`, `nsec` and `note` entities in human-readable bech32 format.
 * @see https://github.com/nostr-protocol/nips/blob/master/19.md
 */
import { Effect } from "effect"
import { bech32 } from "@scure/base"
import { hexToBytes, bytesToHex } from "@noble/hashes/utils"
import { EncodingError, DecodingError } from "./Errors.js"
import type { PublicKey, PrivateKey, EventId } from "./Schema.js"

// =============================================================================
// Constants
// =============================================================================

const BECH32_MAX_SIZE = 5000

// Type helper for bech32 decode which expects template literal
type Bech32String = `${string}1${string}`

export type Nip19Prefix = "npub" | "nsec" | "note"

// =============================================================================
// Types
// =============================================================================

/** Union type for all decoded bech32 entities */
export type Nip19Data =
  | { type: "npub"; data: PublicKey }
  | { type: "nsec"; data: PrivateKey }
  | { type: "note"; data: EventId }

const isBech32String = (value: string): value is Bech32String => value.includes("1")

const errorText = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)

// =============================================================================
// Pure Helpers
// =============================================================================

/**
 * Encode 32 bytes of hex under a bech32 prefix (throws on bad input)
 */
export const hexToBech32 = (prefix: Nip19Prefix, hex: string): string => {
  const bytes = hexToBytes(hex)
  if (bytes.length !== 32) {
    throw new Error(`Invalid ${prefix} length: expected 32 bytes, got ${bytes.length}`)
  }
  return bech32.encode(prefix, bech32.toWords(bytes), BECH32_MAX_SIZE)
}

/**
 * Decode a bech32 string carrying 32 bytes (throws on bad input).
 * When `expected` is given the prefix must match it.
 */
export const bech32ToHex = (
  value: string,
  expected?: Nip19Prefix
): { readonly prefix: string; readonly hex: string } => {
  if (!isBech32String(value)) {
    throw new Error("Missing bech32 separator")
  }
  const { prefix, words } = bech32.decode(value, BECH32_MAX_SIZE)
  if (expected !== undefined && prefix !== expected) {
    throw new Error(`Invalid prefix: expected '${expected}', got '${prefix}'`)
  }
  const bytes = bech32.fromWords(words)
  if (bytes.length !== 32) {
    throw new Error(`Invalid decoded length: expected 32 bytes, got ${bytes.length}`)
  }
  return { prefix, hex: bytesToHex(bytes) }
}

// =============================================================================
// Encodings
// =============================================================================

const encodeAs = (prefix: Nip19Prefix, hex: string): Effect.Effect<string, EncodingError> =>
  Effect.try({
    try: () => hexToBech32(prefix, hex),
    catch: (error) => new EncodingError({ message: `Failed to encode ${prefix}: ${errorText(error)}` }),
  })

/**
 * Encode a public key to npub format
 */
export const encodeNpub = (pubkey: PublicKey): Effect.Effect<string, EncodingError> =>
  encodeAs("npub", pubkey)

/**
 * Encode a private key to nsec format
 */
export const encodeNsec = (privkey: PrivateKey): Effect.Effect<string, EncodingError> =>
  encodeAs("nsec", privkey)

/**
 * Encode an event ID to note format
 */
export const encodeNote = (eventId: EventId): Effect.Effect<string, EncodingError> =>
  encodeAs("note", eventId)

// =============================================================================
// Decodings
// =============================================================================

const decodeAs = (prefix: Nip19Prefix, value: string): Effect.Effect<string, DecodingError> =>
  Effect.try({
    try: () => bech32ToHex(value, prefix).hex,
    catch: (error) => new DecodingError({ message: `Failed to decode ${prefix}: ${errorText(error)}` }),
  })

/**
 * Decode an npub to a public key
 */
export const decodeNpub = (npub: string): Effect.Effect<PublicKey, DecodingError> =>
  decodeAs("npub", npub).pipe(Effect.map((hex) => hex as PublicKey))

/**
 * Decode an nsec to a private key
 */
export const decodeNsec = (nsec: string): Effect.Effect<PrivateKey, DecodingError> =>
  decodeAs("nsec", nsec).pipe(Effect.map((hex) => hex as PrivateKey))

/**
 * Decode a note to an event ID
 */
export const decodeNote = (note: string): Effect.Effect<EventId, DecodingError> =>
  decodeAs("note", note).pipe(Effect.map((hex) => hex as EventId))

/**
 * Decode any supported bech32 entity
 */
export const decode = (value: string): Effect.Effect<Nip19Data, DecodingError> =>
  Effect.gen(function* () {
    const decoded = yield* Effect.try({
      try: () => bech32ToHex(value),
      catch: (error) => new DecodingError({ message: `Failed to decode: ${errorText(error)}` }),
    })
    switch (decoded.prefix) {
      case "npub":
        return { type: "npub" as const, data: decoded.hex as PublicKey }
      case "nsec":
        return { type: "nsec" as const, data: decoded.hex as PrivateKey }
      case "note":
        return { type: "note" as const, data: decoded.hex as EventId }
      default:
        return yield* Effect.fail(
          new DecodingError({ message: `Unsupported prefix: ${decoded.prefix}` })
        )
    }
  })
