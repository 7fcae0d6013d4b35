/**
 * Tests for NIP-19 bech32 encoding/decoding
 */
import { describe, expect, test } from "vitest"
import { Effect, Either } from "effect"
import { bech32 } from "@scure/base"
import { hexToBytes } from "@noble/hashes/utils"
import {
  bech32ToHex,
  decode,
  decodeNote,
  decodeNpub,
  decodeNsec,
  encodeNote,
  encodeNpub,
  encodeNsec,
  hexToBech32,
} from "./Nip19.js"
import { EventId, PrivateKey, PublicKey } from "./Schema.js"

const PUBKEY = PublicKey.make("79be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798")
const NPUB = "npub10xlxvlhemja6c4dqv22uapctqupfhlxm9h8z3k2e72q4k9hcz7vqpkge6d"

const PRIVKEY = PrivateKey.make("0000000000000000000000000000000000000000000000000000000000000001")
const NSEC = "nsec1qqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqsmhltgl"

const NOTE_ID = EventId.make("bde202ea7642ff9910600c7edc948a1f4220f0cbf5e4fb2b7efafa681bbb5285")
const NOTE = "note1hh3q96nkgtlejyrqp3lde9y2rapzpuxt7hj0k2m7ltaxsxam22zsklnttc"

describe("NIP-19 bech32 encoding", () => {
  test("encodes keys and ids", async () => {
    const [npub, nsec, note] = await Effect.runPromise(
      Effect.all([encodeNpub(PUBKEY), encodeNsec(PRIVKEY), encodeNote(NOTE_ID)])
    )
    expect(npub).toBe(NPUB)
    expect(nsec).toBe(NSEC)
    expect(note).toBe(NOTE)
  })

  test("decodes keys and ids", async () => {
    const [pubkey, privkey, id] = await Effect.runPromise(
      Effect.all([decodeNpub(NPUB), decodeNsec(NSEC), decodeNote(NOTE)])
    )
    expect(pubkey).toBe(PUBKEY)
    expect(privkey).toBe(PRIVKEY)
    expect(id).toBe(NOTE_ID)
  })

  test("decode reports the entity type", async () => {
    const decoded = await Effect.runPromise(Effect.all([decode(NPUB), decode(NSEC), decode(NOTE)]))
    expect(decoded).toEqual([
      { type: "npub", data: PUBKEY },
      { type: "nsec", data: PRIVKEY },
      { type: "note", data: NOTE_ID },
    ])
  })

  test("typed decoders reject the wrong prefix", async () => {
    const result = await Effect.runPromise(Effect.either(decodeNpub(NSEC)))
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe("DecodingError")
      expect(result.left.message).toBe("Failed to decode npub: Invalid prefix: expected 'npub', got 'nsec'")
    }
  })

  test("rejects a corrupted checksum", async () => {
    const corrupted = NPUB.slice(0, -1) + (NPUB.endsWith("d") ? "e" : "d")
    const result = await Effect.runPromise(Effect.either(decode(corrupted)))
    expect(Either.isLeft(result) && result.left._tag).toBe("DecodingError")
  })

  test("rejects a string without separator", async () => {
    const result = await Effect.runPromise(Effect.either(decode("nothing-here")))
    expect(Either.isLeft(result) && result.left.message).toBe(
      "Failed to decode: Missing bech32 separator"
    )
  })

  test("rejects an unsupported prefix", async () => {
    const nrelay = bech32.encode("nrelay", bech32.toWords(hexToBytes(NOTE_ID)))
    const result = await Effect.runPromise(Effect.either(decode(nrelay)))
    expect(Either.isLeft(result) && result.left.message).toBe("Unsupported prefix: nrelay")
  })

  test("encoding fails for data that is not 32 bytes", () => {
    expect(() => hexToBech32("note", "ab".repeat(31))).toThrow(
      "Invalid note length: expected 32 bytes, got 31"
    )
  })

  test("pure helpers round-trip", () => {
    expect(bech32ToHex(hexToBech32("npub", PUBKEY))).toEqual({ prefix: "npub", hex: PUBKEY })
  })
})
