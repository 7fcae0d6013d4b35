import { describe, expect, test } from "vitest"
import { Effect, Either } from "effect"
import { CryptoService, CryptoServiceLive, deriveKeys, verifySignature } from "./CryptoService.js"
import { PrivateKey } from "../core/Schema.js"

const runWithCrypto = <A, E>(effect: Effect.Effect<A, E, CryptoService>): Promise<A> =>
  Effect.runPromise(Effect.provide(effect, CryptoServiceLive))

const SECRET_ONE = "0000000000000000000000000000000000000000000000000000000000000001"
const PUBKEY_ONE = "79be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798"
const SECRET_THREE = "0000000000000000000000000000000000000000000000000000000000000003"
const PUBKEY_THREE = "f9308a019258c31049344f85f89d5229b531c845836f99b08601f113bce036f9"
const ZERO_DIGEST = "0".repeat(64)
const CURVE_ORDER = "fffffffffffffffffffffffffffffffebaaedce6af48a03bbfd25e8cd0364141"

describe("CryptoService", () => {
  describe("generatePrivateKey", () => {
    test("generates valid 64-char hex private key", async () => {
      const privateKey = await runWithCrypto(
        Effect.flatMap(CryptoService, (s) => s.generatePrivateKey())
      )
      expect(privateKey).toMatch(/^[a-f0-9]{64}$/)
    })

    test("generates unique keys", async () => {
      const [key1, key2] = await runWithCrypto(
        Effect.all([
          Effect.flatMap(CryptoService, (s) => s.generatePrivateKey()),
          Effect.flatMap(CryptoService, (s) => s.generatePrivateKey()),
        ])
      )
      expect(key1).not.toBe(key2)
    })
  })

  describe("generateKeys", () => {
    test("public key is derived from the secret key", async () => {
      const { keys, derived } = await runWithCrypto(
        Effect.gen(function* () {
          const crypto = yield* CryptoService
          const keys = yield* crypto.generateKeys()
          const derived = yield* crypto.getPublicKey(keys.secretKey)
          return { keys, derived }
        })
      )
      expect(keys.publicKey).toBe(derived)
    })
  })

  describe("keysFromSecret", () => {
    test("derives the generator point for secret 1", async () => {
      const keys = await runWithCrypto(
        Effect.flatMap(CryptoService, (s) => s.keysFromSecret(SECRET_ONE))
      )
      expect(keys.secretKey).toBe(SECRET_ONE)
      expect(keys.publicKey).toBe(PUBKEY_ONE)
    })

    test("accepts raw bytes, uppercase hex and nsec", async () => {
      const bytes = new Uint8Array(32)
      bytes[31] = 1
      const results = await runWithCrypto(
        Effect.flatMap(CryptoService, (s) =>
          Effect.all([
            s.keysFromSecret(bytes),
            s.keysFromSecret(SECRET_ONE.toUpperCase()),
            s.keysFromSecret("nsec1qqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqsmhltgl"),
          ])
        )
      )
      for (const keys of results) {
        expect(keys.secretKey).toBe(SECRET_ONE)
        expect(keys.publicKey).toBe(PUBKEY_ONE)
      }
    })

    test.each([
      ["zero", "0".repeat(64)],
      ["curve order", CURVE_ORDER],
      ["short hex", "01"],
      ["not hex", "z".repeat(64)],
      ["npub instead of nsec", "npub10xlxvlhemja6c4dqv22uapctqupfhlxm9h8z3k2e72q4k9hcz7vqpkge6d"],
    ])("rejects %s", async (_label, secret) => {
      const result = await runWithCrypto(
        Effect.flatMap(CryptoService, (s) => Effect.either(s.keysFromSecret(secret)))
      )
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left._tag).toBe("InvalidPrivateKey")
      }
    })

    test("rejects 31 raw bytes", () => {
      expect(() => deriveKeys(new Uint8Array(31).fill(1))).toThrow()
    })
  })

  describe("sign and verify", () => {
    test("matches the BIP-340 reference signature for secret 3", async () => {
      const { publicKey, signature } = await runWithCrypto(
        Effect.gen(function* () {
          const crypto = yield* CryptoService
          const privateKey = PrivateKey.make(SECRET_THREE)
          const publicKey = yield* crypto.getPublicKey(privateKey)
          const signature = yield* crypto.sign(ZERO_DIGEST, privateKey)
          return { publicKey, signature }
        })
      )
      expect(publicKey).toBe(PUBKEY_THREE)
      expect(signature).toBe(
        "e907831f80848d1069a5371b402410364bdf1c5f8307b0084c55f1ce2dca8215" +
          "25f66a4a85ea8b71e482a74f382d2ce5ebeee8fdb2172f477df4900d310536c0"
      )
    })

    test("signing is deterministic", async () => {
      const [sig1, sig2] = await runWithCrypto(
        Effect.gen(function* () {
          const crypto = yield* CryptoService
          const privateKey = yield* crypto.generatePrivateKey()
          const digest = yield* crypto.hash("same message")
          return [yield* crypto.sign(digest, privateKey), yield* crypto.sign(digest, privateKey)]
        })
      )
      expect(sig1).toBe(sig2)
    })

    test("signs message and verifies signature", async () => {
      const isValid = await runWithCrypto(
        Effect.gen(function* () {
          const crypto = yield* CryptoService
          const keys = yield* crypto.generateKeys()
          const digest = yield* crypto.hash("test message")
          const signature = yield* crypto.sign(digest, keys.secretKey)
          return yield* crypto.verify(signature, digest, keys.publicKey)
        })
      )
      expect(isValid).toBe(true)
    })

    test("rejects signature from a different key", async () => {
      const isValid = await runWithCrypto(
        Effect.gen(function* () {
          const crypto = yield* CryptoService
          const signer = yield* crypto.generateKeys()
          const other = yield* crypto.generateKeys()
          const digest = yield* crypto.hash("test message")
          const signature = yield* crypto.sign(digest, signer.secretKey)
          return yield* crypto.verify(signature, digest, other.publicKey)
        })
      )
      expect(isValid).toBe(false)
    })

    test("rejects signature over a different digest", async () => {
      const isValid = await runWithCrypto(
        Effect.gen(function* () {
          const crypto = yield* CryptoService
          const keys = yield* crypto.generateKeys()
          const signature = yield* crypto.sign(yield* crypto.hash("original"), keys.secretKey)
          return yield* crypto.verify(signature, yield* crypto.hash("tampered"), keys.publicKey)
        })
      )
      expect(isValid).toBe(false)
    })

    test("malformed input verifies as false instead of failing", () => {
      expect(verifySignature("abc", ZERO_DIGEST, PUBKEY_ONE)).toBe(false)
      expect(verifySignature("0".repeat(128), ZERO_DIGEST, "not-a-key")).toBe(false)
    })
  })

  describe("hash", () => {
    test("produces the SHA-256 hex digest", async () => {
      const hash = await runWithCrypto(Effect.flatMap(CryptoService, (s) => s.hash("abc")))
      expect(hash).toBe("ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad")
    })
  })
})
