/**
 * CryptoService
 *
 * Schnorr signing (BIP-340), key generation, and hashing for Nostr events.
 * Uses @noble/curves for secp256k1 and @noble/hashes for SHA256.
 */
import { Context, Effect, Layer } from "effect"
import { schnorr, secp256k1 } from "@noble/curves/secp256k1"
import { sha256 } from "@noble/hashes/sha256"
import { bytesToHex, hexToBytes } from "@noble/hashes/utils"
import { CryptoError, InvalidPrivateKey } from "../core/Errors.js"
import { bech32ToHex } from "../core/Nip19.js"
import type { EventId, PrivateKey, PublicKey, Signature } from "../core/Schema.js"

// =============================================================================
// Types
// =============================================================================

/** An immutable secp256k1 keypair; the public identity is the x-only key */
export interface Keys {
  readonly secretKey: PrivateKey
  readonly publicKey: PublicKey
}

/**
 * Auxiliary randomness fed to BIP-340 signing.
 * Fixed to zero so that a (key, digest) pair always yields the same signature.
 */
const ZERO_AUX = new Uint8Array(32)

// =============================================================================
// Service Interface
// =============================================================================

export interface CryptoService {
  readonly _tag: "CryptoService"

  /**
   * Generate a random private key
   */
  generatePrivateKey(): Effect.Effect<PrivateKey, CryptoError>

  /**
   * Generate a fresh keypair from a secure random source
   */
  generateKeys(): Effect.Effect<Keys, CryptoError>

  /**
   * Build a keypair from 32 raw bytes, 64 hex characters or an `nsec` string
   */
  keysFromSecret(secret: Uint8Array | string): Effect.Effect<Keys, InvalidPrivateKey>

  /**
   * Derive the x-only public key from a private key
   */
  getPublicKey(privateKey: PrivateKey): Effect.Effect<PublicKey, InvalidPrivateKey>

  /**
   * Sign a 32-byte hex digest with a private key (deterministic Schnorr signature)
   */
  sign(
    message: string,
    privateKey: PrivateKey
  ): Effect.Effect<Signature, CryptoError | InvalidPrivateKey>

  /**
   * Verify a Schnorr signature. Malformed input verifies as `false`.
   */
  verify(signature: string, message: string, publicKey: string): Effect.Effect<boolean>

  /**
   * Compute SHA256 hash of a message (for event ID)
   */
  hash(message: string): Effect.Effect<EventId, CryptoError>
}

// =============================================================================
// Service Tag
// =============================================================================

export const CryptoService = Context.GenericTag<CryptoService>("CryptoService")

// =============================================================================
// Pure Functions
// =============================================================================

const HEX_64 = /^[0-9a-fA-F]{64}$/

const secretBytes = (secret: Uint8Array | string): Uint8Array => {
  if (typeof secret !== "string") return secret
  if (HEX_64.test(secret)) return hexToBytes(secret.toLowerCase())
  return hexToBytes(bech32ToHex(secret, "nsec").hex)
}

/**
 * Validate secret key material and derive its keypair (pure function)
 */
export const deriveKeys = (secret: Uint8Array | string): Keys => {
  const bytes = secretBytes(secret)
  if (bytes.length !== 32 || !secp256k1.utils.isValidPrivateKey(bytes)) {
    throw new Error("not a valid secp256k1 scalar")
  }
  return {
    secretKey: bytesToHex(bytes) as PrivateKey,
    publicKey: bytesToHex(schnorr.getPublicKey(bytes)) as PublicKey,
  }
}

/**
 * Verify a Schnorr signature over a hex digest (pure function)
 */
export const verifySignature = (signature: string, message: string, publicKey: string): boolean => {
  try {
    return schnorr.verify(hexToBytes(signature), hexToBytes(message), hexToBytes(publicKey))
  } catch {
    return false
  }
}

// =============================================================================
// Service Implementation
// =============================================================================

const make: CryptoService = {
  _tag: "CryptoService",

  generatePrivateKey: () =>
    Effect.try({
      try: () => {
        const privateKeyBytes = schnorr.utils.randomPrivateKey()
        return bytesToHex(privateKeyBytes) as PrivateKey
      },
      catch: (error) =>
        new CryptoError({
          message: `Failed to generate private key: ${error}`,
          operation: "generateKey",
        }),
    }),

  generateKeys: () =>
    Effect.try({
      try: () => deriveKeys(schnorr.utils.randomPrivateKey()),
      catch: (error) =>
        new CryptoError({
          message: `Failed to generate keys: ${error}`,
          operation: "generateKey",
        }),
    }),

  keysFromSecret: (secret) =>
    Effect.try({
      try: () => deriveKeys(secret),
      catch: (error) =>
        new InvalidPrivateKey({
          message: `Invalid secret key: ${error instanceof Error ? error.message : String(error)}`,
        }),
    }),

  getPublicKey: (privateKey) =>
    Effect.try({
      try: () => deriveKeys(privateKey).publicKey,
      catch: (error) =>
        new InvalidPrivateKey({
          message: `Failed to derive public key: ${error}`,
        }),
    }),

  sign: (message, privateKey) =>
    Effect.gen(function* () {
      const keys = yield* make.keysFromSecret(privateKey)
      return yield* Effect.try({
        try: () => {
          const signatureBytes = schnorr.sign(hexToBytes(message), hexToBytes(keys.secretKey), ZERO_AUX)
          return bytesToHex(signatureBytes) as Signature
        },
        catch: (error) =>
          new CryptoError({
            message: `Failed to sign message: ${error}`,
            operation: "sign",
          }),
      })
    }),

  verify: (signature, message, publicKey) =>
    Effect.sync(() => verifySignature(signature, message, publicKey)),

  hash: (message) =>
    Effect.try({
      try: () => {
        const messageBytes = new TextEncoder().encode(message)
        const hashBytes = sha256(messageBytes)
        return bytesToHex(hashBytes) as EventId
      },
      catch: (error) =>
        new CryptoError({
          message: `Failed to hash message: ${error}`,
          operation: "hash",
        }),
    }),
}

// =============================================================================
// Service Layer
// =============================================================================

export const CryptoServiceLive = Layer.succeed(CryptoService, make)
