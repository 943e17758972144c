/**
 * Ed25519 primitive provider — keygen, sign, verify on raw bytes.
 *
 * Backed by @noble/ed25519 with @noble/hashes SHA-512 wired in so every call
 * is synchronous. Signatures are deterministic (RFC 8032): same seed and
 * message always give the same 64 bytes.
 *
 * Randomness comes only from crypto.getRandomValues. There is no fallback.
 */

import { etc, getPublicKey, sign, verify } from "@noble/ed25519";
import { sha512 } from "@noble/hashes/sha512";
import { CryptoError } from "./errors.js";

// Configure @noble/ed25519 with SHA-512 (required for the sync API)
etc.sha512Sync = (...msgs: Uint8Array[]) => sha512(etc.concatBytes(...msgs));

export const PUBLIC_KEY_LENGTH = 32;
export const SEED_LENGTH = 32;
export const SIGNATURE_LENGTH = 64;

// ── Key Generation ─────────────────────────────────────────────────

/** Fill `n` bytes from the host's CSPRNG. */
export function secureRandomBytes(n: number): Uint8Array {
  const source = globalThis.crypto;
  if (source === undefined || typeof source.getRandomValues !== "function") {
    throw new CryptoError("no-secure-random", "crypto.getRandomValues is not available");
  }
  return source.getRandomValues(new Uint8Array(n));
}

/**
 * Generate an Ed25519 keypair.
 * Returns raw bytes: { publicKey: 32 bytes, privateKey: 32 bytes (seed) }.
 */
export function generateKeypair(): { publicKey: Uint8Array; privateKey: Uint8Array } {
  const privateKey = secureRandomBytes(SEED_LENGTH);
  return { publicKey: ed25519PublicKey(privateKey), privateKey };
}

/** Derive the 32-byte public key from a 32-byte seed. */
export function ed25519PublicKey(seed: Uint8Array): Uint8Array {
  assertLength(seed, SEED_LENGTH, "invalid-secret-key-length", "seed");
  return getPublicKey(seed);
}

// ── Signing ────────────────────────────────────────────────────────

/**
 * Sign a message with an Ed25519 private key (32-byte seed).
 * Returns a 64-byte signature.
 */
export function ed25519Sign(privateKey: Uint8Array, message: Uint8Array): Uint8Array {
  assertLength(privateKey, SEED_LENGTH, "invalid-secret-key-length", "seed");
  return sign(message, privateKey);
}

// ── Verification ───────────────────────────────────────────────────

/**
 * Verify an Ed25519 signature.
 *
 * A well-formed but wrong signature is `false`; only wrong-sized inputs
 * throw.
 */
export function ed25519Verify(
  publicKey: Uint8Array,
  signature: Uint8Array,
  message: Uint8Array,
): boolean {
  assertLength(publicKey, PUBLIC_KEY_LENGTH, "invalid-public-key-length", "public key");
  assertLength(signature, SIGNATURE_LENGTH, "invalid-signature-length", "signature");
  return verify(signature, message, publicKey);
}

function assertLength(
  bytes: Uint8Array,
  expected: number,
  kind: "invalid-public-key-length" | "invalid-secret-key-length" | "invalid-signature-length",
  what: string,
): void {
  if (bytes.length !== expected) {
    throw new CryptoError(kind, `${what} has an invalid length ${bytes.length}, expected ${expected}`);
  }
}
