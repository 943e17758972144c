/**
 * Error taxonomy for the SDK core.
 *
 * Every failure the core can produce is one of these classes. Nothing is
 * logged or swallowed here; callers decide what a rejected input means.
 *
 *   XdrDecodeError     — malformed wire bytes (recoverable: reject the input)
 *   ConstructionError  — caller tried to build a value outside its static bounds
 *   StrKeyError        — malformed / corrupted textual key material
 *   CryptoError        — wrong-sized key or signature bytes, no secure RNG
 *   CapabilityError    — signing requested from a verify-only identity
 */

export class LedgerKitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// ── Decode ─────────────────────────────────────────────────────────

export type XdrDecodeErrorKind =
  | "truncated"
  | "length-exceeds-max"
  | "length-exceeds-input"
  | "invalid-discriminant"
  | "invalid-padding"
  | "invalid-flag"
  | "trailing-bytes"
  | "depth-exceeded"
  | "invalid-base64";

export class XdrDecodeError extends LedgerKitError {
  constructor(
    readonly kind: XdrDecodeErrorKind,
    message: string,
    /** Byte offset in the input where decoding failed. */
    readonly offset: number,
  ) {
    super(`${message} (at byte ${offset})`);
  }
}

// ── Construction ───────────────────────────────────────────────────

export class ConstructionError extends LedgerKitError {}

// ── StrKey ─────────────────────────────────────────────────────────

export type StrKeyErrorKind =
  | "invalid-base32"
  | "non-canonical"
  | "invalid-length"
  | "invalid-version"
  | "checksum-mismatch";

export class StrKeyError extends LedgerKitError {
  constructor(
    readonly kind: StrKeyErrorKind,
    message: string,
  ) {
    super(message);
  }
}

// ── Crypto ─────────────────────────────────────────────────────────

export type CryptoErrorKind =
  | "invalid-public-key-length"
  | "invalid-secret-key-length"
  | "invalid-signature-length"
  | "no-secure-random";

export class CryptoError extends LedgerKitError {
  constructor(
    readonly kind: CryptoErrorKind,
    message: string,
  ) {
    super(message);
  }
}

export class CapabilityError extends LedgerKitError {}
