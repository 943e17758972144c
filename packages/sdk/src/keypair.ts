/**
 * Keypair — an account's signing identity.
 *
 * Two capabilities, two classes:
 *   Keypair         public key only: verify, hint, addresses
 *   SigningKeypair  adds the seed: sign, secret
 *
 * Code that signs takes a SigningKeypair, so handing it a verify-only
 * identity is a type error. Callers holding a plain Keypair narrow with
 * canSign() or requireSigning().
 *
 * Both are immutable. The seed lives in a private field of the
 * SigningKeypair that owns it and is only handed out as a fresh copy.
 */

import {
  ed25519PublicKey,
  ed25519Sign,
  ed25519Verify,
  generateKeypair,
  PUBLIC_KEY_LENGTH,
  SEED_LENGTH,
} from "./ed25519.js";
import { CapabilityError, CryptoError } from "./errors.js";
import { sha256 } from "./hash.js";
import { copyBytes, utf8 } from "./encoding.js";
import { StrKey } from "./strkey.js";
import type { AccountId, MuxedAccount } from "./types/keys.js";

export class Keypair {
  protected readonly pub: Uint8Array;

  protected constructor(publicKey: Uint8Array) {
    if (publicKey.length !== PUBLIC_KEY_LENGTH) {
      throw new CryptoError(
        "invalid-public-key-length",
        `public key has an invalid length ${publicKey.length}, expected ${PUBLIC_KEY_LENGTH}`,
      );
    }
    this.pub = copyBytes(publicKey);
  }

  /** Verify-only keypair from a G... address. */
  static fromPublicKey(accountId: string): Keypair {
    return new Keypair(StrKey.decodeEd25519PublicKey(accountId));
  }

  /** Verify-only keypair from 32 raw public-key bytes. */
  static fromRawPublicKey(publicKey: Uint8Array): Keypair {
    return new Keypair(publicKey);
  }

  canSign(): this is SigningKeypair {
    return false;
  }

  rawPublicKey(): Uint8Array {
    return this.pub.slice();
  }

  /** G... address. */
  publicKey(): string {
    return StrKey.encodeEd25519PublicKey(this.pub);
  }

  /** Last 4 bytes of the public key. */
  hint(): Uint8Array {
    return this.pub.slice(PUBLIC_KEY_LENGTH - 4);
  }

  xdrAccountId(): AccountId {
    return { type: "ed25519", ed25519: this.pub.slice() };
  }

  xdrMuxedAccount(id?: bigint): MuxedAccount {
    if (id === undefined) return { type: "ed25519", ed25519: this.pub.slice() };
    return { type: "muxedEd25519", id, ed25519: this.pub.slice() };
  }

  verify(message: Uint8Array, signature: Uint8Array): boolean {
    return ed25519Verify(this.pub, signature, message);
  }

  equals(other: Keypair): boolean {
    return this.publicKey() === other.publicKey();
  }
}

export class SigningKeypair extends Keypair {
  private readonly seed: Uint8Array;

  private constructor(seed: Uint8Array) {
    super(ed25519PublicKey(seed));
    this.seed = copyBytes(seed);
  }

  /** From an S... secret seed. */
  static fromSecret(secret: string): SigningKeypair {
    return new SigningKeypair(StrKey.decodeEd25519SecretSeed(secret));
  }

  /** From a 32-byte raw seed. */
  static fromRawSeed(seed: Uint8Array): SigningKeypair {
    if (seed.length !== SEED_LENGTH) {
      throw new CryptoError(
        "invalid-secret-key-length",
        `seed has an invalid length ${seed.length}, expected ${SEED_LENGTH}`,
      );
    }
    return new SigningKeypair(seed);
  }

  /** Fresh keypair from the host CSPRNG. */
  static random(): SigningKeypair {
    return new SigningKeypair(generateKeypair().privateKey);
  }

  /**
   * Deterministic keypair with seed = SHA-256(passphrase). This is how a
   * network's root account is derived; also handy for fixtures.
   */
  static fromPassphrase(passphrase: string): SigningKeypair {
    return new SigningKeypair(sha256(utf8(passphrase)));
  }

  override canSign(): this is SigningKeypair {
    return true;
  }

  /** S... secret seed. */
  secret(): string {
    return StrKey.encodeEd25519SecretSeed(this.seed);
  }

  rawSecretKey(): Uint8Array {
    return this.seed.slice();
  }

  /** Detached 64-byte signature over `message`. */
  sign(message: Uint8Array): Uint8Array {
    return ed25519Sign(this.seed, message);
  }

  /** Verify-only view of this identity (drops the seed). */
  toPublic(): Keypair {
    return Keypair.fromRawPublicKey(this.pub);
  }
}

/** Narrow a dynamically held keypair to its signing capability. */
export function requireSigning(keypair: Keypair): SigningKeypair {
  if (!keypair.canSign()) {
    throw new CapabilityError(`keypair ${keypair.publicKey()} is verify-only and cannot sign`);
  }
  return keypair;
}
