/**
 * StrKey — versioned, checksummed base-32 text form of raw key material.
 *
 *   text = base32( version ‖ raw ‖ crc16xmodem(version ‖ raw) as u16 LE )
 *
 * The version byte names the role of the key (account, seed, muxed account,
 * pre-auth tx, hashX, signed payload). Its value is fixed by the ledger
 * protocol: (index << 3) so that the first base-32 character spells the role.
 */

import { decodeBase32, encodeBase32 } from "./base32.js";
import { crc16Xmodem } from "./crc16.js";
import { concatBytes } from "./encoding.js";
import { ConstructionError, StrKeyError, XdrDecodeError } from "./errors.js";
import { define, fromXdr, opaque, toXdr, varOpaque } from "./xdr/index.js";

export const VersionByte = {
  ed25519PublicKey: 6 << 3, // G
  ed25519SecretSeed: 18 << 3, // S
  med25519PublicKey: 12 << 3, // M
  preAuthTx: 19 << 3, // T
  sha256Hash: 23 << 3, // X
  signedPayload: 15 << 3, // P
} as const;

export type StrKeyRole = keyof typeof VersionByte;

const ROLES: readonly StrKeyRole[] = [
  "ed25519PublicKey",
  "ed25519SecretSeed",
  "med25519PublicKey",
  "preAuthTx",
  "sha256Hash",
  "signedPayload",
];

const ROLE_BY_VERSION = new Map<number, StrKeyRole>(
  ROLES.map((role) => [VersionByte[role], role]),
);

const SIGNED_PAYLOAD_MAX = 64;

/** Raw byte length accepted for each role. */
function lengthOk(role: StrKeyRole, length: number): boolean {
  switch (role) {
    case "med25519PublicKey":
      return length === 40;
    case "signedPayload":
      // ed25519 ‖ u32 len ‖ payload padded to 4, payload 1..64 bytes
      return length >= 32 + 4 + 4 && length <= 32 + 4 + SIGNED_PAYLOAD_MAX && length % 4 === 0;
    default:
      return length === 32;
  }
}

// ── Generic encode / decode ────────────────────────────────────────

export function encodeCheck(role: StrKeyRole, raw: Uint8Array): string {
  if (!lengthOk(role, raw.length)) {
    throw new ConstructionError(`${role}: ${raw.length} raw bytes is not a valid key length`);
  }
  const body = concatBytes(new Uint8Array([VersionByte[role]]), raw);
  const crc = crc16Xmodem(body);
  return encodeBase32(concatBytes(body, new Uint8Array([crc & 0xff, crc >> 8])));
}

export function decodeCheck(text: string): { role: StrKeyRole; raw: Uint8Array } {
  const bytes = decodeBase32(text);
  if (bytes.length < 3) {
    throw new StrKeyError("invalid-length", `decoded key is only ${bytes.length} bytes`);
  }

  const version = bytes[0];
  const role = ROLE_BY_VERSION.get(version);
  if (role === undefined) {
    throw new StrKeyError("invalid-version", `unknown version byte 0x${version.toString(16)}`);
  }

  const raw = bytes.slice(1, bytes.length - 2);
  if (!lengthOk(role, raw.length)) {
    throw new StrKeyError("invalid-length", `${role}: ${raw.length} raw bytes is not a valid key length`);
  }

  const expected = crc16Xmodem(bytes.subarray(0, bytes.length - 2));
  const found = bytes[bytes.length - 2] | (bytes[bytes.length - 1] << 8);
  if (expected !== found) {
    throw new StrKeyError(
      "checksum-mismatch",
      `checksum ${found} in the encoding is invalid, expected ${expected}`,
    );
  }

  return { role, raw };
}

function decodeAs(role: StrKeyRole, text: string): Uint8Array {
  const decoded = decodeCheck(text);
  if (decoded.role !== role) {
    throw new StrKeyError("invalid-version", `expected a ${role} key, found ${decoded.role}`);
  }
  return decoded.raw;
}

function isValidAs(role: StrKeyRole, text: string): boolean {
  try {
    decodeAs(role, text);
    return true;
  } catch (err) {
    if (err instanceof StrKeyError) return false;
    throw err;
  }
}

// ── Signed payload layout ──────────────────────────────────────────

export interface SignedPayloadKey {
  ed25519: Uint8Array;
  payload: Uint8Array;
}

const SignedPayloadLayout = define<SignedPayloadKey>(
  "SignedPayload",
  (v, w) => {
    opaque(32).write(v.ed25519, w);
    varOpaque(SIGNED_PAYLOAD_MAX).write(v.payload, w);
  },
  (r) => ({
    ed25519: opaque(32).read(r),
    payload: varOpaque(SIGNED_PAYLOAD_MAX).read(r),
  }),
);

// ── Role-specific facade ───────────────────────────────────────────

export const StrKey = {
  encodeEd25519PublicKey: (raw: Uint8Array): string => encodeCheck("ed25519PublicKey", raw),
  decodeEd25519PublicKey: (text: string): Uint8Array => decodeAs("ed25519PublicKey", text),
  isValidEd25519PublicKey: (text: string): boolean => isValidAs("ed25519PublicKey", text),

  encodeEd25519SecretSeed: (raw: Uint8Array): string => encodeCheck("ed25519SecretSeed", raw),
  decodeEd25519SecretSeed: (text: string): Uint8Array => decodeAs("ed25519SecretSeed", text),
  isValidEd25519SecretSeed: (text: string): boolean => isValidAs("ed25519SecretSeed", text),

  encodePreAuthTx: (raw: Uint8Array): string => encodeCheck("preAuthTx", raw),
  decodePreAuthTx: (text: string): Uint8Array => decodeAs("preAuthTx", text),

  encodeSha256Hash: (raw: Uint8Array): string => encodeCheck("sha256Hash", raw),
  decodeSha256Hash: (text: string): Uint8Array => decodeAs("sha256Hash", text),

  /** M-address: ed25519 key ‖ u64 id (big-endian). */
  encodeMuxedAccount(ed25519: Uint8Array, id: bigint): string {
    if (ed25519.length !== 32) {
      throw new ConstructionError(`muxed account key must be 32 bytes, got ${ed25519.length}`);
    }
    if (id < 0n || id >= 2n ** 64n) {
      throw new ConstructionError(`muxed account id out of range: ${id}`);
    }
    const idBytes = new Uint8Array(8);
    new DataView(idBytes.buffer).setBigUint64(0, id, false);
    return encodeCheck("med25519PublicKey", concatBytes(ed25519, idBytes));
  },
  decodeMuxedAccount(text: string): { ed25519: Uint8Array; id: bigint } {
    const raw = decodeAs("med25519PublicKey", text);
    const id = new DataView(raw.buffer, raw.byteOffset + 32, 8).getBigUint64(0, false);
    return { ed25519: raw.slice(0, 32), id };
  },
  isValidMuxedAccount: (text: string): boolean => isValidAs("med25519PublicKey", text),

  encodeSignedPayload(key: SignedPayloadKey): string {
    if (key.payload.length === 0) {
      throw new ConstructionError("signed payload must not be empty");
    }
    return encodeCheck("signedPayload", toXdr(SignedPayloadLayout, key));
  },
  decodeSignedPayload(text: string): SignedPayloadKey {
    const raw = decodeAs("signedPayload", text);
    try {
      return fromXdr(SignedPayloadLayout, raw);
    } catch (err) {
      if (err instanceof XdrDecodeError) {
        throw new StrKeyError("invalid-length", `signed payload layout: ${err.message}`);
      }
      throw err;
    }
  },
};
