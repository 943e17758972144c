/**
 * Byte ↔ text helpers shared across the SDK.
 *
 * Base64 uses no btoa/atob or Buffer, so the core needs no host globals
 * beyond TextEncoder. Hex comes from @noble/hashes.
 */

import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { XdrDecodeError } from "./errors.js";

export const toHex = bytesToHex;
export const fromHex = hexToBytes;

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder();

export function utf8(text: string): Uint8Array {
  return utf8Encoder.encode(text);
}

/** Lossy for non-UTF-8 bytes; display only. */
export function fromUtf8(bytes: Uint8Array): string {
  return utf8Decoder.decode(bytes);
}

export function concatBytes(...arrays: Uint8Array[]): Uint8Array {
  const totalLen = arrays.reduce((sum, a) => sum + a.length, 0);
  const result = new Uint8Array(totalLen);
  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * Copy into a fresh, unshared Uint8Array. Buffer.prototype.slice returns a
 * view, so `.slice()` alone does not copy a Node Buffer.
 */
export function copyBytes(bytes: Uint8Array, start?: number, end?: number): Uint8Array {
  return Uint8Array.prototype.slice.call(bytes, start, end);
}

// ── Base64 (RFC 4648, padded) ──────────────────────────────────────

const B64 =
  "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789+/";

export function bytesToBase64(bytes: Uint8Array): string {
  let result = "";
  for (let i = 0; i < bytes.length; i += 3) {
    const a = bytes[i] ?? 0;
    const b = bytes[i + 1] ?? 0;
    const c = bytes[i + 2] ?? 0;
    result += B64.charAt(a >> 2);
    result += B64.charAt(((a & 3) << 4) | (b >> 4));
    if (i + 1 < bytes.length) result += B64.charAt(((b & 15) << 2) | (c >> 6));
    else result += "=";
    if (i + 2 < bytes.length) result += B64.charAt(c & 63);
    else result += "=";
  }
  return result;
}

function b64Index(text: string, i: number): number {
  const idx = B64.indexOf(text.charAt(i));
  if (idx < 0) {
    throw new XdrDecodeError("invalid-base64", `invalid base64 character '${text.charAt(i)}'`, i);
  }
  return idx;
}

export function base64ToBytes(b64: string): Uint8Array {
  const text = b64.trim();
  if (text.length % 4 !== 0) {
    throw new XdrDecodeError("invalid-base64", "base64 length is not a multiple of 4", text.length);
  }
  const clean = text.replace(/={1,2}$/, "");
  const bytes: number[] = [];
  for (let i = 0; i < clean.length; i += 4) {
    const a = b64Index(clean, i);
    const b = b64Index(clean, i + 1);
    const c = i + 2 < clean.length ? b64Index(clean, i + 2) : 0;
    const d = i + 3 < clean.length ? b64Index(clean, i + 3) : 0;
    bytes.push((a << 2) | (b >> 4));
    if (i + 2 < clean.length) bytes.push(((b & 15) << 4) | (c >> 2));
    if (i + 3 < clean.length) bytes.push(((c & 3) << 6) | d);
  }
  // The last character of a padded group carries bits past the data; they must be zero.
  const rest = clean.length % 4;
  const last = rest === 0 ? 0 : b64Index(clean, clean.length - 1);
  if ((rest === 2 && (last & 15) !== 0) || (rest === 3 && (last & 3) !== 0)) {
    throw new XdrDecodeError(
      "invalid-base64",
      "base64 has non-zero bits after the last byte",
      clean.length - 1,
    );
  }
  return new Uint8Array(bytes);
}
