/**
 * RFC 4648 base-32, upper-case alphabet, no padding characters.
 *
 * decodeBase32 is strict: lower-case, '=' and any other character outside
 * the alphabet are rejected, and the leftover bits of the final character
 * must be zero so that every byte string has exactly one encoding.
 */

import { StrKeyError } from "./errors.js";

const ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ234567";

export function encodeBase32(bytes: Uint8Array): string {
  let out = "";
  let buffer = 0;
  let bits = 0;
  for (const byte of bytes) {
    buffer = ((buffer << 8) | byte) & 0xffff;
    bits += 8;
    while (bits >= 5) {
      out += ALPHABET.charAt((buffer >> (bits - 5)) & 31);
      bits -= 5;
    }
  }
  if (bits > 0) {
    out += ALPHABET.charAt((buffer << (5 - bits)) & 31);
  }
  return out;
}

export function decodeBase32(text: string): Uint8Array {
  // Lengths that leave 1, 3 or 6 characters in the last 8-char group are
  // never produced by the encoder.
  const rem = text.length % 8;
  if (rem === 1 || rem === 3 || rem === 6) {
    throw new StrKeyError("non-canonical", `base32 length ${text.length} is not canonical`);
  }

  const out = new Uint8Array(Math.floor((text.length * 5) / 8));
  let buffer = 0;
  let bits = 0;
  let pos = 0;
  for (let i = 0; i < text.length; i++) {
    const value = ALPHABET.indexOf(text.charAt(i));
    if (value < 0) {
      throw new StrKeyError("invalid-base32", `invalid base32 character at position ${i}`);
    }
    buffer = ((buffer << 5) | value) & 0xffff;
    bits += 5;
    if (bits >= 8) {
      out[pos++] = (buffer >> (bits - 8)) & 0xff;
      bits -= 8;
    }
  }

  if ((buffer & ((1 << bits) - 1)) !== 0) {
    throw new StrKeyError("non-canonical", "base32 trailing bits are not zero");
  }
  return out;
}
