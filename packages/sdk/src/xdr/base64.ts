/**
 * Base64 XDR — the text form envelopes travel in over HTTP.
 */

import { base64ToBytes, bytesToBase64 } from "../encoding.js";
import { fromXdr, toXdr, type XdrType } from "./codec.js";

export function toXdrBase64<T>(type: XdrType<T>, value: T): string {
  return bytesToBase64(toXdr(type, value));
}

export function fromXdrBase64<T>(type: XdrType<T>, text: string): T {
  return fromXdr(type, base64ToBytes(text));
}
