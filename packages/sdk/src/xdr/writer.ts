/**
 * XdrWriter — append-only big-endian byte sink.
 *
 * Every write leaves the buffer length at a multiple of 4: variable-length
 * opaque data is followed by zero padding up to the next word boundary.
 */

import { ConstructionError } from "../errors.js";

const INITIAL_CAPACITY = 256;

const INT32_MIN = -0x8000_0000;
const INT32_MAX = 0x7fff_ffff;
const UINT32_MAX = 0xffff_ffff;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const UINT64_MAX = 2n ** 64n - 1n;

export class XdrWriter {
  private buf = new Uint8Array(INITIAL_CAPACITY);
  private view = new DataView(this.buf.buffer);
  private length = 0;

  /** Number of bytes written so far. */
  get size(): number {
    return this.length;
  }

  private reserve(n: number): void {
    const needed = this.length + n;
    if (needed <= this.buf.length) return;
    let capacity = this.buf.length * 2;
    while (capacity < needed) capacity *= 2;
    const next = new Uint8Array(capacity);
    next.set(this.buf.subarray(0, this.length));
    this.buf = next;
    this.view = new DataView(next.buffer);
  }

  writeInt32(value: number): void {
    if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
      throw new ConstructionError(`int32 out of range: ${value}`);
    }
    this.reserve(4);
    this.view.setInt32(this.length, value, false);
    this.length += 4;
  }

  writeUint32(value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > UINT32_MAX) {
      throw new ConstructionError(`uint32 out of range: ${value}`);
    }
    this.reserve(4);
    this.view.setUint32(this.length, value, false);
    this.length += 4;
  }

  writeInt64(value: bigint): void {
    if (value < INT64_MIN || value > INT64_MAX) {
      throw new ConstructionError(`int64 out of range: ${value}`);
    }
    this.reserve(8);
    this.view.setBigInt64(this.length, value, false);
    this.length += 8;
  }

  writeUint64(value: bigint): void {
    if (value < 0n || value > UINT64_MAX) {
      throw new ConstructionError(`uint64 out of range: ${value}`);
    }
    this.reserve(8);
    this.view.setBigUint64(this.length, value, false);
    this.length += 8;
  }

  /** Raw bytes followed by zero padding to a 4-byte boundary. */
  writePadded(bytes: Uint8Array): void {
    const padding = (4 - (bytes.length % 4)) % 4;
    this.reserve(bytes.length + padding);
    this.buf.set(bytes, this.length);
    this.length += bytes.length;
    this.buf.fill(0, this.length, this.length + padding);
    this.length += padding;
  }

  /** Copy of the written bytes. */
  toBytes(): Uint8Array {
    return this.buf.slice(0, this.length);
  }
}
