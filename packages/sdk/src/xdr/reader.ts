/**
 * XdrReader — bounds-checked cursor over untrusted input.
 *
 * Every read validates against the remaining input before touching it, so a
 * malformed buffer always ends in an XdrDecodeError, never an out-of-range
 * access. The reader carries a nesting counter for recursive shapes.
 */

import { copyBytes } from "../encoding.js";
import { XdrDecodeError, type XdrDecodeErrorKind } from "../errors.js";

export class XdrReader {
  private readonly view: DataView;
  private pos = 0;
  private depth = 0;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get offset(): number {
    return this.pos;
  }

  get remaining(): number {
    return this.bytes.length - this.pos;
  }

  fail(kind: XdrDecodeErrorKind, message: string): never {
    throw new XdrDecodeError(kind, message, this.pos);
  }

  private need(n: number, what: string): void {
    if (this.remaining < n) {
      this.fail("truncated", `${what}: need ${n} bytes, ${this.remaining} left`);
    }
  }

  readInt32(): number {
    this.need(4, "int32");
    const v = this.view.getInt32(this.pos, false);
    this.pos += 4;
    return v;
  }

  readUint32(): number {
    this.need(4, "uint32");
    const v = this.view.getUint32(this.pos, false);
    this.pos += 4;
    return v;
  }

  readInt64(): bigint {
    this.need(8, "int64");
    const v = this.view.getBigInt64(this.pos, false);
    this.pos += 8;
    return v;
  }

  readUint64(): bigint {
    this.need(8, "uint64");
    const v = this.view.getBigUint64(this.pos, false);
    this.pos += 8;
    return v;
  }

  /**
   * Read a length prefix and check it against the type maximum and the
   * bytes actually left. `unit` is the minimum encoded size of one element.
   */
  readLength(max: number, what: string, unit = 1): number {
    const start = this.pos;
    const len = this.readUint32();
    if (len > max) {
      throw new XdrDecodeError(
        "length-exceeds-max",
        `${what}: length ${len} exceeds maximum ${max}`,
        start,
      );
    }
    if (len * unit > this.remaining) {
      throw new XdrDecodeError(
        "length-exceeds-input",
        `${what}: length ${len} exceeds remaining input (${this.remaining} bytes)`,
        start,
      );
    }
    return len;
  }

  /** Read `n` raw bytes plus their padding; padding must be all zero. */
  readPadded(n: number, what: string): Uint8Array {
    const padding = (4 - (n % 4)) % 4;
    this.need(n + padding, what);
    const out = copyBytes(this.bytes, this.pos, this.pos + n);
    this.pos += n;
    for (let i = 0; i < padding; i++) {
      if (this.bytes[this.pos] !== 0) {
        this.fail("invalid-padding", `${what}: non-zero padding byte`);
      }
      this.pos += 1;
    }
    return out;
  }

  /** Run `fn` one nesting level deeper; fails once `limit` is passed. */
  nested<T>(limit: number, what: string, fn: () => T): T {
    if (this.depth >= limit) {
      this.fail("depth-exceeded", `${what}: nesting deeper than ${limit}`);
    }
    this.depth += 1;
    try {
      return fn();
    } finally {
      this.depth -= 1;
    }
  }

  /** Top-level decodes must consume the whole input. */
  ensureEnd(what: string): void {
    if (this.remaining !== 0) {
      this.fail("trailing-bytes", `${what}: ${this.remaining} trailing bytes`);
    }
  }
}
