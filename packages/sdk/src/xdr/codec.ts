/**
 * XDR codec core — shape descriptors and the generic combinators.
 *
 * A shape is an XdrType<T>: it knows how to write a T and read one back.
 * Domain types are assembled from these; nothing here knows about ledgers.
 *
 * Wire rules (RFC 4506 subset):
 *   - integers big-endian, 4 bytes (int/uint) or 8 bytes (hyper)
 *   - var opaque / string: u32 length ‖ bytes ‖ zero pad to 4
 *   - fixed array: elements back to back; var array: u32 count ‖ elements
 *   - optional: u32 flag (0 | 1) ‖ payload?
 *   - union: int32 discriminant from a closed set ‖ arm payload
 */

import { ConstructionError } from "../errors.js";
import { XdrReader } from "./reader.js";
import { XdrWriter } from "./writer.js";

export interface XdrType<T> {
  readonly name: string;
  write(value: T, writer: XdrWriter): void;
  read(reader: XdrReader): T;
}

/** The value type a shape encodes. */
export type XdrValue<S> = S extends XdrType<infer T> ? T : never;

export function define<T>(
  name: string,
  write: (value: T, writer: XdrWriter) => void,
  read: (reader: XdrReader) => T,
): XdrType<T> {
  return { name, write, read };
}

// ── Primitives ─────────────────────────────────────────────────────

export const Int32 = define<number>(
  "int32",
  (v, w) => w.writeInt32(v),
  (r) => r.readInt32(),
);

export const Uint32 = define<number>(
  "uint32",
  (v, w) => w.writeUint32(v),
  (r) => r.readUint32(),
);

export const Int64 = define<bigint>(
  "int64",
  (v, w) => w.writeInt64(v),
  (r) => r.readInt64(),
);

export const Uint64 = define<bigint>(
  "uint64",
  (v, w) => w.writeUint64(v),
  (r) => r.readUint64(),
);

export const Bool = define<boolean>(
  "bool",
  (v, w) => w.writeUint32(v ? 1 : 0),
  (r) => {
    const flag = r.readUint32();
    if (flag > 1) return r.fail("invalid-flag", `bool: flag ${flag} is not 0 or 1`);
    return flag === 1;
  },
);

// ── Opaque data and strings ────────────────────────────────────────

/** opaque[n] — exactly n bytes, padded. */
export function opaque(n: number): XdrType<Uint8Array> {
  const name = `opaque[${n}]`;
  return define(
    name,
    (v, w) => {
      if (v.length !== n) {
        throw new ConstructionError(`${name}: got ${v.length} bytes`);
      }
      w.writePadded(v);
    },
    (r) => r.readPadded(n, name),
  );
}

function variable(name: string, max: number): XdrType<Uint8Array> {
  return define(
    name,
    (v, w) => {
      if (v.length > max) {
        throw new ConstructionError(`${name}: ${v.length} bytes exceeds maximum ${max}`);
      }
      w.writeUint32(v.length);
      w.writePadded(v);
    },
    (r) => r.readPadded(r.readLength(max, name), name),
  );
}

/** opaque<max> — length-prefixed bytes. */
export function varOpaque(max: number): XdrType<Uint8Array> {
  return variable(`opaque<${max}>`, max);
}

/**
 * string<max> — length-prefixed bytes. Ledger strings are byte strings and
 * need not be valid UTF-8, so they stay as bytes on both sides.
 */
export function xdrString(max: number): XdrType<Uint8Array> {
  return variable(`string<${max}>`, max);
}

// ── Arrays ─────────────────────────────────────────────────────────

/** T[n] — exactly n elements, no count prefix. */
export function fixedArray<T>(item: XdrType<T>, n: number): XdrType<T[]> {
  const name = `${item.name}[${n}]`;
  return define(
    name,
    (v, w) => {
      if (v.length !== n) {
        throw new ConstructionError(`${name}: got ${v.length} elements`);
      }
      for (const el of v) item.write(el, w);
    },
    (r) => {
      const out: T[] = [];
      for (let i = 0; i < n; i++) out.push(item.read(r));
      return out;
    },
  );
}

/** T<max> — u32 element count then elements. Every element is ≥ 4 bytes. */
export function varArray<T>(item: XdrType<T>, max: number): XdrType<T[]> {
  const name = `${item.name}<${max}>`;
  return define(
    name,
    (v, w) => {
      if (v.length > max) {
        throw new ConstructionError(`${name}: ${v.length} elements exceeds maximum ${max}`);
      }
      w.writeUint32(v.length);
      for (const el of v) item.write(el, w);
    },
    (r) => {
      const count = r.readLength(max, name, 4);
      const out: T[] = [];
      for (let i = 0; i < count; i++) out.push(item.read(r));
      return out;
    },
  );
}

// ── Optional ───────────────────────────────────────────────────────

/** T* — presence flag then payload. Absent is `undefined`. */
export function option<T>(item: XdrType<T>): XdrType<T | undefined> {
  const name = `${item.name}*`;
  return define<T | undefined>(
    name,
    (v, w) => {
      if (v === undefined) {
        w.writeUint32(0);
        return;
      }
      w.writeUint32(1);
      item.write(v, w);
    },
    (r) => {
      const flag = r.readUint32();
      if (flag === 0) return undefined;
      if (flag !== 1) return r.fail("invalid-flag", `${name}: presence flag ${flag}`);
      return item.read(r);
    },
  );
}

// ── Enums / union discriminants ────────────────────────────────────

/**
 * Closed int32 enumeration mapped to string names. Used directly for enum
 * fields and as the discriminant of every union.
 */
export function xdrEnum<K extends string>(
  name: string,
  values: Readonly<Record<K, number>>,
): XdrType<K> {
  const byValue = new Map<number, K>();
  for (const key in values) byValue.set(values[key], key);

  return define<K>(
    name,
    (v, w) => w.writeInt32(values[v]),
    (r) => {
      const raw = r.readInt32();
      const key = byValue.get(raw);
      if (key === undefined) {
        return r.fail("invalid-discriminant", `${name}: unknown discriminant ${raw}`);
      }
      return key;
    },
  );
}

// ── Entry points ───────────────────────────────────────────────────

export function toXdr<T>(type: XdrType<T>, value: T): Uint8Array {
  const writer = new XdrWriter();
  type.write(value, writer);
  return writer.toBytes();
}

/** Decode a prefix of `bytes`; reports how much was consumed. */
export function decodeXdr<T>(
  type: XdrType<T>,
  bytes: Uint8Array,
): { value: T; bytesRead: number } {
  const reader = new XdrReader(bytes);
  const value = type.read(reader);
  return { value, bytesRead: reader.offset };
}

/** Decode exactly one value; trailing bytes are an error. */
export function fromXdr<T>(type: XdrType<T>, bytes: Uint8Array): T {
  const reader = new XdrReader(bytes);
  const value = type.read(reader);
  reader.ensureEnd(type.name);
  return value;
}
