/**
 * Memo — union MemoType { NONE = 0, TEXT = 1 → string<28>, ID = 2 → uint64,
 *                         HASH = 3 → Hash, RETURN = 4 → Hash }
 */

import { copyBytes, utf8 } from "../encoding.js";
import { ConstructionError } from "../errors.js";
import { define, Uint64, xdrEnum, xdrString } from "../xdr/index.js";
import { Hash } from "./keys.js";

export const MEMO_TEXT_MAX_BYTES = 28;

const MemoType = xdrEnum("MemoType", { none: 0, text: 1, id: 2, hash: 3, return: 4 });
const MemoText = xdrString(MEMO_TEXT_MAX_BYTES);

export type Memo =
  | { readonly type: "none" }
  | { readonly type: "text"; readonly text: Uint8Array }
  | { readonly type: "id"; readonly id: bigint }
  | { readonly type: "hash"; readonly hash: Uint8Array }
  | { readonly type: "return"; readonly hash: Uint8Array };

export const Memo = define<Memo>(
  "Memo",
  (v, w) => {
    MemoType.write(v.type, w);
    switch (v.type) {
      case "none":
        break;
      case "text":
        MemoText.write(v.text, w);
        break;
      case "id":
        Uint64.write(v.id, w);
        break;
      case "hash":
      case "return":
        Hash.write(v.hash, w);
        break;
    }
  },
  (r) => {
    const type = MemoType.read(r);
    switch (type) {
      case "none":
        return { type };
      case "text":
        return { type, text: MemoText.read(r) };
      case "id":
        return { type, id: Uint64.read(r) };
      case "hash":
      case "return":
        return { type, hash: Hash.read(r) };
    }
  },
);

// ── Construction ───────────────────────────────────────────────────

export const Memos = {
  none(): Memo {
    return { type: "none" };
  },

  /** Text memo; at most 28 bytes once UTF-8 encoded. */
  text(text: string | Uint8Array): Memo {
    const bytes = typeof text === "string" ? utf8(text) : copyBytes(text);
    if (bytes.length > MEMO_TEXT_MAX_BYTES) {
      throw new ConstructionError(
        `memo text is ${bytes.length} bytes, maximum is ${MEMO_TEXT_MAX_BYTES}`,
      );
    }
    return { type: "text", text: bytes };
  },

  id(id: bigint | string): Memo {
    const value = typeof id === "string" ? parseUint64(id) : id;
    if (value < 0n || value >= 2n ** 64n) {
      throw new ConstructionError(`memo id out of range: ${value}`);
    }
    return { type: "id", id: value };
  },

  hash(hash: Uint8Array): Memo {
    return { type: "hash", hash: checkHash(hash) };
  },

  returnHash(hash: Uint8Array): Memo {
    return { type: "return", hash: checkHash(hash) };
  },
};

function parseUint64(text: string): bigint {
  if (!/^[0-9]+$/.test(text)) {
    throw new ConstructionError(`memo id must be a decimal integer, got '${text}'`);
  }
  return BigInt(text);
}

function checkHash(hash: Uint8Array): Uint8Array {
  if (hash.length !== 32) {
    throw new ConstructionError(`memo hash must be 32 bytes, got ${hash.length}`);
  }
  return copyBytes(hash);
}
