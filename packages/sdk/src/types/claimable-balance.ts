/**
 * Claimable balances — claimants, their predicates, and balance ids.
 *
 * ClaimPredicate is the one recursive shape in the transaction schema.
 * Decoding caps nesting at MAX_PREDICATE_DEPTH so hostile input cannot
 * drive unbounded recursion; the ledger applies the same limit.
 */

import { fromHex } from "../encoding.js";
import { ConstructionError, XdrDecodeError } from "../errors.js";
import { define, fromXdr, Int64, option, varArray, xdrEnum } from "../xdr/index.js";
import type { XdrReader, XdrWriter } from "../xdr/index.js";
import { AccountId, Hash } from "./keys.js";

export const MAX_PREDICATE_DEPTH = 4;

const ClaimPredicateType = xdrEnum("ClaimPredicateType", {
  unconditional: 0,
  and: 1,
  or: 2,
  not: 3,
  beforeAbsoluteTime: 4,
  beforeRelativeTime: 5,
});

export type ClaimPredicate =
  | { readonly type: "unconditional" }
  | { readonly type: "and"; readonly predicates: readonly ClaimPredicate[] }
  | { readonly type: "or"; readonly predicates: readonly ClaimPredicate[] }
  | { readonly type: "not"; readonly predicate: ClaimPredicate | undefined }
  | { readonly type: "beforeAbsoluteTime"; readonly time: bigint }
  | { readonly type: "beforeRelativeTime"; readonly seconds: bigint };

function writePredicate(v: ClaimPredicate, w: XdrWriter, depth: number): void {
  if (depth > MAX_PREDICATE_DEPTH) {
    throw new ConstructionError(`claim predicate nests deeper than ${MAX_PREDICATE_DEPTH}`);
  }
  ClaimPredicateType.write(v.type, w);
  switch (v.type) {
    case "unconditional":
      break;
    case "and":
    case "or":
      if (v.predicates.length > 2) {
        throw new ConstructionError(`'${v.type}' predicate takes at most 2 operands`);
      }
      w.writeUint32(v.predicates.length);
      for (const p of v.predicates) writePredicate(p, w, depth + 1);
      break;
    case "not":
      if (v.predicate === undefined) {
        w.writeUint32(0);
      } else {
        w.writeUint32(1);
        writePredicate(v.predicate, w, depth + 1);
      }
      break;
    case "beforeAbsoluteTime":
      w.writeInt64(v.time);
      break;
    case "beforeRelativeTime":
      w.writeInt64(v.seconds);
      break;
  }
}

function readPredicate(r: XdrReader): ClaimPredicate {
  return r.nested(MAX_PREDICATE_DEPTH, "ClaimPredicate", (): ClaimPredicate => {
    const type = ClaimPredicateType.read(r);
    switch (type) {
      case "unconditional":
        return { type };
      case "and":
      case "or":
        return { type, predicates: varArray(ClaimPredicate, 2).read(r) };
      case "not":
        return { type, predicate: option(ClaimPredicate).read(r) };
      case "beforeAbsoluteTime":
        return { type, time: Int64.read(r) };
      case "beforeRelativeTime":
        return { type, seconds: Int64.read(r) };
    }
  });
}

export const ClaimPredicate = define<ClaimPredicate>(
  "ClaimPredicate",
  (v, w) => writePredicate(v, w, 1),
  readPredicate,
);

export const Predicates = {
  unconditional: (): ClaimPredicate => ({ type: "unconditional" }),
  and: (left: ClaimPredicate, right: ClaimPredicate): ClaimPredicate => ({
    type: "and",
    predicates: [left, right],
  }),
  or: (left: ClaimPredicate, right: ClaimPredicate): ClaimPredicate => ({
    type: "or",
    predicates: [left, right],
  }),
  not: (predicate: ClaimPredicate): ClaimPredicate => ({ type: "not", predicate }),
  beforeAbsoluteTime: (unixSeconds: bigint): ClaimPredicate => ({
    type: "beforeAbsoluteTime",
    time: unixSeconds,
  }),
  beforeRelativeTime: (seconds: bigint): ClaimPredicate => ({
    type: "beforeRelativeTime",
    seconds,
  }),
};

// ── Claimant ───────────────────────────────────────────────────────

const ClaimantType = xdrEnum("ClaimantType", { v0: 0 });

export interface Claimant {
  readonly destination: AccountId;
  readonly predicate: ClaimPredicate;
}

export const Claimant = define<Claimant>(
  "Claimant",
  (v, w) => {
    ClaimantType.write("v0", w);
    AccountId.write(v.destination, w);
    ClaimPredicate.write(v.predicate, w);
  },
  (r) => {
    ClaimantType.read(r);
    return { destination: AccountId.read(r), predicate: ClaimPredicate.read(r) };
  },
);

// ── ClaimableBalanceId ─────────────────────────────────────────────

const ClaimableBalanceIdType = xdrEnum("ClaimableBalanceIDType", { v0: 0 });

export interface ClaimableBalanceId {
  readonly type: "v0";
  readonly hash: Uint8Array;
}

export const ClaimableBalanceId = define<ClaimableBalanceId>(
  "ClaimableBalanceID",
  (v, w) => {
    ClaimableBalanceIdType.write(v.type, w);
    Hash.write(v.hash, w);
  },
  (r) => ({ type: ClaimableBalanceIdType.read(r), hash: Hash.read(r) }),
);

/**
 * Parse the 72-char hex form Horizon reports: the 36-byte XDR of the id
 * (4-byte type ‖ 32-byte hash).
 */
export function claimableBalanceIdFromHex(hex: string): ClaimableBalanceId {
  if (!/^[0-9a-fA-F]{72}$/.test(hex)) {
    throw new ConstructionError("claimable balance id must be 72 hex characters");
  }
  try {
    return fromXdr(ClaimableBalanceId, fromHex(hex.toLowerCase()));
  } catch (err) {
    if (err instanceof XdrDecodeError) {
      throw new ConstructionError(`invalid claimable balance id: ${err.message}`);
    }
    throw err;
  }
}
