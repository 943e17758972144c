/**
 * Transaction builder and envelope wrappers.
 *
 * The fee of a transaction is the per-operation base fee times the number
 * of operations. A fee bump pays (ops + 1) × base fee at least; that
 * minimum is left to the network and only the static bounds are checked
 * here.
 */

import { BASE_FEE, MAX_INT64, TIMEOUT_INFINITE } from "../constants.js";
import { ConstructionError } from "../errors.js";
import { muxedAccountFromAddress, type MuxedAccount } from "../types/keys.js";
import { Memos, type Memo } from "../types/memo.js";
import type { Operation } from "../types/operations.js";
import {
  MAX_OPERATIONS,
  transactionFromV0,
  type TimeBounds,
  type Transaction,
  type TransactionEnvelope,
  type TransactionV1Envelope,
} from "../types/transaction.js";

export interface BuildTransactionOptions {
  /** G... / M... or a MuxedAccount. */
  source: string | MuxedAccount;
  /** Sequence number the transaction consumes (account sequence + 1). */
  sequence: bigint | string;
  operations: readonly Operation[];
  /** Per-operation fee in stroops. Defaults to BASE_FEE. */
  baseFee?: number;
  memo?: Memo;
  /** Absolute window in unix seconds; maxTime 0 is unbounded. */
  timeBounds?: TimeBounds;
  /**
   * Shorthand for timeBounds { minTime: 0, maxTime: now + timeoutSeconds }.
   * TIMEOUT_INFINITE (0) leaves maxTime unbounded.
   */
  timeoutSeconds?: number;
  /** Clock for timeoutSeconds, unix seconds. */
  now?: () => number;
}

function sequenceNumber(input: bigint | string): bigint {
  if (typeof input === "string" && !/^\d+$/.test(input)) {
    throw new ConstructionError(`sequence must be a decimal integer, got '${input}'`);
  }
  const seq = typeof input === "string" ? BigInt(input) : input;
  if (seq < 0n || seq > MAX_INT64) {
    throw new ConstructionError(`sequence ${seq} is out of range`);
  }
  return seq;
}

function resolveTimeBounds(opts: BuildTransactionOptions): TimeBounds | undefined {
  if (opts.timeBounds !== undefined && opts.timeoutSeconds !== undefined) {
    throw new ConstructionError("give either timeBounds or timeoutSeconds, not both");
  }
  if (opts.timeBounds !== undefined) {
    const { minTime, maxTime } = opts.timeBounds;
    if (minTime < 0n || maxTime < 0n || (maxTime !== 0n && maxTime < minTime)) {
      throw new ConstructionError(`invalid time bounds ${minTime}..${maxTime}`);
    }
    return opts.timeBounds;
  }
  if (opts.timeoutSeconds !== undefined) {
    if (!Number.isInteger(opts.timeoutSeconds) || opts.timeoutSeconds < 0) {
      throw new ConstructionError(`timeoutSeconds must be a non-negative integer`);
    }
    if (opts.timeoutSeconds === TIMEOUT_INFINITE) return { minTime: 0n, maxTime: 0n };
    const now = (opts.now ?? (() => Math.floor(Date.now() / 1000)))();
    if (!Number.isSafeInteger(now) || now < 0) {
      throw new ConstructionError(`clock returned ${now}, expected whole unix seconds`);
    }
    return { minTime: 0n, maxTime: BigInt(now) + BigInt(opts.timeoutSeconds) };
  }
  return undefined;
}

export function buildTransaction(opts: BuildTransactionOptions): Transaction {
  const count = opts.operations.length;
  if (count === 0 || count > MAX_OPERATIONS) {
    throw new ConstructionError(
      `transaction needs 1-${MAX_OPERATIONS} operations, got ${count}`,
    );
  }
  const baseFee = opts.baseFee ?? BASE_FEE;
  if (!Number.isInteger(baseFee) || baseFee < 0) {
    throw new ConstructionError(`base fee must be a non-negative integer, got ${baseFee}`);
  }
  const fee = baseFee * count;
  if (fee > 0xffffffff) {
    throw new ConstructionError(`total fee ${fee} overflows uint32`);
  }

  return {
    sourceAccount:
      typeof opts.source === "string" ? muxedAccountFromAddress(opts.source) : opts.source,
    fee,
    seqNum: sequenceNumber(opts.sequence),
    timeBounds: resolveTimeBounds(opts),
    memo: opts.memo ?? Memos.none(),
    operations: [...opts.operations],
  };
}

/** Unsigned v1 envelope around a transaction. */
export function newEnvelope(tx: Transaction): TransactionEnvelope {
  if (tx.operations.length === 0 || tx.operations.length > MAX_OPERATIONS) {
    throw new ConstructionError(
      `transaction needs 1-${MAX_OPERATIONS} operations, got ${tx.operations.length}`,
    );
  }
  return { type: "tx", v1: { tx, signatures: [] } };
}

/**
 * Wrap a v1 (or v0, converted) envelope in an unsigned fee bump paid by
 * `feeSource`. The inner signatures are kept; wrapping a fee bump again is
 * an error.
 */
export function wrapFeeBump(
  envelope: TransactionEnvelope,
  feeSource: string | MuxedAccount,
  fee: bigint,
): TransactionEnvelope {
  if (fee <= 0n || fee > MAX_INT64) {
    throw new ConstructionError(`fee bump fee ${fee} is out of range`);
  }
  let inner: TransactionV1Envelope;
  switch (envelope.type) {
    case "txFeeBump":
      throw new ConstructionError("cannot fee-bump a fee-bump transaction");
    case "tx":
      inner = envelope.v1;
      break;
    case "txV0":
      inner = { tx: transactionFromV0(envelope.v0.tx), signatures: envelope.v0.signatures };
      break;
  }
  return {
    type: "txFeeBump",
    feeBump: {
      tx: {
        feeSource: typeof feeSource === "string" ? muxedAccountFromAddress(feeSource) : feeSource,
        fee,
        innerTx: inner,
      },
      signatures: [],
    },
  };
}
