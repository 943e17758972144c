/**
 * Transactions, decorated signatures and envelopes.
 *
 * TransactionEnvelope  union EnvelopeType { TX_V0 = 0 → TransactionV0Envelope,
 *                                           TX = 2 → TransactionV1Envelope,
 *                                           TX_FEE_BUMP = 5 → FeeBumpTransactionEnvelope }
 *
 * Every `ext` field in this schema is a union with only arm 0 (void). It is
 * written as 0 and any other discriminant is rejected on decode.
 */

import {
  define,
  Int64,
  opaque,
  option,
  Uint32,
  Uint64,
  varArray,
  varOpaque,
  xdrEnum,
} from "../xdr/index.js";
import { Hash, MuxedAccount, Uint256 } from "./keys.js";
import { Memo } from "./memo.js";
import { Operation } from "./operations.js";

export const MAX_OPERATIONS = 100;
export const MAX_SIGNATURES = 20;

export const EnvelopeType = xdrEnum("EnvelopeType", { txV0: 0, tx: 2, txFeeBump: 5 });
export type EnvelopeType = "txV0" | "tx" | "txFeeBump";

const Ext = xdrEnum("ExtensionPoint", { v0: 0 });

// ── TimeBounds ─────────────────────────────────────────────────────

export interface TimeBounds {
  readonly minTime: bigint;
  /** 0 means no upper bound. */
  readonly maxTime: bigint;
}

export const TimeBounds = define<TimeBounds>(
  "TimeBounds",
  (v, w) => {
    Uint64.write(v.minTime, w);
    Uint64.write(v.maxTime, w);
  },
  (r) => ({ minTime: Uint64.read(r), maxTime: Uint64.read(r) }),
);

const OptTimeBounds = option(TimeBounds);
const Operations = varArray(Operation, MAX_OPERATIONS);

// ── Transaction (v1) ───────────────────────────────────────────────

export interface Transaction {
  readonly sourceAccount: MuxedAccount;
  readonly fee: number;
  readonly seqNum: bigint;
  readonly timeBounds: TimeBounds | undefined;
  readonly memo: Memo;
  readonly operations: readonly Operation[];
}

export const Transaction = define<Transaction>(
  "Transaction",
  (v, w) => {
    MuxedAccount.write(v.sourceAccount, w);
    Uint32.write(v.fee, w);
    Int64.write(v.seqNum, w);
    OptTimeBounds.write(v.timeBounds, w);
    Memo.write(v.memo, w);
    Operations.write([...v.operations], w);
    Ext.write("v0", w);
  },
  (r) => {
    const tx: Transaction = {
      sourceAccount: MuxedAccount.read(r),
      fee: Uint32.read(r),
      seqNum: Int64.read(r),
      timeBounds: OptTimeBounds.read(r),
      memo: Memo.read(r),
      operations: Operations.read(r),
    };
    Ext.read(r);
    return tx;
  },
);

// ── TransactionV0 (legacy, ed25519 source only) ────────────────────

export interface TransactionV0 {
  readonly sourceAccountEd25519: Uint8Array;
  readonly fee: number;
  readonly seqNum: bigint;
  readonly timeBounds: TimeBounds | undefined;
  readonly memo: Memo;
  readonly operations: readonly Operation[];
}

export const TransactionV0 = define<TransactionV0>(
  "TransactionV0",
  (v, w) => {
    Uint256.write(v.sourceAccountEd25519, w);
    Uint32.write(v.fee, w);
    Int64.write(v.seqNum, w);
    OptTimeBounds.write(v.timeBounds, w);
    Memo.write(v.memo, w);
    Operations.write([...v.operations], w);
    Ext.write("v0", w);
  },
  (r) => {
    const tx: TransactionV0 = {
      sourceAccountEd25519: Uint256.read(r),
      fee: Uint32.read(r),
      seqNum: Int64.read(r),
      timeBounds: OptTimeBounds.read(r),
      memo: Memo.read(r),
      operations: Operations.read(r),
    };
    Ext.read(r);
    return tx;
  },
);

/** The v1 form a v0 transaction is hashed and signed as. */
export function transactionFromV0(tx: TransactionV0): Transaction {
  return {
    sourceAccount: { type: "ed25519", ed25519: tx.sourceAccountEd25519 },
    fee: tx.fee,
    seqNum: tx.seqNum,
    timeBounds: tx.timeBounds,
    memo: tx.memo,
    operations: tx.operations,
  };
}

// ── DecoratedSignature ─────────────────────────────────────────────

export const SignatureHint = opaque(4);
export const Signature = varOpaque(64);

export interface DecoratedSignature {
  /** Last 4 bytes of the signer's public key. */
  readonly hint: Uint8Array;
  readonly signature: Uint8Array;
}

export const DecoratedSignature = define<DecoratedSignature>(
  "DecoratedSignature",
  (v, w) => {
    SignatureHint.write(v.hint, w);
    Signature.write(v.signature, w);
  },
  (r) => ({ hint: SignatureHint.read(r), signature: Signature.read(r) }),
);

const Signatures = varArray(DecoratedSignature, MAX_SIGNATURES);

// ── Envelopes ──────────────────────────────────────────────────────

export interface TransactionV0Envelope {
  readonly tx: TransactionV0;
  readonly signatures: readonly DecoratedSignature[];
}

export const TransactionV0Envelope = define<TransactionV0Envelope>(
  "TransactionV0Envelope",
  (v, w) => {
    TransactionV0.write(v.tx, w);
    Signatures.write([...v.signatures], w);
  },
  (r) => ({ tx: TransactionV0.read(r), signatures: Signatures.read(r) }),
);

export interface TransactionV1Envelope {
  readonly tx: Transaction;
  readonly signatures: readonly DecoratedSignature[];
}

export const TransactionV1Envelope = define<TransactionV1Envelope>(
  "TransactionV1Envelope",
  (v, w) => {
    Transaction.write(v.tx, w);
    Signatures.write([...v.signatures], w);
  },
  (r) => ({ tx: Transaction.read(r), signatures: Signatures.read(r) }),
);

const InnerTxType = xdrEnum("EnvelopeType", { tx: 2 });

export interface FeeBumpTransaction {
  readonly feeSource: MuxedAccount;
  readonly fee: bigint;
  /** Only v1 envelopes can be wrapped. */
  readonly innerTx: TransactionV1Envelope;
}

export const FeeBumpTransaction = define<FeeBumpTransaction>(
  "FeeBumpTransaction",
  (v, w) => {
    MuxedAccount.write(v.feeSource, w);
    Int64.write(v.fee, w);
    InnerTxType.write("tx", w);
    TransactionV1Envelope.write(v.innerTx, w);
    Ext.write("v0", w);
  },
  (r) => {
    const feeSource = MuxedAccount.read(r);
    const fee = Int64.read(r);
    InnerTxType.read(r);
    const innerTx = TransactionV1Envelope.read(r);
    Ext.read(r);
    return { feeSource, fee, innerTx };
  },
);

export interface FeeBumpTransactionEnvelope {
  readonly tx: FeeBumpTransaction;
  readonly signatures: readonly DecoratedSignature[];
}

export const FeeBumpTransactionEnvelope = define<FeeBumpTransactionEnvelope>(
  "FeeBumpTransactionEnvelope",
  (v, w) => {
    FeeBumpTransaction.write(v.tx, w);
    Signatures.write([...v.signatures], w);
  },
  (r) => ({ tx: FeeBumpTransaction.read(r), signatures: Signatures.read(r) }),
);

export type TransactionEnvelope =
  | { readonly type: "txV0"; readonly v0: TransactionV0Envelope }
  | { readonly type: "tx"; readonly v1: TransactionV1Envelope }
  | { readonly type: "txFeeBump"; readonly feeBump: FeeBumpTransactionEnvelope };

export const TransactionEnvelope = define<TransactionEnvelope>(
  "TransactionEnvelope",
  (v, w) => {
    EnvelopeType.write(v.type, w);
    switch (v.type) {
      case "txV0":
        TransactionV0Envelope.write(v.v0, w);
        break;
      case "tx":
        TransactionV1Envelope.write(v.v1, w);
        break;
      case "txFeeBump":
        FeeBumpTransactionEnvelope.write(v.feeBump, w);
        break;
    }
  },
  (r) => {
    const type = EnvelopeType.read(r);
    switch (type) {
      case "txV0":
        return { type, v0: TransactionV0Envelope.read(r) };
      case "tx":
        return { type, v1: TransactionV1Envelope.read(r) };
      case "txFeeBump":
        return { type, feeBump: FeeBumpTransactionEnvelope.read(r) };
    }
  },
);

/** Signatures attached to whichever arm the envelope holds. */
export function envelopeSignatures(envelope: TransactionEnvelope): readonly DecoratedSignature[] {
  switch (envelope.type) {
    case "txV0":
      return envelope.v0.signatures;
    case "tx":
      return envelope.v1.signatures;
    case "txFeeBump":
      return envelope.feeBump.signatures;
  }
}

// ── Signature payload ──────────────────────────────────────────────

export type TaggedTransaction =
  | { readonly type: "tx"; readonly tx: Transaction }
  | { readonly type: "txFeeBump"; readonly feeBump: FeeBumpTransaction };

const TaggedTransactionType = xdrEnum("EnvelopeType", { tx: 2, txFeeBump: 5 });

export const TaggedTransaction = define<TaggedTransaction>(
  "TaggedTransaction",
  (v, w) => {
    TaggedTransactionType.write(v.type, w);
    switch (v.type) {
      case "tx":
        Transaction.write(v.tx, w);
        break;
      case "txFeeBump":
        FeeBumpTransaction.write(v.feeBump, w);
        break;
    }
  },
  (r) => {
    const type = TaggedTransactionType.read(r);
    switch (type) {
      case "tx":
        return { type, tx: Transaction.read(r) };
      case "txFeeBump":
        return { type, feeBump: FeeBumpTransaction.read(r) };
    }
  },
);

/** What is hashed (then signed) for a transaction on a given network. */
export interface TransactionSignaturePayload {
  readonly networkId: Uint8Array;
  readonly taggedTransaction: TaggedTransaction;
}

export const TransactionSignaturePayload = define<TransactionSignaturePayload>(
  "TransactionSignaturePayload",
  (v, w) => {
    Hash.write(v.networkId, w);
    TaggedTransaction.write(v.taggedTransaction, w);
  },
  (r) => ({ networkId: Hash.read(r), taggedTransaction: TaggedTransaction.read(r) }),
);
