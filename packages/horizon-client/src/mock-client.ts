/**
 * Mock Horizon client for testing.
 *
 * Holds accounts in memory. submitTransaction checks the sequence number
 * against the source account, advances it, and records the envelope;
 * submitted() returns what was sent. Records and the submission list are
 * copied on the way in and out; tests change state only through setAccount.
 */

import {
  accountIdToAddress,
  fromXdrBase64,
  MAX_INT64,
  muxedToAccountId,
  toHex,
  toXdrBase64,
  transactionFromV0,
  transactionHash,
  TransactionEnvelope,
  type Transaction,
} from "@ledgerkit/sdk";
import { HorizonError } from "./errors.js";
import { memoRequiredCandidates, requiresMemo } from "./memo-required.js";
import type { AccountRecord, FeeStats, HorizonClient, SubmitResult } from "./types.js";

const FLAT_FEE = {
  max: 100,
  min: 100,
  mode: 100,
  p10: 100,
  p20: 100,
  p30: 100,
  p40: 100,
  p50: 100,
  p60: 100,
  p70: 100,
  p80: 100,
  p90: 100,
  p95: 100,
  p99: 100,
};

function copyRecord(record: AccountRecord): AccountRecord {
  return {
    ...record,
    thresholds: { ...record.thresholds },
    balances: record.balances.map((b) => ({ ...b })),
    signers: record.signers.map((s) => ({ ...s })),
    data: { ...record.data },
  };
}

function innerTransaction(envelope: TransactionEnvelope): Transaction {
  switch (envelope.type) {
    case "txV0":
      return transactionFromV0(envelope.v0.tx);
    case "tx":
      return envelope.v1.tx;
    case "txFeeBump":
      return envelope.feeBump.tx.innerTx.tx;
  }
}

export class MockHorizonClient implements HorizonClient {
  private readonly accounts = new Map<string, AccountRecord>();
  private readonly sent: TransactionEnvelope[] = [];
  private ledger = 1;

  constructor(private readonly networkPassphrase: string) {}

  /** Test helper: create or replace an account. */
  setAccount(accountId: string, patch: Partial<AccountRecord> = {}): AccountRecord {
    const record: AccountRecord = {
      accountId,
      sequence: 0n,
      subentryCount: 0,
      thresholds: { lowThreshold: 0, medThreshold: 0, highThreshold: 0 },
      balances: [{ assetType: "native", balance: "10000.0000000" }],
      signers: [{ key: accountId, weight: 1, type: "ed25519_public_key" }],
      data: {},
      ...patch,
    };
    this.accounts.set(accountId, copyRecord(record));
    return record;
  }

  /** Test helper: envelopes accepted so far, oldest first. */
  submitted(): readonly TransactionEnvelope[] {
    return [...this.sent];
  }

  private stored(accountId: string): AccountRecord {
    const record = this.accounts.get(accountId);
    if (!record) {
      throw new HorizonError("unexpected-status", `GET /accounts/${accountId} → 404`, {
        status: 404,
        body: "",
      });
    }
    return record;
  }

  async fetchAccount(accountId: string): Promise<AccountRecord> {
    return copyRecord(this.stored(accountId));
  }

  async fetchNextSequenceNumber(accountId: string): Promise<bigint> {
    const { sequence } = await this.fetchAccount(accountId);
    if (sequence === MAX_INT64) {
      throw new HorizonError("invalid-sequence-number", `sequence number of ${accountId} is exhausted`);
    }
    return sequence + 1n;
  }

  async fetchFeeStats(): Promise<FeeStats> {
    return {
      lastLedger: this.ledger,
      lastLedgerBaseFee: 100,
      ledgerCapacityUsage: 0.5,
      feeCharged: { ...FLAT_FEE },
      maxFee: { ...FLAT_FEE },
    };
  }

  async submitTransaction(envelope: TransactionEnvelope | string): Promise<SubmitResult> {
    const env =
      typeof envelope === "string" ? fromXdrBase64(TransactionEnvelope, envelope) : envelope;
    const tx = innerTransaction(env);
    const account = this.stored(accountIdToAddress(muxedToAccountId(tx.sourceAccount)));
    if (tx.seqNum !== account.sequence + 1n) {
      throw new HorizonError("unexpected-status", "POST /transactions → 400", {
        status: 400,
        body: JSON.stringify({ extras: { result_codes: { transaction: "tx_bad_seq" } } }),
      });
    }
    account.sequence = tx.seqNum;
    this.sent.push(env);
    this.ledger += 1;
    return {
      hash: toHex(transactionHash(this.networkPassphrase, env)),
      ledger: this.ledger,
      envelopeXdr: toXdrBase64(TransactionEnvelope, env),
      resultXdr: "",
    };
  }

  async checkMemoRequired(envelope: TransactionEnvelope): Promise<void> {
    for (const destination of memoRequiredCandidates(envelope)) {
      const record = this.accounts.get(destination);
      if (record && requiresMemo(record.data)) {
        throw new HorizonError(
          "account-requires-memo",
          `destination ${destination} requires a memo`,
          { accountId: destination },
        );
      }
    }
  }
}
