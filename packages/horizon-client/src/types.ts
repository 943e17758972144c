/**
 * Horizon client interface — abstraction over the REST API for testability.
 *
 * The CLI builds and submits through this interface; tests swap in
 * MockHorizonClient so nothing leaves the process.
 */

import type { Logger } from "pino";
import type { TransactionEnvelope } from "@ledgerkit/sdk";

export interface AccountBalance {
  /** "native", "credit_alphanum4", "credit_alphanum12" or "liquidity_pool_shares". */
  assetType: string;
  assetCode?: string;
  assetIssuer?: string;
  /** Decimal string, 7 places. */
  balance: string;
}

export interface AccountSigner {
  key: string;
  weight: number;
  type: string;
}

export interface AccountThresholds {
  lowThreshold: number;
  medThreshold: number;
  highThreshold: number;
}

export interface AccountRecord {
  accountId: string;
  /** Current sequence; the next transaction uses sequence + 1. */
  sequence: bigint;
  subentryCount: number;
  thresholds: AccountThresholds;
  balances: AccountBalance[];
  signers: AccountSigner[];
  /** Data entries, values base64 as Horizon reports them. */
  data: Record<string, string>;
}

export interface FeeDistribution {
  max: number;
  min: number;
  mode: number;
  p10: number;
  p20: number;
  p30: number;
  p40: number;
  p50: number;
  p60: number;
  p70: number;
  p80: number;
  p90: number;
  p95: number;
  p99: number;
}

export interface FeeStats {
  lastLedger: number;
  lastLedgerBaseFee: number;
  ledgerCapacityUsage: number;
  feeCharged: FeeDistribution;
  maxFee: FeeDistribution;
}

export interface SubmitResult {
  hash: string;
  ledger: number;
  envelopeXdr: string;
  resultXdr: string;
}

export interface HorizonClient {
  fetchAccount(accountId: string): Promise<AccountRecord>;
  /** Account sequence + 1, the value a new transaction must carry. */
  fetchNextSequenceNumber(accountId: string): Promise<bigint>;
  fetchFeeStats(): Promise<FeeStats>;
  /** Accepts an envelope or its base64 XDR. */
  submitTransaction(envelope: TransactionEnvelope | string): Promise<SubmitResult>;
  /**
   * SEP-29: reject a memo-less transaction that pays an account flagged
   * `config.memo_required`. Resolves when the transaction may be sent.
   */
  checkMemoRequired(envelope: TransactionEnvelope): Promise<void>;
}

/** The subset of `fetch` the REST client calls. */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface HorizonRestClientOptions {
  /** e.g. "https://horizon-testnet.stellar.org" (no trailing slash needed). */
  baseUrl: string;
  /** Per-request timeout. Defaults to 5000. */
  timeoutMs?: number;
  logger?: Logger;
  /** Defaults to the global fetch. */
  fetch?: FetchLike;
  clientName?: string;
  clientVersion?: string;
}
