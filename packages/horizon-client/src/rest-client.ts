/**
 * Horizon REST client — JSON over HTTPS via fetch.
 *
 * Every request carries X-Client-Name / X-Client-Version and is aborted
 * after `timeoutMs`. Responses other than 200 surface as HorizonError
 * "unexpected-status" with the body attached; 200 bodies are checked
 * against the TypeBox schemas before anything reads them.
 */

import { pino, type Logger } from "pino";
import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import {
  accountIdFromAddress,
  MAX_INT64,
  toXdrBase64,
  TransactionEnvelope,
} from "@ledgerkit/sdk";
import { HorizonError } from "./errors.js";
import { memoRequiredCandidates, requiresMemo } from "./memo-required.js";
import {
  AccountResponse,
  FeeStatsResponse,
  SubmitResponse,
  type FeeDistributionResponse,
} from "./schemas.js";
import type {
  AccountRecord,
  FeeDistribution,
  FeeStats,
  FetchLike,
  HorizonClient,
  HorizonRestClientOptions,
  SubmitResult,
} from "./types.js";

const DEFAULT_TIMEOUT_MS = 5_000;
const DEFAULT_CLIENT_NAME = "ledgerkit";
const DEFAULT_CLIENT_VERSION = "0.1.0";

type Method = "GET" | "POST";

export function parseSequence(text: string): bigint {
  if (!/^\d+$/.test(text)) {
    throw new HorizonError("invalid-sequence-number", `invalid sequence number '${text}'`);
  }
  const seq = BigInt(text);
  if (seq > MAX_INT64) {
    throw new HorizonError("invalid-sequence-number", `sequence number ${text} overflows int64`);
  }
  return seq;
}

function feeDistribution(res: FeeDistributionResponse): FeeDistribution {
  return {
    max: Number(res.max),
    min: Number(res.min),
    mode: Number(res.mode),
    p10: Number(res.p10),
    p20: Number(res.p20),
    p30: Number(res.p30),
    p40: Number(res.p40),
    p50: Number(res.p50),
    p60: Number(res.p60),
    p70: Number(res.p70),
    p80: Number(res.p80),
    p90: Number(res.p90),
    p95: Number(res.p95),
    p99: Number(res.p99),
  };
}

export class HorizonRestClient implements HorizonClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly log: Logger;
  private readonly fetchFn: FetchLike;
  private readonly clientHeaders: Record<string, string>;

  constructor(opts: HorizonRestClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.log = opts.logger ?? pino({ level: "silent" });
    this.fetchFn = opts.fetch ?? ((url, init) => fetch(url, init));
    this.clientHeaders = {
      "X-Client-Name": opts.clientName ?? DEFAULT_CLIENT_NAME,
      "X-Client-Version": opts.clientVersion ?? DEFAULT_CLIENT_VERSION,
    };
  }

  /** One round trip: status + body text. Transport failures become HorizonError. */
  private async send(
    method: Method,
    path: string,
    form?: string,
  ): Promise<{ status: number; text: string }> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    this.log.debug({ method, path }, "horizon request");
    try {
      const res = await this.fetchFn(`${this.baseUrl}${path}`, {
        method,
        headers: {
          ...this.clientHeaders,
          ...(form !== undefined
            ? { "Content-Type": "application/x-www-form-urlencoded" }
            : {}),
        },
        body: form,
        signal: controller.signal,
      });
      return { status: res.status, text: await res.text() };
    } catch (err) {
      if (controller.signal.aborted) {
        this.log.warn({ method, path, timeoutMs: this.timeoutMs }, "horizon request timed out");
        throw new HorizonError(
          "timeout",
          `${method} ${path}: no response within ${this.timeoutMs} ms`,
        );
      }
      const msg = err instanceof Error ? err.message : String(err);
      this.log.warn({ method, path, err: msg }, "horizon request failed");
      throw new HorizonError("network", `${method} ${path}: ${msg}`);
    } finally {
      clearTimeout(timer);
    }
  }

  private async request<T extends TSchema>(
    method: Method,
    path: string,
    schema: T,
    form?: string,
  ): Promise<Static<T>> {
    const { status, text } = await this.send(method, path, form);
    this.log.debug({ method, path, status }, "horizon response");
    if (status !== 200) {
      throw new HorizonError("unexpected-status", `${method} ${path} → ${status}`, {
        status,
        body: text,
      });
    }
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new HorizonError("invalid-json", `${method} ${path}: response is not JSON`);
    }
    if (!Value.Check(schema, json)) {
      const first = Value.Errors(schema, json).First();
      const where = first ? ` (${first.path}: ${first.message})` : "";
      throw new HorizonError(
        "invalid-response",
        `${method} ${path}: unexpected response shape${where}`,
      );
    }
    return json;
  }

  async fetchAccount(accountId: string): Promise<AccountRecord> {
    // validates the strkey before it goes into a URL
    accountIdFromAddress(accountId);
    const res = await this.request("GET", `/accounts/${accountId}`, AccountResponse);
    return {
      accountId: res.account_id,
      sequence: parseSequence(res.sequence),
      subentryCount: res.subentry_count,
      thresholds: {
        lowThreshold: res.thresholds.low_threshold,
        medThreshold: res.thresholds.med_threshold,
        highThreshold: res.thresholds.high_threshold,
      },
      balances: res.balances.map((b) => ({
        assetType: b.asset_type,
        assetCode: b.asset_code,
        assetIssuer: b.asset_issuer,
        balance: b.balance,
      })),
      signers: res.signers.map((s) => ({ key: s.key, weight: s.weight, type: s.type })),
      data: res.data,
    };
  }

  async fetchNextSequenceNumber(accountId: string): Promise<bigint> {
    const { sequence } = await this.fetchAccount(accountId);
    if (sequence === MAX_INT64) {
      throw new HorizonError("invalid-sequence-number", `sequence number of ${accountId} is exhausted`);
    }
    return sequence + 1n;
  }

  async fetchFeeStats(): Promise<FeeStats> {
    const res = await this.request("GET", "/fee_stats", FeeStatsResponse);
    return {
      lastLedger: Number(res.last_ledger),
      lastLedgerBaseFee: Number(res.last_ledger_base_fee),
      ledgerCapacityUsage: Number(res.ledger_capacity_usage),
      feeCharged: feeDistribution(res.fee_charged),
      maxFee: feeDistribution(res.max_fee),
    };
  }

  async submitTransaction(envelope: TransactionEnvelope | string): Promise<SubmitResult> {
    const xdr =
      typeof envelope === "string" ? envelope : toXdrBase64(TransactionEnvelope, envelope);
    const res = await this.request(
      "POST",
      "/transactions",
      SubmitResponse,
      `tx=${encodeURIComponent(xdr)}`,
    );
    this.log.info({ hash: res.hash, ledger: res.ledger }, "transaction submitted");
    return {
      hash: res.hash,
      ledger: res.ledger,
      envelopeXdr: res.envelope_xdr,
      resultXdr: res.result_xdr,
    };
  }

  async checkMemoRequired(envelope: TransactionEnvelope): Promise<void> {
    for (const destination of memoRequiredCandidates(envelope)) {
      let data: Record<string, string>;
      try {
        ({ data } = await this.fetchAccount(destination));
      } catch (err) {
        // an account that does not exist yet cannot require a memo
        if (err instanceof HorizonError && err.status === 404) {
          this.log.debug({ destination }, "memo check: destination not found");
          continue;
        }
        throw err;
      }
      if (requiresMemo(data)) {
        throw new HorizonError(
          "account-requires-memo",
          `destination ${destination} requires a memo`,
          { accountId: destination },
        );
      }
    }
  }
}
