/**
 * HorizonRestClient against a stubbed fetch — request shape, response
 * validation, and the error kinds each failure maps to.
 */

import { describe, it, expect, vi } from "vitest";
import {
  bytesToBase64,
  buildTransaction,
  Memos,
  newEnvelope,
  Operations,
  toXdr,
  TransactionEnvelope,
} from "@ledgerkit/sdk";
import { HorizonError, HorizonRestClient } from "../src/index.js";

const ALICE = "GCFIRY65OQE7DFP5KLNS2PF2LVZMUZYJX4OZIEQ36N2IQANUB5XVYOJR";
const BOB = "GCATS5YOVB6ROX2WUNKGNQ2MP3GMXDMKSG2O4N5CLX3A6W4PZGZZI55U";

// ── Helpers ────────────────────────────────────────────────────────

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

function accountBody(id: string, overrides: Record<string, unknown> = {}) {
  return {
    id,
    account_id: id,
    sequence: "4294967296",
    subentry_count: 1,
    thresholds: { low_threshold: 0, med_threshold: 1, high_threshold: 2 },
    balances: [
      { balance: "100.0000000", asset_type: "native" },
      {
        balance: "5.5000000",
        asset_type: "credit_alphanum4",
        asset_code: "USD",
        asset_issuer: BOB,
      },
    ],
    signers: [{ key: id, weight: 1, type: "ed25519_public_key" }],
    data: {},
    paging_token: id,
    ...overrides,
  };
}

function distribution(value: string) {
  return {
    max: value,
    min: value,
    mode: value,
    p10: value,
    p20: value,
    p30: value,
    p40: value,
    p50: value,
    p60: value,
    p70: value,
    p80: value,
    p90: value,
    p95: value,
    p99: value,
  };
}

function makeClient(handler: (url: string, init: RequestInit) => Promise<Response>) {
  const fetch = vi.fn(handler);
  const client = new HorizonRestClient({
    baseUrl: "https://horizon.test/",
    fetch,
    clientName: "ledgerkit-test",
    clientVersion: "9.9.9",
    timeoutMs: 20,
  });
  return { client, fetch };
}

async function failure(promise: Promise<unknown>): Promise<HorizonError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof HorizonError) return err;
    throw err;
  }
  throw new Error("expected a HorizonError");
}

function payment(memo = Memos.none()) {
  return newEnvelope(
    buildTransaction({
      source: ALICE,
      sequence: 1n,
      memo,
      operations: [Operations.payment({ destination: BOB, asset: "native", amount: "1" })],
    }),
  );
}

// ── fetchAccount ───────────────────────────────────────────────────

describe("fetchAccount", () => {
  it("GETs /accounts/:id with client headers and maps the record", async () => {
    const { client, fetch } = makeClient(async () => json(accountBody(ALICE)));
    const account = await client.fetchAccount(ALICE);

    expect(fetch).toHaveBeenCalledTimes(1);
    const [url, init] = fetch.mock.calls[0] ?? [];
    expect(url).toBe(`https://horizon.test/accounts/${ALICE}`);
    expect(init?.method).toBe("GET");
    expect(init?.headers).toEqual({
      "X-Client-Name": "ledgerkit-test",
      "X-Client-Version": "9.9.9",
    });

    expect(account.accountId).toBe(ALICE);
    expect(account.sequence).toBe(4294967296n);
    expect(account.thresholds).toEqual({ lowThreshold: 0, medThreshold: 1, highThreshold: 2 });
    expect(account.balances[1]).toEqual({
      assetType: "credit_alphanum4",
      assetCode: "USD",
      assetIssuer: BOB,
      balance: "5.5000000",
    });
    expect(account.signers).toEqual([{ key: ALICE, weight: 1, type: "ed25519_public_key" }]);
  });

  it("refuses a malformed account id before any request", async () => {
    const { client, fetch } = makeClient(async () => json(accountBody(ALICE)));
    await expect(client.fetchAccount("GNOTANACCOUNT")).rejects.toThrow();
    expect(fetch).not.toHaveBeenCalled();
  });

  it("non-200 → unexpected-status with the body", async () => {
    const { client } = makeClient(async () => new Response("not found", { status: 404 }));
    const err = await failure(client.fetchAccount(ALICE));
    expect(err.kind).toBe("unexpected-status");
    expect(err.status).toBe(404);
    expect(err.body).toBe("not found");
  });

  it("body that is not JSON → invalid-json", async () => {
    const { client } = makeClient(async () => new Response("<html>", { status: 200 }));
    expect((await failure(client.fetchAccount(ALICE))).kind).toBe("invalid-json");
  });

  it("JSON of the wrong shape → invalid-response", async () => {
    const { client } = makeClient(async () => json({ account_id: ALICE }));
    expect((await failure(client.fetchAccount(ALICE))).kind).toBe("invalid-response");
  });

  it("transport failure → network", async () => {
    const { client } = makeClient(async () => {
      throw new TypeError("fetch failed");
    });
    const err = await failure(client.fetchAccount(ALICE));
    expect(err.kind).toBe("network");
    expect(err.message).toBe(`GET /accounts/${ALICE}: fetch failed`);
  });

  it("no answer within timeoutMs → timeout", async () => {
    const { client } = makeClient(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }),
    );
    const err = await failure(client.fetchAccount(ALICE));
    expect(err.kind).toBe("timeout");
    expect(err.message).toBe(`GET /accounts/${ALICE}: no response within 20 ms`);
  });
});

// ── Sequence numbers ───────────────────────────────────────────────

describe("fetchNextSequenceNumber", () => {
  it("is the account sequence plus one", async () => {
    const { client } = makeClient(async () => json(accountBody(ALICE)));
    expect(await client.fetchNextSequenceNumber(ALICE)).toBe(4294967297n);
  });

  it("a non-numeric sequence → invalid-sequence-number", async () => {
    const { client } = makeClient(async () => json(accountBody(ALICE, { sequence: "12a" })));
    expect((await failure(client.fetchNextSequenceNumber(ALICE))).kind).toBe(
      "invalid-sequence-number",
    );
  });

  it("the last int64 sequence has no successor", async () => {
    const { client } = makeClient(async () =>
      json(accountBody(ALICE, { sequence: "9223372036854775807" })),
    );
    expect((await failure(client.fetchNextSequenceNumber(ALICE))).kind).toBe(
      "invalid-sequence-number",
    );
  });
});

// ── Fee stats ──────────────────────────────────────────────────────

describe("fetchFeeStats", () => {
  it("converts the string fields to numbers", async () => {
    const { client, fetch } = makeClient(async () =>
      json({
        last_ledger: "4521",
        last_ledger_base_fee: "100",
        ledger_capacity_usage: "0.97",
        fee_charged: distribution("100"),
        max_fee: distribution("250"),
      }),
    );
    const stats = await client.fetchFeeStats();
    expect(fetch.mock.calls[0]?.[0]).toBe("https://horizon.test/fee_stats");
    expect(stats.lastLedger).toBe(4521);
    expect(stats.ledgerCapacityUsage).toBe(0.97);
    expect(stats.feeCharged.p50).toBe(100);
    expect(stats.maxFee.p99).toBe(250);
  });
});

// ── Submission ─────────────────────────────────────────────────────

describe("submitTransaction", () => {
  const hash = "ab".repeat(32);

  it("POSTs the base64 envelope as a form field", async () => {
    const env = payment();
    const xdr = bytesToBase64(toXdr(TransactionEnvelope, env));
    const { client, fetch } = makeClient(async () =>
      json({ hash, ledger: 7, envelope_xdr: xdr, result_xdr: "AAAAAAAAAGQAAAAAAAAAAQAAAAA=" }),
    );

    const result = await client.submitTransaction(env);

    const [url, init] = fetch.mock.calls[0] ?? [];
    expect(url).toBe("https://horizon.test/transactions");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe(`tx=${encodeURIComponent(xdr)}`);
    expect(init?.headers).toMatchObject({ "Content-Type": "application/x-www-form-urlencoded" });
    expect(result).toEqual({
      hash,
      ledger: 7,
      envelopeXdr: xdr,
      resultXdr: "AAAAAAAAAGQAAAAAAAAAAQAAAAA=",
    });
  });

  it("accepts base64 text as-is", async () => {
    const { client, fetch } = makeClient(async () =>
      json({ hash, ledger: 1, envelope_xdr: "AAAA", result_xdr: "AAAA" }),
    );
    await client.submitTransaction("AAAA+/==");
    expect(fetch.mock.calls[0]?.[1].body).toBe("tx=AAAA%2B%2F%3D%3D");
  });

  it("a rejected transaction surfaces the problem body", async () => {
    const problem = { title: "Transaction Failed", extras: { result_codes: { transaction: "tx_bad_seq" } } };
    const { client } = makeClient(async () => json(problem, 400));
    const err = await failure(client.submitTransaction(payment()));
    expect(err.kind).toBe("unexpected-status");
    expect(err.status).toBe(400);
    expect(err.body).toBe(JSON.stringify(problem));
  });
});

// ── SEP-29 ─────────────────────────────────────────────────────────

describe("checkMemoRequired", () => {
  it("a flagged destination without a memo is refused", async () => {
    const { client } = makeClient(async () =>
      json(accountBody(BOB, { data: { "config.memo_required": "MQ==" } })),
    );
    const err = await failure(client.checkMemoRequired(payment()));
    expect(err.kind).toBe("account-requires-memo");
    expect(err.accountId).toBe(BOB);
  });

  it("a transaction with a memo is not checked", async () => {
    const { client, fetch } = makeClient(async () => json(accountBody(BOB)));
    await client.checkMemoRequired(payment(Memos.text("invoice 12")));
    expect(fetch).not.toHaveBeenCalled();
  });

  it("unflagged and missing destinations pass", async () => {
    const flagless = makeClient(async () => json(accountBody(BOB)));
    await expect(flagless.client.checkMemoRequired(payment())).resolves.toBeUndefined();

    const missing = makeClient(async () => new Response("", { status: 404 }));
    await expect(missing.client.checkMemoRequired(payment())).resolves.toBeUndefined();
  });

  it("other failures propagate", async () => {
    const { client } = makeClient(async () => new Response("", { status: 503 }));
    expect((await failure(client.checkMemoRequired(payment()))).status).toBe(503);
  });
});
