/**
 * CLI commands against MockHorizonClient and a temp key directory.
 * Output is captured from console.log.
 */

import { mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { pino } from "pino";
import {
  buildTransaction,
  envelopeSignatures,
  fromXdrBase64,
  Memos,
  Networks,
  newEnvelope,
  Operations,
  signEnvelope,
  SigningKeypair,
  toHex,
  toXdrBase64,
  transactionHash,
  TransactionEnvelope,
  verifySignatures,
} from "@ledgerkit/sdk";
import { MockHorizonClient } from "@ledgerkit/horizon-client";
import type { CliConfig } from "../src/lib/config.js";
import type { CommandContext } from "../src/lib/context.js";
import { loadKeys, saveKeys } from "../src/lib/keys.js";
import { keygenCommand } from "../src/commands/keygen.js";
import { addressCommand } from "../src/commands/address.js";
import { decodeCommand } from "../src/commands/decode.js";
import { signCommand } from "../src/commands/sign.js";
import { verifyCommand } from "../src/commands/verify.js";
import { accountCommand } from "../src/commands/account.js";
import { payCommand } from "../src/commands/pay.js";
import { submitCommand } from "../src/commands/submit.js";

// ── Helpers ────────────────────────────────────────────────────────

const alice = SigningKeypair.fromRawSeed(new Uint8Array(32).fill(1));
const bob = SigningKeypair.fromRawSeed(new Uint8Array(32).fill(2));
const ALICE = "GCFIRY65OQE7DFP5KLNS2PF2LVZMUZYJX4OZIEQ36N2IQANUB5XVYOJR";
const BOB = "GCATS5YOVB6ROX2WUNKGNQ2MP3GMXDMKSG2O4N5CLX3A6W4PZGZZI55U";

let dir: string;
let horizon: MockHorizonClient;
let output: string[];

function ctx(overrides: Partial<CliConfig> = {}): CommandContext {
  return {
    config: {
      horizonUrl: "http://horizon.invalid",
      network: "testnet",
      keyPath: join(dir, "key.json"),
      logLevel: "silent",
      ...overrides,
    },
    log: pino({ level: "silent" }),
    horizon,
  };
}

function unsignedPayment(memo = Memos.none()) {
  return newEnvelope(
    buildTransaction({
      source: ALICE,
      sequence: 2n,
      memo,
      operations: [Operations.payment({ destination: BOB, asset: "native", amount: "10" })],
    }),
  );
}

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "ledgerkit-cli-"));
  horizon = new MockHorizonClient(Networks.TESTNET);
  output = [];
  vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
    output.push(args.map(String).join(" "));
  });
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

// ── Keys ───────────────────────────────────────────────────────────

describe("keygen", () => {
  it("writes a 0600 key file that loads back", async () => {
    await keygenCommand(ctx(), {});
    const keypair = await loadKeys(join(dir, "key.json"));
    expect(output[0]).toBe(`  public key: ${keypair.publicKey()}`);
    expect((await stat(join(dir, "key.json"))).mode & 0o777).toBe(0o600);
  });

  it("refuses to overwrite without --force", async () => {
    await keygenCommand(ctx(), {});
    const first = await readFile(join(dir, "key.json"), "utf-8");
    await expect(keygenCommand(ctx(), {})).rejects.toThrow("Key file already exists");
    await keygenCommand(ctx(), { force: true });
    expect(await readFile(join(dir, "key.json"), "utf-8")).not.toBe(first);
  });

  it("a key file whose public key does not match is rejected", async () => {
    const path = join(dir, "bad.json");
    await saveKeys(path, bob);
    const text = (await readFile(path, "utf-8")).replace(BOB, ALICE);
    await writeFile(path, text);
    await expect(loadKeys(path)).rejects.toThrow("publicKey does not match secret");
  });
});

describe("address", () => {
  it("derives from a given seed", async () => {
    await addressCommand(alice.secret(), ctx());
    expect(output).toEqual([ALICE]);
  });

  it("falls back to the key file", async () => {
    await saveKeys(join(dir, "key.json"), bob);
    await addressCommand(undefined, ctx());
    expect(output).toEqual([BOB]);
  });

  it("a missing key file says how to make one", async () => {
    await expect(addressCommand(undefined, ctx())).rejects.toThrow("Run 'ledgerkit keygen'");
  });
});

// ── Envelopes ──────────────────────────────────────────────────────

describe("decode", () => {
  it("renders a signed payment as JSON", async () => {
    const env = signEnvelope(unsignedPayment(Memos.text("hi")), Networks.TESTNET, alice);
    const [signature] = envelopeSignatures(env);
    await decodeCommand(toXdrBase64(TransactionEnvelope, env), ctx());

    const decoded: unknown = JSON.parse(output.join("\n"));
    expect(decoded).toEqual({
      type: "tx",
      hash: toHex(transactionHash(Networks.TESTNET, env)),
      tx: {
        sourceAccount: ALICE,
        fee: 100,
        seqNum: "2",
        memo: { type: "text", text: "hi" },
        operations: [
          {
            body: {
              type: "payment",
              destination: BOB,
              asset: "native",
              amount: "100000000",
            },
          },
        ],
      },
      signatures: [
        { hint: toHex(alice.hint()), signature: toHex(signature?.signature ?? new Uint8Array()) },
      ],
    });
  });

  it("a credit asset renders as CODE:ISSUER", async () => {
    const env = newEnvelope(
      buildTransaction({
        source: ALICE,
        sequence: 3n,
        operations: [Operations.changeTrust({ asset: `USD:${BOB}`, limit: "1000" })],
      }),
    );
    await decodeCommand(toXdrBase64(TransactionEnvelope, env), ctx());
    const decoded: unknown = JSON.parse(output.join("\n"));
    expect(decoded).toMatchObject({
      tx: { operations: [{ body: { type: "changeTrust", line: `USD:${BOB}`, limit: "10000000000" } }] },
    });
  });

  it("garbage input is a decode error", async () => {
    await expect(decodeCommand("AAAA", ctx())).rejects.toThrow();
  });
});

describe("sign", () => {
  it("adds one signature for the configured network", async () => {
    const xdr = toXdrBase64(TransactionEnvelope, unsignedPayment());
    await signCommand(xdr, ctx(), { secret: alice.secret() });

    const signed = fromXdrBase64(TransactionEnvelope, output[0] ?? "");
    expect(verifySignatures(signed, Networks.TESTNET, [ALICE])).toEqual(new Set([ALICE]));
    expect(verifySignatures(signed, Networks.PUBLIC, [ALICE])).toEqual(new Set());
  });

  it("uses the key file and keeps existing signatures", async () => {
    await saveKeys(join(dir, "key.json"), bob);
    const once = signEnvelope(unsignedPayment(), Networks.TESTNET, alice);
    await signCommand(toXdrBase64(TransactionEnvelope, once), ctx(), {});

    const twice = fromXdrBase64(TransactionEnvelope, output[0] ?? "");
    expect(verifySignatures(twice, Networks.TESTNET, [ALICE, BOB])).toEqual(new Set([ALICE, BOB]));
  });
});

describe("verify", () => {
  it("lists signed and missing keys with the signing state", async () => {
    const env = signEnvelope(unsignedPayment(), Networks.TESTNET, alice);
    await verifyCommand(toXdrBase64(TransactionEnvelope, env), [ALICE, BOB], ctx(), {});
    expect(output).toEqual([
      `  signed   ${ALICE}`,
      `  missing  ${BOB}`,
      "state: partiallySigned",
    ]);
  });

  it("--threshold decides sufficiency", async () => {
    const env = signEnvelope(unsignedPayment(), Networks.TESTNET, alice);
    await verifyCommand(toXdrBase64(TransactionEnvelope, env), [ALICE, BOB], ctx(), { threshold: 1 });
    expect(output.at(-1)).toBe("state: sufficientlySigned");
  });

  it("an unsigned envelope", async () => {
    await verifyCommand(toXdrBase64(TransactionEnvelope, unsignedPayment()), [ALICE], ctx(), {});
    expect(output.at(-1)).toBe("state: unsigned");
  });
});

// ── Horizon ────────────────────────────────────────────────────────

describe("account", () => {
  it("prints sequence, balances and signers", async () => {
    horizon.setAccount(ALICE, {
      sequence: 77n,
      thresholds: { lowThreshold: 1, medThreshold: 2, highThreshold: 3 },
      balances: [{ assetType: "native", balance: "42.0000000" }],
      signers: [{ key: ALICE, weight: 10, type: "ed25519_public_key" }],
    });
    await accountCommand(ALICE, ctx());
    expect(output).toEqual([
      `Account ${ALICE}\n`,
      "  sequence:   77",
      "  thresholds: low 1 / med 2 / high 3",
      "  balances:",
      `    ${"42.0000000".padStart(20)}  XLM`,
      "  signers:",
      `     10  ${ALICE}`,
    ]);
  });
});

describe("submit", () => {
  it("submits and prints the hash", async () => {
    horizon.setAccount(ALICE, { sequence: 1n });
    const env = signEnvelope(unsignedPayment(), Networks.TESTNET, alice);
    await submitCommand(toXdrBase64(TransactionEnvelope, env), ctx(), {});
    expect(output).toEqual([
      `  hash:   ${toHex(transactionHash(Networks.TESTNET, env))}`,
      "  ledger: 2",
    ]);
  });

  it("stops at a memo_required destination unless told to skip", async () => {
    horizon.setAccount(ALICE, { sequence: 1n });
    horizon.setAccount(BOB, { data: { "config.memo_required": "MQ==" } });
    const xdr = toXdrBase64(TransactionEnvelope, signEnvelope(unsignedPayment(), Networks.TESTNET, alice));

    await expect(submitCommand(xdr, ctx(), {})).rejects.toThrow(`destination ${BOB} requires a memo`);
    expect(horizon.submitted()).toHaveLength(0);

    await submitCommand(xdr, ctx(), { skipMemoCheck: true });
    expect(horizon.submitted()).toHaveLength(1);
  });
});

describe("pay", () => {
  it("builds from the next sequence, signs with the key file and submits", async () => {
    await saveKeys(join(dir, "key.json"), alice);
    horizon.setAccount(ALICE, { sequence: 5n });

    await payCommand(BOB, "2.5", ctx(), { memo: "rent" });

    const [sent] = horizon.submitted();
    if (sent?.type !== "tx") throw new Error("expected a v1 envelope");
    const { tx } = sent.v1;
    expect(tx.seqNum).toBe(6n);
    expect(tx.fee).toBe(100);
    expect(tx.memo).toEqual(Memos.text("rent"));
    expect(tx.operations[0]?.body).toMatchObject({ type: "payment", amount: 25_000_000n });
    expect(tx.timeBounds?.maxTime).toBeGreaterThan(0n);
    expect(verifySignatures(sent, Networks.TESTNET, [ALICE])).toEqual(new Set([ALICE]));
    expect(output[0]).toBe(`  paid:   2.5 XLM → ${BOB}`);
  });

  it("an explicit fee overrides fee stats", async () => {
    await saveKeys(join(dir, "key.json"), alice);
    horizon.setAccount(ALICE, { sequence: 0n });
    await payCommand(BOB, "1", ctx(), { fee: 300 });
    const [sent] = horizon.submitted();
    expect(sent?.type === "tx" ? sent.v1.tx.fee : undefined).toBe(300);
  });
});
