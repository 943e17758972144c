#!/usr/bin/env -S npx tsx
/**
 * ledgerkit CLI — keys, envelopes and submission from the shell.
 *
 * Commands:
 *   keygen                     Generate an Ed25519 signing key
 *   address [secret]           Print the G... address of a seed or the key file
 *   decode <xdr>               Base64 envelope → JSON
 *   sign <xdr>                 Add a signature for the configured network
 *   verify <xdr> <keys...>     Which candidate keys signed
 *   account <id>               Query an account from Horizon
 *   pay <dest> <amount>        Build, sign and submit a payment
 *   submit <xdr>               Submit a signed envelope
 *   config                     Show/set CLI configuration
 *
 * An <xdr> argument of "-" is read from stdin.
 */

import { Command, InvalidArgumentError } from "commander";
import { HorizonRestClient } from "@ledgerkit/horizon-client";
import { loadConfig } from "./lib/config.js";
import type { CommandContext } from "./lib/context.js";
import { createLogger } from "./lib/logger.js";
import { keygenCommand } from "./commands/keygen.js";
import { addressCommand } from "./commands/address.js";
import { decodeCommand } from "./commands/decode.js";
import { signCommand } from "./commands/sign.js";
import { verifyCommand } from "./commands/verify.js";
import { accountCommand } from "./commands/account.js";
import { payCommand } from "./commands/pay.js";
import { submitCommand } from "./commands/submit.js";
import { configCommand } from "./commands/config-cmd.js";

const VERSION = "0.1.0";

interface GlobalOptions {
  horizon?: string;
  network?: string;
}

function nonNegativeInt(value: string): number {
  if (!/^\d+$/.test(value)) throw new InvalidArgumentError("expected a non-negative integer");
  return Number(value);
}

const program = new Command();

program
  .name("ledgerkit")
  .description("Build, sign, inspect and submit ledger transactions")
  .version(VERSION)
  .option("-H, --horizon <url>", "Horizon URL override")
  .option("-n, --network <name>", "Network name or passphrase override");

/** Config + overrides → logger and Horizon client. */
async function context(): Promise<CommandContext> {
  const config = await loadConfig();
  const global = program.opts<GlobalOptions>();
  if (global.horizon) config.horizonUrl = global.horizon;
  if (global.network) config.network = global.network;
  const log = createLogger(config.logLevel);
  const horizon = new HorizonRestClient({
    baseUrl: config.horizonUrl,
    logger: log.child({ component: "horizon" }),
    clientName: "ledgerkit-cli",
    clientVersion: VERSION,
  });
  return { config, log, horizon };
}

// ── keygen ──────────────────────────────────────────────────────────

program
  .command("keygen")
  .description("Generate an Ed25519 signing key → ~/.ledgerkit/key.json")
  .option("--force", "Overwrite existing key file")
  .action(async (opts: { force?: boolean }) => {
    await keygenCommand(await context(), opts);
  });

// ── address ─────────────────────────────────────────────────────────

program
  .command("address")
  .description("Print the public address of a secret seed (default: the key file)")
  .argument("[secret]", "S... secret seed")
  .action(async (secret: string | undefined) => {
    await addressCommand(secret, await context());
  });

// ── decode ──────────────────────────────────────────────────────────

program
  .command("decode")
  .description("Decode a base64 transaction envelope to JSON")
  .argument("<xdr>", "Base64 envelope, or - for stdin")
  .action(async (xdr: string) => {
    await decodeCommand(xdr, await context());
  });

// ── sign ────────────────────────────────────────────────────────────

program
  .command("sign")
  .description("Sign an envelope for the configured network and print it")
  .argument("<xdr>", "Base64 envelope, or - for stdin")
  .option("--secret <seed>", "Sign with this S... seed instead of the key file")
  .action(async (xdr: string, opts: { secret?: string }) => {
    await signCommand(xdr, await context(), opts);
  });

// ── verify ──────────────────────────────────────────────────────────

program
  .command("verify")
  .description("Check which of the given public keys signed an envelope")
  .argument("<xdr>", "Base64 envelope, or - for stdin")
  .argument("<keys...>", "Candidate G... public keys")
  .option("--threshold <n>", "Signatures needed (each key weighs 1)", nonNegativeInt)
  .action(async (xdr: string, keys: string[], opts: { threshold?: number }) => {
    await verifyCommand(xdr, keys, await context(), opts);
  });

// ── account ─────────────────────────────────────────────────────────

program
  .command("account")
  .description("Query an account: sequence, thresholds, balances, signers")
  .argument("<id>", "G... account id")
  .action(async (id: string) => {
    await accountCommand(id, await context());
  });

// ── pay ─────────────────────────────────────────────────────────────

program
  .command("pay")
  .description("Pay from the key file's account: build → sign → submit")
  .argument("<destination>", "G... or M... destination")
  .argument("<amount>", "Decimal amount, up to 7 places")
  .option("--asset <asset>", "CODE:ISSUER (default: native)")
  .option("--memo <text>", "Text memo (≤ 28 bytes)")
  .option("--fee <stroops>", "Per-operation fee (default: last ledger base fee)", nonNegativeInt)
  .action(
    async (
      destination: string,
      amount: string,
      opts: { asset?: string; memo?: string; fee?: number },
    ) => {
      await payCommand(destination, amount, await context(), opts);
    },
  );

// ── submit ──────────────────────────────────────────────────────────

program
  .command("submit")
  .description("Submit a signed envelope (runs the SEP-29 memo check first)")
  .argument("<xdr>", "Base64 envelope, or - for stdin")
  .option("--skip-memo-check", "Do not look up memo_required on destinations")
  .action(async (xdr: string, opts: { skipMemoCheck?: boolean }) => {
    await submitCommand(xdr, await context(), opts);
  });

// ── config ──────────────────────────────────────────────────────────

program
  .command("config")
  .description("Show or update CLI configuration")
  .option("--horizon-url <url>", "Set Horizon URL")
  .option("--set-network <name>", "Set network name or passphrase")
  .option("--key-path <path>", "Set key file path")
  .option("--log-level <level>", "Set log level")
  .action(
    async (opts: { horizonUrl?: string; setNetwork?: string; keyPath?: string; logLevel?: string }) => {
      await configCommand({
        horizon: opts.horizonUrl,
        network: opts.setNetwork,
        keyPath: opts.keyPath,
        logLevel: opts.logLevel,
      });
    },
  );

// ── Run ─────────────────────────────────────────────────────────────

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`\nError: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
