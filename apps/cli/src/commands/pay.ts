/**
 * ledgerkit pay <destination> <amount> [--asset CODE:ISSUER] [--memo text]
 *
 * Fetch sequence + fee stats → build payment → sign with the key file →
 * SEP-29 memo check → submit → print hash.
 */

import {
  BASE_FEE,
  buildTransaction,
  Memos,
  newEnvelope,
  Operations,
  signEnvelope,
} from "@ledgerkit/sdk";
import { networkPassphrase, type CommandContext } from "../lib/context.js";
import { loadKeys } from "../lib/keys.js";

/** Seconds a built payment stays valid. */
const PAYMENT_TIMEOUT_SECS = 300;

interface PayOptions {
  asset?: string;
  memo?: string;
  /** Per-operation fee in stroops; defaults to the last ledger's base fee. */
  fee?: number;
}

export async function payCommand(
  destination: string,
  amount: string,
  ctx: CommandContext,
  opts: PayOptions,
): Promise<void> {
  const signer = await loadKeys(ctx.config.keyPath);
  const source = signer.publicKey();

  const sequence = await ctx.horizon.fetchNextSequenceNumber(source);
  const baseFee =
    opts.fee ?? Math.max(BASE_FEE, (await ctx.horizon.fetchFeeStats()).lastLedgerBaseFee);
  ctx.log.debug({ source, sequence: sequence.toString(), baseFee }, "building payment");

  const tx = buildTransaction({
    source,
    sequence,
    baseFee,
    memo: opts.memo !== undefined ? Memos.text(opts.memo) : undefined,
    timeoutSeconds: PAYMENT_TIMEOUT_SECS,
    operations: [Operations.payment({ destination, asset: opts.asset ?? "native", amount })],
  });
  const envelope = signEnvelope(newEnvelope(tx), networkPassphrase(ctx.config), signer);

  await ctx.horizon.checkMemoRequired(envelope);
  const result = await ctx.horizon.submitTransaction(envelope);
  console.log(`  paid:   ${amount} ${opts.asset ?? "XLM"} → ${destination}`);
  console.log(`  hash:   ${result.hash}`);
  console.log(`  ledger: ${result.ledger}`);
}
