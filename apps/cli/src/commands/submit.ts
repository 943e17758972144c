/**
 * ledgerkit submit <xdr> [--skip-memo-check]
 *
 * SEP-29 memo check → POST /transactions → print hash and ledger.
 */

import { readEnvelope, type CommandContext } from "../lib/context.js";

interface SubmitOptions {
  skipMemoCheck?: boolean;
}

export async function submitCommand(
  xdr: string,
  ctx: CommandContext,
  opts: SubmitOptions,
): Promise<void> {
  const envelope = await readEnvelope(xdr);
  if (!opts.skipMemoCheck) await ctx.horizon.checkMemoRequired(envelope);

  const result = await ctx.horizon.submitTransaction(envelope);
  console.log(`  hash:   ${result.hash}`);
  console.log(`  ledger: ${result.ledger}`);
}
