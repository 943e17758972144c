/**
 * ledgerkit account <id>
 *
 * GET /accounts/:id → sequence, thresholds, balances, signers.
 */

import type { CommandContext } from "../lib/context.js";

export async function accountCommand(accountId: string, ctx: CommandContext): Promise<void> {
  const account = await ctx.horizon.fetchAccount(accountId);
  const { lowThreshold, medThreshold, highThreshold } = account.thresholds;

  console.log(`Account ${account.accountId}\n`);
  console.log(`  sequence:   ${account.sequence}`);
  console.log(`  thresholds: low ${lowThreshold} / med ${medThreshold} / high ${highThreshold}`);

  console.log(`  balances:`);
  for (const b of account.balances) {
    const asset = b.assetType === "native" ? "XLM" : `${b.assetCode ?? "?"}:${b.assetIssuer ?? "?"}`;
    console.log(`    ${b.balance.padStart(20)}  ${asset}`);
  }

  console.log(`  signers:`);
  for (const s of account.signers) {
    console.log(`    ${String(s.weight).padStart(3)}  ${s.key}`);
  }

  const names = Object.keys(account.data);
  if (names.length > 0) {
    console.log(`  data:`);
    for (const name of names) console.log(`    ${name} = ${account.data[name] ?? ""}`);
  }
}
