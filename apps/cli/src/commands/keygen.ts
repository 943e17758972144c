/**
 * ledgerkit keygen
 *
 * Generate an Ed25519 signing key → write to ~/.ledgerkit/key.json.
 */

import { existsSync } from "node:fs";
import type { CommandContext } from "../lib/context.js";
import { generateAndSaveKeys } from "../lib/keys.js";

interface KeygenOptions {
  force?: boolean;
}

export async function keygenCommand(ctx: CommandContext, opts: KeygenOptions): Promise<void> {
  const keyPath = ctx.config.keyPath;

  if (existsSync(keyPath) && !opts.force) {
    throw new Error(`Key file already exists at ${keyPath}\nUse --force to overwrite.`);
  }

  const keyFile = await generateAndSaveKeys(keyPath);
  ctx.log.info({ keyPath }, "key generated");

  console.log(`  public key: ${keyFile.publicKey}`);
  console.log(`  saved:      ${keyPath}`);
}
