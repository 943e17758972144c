/**
 * ledgerkit address [secret]
 *
 * Print the G... address of a secret seed, or of the configured key file.
 */

import { SigningKeypair } from "@ledgerkit/sdk";
import type { CommandContext } from "../lib/context.js";
import { loadKeys } from "../lib/keys.js";

export async function addressCommand(
  secret: string | undefined,
  ctx: CommandContext,
): Promise<void> {
  const keypair =
    secret !== undefined ? SigningKeypair.fromSecret(secret) : await loadKeys(ctx.config.keyPath);
  console.log(keypair.publicKey());
}
