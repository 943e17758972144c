/**
 * ledgerkit sign <xdr> [--secret S...]
 *
 * Add one signature for the configured network and print the new
 * envelope. Existing signatures are kept; the input is not modified.
 */

import { signEnvelope, SigningKeypair, toXdrBase64, TransactionEnvelope } from "@ledgerkit/sdk";
import { networkPassphrase, readEnvelope, type CommandContext } from "../lib/context.js";
import { loadKeys } from "../lib/keys.js";

interface SignOptions {
  secret?: string;
}

export async function signCommand(
  xdr: string,
  ctx: CommandContext,
  opts: SignOptions,
): Promise<void> {
  const envelope = await readEnvelope(xdr);
  const signer =
    opts.secret !== undefined
      ? SigningKeypair.fromSecret(opts.secret)
      : await loadKeys(ctx.config.keyPath);

  const signed = signEnvelope(envelope, networkPassphrase(ctx.config), signer);
  ctx.log.debug({ signer: signer.publicKey(), network: ctx.config.network }, "signed");
  console.log(toXdrBase64(TransactionEnvelope, signed));
}
