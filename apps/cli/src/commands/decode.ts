/**
 * ledgerkit decode <xdr>
 *
 * Base64 envelope → JSON on stdout, with the transaction hash for the
 * configured network.
 */

import { describeEnvelope } from "../lib/render.js";
import { networkPassphrase, readEnvelope, type CommandContext } from "../lib/context.js";

export async function decodeCommand(xdr: string, ctx: CommandContext): Promise<void> {
  const envelope = await readEnvelope(xdr);
  console.log(JSON.stringify(describeEnvelope(envelope, networkPassphrase(ctx.config)), null, 2));
}
