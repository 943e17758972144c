/**
 * ledgerkit verify <xdr> <keys...> [--threshold n]
 *
 * Report which of the candidate keys signed the envelope for the
 * configured network. Without --threshold every candidate must have
 * signed; with it, each candidate weighs 1 and that many must have.
 */

import {
  envelopeSigningState,
  thresholdPolicy,
  verifySignatures,
  type SigningPolicy,
} from "@ledgerkit/sdk";
import { networkPassphrase, readEnvelope, type CommandContext } from "../lib/context.js";

interface VerifyOptions {
  threshold?: number;
}

export async function verifyCommand(
  xdr: string,
  keys: string[],
  ctx: CommandContext,
  opts: VerifyOptions,
): Promise<void> {
  if (keys.length === 0) throw new Error("Give at least one public key to verify against");
  const envelope = await readEnvelope(xdr);
  const passphrase = networkPassphrase(ctx.config);

  const policy: SigningPolicy =
    opts.threshold !== undefined
      ? thresholdPolicy({
          signers: keys.map((publicKey) => ({ publicKey, weight: 1 })),
          threshold: opts.threshold,
        })
      : (verified) => keys.every((key) => verified.has(key));

  const verified = verifySignatures(envelope, passphrase, keys);
  for (const key of keys) {
    console.log(`  ${verified.has(key) ? "signed " : "missing"}  ${key}`);
  }
  console.log(`state: ${envelopeSigningState(envelope, passphrase, keys, policy)}`);
}
