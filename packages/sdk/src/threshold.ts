/**
 * Weighted-threshold evaluation over an envelope's verified signers.
 *
 * Account signer weights are ledger state this package never fetches; the
 * caller supplies them. Each verified key counts once however many times it
 * signed.
 */

import { ConstructionError } from "./errors.js";
import { verifySignatures, type SigningPolicy } from "./signing.js";
import type { TransactionEnvelope } from "./types/transaction.js";

export interface WeightedSigner {
  /** G... address. */
  readonly publicKey: string;
  /** 0..255 */
  readonly weight: number;
}

export interface ThresholdContext {
  readonly signers: readonly WeightedSigner[];
  readonly threshold: number;
}

export interface ThresholdResult {
  readonly weight: number;
  readonly sufficient: boolean;
  readonly verified: ReadonlySet<string>;
}

function checkWeights(context: ThresholdContext): void {
  for (const s of context.signers) {
    if (!Number.isInteger(s.weight) || s.weight < 0 || s.weight > 255) {
      throw new ConstructionError(`signer ${s.publicKey}: weight ${s.weight} is not in 0..255`);
    }
  }
  if (!Number.isInteger(context.threshold) || context.threshold < 0) {
    throw new ConstructionError(`threshold ${context.threshold} is not a non-negative integer`);
  }
}

/** Sum of weights of the verified keys. Duplicate signer entries count once. */
export function verifiedWeight(
  verified: ReadonlySet<string>,
  signers: readonly WeightedSigner[],
): number {
  const weights = new Map<string, number>();
  for (const s of signers) weights.set(s.publicKey, Math.max(weights.get(s.publicKey) ?? 0, s.weight));
  let total = 0;
  for (const [key, weight] of weights) {
    if (verified.has(key)) total += weight;
  }
  return total;
}

export function evaluateThreshold(
  envelope: TransactionEnvelope,
  networkPassphrase: string,
  context: ThresholdContext,
): ThresholdResult {
  checkWeights(context);
  const verified = verifySignatures(
    envelope,
    networkPassphrase,
    context.signers.map((s) => s.publicKey),
  );
  const weight = verifiedWeight(verified, context.signers);
  return { weight, sufficient: weight >= context.threshold, verified };
}

/** A SigningPolicy for envelopeSigningState from a threshold context. */
export function thresholdPolicy(context: ThresholdContext): SigningPolicy {
  checkWeights(context);
  return (verified) => verifiedWeight(verified, context.signers) >= context.threshold;
}
