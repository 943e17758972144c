/**
 * Threshold evaluation — caller-side policy over verified signers.
 */

import { describe, it, expect } from "vitest";
import {
  buildTransaction,
  ConstructionError,
  envelopeSigningState,
  evaluateThreshold,
  Networks,
  newEnvelope,
  Operations,
  signEnvelope,
  SigningKeypair,
  thresholdPolicy,
  verifiedWeight,
  type ThresholdContext,
} from "../../src/index.js";

const a = SigningKeypair.fromPassphrase("signer-a");
const b = SigningKeypair.fromPassphrase("signer-b");
const c = SigningKeypair.fromPassphrase("signer-c");
const outsider = SigningKeypair.fromPassphrase("outsider");

const context: ThresholdContext = {
  signers: [
    { publicKey: a.publicKey(), weight: 1 },
    { publicKey: b.publicKey(), weight: 1 },
    { publicKey: c.publicKey(), weight: 1 },
  ],
  threshold: 2,
};

function envelope() {
  return newEnvelope(
    buildTransaction({
      source: a.publicKey(),
      sequence: "4294967297",
      operations: [Operations.bumpSequence({ bumpTo: 10n })],
    }),
  );
}

describe("evaluateThreshold", () => {
  it("2 of 3 with weights {1,1,1} meets threshold 2", () => {
    const env = signEnvelope(envelope(), Networks.TESTNET, a, c);
    const result = evaluateThreshold(env, Networks.TESTNET, context);
    expect(result.weight).toBe(2);
    expect(result.sufficient).toBe(true);
    expect(result.verified).toEqual(new Set([a.publicKey(), c.publicKey()]));
  });

  it("1 of 3 does not", () => {
    const env = signEnvelope(envelope(), Networks.TESTNET, b);
    const result = evaluateThreshold(env, Networks.TESTNET, context);
    expect(result.weight).toBe(1);
    expect(result.sufficient).toBe(false);
  });

  it("the same signer twice counts once", () => {
    const env = signEnvelope(envelope(), Networks.TESTNET, a, a);
    expect(evaluateThreshold(env, Networks.TESTNET, context).weight).toBe(1);
  });

  it("signatures from keys outside the signer set add nothing", () => {
    const env = signEnvelope(envelope(), Networks.TESTNET, a, outsider);
    expect(evaluateThreshold(env, Networks.TESTNET, context).sufficient).toBe(false);
  });

  it("signatures made for another network add nothing", () => {
    const env = signEnvelope(envelope(), Networks.PUBLIC, a, b);
    expect(evaluateThreshold(env, Networks.TESTNET, context).weight).toBe(0);
  });

  it("weights outside 0..255 are refused", () => {
    const env = envelope();
    expect(() =>
      evaluateThreshold(env, Networks.TESTNET, {
        signers: [{ publicKey: a.publicKey(), weight: 256 }],
        threshold: 1,
      }),
    ).toThrow(ConstructionError);
  });
});

describe("verifiedWeight", () => {
  it("sums weights of verified keys only", () => {
    const signers = [
      { publicKey: "GA", weight: 5 },
      { publicKey: "GB", weight: 7 },
    ];
    expect(verifiedWeight(new Set(["GB"]), signers)).toBe(7);
    expect(verifiedWeight(new Set(["GA", "GB", "GC"]), signers)).toBe(12);
  });
});

describe("thresholdPolicy", () => {
  it("drives envelopeSigningState", () => {
    const policy = thresholdPolicy(context);
    const candidates = [a, b, c];
    const one = signEnvelope(envelope(), Networks.TESTNET, a);
    const two = signEnvelope(one, Networks.TESTNET, b);
    expect(envelopeSigningState(one, Networks.TESTNET, candidates, policy)).toBe("partiallySigned");
    expect(envelopeSigningState(two, Networks.TESTNET, candidates, policy)).toBe(
      "sufficientlySigned",
    );
  });
});
