/**
 * Golden test vectors — signature payloads and the multi-signer engine.
 * Hashes and signatures generated independently (RFC 8032 reference).
 */

import { describe, it, expect } from "vitest";
import {
  addSignature,
  base64ToBytes,
  buildTransaction,
  bytesToBase64,
  ConstructionError,
  envelopeSigningState,
  fromXdr,
  Keypair,
  Memos,
  networkId,
  Networks,
  newEnvelope,
  Operations,
  resolveSigners,
  signableOf,
  signatureHint,
  signaturePayload,
  signEnvelope,
  SigningKeypair,
  signTransaction,
  toHex,
  toXdr,
  transactionHash,
  TransactionEnvelope,
  verifySignatures,
  wrapFeeBump,
  type DecoratedSignature,
} from "../../src/index.js";

const kp1 = SigningKeypair.fromRawSeed(new Uint8Array(32).fill(1));
const kp2 = SigningKeypair.fromRawSeed(new Uint8Array(32).fill(2));
const kp3 = SigningKeypair.fromRawSeed(new Uint8Array(32).fill(3));

const UNSIGNED =
  "AAAAAgAAAACKiOPddAnxlf1S2y08ul1yymcJvx2UEhvzdIgBtA9vXAAAAGQAAAAAAAAAAgAAAAEAAAAAAAAAAAAAAAAAAAAAAAAAAQAAAAJoaQAAAAAAAQAAAAAAAAABAAAAAIE5dw6ofRdfVqNUZsNMfszLjYqRtO43ol32D1uPybOUAAAAAAAAAAAF9eEAAAAAAAAAAAA=";
const SIGNED =
  "AAAAAgAAAACKiOPddAnxlf1S2y08ul1yymcJvx2UEhvzdIgBtA9vXAAAAGQAAAAAAAAAAgAAAAEAAAAAAAAAAAAAAAAAAAAAAAAAAQAAAAJoaQAAAAAAAQAAAAAAAAABAAAAAIE5dw6ofRdfVqNUZsNMfszLjYqRtO43ol32D1uPybOUAAAAAAAAAAAF9eEAAAAAAAAAAAG0D29cAAAAQOggbM+I2ehStu+BTFrU7rSzzQcz/nyVIgndmiJ9nv7JMvxe0k+TNtH7H/n5Ygb3qePGs/acngMgSKKtk0Ypkwg=";
const V0_UNSIGNED =
  "AAAAAIqI4910CfGV/VLbLTy6XXLKZwm/HZQSG/N0iAG0D29cAAAAZAAAAAAAAAACAAAAAQAAAAAAAAAAAAAAAAAAAAAAAAABAAAAAmhpAAAAAAABAAAAAAAAAAEAAAAAgTl3Dqh9F19Wo1Rmw0x+zMuNipG07jeiXfYPW4/Js5QAAAAAAAAAAAX14QAAAAAAAAAAAA==";

const TESTNET_HASH = "fe7814003b1d10820b567becd4a95d58879151d9c16c3cadddcd285b87a17eb3";
const PUBNET_HASH = "2ee5dbdd5a37a6ea3cd45beb85774a0b69feec1dfc2e36fdd61681240f6580ac";
const FEE_BUMP_HASH = "ed28d757fc8966aa93c8161a2720c66baf91d17bf83ee17dd81e848821e141c7";

function unsignedEnvelope(): TransactionEnvelope {
  const tx = buildTransaction({
    source: kp1.publicKey(),
    sequence: 2n,
    memo: Memos.text("hi"),
    timeBounds: { minTime: 0n, maxTime: 0n },
    operations: [
      Operations.payment({ destination: kp2.publicKey(), asset: "native", amount: "10" }),
    ],
  });
  return newEnvelope(tx);
}

function encode(env: TransactionEnvelope): string {
  return bytesToBase64(toXdr(TransactionEnvelope, env));
}

describe("network id", () => {
  it("is sha256 of the passphrase", () => {
    expect(toHex(networkId(Networks.TESTNET))).toBe(
      "cee0302d59844d32bdca915c8203dd44b33fbb7edc19051ea37abedf28ecd472",
    );
  });
});

describe("signature payload", () => {
  it("builder output matches the reference envelope bytes", () => {
    expect(encode(unsignedEnvelope())).toBe(UNSIGNED);
  });

  it("hash on testnet", () => {
    expect(toHex(signaturePayload(Networks.TESTNET, unsignedEnvelope()))).toBe(TESTNET_HASH);
    expect(toHex(transactionHash(Networks.TESTNET, unsignedEnvelope()))).toBe(TESTNET_HASH);
  });

  it("the same transaction hashes differently on another network", () => {
    expect(toHex(signaturePayload(Networks.PUBLIC, unsignedEnvelope()))).toBe(PUBNET_HASH);
  });

  it("a v0 transaction hashes as its v1 form", () => {
    const v0 = fromXdr(TransactionEnvelope, base64ToBytes(V0_UNSIGNED));
    expect(v0.type).toBe("txV0");
    expect(toHex(signaturePayload(Networks.TESTNET, v0))).toBe(TESTNET_HASH);
  });

  it("accepts the bare transaction as well as the envelope", () => {
    const env = unsignedEnvelope();
    expect(toHex(signaturePayload(Networks.TESTNET, signableOf(env)))).toBe(TESTNET_HASH);
  });

  it("signatures do not change the payload", () => {
    const signed = fromXdr(TransactionEnvelope, base64ToBytes(SIGNED));
    expect(toHex(signaturePayload(Networks.TESTNET, signed))).toBe(TESTNET_HASH);
  });
});

describe("signing", () => {
  it("reproduces the reference signed envelope", () => {
    const signed = signEnvelope(unsignedEnvelope(), Networks.TESTNET, kp1);
    expect(encode(signed)).toBe(SIGNED);
  });

  it("decorated signature = hint + ed25519 over the payload", () => {
    const sig = signTransaction(unsignedEnvelope(), Networks.TESTNET, kp1);
    expect(toHex(sig.hint)).toBe("b40f6f5c");
    expect(toHex(sig.signature)).toBe(
      "e8206ccf88d9e852b6ef814c5ad4eeb4b3cd0733fe7c952209dd9a227d9efec9" +
        "32fc5ed24f9336d1fb1ff9f96206f7a9e3c6b3f69c9e032048a2ad9346299308",
    );
  });

  it("signatureHint is the last 4 bytes of the key", () => {
    expect(signatureHint(kp1)).toEqual(kp1.rawPublicKey().slice(28));
    expect(signatureHint(kp1.rawPublicKey())).toEqual(kp1.hint());
    expect(() => signatureHint(new Uint8Array(31))).toThrow(ConstructionError);
  });

  it("leaves the input envelope untouched", () => {
    const env = unsignedEnvelope();
    signEnvelope(env, Networks.TESTNET, kp1, kp2);
    expect(encode(env)).toBe(UNSIGNED);
  });
});

describe("verification", () => {
  it("returns the keys whose signatures verify", () => {
    const env = signEnvelope(unsignedEnvelope(), Networks.TESTNET, kp1, kp3);
    const verified = verifySignatures(env, Networks.TESTNET, [kp1, kp2, kp3.publicKey()]);
    expect([...verified].sort()).toEqual([kp1.publicKey(), kp3.publicKey()].sort());
  });

  it("a signature for one network does not verify on another", () => {
    const env = signEnvelope(unsignedEnvelope(), Networks.TESTNET, kp1);
    expect(verifySignatures(env, Networks.PUBLIC, [kp1]).size).toBe(0);
  });

  it("tries every candidate that shares a hint", () => {
    // Two decoys: valid curve points that differ from kp2 in the first byte
    // and therefore share its hint.
    const decoyA = kp2.rawPublicKey();
    decoyA[0] = 0x00;
    const decoyB = kp2.rawPublicKey();
    decoyB[0] = 0x01;
    const candidates = [
      Keypair.fromRawPublicKey(decoyA),
      kp2.toPublic(),
      Keypair.fromRawPublicKey(decoyB),
    ];
    expect(candidates.every((c) => toHex(c.hint()) === toHex(kp2.hint()))).toBe(true);

    const env = signEnvelope(unsignedEnvelope(), Networks.TESTNET, kp2);
    const [resolved] = resolveSigners(env, candidates);
    expect(resolved?.candidates).toHaveLength(3);

    const verified = verifySignatures(env, Networks.TESTNET, candidates);
    expect([...verified]).toEqual([kp2.publicKey()]);
  });

  it("signatures with no matching hint are skipped", () => {
    const env = signEnvelope(unsignedEnvelope(), Networks.TESTNET, kp3);
    expect(verifySignatures(env, Networks.TESTNET, [kp1, kp2]).size).toBe(0);
  });

  it("a forged signature with a matching hint is not counted", () => {
    const forged: DecoratedSignature = { hint: kp1.hint(), signature: new Uint8Array(64) };
    const env = addSignature(unsignedEnvelope(), forged);
    expect(verifySignatures(env, Networks.TESTNET, [kp1]).size).toBe(0);
  });

  it("one altered signature byte drops that signer only", () => {
    const unsigned = unsignedEnvelope();
    const good = signTransaction(unsigned, Networks.TESTNET, kp1);
    const other = signTransaction(unsigned, Networks.TESTNET, kp3);
    const altered = good.signature.slice();
    altered[0] = (altered[0] ?? 0) ^ 1;

    const env = addSignature(addSignature(unsigned, { hint: good.hint, signature: altered }), other);
    expect([...verifySignatures(env, Networks.TESTNET, [kp1, kp3])]).toEqual([kp3.publicKey()]);
    expect(verifySignatures(addSignature(unsigned, good), Networks.TESTNET, [kp1])).toEqual(
      new Set([kp1.publicKey()]),
    );
  });

  it("a short signature from decoded input is ignored, not thrown", () => {
    const short: DecoratedSignature = { hint: kp1.hint(), signature: new Uint8Array(10) };
    const env = addSignature(unsignedEnvelope(), short);
    expect(verifySignatures(env, Networks.TESTNET, [kp1]).size).toBe(0);
  });
});

describe("signature list", () => {
  it("duplicates are kept and round-trip", () => {
    const env = signEnvelope(unsignedEnvelope(), Networks.TESTNET, kp1, kp1);
    const decoded = fromXdr(TransactionEnvelope, toXdr(TransactionEnvelope, env));
    if (decoded.type !== "tx") throw new Error("expected a v1 envelope");
    expect(decoded.v1.signatures).toHaveLength(2);
    expect(decoded.v1.signatures[0]).toEqual(decoded.v1.signatures[1]);
  });

  it("a 21st signature is refused", () => {
    let env = unsignedEnvelope();
    const sig = signTransaction(env, Networks.TESTNET, kp1);
    for (let i = 0; i < 20; i++) env = addSignature(env, sig);
    expect(() => addSignature(env, sig)).toThrow(ConstructionError);
  });

  it("order is preserved", () => {
    const env = signEnvelope(unsignedEnvelope(), Networks.TESTNET, kp3, kp1, kp2);
    const [a, b, c] = resolveSigners(env, []);
    expect([a, b, c].map((r) => toHex(r?.signature.hint ?? new Uint8Array()))).toEqual([
      toHex(kp3.hint()),
      toHex(kp1.hint()),
      toHex(kp2.hint()),
    ]);
  });
});

describe("signing state", () => {
  const twoOfThree = (verified: ReadonlySet<string>): boolean => verified.size >= 2;
  const candidates = [kp1, kp2, kp3];

  it("unsigned → partiallySigned → sufficientlySigned", () => {
    const env0 = unsignedEnvelope();
    expect(envelopeSigningState(env0, Networks.TESTNET, candidates, twoOfThree)).toBe("unsigned");
    const env1 = signEnvelope(env0, Networks.TESTNET, kp1);
    expect(envelopeSigningState(env1, Networks.TESTNET, candidates, twoOfThree)).toBe(
      "partiallySigned",
    );
    const env2 = signEnvelope(env1, Networks.TESTNET, kp2);
    expect(envelopeSigningState(env2, Networks.TESTNET, candidates, twoOfThree)).toBe(
      "sufficientlySigned",
    );
  });
});

describe("fee bumps", () => {
  it("wraps a signed v1 envelope and hashes with the fee-bump tag", () => {
    const inner = signEnvelope(unsignedEnvelope(), Networks.TESTNET, kp1);
    const bumped = wrapFeeBump(inner, kp2.publicKey(), 400n);
    expect(toHex(signaturePayload(Networks.TESTNET, bumped))).toBe(FEE_BUMP_HASH);

    const signed = signEnvelope(bumped, Networks.TESTNET, kp2);
    expect(verifySignatures(signed, Networks.TESTNET, [kp1, kp2])).toEqual(new Set([kp2.publicKey()]));
  });

  it("a fee bump cannot be bumped again", () => {
    const bumped = wrapFeeBump(unsignedEnvelope(), kp2.publicKey(), 400n);
    expect(() => wrapFeeBump(bumped, kp2.publicKey(), 800n)).toThrow(ConstructionError);
  });

  it("a v0 envelope is wrapped as its v1 form", () => {
    const v0 = fromXdr(TransactionEnvelope, base64ToBytes(V0_UNSIGNED));
    const bumped = wrapFeeBump(v0, kp2.publicKey(), 400n);
    if (bumped.type !== "txFeeBump") throw new Error("expected a fee bump");
    expect(encode({ type: "tx", v1: bumped.feeBump.tx.innerTx })).toBe(UNSIGNED);
  });
});
