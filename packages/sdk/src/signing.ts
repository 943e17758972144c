/**
 * Signature payloads and the multi-signer engine.
 *
 *   payload = sha256( networkId ‖ envelopeTypeTag ‖ xdr(tx) )
 *   networkId = sha256( utf8(passphrase) )
 *
 * The tag is ENVELOPE_TYPE_TX (2) for v1 and v0 transactions (a v0
 * transaction is hashed in its v1 form) and ENVELOPE_TYPE_TX_FEE_BUMP (5)
 * for fee bumps. The payload is also the transaction hash.
 *
 * Envelope lifecycle: unsigned → partiallySigned → sufficientlySigned.
 * The engine moves envelopes through the first two; "sufficient" is a
 * caller policy evaluated over the verified signer set (see threshold.ts).
 *
 * Envelopes are values. addSignature and signEnvelope return a new envelope
 * and never touch the one passed in, so an envelope is only ever extended
 * by whoever holds the result.
 */

import { bytesEqual, copyBytes } from "./encoding.js";
import { ConstructionError } from "./errors.js";
import { sha256 } from "./hash.js";
import { Keypair, type SigningKeypair } from "./keypair.js";
import { networkId } from "./network.js";
import {
  envelopeSignatures,
  MAX_SIGNATURES,
  transactionFromV0,
  TransactionSignaturePayload,
  type DecoratedSignature,
  type FeeBumpTransaction,
  type TaggedTransaction,
  type Transaction,
  type TransactionEnvelope,
  type TransactionV0,
} from "./types/transaction.js";
import { toXdr } from "./xdr/index.js";

/** The transaction part of an envelope, tagged with its format. */
export type SignableTransaction =
  | { readonly type: "txV0"; readonly tx: TransactionV0 }
  | { readonly type: "tx"; readonly tx: Transaction }
  | { readonly type: "txFeeBump"; readonly tx: FeeBumpTransaction };

export function signableOf(envelope: TransactionEnvelope): SignableTransaction {
  switch (envelope.type) {
    case "txV0":
      return { type: "txV0", tx: envelope.v0.tx };
    case "tx":
      return { type: "tx", tx: envelope.v1.tx };
    case "txFeeBump":
      return { type: "txFeeBump", tx: envelope.feeBump.tx };
  }
}

function tagged(tx: SignableTransaction): TaggedTransaction {
  switch (tx.type) {
    case "txV0":
      return { type: "tx", tx: transactionFromV0(tx.tx) };
    case "tx":
      return { type: "tx", tx: tx.tx };
    case "txFeeBump":
      return { type: "txFeeBump", feeBump: tx.tx };
  }
}

function asSignable(tx: SignableTransaction | TransactionEnvelope): SignableTransaction {
  switch (tx.type) {
    case "txV0":
      return "v0" in tx ? signableOf(tx) : tx;
    case "tx":
      return "v1" in tx ? signableOf(tx) : tx;
    case "txFeeBump":
      return "feeBump" in tx ? signableOf(tx) : tx;
  }
}

// ── Payload ────────────────────────────────────────────────────────

/** 32-byte hash that signers sign for `tx` on the given network. */
export function signaturePayload(
  networkPassphrase: string,
  tx: SignableTransaction | TransactionEnvelope,
): Uint8Array {
  const payload: TransactionSignaturePayload = {
    networkId: networkId(networkPassphrase),
    taggedTransaction: tagged(asSignable(tx)),
  };
  return sha256(toXdr(TransactionSignaturePayload, payload));
}

/** Transaction id; identical to the signature payload. */
export function transactionHash(
  networkPassphrase: string,
  tx: SignableTransaction | TransactionEnvelope,
): Uint8Array {
  return signaturePayload(networkPassphrase, tx);
}

// ── Producing signatures ───────────────────────────────────────────

export function signatureHint(publicKey: Keypair | Uint8Array): Uint8Array {
  if (publicKey instanceof Keypair) return publicKey.hint();
  if (publicKey.length !== 32) {
    throw new ConstructionError(`public key must be 32 bytes, got ${publicKey.length}`);
  }
  return copyBytes(publicKey, 28);
}

/** Sign `tx` for the given network. The one place decorated signatures come from. */
export function signTransaction(
  tx: SignableTransaction | TransactionEnvelope,
  networkPassphrase: string,
  signer: SigningKeypair,
): DecoratedSignature {
  const payload = signaturePayload(networkPassphrase, tx);
  return { hint: signer.hint(), signature: signer.sign(payload) };
}

function withSignatures(
  envelope: TransactionEnvelope,
  signatures: readonly DecoratedSignature[],
): TransactionEnvelope {
  switch (envelope.type) {
    case "txV0":
      return { type: "txV0", v0: { tx: envelope.v0.tx, signatures } };
    case "tx":
      return { type: "tx", v1: { tx: envelope.v1.tx, signatures } };
    case "txFeeBump":
      return { type: "txFeeBump", feeBump: { tx: envelope.feeBump.tx, signatures } };
  }
}

/**
 * Append one signature. No deduplication: the same signer may appear twice
 * and both entries survive encoding.
 */
export function addSignature(
  envelope: TransactionEnvelope,
  signature: DecoratedSignature,
): TransactionEnvelope {
  const current = envelopeSignatures(envelope);
  if (current.length >= MAX_SIGNATURES) {
    throw new ConstructionError(`envelope already carries ${MAX_SIGNATURES} signatures`);
  }
  return withSignatures(envelope, [...current, signature]);
}

/** Sign with each signer in order and append the results. */
export function signEnvelope(
  envelope: TransactionEnvelope,
  networkPassphrase: string,
  ...signers: SigningKeypair[]
): TransactionEnvelope {
  let out = envelope;
  for (const signer of signers) {
    out = addSignature(out, signTransaction(envelope, networkPassphrase, signer));
  }
  return out;
}

// ── Verification ───────────────────────────────────────────────────

export type Candidate = Keypair | string;

function toKeypair(candidate: Candidate): Keypair {
  return typeof candidate === "string" ? Keypair.fromPublicKey(candidate) : candidate;
}

export interface ResolvedSignature {
  readonly signature: DecoratedSignature;
  /** Every candidate whose hint matches, in candidate order. */
  readonly candidates: readonly Keypair[];
}

/** For each signature, the candidates its hint could refer to. */
export function resolveSigners(
  envelope: TransactionEnvelope,
  candidates: readonly Candidate[],
): ResolvedSignature[] {
  const keys = candidates.map(toKeypair);
  return envelopeSignatures(envelope).map((signature) => ({
    signature,
    candidates: keys.filter((kp) => bytesEqual(kp.hint(), signature.hint)),
  }));
}

/**
 * G... addresses of the candidates that produced at least one valid
 * signature on the envelope. Every hint-matching candidate is tried; a
 * colliding hint never stops the search early.
 */
export function verifySignatures(
  envelope: TransactionEnvelope,
  networkPassphrase: string,
  candidates: readonly Candidate[],
): Set<string> {
  const payload = signaturePayload(networkPassphrase, envelope);
  const verified = new Set<string>();
  for (const { signature, candidates: matching } of resolveSigners(envelope, candidates)) {
    if (signature.signature.length !== 64) continue;
    for (const kp of matching) {
      if (kp.verify(payload, signature.signature)) verified.add(kp.publicKey());
    }
  }
  return verified;
}

// ── Lifecycle ──────────────────────────────────────────────────────

export type SigningState = "unsigned" | "partiallySigned" | "sufficientlySigned";

/** Caller-supplied sufficiency rule over the verified signer set. */
export type SigningPolicy = (verified: ReadonlySet<string>) => boolean;

export function envelopeSigningState(
  envelope: TransactionEnvelope,
  networkPassphrase: string,
  candidates: readonly Candidate[],
  policy: SigningPolicy,
): SigningState {
  if (envelopeSignatures(envelope).length === 0) return "unsigned";
  const verified = verifySignatures(envelope, networkPassphrase, candidates);
  return policy(verified) ? "sufficientlySigned" : "partiallySigned";
}
