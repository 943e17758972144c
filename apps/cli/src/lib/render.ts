/**
 * Human-readable JSON for decoded envelopes.
 *
 * Domain values carry bigints and byte arrays; these become decimal
 * strings, strkeys, asset strings or hex so the result survives
 * JSON.stringify.
 */

import {
  assetCodeToString,
  envelopeSignatures,
  fromUtf8,
  StrKey,
  toHex,
  transactionHash,
  type TransactionEnvelope,
} from "@ledgerkit/sdk";

/** Byte fields that hold text. */
const TEXT_FIELDS = new Set(["text", "dataName", "homeDomain"]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/** Account ids, muxed accounts, signer keys and assets collapse to their string forms. */
function collapse(value: Record<string, unknown>): string | undefined {
  const { type, ed25519, id, key, code, issuer } = value;
  if (type === "native" && Object.keys(value).length === 1) return "native";
  if (type === "ed25519" && ed25519 instanceof Uint8Array) {
    return StrKey.encodeEd25519PublicKey(ed25519);
  }
  if (type === "muxedEd25519" && ed25519 instanceof Uint8Array && typeof id === "bigint") {
    return StrKey.encodeMuxedAccount(ed25519, id);
  }
  if (key instanceof Uint8Array) {
    if (type === "ed25519") return StrKey.encodeEd25519PublicKey(key);
    if (type === "preAuthTx") return StrKey.encodePreAuthTx(key);
    if (type === "hashX") return StrKey.encodeSha256Hash(key);
  }
  if ((type === "creditAlphanum4" || type === "creditAlphanum12") && code instanceof Uint8Array) {
    const issuerText = isRecord(issuer) ? collapse(issuer) : undefined;
    const codeText = assetCodeToString(code);
    return issuerText === undefined ? codeText : `${codeText}:${issuerText}`;
  }
  return undefined;
}

export function jsonValue(value: unknown, field = ""): unknown {
  if (typeof value === "bigint") return value.toString();
  if (value instanceof Uint8Array) {
    if (field === "sourceAccountEd25519") return StrKey.encodeEd25519PublicKey(value);
    return TEXT_FIELDS.has(field) ? fromUtf8(value) : toHex(value);
  }
  if (Array.isArray(value)) return value.map((item) => jsonValue(item));
  if (isRecord(value)) {
    const collapsed = collapse(value);
    if (collapsed !== undefined) return collapsed;
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      if (item !== undefined) out[key] = jsonValue(item, key);
    }
    return out;
  }
  return value;
}

function payload(envelope: TransactionEnvelope): unknown {
  switch (envelope.type) {
    case "txV0":
      return envelope.v0.tx;
    case "tx":
      return envelope.v1.tx;
    case "txFeeBump":
      return envelope.feeBump.tx;
  }
}

export function describeEnvelope(
  envelope: TransactionEnvelope,
  networkPassphrase: string,
): Record<string, unknown> {
  return {
    type: envelope.type,
    hash: toHex(transactionHash(networkPassphrase, envelope)),
    tx: jsonValue(payload(envelope)),
    signatures: envelopeSignatures(envelope).map((s) => ({
      hint: toHex(s.hint),
      signature: toHex(s.signature),
    })),
  };
}
