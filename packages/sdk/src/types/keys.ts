/**
 * Key-shaped ledger types: account ids, muxed accounts, signer keys.
 *
 * PublicKey / AccountId  union PublicKeyType   { ED25519 = 0 → uint256 }
 * MuxedAccount           union CryptoKeyType   { ED25519 = 0 → uint256,
 *                                                MUXED_ED25519 = 0x100 → { id, ed25519 } }
 * SignerKey              union SignerKeyType   { ED25519, PRE_AUTH_TX, HASH_X,
 *                                                ED25519_SIGNED_PAYLOAD }
 */

import { ConstructionError } from "../errors.js";
import { StrKey } from "../strkey.js";
import { define, opaque, Uint32, Uint64, varOpaque, xdrEnum } from "../xdr/index.js";

export const Uint256 = opaque(32);
export const Hash = opaque(32);

// ── PublicKey / AccountId ──────────────────────────────────────────

const PublicKeyType = xdrEnum("PublicKeyType", { ed25519: 0 });

export type PublicKey = { readonly type: "ed25519"; readonly ed25519: Uint8Array };

export const PublicKey = define<PublicKey>(
  "PublicKey",
  (v, w) => {
    PublicKeyType.write(v.type, w);
    Uint256.write(v.ed25519, w);
  },
  (r) => {
    const type = PublicKeyType.read(r);
    return { type, ed25519: Uint256.read(r) };
  },
);

export type AccountId = PublicKey;
export const AccountId = PublicKey;

// ── MuxedAccount ───────────────────────────────────────────────────

const CryptoKeyType = xdrEnum("CryptoKeyType", { ed25519: 0, muxedEd25519: 0x100 });

export type MuxedAccount =
  | { readonly type: "ed25519"; readonly ed25519: Uint8Array }
  | { readonly type: "muxedEd25519"; readonly id: bigint; readonly ed25519: Uint8Array };

export const MuxedAccount = define<MuxedAccount>(
  "MuxedAccount",
  (v, w) => {
    CryptoKeyType.write(v.type, w);
    switch (v.type) {
      case "ed25519":
        Uint256.write(v.ed25519, w);
        break;
      case "muxedEd25519":
        Uint64.write(v.id, w);
        Uint256.write(v.ed25519, w);
        break;
    }
  },
  (r) => {
    const type = CryptoKeyType.read(r);
    switch (type) {
      case "ed25519":
        return { type, ed25519: Uint256.read(r) };
      case "muxedEd25519":
        return { type, id: Uint64.read(r), ed25519: Uint256.read(r) };
    }
  },
);

// ── SignerKey ──────────────────────────────────────────────────────

const SignerKeyType = xdrEnum("SignerKeyType", {
  ed25519: 0,
  preAuthTx: 1,
  hashX: 2,
  ed25519SignedPayload: 3,
});

export type SignerKey =
  | { readonly type: "ed25519"; readonly key: Uint8Array }
  | { readonly type: "preAuthTx"; readonly key: Uint8Array }
  | { readonly type: "hashX"; readonly key: Uint8Array }
  | {
      readonly type: "ed25519SignedPayload";
      readonly ed25519: Uint8Array;
      readonly payload: Uint8Array;
    };

const SignedPayloadBody = varOpaque(64);

export const SignerKey = define<SignerKey>(
  "SignerKey",
  (v, w) => {
    SignerKeyType.write(v.type, w);
    switch (v.type) {
      case "ed25519":
      case "preAuthTx":
      case "hashX":
        Uint256.write(v.key, w);
        break;
      case "ed25519SignedPayload":
        Uint256.write(v.ed25519, w);
        SignedPayloadBody.write(v.payload, w);
        break;
    }
  },
  (r) => {
    const type = SignerKeyType.read(r);
    switch (type) {
      case "ed25519":
      case "preAuthTx":
      case "hashX":
        return { type, key: Uint256.read(r) };
      case "ed25519SignedPayload":
        return { type, ed25519: Uint256.read(r), payload: SignedPayloadBody.read(r) };
    }
  },
);

export interface Signer {
  readonly key: SignerKey;
  /** 0..255; weight 0 removes the signer. */
  readonly weight: number;
}

export const Signer = define<Signer>(
  "Signer",
  (v, w) => {
    SignerKey.write(v.key, w);
    Uint32.write(v.weight, w);
  },
  (r) => ({ key: SignerKey.read(r), weight: Uint32.read(r) }),
);

// ── StrKey conversions ─────────────────────────────────────────────

/** G... → AccountId */
export function accountIdFromAddress(address: string): AccountId {
  return { type: "ed25519", ed25519: StrKey.decodeEd25519PublicKey(address) };
}

export function accountIdToAddress(accountId: AccountId): string {
  return StrKey.encodeEd25519PublicKey(accountId.ed25519);
}

/** G... or M... → MuxedAccount */
export function muxedAccountFromAddress(address: string): MuxedAccount {
  if (address.startsWith("M")) {
    const { ed25519, id } = StrKey.decodeMuxedAccount(address);
    return { type: "muxedEd25519", id, ed25519 };
  }
  return { type: "ed25519", ed25519: StrKey.decodeEd25519PublicKey(address) };
}

export function muxedAccountToAddress(account: MuxedAccount): string {
  switch (account.type) {
    case "ed25519":
      return StrKey.encodeEd25519PublicKey(account.ed25519);
    case "muxedEd25519":
      return StrKey.encodeMuxedAccount(account.ed25519, account.id);
  }
}

/** The underlying ed25519 account of a (possibly muxed) account. */
export function muxedToAccountId(account: MuxedAccount): AccountId {
  return { type: "ed25519", ed25519: account.ed25519 };
}

/** G... / T... / X... / P... → SignerKey */
export function signerKeyFromAddress(address: string): SignerKey {
  switch (address.charAt(0)) {
    case "G":
      return { type: "ed25519", key: StrKey.decodeEd25519PublicKey(address) };
    case "T":
      return { type: "preAuthTx", key: StrKey.decodePreAuthTx(address) };
    case "X":
      return { type: "hashX", key: StrKey.decodeSha256Hash(address) };
    case "P": {
      const { ed25519, payload } = StrKey.decodeSignedPayload(address);
      return { type: "ed25519SignedPayload", ed25519, payload };
    }
    default:
      throw new ConstructionError(`not a signer key address: ${address}`);
  }
}

export function signerKeyToAddress(key: SignerKey): string {
  switch (key.type) {
    case "ed25519":
      return StrKey.encodeEd25519PublicKey(key.key);
    case "preAuthTx":
      return StrKey.encodePreAuthTx(key.key);
    case "hashX":
      return StrKey.encodeSha256Hash(key.key);
    case "ed25519SignedPayload":
      return StrKey.encodeSignedPayload({ ed25519: key.ed25519, payload: key.payload });
  }
}
