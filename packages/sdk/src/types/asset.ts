/**
 * Assets and prices.
 *
 * Asset      union AssetType { NATIVE = 0, CREDIT_ALPHANUM4 = 1 → { code[4], issuer },
 *                              CREDIT_ALPHANUM12 = 2 → { code[12], issuer } }
 * AssetCode  union AssetType { CREDIT_ALPHANUM4 → code[4], CREDIT_ALPHANUM12 → code[12] }
 *            (AllowTrust names an asset by code only; the issuer is the source)
 * Price      { n: int32, d: int32 }
 *
 * Codes are stored NUL-padded to their fixed width.
 */

import { ConstructionError } from "../errors.js";
import { define, Int32, opaque, xdrEnum } from "../xdr/index.js";
import { AccountId, accountIdFromAddress, accountIdToAddress } from "./keys.js";

const AssetCode4 = opaque(4);
const AssetCode12 = opaque(12);

const AssetType = xdrEnum("AssetType", {
  native: 0,
  creditAlphanum4: 1,
  creditAlphanum12: 2,
});

export type Asset =
  | { readonly type: "native" }
  | { readonly type: "creditAlphanum4"; readonly code: Uint8Array; readonly issuer: AccountId }
  | { readonly type: "creditAlphanum12"; readonly code: Uint8Array; readonly issuer: AccountId };

export const Asset = define<Asset>(
  "Asset",
  (v, w) => {
    AssetType.write(v.type, w);
    switch (v.type) {
      case "native":
        break;
      case "creditAlphanum4":
        AssetCode4.write(v.code, w);
        AccountId.write(v.issuer, w);
        break;
      case "creditAlphanum12":
        AssetCode12.write(v.code, w);
        AccountId.write(v.issuer, w);
        break;
    }
  },
  (r) => {
    const type = AssetType.read(r);
    switch (type) {
      case "native":
        return { type };
      case "creditAlphanum4":
        return { type, code: AssetCode4.read(r), issuer: AccountId.read(r) };
      case "creditAlphanum12":
        return { type, code: AssetCode12.read(r), issuer: AccountId.read(r) };
    }
  },
);

const AssetCodeType = xdrEnum("AssetType", { creditAlphanum4: 1, creditAlphanum12: 2 });

export type AssetCode =
  | { readonly type: "creditAlphanum4"; readonly code: Uint8Array }
  | { readonly type: "creditAlphanum12"; readonly code: Uint8Array };

export const AssetCode = define<AssetCode>(
  "AssetCode",
  (v, w) => {
    AssetCodeType.write(v.type, w);
    (v.type === "creditAlphanum4" ? AssetCode4 : AssetCode12).write(v.code, w);
  },
  (r) => {
    const type = AssetCodeType.read(r);
    return { type, code: (type === "creditAlphanum4" ? AssetCode4 : AssetCode12).read(r) };
  },
);

export interface Price {
  readonly n: number;
  readonly d: number;
}

export const Price = define<Price>(
  "Price",
  (v, w) => {
    Int32.write(v.n, w);
    Int32.write(v.d, w);
  },
  (r) => ({ n: Int32.read(r), d: Int32.read(r) }),
);

// ── Construction ───────────────────────────────────────────────────

const CODE_CHARSET = /^[A-Za-z0-9]+$/;

/** Validate a textual asset code and NUL-pad it to 4 or 12 bytes. */
export function assetCodeFromString(code: string): AssetCode {
  if (code.length === 0 || code.length > 12) {
    throw new ConstructionError(`asset code must be 1-12 characters, got ${code.length}`);
  }
  if (!CODE_CHARSET.test(code)) {
    throw new ConstructionError(`invalid asset code character in '${code}'`);
  }
  const width = code.length <= 4 ? 4 : 12;
  const bytes = new Uint8Array(width);
  for (let i = 0; i < code.length; i++) bytes[i] = code.charCodeAt(i);
  return width === 4
    ? { type: "creditAlphanum4", code: bytes }
    : { type: "creditAlphanum12", code: bytes };
}

/** Strip NUL padding from a stored code. */
export function assetCodeToString(code: Uint8Array): string {
  let end = code.length;
  while (end > 0 && code[end - 1] === 0) end--;
  return String.fromCharCode(...code.subarray(0, end));
}

export const Assets = {
  native(): Asset {
    return { type: "native" };
  },

  /** Issued asset from a code ("USD", "ABCDEFGH") and the issuer's G... address. */
  credit(code: string, issuer: string | AccountId): Asset {
    const parsed = assetCodeFromString(code);
    const issuerId = typeof issuer === "string" ? accountIdFromAddress(issuer) : issuer;
    return { type: parsed.type, code: parsed.code, issuer: issuerId };
  },

  /** "native" or "CODE:ISSUER". */
  toString(asset: Asset): string {
    if (asset.type === "native") return "native";
    return `${assetCodeToString(asset.code)}:${accountIdToAddress(asset.issuer)}`;
  },

  /** Inverse of toString. */
  parse(text: string): Asset {
    if (text === "native") return { type: "native" };
    const [code, issuer, ...rest] = text.split(":");
    if (code === undefined || issuer === undefined || rest.length > 0) {
      throw new ConstructionError(`asset must be 'native' or 'CODE:ISSUER', got '${text}'`);
    }
    return Assets.credit(code, issuer);
  },
};
