/**
 * Operation builders — friendly inputs in, validated Operation values out.
 *
 * Addresses may be given as strkeys or domain values; amounts as decimal
 * strings ("10.5") or bigint stroops; assets as Asset values or
 * "native" / "CODE:ISSUER". Every bound the ledger enforces at apply time
 * and that is knowable locally is checked here and raised as
 * ConstructionError.
 */

import { parseAmount } from "../amount.js";
import { AccountFlags, MAX_INT32, MAX_INT64, TrustLineFlags } from "../constants.js";
import { copyBytes, utf8 } from "../encoding.js";
import { ConstructionError } from "../errors.js";
import { priceFromString } from "../price.js";
import { assetCodeFromString, Assets, type Asset, type Price } from "../types/asset.js";
import {
  claimableBalanceIdFromHex,
  Predicates,
  type ClaimableBalanceId,
  type ClaimPredicate,
} from "../types/claimable-balance.js";
import {
  accountIdFromAddress,
  muxedAccountFromAddress,
  signerKeyFromAddress,
  type AccountId,
  type MuxedAccount,
  type SignerKey,
} from "../types/keys.js";
import { DATA_NAME_MAX_BYTES, type LedgerKey } from "../types/ledger-key.js";
import {
  DATA_VALUE_MAX_BYTES,
  HOME_DOMAIN_MAX_BYTES,
  MAX_CLAIMANTS,
  MAX_PATH_LENGTH,
  type Operation,
  type OperationBody,
  type RevokeSponsorshipTarget,
} from "../types/operations.js";

export type AccountInput = string | AccountId;
export type MuxedInput = string | MuxedAccount;
export type AssetInput = string | Asset;
export type AmountInput = string | bigint;
export type PriceInput = string | Price;
export type BalanceIdInput = string | ClaimableBalanceId;

interface WithSource {
  /** Operation source; the transaction source when omitted. */
  source?: MuxedInput;
}

// ── Input coercion ─────────────────────────────────────────────────

function account(input: AccountInput): AccountId {
  return typeof input === "string" ? accountIdFromAddress(input) : input;
}

function muxed(input: MuxedInput): MuxedAccount {
  return typeof input === "string" ? muxedAccountFromAddress(input) : input;
}

function asset(input: AssetInput): Asset {
  return typeof input === "string" ? Assets.parse(input) : input;
}

function amount(input: AmountInput, field: string, allowZero = false): bigint {
  if (typeof input === "string") {
    try {
      return parseAmount(input, { allowZero });
    } catch (err) {
      if (err instanceof ConstructionError) {
        throw new ConstructionError(`${field}: ${err.message}`);
      }
      throw err;
    }
  }
  if (input < 0n || input > MAX_INT64 || (input === 0n && !allowZero)) {
    throw new ConstructionError(`${field}: ${input} stroops is out of range`);
  }
  return input;
}

function price(input: PriceInput): Price {
  const p = typeof input === "string" ? priceFromString(input) : input;
  for (const part of [p.n, p.d]) {
    if (!Number.isInteger(part) || part <= 0 || part > MAX_INT32) {
      throw new ConstructionError(`price ${p.n}/${p.d} must have positive int32 parts`);
    }
  }
  return p;
}

function balanceId(input: BalanceIdInput): ClaimableBalanceId {
  return typeof input === "string" ? claimableBalanceIdFromHex(input) : input;
}

function path(input: readonly AssetInput[] | undefined): Asset[] {
  const assets = (input ?? []).map(asset);
  if (assets.length > MAX_PATH_LENGTH) {
    throw new ConstructionError(`path has ${assets.length} assets, maximum is ${MAX_PATH_LENGTH}`);
  }
  return assets;
}

function int64(input: string | bigint, field: string): bigint {
  if (typeof input === "string" && !/^-?\d+$/.test(input)) {
    throw new ConstructionError(`${field} must be a decimal integer, got '${input}'`);
  }
  const value = typeof input === "string" ? BigInt(input) : input;
  if (value < 0n || value > MAX_INT64) {
    throw new ConstructionError(`${field} ${value} is out of range`);
  }
  return value;
}

function offerId(input: string | bigint | undefined): bigint {
  return input === undefined ? 0n : int64(input, "offerId");
}

function byte(value: number | undefined, field: string): number | undefined {
  if (value === undefined) return undefined;
  if (!Number.isInteger(value) || value < 0 || value > 255) {
    throw new ConstructionError(`${field} must be an integer in 0..255, got ${value}`);
  }
  return value;
}

export type AccountFlagName = keyof typeof AccountFlags;

/** A raw flag mask, or account flag names OR-ed together. */
export type AccountFlagsInput = number | readonly AccountFlagName[];

function flags(input: AccountFlagsInput | undefined, field: string): number | undefined {
  if (input === undefined) return undefined;
  if (typeof input !== "number") {
    return input.reduce((mask, name) => mask | AccountFlags[name], 0);
  }
  const value = input;
  if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
    throw new ConstructionError(`${field} must be a uint32, got ${value}`);
  }
  return value;
}

function op(body: OperationBody, source: MuxedInput | undefined): Operation {
  return { sourceAccount: source === undefined ? undefined : muxed(source), body };
}

// ── Builders ───────────────────────────────────────────────────────

export interface SignerInput {
  /** G... / T... / X... / P... or a SignerKey. */
  key: string | SignerKey;
  /** 0 removes the signer. */
  weight: number;
}

export interface ClaimantInput {
  destination: AccountInput;
  /** Unconditional when omitted. */
  predicate?: ClaimPredicate;
}

export type TrustLineFlagChanges = Partial<Record<keyof typeof TrustLineFlags, boolean>>;

const TRUST_LINE_FLAG_NAMES: readonly (keyof typeof TrustLineFlags)[] = [
  "authorized",
  "authorizedToMaintainLiabilities",
  "clawbackEnabled",
];

export const Operations = {
  createAccount(
    opts: WithSource & { destination: AccountInput; startingBalance: AmountInput },
  ): Operation {
    return op(
      {
        type: "createAccount",
        destination: account(opts.destination),
        startingBalance: amount(opts.startingBalance, "startingBalance"),
      },
      opts.source,
    );
  },

  payment(
    opts: WithSource & { destination: MuxedInput; asset: AssetInput; amount: AmountInput },
  ): Operation {
    return op(
      {
        type: "payment",
        destination: muxed(opts.destination),
        asset: asset(opts.asset),
        amount: amount(opts.amount, "amount"),
      },
      opts.source,
    );
  },

  pathPaymentStrictReceive(
    opts: WithSource & {
      sendAsset: AssetInput;
      sendMax: AmountInput;
      destination: MuxedInput;
      destAsset: AssetInput;
      destAmount: AmountInput;
      path?: readonly AssetInput[];
    },
  ): Operation {
    return op(
      {
        type: "pathPaymentStrictReceive",
        sendAsset: asset(opts.sendAsset),
        sendMax: amount(opts.sendMax, "sendMax"),
        destination: muxed(opts.destination),
        destAsset: asset(opts.destAsset),
        destAmount: amount(opts.destAmount, "destAmount"),
        path: path(opts.path),
      },
      opts.source,
    );
  },

  pathPaymentStrictSend(
    opts: WithSource & {
      sendAsset: AssetInput;
      sendAmount: AmountInput;
      destination: MuxedInput;
      destAsset: AssetInput;
      destMin: AmountInput;
      path?: readonly AssetInput[];
    },
  ): Operation {
    return op(
      {
        type: "pathPaymentStrictSend",
        sendAsset: asset(opts.sendAsset),
        sendAmount: amount(opts.sendAmount, "sendAmount"),
        destination: muxed(opts.destination),
        destAsset: asset(opts.destAsset),
        destMin: amount(opts.destMin, "destMin"),
        path: path(opts.path),
      },
      opts.source,
    );
  },

  /** amount "0" deletes the offer named by offerId. */
  manageSellOffer(
    opts: WithSource & {
      selling: AssetInput;
      buying: AssetInput;
      amount: AmountInput;
      price: PriceInput;
      offerId?: string | bigint;
    },
  ): Operation {
    return op(
      {
        type: "manageSellOffer",
        selling: asset(opts.selling),
        buying: asset(opts.buying),
        amount: amount(opts.amount, "amount", true),
        price: price(opts.price),
        offerId: offerId(opts.offerId),
      },
      opts.source,
    );
  },

  manageBuyOffer(
    opts: WithSource & {
      selling: AssetInput;
      buying: AssetInput;
      buyAmount: AmountInput;
      price: PriceInput;
      offerId?: string | bigint;
    },
  ): Operation {
    return op(
      {
        type: "manageBuyOffer",
        selling: asset(opts.selling),
        buying: asset(opts.buying),
        buyAmount: amount(opts.buyAmount, "buyAmount", true),
        price: price(opts.price),
        offerId: offerId(opts.offerId),
      },
      opts.source,
    );
  },

  createPassiveSellOffer(
    opts: WithSource & {
      selling: AssetInput;
      buying: AssetInput;
      amount: AmountInput;
      price: PriceInput;
    },
  ): Operation {
    return op(
      {
        type: "createPassiveSellOffer",
        selling: asset(opts.selling),
        buying: asset(opts.buying),
        amount: amount(opts.amount, "amount"),
        price: price(opts.price),
      },
      opts.source,
    );
  },

  setOptions(
    opts: WithSource & {
      inflationDest?: AccountInput;
      clearFlags?: AccountFlagsInput;
      setFlags?: AccountFlagsInput;
      masterWeight?: number;
      lowThreshold?: number;
      medThreshold?: number;
      highThreshold?: number;
      homeDomain?: string;
      signer?: SignerInput;
    },
  ): Operation {
    let homeDomain: Uint8Array | undefined;
    if (opts.homeDomain !== undefined) {
      homeDomain = utf8(opts.homeDomain);
      if (homeDomain.length > HOME_DOMAIN_MAX_BYTES) {
        throw new ConstructionError(
          `homeDomain is ${homeDomain.length} bytes, maximum is ${HOME_DOMAIN_MAX_BYTES}`,
        );
      }
    }
    let signer: { key: SignerKey; weight: number } | undefined;
    if (opts.signer !== undefined) {
      const { key, weight } = opts.signer;
      signer = {
        key: typeof key === "string" ? signerKeyFromAddress(key) : key,
        weight: byte(weight, "signer.weight") ?? 0,
      };
    }
    return op(
      {
        type: "setOptions",
        inflationDest: opts.inflationDest === undefined ? undefined : account(opts.inflationDest),
        clearFlags: flags(opts.clearFlags, "clearFlags"),
        setFlags: flags(opts.setFlags, "setFlags"),
        masterWeight: byte(opts.masterWeight, "masterWeight"),
        lowThreshold: byte(opts.lowThreshold, "lowThreshold"),
        medThreshold: byte(opts.medThreshold, "medThreshold"),
        highThreshold: byte(opts.highThreshold, "highThreshold"),
        homeDomain,
        signer,
      },
      opts.source,
    );
  },

  /** limit defaults to the int64 maximum; "0" removes the trust line. */
  changeTrust(opts: WithSource & { asset: AssetInput; limit?: AmountInput }): Operation {
    const line = asset(opts.asset);
    if (line.type === "native") {
      throw new ConstructionError("cannot change trust for the native asset");
    }
    return op(
      {
        type: "changeTrust",
        line,
        limit: opts.limit === undefined ? MAX_INT64 : amount(opts.limit, "limit", true),
      },
      opts.source,
    );
  },

  /** authorize: true → 1, false → 0, or the raw level 0 | 1 | 2. */
  allowTrust(
    opts: WithSource & { trustor: AccountInput; assetCode: string; authorize: boolean | number },
  ): Operation {
    const level =
      typeof opts.authorize === "boolean" ? (opts.authorize ? 1 : 0) : opts.authorize;
    if (level !== 0 && level !== 1 && level !== 2) {
      throw new ConstructionError(`authorize must be 0, 1 or 2, got ${level}`);
    }
    return op(
      {
        type: "allowTrust",
        trustor: account(opts.trustor),
        asset: assetCodeFromString(opts.assetCode),
        authorize: level,
      },
      opts.source,
    );
  },

  accountMerge(opts: WithSource & { destination: MuxedInput }): Operation {
    return op({ type: "accountMerge", destination: muxed(opts.destination) }, opts.source);
  },

  inflation(opts: WithSource = {}): Operation {
    return op({ type: "inflation" }, opts.source);
  },

  /** value null / omitted deletes the entry. */
  manageData(
    opts: WithSource & { name: string; value?: string | Uint8Array | null },
  ): Operation {
    const name = utf8(opts.name);
    if (name.length === 0 || name.length > DATA_NAME_MAX_BYTES) {
      throw new ConstructionError(
        `data name must be 1-${DATA_NAME_MAX_BYTES} bytes, got ${name.length}`,
      );
    }
    let value: Uint8Array | undefined;
    if (opts.value !== undefined && opts.value !== null) {
      value = typeof opts.value === "string" ? utf8(opts.value) : copyBytes(opts.value);
      if (value.length > DATA_VALUE_MAX_BYTES) {
        throw new ConstructionError(
          `data value is ${value.length} bytes, maximum is ${DATA_VALUE_MAX_BYTES}`,
        );
      }
    }
    return op({ type: "manageData", dataName: name, dataValue: value }, opts.source);
  },

  bumpSequence(opts: WithSource & { bumpTo: string | bigint }): Operation {
    return op({ type: "bumpSequence", bumpTo: int64(opts.bumpTo, "bumpTo") }, opts.source);
  },

  createClaimableBalance(
    opts: WithSource & {
      asset: AssetInput;
      amount: AmountInput;
      claimants: readonly ClaimantInput[];
    },
  ): Operation {
    if (opts.claimants.length === 0 || opts.claimants.length > MAX_CLAIMANTS) {
      throw new ConstructionError(
        `claimable balance needs 1-${MAX_CLAIMANTS} claimants, got ${opts.claimants.length}`,
      );
    }
    return op(
      {
        type: "createClaimableBalance",
        asset: asset(opts.asset),
        amount: amount(opts.amount, "amount"),
        claimants: opts.claimants.map((c) => ({
          destination: account(c.destination),
          predicate: c.predicate ?? Predicates.unconditional(),
        })),
      },
      opts.source,
    );
  },

  claimClaimableBalance(opts: WithSource & { balanceId: BalanceIdInput }): Operation {
    return op(
      { type: "claimClaimableBalance", balanceId: balanceId(opts.balanceId) },
      opts.source,
    );
  },

  beginSponsoringFutureReserves(opts: WithSource & { sponsoredId: AccountInput }): Operation {
    return op(
      { type: "beginSponsoringFutureReserves", sponsoredId: account(opts.sponsoredId) },
      opts.source,
    );
  },

  endSponsoringFutureReserves(opts: WithSource = {}): Operation {
    return op({ type: "endSponsoringFutureReserves" }, opts.source);
  },

  revokeAccountSponsorship(opts: WithSource & { account: AccountInput }): Operation {
    return revokeEntry({ type: "account", accountId: account(opts.account) }, opts.source);
  },

  revokeTrustlineSponsorship(
    opts: WithSource & { account: AccountInput; asset: AssetInput },
  ): Operation {
    return revokeEntry(
      { type: "trustline", accountId: account(opts.account), asset: asset(opts.asset) },
      opts.source,
    );
  },

  revokeOfferSponsorship(
    opts: WithSource & { seller: AccountInput; offerId: string | bigint },
  ): Operation {
    return revokeEntry(
      { type: "offer", sellerId: account(opts.seller), offerId: offerId(opts.offerId) },
      opts.source,
    );
  },

  revokeDataSponsorship(opts: WithSource & { account: AccountInput; name: string }): Operation {
    const dataName = utf8(opts.name);
    if (dataName.length === 0 || dataName.length > DATA_NAME_MAX_BYTES) {
      throw new ConstructionError(
        `data name must be 1-${DATA_NAME_MAX_BYTES} bytes, got ${dataName.length}`,
      );
    }
    return revokeEntry({ type: "data", accountId: account(opts.account), dataName }, opts.source);
  },

  revokeClaimableBalanceSponsorship(
    opts: WithSource & { balanceId: BalanceIdInput },
  ): Operation {
    return revokeEntry(
      { type: "claimableBalance", balanceId: balanceId(opts.balanceId) },
      opts.source,
    );
  },

  revokeSignerSponsorship(
    opts: WithSource & { account: AccountInput; signer: string | SignerKey },
  ): Operation {
    const target: RevokeSponsorshipTarget = {
      type: "signer",
      accountId: account(opts.account),
      signerKey: typeof opts.signer === "string" ? signerKeyFromAddress(opts.signer) : opts.signer,
    };
    return op({ type: "revokeSponsorship", target }, opts.source);
  },

  clawback(
    opts: WithSource & { asset: AssetInput; from: MuxedInput; amount: AmountInput },
  ): Operation {
    const clawed = asset(opts.asset);
    if (clawed.type === "native") {
      throw new ConstructionError("cannot claw back the native asset");
    }
    return op(
      {
        type: "clawback",
        asset: clawed,
        from: muxed(opts.from),
        amount: amount(opts.amount, "amount"),
      },
      opts.source,
    );
  },

  clawbackClaimableBalance(opts: WithSource & { balanceId: BalanceIdInput }): Operation {
    return op(
      { type: "clawbackClaimableBalance", balanceId: balanceId(opts.balanceId) },
      opts.source,
    );
  },

  /** Each flag: true sets it, false clears it, omitted leaves it alone. */
  setTrustLineFlags(
    opts: WithSource & { trustor: AccountInput; asset: AssetInput; flags: TrustLineFlagChanges },
  ): Operation {
    let setFlags = 0;
    let clearFlags = 0;
    for (const name of TRUST_LINE_FLAG_NAMES) {
      const change = opts.flags[name];
      if (change === true) setFlags |= TrustLineFlags[name];
      else if (change === false) clearFlags |= TrustLineFlags[name];
    }
    return op(
      {
        type: "setTrustLineFlags",
        trustor: account(opts.trustor),
        asset: asset(opts.asset),
        clearFlags,
        setFlags,
      },
      opts.source,
    );
  },
};

function revokeEntry(ledgerKey: LedgerKey, source: MuxedInput | undefined): Operation {
  return op({ type: "revokeSponsorship", target: { type: "ledgerEntry", ledgerKey } }, source);
}
