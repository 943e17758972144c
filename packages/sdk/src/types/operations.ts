/**
 * Operations — the 22 operation bodies of protocol 17.
 *
 * Operation { sourceAccount: MuxedAccount*, body: OperationBody }
 *
 * OperationBody is a union over OperationType (0..21). Each arm's fields are
 * flattened onto the body object next to its `type`.
 */

import {
  define,
  Int64,
  option,
  Uint32,
  varArray,
  varOpaque,
  xdrEnum,
  xdrString,
} from "../xdr/index.js";
import type { XdrReader, XdrWriter } from "../xdr/index.js";
import { Asset, AssetCode, Price } from "./asset.js";
import { Claimant, ClaimableBalanceId } from "./claimable-balance.js";
import { AccountId, MuxedAccount, Signer, SignerKey } from "./keys.js";
import { DataName, LedgerKey } from "./ledger-key.js";

export const MAX_PATH_LENGTH = 5;
export const MAX_CLAIMANTS = 10;
export const DATA_VALUE_MAX_BYTES = 64;
export const HOME_DOMAIN_MAX_BYTES = 32;

const Path = varArray(Asset, MAX_PATH_LENGTH);
const Claimants = varArray(Claimant, MAX_CLAIMANTS);
const DataValue = option(varOpaque(DATA_VALUE_MAX_BYTES));
const HomeDomain = option(xdrString(HOME_DOMAIN_MAX_BYTES));
const OptAccountId = option(AccountId);
const OptUint32 = option(Uint32);
const OptSigner = option(Signer);

export const OperationType = xdrEnum("OperationType", {
  createAccount: 0,
  payment: 1,
  pathPaymentStrictReceive: 2,
  manageSellOffer: 3,
  createPassiveSellOffer: 4,
  setOptions: 5,
  changeTrust: 6,
  allowTrust: 7,
  accountMerge: 8,
  inflation: 9,
  manageData: 10,
  bumpSequence: 11,
  manageBuyOffer: 12,
  pathPaymentStrictSend: 13,
  createClaimableBalance: 14,
  claimClaimableBalance: 15,
  beginSponsoringFutureReserves: 16,
  endSponsoringFutureReserves: 17,
  revokeSponsorship: 18,
  clawback: 19,
  clawbackClaimableBalance: 20,
  setTrustLineFlags: 21,
});

// ── Bodies ─────────────────────────────────────────────────────────

export interface CreateAccountOp {
  readonly type: "createAccount";
  readonly destination: AccountId;
  readonly startingBalance: bigint;
}

export interface PaymentOp {
  readonly type: "payment";
  readonly destination: MuxedAccount;
  readonly asset: Asset;
  readonly amount: bigint;
}

export interface PathPaymentStrictReceiveOp {
  readonly type: "pathPaymentStrictReceive";
  readonly sendAsset: Asset;
  readonly sendMax: bigint;
  readonly destination: MuxedAccount;
  readonly destAsset: Asset;
  readonly destAmount: bigint;
  readonly path: readonly Asset[];
}

export interface ManageSellOfferOp {
  readonly type: "manageSellOffer";
  readonly selling: Asset;
  readonly buying: Asset;
  readonly amount: bigint;
  readonly price: Price;
  /** 0 creates a new offer. */
  readonly offerId: bigint;
}

export interface CreatePassiveSellOfferOp {
  readonly type: "createPassiveSellOffer";
  readonly selling: Asset;
  readonly buying: Asset;
  readonly amount: bigint;
  readonly price: Price;
}

export interface SetOptionsOp {
  readonly type: "setOptions";
  readonly inflationDest: AccountId | undefined;
  readonly clearFlags: number | undefined;
  readonly setFlags: number | undefined;
  readonly masterWeight: number | undefined;
  readonly lowThreshold: number | undefined;
  readonly medThreshold: number | undefined;
  readonly highThreshold: number | undefined;
  readonly homeDomain: Uint8Array | undefined;
  readonly signer: Signer | undefined;
}

export interface ChangeTrustOp {
  readonly type: "changeTrust";
  readonly line: Asset;
  /** 0 removes the trust line. */
  readonly limit: bigint;
}

export interface AllowTrustOp {
  readonly type: "allowTrust";
  readonly trustor: AccountId;
  readonly asset: AssetCode;
  /** 0 deauthorize, 1 authorize, 2 authorize to maintain liabilities. */
  readonly authorize: number;
}

export interface AccountMergeOp {
  readonly type: "accountMerge";
  readonly destination: MuxedAccount;
}

export interface InflationOp {
  readonly type: "inflation";
}

export interface ManageDataOp {
  readonly type: "manageData";
  readonly dataName: Uint8Array;
  /** Absent deletes the entry. */
  readonly dataValue: Uint8Array | undefined;
}

export interface BumpSequenceOp {
  readonly type: "bumpSequence";
  readonly bumpTo: bigint;
}

export interface ManageBuyOfferOp {
  readonly type: "manageBuyOffer";
  readonly selling: Asset;
  readonly buying: Asset;
  readonly buyAmount: bigint;
  readonly price: Price;
  readonly offerId: bigint;
}

export interface PathPaymentStrictSendOp {
  readonly type: "pathPaymentStrictSend";
  readonly sendAsset: Asset;
  readonly sendAmount: bigint;
  readonly destination: MuxedAccount;
  readonly destAsset: Asset;
  readonly destMin: bigint;
  readonly path: readonly Asset[];
}

export interface CreateClaimableBalanceOp {
  readonly type: "createClaimableBalance";
  readonly asset: Asset;
  readonly amount: bigint;
  readonly claimants: readonly Claimant[];
}

export interface ClaimClaimableBalanceOp {
  readonly type: "claimClaimableBalance";
  readonly balanceId: ClaimableBalanceId;
}

export interface BeginSponsoringFutureReservesOp {
  readonly type: "beginSponsoringFutureReserves";
  readonly sponsoredId: AccountId;
}

export interface EndSponsoringFutureReservesOp {
  readonly type: "endSponsoringFutureReserves";
}

export type RevokeSponsorshipTarget =
  | { readonly type: "ledgerEntry"; readonly ledgerKey: LedgerKey }
  | { readonly type: "signer"; readonly accountId: AccountId; readonly signerKey: SignerKey };

export interface RevokeSponsorshipOp {
  readonly type: "revokeSponsorship";
  readonly target: RevokeSponsorshipTarget;
}

export interface ClawbackOp {
  readonly type: "clawback";
  readonly asset: Asset;
  readonly from: MuxedAccount;
  readonly amount: bigint;
}

export interface ClawbackClaimableBalanceOp {
  readonly type: "clawbackClaimableBalance";
  readonly balanceId: ClaimableBalanceId;
}

export interface SetTrustLineFlagsOp {
  readonly type: "setTrustLineFlags";
  readonly trustor: AccountId;
  readonly asset: Asset;
  readonly clearFlags: number;
  readonly setFlags: number;
}

export type OperationBody =
  | CreateAccountOp
  | PaymentOp
  | PathPaymentStrictReceiveOp
  | ManageSellOfferOp
  | CreatePassiveSellOfferOp
  | SetOptionsOp
  | ChangeTrustOp
  | AllowTrustOp
  | AccountMergeOp
  | InflationOp
  | ManageDataOp
  | BumpSequenceOp
  | ManageBuyOfferOp
  | PathPaymentStrictSendOp
  | CreateClaimableBalanceOp
  | ClaimClaimableBalanceOp
  | BeginSponsoringFutureReservesOp
  | EndSponsoringFutureReservesOp
  | RevokeSponsorshipOp
  | ClawbackOp
  | ClawbackClaimableBalanceOp
  | SetTrustLineFlagsOp;

export type OperationKind = OperationBody["type"];

// ── RevokeSponsorship arm ──────────────────────────────────────────

const RevokeSponsorshipType = xdrEnum("RevokeSponsorshipType", { ledgerEntry: 0, signer: 1 });

const RevokeSponsorshipTarget = define<RevokeSponsorshipTarget>(
  "RevokeSponsorshipOp",
  (v, w) => {
    RevokeSponsorshipType.write(v.type, w);
    switch (v.type) {
      case "ledgerEntry":
        LedgerKey.write(v.ledgerKey, w);
        break;
      case "signer":
        AccountId.write(v.accountId, w);
        SignerKey.write(v.signerKey, w);
        break;
    }
  },
  (r) => {
    const type = RevokeSponsorshipType.read(r);
    switch (type) {
      case "ledgerEntry":
        return { type, ledgerKey: LedgerKey.read(r) };
      case "signer":
        return { type, accountId: AccountId.read(r), signerKey: SignerKey.read(r) };
    }
  },
);

// ── OperationBody codec ────────────────────────────────────────────

function writeBody(v: OperationBody, w: XdrWriter): void {
  OperationType.write(v.type, w);
  switch (v.type) {
    case "createAccount":
      AccountId.write(v.destination, w);
      Int64.write(v.startingBalance, w);
      break;
    case "payment":
      MuxedAccount.write(v.destination, w);
      Asset.write(v.asset, w);
      Int64.write(v.amount, w);
      break;
    case "pathPaymentStrictReceive":
      Asset.write(v.sendAsset, w);
      Int64.write(v.sendMax, w);
      MuxedAccount.write(v.destination, w);
      Asset.write(v.destAsset, w);
      Int64.write(v.destAmount, w);
      Path.write([...v.path], w);
      break;
    case "manageSellOffer":
      Asset.write(v.selling, w);
      Asset.write(v.buying, w);
      Int64.write(v.amount, w);
      Price.write(v.price, w);
      Int64.write(v.offerId, w);
      break;
    case "createPassiveSellOffer":
      Asset.write(v.selling, w);
      Asset.write(v.buying, w);
      Int64.write(v.amount, w);
      Price.write(v.price, w);
      break;
    case "setOptions":
      OptAccountId.write(v.inflationDest, w);
      OptUint32.write(v.clearFlags, w);
      OptUint32.write(v.setFlags, w);
      OptUint32.write(v.masterWeight, w);
      OptUint32.write(v.lowThreshold, w);
      OptUint32.write(v.medThreshold, w);
      OptUint32.write(v.highThreshold, w);
      HomeDomain.write(v.homeDomain, w);
      OptSigner.write(v.signer, w);
      break;
    case "changeTrust":
      Asset.write(v.line, w);
      Int64.write(v.limit, w);
      break;
    case "allowTrust":
      AccountId.write(v.trustor, w);
      AssetCode.write(v.asset, w);
      Uint32.write(v.authorize, w);
      break;
    case "accountMerge":
      MuxedAccount.write(v.destination, w);
      break;
    case "inflation":
    case "endSponsoringFutureReserves":
      break;
    case "manageData":
      DataName.write(v.dataName, w);
      DataValue.write(v.dataValue, w);
      break;
    case "bumpSequence":
      Int64.write(v.bumpTo, w);
      break;
    case "manageBuyOffer":
      Asset.write(v.selling, w);
      Asset.write(v.buying, w);
      Int64.write(v.buyAmount, w);
      Price.write(v.price, w);
      Int64.write(v.offerId, w);
      break;
    case "pathPaymentStrictSend":
      Asset.write(v.sendAsset, w);
      Int64.write(v.sendAmount, w);
      MuxedAccount.write(v.destination, w);
      Asset.write(v.destAsset, w);
      Int64.write(v.destMin, w);
      Path.write([...v.path], w);
      break;
    case "createClaimableBalance":
      Asset.write(v.asset, w);
      Int64.write(v.amount, w);
      Claimants.write([...v.claimants], w);
      break;
    case "claimClaimableBalance":
    case "clawbackClaimableBalance":
      ClaimableBalanceId.write(v.balanceId, w);
      break;
    case "beginSponsoringFutureReserves":
      AccountId.write(v.sponsoredId, w);
      break;
    case "revokeSponsorship":
      RevokeSponsorshipTarget.write(v.target, w);
      break;
    case "clawback":
      Asset.write(v.asset, w);
      MuxedAccount.write(v.from, w);
      Int64.write(v.amount, w);
      break;
    case "setTrustLineFlags":
      AccountId.write(v.trustor, w);
      Asset.write(v.asset, w);
      Uint32.write(v.clearFlags, w);
      Uint32.write(v.setFlags, w);
      break;
  }
}

function readBody(r: XdrReader): OperationBody {
  const type = OperationType.read(r);
  switch (type) {
    case "createAccount":
      return { type, destination: AccountId.read(r), startingBalance: Int64.read(r) };
    case "payment":
      return {
        type,
        destination: MuxedAccount.read(r),
        asset: Asset.read(r),
        amount: Int64.read(r),
      };
    case "pathPaymentStrictReceive":
      return {
        type,
        sendAsset: Asset.read(r),
        sendMax: Int64.read(r),
        destination: MuxedAccount.read(r),
        destAsset: Asset.read(r),
        destAmount: Int64.read(r),
        path: Path.read(r),
      };
    case "manageSellOffer":
      return {
        type,
        selling: Asset.read(r),
        buying: Asset.read(r),
        amount: Int64.read(r),
        price: Price.read(r),
        offerId: Int64.read(r),
      };
    case "createPassiveSellOffer":
      return {
        type,
        selling: Asset.read(r),
        buying: Asset.read(r),
        amount: Int64.read(r),
        price: Price.read(r),
      };
    case "setOptions":
      return {
        type,
        inflationDest: OptAccountId.read(r),
        clearFlags: OptUint32.read(r),
        setFlags: OptUint32.read(r),
        masterWeight: OptUint32.read(r),
        lowThreshold: OptUint32.read(r),
        medThreshold: OptUint32.read(r),
        highThreshold: OptUint32.read(r),
        homeDomain: HomeDomain.read(r),
        signer: OptSigner.read(r),
      };
    case "changeTrust":
      return { type, line: Asset.read(r), limit: Int64.read(r) };
    case "allowTrust":
      return {
        type,
        trustor: AccountId.read(r),
        asset: AssetCode.read(r),
        authorize: Uint32.read(r),
      };
    case "accountMerge":
      return { type, destination: MuxedAccount.read(r) };
    case "inflation":
    case "endSponsoringFutureReserves":
      return { type };
    case "manageData":
      return { type, dataName: DataName.read(r), dataValue: DataValue.read(r) };
    case "bumpSequence":
      return { type, bumpTo: Int64.read(r) };
    case "manageBuyOffer":
      return {
        type,
        selling: Asset.read(r),
        buying: Asset.read(r),
        buyAmount: Int64.read(r),
        price: Price.read(r),
        offerId: Int64.read(r),
      };
    case "pathPaymentStrictSend":
      return {
        type,
        sendAsset: Asset.read(r),
        sendAmount: Int64.read(r),
        destination: MuxedAccount.read(r),
        destAsset: Asset.read(r),
        destMin: Int64.read(r),
        path: Path.read(r),
      };
    case "createClaimableBalance":
      return {
        type,
        asset: Asset.read(r),
        amount: Int64.read(r),
        claimants: Claimants.read(r),
      };
    case "claimClaimableBalance":
    case "clawbackClaimableBalance":
      return { type, balanceId: ClaimableBalanceId.read(r) };
    case "beginSponsoringFutureReserves":
      return { type, sponsoredId: AccountId.read(r) };
    case "revokeSponsorship":
      return { type, target: RevokeSponsorshipTarget.read(r) };
    case "clawback":
      return { type, asset: Asset.read(r), from: MuxedAccount.read(r), amount: Int64.read(r) };
    case "setTrustLineFlags":
      return {
        type,
        trustor: AccountId.read(r),
        asset: Asset.read(r),
        clearFlags: Uint32.read(r),
        setFlags: Uint32.read(r),
      };
  }
}

export const OperationBody = define<OperationBody>("OperationBody", writeBody, readBody);

// ── Operation ──────────────────────────────────────────────────────

const OptMuxedAccount = option(MuxedAccount);

export interface Operation {
  /** Defaults to the transaction source when absent. */
  readonly sourceAccount: MuxedAccount | undefined;
  readonly body: OperationBody;
}

export const Operation = define<Operation>(
  "Operation",
  (v, w) => {
    OptMuxedAccount.write(v.sourceAccount, w);
    OperationBody.write(v.body, w);
  },
  (r) => ({ sourceAccount: OptMuxedAccount.read(r), body: OperationBody.read(r) }),
);
