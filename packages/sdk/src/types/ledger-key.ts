/**
 * LedgerKey — names a ledger entry (for RevokeSponsorship).
 *
 * union LedgerEntryType { ACCOUNT = 0, TRUSTLINE = 1, OFFER = 2, DATA = 3,
 *                         CLAIMABLE_BALANCE = 4 }
 */

import { define, Int64, xdrEnum, xdrString } from "../xdr/index.js";
import { Asset } from "./asset.js";
import { ClaimableBalanceId } from "./claimable-balance.js";
import { AccountId } from "./keys.js";

export const DATA_NAME_MAX_BYTES = 64;

export const DataName = xdrString(DATA_NAME_MAX_BYTES);

const LedgerEntryType = xdrEnum("LedgerEntryType", {
  account: 0,
  trustline: 1,
  offer: 2,
  data: 3,
  claimableBalance: 4,
});

export type LedgerKey =
  | { readonly type: "account"; readonly accountId: AccountId }
  | { readonly type: "trustline"; readonly accountId: AccountId; readonly asset: Asset }
  | { readonly type: "offer"; readonly sellerId: AccountId; readonly offerId: bigint }
  | { readonly type: "data"; readonly accountId: AccountId; readonly dataName: Uint8Array }
  | { readonly type: "claimableBalance"; readonly balanceId: ClaimableBalanceId };

export const LedgerKey = define<LedgerKey>(
  "LedgerKey",
  (v, w) => {
    LedgerEntryType.write(v.type, w);
    switch (v.type) {
      case "account":
        AccountId.write(v.accountId, w);
        break;
      case "trustline":
        AccountId.write(v.accountId, w);
        Asset.write(v.asset, w);
        break;
      case "offer":
        AccountId.write(v.sellerId, w);
        Int64.write(v.offerId, w);
        break;
      case "data":
        AccountId.write(v.accountId, w);
        DataName.write(v.dataName, w);
        break;
      case "claimableBalance":
        ClaimableBalanceId.write(v.balanceId, w);
        break;
    }
  },
  (r) => {
    const type = LedgerEntryType.read(r);
    switch (type) {
      case "account":
        return { type, accountId: AccountId.read(r) };
      case "trustline":
        return { type, accountId: AccountId.read(r), asset: Asset.read(r) };
      case "offer":
        return { type, sellerId: AccountId.read(r), offerId: Int64.read(r) };
      case "data":
        return { type, accountId: AccountId.read(r), dataName: DataName.read(r) };
      case "claimableBalance":
        return { type, balanceId: ClaimableBalanceId.read(r) };
    }
  },
);
