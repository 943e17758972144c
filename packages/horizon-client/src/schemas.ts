/**
 * Horizon response shapes. Only the fields the client reads are listed;
 * Horizon adds more and they are ignored.
 */

import { Type, type Static } from "@sinclair/typebox";

const DecimalString = Type.String({ pattern: "^-?\\d+(\\.\\d+)?$" });

export const AccountResponse = Type.Object({
  account_id: Type.String(),
  sequence: Type.String(),
  subentry_count: Type.Integer({ minimum: 0 }),
  thresholds: Type.Object({
    low_threshold: Type.Integer({ minimum: 0, maximum: 255 }),
    med_threshold: Type.Integer({ minimum: 0, maximum: 255 }),
    high_threshold: Type.Integer({ minimum: 0, maximum: 255 }),
  }),
  balances: Type.Array(
    Type.Object({
      balance: DecimalString,
      asset_type: Type.String(),
      asset_code: Type.Optional(Type.String()),
      asset_issuer: Type.Optional(Type.String()),
    }),
  ),
  signers: Type.Array(
    Type.Object({
      key: Type.String(),
      weight: Type.Integer({ minimum: 0, maximum: 255 }),
      type: Type.String(),
    }),
  ),
  data: Type.Record(Type.String(), Type.String()),
});

export type AccountResponse = Static<typeof AccountResponse>;

const FeeDistributionResponse = Type.Object({
  max: DecimalString,
  min: DecimalString,
  mode: DecimalString,
  p10: DecimalString,
  p20: DecimalString,
  p30: DecimalString,
  p40: DecimalString,
  p50: DecimalString,
  p60: DecimalString,
  p70: DecimalString,
  p80: DecimalString,
  p90: DecimalString,
  p95: DecimalString,
  p99: DecimalString,
});

export type FeeDistributionResponse = Static<typeof FeeDistributionResponse>;

export const FeeStatsResponse = Type.Object({
  last_ledger: DecimalString,
  last_ledger_base_fee: DecimalString,
  ledger_capacity_usage: DecimalString,
  fee_charged: FeeDistributionResponse,
  max_fee: FeeDistributionResponse,
});

export type FeeStatsResponse = Static<typeof FeeStatsResponse>;

export const SubmitResponse = Type.Object({
  hash: Type.String({ pattern: "^[0-9a-f]{64}$" }),
  ledger: Type.Integer({ minimum: 0 }),
  envelope_xdr: Type.String(),
  result_xdr: Type.String(),
});

export type SubmitResponse = Static<typeof SubmitResponse>;
