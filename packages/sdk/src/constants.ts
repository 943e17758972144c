/**
 * Protocol constants.
 *
 * Structural bounds of the wire format live next to the types they bound
 * (MAX_OPERATIONS in types/transaction.ts, MEMO_TEXT_MAX_BYTES in
 * types/memo.ts, ...). What is left here are the economic units.
 */

// ── Amounts ────────────────────────────────────────────────────────
export const AMOUNT_DECIMALS = 7;
export const STROOPS_PER_UNIT = 10_000_000n; // 1 unit = 10^7 stroops
export const MAX_INT64 = 2n ** 63n - 1n;
export const MAX_INT32 = 2 ** 31 - 1;

// ── Fees ───────────────────────────────────────────────────────────
export const BASE_FEE = 100; // stroops per operation (network minimum)

// ── Time bounds ────────────────────────────────────────────────────
export const TIMEOUT_INFINITE = 0;

// ── Flags ──────────────────────────────────────────────────────────
export const AccountFlags = {
  authRequired: 0x1,
  authRevocable: 0x2,
  authImmutable: 0x4,
  authClawbackEnabled: 0x8,
} as const;

export const TrustLineFlags = {
  authorized: 0x1,
  authorizedToMaintainLiabilities: 0x2,
  clawbackEnabled: 0x4,
} as const;
