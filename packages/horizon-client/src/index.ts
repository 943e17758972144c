/**
 * @ledgerkit/horizon-client — ledger observation and submission.
 *
 * The CLI goes through the HorizonClient interface.
 * Swap HorizonRestClient for MockHorizonClient in tests.
 */

export type {
  HorizonClient,
  HorizonRestClientOptions,
  FetchLike,
  AccountRecord,
  AccountBalance,
  AccountSigner,
  AccountThresholds,
  FeeStats,
  FeeDistribution,
  SubmitResult,
} from "./types.js";

export { HorizonError, type HorizonErrorKind, type HorizonErrorDetail } from "./errors.js";
export { HorizonRestClient, parseSequence } from "./rest-client.js";
export { MockHorizonClient } from "./mock-client.js";
export {
  memoRequiredCandidates,
  requiresMemo,
  MEMO_REQUIRED_KEY,
  MEMO_REQUIRED_VALUE,
} from "./memo-required.js";
