/**
 * SEP-29 memo-required check — which destinations need looking up.
 *
 * A transaction that already carries a memo is never checked. Muxed
 * destinations (M...) identify the recipient themselves and are skipped.
 */

import {
  muxedAccountToAddress,
  type Memo,
  type Operation,
  type TransactionEnvelope,
} from "@ledgerkit/sdk";

export const MEMO_REQUIRED_KEY = "config.memo_required";
/** base64("1") */
export const MEMO_REQUIRED_VALUE = "MQ==";

function memoAndOperations(envelope: TransactionEnvelope): {
  memo: Memo;
  operations: readonly Operation[];
} {
  switch (envelope.type) {
    case "txV0":
      return envelope.v0.tx;
    case "tx":
      return envelope.v1.tx;
    case "txFeeBump":
      return envelope.feeBump.tx.innerTx.tx;
  }
}

/** Distinct G... destinations of payment-like operations, in operation order. */
export function memoRequiredCandidates(envelope: TransactionEnvelope): string[] {
  const { memo, operations } = memoAndOperations(envelope);
  if (memo.type !== "none") return [];
  const destinations = new Set<string>();
  for (const { body } of operations) {
    switch (body.type) {
      case "payment":
      case "pathPaymentStrictReceive":
      case "pathPaymentStrictSend":
      case "accountMerge":
        if (body.destination.type === "ed25519") {
          destinations.add(muxedAccountToAddress(body.destination));
        }
        break;
      default:
        break;
    }
  }
  return [...destinations];
}

export function requiresMemo(data: Record<string, string>): boolean {
  return data[MEMO_REQUIRED_KEY] === MEMO_REQUIRED_VALUE;
}
