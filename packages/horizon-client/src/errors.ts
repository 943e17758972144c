import { LedgerKitError } from "@ledgerkit/sdk";

export type HorizonErrorKind =
  | "timeout"
  | "network"
  | "unexpected-status"
  | "invalid-json"
  | "invalid-response"
  | "invalid-sequence-number"
  | "account-requires-memo";

export interface HorizonErrorDetail {
  /** HTTP status for unexpected-status. */
  status?: number;
  /** Response body for unexpected-status. */
  body?: string;
  /** Destination flagged memo_required, for account-requires-memo. */
  accountId?: string;
}

export class HorizonError extends LedgerKitError {
  readonly status: number | undefined;
  readonly body: string | undefined;
  readonly accountId: string | undefined;

  constructor(
    readonly kind: HorizonErrorKind,
    message: string,
    detail: HorizonErrorDetail = {},
  ) {
    super(message);
    this.status = detail.status;
    this.body = detail.body;
    this.accountId = detail.accountId;
  }
}
