/**
 * Amounts — decimal strings ↔ int64 stroops.
 *
 * Amounts carry exactly 7 decimal places (1 unit = 10^7 stroops). All math
 * is on bigint; a float never touches an amount.
 */

import { AMOUNT_DECIMALS, MAX_INT64, STROOPS_PER_UNIT } from "./constants.js";
import { ConstructionError } from "./errors.js";

const AMOUNT_RE = /^(\d+)(?:\.(\d+))?$/;

export interface ParseAmountOptions {
  /** Accept "0" (trust-line removal, offer deletion). Default false. */
  allowZero?: boolean;
}

/** "12.3456789" → 123456789n */
export function parseAmount(text: string, options: ParseAmountOptions = {}): bigint {
  if (text.startsWith("-")) {
    throw new ConstructionError(`amount must not be negative: '${text}'`);
  }
  const match = AMOUNT_RE.exec(text);
  if (match === null) {
    throw new ConstructionError(`invalid amount '${text}'`);
  }
  const [, whole = "", fraction = ""] = match;
  if (fraction.length > AMOUNT_DECIMALS) {
    throw new ConstructionError(
      `amount '${text}' has more than ${AMOUNT_DECIMALS} decimal places`,
    );
  }

  const stroops =
    BigInt(whole) * STROOPS_PER_UNIT + BigInt(fraction.padEnd(AMOUNT_DECIMALS, "0"));
  if (stroops > MAX_INT64) {
    throw new ConstructionError(`amount '${text}' overflows int64`);
  }
  if (stroops === 0n && options.allowZero !== true) {
    throw new ConstructionError("amount must be positive");
  }
  return stroops;
}

/** 123456789n → "12.3456789" (always 7 decimals, as Horizon reports them). */
export function formatAmount(stroops: bigint): string {
  const sign = stroops < 0n ? "-" : "";
  const abs = stroops < 0n ? -stroops : stroops;
  const whole = abs / STROOPS_PER_UNIT;
  const fraction = (abs % STROOPS_PER_UNIT).toString().padStart(AMOUNT_DECIMALS, "0");
  return `${sign}${whole}.${fraction}`;
}
