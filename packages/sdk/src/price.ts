/**
 * Prices — decimal strings → int32 n/d.
 *
 * Best rational approximation by continued fractions, computed on exact
 * bigint rationals. Stops at the last convergent whose numerator and
 * denominator both fit in int32.
 */

import { MAX_INT32 } from "./constants.js";
import { ConstructionError } from "./errors.js";
import type { Price } from "./types/asset.js";

const PRICE_RE = /^(\d+)(?:\.(\d+))?$/;
const MAX = BigInt(MAX_INT32);

export function priceFromString(text: string): Price {
  const match = PRICE_RE.exec(text);
  if (match === null) {
    throw new ConstructionError(`invalid price '${text}'`);
  }
  const [, whole = "", fraction = ""] = match;

  // text = p / q exactly
  let p = BigInt(whole + fraction);
  let q = 10n ** BigInt(fraction.length);

  // convergents h/k, seeded with 0/1 and 1/0
  let [h0, k0] = [0n, 1n];
  let [h1, k1] = [1n, 0n];
  let found = false;

  while (p <= MAX * q) {
    const a = p / q;
    const h = a * h1 + h0;
    const k = a * k1 + k0;
    if (h > MAX || k > MAX) break;
    [h0, k0, h1, k1] = [h1, k1, h, k];
    found = true;

    const rem = p - a * q;
    if (rem === 0n) break;
    [p, q] = [q, rem];
  }

  if (!found || h1 === 0n || k1 === 0n) {
    throw new ConstructionError(`price '${text}' cannot be approximated as an int32 fraction`);
  }
  return { n: Number(h1), d: Number(k1) };
}

/** Price → decimal string with up to 7 places, for display. */
export function priceToString(price: Price): string {
  if (price.d === 0) {
    throw new ConstructionError("price denominator is zero");
  }
  const scaled = (BigInt(price.n) * 10_000_000n) / BigInt(price.d);
  const whole = scaled / 10_000_000n;
  const fraction = (scaled % 10_000_000n).toString().padStart(7, "0").replace(/0+$/, "");
  return fraction.length > 0 ? `${whole}.${fraction}` : `${whole}`;
}
