/**
 * Money helpers: store money as integer minor units (kopecks, cents).
 * Never store floats in Mongo. Convert at the edges.
 */

export type MoneyMinor = number;

/** Whole major units (e.g. roubles typed in a filter) into minor units. */
export function toMinor(major: number): MoneyMinor {
  if (!Number.isFinite(major)) throw new Error(`Invalid money input: ${major}`);
  return Math.round(major * 100);
}

/** Minor units into whole major units, truncated the way the price filters display them. */
export function toWholeMajor(minor: MoneyMinor): number {
  return Math.trunc(Math.round(minor) / 100);
}

/** Format minor units for display. */
export function formatMoney(minor: MoneyMinor, currency: string, locale: string): string {
  return new Intl.NumberFormat(locale, {
    style: "currency",
    currency,
    currencyDisplay: "symbol",
    maximumFractionDigits: 2,
    minimumFractionDigits: 2,
  }).format(Math.round(minor) / 100);
}

/** Multiply minor units by a whole count (days, items), safe integer math. */
export function timesMinor(minor: MoneyMinor, count: number): MoneyMinor {
  if (!Number.isInteger(count)) throw new Error("Invalid count");
  const out = Math.round(minor) * count;
  if (!Number.isSafeInteger(out)) throw new Error("Amount overflow");
  return out;
}

/** Guard helper for business rules. */
export function assertNonNegativeMinor(minor: MoneyMinor, label = "amount") {
  if (!Number.isInteger(minor)) throw new Error(`${label} must be an integer amount of minor units`);
  if (minor < 0) throw new Error(`${label} cannot be negative`);
}
