import Decimal from "decimal.js";

export type AmountLike = Decimal | string | number;

const NUMERIC_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i;

/**
 * Reads a ledger cell as an amount. Thousands separators are tolerated;
 * anything else that is not numeric yields null, and the caller decides
 * whether that becomes zero or a validation issue.
 */
export function coerceAmount(value: unknown): Decimal | null {
  if (value instanceof Decimal) return value;
  if (typeof value === "number") {
    return Number.isFinite(value) ? new Decimal(value) : null;
  }
  if (typeof value === "string") {
    const cleaned = value.trim().replace(/,/g, "");
    if (cleaned === "" || !NUMERIC_PATTERN.test(cleaned)) return null;
    return new Decimal(cleaned);
  }
  return null;
}

export function formatAmount(value: AmountLike, decimals = 2): string {
  return new Decimal(value).toFixed(decimals);
}

export function sumAmounts(amounts: AmountLike[]): Decimal {
  return amounts.reduce<Decimal>((sum, val) => sum.add(new Decimal(val)), new Decimal(0));
}

/** Division that yields 0 when the denominator is zero. */
export function safeRatio(numerator: AmountLike, denominator: AmountLike): Decimal {
  const divisor = new Decimal(denominator);
  if (divisor.isZero()) return new Decimal(0);
  return new Decimal(numerator).div(divisor);
}

export function maxAmount(a: AmountLike, b: AmountLike): Decimal {
  return Decimal.max(a, b);
}

export function isAmountZero(value: AmountLike, tolerance = 0.01): boolean {
  return new Decimal(value).abs().lessThanOrEqualTo(tolerance);
}

/** Fixed decimals with thousands separators, e.g. "1,234.50". */
export function formatWithSeparators(value: AmountLike, decimals = 2): string {
  const [whole, fraction] = formatAmount(value, decimals).split(".");
  const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ",");
  return fraction === undefined ? grouped : `${grouped}.${fraction}`;
}
