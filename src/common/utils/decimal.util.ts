import Decimal from 'decimal.js';

// USDC amounts from the upstream API carry at most 6 decimals;
// 20 significant digits leaves room for all-time sums.
Decimal.set({
  precision: 20,
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,
  toExpNeg: -9e15,
});

export const ZERO = new Decimal(0);

/**
 * Parses an upstream numeric field (string or number).
 * Returns undefined for blanks, non-numeric text and non-finite values.
 */
export function parseDecimal(value: string | number | undefined): Decimal | undefined {
  if (value === undefined) {
    return undefined;
  }
  const text = String(value).trim();
  if (text === '') {
    return undefined;
  }
  try {
    const parsed = new Decimal(text);
    return parsed.isFinite() ? parsed : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Converts Decimal back to a JSON number.
 * Rounds to 8 decimal places.
 */
export function toNumber(value: Decimal): number {
  return value.toDecimalPlaces(8).toNumber();
}
