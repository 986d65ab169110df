import { Decimal } from 'decimal.js';

// Balances are fixed-point; 28 significant digits matches the widest amounts we accept
Decimal.set({
  maxE: 9e15,
  minE: -9e15,
  modulo: Decimal.ROUND_HALF_UP,
  precision: 28,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -7,
  toExpPos: 21,
});

/**
 * Number of fractional digits used when rendering balances.
 */
export const BALANCE_DECIMAL_PLACES = 4;

/**
 * Try to parse a string to a Decimal. Empty or absent input yields zero.
 */
export function tryParseDecimal(value: string | Decimal | undefined | null, out?: { value: Decimal }): boolean {
  if (value === undefined || value === null || value === '') {
    if (out) out.value = new Decimal(0);
    return true;
  }

  try {
    const decimal = new Decimal(value);
    if (!decimal.isFinite()) return false;
    if (out) out.value = decimal;
    return true;
  } catch {
    return false;
  }
}

/**
 * Parse a string to a Decimal with fallback to zero
 */
export function parseDecimal(value: string | Decimal | undefined | null): Decimal {
  const result = { value: new Decimal(0) };
  tryParseDecimal(value, result);
  return result.value;
}

/**
 * Render a balance with exactly four fractional digits (no exponent notation).
 */
export function formatBalance(decimal: Decimal): string {
  const fixed = decimal.toFixed(BALANCE_DECIMAL_PLACES);
  // decimal.js keeps the sign of negative zero after rounding
  return fixed.startsWith('-') && new Decimal(fixed).isZero() ? fixed.slice(1) : fixed;
}
