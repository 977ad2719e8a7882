import Decimal from 'decimal.js';

/** GRT and curation signal are 18-decimal tokens */
export const TOKEN_DECIMALS = 18;

const MINOR_UNITS_PER_TOKEN = new Decimal(10).pow(TOKEN_DECIMALS);

const INTEGER_PATTERN = /^\d+$/;

/**
 * Convert an integer minor-unit amount (as returned by the subgraph) to token units.
 * Throws on anything that is not a non-negative integer.
 */
export function fromMinorUnits(raw: string | number | bigint): Decimal {
  const text = typeof raw === 'string' ? raw.trim() : raw.toString();
  if (!INTEGER_PATTERN.test(text)) {
    throw new RangeError(`Invalid minor-unit amount: ${String(raw)}`);
  }
  return new Decimal(text).div(MINOR_UNITS_PER_TOKEN);
}

/** `a / b`, or 0 when `b` is zero */
export function safeDiv(numerator: Decimal, denominator: Decimal): Decimal {
  return denominator.isZero() ? new Decimal(0) : numerator.div(denominator);
}

/** Two-decimal display form used in recommendation text; exact halves round to even */
export function formatApr(apr: Decimal): string {
  return apr.toDecimalPlaces(2, Decimal.ROUND_HALF_EVEN).toFixed(2);
}
