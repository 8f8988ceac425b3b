import Decimal from 'decimal.js';

import { ValidationError } from '../../../errors';
import { RECOMMENDATIONS_CONFIG } from '../config';

// mul/div round to `precision` significant digits, far above numeric(14,2)
const ExactDecimal = Decimal.clone({ precision: 64, rounding: Decimal.ROUND_HALF_UP });

const HUNDRED = new ExactDecimal(100);

// plain or exponent notation only; decimal.js also takes hex, binary and octal literals
const NUMERIC_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

/**
 * Parses a number or a numeric string (surrounding whitespace allowed).
 * Returns null for anything else, including NaN and infinities.
 */
export function parseDecimal(value: unknown): Decimal | null {
  let text: string;
  if (typeof value === 'number') {
    text = String(value);
  } else if (typeof value === 'string') {
    text = value.trim();
  } else {
    return null;
  }

  if (!NUMERIC_PATTERN.test(text)) {
    return null;
  }
  const parsed = new ExactDecimal(text);
  return parsed.isFinite() ? parsed : null;
}

/**
 * Formats with exactly `scale` fractional digits, rounding half away from zero.
 */
export function toFixedDecimal(value: Decimal, scale: number): string {
  return value.toFixed(scale, Decimal.ROUND_HALF_UP);
}

/**
 * Accepts only values in the open interval (0, 100).
 */
export function validatePercentage(value: unknown): Decimal {
  const percent = parseDecimal(value);
  if (!percent || percent.lte(0) || percent.gte(HUNDRED)) {
    throw new ValidationError(RECOMMENDATIONS_CONFIG.MESSAGES.DISCOUNT_RANGE);
  }
  return percent;
}

/**
 * `price * (100 - percent) / 100`, rounded half-up to two fractional digits.
 */
export function applyPercentDiscount(price: string, percent: Decimal): string {
  const amount = parseDecimal(price);
  if (!amount) {
    throw new TypeError(`Price is not a decimal value: ${price}`);
  }

  return toFixedDecimal(amount.mul(HUNDRED.minus(percent)).div(HUNDRED), RECOMMENDATIONS_CONFIG.PRICE_SCALE);
}
