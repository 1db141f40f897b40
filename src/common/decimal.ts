import { Decimal } from 'decimal.js';
import { DataValidationError } from './errors';

const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const QUOTES = ['"', "'"];

export type DecimalInput = Decimal | number | string;

/**
 * Parse a price into an exact decimal.
 * Accepts a Decimal, a finite number or a plain decimal string.
 */
export function toDecimal(value: unknown, field = 'price'): Decimal {
  if (Decimal.isDecimal(value)) {
    if (!value.isFinite()) {
      throw new DataValidationError(`Invalid ${field}: ${value.toString()}`);
    }
    return value;
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new DataValidationError(`Invalid ${field}: ${value}`);
    }
    return new Decimal(value.toString());
  }

  if (typeof value === 'string' && DECIMAL_PATTERN.test(value.trim())) {
    return new Decimal(value.trim());
  }

  throw new DataValidationError(`Invalid ${field}: ${String(value)}`);
}

/**
 * Reject values a DECIMAL(precision, scale) column would round or overflow.
 */
export function assertDecimalFits(value: Decimal, precision: number, scale: number, field = 'price'): Decimal {
  if (value.decimalPlaces() > scale) {
    throw new DataValidationError(`Invalid ${field}: ${value.toFixed()} has more than ${scale} fraction digits`);
  }
  if (value.abs().gte(new Decimal(10).pow(precision - scale))) {
    throw new DataValidationError(
      `Invalid ${field}: ${value.toFixed()} has more than ${precision - scale} integer digits`,
    );
  }
  return value;
}

/**
 * Strip surrounding whitespace and one layer of matching quotes,
 * so that ` "99.99" ` becomes `99.99`.
 */
export function normalizeDecimalToken(raw: string): string {
  const token = raw.trim();
  const quote = token.charAt(0);

  if (token.length >= 2 && QUOTES.includes(quote) && token.endsWith(quote)) {
    return token.slice(1, -1).trim();
  }
  return token;
}

// Never exponential; keeps every significant fraction digit.
export function formatDecimal(value: Decimal, minScale = 2): string {
  return value.toFixed(Math.max(minScale, value.decimalPlaces()));
}
