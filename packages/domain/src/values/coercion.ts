import { Decimal } from 'decimal.js';

// Plain decimal literal: optional sign, digits with optional fraction, optional exponent.
const DECIMAL_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse a JSON/CSV value as a finite number.
 * Accepts finite numbers and decimal strings (surrounding whitespace ignored).
 * Returns undefined for anything else, including blanks, booleans and `Infinity`.
 */
export function parseNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value !== 'string') return undefined;
  const text = value.trim();
  if (!DECIMAL_LITERAL.test(text)) return undefined;
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function isNumeric(value: unknown): boolean {
  return parseNumber(value) !== undefined;
}

export function toFloat(value: unknown, fallback = 0): number {
  return parseNumber(value) ?? fallback;
}

/** Integer fields truncate toward zero. */
export function toInteger(value: unknown, fallback = 0): number {
  const parsed = parseNumber(value);
  return parsed === undefined ? fallback : Math.trunc(parsed);
}

/**
 * Exact decimal built from the value's decimal text, so `"8.2"` and `8.2`
 * both become 8.2 with no binary floating-point residue.
 */
export function toDecimal(value: unknown, fallback: Decimal.Value = 0): Decimal {
  if (parseNumber(value) === undefined) return new Decimal(fallback);
  return new Decimal(typeof value === 'string' ? value.trim() : String(value));
}

/**
 * Round a float amount to `places` decimals, half-even on its exact binary
 * value: 2.675 is stored as 2.67499... and becomes 2.67, while 10.125 is an
 * exact tie and becomes 10.12. The result is an exact decimal.
 */
export function roundMoney(value: number, places = 2): Decimal {
  // toFixed(100) spells out the double's binary expansion digit for digit.
  return new Decimal(value.toFixed(100)).toDecimalPlaces(places, Decimal.ROUND_HALF_EVEN);
}

/** Text form of a passthrough field; objects render as JSON. */
export function toText(value: unknown, fallback = ''): string {
  if (value === undefined || value === null) return fallback;
  if (typeof value === 'string') return value;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}
