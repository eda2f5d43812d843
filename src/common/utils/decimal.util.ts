import Decimal from 'decimal.js';

// Configure Decimal.js globally for dollar amounts
Decimal.set({
  precision: 20,
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,
  toExpNeg: -9e15,
});

const DECIMAL_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_TEXT = /^[+-]?\d+$/;

export function toDecimal(value: number | string | Decimal): Decimal {
  return new Decimal(value);
}

/**
 * Parses user-entered decimal text or a number.
 * Returns undefined for anything that is not a finite decimal
 * (empty text, NaN, Infinity, hex literals, null).
 */
export function parseDecimal(value: unknown): Decimal | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? new Decimal(value) : undefined;
  }
  if (typeof value !== 'string') {
    return undefined;
  }
  const text = value.trim();
  if (!DECIMAL_TEXT.test(text)) {
    return undefined;
  }
  const parsed = new Decimal(text.replace(/^\+/, ''));
  return parsed.isFinite() ? parsed : undefined;
}

/**
 * Parses a whole number. Numbers are truncated toward zero;
 * text must be an integer literal.
 */
export function parseInteger(value: unknown): Decimal | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? new Decimal(Math.trunc(value)) : undefined;
  }
  if (typeof value !== 'string') {
    return undefined;
  }
  const text = value.trim();
  return INTEGER_TEXT.test(text) ? new Decimal(text.replace(/^\+/, '')) : undefined;
}

/**
 * Rounds half-up to cents and converts for JSON serialization.
 * Negative zero comes back as 0.
 */
export function toCents(value: Decimal): number {
  const rounded = value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toNumber();
  return rounded === 0 ? 0 : rounded;
}

/** Converts Decimal to USD string with 2 decimal places. */
export function toUSD(value: Decimal): string {
  return value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toFixed(2);
}

/**
 * Signed dollar label with thousands separators: +$1,234.50, -$20.00, $0.00
 */
export function formatSignedUSD(value: number): string {
  const amount = toDecimal(Math.abs(value));
  const [whole, cents] = toUSD(amount).split('.');
  const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  const sign = value > 0 ? '+' : value < 0 ? '-' : '';
  return `${sign}$${grouped}.${cents}`;
}
