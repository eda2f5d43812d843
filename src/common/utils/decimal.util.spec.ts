import { formatSignedUSD, parseDecimal, parseInteger, toCents, toDecimal, toUSD } from './decimal.util';

describe('Decimal utilities', () => {
  describe('parseDecimal', () => {
    it('should parse decimal text and finite numbers', () => {
      expect(parseDecimal('15000.25')?.toNumber()).toBe(15000.25);
      expect(parseDecimal(' -3.5 ')?.toNumber()).toBe(-3.5);
      expect(parseDecimal('.5')?.toNumber()).toBe(0.5);
      expect(parseDecimal('1e3')?.toNumber()).toBe(1000);
      expect(parseDecimal(0.78)?.toNumber()).toBe(0.78);
    });

    it('should reject anything else', () => {
      expect(parseDecimal('')).toBeUndefined();
      expect(parseDecimal('15,000')).toBeUndefined();
      expect(parseDecimal('Infinity')).toBeUndefined();
      expect(parseDecimal(Number.POSITIVE_INFINITY)).toBeUndefined();
      expect(parseDecimal(null)).toBeUndefined();
      expect(parseDecimal(undefined)).toBeUndefined();
    });
  });

  describe('parseInteger', () => {
    it('should truncate numbers and accept integer text', () => {
      expect(parseInteger(3.7)?.toNumber()).toBe(3);
      expect(parseInteger(' 4 ')?.toNumber()).toBe(4);
    });

    it('should reject fractional text', () => {
      expect(parseInteger('4.0')).toBeUndefined();
      expect(parseInteger('four')).toBeUndefined();
    });
  });

  describe('toCents', () => {
    it('should round half-up to two places', () => {
      expect(toCents(toDecimal('1.005'))).toBe(1.01);
      expect(toCents(toDecimal('-1.005'))).toBe(-1.01);
      expect(toCents(toDecimal('2.344'))).toBe(2.34);
    });

    it('should normalize negative zero', () => {
      expect(Object.is(toCents(toDecimal('-0.001')), 0)).toBe(true);
    });
  });

  describe('formatting', () => {
    it('should render two decimals', () => {
      expect(toUSD(toDecimal(7))).toBe('7.00');
    });

    it('should sign and group dollar amounts', () => {
      expect(formatSignedUSD(1234567.891)).toBe('+$1,234,567.89');
      expect(formatSignedUSD(-999.5)).toBe('-$999.50');
      expect(formatSignedUSD(0)).toBe('$0.00');
    });
  });
});
