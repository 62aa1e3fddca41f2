import Decimal from 'decimal.js';
import { parseDecimal, toNumber } from './decimal.util';

describe('decimal.util', () => {
  describe('parseDecimal', () => {
    it('should parse numeric strings', () => {
      expect(parseDecimal('12.345678')?.toString()).toBe('12.345678');
    });

    it('should parse numbers', () => {
      expect(parseDecimal(7.5)?.toString()).toBe('7.5');
    });

    it('should trim whitespace', () => {
      expect(parseDecimal('  3 ')?.toString()).toBe('3');
    });

    it('should return undefined for blank or missing values', () => {
      expect(parseDecimal(undefined)).toBeUndefined();
      expect(parseDecimal('')).toBeUndefined();
      expect(parseDecimal('   ')).toBeUndefined();
    });

    it('should return undefined for non-numeric text', () => {
      expect(parseDecimal('abc')).toBeUndefined();
    });

    it('should return undefined for non-finite values', () => {
      expect(parseDecimal(Infinity)).toBeUndefined();
      expect(parseDecimal('NaN')).toBeUndefined();
    });
  });

  describe('toNumber', () => {
    it('should round to 8 decimal places', () => {
      expect(toNumber(new Decimal('0.123456789'))).toBe(0.12345679);
    });

    it('should avoid binary float drift when summing', () => {
      expect(toNumber(new Decimal('0.1').plus('0.2'))).toBe(0.3);
    });
  });
});
