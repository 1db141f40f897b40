import { Decimal } from 'decimal.js';
import { assertDecimalFits, formatDecimal, normalizeDecimalToken, toDecimal } from './decimal';
import { DataValidationError } from './errors';

describe('decimal helpers', () => {
  describe('toDecimal', () => {
    it('should parse decimal strings exactly', () => {
      expect(toDecimal('99999999.99').toFixed(2)).toBe('99999999.99');
      expect(toDecimal(' 0.01 ').toFixed(2)).toBe('0.01');
    });

    it('should accept finite numbers and Decimals', () => {
      expect(toDecimal(10.5).equals(new Decimal('10.50'))).toBe(true);

      const price = new Decimal('3.14');
      expect(toDecimal(price)).toBe(price);
    });

    it('should reject values that are not decimals', () => {
      expect(() => toDecimal('bad_price')).toThrow(DataValidationError);
      expect(() => toDecimal('')).toThrow(DataValidationError);
      expect(() => toDecimal('Infinity')).toThrow(DataValidationError);
      expect(() => toDecimal(Number.NaN)).toThrow(DataValidationError);
      expect(() => toDecimal(null)).toThrow(DataValidationError);
      expect(() => toDecimal(true)).toThrow(DataValidationError);
    });

    it('should name the field in the error message', () => {
      expect(() => toDecimal('abc', 'total')).toThrow('Invalid total: abc');
    });
  });

  describe('assertDecimalFits', () => {
    it('should pass values within precision and scale through', () => {
      const price = new Decimal('99999999.99');

      expect(assertDecimalFits(price, 10, 2)).toBe(price);
      expect(assertDecimalFits(new Decimal('-12.5'), 10, 2).toFixed(2)).toBe('-12.50');
    });

    it('should reject extra fraction digits', () => {
      expect(() => assertDecimalFits(new Decimal('0.125'), 10, 2)).toThrow(DataValidationError);
      expect(() => assertDecimalFits(new Decimal('0.001'), 10, 2, 'total')).toThrow(
        'Invalid total: 0.001 has more than 2 fraction digits',
      );
    });

    it('should reject extra integer digits', () => {
      expect(() => assertDecimalFits(new Decimal('100000000'), 10, 2)).toThrow(
        'Invalid price: 100000000 has more than 8 integer digits',
      );
      expect(() => assertDecimalFits(new Decimal('-100000000'), 10, 2)).toThrow(DataValidationError);
    });
  });

  describe('normalizeDecimalToken', () => {
    it('should strip whitespace and one layer of quotes', () => {
      expect(normalizeDecimalToken(' "99.99" ')).toBe('99.99');
      expect(normalizeDecimalToken("'12.00'")).toBe('12.00');
      expect(normalizeDecimalToken('" 5.25 "')).toBe('5.25');
      expect(normalizeDecimalToken('""7.5""')).toBe('"7.5"');
    });

    it('should leave unbalanced quotes in place', () => {
      expect(normalizeDecimalToken('"12.00')).toBe('"12.00');
      expect(normalizeDecimalToken(`"12.00'`)).toBe(`"12.00'`);
    });
  });

  describe('formatDecimal', () => {
    it('should render at least two fraction digits', () => {
      expect(formatDecimal(new Decimal('10.5'))).toBe('10.50');
      expect(formatDecimal(new Decimal(100))).toBe('100.00');
      expect(formatDecimal(new Decimal('0.125'))).toBe('0.125');
    });

    it('should never use exponential notation', () => {
      expect(formatDecimal(new Decimal('1e-7'))).toBe('0.0000001');
      expect(formatDecimal(new Decimal('1e21'))).toBe('1000000000000000000000.00');
    });
  });
});
