import { Decimal } from 'decimal.js';
import { DecimalTransformer } from './decimal.transformer';

describe('DecimalTransformer', () => {
  const transformer = new DecimalTransformer();

  describe('from', () => {
    it('should read DECIMAL strings exactly', () => {
      const cent = transformer.from('0.01');
      const max = transformer.from('99999999.99');

      expect(cent?.equals(new Decimal('0.01'))).toBe(true);
      expect(max?.equals(new Decimal('99999999.99'))).toBe(true);
      expect(max?.toFixed(2)).toBe('99999999.99');
    });

    it('should read numbers', () => {
      expect(transformer.from(10.5)?.toFixed(2)).toBe('10.50');
    });

    it('should map missing values to null', () => {
      expect(transformer.from(null)).toBeNull();
      expect(transformer.from(undefined)).toBeNull();
    });
  });

  describe('to', () => {
    it('should write decimals as plain text', () => {
      expect(transformer.to(new Decimal('1e-7'))).toBe('0.0000001');
      expect(transformer.to(new Decimal('99999999.99'))).toBe('99999999.99');
    });

    it('should pass through text and missing values', () => {
      expect(transformer.to('12.50')).toBe('12.50');
      expect(transformer.to(null)).toBeNull();
      expect(transformer.to(undefined)).toBeUndefined();
    });
  });
});
