import { Decimal } from 'decimal.js';
import { ValueTransformer } from 'typeorm';

/**
 * Maps DECIMAL columns to decimal.js values.
 * mysql2 hands decimals back as strings, SQLite as numbers.
 */
export class DecimalTransformer implements ValueTransformer {
  to(value: Decimal | string | null | undefined): string | null | undefined {
    return Decimal.isDecimal(value) ? value.toFixed() : value;
  }

  from(value: string | number | null | undefined): Decimal | null {
    if (value === null || value === undefined) {
      return null;
    }
    return new Decimal(value);
  }
}
