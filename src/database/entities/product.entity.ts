import { Decimal } from 'decimal.js';
import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';
import { assertDecimalFits, formatDecimal, toDecimal } from '../../common/decimal';
import { DataValidationError } from '../../common/errors';
import { DecimalTransformer } from '../transformers';

export enum Category {
  UNKNOWN = 'UNKNOWN',
  CLOTHS = 'CLOTHS',
  FOOD = 'FOOD',
  HOUSEWARES = 'HOUSEWARES',
  AUTOMOTIVE = 'AUTOMOTIVE',
  TOOLS = 'TOOLS',
}

const CATEGORY_BY_NAME: ReadonlyMap<string, Category> = new Map(
  Object.values(Category).map(category => [category, category]),
);

/**
 * Resolve a category by its member name (exact, case-sensitive)
 */
export function categoryFromName(name: unknown): Category {
  const category = typeof name === 'string' ? CATEGORY_BY_NAME.get(name) : undefined;
  if (category === undefined) {
    throw new DataValidationError(`Invalid attribute: category ${String(name)}`);
  }
  return category;
}

export const PRICE_PRECISION = 10;
export const PRICE_SCALE = 2;

/**
 * Transport shape of a product: price as decimal text, category by name
 */
export interface SerializedProduct {
  id: number | null;
  name: string;
  description: string;
  price: string;
  available: boolean;
  category: string;
}

export type ProductAttributes = Pick<
  ProductEntity,
  'id' | 'name' | 'description' | 'price' | 'available' | 'category'
>;

const REQUIRED_FIELDS = ['name', 'description', 'price', 'available', 'category'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

@Entity('products')
export class ProductEntity {
  @PrimaryGeneratedColumn()
  id: number | null = null;

  @Column({ type: 'varchar', length: 100 })
  name: string = '';

  @Column({ type: 'varchar', length: 250 })
  description: string = '';

  @Column({
    type: 'decimal',
    precision: PRICE_PRECISION,
    scale: PRICE_SCALE,
    transformer: new DecimalTransformer(),
  })
  price: Decimal = new Decimal(0);

  @Column({ type: 'boolean' })
  available: boolean = true;

  @Column({ type: 'simple-enum', enum: Category })
  category: Category = Category.UNKNOWN;

  serialize(): SerializedProduct {
    return {
      id: this.id,
      name: this.name,
      description: this.description,
      price: formatDecimal(this.price, PRICE_SCALE),
      available: this.available,
      category: this.category,
    };
  }

  /**
   * Populate this product from a serialized mapping.
   * `id` is copied only when present; every other field is required.
   *
   * @throws DataValidationError when the data is not a mapping, a field is
   * missing or mistyped, the category is unknown or the price is not a decimal
   * that fits the price column
   */
  deserialize(data: unknown): this {
    if (!isRecord(data)) {
      throw new DataValidationError('Invalid product: body of request contained bad or no data');
    }

    for (const field of REQUIRED_FIELDS) {
      if (data[field] === undefined) {
        throw new DataValidationError(`Invalid product: missing ${field}`);
      }
    }

    const { id, name, description, price, available, category } = data;

    if (typeof name !== 'string') {
      throw new DataValidationError(`Invalid type for string [name]: ${typeof name}`);
    }
    if (typeof description !== 'string') {
      throw new DataValidationError(`Invalid type for string [description]: ${typeof description}`);
    }
    if (typeof available !== 'boolean') {
      throw new DataValidationError(`Invalid type for boolean [available]: ${typeof available}`);
    }

    this.name = name;
    this.description = description;
    this.price = assertDecimalFits(toDecimal(price), PRICE_PRECISION, PRICE_SCALE);
    this.available = available;
    this.category = categoryFromName(category);

    if (id === null || (typeof id === 'number' && Number.isInteger(id))) {
      this.id = id;
    } else if (id !== undefined) {
      throw new DataValidationError(`Invalid type for integer [id]: ${typeof id}`);
    }

    return this;
  }

  toString(): string {
    return `<Product ${this.name} id=[${this.id}]>`;
  }
}
