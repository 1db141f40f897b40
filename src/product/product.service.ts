import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Equal, FindOptionsWhere, Repository } from 'typeorm';
import { assertDecimalFits, DecimalInput, normalizeDecimalToken, toDecimal } from '../common/decimal';
import { DataValidationError } from '../common/errors';
import { Category, PRICE_PRECISION, PRICE_SCALE, ProductEntity } from '../database/entities';
import { ResultSet } from '../database/result-set';

@Injectable()
export class ProductService {
  private readonly logger = new Logger(ProductService.name);

  constructor(
    @InjectRepository(ProductEntity)
    private readonly productRepository: Repository<ProductEntity>,
    private readonly dataSource: DataSource,
  ) {}

  /**
   * Insert a new product. Any id set by the caller is discarded
   * and replaced by the one the store assigns.
   */
  async create(product: ProductEntity): Promise<ProductEntity> {
    product.id = null;

    await this.dataSource.transaction(async manager => {
      await manager.save(ProductEntity, product);
    });

    this.logger.log(`Product created: ${product.toString()}`);

    return product;
  }

  /**
   * Persist every field of an already created product
   */
  async update(product: ProductEntity): Promise<ProductEntity> {
    const { id } = product;
    if (id === null) {
      throw new DataValidationError('Update called with empty ID field');
    }

    await this.dataSource.transaction(async manager => {
      await manager.update(ProductEntity, id, {
        name: product.name,
        description: product.description,
        price: product.price,
        available: product.available,
        category: product.category,
      });
    });

    this.logger.log(`Product updated: ${product.toString()}`);

    return product;
  }

  /**
   * Remove the product's row. A row that is already gone is not an error.
   */
  async delete(product: ProductEntity): Promise<void> {
    const { id } = product;
    if (id === null) {
      throw new DataValidationError('Delete called with empty ID field');
    }

    await this.dataSource.transaction(async manager => {
      await manager.delete(ProductEntity, id);
    });

    this.logger.log(`Product deleted: ${product.toString()}`);
  }

  async findById(id: number): Promise<ProductEntity | null> {
    return this.productRepository.findOneBy({ id });
  }

  async findAll(): Promise<ProductEntity[]> {
    return this.productRepository.find({
      order: {
        id: 'ASC',
      },
    });
  }

  findByName(name: string): ResultSet<ProductEntity> {
    // MySQL's default collation compares case-insensitively
    return this.findWhere({ name }, product => product.name === name);
  }

  findByCategory(category: Category): ResultSet<ProductEntity> {
    return this.findWhere({ category });
  }

  findByAvailability(available: boolean = true): ResultSet<ProductEntity> {
    return this.findWhere({ available });
  }

  /**
   * Find products by exact price. Text input may carry surrounding
   * whitespace and one layer of quotes, e.g. ` "99.99" `.
   *
   * @throws DataValidationError when the price cannot be parsed or does not
   * fit the price column
   */
  findByPrice(price: DecimalInput): ResultSet<ProductEntity> {
    const value = assertDecimalFits(
      toDecimal(typeof price === 'string' ? normalizeDecimalToken(price) : price),
      PRICE_PRECISION,
      PRICE_SCALE,
    );
    return this.findWhere({ price: Equal(value) });
  }

  private findWhere(
    where: FindOptionsWhere<ProductEntity>,
    matches: (product: ProductEntity) => boolean = () => true,
  ): ResultSet<ProductEntity> {
    return new ResultSet(async () => {
      const products = await this.productRepository.find({
        where,
        order: {
          id: 'ASC',
        },
      });
      return products.filter(matches);
    });
  }
}
