import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  NotFoundException,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { ProductEntity, SerializedProduct } from '../database/entities';
import { ProductQueryDto } from './dto';
import { ProductService } from './product.service';

@Controller('products')
export class ProductController {
  private readonly logger = new Logger(ProductController.name);

  constructor(private readonly productService: ProductService) {}

  /**
   * GET /api/products
   * List products, optionally filtered by name, category, availability or price
   */
  @Get()
  async findAll(@Query() query: ProductQueryDto): Promise<SerializedProduct[]> {
    const products = await this.search(query);
    return products.map(product => product.serialize());
  }

  /**
   * GET /api/products/:id
   */
  @Get(':id')
  async findOne(@Param('id', ParseIntPipe) id: number): Promise<SerializedProduct> {
    const product = await this.getProduct(id);
    return product.serialize();
  }

  /**
   * POST /api/products
   * The store assigns the id; one sent in the body is ignored
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(@Body() body: unknown): Promise<SerializedProduct> {
    const product = new ProductEntity().deserialize(body);
    this.logger.log(`Creating product: ${product.name}`);

    await this.productService.create(product);

    return product.serialize();
  }

  /**
   * PUT /api/products/:id
   */
  @Put(':id')
  async update(@Param('id', ParseIntPipe) id: number, @Body() body: unknown): Promise<SerializedProduct> {
    const product = await this.getProduct(id);
    product.deserialize(body);
    product.id = id;

    await this.productService.update(product);

    return product.serialize();
  }

  /**
   * DELETE /api/products/:id
   */
  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    const product = await this.getProduct(id);
    await this.productService.delete(product);
  }

  private async getProduct(id: number): Promise<ProductEntity> {
    const product = await this.productService.findById(id);

    if (!product) {
      throw new NotFoundException(`Product with ID ${id} not found`);
    }

    return product;
  }

  private async search(query: ProductQueryDto): Promise<ProductEntity[]> {
    if (query.name !== undefined) {
      return this.productService.findByName(query.name).toArray();
    }
    if (query.category !== undefined) {
      return this.productService.findByCategory(query.category).toArray();
    }
    if (query.available !== undefined) {
      return this.productService.findByAvailability(query.available).toArray();
    }
    if (query.price !== undefined) {
      return this.productService.findByPrice(query.price).toArray();
    }
    return this.productService.findAll();
  }
}
