import { Transform } from 'class-transformer';
import { IsBoolean, IsEnum, IsOptional, IsString } from 'class-validator';
import { Category } from '../../database/entities';

const TRUTHY = ['true', 'yes', '1'];

/**
 * Filters for GET /api/products. The first one present wins,
 * in declaration order.
 */
export class ProductQueryDto {
  @IsString()
  @IsOptional()
  name?: string;

  @IsEnum(Category)
  @IsOptional()
  category?: Category;

  @Transform(({ value }) => TRUTHY.includes(String(value).toLowerCase()))
  @IsBoolean()
  @IsOptional()
  available?: boolean;

  @IsString()
  @IsOptional()
  price?: string;
}
