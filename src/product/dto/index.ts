export * from './product-query.dto';
