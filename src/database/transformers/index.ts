export * from './decimal.transformer';
