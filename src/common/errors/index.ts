export * from './data-validation.error';
