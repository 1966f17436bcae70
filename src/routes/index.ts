export * from './health.routes';
export * from './product.routes';
