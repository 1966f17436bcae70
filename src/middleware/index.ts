export * from './error-handler.middleware';
export * from './request-id.middleware';
