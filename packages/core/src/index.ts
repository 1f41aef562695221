// Errors
export * from './errors/index.js';

// Observability
export * from './observability/index.js';

// Configuration
export {
  queryExecutorOptionsSchema,
  resolveExecutorConfig,
  resolveStoreConfig,
  storeOptionsSchema,
  type QueryExecutorConfig,
  type QueryExecutorOptions,
  type StoreConfig,
  type StoreOptions,
} from './config/config.js';
