// Main export file - re-exports all public APIs

// Core layer exports
export * from './core/index.js';

// Configuration exports
export * from './config/index.js';

// Store exports
export {
  PostgreSQLGenerationIndexStore,
  PostgreSQLLoginEventStore,
  applySchema,
  createPostgreSQLPool,
  verifyConnection,
  type Queryable,
} from './stores/postgresql-stores.js';

// Utility exports
export * from './utils/errors.js';
export { withTimeout } from './utils/timeout.js';
