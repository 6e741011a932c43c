export { closeDatabase, createDatabase, DEFAULT_BUSY_TIMEOUT_MS, type CreateDatabaseOptions, type StepwiseDatabase } from './connection.js';
export { migrateDatabase, isAlreadyExistsError } from './migrate.js';
export * from './errors.js';
export * from './storeConfig.js';
export * from './retry.js';
export * from './pool.js';
export * from './checkpointStore.js';
export * from './schema.js';
