export * from './db/queryable';
export { applySchema, readSchemaFiles, SCHEMA_DIR, type SchemaFile } from './db/apply-schema';
export {
  connectDatabase,
  disconnectDatabase,
  fromPool,
  getDatabase,
  isDatabaseConnected,
  withTransaction,
} from './config/database';
export { config, loadConfig, type AppConfig, type DatabaseConfig } from './config/env';
export { validateEnv } from './config/env-validator';
export * from './lib/db-errors';
export * from './services/contracts';
export * from './services/client-names';
export { createLogger, logger, type Logger, type LogLevel } from './utils/logger';
