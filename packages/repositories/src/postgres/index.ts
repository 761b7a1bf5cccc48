export { createDatabase, type Database, type DatabaseConfig, type DbExecutor } from './db.js';
export * as schema from './schema/index.js';
export * from './repositories/index.js';
