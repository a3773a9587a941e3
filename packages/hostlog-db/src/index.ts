export { createDb, databaseUrlFromEnv, DatabaseUrlSchema, type Db } from './db.js';
export { migrate, loadMigrations, getAppliedMigrations, applyMigration, type Migration } from './migrate.js';
export {
  IntegrityError,
  integrityViolation,
  UNIQUE_VIOLATION,
  FOREIGN_KEY_VIOLATION,
  type IntegrityViolation
} from './errors.js';
export * from './types.js';
export type * from './store.js';
export { createPgStore } from './store.pg.js';
export { createMemoryStore, type MemoryStore, type MemoryTables } from './store.memory.js';
