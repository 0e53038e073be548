export { initDatabase, getDatabase, saveDatabase, closeDatabase, withTransaction } from './database';
export { getSchemaVersion } from './migrations';
export * from './types';
export * from './repositories';
