export { db, withTransaction, rowsOf, closeDb, sql, schema } from './client';
export type { Database, Transaction } from './client';
export * from './schema';
