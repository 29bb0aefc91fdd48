import { drizzle } from 'drizzle-orm/postgres-js';
import { sql } from 'drizzle-orm';
import postgres from 'postgres';
import * as schema from './schema';

type DrizzleDB = ReturnType<typeof drizzle<typeof schema>>;

let instance: DrizzleDB | null = null;
let client: postgres.Sql | null = null;

function getDb(): DrizzleDB {
  if (!instance) {
    const connectionString = process.env.DATABASE_URL;
    if (!connectionString) {
      throw new Error('DATABASE_URL environment variable is required');
    }
    client = postgres(connectionString, {
      max: parseInt(process.env.DB_POOL_MAX || '5', 10),
      idle_timeout: 20,
      max_lifetime: 300,
      connect_timeout: 10,
      onnotice: (notice) => {
        console.warn(`[pg-notice] ${notice.severity}: ${notice.message}`);
      },
    });
    instance = drizzle(client, { schema });
  }
  return instance;
}

// Lazy: importing the package must not open a connection.
export const db: DrizzleDB = new Proxy({} as DrizzleDB, {
  get(_target, prop, receiver) {
    const target = getDb();
    const value = Reflect.get(target, prop, receiver);
    if (typeof value === 'function') {
      return value.bind(target);
    }
    return value;
  },
});

export type Database = DrizzleDB;

/** Handle passed to callbacks of `db.transaction`. */
export type Transaction = Parameters<Parameters<DrizzleDB['transaction']>[0]>[0];

/** Run read queries against one consistent snapshot. */
export async function withTransaction<T>(callback: (tx: Transaction) => Promise<T>): Promise<T> {
  return db.transaction(async (tx) => callback(tx));
}

/** Rows of a raw `execute` result. */
export function rowsOf(result: unknown): Record<string, unknown>[] {
  return Array.from(result as Iterable<Record<string, unknown>>);
}

export async function closeDb(): Promise<void> {
  if (client) {
    await client.end();
    client = null;
    instance = null;
  }
}

export { sql, schema };
