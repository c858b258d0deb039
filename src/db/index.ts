import { drizzle } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import * as schema from './schema/index.js';

const { Pool } = pg;

/**
 * Opens a pg pool for the given connection URI and wraps it in a Drizzle
 * instance with the catalog schema. The caller owns the pool and must end it.
 */
export function createDatabase(connectionString: string) {
  // A single connection is enough: the importer issues one statement at a time.
  const pool = new Pool({ connectionString, max: 1 });
  const db = drizzle(pool, { schema });
  return { pool, db };
}

export type Database = ReturnType<typeof createDatabase>['db'];
export type DatabasePool = ReturnType<typeof createDatabase>['pool'];
