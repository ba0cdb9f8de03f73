/**
 * Database Connection Pool
 *
 * Manages PostgreSQL connections using the `postgres` driver
 * with Drizzle ORM for type-safe queries.
 *
 * The pool is created by the engine factory from parsed config and passed
 * to the vector index; nothing connects at import time.
 */

import postgres from 'postgres';
import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import * as schema from './schema';

export type Sql = postgres.Sql;
export type Db = PostgresJsDatabase<typeof schema>;

export interface DatabaseOptions {
  url: string;
  poolSize: number;
  ssl: 'require' | false;
}

export interface DatabaseHandle {
  /** Raw driver, used for pgvector operators Drizzle does not model */
  sql: Sql;
  db: Db;
  close(): Promise<void>;
}

/**
 * Create the connection pool and Drizzle instance
 *
 * postgres.js connects lazily, so this never touches the network.
 */
export function createDatabase(options: DatabaseOptions): DatabaseHandle {
  const sql = postgres(options.url, {
    max: options.poolSize,
    idle_timeout: 20, // Close idle connections after 20 seconds
    connect_timeout: 10,
    ssl: options.ssl,
    onnotice: () => {}, // IF NOT EXISTS notices during ensureSchema
  });

  const db = drizzle(sql, { schema });

  return {
    sql,
    db,
    // Ends every pooled connection
    close: () => sql.end(),
  };
}
