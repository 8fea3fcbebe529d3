/**
 * Database client and transaction helper.
 * Tables are created by drizzle-kit; nothing here touches the schema.
 */

import { drizzle, type NodePgQueryResultHKT } from "drizzle-orm/node-postgres";
import type { PgDatabase } from "drizzle-orm/pg-core";
import pg from "pg";
import { getConfig } from "../core/config/configService.js";
import * as schema from "./schema.js";

const { Pool } = pg;

let pool: pg.Pool | null = null;

export function getPool(): pg.Pool {
  if (!pool) {
    pool = new Pool({ connectionString: getConfig().databaseUrl, max: 10 });
  }
  return pool;
}

/** Either the pooled database or an open transaction. */
export type DrizzleDb = PgDatabase<NodePgQueryResultHKT, typeof schema>;

let db: DrizzleDb | null = null;

export function getDb(): DrizzleDb {
  if (!db) db = drizzle(getPool(), { schema });
  return db;
}

/** Run a callback inside a transaction on the given (or default) database. */
export async function withTransaction<T>(
  fn: (tx: DrizzleDb) => Promise<T>,
  database: DrizzleDb = getDb()
): Promise<T> {
  return database.transaction(async (tx) => fn(tx));
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  const closing = pool;
  pool = null;
  db = null;
  await closing.end();
}
