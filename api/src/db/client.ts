/**
 * Database Connection Pool
 *
 * Opens a PostgreSQL pool with the `postgres` driver plus a Drizzle
 * instance over the same pool. The returned handle is passed explicitly
 * to routes and services; nothing in the app imports a shared pool.
 */

import postgres from 'postgres';
import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import * as schema from './schema';
import type { AppConfig } from '@/utils/config';

export type Sql = postgres.Sql;

// postgres.TransactionSql is an Omit<Sql, ...>, which drops the call signatures
// the transaction object still has at runtime.
export type TransactionSql = postgres.TransactionSql<Record<string, unknown>> & {
  // Tagged template query: tx`SELECT ...`
  <T extends readonly (object | undefined)[] = postgres.Row[]>(
    template: TemplateStringsArray,
    ...parameters: readonly postgres.ParameterOrFragment<never>[]
  ): postgres.PendingQuery<T>;
};

export type Db = PostgresJsDatabase<typeof schema>;

export interface Database {
  sql: Sql;
  db: Db;
  close(): Promise<void>;
}

export function createDatabase(
  config: Pick<AppConfig, 'databaseUrl' | 'dbPoolSize' | 'nodeEnv'>
): Database {
  const sql = postgres(config.databaseUrl, {
    max: config.dbPoolSize,
    idle_timeout: 20, // Close idle connections after 20 seconds
    connect_timeout: 10,
    ssl: config.nodeEnv === 'production' ? 'require' : false,
  });

  return {
    sql,
    db: drizzle(sql, { schema }),
    close: () => sql.end(),
  };
}

/**
 * Run `callback` inside one transaction
 *
 * postgres.js commits when the callback resolves and rolls back when it
 * throws, so every exit path except a clean return discards the writes.
 */
export async function withTransaction<T>(
  sql: Sql,
  callback: (tx: TransactionSql) => Promise<T>
): Promise<T> {
  const result = await sql.begin(async (rawTx) => {
    const tx = rawTx as TransactionSql;
    return await callback(tx);
  });

  return result as T;
}
