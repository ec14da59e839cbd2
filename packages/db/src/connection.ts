import pg from 'pg';
import type { Pool } from 'pg';

export interface PostgresEnv {
  DATABASE_URL?: string;
  POSTGRES_USER?: string;
  POSTGRES_PASSWORD?: string;
  POSTGRES_DB?: string;
  POSTGRES_HOST?: string;
  POSTGRES_PORT?: string;
}

/**
 * Connection string from DATABASE_URL, or assembled from the POSTGRES_* parts.
 * Host defaults to localhost and port to 5432.
 */
export function getDatabaseUrl(env: PostgresEnv = process.env): string {
  if (env.DATABASE_URL) return env.DATABASE_URL;

  const user = encodeURIComponent(env.POSTGRES_USER || '');
  const password = env.POSTGRES_PASSWORD ? `:${encodeURIComponent(env.POSTGRES_PASSWORD)}` : '';
  const credentials = user ? `${user}${password}@` : '';
  const host = env.POSTGRES_HOST || 'localhost';
  const port = env.POSTGRES_PORT || '5432';
  const database = encodeURIComponent(env.POSTGRES_DB || '');

  return `postgres://${credentials}${host}:${port}/${database}`;
}

export function createPool(connectionString: string): Pool {
  return new pg.Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30_000,
  });
}
