import { Pool } from 'pg';
import { env } from '../config/env';

let pool: Pool | null = null;

export function getDb() {
  if (!pool) {
    pool = new Pool({
      connectionString: env.databaseUrl,
      // Managed providers (e.g. Neon) require SSL
      ssl: env.databaseSsl ? { rejectUnauthorized: false } : undefined,
      // Fail fast on unreachable networks
      connectionTimeoutMillis: env.dbConnectTimeoutMs,
    });
    pool.on('error', (err) => {
      console.error('[db] idle client error', err);
    });
  }
  return pool;
}

export async function ensureDb() {
  const p = getDb();
  try {
    await p.query('SELECT 1');
  } catch (err) {
    console.error('[db] connection test failed', err);
    throw err;
  }
  return p;
}

export async function closeDb() {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

export interface SqlResult {
  rows: unknown[];
  rowCount: number | null;
}

export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
}

export interface SqlConnection extends SqlClient {
  release(): void;
}

/** The slice of a pg Pool the repositories need. */
export interface SqlPool extends SqlClient {
  connect(): Promise<SqlConnection>;
}

export function toSqlPool(p: Pool): SqlPool {
  return {
    query: (text, values) => p.query(text, values),
    connect: async () => {
      const client = await p.connect();
      return {
        query: (text, values) => client.query(text, values),
        release: () => client.release(),
      };
    },
  };
}

export function isUniqueViolation(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === '23505';
}
