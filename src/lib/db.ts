import { Pool, type QueryResultRow } from 'pg';
import { config } from './config.js';
import { logger } from './logger.js';

export const pool = new Pool({ connectionString: config.databaseUrl });

export async function query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<{ rows: T[] }> {
  const client = await pool.connect();
  try {
    return await client.query<T>(text, params);
  } finally {
    client.release();
  }
}

export async function ensureConnection(retries = 10, delayMs = 1000) {
  for (let i = 0; i < retries; i++) {
    try {
      await query('select 1');
      return;
    } catch (err) {
      const wait = Math.min(delayMs * (i + 1), 5000);
      logger.warn({ attempt: i + 1, wait, err: String(err) }, 'Postgres not ready, retrying');
      await new Promise(r => setTimeout(r, wait));
    }
  }
  // final try to throw
  await query('select 1');
}
