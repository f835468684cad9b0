import pg from 'pg';
import { errorMessage, logger } from '../utils/logger.js';

export type DbClient = Pick<pg.Pool, 'query'>;

function getSlowQueryThresholdMs(): number {
  const raw = parseInt(String(process.env.DB_SLOW_MS || ''), 10);
  if (Number.isFinite(raw) && raw > 0) return raw;
  return process.env.NODE_ENV === 'production' ? 200 : 100;
}

export function createPool(connectionString: string): pg.Pool {
  const pool = new pg.Pool({ connectionString, max: 10 });
  pool.on('error', (err) => {
    logger.error('db.pool_error', { errorMessage: errorMessage(err) });
  });
  return pool;
}

/** Runs a query and logs it when it is slow (statement text only, never the parameters). */
export async function timedQuery<R extends pg.QueryResultRow>(
  db: DbClient,
  text: string,
  values: unknown[] = []
): Promise<pg.QueryResult<R>> {
  const start = process.hrtime.bigint();
  try {
    return await db.query<R>(text, values);
  } finally {
    const ms = Number(process.hrtime.bigint() - start) / 1_000_000;
    if (ms >= getSlowQueryThresholdMs()) {
      logger.warn('db.slow_query', { durationMs: Math.round(ms), statement: text.replace(/\s+/g, ' ').trim() });
    }
  }
}
