import type pg from 'pg';
import { errorMessage, logger } from './logger.js';

export type LockPool = Pick<pg.Pool, 'connect'>;

/**
 * Runs `fn` while holding a session-level advisory lock. Advisory locks belong to a
 * connection, so lock, work and unlock all happen on one checked-out client.
 * Resolves to `{ acquired: false }` without running `fn` when another session holds the lock.
 */
export async function withAdvisoryLock<T>(
  pool: LockPool,
  lockId: bigint,
  fn: () => Promise<T>
): Promise<{ acquired: false } | { acquired: true; result: T }> {
  const client = await pool.connect();
  try {
    const locked = await client.query<{ locked: boolean }>('SELECT pg_try_advisory_lock($1) AS locked', [
      lockId.toString(),
    ]);
    if (!locked.rows[0]?.locked) return { acquired: false };

    try {
      return { acquired: true, result: await fn() };
    } finally {
      try {
        await client.query('SELECT pg_advisory_unlock($1)', [lockId.toString()]);
      } catch (e) {
        // The lock dies with the session anyway; the released client is discarded below.
        logger.warn('pg.advisory_unlock_failed', { lockId: lockId.toString(), errorMessage: errorMessage(e) });
      }
    }
  } finally {
    client.release();
  }
}
