import { afterEach, describe, expect, it, vi } from 'vitest';
import { cleanupUnusedImagesOnce, startUnusedImagesSweepScheduler } from '../src/jobs/cleanupUnusedImages.js';
import type { CleanupService } from '../src/services/images/imageCleanup.js';
import type { LockPool } from '../src/utils/pgAdvisoryLock.js';

function fakePool(locked: boolean) {
  const queries: string[] = [];
  const release = vi.fn();
  const client = {
    query: vi.fn(async (text: string) => {
      queries.push(text);
      return { rows: [{ locked }] };
    }),
    release,
  };
  const pool = { connect: async () => client } as unknown as LockPool;
  return { pool, queries, release };
}

function fakeCleanup(paths: string[] = ['uploads/images/gallery/2024-01/a.png']) {
  const sweep = vi.fn(async () => paths);
  const cleanup: CleanupService = { sweep, destroy: vi.fn(async () => undefined) };
  return { cleanup, sweep };
}

afterEach(() => {
  vi.useRealTimers();
});

describe('jobs: unused image sweep', () => {
  it('sweeps under the advisory lock and releases it', async () => {
    const { pool, queries, release } = fakePool(true);
    const { cleanup, sweep } = fakeCleanup();

    const res = await cleanupUnusedImagesOnce({ cleanup, pool }, { deleteFiles: true, checkRevisions: false });

    expect(res).toEqual({ skipped: false, paths: ['uploads/images/gallery/2024-01/a.png'] });
    expect(sweep).toHaveBeenCalledWith({ dryRun: false, checkRevisions: false });
    expect(queries).toEqual(['SELECT pg_try_advisory_lock($1) AS locked', 'SELECT pg_advisory_unlock($1)']);
    expect(release).toHaveBeenCalledTimes(1);
  });

  it('skips when another instance holds the lock', async () => {
    const { pool, queries, release } = fakePool(false);
    const { cleanup, sweep } = fakeCleanup();

    const res = await cleanupUnusedImagesOnce({ cleanup, pool }, { deleteFiles: true, checkRevisions: true });

    expect(res).toEqual({ skipped: true, paths: [] });
    expect(sweep).not.toHaveBeenCalled();
    expect(queries).toHaveLength(1);
    expect(release).toHaveBeenCalledTimes(1);
  });

  it('releases the lock when the sweep fails', async () => {
    const { pool, queries, release } = fakePool(true);
    const cleanup: CleanupService = {
      sweep: vi.fn(async () => {
        throw new Error('db gone');
      }),
      destroy: vi.fn(async () => undefined),
    };

    await expect(cleanupUnusedImagesOnce({ cleanup, pool }, { deleteFiles: false, checkRevisions: true })).rejects.toThrow(
      'db gone'
    );
    expect(queries[1]).toBe('SELECT pg_advisory_unlock($1)');
    expect(release).toHaveBeenCalledTimes(1);
  });

  it('runs on schedule in dry-run mode unless deletion is enabled', async () => {
    vi.useFakeTimers();
    const { pool } = fakePool(true);
    const { cleanup, sweep } = fakeCleanup();

    const handle = startUnusedImagesSweepScheduler(
      { cleanup, pool },
      { intervalMs: 60_000, initialDelayMs: 1000, deleteFiles: false, checkRevisions: true }
    );
    await vi.advanceTimersByTimeAsync(1000);
    expect(sweep).toHaveBeenCalledTimes(1);
    expect(sweep).toHaveBeenCalledWith({ dryRun: true, checkRevisions: true });

    await vi.advanceTimersByTimeAsync(60_000);
    expect(sweep).toHaveBeenCalledTimes(2);

    handle.stop();
    await vi.advanceTimersByTimeAsync(120_000);
    expect(sweep).toHaveBeenCalledTimes(2);
  });
});
