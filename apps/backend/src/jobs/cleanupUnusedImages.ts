import type { CleanupService } from '../services/images/imageCleanup.js';
import { errorMessage, logger } from '../utils/logger.js';
import { withAdvisoryLock, type LockPool } from '../utils/pgAdvisoryLock.js';

// Only one instance sweeps a shared database at a time.
const SWEEP_LOCK_ID = 731905n;

export type UnusedImagesSweepOptions = {
  intervalMs: number;
  initialDelayMs?: number;
  /** When false the sweep only reports what it would delete. */
  deleteFiles: boolean;
  checkRevisions: boolean;
};

export async function cleanupUnusedImagesOnce(
  deps: { cleanup: CleanupService; pool: LockPool },
  opts: Pick<UnusedImagesSweepOptions, 'deleteFiles' | 'checkRevisions'>
): Promise<{ skipped: boolean; paths: string[] }> {
  const outcome = await withAdvisoryLock(deps.pool, SWEEP_LOCK_ID, () =>
    deps.cleanup.sweep({ dryRun: !opts.deleteFiles, checkRevisions: opts.checkRevisions })
  );
  if (!outcome.acquired) {
    logger.info('images.sweep.skipped_locked', {});
    return { skipped: true, paths: [] };
  }
  return { skipped: false, paths: outcome.result };
}

export function startUnusedImagesSweepScheduler(
  deps: { cleanup: CleanupService; pool: LockPool },
  opts: UnusedImagesSweepOptions
): { stop: () => void } {
  let running = false;

  const runOnce = async () => {
    if (running) return;
    running = true;
    const startedAt = Date.now();
    try {
      const res = await cleanupUnusedImagesOnce(deps, opts);
      if (!res.skipped) {
        logger.info('images.sweep.run_completed', {
          dryRun: !opts.deleteFiles,
          count: res.paths.length,
          durationMs: Date.now() - startedAt,
        });
      }
    } catch (e) {
      logger.error('images.sweep.failed', { durationMs: Date.now() - startedAt, errorMessage: errorMessage(e) });
    } finally {
      running = false;
    }
  };

  const initial = setTimeout(() => void runOnce(), Math.max(0, opts.initialDelayMs ?? 5 * 60 * 1000));
  const interval = setInterval(() => void runOnce(), Math.max(60_000, opts.intervalMs));
  initial.unref();
  interval.unref();

  return {
    stop: () => {
      clearTimeout(initial);
      clearInterval(interval);
    },
  };
}
