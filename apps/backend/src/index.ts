import './config/loadEnv.js';
import { createServer } from 'node:http';
import { createApp } from './app.js';
import { validateEnv } from './config/env.js';
import { resolveImageConfig } from './config/imageConfig.js';
import { startUnusedImagesSweepScheduler } from './jobs/cleanupUnusedImages.js';
import { createPool } from './lib/db.js';
import { createRepositoryContext } from './repositories/index.js';
import { createImageServices } from './services/images/index.js';
import { createStorageGateway, createStorageResolver } from './storage/index.js';
import { errorMessage, logger } from './utils/logger.js';
import { createRedisCache } from './utils/redisCache.js';
import { closeRedisClients } from './utils/redisClient.js';

const env = validateEnv();
const config = resolveImageConfig(env);

if (!env.DATABASE_URL) {
  logger.error('startup.database_url_missing', {});
  process.exit(1);
}

const pool = createPool(env.DATABASE_URL);
const repos = createRepositoryContext(pool);
const storage = createStorageResolver({
  driver: config.driver,
  create: (driver) => createStorageGateway(driver, config),
});
const cache = createRedisCache({ url: env.REDIS_URL });
if (!env.REDIS_URL) {
  logger.warn('startup.redis_disabled', { reason: 'REDIS_URL not set; thumbnail existence checks go to storage' });
}

const services = createImageServices({ config, storage, cache, images: repos.images, content: repos.content });

const app = createApp({
  services,
  images: repos.images,
  maxFileSize: env.MAX_FILE_SIZE,
  maintenanceToken: env.MAINTENANCE_TOKEN,
  publicRoot: config.driver === 's3' ? null : config.localRoots.public,
});

const sweep = env.IMAGE_SWEEP_INTERVAL_MS
  ? startUnusedImagesSweepScheduler(
      { cleanup: services.cleanup, pool },
      {
        intervalMs: env.IMAGE_SWEEP_INTERVAL_MS,
        deleteFiles: env.IMAGE_SWEEP_DELETE,
        checkRevisions: env.IMAGE_SWEEP_CHECK_REVISIONS,
      }
    )
  : null;

const httpServer = createServer(app);
httpServer.listen(env.PORT, () => {
  logger.info('startup.listening', { port: env.PORT, storage: config.driver, secureUploads: config.secureUploads });
});

let shuttingDown = false;
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info('shutdown.start', { signal });
  sweep?.stop();
  await new Promise<void>((resolve) => httpServer.close(() => resolve()));
  await closeRedisClients();
  await pool.end();
  logger.info('shutdown.complete', { signal });
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((e: unknown) => {
        logger.error('shutdown.failed', { signal, errorMessage: errorMessage(e) });
        process.exit(1);
      });
  });
}
