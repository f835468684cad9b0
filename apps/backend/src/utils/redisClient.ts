import { createClient } from 'redis';
import { errorMessage, logger } from './logger.js';

export type RedisClient = ReturnType<typeof createClient>;

const clients = new Map<string, Promise<RedisClient | null>>();

/** One shared connection per URL. Resolves to null when the server cannot be reached. */
export async function getRedisClient(url: string | null | undefined): Promise<RedisClient | null> {
  const target = String(url || '').trim();
  if (!target) return null;

  let clientPromise = clients.get(target);
  if (!clientPromise) {
    const client = createClient({ url: target });
    client.on('error', (err: unknown) => {
      logger.warn('redis.error', { errorMessage: errorMessage(err) });
    });
    clientPromise = client
      .connect()
      .then(() => {
        logger.info('redis.connected', {});
        return client;
      })
      .catch((e: unknown) => {
        clients.delete(target);
        logger.warn('redis.connect_failed', { errorMessage: errorMessage(e) });
        return null;
      });
    clients.set(target, clientPromise);
  }

  return clientPromise;
}

export async function closeRedisClients(): Promise<void> {
  const pending = [...clients.values()];
  clients.clear();
  for (const p of pending) {
    const client = await p;
    if (client?.isOpen) await client.quit();
  }
}
