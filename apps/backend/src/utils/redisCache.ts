import type { CacheGateway } from '../services/images/types.js';
import { errorMessage, logger } from './logger.js';
import { getRedisClient, type RedisClient } from './redisClient.js';

export function nsKey(namespace: string, key: string): string {
  return `imageshelf:${namespace}:${key}`;
}

/**
 * Existence cache over Redis. It only ever short-circuits work, so a Redis outage
 * degrades to a miss instead of failing the request.
 */
export function createRedisCache(opts: {
  url: string | null | undefined;
  namespace?: string;
  connect?: (url: string | null | undefined) => Promise<RedisClient | null>;
}): CacheGateway {
  const namespace = opts.namespace ?? 'images';
  const connect = opts.connect ?? getRedisClient;

  return {
    async has(key) {
      const client = await connect(opts.url);
      if (!client) return false;
      try {
        return (await client.exists(nsKey(namespace, key))) > 0;
      } catch (e) {
        logger.warn('redis.cache.read_failed', { key, errorMessage: errorMessage(e) });
        return false;
      }
    },

    async get(key) {
      const client = await connect(opts.url);
      if (!client) return null;
      try {
        return await client.get(nsKey(namespace, key));
      } catch (e) {
        logger.warn('redis.cache.read_failed', { key, errorMessage: errorMessage(e) });
        return null;
      }
    },

    async put(key, value, ttlSeconds) {
      const client = await connect(opts.url);
      if (!client) return;
      try {
        await client.setEx(nsKey(namespace, key), Math.max(1, Math.floor(ttlSeconds)), value);
      } catch (e) {
        logger.warn('redis.cache.write_failed', { key, errorMessage: errorMessage(e) });
      }
    },
  };
}
