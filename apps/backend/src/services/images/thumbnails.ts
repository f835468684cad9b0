import path from 'node:path';
import { logger } from '../../utils/logger.js';
import { imageMetrics } from '../../utils/metrics.js';
import { thumbnailPathFor } from './imagePaths.js';
import type { UrlResolver } from './imageUrls.js';
import type { StorageResolver } from '../../storage/index.js';
import type { CacheGateway, Image, ImageCodec } from './types.js';

export const THUMBNAIL_CACHE_TTL_SECONDS = 60 * 60 * 72;

const ANIMATED_EXTENSIONS = new Set(['gif']);

export function isAnimated(imagePath: string): boolean {
  return ANIMATED_EXTENSIONS.has(path.posix.extname(imagePath).slice(1).toLowerCase());
}

export function thumbnailCacheKey(image: Pick<Image, 'id'>, thumbPath: string): string {
  return `images-${image.id}-${thumbPath}`;
}

/**
 * Resize with the space-saving rule: a keep-ratio resize that comes out larger than
 * its input is thrown away and the input is used as is.
 */
export async function resizeImage(
  codec: ImageCodec,
  data: Buffer,
  width: number | null,
  height: number | null,
  keepRatio: boolean
): Promise<Buffer> {
  const resized = await codec.resize(data, width, height, keepRatio);
  if (keepRatio && resized.length > data.length) {
    return data;
  }
  return resized;
}

export type ThumbnailService = {
  getThumbnail(image: Image, width?: number, height?: number, keepRatio?: boolean): Promise<string>;
};

export function createThumbnailService(deps: {
  storage: StorageResolver;
  cache: CacheGateway;
  codec: ImageCodec;
  urls: UrlResolver;
}): ThumbnailService {
  const { storage: storageResolver, cache, codec, urls } = deps;

  return {
    async getThumbnail(image, width = 220, height = 220, keepRatio = false) {
      // Resizing would drop the animation frames.
      if (keepRatio && isAnimated(image.path)) {
        imageMetrics.thumbnailRequests.inc({ result: 'passthrough' });
        return urls.toPublicUrl(image.path);
      }

      const thumbPath = thumbnailPathFor(image.path, width, height, keepRatio);
      const cacheKey = thumbnailCacheKey(image, thumbPath);

      if (await cache.has(cacheKey)) {
        imageMetrics.thumbnailRequests.inc({ result: 'cache_hit' });
        return urls.toPublicUrl(thumbPath);
      }

      const storage = storageResolver.forType(image.type);
      if (await storage.exists(thumbPath)) {
        await cache.put(cacheKey, thumbPath, THUMBNAIL_CACHE_TTL_SECONDS);
        imageMetrics.thumbnailRequests.inc({ result: 'storage_hit' });
        return urls.toPublicUrl(thumbPath);
      }

      const stopTimer = imageMetrics.thumbnailGenerationSeconds.startTimer();
      const source = await storage.get(image.path);
      const thumbData = await resizeImage(codec, source, width, height, keepRatio);

      // Concurrent requests for the same variant may both get here; the last whole-object write wins.
      await storage.put(thumbPath, thumbData);
      await storage.setPublic(thumbPath);
      await cache.put(cacheKey, thumbPath, THUMBNAIL_CACHE_TTL_SECONDS);
      stopTimer();

      imageMetrics.thumbnailRequests.inc({ result: 'generated' });
      logger.debug('images.thumbnail.generated', {
        imageId: image.id,
        path: thumbPath,
        bytes: thumbData.length,
        sourceBytes: source.length,
      });

      return urls.toPublicUrl(thumbPath);
    },
  };
}
