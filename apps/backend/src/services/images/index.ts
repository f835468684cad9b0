import type { ImageServiceConfig } from '../../config/imageConfig.js';
import type { StorageResolver } from '../../storage/index.js';
import { createCleanupService, type CleanupService } from './imageCleanup.js';
import { sharpCodec } from './imageCodec.js';
import { createPathNamer } from './imagePaths.js';
import { createImageUploadService, type ImageUploadService } from './imageUploads.js';
import { createUrlResolver, type UrlResolver } from './imageUrls.js';
import { createHttpFetcher } from './httpFetcher.js';
import { createThumbnailService, type ThumbnailService } from './thumbnails.js';
import type { CacheGateway, ContentReferenceSource, ImageCodec, ImageRepository, RemoteFetcher } from './types.js';

export type ImageServices = {
  urls: UrlResolver;
  thumbnails: ThumbnailService;
  uploads: ImageUploadService;
  cleanup: CleanupService;
};

export type ImageServiceDeps = {
  config: ImageServiceConfig;
  storage: StorageResolver;
  cache: CacheGateway;
  images: ImageRepository;
  content: ContentReferenceSource;
  codec?: ImageCodec;
  fetcher?: RemoteFetcher;
  now?: () => Date;
};

export function createImageServices(deps: ImageServiceDeps): ImageServices {
  const { config, storage, cache, images, content } = deps;
  const codec = deps.codec ?? sharpCodec;
  const fetcher = deps.fetcher ?? createHttpFetcher({ timeoutMs: config.avatarTimeoutMs });
  const urls = createUrlResolver(config);
  const namer = createPathNamer({ secureUploads: config.secureUploads, now: deps.now });

  return {
    urls,
    thumbnails: createThumbnailService({ storage, cache, codec, urls }),
    uploads: createImageUploadService({
      storage,
      images,
      codec,
      fetcher,
      namer,
      urls,
      avatar: { avatarUrl: config.avatarUrl, externalServicesDisabled: config.externalServicesDisabled },
    }),
    cleanup: createCleanupService({ storage, images, content }),
  };
}

export * from './errors.js';
export type * from './types.js';
