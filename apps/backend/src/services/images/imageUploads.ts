import { createHash } from 'node:crypto';
import path from 'node:path';
import { ImageTypeSchema } from '@imageshelf/api-contracts';
import type { StorageResolver } from '../../storage/index.js';
import { errorMessage, logger } from '../../utils/logger.js';
import { imageMetrics } from '../../utils/metrics.js';
import { RemoteFetchError, StorageWriteError, UploadValidationError } from './errors.js';
import type { PathNamer } from './imagePaths.js';
import type { UrlResolver } from './imageUrls.js';
import { resizeImage } from './thumbnails.js';
import type { Actor, AvatarUser, Image, ImageCodec, ImageRepository, ImageType, RemoteFetcher } from './types.js';

export const DEFAULT_AVATAR_TEMPLATE = 'https://www.gravatar.com/avatar/${hash}?s=${size}&d=identicon';

export type SaveOptions = {
  uploadedTo?: number | null;
  actor?: Actor;
};

export type UploadOptions = SaveOptions & {
  resizeWidth?: number | null;
  resizeHeight?: number | null;
  keepRatio?: boolean;
};

export type UploadedImageFile = {
  originalName: string;
  buffer: Buffer;
};

export type ImageUploadService = {
  saveNew(name: string, data: Buffer, type: ImageType, options?: SaveOptions): Promise<Image>;
  saveNewFromUpload(file: UploadedImageFile, type: ImageType, options?: UploadOptions): Promise<Image>;
  saveNewFromBase64Uri(dataUri: string, name: string, type: ImageType, options?: SaveOptions): Promise<Image>;
  saveNewFromUrl(url: string, type: ImageType, name?: string): Promise<Image>;
  saveUserAvatar(user: AvatarUser, size?: number): Promise<Image>;
  avatarFetchEnabled(): boolean;
  getImageData(image: Image): Promise<Buffer>;
  /** `data:image/<ext>;base64,...` for a local image URL, or null when it cannot be read. */
  imageUriToBase64(uri: string): Promise<string | null>;
};

type AvatarSettings = {
  avatarUrl: string | null;
  externalServicesDisabled: boolean;
};

export function avatarTemplate(cfg: AvatarSettings): string | null {
  if (cfg.avatarUrl) return cfg.avatarUrl;
  return cfg.externalServicesDisabled ? null : DEFAULT_AVATAR_TEMPLATE;
}

export function buildAvatarUrl(template: string, email: string, size: number): string {
  const normalized = email.trim().toLowerCase();
  const replacements: Record<string, string> = {
    '${hash}': createHash('md5').update(normalized).digest('hex'),
    '${size}': String(size),
    '${email}': encodeURIComponent(normalized),
  };
  return template.replace(/\$\{(hash|size|email)\}/g, (placeholder) => replacements[placeholder] ?? placeholder);
}

/** Image type from the second segment of `uploads/images/<type>/...`, when it is a known one. */
function typeFromStoragePath(storagePath: string): ImageType | undefined {
  const parsed = ImageTypeSchema.safeParse(storagePath.split('/')[2]);
  return parsed.success ? parsed.data : undefined;
}

export function createImageUploadService(deps: {
  storage: StorageResolver;
  images: ImageRepository;
  codec: ImageCodec;
  fetcher: RemoteFetcher;
  namer: PathNamer;
  urls: UrlResolver;
  avatar: AvatarSettings;
}): ImageUploadService {
  const { storage: storageResolver, images, codec, fetcher, namer, urls } = deps;

  const store = async (
    name: string,
    data: Buffer,
    type: ImageType,
    options: SaveOptions,
    source: string
  ): Promise<Image> => {
    const storage = storageResolver.forType(type);
    const fullPath = await namer.newSourcePath(name, type, (candidate) => storage.exists(candidate));

    try {
      await storage.put(fullPath, data);
      await storage.setPublic(fullPath);
    } catch (error) {
      logger.error('images.write_failed', { path: fullPath, driver: storage.driver, errorMessage: errorMessage(error) });
      throw new StorageWriteError(fullPath, error);
    }

    const actorId = options.actor?.id ?? null;
    const image = await images.create({
      name,
      path: fullPath,
      url: urls.toPublicUrl(fullPath),
      type,
      uploadedTo: options.uploadedTo ?? null,
      createdBy: actorId,
      updatedBy: actorId,
    });

    imageMetrics.imagesSaved.inc({ type, source });
    logger.info('images.saved', { imageId: image.id, path: fullPath, type, bytes: data.length, source });
    return image;
  };

  const saveNewFromUrl = async (url: string, type: ImageType, name?: string): Promise<Image> => {
    const imageName = name || path.posix.basename(url.split(/[?#]/)[0] ?? url) || 'image';
    let data: Buffer;
    try {
      data = await fetcher.fetch(url);
    } catch (error) {
      if (error instanceof RemoteFetchError) {
        throw new RemoteFetchError(url, `Cannot get image from ${url}`, error);
      }
      throw error;
    }
    return store(imageName, data, type, {}, 'url');
  };

  return {
    saveNew(name, data, type, options = {}) {
      return store(name, data, type, options, 'direct');
    },

    async saveNewFromUpload(file, type, options = {}) {
      let data = file.buffer;
      const width = options.resizeWidth ?? null;
      const height = options.resizeHeight ?? null;
      if (width !== null || height !== null) {
        data = await resizeImage(codec, data, width, height, options.keepRatio ?? true);
      }
      return store(file.originalName, data, type, options, 'upload');
    },

    async saveNewFromBase64Uri(dataUri, name, type, options = {}) {
      const parts = dataUri.split(';base64,');
      if (parts.length < 2) {
        throw new UploadValidationError('Invalid base64 image data provided');
      }
      const data = Buffer.from(parts[1] ?? '', 'base64');
      return store(name, data, type, options, 'base64');
    },

    saveNewFromUrl,

    async saveUserAvatar(user, size = 500) {
      const template = avatarTemplate(deps.avatar);
      if (!template) {
        throw new UploadValidationError('Avatar fetching is disabled');
      }
      const avatarUrl = buildAvatarUrl(template, user.email, size);
      const imageName = `${user.name}-avatar.png`.replace(/ /g, '-');
      const image = await saveNewFromUrl(avatarUrl, 'user', imageName);
      return images.update(image, { createdBy: user.id, updatedBy: user.id, uploadedTo: user.id });
    },

    avatarFetchEnabled() {
      const template = avatarTemplate(deps.avatar);
      return typeof template === 'string' && template.startsWith('http');
    },

    getImageData(image) {
      return storageResolver.forType(image.type).get(image.path);
    },

    async imageUriToBase64(uri) {
      if (!uri.trim()) return null;
      const storagePath = urls.toStoragePath(uri);
      if (storagePath === null) return null;

      const storage = storageResolver.forType(typeFromStoragePath(storagePath));
      if (!(await storage.exists(storagePath))) return null;
      const data = await storage.get(storagePath);

      let extension = path.posix.extname(storagePath).slice(1);
      if (extension === 'svg') extension = 'svg+xml';
      return `data:image/${extension};base64,${data.toString('base64')}`;
    },
  };
}
