import type { ImageServiceConfig } from '../../config/imageConfig.js';
import { IMAGE_ROOT } from './imagePaths.js';

export type UrlResolver = {
  toPublicUrl(path: string): string;
  /** Maps a URL or root-relative path back to a storage path, or `null` when it is not a local image. */
  toStoragePath(url: string): string | null;
};

type UrlConfig = Pick<ImageServiceConfig, 'driver' | 'appUrl' | 'storageUrl' | 's3'>;

function trimSlashes(value: string): string {
  return value.replace(/^\/+|\/+$/g, '');
}

function rtrimSlashes(value: string): string {
  return value.replace(/\/+$/, '');
}

function hasTraversal(path: string): boolean {
  return path.split('/').some((segment) => segment === '..');
}

/**
 * Public base for objects in the bucket. Bucket names containing a period break TLS
 * hostname matching on virtual-hosted URLs, so those fall back to the path-style form.
 */
export function s3PublicBaseUrl(s3: NonNullable<UrlConfig['s3']>): string {
  const virtualHosted = !s3.bucket.includes('.');

  if (s3.endpoint) {
    const endpoint = new URL(s3.endpoint);
    if (virtualHosted) return `${endpoint.protocol}//${s3.bucket}.${endpoint.host}`;
    return `${rtrimSlashes(endpoint.toString())}/${s3.bucket}`;
  }

  if (virtualHosted) return `https://${s3.bucket}.s3.amazonaws.com`;
  return `https://s3-${s3.region}.amazonaws.com/${s3.bucket}`;
}

export function createUrlResolver(cfg: UrlConfig): UrlResolver {
  // Computed on first use and kept for the lifetime of the resolver: backend config is static after startup.
  let storageBase: string | null | undefined;

  const resolveStorageBase = (): string | null => {
    if (storageBase !== undefined) return storageBase;
    let base = cfg.storageUrl;
    if (!base && cfg.driver === 's3' && cfg.s3) {
      base = s3PublicBaseUrl(cfg.s3);
    }
    storageBase = base ? rtrimSlashes(base) : null;
    return storageBase;
  };

  const toPublicUrl = (path: string): string => {
    const base = resolveStorageBase() ?? rtrimSlashes(cfg.appUrl);
    return `${base}/${path.replace(/^\/+/, '')}`;
  };

  const toStoragePath = (url: string): string | null => {
    const candidate = url.trim().replace(/^\/+/, '');
    if (!candidate) return null;

    const isRelative = !candidate.toLowerCase().startsWith('http');
    if (isRelative) {
      if (!candidate.toLowerCase().startsWith(`${IMAGE_ROOT}/`)) return null;
      const relative = candidate.replace(/\/+$/, '');
      return hasTraversal(relative) ? null : relative;
    }

    const potentialBases = [`${rtrimSlashes(cfg.appUrl)}/${IMAGE_ROOT}/`, `${toPublicUrl(IMAGE_ROOT)}/`];
    for (const base of potentialBases) {
      if (!candidate.toLowerCase().startsWith(base.toLowerCase())) continue;
      const resolved = `${IMAGE_ROOT}/${trimSlashes(candidate.slice(base.length))}`;
      return hasTraversal(resolved) ? null : resolved;
    }

    return null;
  };

  return { toPublicUrl, toStoragePath };
}
