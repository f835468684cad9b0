import type { ImageServiceConfig } from '../config/imageConfig.js';
import type { ImageType } from '../services/images/types.js';
import { LocalStorageGateway } from './localStorage.js';
import { S3StorageGateway } from './s3Storage.js';
import type { StorageDriver, StorageGateway } from './types.js';

export type { StorageDriver, StorageGateway } from './types.js';

/**
 * Per-type backend overrides, keyed by the configured driver. System images (the app
 * logo and friends) must stay publicly reachable even when uploads default to secure storage.
 */
export const STORAGE_OVERRIDES: Partial<Record<ImageType, Partial<Record<StorageDriver, StorageDriver>>>> = {
  system: { local_secure: 'local' },
};

export type StorageResolver = {
  /** Backend for images of `type`; the configured default when no type is given. */
  forType(type?: ImageType): StorageGateway;
};

export function resolveDriver(configured: StorageDriver, type?: ImageType): StorageDriver {
  if (!type) return configured;
  return STORAGE_OVERRIDES[type]?.[configured] ?? configured;
}

export function createStorageGateway(
  driver: StorageDriver,
  cfg: Pick<ImageServiceConfig, 'localRoots' | 's3'>
): StorageGateway {
  if (driver === 's3') {
    if (!cfg.s3) throw new Error('S3 storage selected but S3_BUCKET / credentials are not configured');
    return new S3StorageGateway(cfg.s3);
  }
  if (driver === 'local_secure') {
    return new LocalStorageGateway({ rootDir: cfg.localRoots.secure, driver: 'local_secure' });
  }
  return new LocalStorageGateway({ rootDir: cfg.localRoots.public, driver: 'local' });
}

export function createStorageResolver(opts: {
  driver: StorageDriver;
  create: (driver: StorageDriver) => StorageGateway;
}): StorageResolver {
  const gateways = new Map<StorageDriver, StorageGateway>();

  return {
    forType(type) {
      const driver = resolveDriver(opts.driver, type);
      let gateway = gateways.get(driver);
      if (!gateway) {
        gateway = opts.create(driver);
        gateways.set(driver, gateway);
      }
      return gateway;
    },
  };
}
