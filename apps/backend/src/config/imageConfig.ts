import path from 'node:path';
import type { Env } from './env.js';
import type { StorageDriver } from '../storage/types.js';

export type S3Settings = {
  bucket: string;
  region: string;
  endpoint?: string;
  accessKeyId: string;
  secretAccessKey: string;
  forcePathStyle: boolean;
};

/** Resolved once at startup; the image services never read `process.env` themselves. */
export type ImageServiceConfig = {
  driver: StorageDriver;
  appUrl: string;
  /** Overrides every other public URL base when set. */
  storageUrl: string | null;
  secureUploads: boolean;
  localRoots: { public: string; secure: string };
  s3: S3Settings | null;
  avatarUrl: string | null;
  externalServicesDisabled: boolean;
  avatarTimeoutMs: number;
};

export function resolveImageConfig(env: Env, cwd: string = process.cwd()): ImageServiceConfig {
  const s3 =
    env.S3_BUCKET && env.S3_ACCESS_KEY_ID && env.S3_SECRET_ACCESS_KEY
      ? {
          bucket: env.S3_BUCKET,
          region: env.S3_REGION,
          endpoint: env.S3_ENDPOINT,
          accessKeyId: env.S3_ACCESS_KEY_ID,
          secretAccessKey: env.S3_SECRET_ACCESS_KEY,
          // custom endpoints (MinIO and friends) usually need path-style requests
          forcePathStyle: env.S3_FORCE_PATH_STYLE || !!env.S3_ENDPOINT,
        }
      : null;

  const avatarUrl = env.AVATAR_URL?.trim();

  return {
    driver: env.IMAGE_STORAGE,
    appUrl: env.APP_URL,
    storageUrl: env.STORAGE_URL ?? null,
    secureUploads: env.SECURE_IMAGES,
    localRoots: {
      public: path.resolve(cwd, env.PUBLIC_DIR),
      secure: path.resolve(cwd, env.SECURE_STORAGE_DIR),
    },
    s3,
    avatarUrl: avatarUrl ? avatarUrl : null,
    externalServicesDisabled: env.DISABLE_EXTERNAL_SERVICES,
    avatarTimeoutMs: env.AVATAR_HTTP_TIMEOUT_MS,
  };
}
