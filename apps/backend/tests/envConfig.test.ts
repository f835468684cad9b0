import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { parseEnv } from '../src/config/env.js';
import { resolveImageConfig } from '../src/config/imageConfig.js';

describe('config: env', () => {
  it('applies defaults', () => {
    const env = parseEnv({});
    expect(env).toMatchObject({
      PORT: 3001,
      IMAGE_STORAGE: 'local',
      APP_URL: 'http://localhost:3001',
      SECURE_IMAGES: false,
      DISABLE_EXTERNAL_SERVICES: false,
      IMAGE_SWEEP_CHECK_REVISIONS: true,
      MAX_FILE_SIZE: 50 * 1024 * 1024,
    });
  });

  it('parses flags', () => {
    const env = parseEnv({ SECURE_IMAGES: 'true', DISABLE_EXTERNAL_SERVICES: '1', IMAGE_SWEEP_CHECK_REVISIONS: 'false' });
    expect(env.SECURE_IMAGES).toBe(true);
    expect(env.DISABLE_EXTERNAL_SERVICES).toBe(true);
    expect(env.IMAGE_SWEEP_CHECK_REVISIONS).toBe(false);
  });

  it('requires bucket credentials for s3 storage', () => {
    expect(() => parseEnv({ IMAGE_STORAGE: 's3' })).toThrow('S3_BUCKET is required when IMAGE_STORAGE=s3');
  });

  it('requires a database in production', () => {
    expect(() => parseEnv({ NODE_ENV: 'production' })).toThrow('DATABASE_URL is required in production');
  });
});

describe('config: resolveImageConfig', () => {
  it('resolves local roots against the working directory', () => {
    const cfg = resolveImageConfig(parseEnv({ PUBLIC_DIR: 'public', SECURE_STORAGE_DIR: 'storage' }), '/srv/app');
    expect(cfg.localRoots).toEqual({ public: path.resolve('/srv/app', 'public'), secure: path.resolve('/srv/app', 'storage') });
    expect(cfg.s3).toBeNull();
    expect(cfg.storageUrl).toBeNull();
    expect(cfg.avatarUrl).toBeNull();
  });

  it('builds s3 settings and switches to path-style for custom endpoints', () => {
    const cfg = resolveImageConfig(
      parseEnv({
        IMAGE_STORAGE: 's3',
        S3_BUCKET: 'shelf-images',
        S3_ACCESS_KEY_ID: 'test-key',
        S3_SECRET_ACCESS_KEY: 'test-secret',
        S3_ENDPOINT: 'http://localhost:9000',
      })
    );
    expect(cfg.driver).toBe('s3');
    expect(cfg.s3).toEqual({
      bucket: 'shelf-images',
      region: 'us-east-1',
      endpoint: 'http://localhost:9000',
      accessKeyId: 'test-key',
      secretAccessKey: 'test-secret',
      forcePathStyle: true,
    });
  });

  it('treats a blank avatar URL as unset', () => {
    expect(resolveImageConfig(parseEnv({ AVATAR_URL: '   ' })).avatarUrl).toBeNull();
  });
});
