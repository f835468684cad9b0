import { describe, expect, it } from 'vitest';
import type { S3Settings } from '../src/config/imageConfig.js';
import { createUrlResolver, s3PublicBaseUrl } from '../src/services/images/imageUrls.js';

const s3 = (overrides: Partial<S3Settings> = {}): S3Settings => ({
  bucket: 'shelf-images',
  region: 'eu-west-1',
  accessKeyId: 'test-key',
  secretAccessKey: 'test-secret',
  forcePathStyle: false,
  ...overrides,
});

describe('imageUrls: s3PublicBaseUrl', () => {
  it('uses the virtual-hosted form for plain bucket names', () => {
    expect(s3PublicBaseUrl(s3())).toBe('https://shelf-images.s3.amazonaws.com');
  });

  it('falls back to the path-style form for dotted bucket names', () => {
    expect(s3PublicBaseUrl(s3({ bucket: 'images.example.org' }))).toBe(
      'https://s3-eu-west-1.amazonaws.com/images.example.org'
    );
  });

  it('builds both forms against a custom endpoint', () => {
    expect(s3PublicBaseUrl(s3({ endpoint: 'https://minio.local:9000' }))).toBe('https://shelf-images.minio.local:9000');
    expect(s3PublicBaseUrl(s3({ bucket: 'a.b', endpoint: 'https://minio.local:9000/' }))).toBe(
      'https://minio.local:9000/a.b'
    );
  });
});

describe('imageUrls: toPublicUrl', () => {
  it('prefers the storage URL override', () => {
    const urls = createUrlResolver({
      driver: 's3',
      appUrl: 'https://docs.example.com',
      storageUrl: 'https://cdn.example.com/',
      s3: s3(),
    });
    expect(urls.toPublicUrl('uploads/images/gallery/2024-01/cat.png')).toBe(
      'https://cdn.example.com/uploads/images/gallery/2024-01/cat.png'
    );
  });

  it('uses the bucket URL for s3 without an override', () => {
    const urls = createUrlResolver({ driver: 's3', appUrl: 'https://docs.example.com', storageUrl: null, s3: s3() });
    expect(urls.toPublicUrl('/uploads/images/x.png')).toBe('https://shelf-images.s3.amazonaws.com/uploads/images/x.png');
  });

  it('uses the app URL for local storage', () => {
    const urls = createUrlResolver({ driver: 'local', appUrl: 'https://docs.example.com/', storageUrl: null, s3: null });
    expect(urls.toPublicUrl('uploads/images/x.png')).toBe('https://docs.example.com/uploads/images/x.png');
  });

  it('computes the base once per resolver', () => {
    const cfg = { driver: 'local' as const, appUrl: 'https://docs.example.com', storageUrl: 'https://cdn-a.example.com', s3: null };
    const urls = createUrlResolver(cfg);
    expect(urls.toPublicUrl('a.png')).toBe('https://cdn-a.example.com/a.png');
    cfg.storageUrl = 'https://cdn-b.example.com';
    expect(urls.toPublicUrl('a.png')).toBe('https://cdn-a.example.com/a.png');
  });
});

describe('imageUrls: toStoragePath', () => {
  const urls = createUrlResolver({
    driver: 'local',
    appUrl: 'https://docs.example.com',
    storageUrl: 'https://cdn.example.com',
    s3: null,
  });

  it('accepts root-relative image paths', () => {
    expect(urls.toStoragePath('/uploads/images/gallery/2024-01/cat.png/')).toBe('uploads/images/gallery/2024-01/cat.png');
  });

  it('rejects paths outside the image root', () => {
    expect(urls.toStoragePath('/uploads/files/report.pdf')).toBeNull();
    expect(urls.toStoragePath('uploads/imagesevil/x.png')).toBeNull();
    expect(urls.toStoragePath('https://docs.example.com/uploads/imagesevil/x.png')).toBeNull();
    expect(urls.toStoragePath('https://cdn.example.com/uploads/images-old/x.png')).toBeNull();
    expect(urls.toStoragePath('')).toBeNull();
  });

  it('maps app and public URLs back to storage paths, case-insensitively', () => {
    expect(urls.toStoragePath('https://docs.example.com/uploads/images/gallery/cat.png')).toBe(
      'uploads/images/gallery/cat.png'
    );
    expect(urls.toStoragePath('HTTPS://CDN.EXAMPLE.COM/uploads/images/drawio/d.png')).toBe('uploads/images/drawio/d.png');
  });

  it('rejects foreign hosts and traversal', () => {
    expect(urls.toStoragePath('https://elsewhere.example.net/uploads/images/cat.png')).toBeNull();
    expect(urls.toStoragePath('/uploads/images/../../etc/passwd')).toBeNull();
    expect(urls.toStoragePath('https://docs.example.com/uploads/images/../secret.png')).toBeNull();
  });
});
