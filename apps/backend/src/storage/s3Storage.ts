import path from 'node:path';
import {
  S3Client,
  DeleteObjectsCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectAclCommand,
  PutObjectCommand,
} from '@aws-sdk/client-s3';
import type { S3Settings } from '../config/imageConfig.js';
import { NotFoundError } from '../services/images/errors.js';
import type { StorageGateway } from './types.js';

const MIME_BY_EXTENSION: Record<string, string> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  webp: 'image/webp',
  svg: 'image/svg+xml',
  bmp: 'image/bmp',
  tiff: 'image/tiff',
  avif: 'image/avif',
};

const DELETE_BATCH = 1000;

export function guessContentType(key: string): string {
  const ext = path.posix.extname(key).slice(1).toLowerCase();
  return MIME_BY_EXTENSION[ext] ?? 'application/octet-stream';
}

function isNotFoundError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (error.name === 'NotFound' || error.name === 'NoSuchKey') return true;
  if ('$metadata' in error && typeof error.$metadata === 'object' && error.$metadata !== null) {
    return 'httpStatusCode' in error.$metadata && error.$metadata.httpStatusCode === 404;
  }
  return false;
}

function toKey(logicalPath: string): string {
  return logicalPath.replace(/^\/+/, '');
}

function toPrefix(directory: string): string {
  const dir = directory.replace(/^\/+|\/+$/g, '');
  return dir ? `${dir}/` : '';
}

export class S3StorageGateway implements StorageGateway {
  readonly driver = 's3' as const;
  private readonly cfg: S3Settings;
  private readonly client: S3Client;

  constructor(cfg: S3Settings) {
    this.cfg = cfg;
    this.client = new S3Client({
      region: cfg.region,
      endpoint: cfg.endpoint,
      forcePathStyle: cfg.forcePathStyle,
      credentials: {
        accessKeyId: cfg.accessKeyId,
        secretAccessKey: cfg.secretAccessKey,
      },
    });
  }

  private async list(prefix: string, delimiter?: string): Promise<{ keys: string[]; prefixes: string[] }> {
    const keys: string[] = [];
    const prefixes: string[] = [];
    let continuationToken: string | undefined;

    do {
      const res = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.cfg.bucket,
          Prefix: prefix,
          Delimiter: delimiter,
          ContinuationToken: continuationToken,
        })
      );
      for (const obj of res.Contents ?? []) {
        if (obj.Key && obj.Key !== prefix) keys.push(obj.Key);
      }
      for (const common of res.CommonPrefixes ?? []) {
        if (common.Prefix) prefixes.push(common.Prefix.replace(/\/+$/, ''));
      }
      continuationToken = res.IsTruncated ? res.NextContinuationToken : undefined;
    } while (continuationToken);

    return { keys: keys.sort(), prefixes: prefixes.sort() };
  }

  async exists(logicalPath: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.cfg.bucket, Key: toKey(logicalPath) }));
      return true;
    } catch (error) {
      if (isNotFoundError(error)) return false;
      // Permissions, network and the like must not read as "missing".
      throw error;
    }
  }

  async get(logicalPath: string): Promise<Buffer> {
    try {
      const res = await this.client.send(new GetObjectCommand({ Bucket: this.cfg.bucket, Key: toKey(logicalPath) }));
      if (!res.Body) throw new NotFoundError(logicalPath);
      return Buffer.from(await res.Body.transformToByteArray());
    } catch (error) {
      if (isNotFoundError(error)) throw new NotFoundError(logicalPath, error);
      throw error;
    }
  }

  async put(logicalPath: string, data: Buffer): Promise<void> {
    const key = toKey(logicalPath);
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.cfg.bucket,
        Key: key,
        Body: data,
        ContentType: guessContentType(key),
      })
    );
  }

  async setPublic(logicalPath: string): Promise<void> {
    await this.client.send(
      new PutObjectAclCommand({ Bucket: this.cfg.bucket, Key: toKey(logicalPath), ACL: 'public-read' })
    );
  }

  async delete(paths: string | string[]): Promise<void> {
    const keys = (Array.isArray(paths) ? paths : [paths]).map(toKey);
    for (let i = 0; i < keys.length; i += DELETE_BATCH) {
      const batch = keys.slice(i, i + DELETE_BATCH);
      const res = await this.client.send(
        new DeleteObjectsCommand({
          Bucket: this.cfg.bucket,
          Delete: { Objects: batch.map((Key) => ({ Key })), Quiet: true },
        })
      );
      const failed = res.Errors ?? [];
      if (failed.length > 0) {
        const first = failed[0];
        throw new Error(`Failed to delete ${failed.length} object(s), first: ${first?.Key} (${first?.Code})`);
      }
    }
  }

  async files(directory: string): Promise<string[]> {
    return (await this.list(toPrefix(directory), '/')).keys;
  }

  async directories(directory: string): Promise<string[]> {
    return (await this.list(toPrefix(directory), '/')).prefixes;
  }

  async allFiles(directory: string): Promise<string[]> {
    return (await this.list(toPrefix(directory))).keys;
  }

  async deleteDirectory(directory: string): Promise<void> {
    const prefix = toPrefix(directory);
    if (!prefix) {
      throw new Error('Refusing to delete the bucket root');
    }
    // S3 has no real folders; the `dir/` marker object, when a client created one, goes too.
    const keys = (await this.list(prefix)).keys;
    await this.delete([...keys, prefix]);
  }
}
