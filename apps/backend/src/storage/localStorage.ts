import { randomUUID } from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import { validatePathWithinDirectory } from '../utils/pathSecurity.js';
import { NotFoundError } from '../services/images/errors.js';
import type { StorageGateway } from './types.js';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function isMissing(error: unknown): boolean {
  return isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

function joinLogical(directory: string, name: string): string {
  const dir = directory.replace(/^\/+|\/+$/g, '');
  return dir ? `${dir}/${name}` : name;
}

/**
 * Filesystem backend rooted at one directory. The public root is served over HTTP;
 * the secure root is not.
 */
export class LocalStorageGateway implements StorageGateway {
  readonly driver: 'local' | 'local_secure';
  private readonly rootDir: string;

  constructor(opts: { rootDir: string; driver?: 'local' | 'local_secure' }) {
    this.rootDir = path.resolve(opts.rootDir);
    this.driver = opts.driver ?? 'local';
  }

  // Only resolve paths inside the root; `..` escapes throw.
  private resolve(logicalPath: string): string {
    const relative = logicalPath.replace(/^\/+/, '');
    if (!relative) return this.rootDir;
    return validatePathWithinDirectory(relative, this.rootDir);
  }

  private async readDir(directory: string): Promise<fs.Dirent[]> {
    try {
      return await fs.promises.readdir(this.resolve(directory), { withFileTypes: true });
    } catch (error) {
      if (isMissing(error)) return [];
      throw error;
    }
  }

  async exists(logicalPath: string): Promise<boolean> {
    try {
      await fs.promises.access(this.resolve(logicalPath));
      return true;
    } catch (error) {
      if (isMissing(error)) return false;
      throw error;
    }
  }

  async get(logicalPath: string): Promise<Buffer> {
    try {
      return await fs.promises.readFile(this.resolve(logicalPath));
    } catch (error) {
      if (isMissing(error)) throw new NotFoundError(logicalPath, error);
      throw error;
    }
  }

  async put(logicalPath: string, data: Buffer): Promise<void> {
    const target = this.resolve(logicalPath);
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    // Write then rename so readers never observe a half-written file.
    // One temp file per write: concurrent writers of the same path each rename their own.
    const temp = `${target}.${randomUUID()}.tmp`;
    await fs.promises.writeFile(temp, data);
    await fs.promises.rename(temp, target);
  }

  async setPublic(logicalPath: string): Promise<void> {
    await fs.promises.chmod(this.resolve(logicalPath), 0o644);
  }

  async delete(paths: string | string[]): Promise<void> {
    const list = Array.isArray(paths) ? paths : [paths];
    for (const p of list) {
      try {
        await fs.promises.unlink(this.resolve(p));
      } catch (error) {
        if (!isMissing(error)) throw error;
      }
    }
  }

  async files(directory: string): Promise<string[]> {
    const entries = await this.readDir(directory);
    return entries.filter((e) => e.isFile()).map((e) => joinLogical(directory, e.name)).sort();
  }

  async directories(directory: string): Promise<string[]> {
    const entries = await this.readDir(directory);
    return entries.filter((e) => e.isDirectory()).map((e) => joinLogical(directory, e.name)).sort();
  }

  async allFiles(directory: string): Promise<string[]> {
    const out: string[] = [];
    const walk = async (dir: string) => {
      for (const entry of await this.readDir(dir)) {
        const child = joinLogical(dir, entry.name);
        if (entry.isDirectory()) {
          await walk(child);
        } else if (entry.isFile()) {
          out.push(child);
        }
      }
    };
    await walk(directory);
    return out.sort();
  }

  async deleteDirectory(directory: string): Promise<void> {
    const target = this.resolve(directory);
    if (target === this.rootDir) {
      throw new Error('Refusing to delete the storage root');
    }
    await fs.promises.rm(target, { recursive: true, force: true });
  }
}
