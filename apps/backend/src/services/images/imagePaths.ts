import { randomInt } from 'node:crypto';
import path from 'node:path';
import type { ImageType } from './types.js';

export const IMAGE_ROOT = 'uploads/images';

const ALPHANUMERIC = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

export function randomString(length: number): string {
  let out = '';
  for (let i = 0; i < length; i += 1) {
    out += ALPHANUMERIC[randomInt(ALPHANUMERIC.length)];
  }
  return out;
}

/**
 * ASCII, URL safe slug: accents are folded, anything that is not a letter, digit
 * or separator is dropped and separator runs collapse to a single hyphen.
 */
export function slugify(value: string): string {
  return value
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^\x00-\x7f]/g, '')
    .toLowerCase()
    .replace(/@/g, '-at-')
    .replace(/[^a-z0-9\s-]+/g, '')
    .replace(/[\s-]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/** Cleans a user supplied file name so it is safe for both URLs and storage keys. */
export function cleanImageFileName(name: string): string {
  const hyphenated = name.replace(/ /g, '-');
  const dot = hyphenated.lastIndexOf('.');
  const stem = dot === -1 ? hyphenated : hyphenated.slice(0, dot);
  const extension = dot === -1 ? null : hyphenated.slice(dot + 1);

  let slug = slugify(stem);
  if (slug.length === 0) {
    slug = randomString(10);
  }

  return extension === null ? slug : `${slug}.${extension}`;
}

export function imageDirectoryFor(type: ImageType, now: Date): string {
  const year = now.getFullYear();
  const month = String(now.getMonth() + 1).padStart(2, '0');
  return `${IMAGE_ROOT}/${type}/${year}-${month}/`;
}

export type PathNamerOptions = {
  secureUploads: boolean;
  now?: () => Date;
};

export type PathNamer = {
  newSourcePath(originalName: string, type: ImageType, exists: (path: string) => Promise<boolean>): Promise<string>;
};

export function createPathNamer(opts: PathNamerOptions): PathNamer {
  const now = opts.now ?? (() => new Date());

  return {
    async newSourcePath(originalName, type, exists) {
      const directory = imageDirectoryFor(type, now());
      let fileName = cleanImageFileName(originalName);

      while (await exists(directory + fileName)) {
        fileName = randomString(3) + fileName;
      }

      if (opts.secureUploads) {
        // The random token already makes a clash negligible; no second probe.
        return `${directory}${randomString(16)}-${fileName}`;
      }
      return directory + fileName;
    },
  };
}

/**
 * Storage path of a derived variant. The directory name encodes the fit mode and box,
 * so the same inputs always map to the same path.
 */
export function thumbnailPathFor(sourcePath: string, width: number, height: number, keepRatio: boolean): string {
  const prefix = keepRatio ? 'scaled-' : 'thumbs-';
  return `${path.posix.dirname(sourcePath)}/${prefix}${width}-${height}/${path.posix.basename(sourcePath)}`;
}
