import { describe, expect, it } from 'vitest';
import {
  cleanImageFileName,
  createPathNamer,
  imageDirectoryFor,
  randomString,
  slugify,
  thumbnailPathFor,
} from '../src/services/images/imagePaths.js';

const JAN_2024 = () => new Date(2024, 0, 15, 12, 0, 0);

describe('imagePaths: slugify', () => {
  it('folds accents and collapses separators', () => {
    expect(slugify('Crème Brûlée  Recipe')).toBe('creme-brulee-recipe');
  });

  it('replaces @ and drops punctuation', () => {
    expect(slugify('me@home!')).toBe('me-at-home');
    expect(slugify('--Hello,   World--')).toBe('hello-world');
  });
});

describe('imagePaths: cleanImageFileName', () => {
  it('slugifies the stem and keeps the extension verbatim', () => {
    expect(cleanImageFileName('My Cat.PNG')).toBe('my-cat.PNG');
    expect(cleanImageFileName('diagram.v2.drawio.png')).toBe('diagramv2drawio.png');
  });

  it('treats a name without a dot as having no extension', () => {
    expect(cleanImageFileName('README')).toBe('readme');
  });

  it('falls back to 10 random characters when the stem slugifies to nothing', () => {
    expect(cleanImageFileName('!!!.png')).toMatch(/^[A-Za-z0-9]{10}\.png$/);
  });
});

describe('imagePaths: directories and variants', () => {
  it('uses a zero padded year-month folder per type', () => {
    expect(imageDirectoryFor('gallery', new Date(2024, 0, 3))).toBe('uploads/images/gallery/2024-01/');
    expect(imageDirectoryFor('cover_book', new Date(2023, 10, 30))).toBe('uploads/images/cover_book/2023-11/');
  });

  it('derives variant paths from fit mode and box', () => {
    expect(thumbnailPathFor('uploads/images/gallery/2024-01/cat.png', 220, 220, false)).toBe(
      'uploads/images/gallery/2024-01/thumbs-220-220/cat.png'
    );
    expect(thumbnailPathFor('uploads/images/gallery/2024-01/cat.png', 1680, 0, true)).toBe(
      'uploads/images/gallery/2024-01/scaled-1680-0/cat.png'
    );
  });

  it('generates alphanumeric random strings of the requested length', () => {
    expect(randomString(16)).toMatch(/^[A-Za-z0-9]{16}$/);
  });
});

describe('imagePaths: PathNamer', () => {
  it('returns the clean name when nothing is stored there', async () => {
    const namer = createPathNamer({ secureUploads: false, now: JAN_2024 });
    const result = await namer.newSourcePath('Holiday Photo.jpg', 'gallery', async () => false);
    expect(result).toBe('uploads/images/gallery/2024-01/holiday-photo.jpg');
  });

  it('prefixes three random characters until the path is free', async () => {
    const namer = createPathNamer({ secureUploads: false, now: JAN_2024 });
    const probed: string[] = [];
    const taken = new Set(['uploads/images/gallery/2024-01/cat.png']);
    const result = await namer.newSourcePath('cat.png', 'gallery', async (p) => {
      probed.push(p);
      return taken.has(p);
    });

    expect(probed).toHaveLength(2);
    expect(result).toMatch(/^uploads\/images\/gallery\/2024-01\/[A-Za-z0-9]{3}cat\.png$/);
    expect(taken.has(result)).toBe(false);
  });

  it('keeps prefixing while every candidate is taken', async () => {
    const namer = createPathNamer({ secureUploads: false, now: JAN_2024 });
    let calls = 0;
    const result = await namer.newSourcePath('cat.png', 'gallery', async () => {
      calls += 1;
      return calls <= 3;
    });
    expect(calls).toBe(4);
    expect(result).toMatch(/^uploads\/images\/gallery\/2024-01\/[A-Za-z0-9]{9}cat\.png$/);
  });

  it('adds a 16 character token in secure mode', async () => {
    const namer = createPathNamer({ secureUploads: true, now: JAN_2024 });
    const result = await namer.newSourcePath('cat.png', 'user', async () => false);
    expect(result).toMatch(/^uploads\/images\/user\/2024-01\/[A-Za-z0-9]{16}-cat\.png$/);
  });
});
