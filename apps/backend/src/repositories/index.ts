import type { DbClient } from '../lib/db.js';
import type { ContentReferenceSource, ImageRepository } from './types.js';
import { createContentRepository } from './ContentRepository.js';
import { createImageRepository } from './ImageRepository.js';

export type RepositoryContext = {
  images: ImageRepository;
  content: ContentReferenceSource;
};

export function createRepositoryContext(client: DbClient): RepositoryContext {
  return {
    images: createImageRepository(client),
    content: createContentRepository(client),
  };
}
