import type { ImageType } from '@imageshelf/api-contracts';

export type { ImageType };
export type { StorageDriver, StorageGateway } from '../../storage/types.js';

export type Image = {
  id: number;
  name: string;
  /** Storage path of the source bytes, e.g. `uploads/images/gallery/2024-01/cat.png`. */
  path: string;
  url: string;
  type: ImageType;
  uploadedTo: number | null;
  createdBy: number | null;
  updatedBy: number | null;
  createdAt: Date;
  updatedAt: Date;
};

export type NewImageFields = Pick<Image, 'name' | 'path' | 'url' | 'type' | 'uploadedTo' | 'createdBy' | 'updatedBy'>;

export type ImageUpdateFields = Partial<Pick<Image, 'name' | 'uploadedTo' | 'createdBy' | 'updatedBy'>>;

/** Key/value store with expiry. Used only as a positive existence hint. */
export interface CacheGateway {
  has(key: string): Promise<boolean>;
  get(key: string): Promise<string | null>;
  put(key: string, value: string, ttlSeconds: number): Promise<void>;
}

export interface ImageRepository {
  create(fields: NewImageFields): Promise<Image>;
  update(image: Image, fields: ImageUpdateFields): Promise<Image>;
  delete(image: Image): Promise<void>;
  findById(id: number): Promise<Image | null>;
  /** Yields batches ordered by id. Safe to delete yielded rows while iterating. */
  chunkByTypes(types: readonly ImageType[], size: number): AsyncIterable<Image[]>;
}

export interface ContentReferenceSource {
  countPagesContaining(term: string): Promise<number>;
  countRevisionsContaining(term: string): Promise<number>;
}

export interface RemoteFetcher {
  /** Throws `RemoteFetchError` on network failure or a non-2xx status. */
  fetch(url: string): Promise<Buffer>;
}

export interface ImageCodec {
  /**
   * `keepRatio` bounds the output by the box without upsizing; otherwise the image is
   * cropped and scaled to fill the box exactly. Throws `DerivationError` for input it cannot decode.
   */
  resize(data: Buffer, width: number | null, height: number | null, keepRatio: boolean): Promise<Buffer>;
}

/** Whoever triggered the write; `null` for system-initiated uploads. */
export type Actor = { id: number } | null;

export type AvatarUser = {
  id: number;
  name: string;
  email: string;
};
