export type StorageDriver = 'local' | 'local_secure' | 's3';

/**
 * Byte-oriented access to one storage backend. Paths are logical, slash separated
 * and relative to the backend root.
 */
export interface StorageGateway {
  readonly driver: StorageDriver;
  exists(path: string): Promise<boolean>;
  /** Throws `NotFoundError` when nothing is stored at `path`. */
  get(path: string): Promise<Buffer>;
  put(path: string, data: Buffer): Promise<void>;
  setPublic(path: string): Promise<void>;
  delete(paths: string | string[]): Promise<void>;
  files(directory: string): Promise<string[]>;
  directories(directory: string): Promise<string[]>;
  allFiles(directory: string): Promise<string[]>;
  deleteDirectory(directory: string): Promise<void>;
}
