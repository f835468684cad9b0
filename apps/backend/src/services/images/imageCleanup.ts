import path from 'node:path';
import { SWEEPABLE_IMAGE_TYPES, type SweepableImageType } from '@imageshelf/api-contracts';
import type { StorageResolver } from '../../storage/index.js';
import { logger } from '../../utils/logger.js';
import { imageMetrics } from '../../utils/metrics.js';
import type { ContentReferenceSource, Image, ImageRepository, ImageType, StorageGateway } from './types.js';

export const SWEEP_BATCH_SIZE = 1000;

export type SweepOptions = {
  checkRevisions?: boolean;
  dryRun?: boolean;
  types?: readonly ImageType[];
};

export type CleanupService = {
  /** Removes the image, every variant sharing its file name, emptied folders, then the record. */
  destroy(image: Image): Promise<void>;
  /**
   * Finds images of sweepable types whose file name appears in no page (and, optionally,
   * no page revision). Returns their paths; deletes them unless `dryRun`.
   */
  sweep(options?: SweepOptions): Promise<string[]>;
};

function isSweepable(type: ImageType): type is SweepableImageType {
  return SWEEPABLE_IMAGE_TYPES.some((t) => t === type);
}

async function isFolderEmpty(storage: StorageGateway, directory: string): Promise<boolean> {
  const [files, folders] = await Promise.all([storage.files(directory), storage.directories(directory)]);
  return files.length === 0 && folders.length === 0;
}

export function createCleanupService(deps: {
  storage: StorageResolver;
  images: ImageRepository;
  content: ContentReferenceSource;
  batchSize?: number;
}): CleanupService {
  const batchSize = deps.batchSize ?? SWEEP_BATCH_SIZE;

  const destroyFilesFromPath = async (storage: StorageGateway, imagePath: string): Promise<number> => {
    const imageFolder = path.posix.dirname(imagePath);
    const imageFileName = path.posix.basename(imagePath);

    // Variants live in sibling folders (thumbs-W-H, scaled-W-H) under the same leaf name.
    const allImages = await storage.allFiles(imageFolder);
    const toDelete = allImages.filter((p) => path.posix.basename(p) === imageFileName);
    if (toDelete.length > 0) {
      await storage.delete(toDelete);
    }

    // Variant folders first, so the image folder is judged after they are gone.
    const foldersInvolved = [...(await storage.directories(imageFolder)), imageFolder];
    for (const directory of foldersInvolved) {
      if (await isFolderEmpty(storage, directory)) {
        await storage.deleteDirectory(directory);
      }
    }

    return toDelete.length;
  };

  const destroy = async (image: Image): Promise<void> => {
    const storage = deps.storage.forType(image.type);
    const filesDeleted = await destroyFilesFromPath(storage, image.path);
    // Last step: a storage failure above leaves the record in place.
    await deps.images.delete(image);

    imageMetrics.imagesDestroyed.inc({ type: image.type });
    logger.info('images.destroyed', { imageId: image.id, path: image.path, filesDeleted });
  };

  const isReferenced = async (image: Image, checkRevisions: boolean): Promise<boolean> => {
    const term = path.posix.basename(image.path);
    if ((await deps.content.countPagesContaining(term)) > 0) return true;
    if (!checkRevisions) return false;
    return (await deps.content.countRevisionsContaining(term)) > 0;
  };

  const sweep = async (options: SweepOptions = {}): Promise<string[]> => {
    const checkRevisions = options.checkRevisions ?? true;
    const dryRun = options.dryRun ?? true;
    const types = (options.types ?? SWEEPABLE_IMAGE_TYPES).filter(isSweepable);
    const deletedPaths: string[] = [];
    if (types.length === 0) return deletedPaths;

    const startedAt = Date.now();
    let scanned = 0;

    for await (const batch of deps.images.chunkByTypes(types, batchSize)) {
      for (const image of batch) {
        scanned += 1;
        if (await isReferenced(image, checkRevisions)) continue;

        deletedPaths.push(image.path);
        if (!dryRun) {
          await destroy(image);
        }
      }
    }

    logger.info('images.sweep.completed', {
      types,
      checkRevisions,
      dryRun,
      scanned,
      unused: deletedPaths.length,
      durationMs: Date.now() - startedAt,
    });

    return deletedPaths;
  };

  return { destroy, sweep };
}
