import { z } from 'zod';

export const ImageTypeSchema = z.enum(['gallery', 'drawio', 'user', 'system', 'cover_book', 'cover_bookshelf']);

// Only types whose loss is recoverable may be removed by the unused-image sweep.
export const SWEEPABLE_IMAGE_TYPES = ['gallery', 'drawio'] as const;

export const SweepableImageTypeSchema = z.enum(SWEEPABLE_IMAGE_TYPES);

export type ImageType = z.infer<typeof ImageTypeSchema>;
export type SweepableImageType = z.infer<typeof SweepableImageTypeSchema>;
