import { z } from 'zod';

import { ImageTypeSchema, SWEEPABLE_IMAGE_TYPES } from '../../common/enums.js';

export const CleanupImagesBodySchema = z.object({
  checkRevisions: z.boolean().optional().default(true),
  dryRun: z.boolean().optional().default(true),
  // Types outside the sweepable set are accepted here and ignored by the sweep itself.
  types: z.array(ImageTypeSchema).min(1).optional().default([...SWEEPABLE_IMAGE_TYPES]),
});

export const CleanupImagesResponseSchema = z.object({
  dryRun: z.boolean(),
  count: z.number().int().min(0),
  paths: z.array(z.string()),
});

export type CleanupImagesBody = z.infer<typeof CleanupImagesBodySchema>;
export type CleanupImagesResponse = z.infer<typeof CleanupImagesResponseSchema>;
