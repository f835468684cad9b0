import { z } from 'zod';

import { BooleanishSchema, PositiveIntSchema } from '../../common/parsing.js';

export const ImageParamsSchema = z.object({
  id: PositiveIntSchema,
});

export const ThumbnailQuerySchema = z.object({
  width: PositiveIntSchema.max(4096).optional().default(220),
  height: PositiveIntSchema.max(4096).optional().default(220),
  keepRatio: BooleanishSchema.optional().default(false),
});

export const ThumbnailResponseSchema = z.object({
  url: z.string().url(),
});

export type ImageParams = z.infer<typeof ImageParamsSchema>;
export type ThumbnailQuery = z.infer<typeof ThumbnailQuerySchema>;
export type ThumbnailResponse = z.infer<typeof ThumbnailResponseSchema>;
