import { z } from 'zod';

import { ImageTypeSchema } from '../common/enums.js';

export const ImageSchema = z.object({
  id: z.number().int().positive(),
  name: z.string(),
  path: z.string().startsWith('uploads/images/'),
  url: z.string().url(),
  type: ImageTypeSchema,
  uploadedTo: z.number().int().positive().nullable(),
  createdBy: z.number().int().positive().nullable(),
  updatedBy: z.number().int().positive().nullable(),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});

export type ImageDto = z.infer<typeof ImageSchema>;
