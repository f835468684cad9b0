import { z } from 'zod';

import { ImageTypeSchema } from '../../common/enums.js';
import { BooleanishSchema, PositiveIntSchema } from '../../common/parsing.js';
import { ImageSchema } from '../../entities/image.js';

// Multipart text fields arrive as strings; everything numeric is coerced.
export const UploadImageFieldsSchema = z.object({
  type: ImageTypeSchema,
  uploadedTo: PositiveIntSchema.optional(),
  resizeWidth: PositiveIntSchema.optional(),
  resizeHeight: PositiveIntSchema.optional(),
  keepRatio: BooleanishSchema.optional().default(true),
});

export const UploadBase64BodySchema = z.object({
  image: z.string().min(1),
  name: z.string().min(1).max(255),
  type: ImageTypeSchema,
  uploadedTo: z.number().int().positive().optional(),
});

export const SaveAvatarBodySchema = z.object({
  userId: z.number().int().positive(),
  name: z.string().min(1).max(255),
  email: z.string().email(),
  size: z.number().int().min(16).max(2048).optional(),
});

export const UploadImageResponseSchema = ImageSchema;

export type UploadImageFields = z.infer<typeof UploadImageFieldsSchema>;
export type UploadBase64Body = z.infer<typeof UploadBase64BodySchema>;
export type SaveAvatarBody = z.infer<typeof SaveAvatarBodySchema>;
export type UploadImageResponse = z.infer<typeof UploadImageResponseSchema>;
