import { z } from 'zod';

export const ErrorResponseSchema = z.object({
  errorCode: z.string().min(1),
  error: z.string(),
  requestId: z.string().optional(),
  details: z.unknown().optional(),
});

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
