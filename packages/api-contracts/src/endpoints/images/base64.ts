import { z } from 'zod';

export const ImageBase64QuerySchema = z.object({
  uri: z.string().max(2048),
});

export const ImageBase64ResponseSchema = z.object({
  data: z.string().startsWith('data:image/').nullable(),
});

export type ImageBase64Query = z.infer<typeof ImageBase64QuerySchema>;
export type ImageBase64Response = z.infer<typeof ImageBase64ResponseSchema>;
