import sharp from 'sharp';
import { DerivationError } from './errors.js';
import type { ImageCodec } from './types.js';

// libvips reports undecodable input through these messages; everything else is a real failure.
const UNSUPPORTED_INPUT = /unsupported image format|corrupt header|Input buffer (is empty|has corrupt|contains unsupported)|VipsJpeg|pngload|gifload|webpload|bad seek/i;

export function isUnsupportedInputError(error: unknown): boolean {
  return error instanceof Error && UNSUPPORTED_INPUT.test(error.message);
}

/** Output keeps the source format, matching how the variant shares the source file name. */
export const sharpCodec: ImageCodec = {
  async resize(data, width, height, keepRatio) {
    try {
      const pipeline = sharp(data, { animated: false });
      if (keepRatio) {
        pipeline.resize(width, height, { fit: 'inside', withoutEnlargement: true });
      } else {
        pipeline.resize(width, height, { fit: 'cover', position: 'centre' });
      }
      return await pipeline.toBuffer();
    } catch (error) {
      if (isUnsupportedInputError(error)) {
        throw new DerivationError(error);
      }
      throw error;
    }
  },
};
