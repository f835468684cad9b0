import type { ImageDto } from '@imageshelf/api-contracts';
import type { Image } from '../../services/images/types.js';

export function toImageDto(image: Image): ImageDto {
  return {
    id: image.id,
    name: image.name,
    path: image.path,
    url: image.url,
    type: image.type,
    uploadedTo: image.uploadedTo,
    createdBy: image.createdBy,
    updatedBy: image.updatedBy,
    createdAt: image.createdAt.toISOString(),
    updatedAt: image.updatedAt.toISOString(),
  };
}
