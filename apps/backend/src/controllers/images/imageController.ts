import type { NextFunction, Request, Response } from 'express';
import {
  ImageBase64QuerySchema,
  ImageParamsSchema,
  SaveAvatarBodySchema,
  ThumbnailQuerySchema,
  UploadBase64BodySchema,
  UploadImageFieldsSchema,
  type ImageBase64Response,
  type ThumbnailResponse,
} from '@imageshelf/api-contracts';
import type { ImageServices } from '../../services/images/index.js';
import type { Actor, Image, ImageRepository } from '../../services/images/types.js';
import { ApiError } from '../../shared/apiError.js';
import { ERROR_CODES } from '../../shared/errors.js';
import { toImageDto } from './imageDto.js';

function actorOf(req: Request): Actor {
  return req.actorId ? { id: req.actorId } : null;
}

export function createImageController(deps: { services: ImageServices; images: ImageRepository }) {
  const { services, images } = deps;

  const loadImage = async (req: Request): Promise<Image> => {
    const { id } = ImageParamsSchema.parse(req.params);
    const image = await images.findById(id);
    if (!image) {
      throw new ApiError({ status: 404, errorCode: ERROR_CODES.IMAGE_NOT_FOUND });
    }
    return image;
  };

  return {
    upload: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const fields = UploadImageFieldsSchema.parse(req.body);
        if (!req.file) {
          throw new ApiError({ status: 400, errorCode: ERROR_CODES.BAD_REQUEST, message: 'Missing "file" field' });
        }
        const image = await services.uploads.saveNewFromUpload(
          { originalName: req.file.originalname, buffer: req.file.buffer },
          fields.type,
          {
            uploadedTo: fields.uploadedTo ?? null,
            resizeWidth: fields.resizeWidth ?? null,
            resizeHeight: fields.resizeHeight ?? null,
            keepRatio: fields.keepRatio,
            actor: actorOf(req),
          }
        );
        return res.status(201).json(toImageDto(image));
      } catch (error) {
        return next(error);
      }
    },

    uploadBase64: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const body = UploadBase64BodySchema.parse(req.body);
        const image = await services.uploads.saveNewFromBase64Uri(body.image, body.name, body.type, {
          uploadedTo: body.uploadedTo ?? null,
          actor: actorOf(req),
        });
        return res.status(201).json(toImageDto(image));
      } catch (error) {
        return next(error);
      }
    },

    saveAvatar: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const body = SaveAvatarBodySchema.parse(req.body);
        const image = await services.uploads.saveUserAvatar(
          { id: body.userId, name: body.name, email: body.email },
          body.size
        );
        return res.status(201).json(toImageDto(image));
      } catch (error) {
        return next(error);
      }
    },

    base64: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { uri } = ImageBase64QuerySchema.parse(req.query);
        const payload: ImageBase64Response = { data: await services.uploads.imageUriToBase64(uri) };
        return res.json(payload);
      } catch (error) {
        return next(error);
      }
    },

    thumbnail: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const image = await loadImage(req);
        const query = ThumbnailQuerySchema.parse(req.query);
        const url = await services.thumbnails.getThumbnail(image, query.width, query.height, query.keepRatio);
        const payload: ThumbnailResponse = { url };
        return res.json(payload);
      } catch (error) {
        return next(error);
      }
    },

    destroy: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const image = await loadImage(req);
        await services.cleanup.destroy(image);
        return res.status(204).end();
      } catch (error) {
        return next(error);
      }
    },
  };
}

export type ImageController = ReturnType<typeof createImageController>;
