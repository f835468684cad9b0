import { Router } from 'express';
import type { ImageController } from '../controllers/images/imageController.js';
import { createImageUpload } from '../middleware/upload.js';

export function createImageRoutes(controller: ImageController, opts: { maxFileSize: number }): Router {
  const imageRoutes = Router();

  imageRoutes.post('/', createImageUpload(opts.maxFileSize), controller.upload);
  imageRoutes.post('/base64', controller.uploadBase64);
  imageRoutes.post('/avatar', controller.saveAvatar);
  imageRoutes.get('/base64', controller.base64);
  imageRoutes.get('/:id/thumbnail', controller.thumbnail);
  imageRoutes.delete('/:id', controller.destroy);

  return imageRoutes;
}
