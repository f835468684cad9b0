import type { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { ApiError } from '../shared/apiError.js';
import { ERROR_CODES } from '../shared/errors.js';

const ALLOWED_MIMES = new Set(['image/png', 'image/jpeg', 'image/gif', 'image/webp', 'image/svg+xml', 'image/bmp', 'image/tiff']);

const fileFilter = (_req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback) => {
  if (ALLOWED_MIMES.has(file.mimetype)) {
    cb(null, true);
    return;
  }
  cb(new ApiError({ status: 400, errorCode: ERROR_CODES.INVALID_FILE_TYPE }));
};

/** Single `file` field, kept in memory: the bytes go straight to the storage backend. */
export function createImageUpload(maxFileSize: number) {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxFileSize, files: 1 },
    fileFilter,
  });

  const single = upload.single('file');

  return (req: Request, res: Response, next: NextFunction) => {
    single(req, res, (err: unknown) => {
      if (err) return next(err);
      if (!req.file) {
        return next(new ApiError({ status: 400, errorCode: ERROR_CODES.BAD_REQUEST, message: 'Missing "file" field' }));
      }
      next();
    });
  };
}
