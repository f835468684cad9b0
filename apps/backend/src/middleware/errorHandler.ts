import type { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import { ApiError } from '../shared/apiError.js';
import {
  ERROR_CODES,
  ERROR_MESSAGES,
  defaultErrorCodeForStatus,
  type ApiErrorResponse,
  type ErrorCode,
} from '../shared/errors.js';
import { logger } from '../utils/logger.js';

export function errorHandler(err: Error, req: Request, res: Response, next: NextFunction) {
  const requestId = req.requestId;
  const status = err instanceof ApiError ? err.status : null;

  const meta = {
    requestId,
    method: req.method,
    path: req.path,
    actorId: req.actorId ?? null,
    status,
    errorName: err.name,
    errorMessage: err.message,
    // Stack can contain sensitive paths; keep it only outside production.
    ...(process.env.NODE_ENV === 'production' ? {} : { stack: err.stack }),
  };
  if (status !== null && status < 500) {
    logger.warn('http.error', meta);
  } else {
    logger.error('http.error', meta);
  }

  if (res.headersSent) {
    logger.warn('http.error.headersSent', { requestId, method: req.method, path: req.path });
    return next(err);
  }

  const send = (httpStatus: number, errorCode: ErrorCode, error?: string, details?: unknown) => {
    const body: ApiErrorResponse = {
      errorCode,
      error: error ?? ERROR_MESSAGES[errorCode],
      requestId,
      ...(details === undefined ? {} : { details }),
    };
    return res.status(httpStatus).json(body);
  };

  if (err instanceof ApiError) {
    return send(err.status, err.errorCode, err.message, err.details);
  }

  if (err instanceof ZodError) {
    return send(400, ERROR_CODES.VALIDATION_ERROR, undefined, err.flatten());
  }

  if (err instanceof multer.MulterError) {
    if (err.code === 'LIMIT_FILE_SIZE') return send(413, ERROR_CODES.FILE_TOO_LARGE);
    if (err.code === 'LIMIT_UNEXPECTED_FILE') return send(400, ERROR_CODES.BAD_REQUEST, 'Unexpected file field');
    return send(400, ERROR_CODES.BAD_REQUEST, err.message);
  }

  // In production, never expose error details.
  const isProduction = process.env.NODE_ENV === 'production';
  const fallbackCode = defaultErrorCodeForStatus(500);
  return send(500, fallbackCode, isProduction ? undefined : err.message);
}
