import multer from 'multer';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';

const loggerMock = vi.hoisted(() => ({
  debug: vi.fn(),
  info: vi.fn(),
  error: vi.fn(),
  warn: vi.fn(),
}));

vi.mock('../src/utils/logger.js', () => ({ logger: loggerMock, errorMessage: (e: unknown) => String(e) }));

import type { NextFunction, Request, Response } from 'express';
import { errorHandler } from '../src/middleware/errorHandler.js';
import { DerivationError, NotFoundError, RemoteFetchError, StorageWriteError, UploadValidationError } from '../src/services/images/errors.js';

type TestResponse = {
  statusCode: number;
  headersSent: boolean;
  body?: unknown;
  status: (code: number) => TestResponse;
  json: (body: unknown) => TestResponse;
};

function makeRes(): TestResponse {
  const res: TestResponse = {
    statusCode: 200,
    headersSent: false,
    status(code: number) {
      res.statusCode = code;
      return res;
    },
    json(body: unknown) {
      res.body = body;
      return res;
    },
  };
  return res;
}

function run(err: Error, opts: { headersSent?: boolean } = {}) {
  const req = { method: 'POST', path: '/images', requestId: 'req-1', actorId: 9 } as unknown as Request;
  const res = makeRes();
  res.headersSent = opts.headersSent ?? false;
  const next = vi.fn();
  errorHandler(err, req, res as unknown as Response, next as unknown as NextFunction);
  return { res, next };
}

beforeEach(() => {
  loggerMock.error.mockReset();
  loggerMock.warn.mockReset();
  vi.stubEnv('NODE_ENV', 'development');
});

describe('middleware: errorHandler', () => {
  it.each([
    [new UploadValidationError('Invalid base64 image data provided'), 400, 'INVALID_IMAGE_DATA'],
    [new StorageWriteError('uploads/images/a.png'), 500, 'PATH_NOT_WRITABLE'],
    [new DerivationError(), 422, 'CANNOT_CREATE_THUMBNAIL'],
    [new RemoteFetchError('https://img.test/a.png'), 502, 'CANNOT_FETCH_IMAGE'],
    [new NotFoundError('uploads/images/a.png'), 404, 'IMAGE_FILE_NOT_FOUND'],
  ])('maps %s to its status and code', (err, status, errorCode) => {
    const { res } = run(err);
    expect(res.statusCode).toBe(status);
    expect(res.body).toMatchObject({ errorCode, error: err.message, requestId: 'req-1' });
  });

  it('logs client errors as warnings and server errors as errors', () => {
    run(new UploadValidationError());
    expect(loggerMock.warn).toHaveBeenCalledWith('http.error', expect.objectContaining({ status: 400, actorId: 9 }));
    run(new StorageWriteError('x'));
    expect(loggerMock.error).toHaveBeenCalledWith('http.error', expect.objectContaining({ status: 500 }));
  });

  it('answers validation failures with 400', () => {
    const parsed = z.object({ id: z.number() }).safeParse({ id: 'x' });
    if (parsed.success) throw new Error('expected a validation failure');
    const { res } = run(parsed.error);
    expect(res.statusCode).toBe(400);
    expect(res.body).toMatchObject({ errorCode: 'VALIDATION_ERROR', error: 'Validation failed' });
  });

  it('answers oversized uploads with 413', () => {
    const { res } = run(new multer.MulterError('LIMIT_FILE_SIZE', 'file'));
    expect(res.statusCode).toBe(413);
    expect(res.body).toMatchObject({ errorCode: 'FILE_TOO_LARGE' });
  });

  it('hides unexpected error messages in production', () => {
    vi.stubEnv('NODE_ENV', 'production');
    const { res } = run(new Error('internal detail'));
    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ errorCode: 'INTERNAL_ERROR', error: 'Internal server error', requestId: 'req-1' });
  });

  it('shows unexpected error messages outside production', () => {
    const { res } = run(new Error('boom'));
    expect(res.body).toEqual({ errorCode: 'INTERNAL_ERROR', error: 'boom', requestId: 'req-1' });
  });

  it('delegates when headers are already sent', () => {
    const err = new Error('late');
    const { res, next } = run(err, { headersSent: true });
    expect(next).toHaveBeenCalledWith(err);
    expect(res.body).toBeUndefined();
  });
});
