import { timingSafeEqual } from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';
import { ApiError } from '../shared/apiError.js';
import { ERROR_CODES } from '../shared/errors.js';

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}

/** Bearer token guard for maintenance endpoints. With no token configured they are closed. */
export function requireMaintenanceToken(token: string | undefined) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const header = req.headers.authorization ?? '';
    const match = /^Bearer\s+(.+)$/i.exec(header);
    if (!token || !match?.[1] || !safeEqual(match[1].trim(), token)) {
      return next(new ApiError({ status: 401, errorCode: ERROR_CODES.UNAUTHORIZED }));
    }
    next();
  };
}
