import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'node:crypto';
import { logger } from '../utils/logger.js';
import { recordHttpRequest } from '../utils/metrics.js';

function parseNumberEnv(name: string, fallback: number): number {
  const n = Number.parseFloat(String(process.env[name] ?? ''));
  return Number.isFinite(n) ? n : fallback;
}

function getOrCreateRequestId(req: Request): string {
  const incoming = req.headers['x-request-id'] ?? req.headers['x-correlation-id'];
  const fromHeader = Array.isArray(incoming) ? incoming[0] : incoming;
  if (fromHeader && fromHeader.trim().length > 0) return fromHeader.trim();
  return randomUUID();
}

/** Positive integer from `X-User-Id`, otherwise null. */
export function parseActorId(raw: string | string[] | undefined): number | null {
  const value = Array.isArray(raw) ? raw[0] : raw;
  if (!value || !/^\d+$/.test(value.trim())) return null;
  const id = Number.parseInt(value.trim(), 10);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

export function requestContext(req: Request, res: Response, next: NextFunction) {
  const requestId = getOrCreateRequestId(req);
  req.requestId = requestId;
  req.actorId = parseActorId(req.headers['x-user-id']);
  res.setHeader('X-Request-Id', requestId);

  const start = process.hrtime.bigint();

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;
    const status = res.statusCode;
    const roundedMs = Math.round(durationMs);
    const route = typeof req.route?.path === 'string' ? `${req.baseUrl}${req.route.path}` : 'unmatched';

    recordHttpRequest({ method: req.method, route, status, durationSeconds: durationMs / 1000 });

    const slowMs = parseNumberEnv('HTTP_LOG_SLOW_MS', process.env.NODE_ENV === 'production' ? 1000 : 2000);
    const base = {
      requestId,
      method: req.method,
      path: req.path,
      status,
      durationMs: roundedMs,
      actorId: req.actorId ?? null,
    };

    // Always log 5xx, and always log slow requests.
    if (status >= 500) {
      logger.error('http.request', base);
      return;
    }
    if (roundedMs >= slowMs) {
      logger.warn('http.slow', { ...base, slowMs });
      return;
    }
    logger.info('http.request', base);
  });

  next();
}
