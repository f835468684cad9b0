import type { ErrorCode } from './errors.js';

export class ApiError extends Error {
  public readonly status: number;
  public readonly errorCode: ErrorCode;
  public readonly details?: unknown;

  constructor(params: { status: number; errorCode: ErrorCode; message?: string; details?: unknown; cause?: unknown }) {
    super(params.message || params.errorCode, params.cause === undefined ? undefined : { cause: params.cause });
    this.name = 'ApiError';
    this.status = params.status;
    this.errorCode = params.errorCode;
    this.details = params.details;
  }
}
