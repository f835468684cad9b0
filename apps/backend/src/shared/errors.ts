export const ERROR_CODES = {
  BAD_REQUEST: 'BAD_REQUEST',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  UNAUTHORIZED: 'UNAUTHORIZED',
  NOT_FOUND: 'NOT_FOUND',
  IMAGE_NOT_FOUND: 'IMAGE_NOT_FOUND',
  TIMEOUT: 'TIMEOUT',
  FILE_TOO_LARGE: 'FILE_TOO_LARGE',
  // Images / storage
  INVALID_IMAGE_DATA: 'INVALID_IMAGE_DATA',
  INVALID_FILE_TYPE: 'INVALID_FILE_TYPE',
  PATH_NOT_WRITABLE: 'PATH_NOT_WRITABLE',
  CANNOT_CREATE_THUMBNAIL: 'CANNOT_CREATE_THUMBNAIL',
  CANNOT_FETCH_IMAGE: 'CANNOT_FETCH_IMAGE',
  IMAGE_FILE_NOT_FOUND: 'IMAGE_FILE_NOT_FOUND',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  BAD_REQUEST: 'Bad request',
  VALIDATION_ERROR: 'Validation failed',
  UNAUTHORIZED: 'Unauthorized',
  NOT_FOUND: 'Not found',
  IMAGE_NOT_FOUND: 'Image not found',
  TIMEOUT: 'Request timed out',
  FILE_TOO_LARGE: 'File is too large',
  INVALID_IMAGE_DATA: 'Invalid image data provided',
  INVALID_FILE_TYPE: 'Invalid file type. Only images are allowed.',
  PATH_NOT_WRITABLE: 'Unable to write file to the storage path',
  CANNOT_CREATE_THUMBNAIL: 'Cannot create thumbnails for this image type',
  CANNOT_FETCH_IMAGE: 'Cannot get image from the given URL',
  IMAGE_FILE_NOT_FOUND: 'Image file not found',
  INTERNAL_ERROR: 'Internal server error',
};

export type ApiErrorResponse = {
  errorCode: ErrorCode;
  error: string;
  requestId?: string;
  details?: unknown;
};

export function defaultErrorCodeForStatus(status: number): ErrorCode {
  if (status === 400) return ERROR_CODES.BAD_REQUEST;
  if (status === 401) return ERROR_CODES.UNAUTHORIZED;
  if (status === 404) return ERROR_CODES.NOT_FOUND;
  if (status === 408) return ERROR_CODES.TIMEOUT;
  if (status === 413) return ERROR_CODES.FILE_TOO_LARGE;
  if (status === 422) return ERROR_CODES.CANNOT_CREATE_THUMBNAIL;
  if (status === 502) return ERROR_CODES.CANNOT_FETCH_IMAGE;
  return ERROR_CODES.INTERNAL_ERROR;
}
