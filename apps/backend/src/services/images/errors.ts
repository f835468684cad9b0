import { ApiError } from '../../shared/apiError.js';
import { ERROR_CODES, ERROR_MESSAGES } from '../../shared/errors.js';

/** Malformed upload input, such as a data URI without its `;base64,` delimiter. */
export class UploadValidationError extends ApiError {
  constructor(message: string = ERROR_MESSAGES.INVALID_IMAGE_DATA) {
    super({ status: 400, errorCode: ERROR_CODES.INVALID_IMAGE_DATA, message });
    this.name = 'UploadValidationError';
  }
}

/** The storage backend refused a write. No image record exists for the path. */
export class StorageWriteError extends ApiError {
  public readonly path: string;

  constructor(path: string, cause?: unknown) {
    super({
      status: 500,
      errorCode: ERROR_CODES.PATH_NOT_WRITABLE,
      message: `Unable to write file to path ${path}`,
      cause,
    });
    this.name = 'StorageWriteError';
    this.path = path;
  }
}

/** The codec cannot read the source bytes (unsupported or corrupt format). */
export class DerivationError extends ApiError {
  constructor(cause?: unknown) {
    super({
      status: 422,
      errorCode: ERROR_CODES.CANNOT_CREATE_THUMBNAIL,
      message: ERROR_MESSAGES.CANNOT_CREATE_THUMBNAIL,
      cause,
    });
    this.name = 'DerivationError';
  }
}

export class RemoteFetchError extends ApiError {
  public readonly url: string;

  constructor(url: string, message = `Cannot get image from ${url}`, cause?: unknown) {
    super({ status: 502, errorCode: ERROR_CODES.CANNOT_FETCH_IMAGE, message, cause });
    this.name = 'RemoteFetchError';
    this.url = url;
  }
}

/** A read of bytes that are not in storage. */
export class NotFoundError extends ApiError {
  public readonly path: string;

  constructor(path: string, cause?: unknown) {
    super({
      status: 404,
      errorCode: ERROR_CODES.IMAGE_FILE_NOT_FOUND,
      message: `File not found at path ${path}`,
      cause,
    });
    this.name = 'NotFoundError';
    this.path = path;
  }
}
