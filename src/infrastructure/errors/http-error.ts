import { HTTP_STATUS } from '../../config/constants.js';

/**
 * Base HTTP error class with status code support
 */
export class HttpError extends Error {
  public readonly statusCode: number;

  constructor(message: string, statusCode: number = HTTP_STATUS.INTERNAL_SERVER_ERROR, cause: Error | null = null) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    if (cause) {
      this.cause = cause;
    }
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): { error: string; status: number } {
    return {
      error: this.message,
      status: this.statusCode,
    };
  }
}

/**
 * 500 raised when a route handler throws, rejects or returns something that
 * cannot be encoded as JSON
 */
export class HandlerError extends HttpError {
  public readonly template: string;

  constructor(template: string, cause: Error | null = null) {
    super(`Handler for ${template} failed`, HTTP_STATUS.INTERNAL_SERVER_ERROR, cause);
    this.template = template;
  }
}

/**
 * 413 Payload Too Large
 */
export class PayloadTooLargeError extends HttpError {
  public readonly limit: number;

  constructor(limit: number, cause: Error | null = null) {
    super(`Request body exceeds ${limit} bytes`, HTTP_STATUS.PAYLOAD_TOO_LARGE, cause);
    this.limit = limit;
  }
}
