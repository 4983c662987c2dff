import { HttpError } from './http-error.js';
import { ERROR_MESSAGES, HTTP_STATUS } from '../../config/constants.js';

/**
 * 400 Bad Request - body present but not valid JSON
 */
export class MalformedBodyError extends HttpError {
  constructor(message: string = ERROR_MESSAGES.INVALID_PAYLOAD, cause: Error | null = null) {
    super(message, HTTP_STATUS.BAD_REQUEST, cause);
  }
}

/**
 * 405 Method Not Allowed
 */
export class MethodNotAllowedError extends HttpError {
  public readonly allowedMethods: string[];

  constructor(allowedMethods: string[] = [], cause: Error | null = null) {
    const message = allowedMethods.length > 0
      ? `${ERROR_MESSAGES.METHOD_NOT_ALLOWED}. Allowed methods: ${allowedMethods.join(', ')}`
      : ERROR_MESSAGES.METHOD_NOT_ALLOWED;
    super(message, HTTP_STATUS.METHOD_NOT_ALLOWED, cause);
    this.allowedMethods = allowedMethods;
  }
}
