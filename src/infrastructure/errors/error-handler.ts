import { HttpError, HandlerError } from './http-error.js';
import { MethodNotAllowedError } from './validation-error.js';
import { HTTP_STATUS, ERROR_MESSAGES } from '../../config/constants.js';
import { jsonResponse } from '../../utils/http.js';
import type { DispatchResponse } from '../../types/routing.js';

export interface ErrorResponseOptions {
  /** Include the underlying failure message in 500 responses */
  exposeErrors?: boolean;
}

/**
 * Type guard for HttpError
 */
export function isHttpError(error: unknown): error is HttpError {
  return error instanceof HttpError;
}

/**
 * Extracts an error message from an unknown error object
 * @param error - Error object
 * @param defaultMessage - Default message if extraction fails
 */
export function extractErrorMessage(error: unknown, defaultMessage: string = 'An error occurred'): string {
  if (!error) {
    return defaultMessage;
  }

  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return defaultMessage;
}

function internalErrorMessage(error: unknown, exposeErrors: boolean): string {
  if (!exposeErrors) {
    return ERROR_MESSAGES.INTERNAL_ERROR;
  }
  const detail = error instanceof HandlerError ? error.cause : error;
  return extractErrorMessage(detail, ERROR_MESSAGES.INTERNAL_ERROR);
}

/**
 * Maps any error raised while serving a request to a JSON error response.
 * Only 5xx details are subject to `exposeErrors`; client errors always carry
 * their message.
 */
export function toErrorResponse(error: unknown, options: ErrorResponseOptions = {}): DispatchResponse {
  const exposeErrors = options.exposeErrors ?? false;

  if (isHttpError(error) && error.statusCode < HTTP_STATUS.INTERNAL_SERVER_ERROR) {
    const response = jsonResponse(error.statusCode, { error: error.message });
    if (error instanceof MethodNotAllowedError && error.allowedMethods.length > 0) {
      response.headers['Allow'] = error.allowedMethods.join(', ');
    }
    return response;
  }

  const statusCode = isHttpError(error) ? error.statusCode : HTTP_STATUS.INTERNAL_SERVER_ERROR;
  return jsonResponse(statusCode, { error: internalErrorMessage(error, exposeErrors) });
}
