export const DEFAULT_HOST = '0.0.0.0';
export const DEFAULT_PORT = 3414;
export const DEFAULT_LOG_LEVEL = 'info';
export const MAX_REQUEST_BODY_SIZE = 1024 * 1024;
export const LOG_SCOPE = 'declaroute';

export const JSON_CONTENT_TYPE = 'application/json; charset=utf-8';

/** HTTP Status Codes */
export const HTTP_STATUS = {
  OK: 200,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  METHOD_NOT_ALLOWED: 405,
  PAYLOAD_TOO_LARGE: 413,
  INTERNAL_SERVER_ERROR: 500,
} as const;

/** Common error messages */
export const ERROR_MESSAGES = {
  INTERNAL_ERROR: 'Internal server error',
  INVALID_PAYLOAD: 'Invalid JSON payload',
  METHOD_NOT_ALLOWED: 'Method not allowed',
} as const;
