import type { IncomingMessage, ServerResponse } from 'node:http';
import { HTTP_STATUS, MAX_REQUEST_BODY_SIZE } from '../config/constants.js';
import type { Dispatcher } from '../core/dispatcher.js';
import { isHttpError, toErrorResponse } from '../infrastructure/errors/index.js';
import { createSilentLogger } from '../infrastructure/logging/logger.js';
import type { Logger } from '../infrastructure/logging/logger.js';
import { readRawBody, sendResponse, splitRequestTarget } from '../utils/http.js';
import type { DispatchResponse } from '../types/routing.js';

export interface RequestListenerOptions {
  logger?: Logger;
  maxBodySize?: number;
  exposeErrors?: boolean;
}

export type RequestListener = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

function isClosed(res: ServerResponse): boolean {
  return res.writableEnded || res.destroyed;
}

/**
 * Adapts a dispatcher to node:http. The returned listener never rejects.
 */
export function createRequestListener(
  dispatcher: Dispatcher,
  options: RequestListenerOptions = {},
): RequestListener {
  const logger = options.logger ?? createSilentLogger();
  const maxBodySize = options.maxBodySize ?? MAX_REQUEST_BODY_SIZE;
  const exposeErrors = options.exposeErrors ?? false;

  return async function handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const startedAt = Date.now();
    const method = (req.method || 'GET').toUpperCase();
    const { path, query } = splitRequestTarget(req.url);

    let response: DispatchResponse;
    try {
      const body = await readRawBody(req, maxBodySize);
      response = await dispatcher.dispatch({ method, path, query, body });
    } catch (error) {
      if (!isHttpError(error)) {
        logger.error(`${method} ${path} aborted:`, error);
      }
      response = toErrorResponse(error, { exposeErrors });
      if (isHttpError(error) && error.statusCode === HTTP_STATUS.PAYLOAD_TOO_LARGE) {
        response.headers['Connection'] = 'close';
      }
    }

    // The handler still ran to completion; its result has nowhere to go.
    if (isClosed(res)) {
      logger.debug(`${method} ${path} client went away; discarding ${response.statusCode} response`);
      return;
    }

    sendResponse(res, response);
    logger.debug(`${method} ${path} ${response.statusCode} ${Date.now() - startedAt}ms`);
  };
}
