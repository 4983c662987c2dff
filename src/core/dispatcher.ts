import { matchTemplate } from './path-template.js';
import { HTTP_STATUS } from '../config/constants.js';
import {
  HandlerError,
  MethodNotAllowedError,
  RouteNotFoundError,
  isHttpError,
  toErrorResponse,
} from '../infrastructure/errors/index.js';
import { createSilentLogger } from '../infrastructure/logging/logger.js';
import type { Logger } from '../infrastructure/logging/logger.js';
import { decodeJsonBody, jsonResponse, parseQueryString } from '../utils/http.js';
import type {
  DispatchRequest,
  DispatchResponse,
  GenericValue,
  HandlerResult,
  ParamMap,
  RouteEntry,
  RouteRegistry,
} from '../types/routing.js';

export interface DispatcherOptions {
  logger?: Logger;
  /** Include handler failure details in 500 bodies (default: false) */
  exposeErrors?: boolean;
}

export interface RouteMatch {
  entry: RouteEntry;
  params: ParamMap;
}

export interface Dispatcher {
  readonly registry: RouteRegistry;
  /** Finds the entry serving `method` + `path` without invoking it */
  resolve(method: string, path: string): RouteMatch;
  /** Never rejects: every failure is mapped to an error response */
  dispatch(request: DispatchRequest): Promise<DispatchResponse>;
}

function findMatch(entries: readonly RouteEntry[], path: string): RouteMatch | null {
  for (const entry of entries) {
    const params = matchTemplate(entry.compiled, path);
    if (params) {
      return { entry, params };
    }
  }
  return null;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function createDispatcher(registry: RouteRegistry, options: DispatcherOptions = {}): Dispatcher {
  const logger = options.logger ?? createSilentLogger();
  const exposeErrors = options.exposeErrors ?? false;

  function resolve(method: string, path: string): RouteMatch {
    const normalized = method.toUpperCase();
    const hit = findMatch(registry.entriesFor(normalized), path);
    if (hit) {
      return hit;
    }

    const allowed = registry.methods.filter(
      (other) => other !== normalized && findMatch(registry.entriesFor(other), path) !== null,
    );
    if (allowed.length > 0) {
      throw new MethodNotAllowedError(allowed);
    }
    throw new RouteNotFoundError(path);
  }

  async function invoke(entry: RouteEntry, path: ParamMap, query: ParamMap, body: GenericValue): Promise<DispatchResponse> {
    let result: HandlerResult;
    try {
      result = await entry.handler(path, query, body);
    } catch (error) {
      if (isHttpError(error)) {
        throw error;
      }
      throw new HandlerError(entry.template, toError(error));
    }

    try {
      return jsonResponse(HTTP_STATUS.OK, result ?? null);
    } catch (error) {
      throw new HandlerError(entry.template, toError(error));
    }
  }

  async function dispatch(request: DispatchRequest): Promise<DispatchResponse> {
    try {
      const { entry, params } = resolve(request.method, request.path);
      const query = parseQueryString(request.query);
      const body = decodeJsonBody(request.body);
      return await invoke(entry, params, query, body);
    } catch (error) {
      if (!isHttpError(error) || error.statusCode >= HTTP_STATUS.INTERNAL_SERVER_ERROR) {
        logger.error(`${request.method} ${request.path} failed:`, error instanceof HandlerError ? error.cause : error);
      }
      return toErrorResponse(error, { exposeErrors });
    }
  }

  return { registry, resolve, dispatch };
}
