import type { IncomingMessage, ServerResponse } from 'node:http';
import { JSON_CONTENT_TYPE, MAX_REQUEST_BODY_SIZE } from '../config/constants.js';
import { MalformedBodyError, PayloadTooLargeError } from '../infrastructure/errors/index.js';
import type { DispatchResponse, GenericValue, ParamMap } from '../types/routing.js';

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

export interface RequestTarget {
  path: string;
  query: string;
}

/**
 * Builds a JSON response; throws when the payload cannot be encoded
 * (BigInt, circular structures).
 */
export function jsonResponse(statusCode: number, payload: GenericValue | undefined): DispatchResponse {
  // JSON.stringify yields undefined for a bare undefined, function or symbol
  const body = JSON.stringify(payload) ?? 'null';
  return {
    statusCode,
    headers: {
      'Content-Type': JSON_CONTENT_TYPE,
      'Cache-Control': 'no-store',
    },
    body,
  };
}

export function sendResponse(res: ServerResponse, response: DispatchResponse): void {
  res.statusCode = response.statusCode;
  for (const [name, value] of Object.entries(response.headers)) {
    res.setHeader(name, value);
  }
  res.end(response.body);
}

/**
 * Splits a request target (`/users/42?active=true`) into path and raw query
 * at the first `?`. Any fragment is discarded.
 */
export function splitRequestTarget(target: string | undefined): RequestTarget {
  const raw = target || '/';
  const hashIndex = raw.indexOf('#');
  const withoutHash = hashIndex === -1 ? raw : raw.slice(0, hashIndex);
  const queryIndex = withoutHash.indexOf('?');
  if (queryIndex === -1) {
    return { path: withoutHash || '/', query: '' };
  }
  return {
    path: withoutHash.slice(0, queryIndex) || '/',
    query: withoutHash.slice(queryIndex + 1),
  };
}

/**
 * Decodes a `&`-separated `key=value` query string into a flat map. Values stay
 * strings; a repeated key keeps its last value.
 */
export function parseQueryString(raw: string | undefined): ParamMap {
  if (!raw) {
    return {};
  }
  const source = raw.startsWith('?') ? raw.slice(1) : raw;
  return Object.fromEntries(new URLSearchParams(source));
}

/**
 * Decodes a raw request body. Empty bodies decode to null.
 * @throws {MalformedBodyError} when the body is not valid UTF-8 JSON
 */
export function decodeJsonBody(raw: Buffer | string | undefined): GenericValue {
  if (raw === undefined || raw.length === 0) {
    return null;
  }

  try {
    const text = typeof raw === 'string' ? raw : utf8Decoder.decode(raw);
    // JSON.parse only ever yields null, booleans, numbers, strings, arrays and plain objects
    const decoded: GenericValue = JSON.parse(text);
    return decoded;
  } catch (error) {
    throw new MalformedBodyError(undefined, error instanceof Error ? error : null);
  }
}

export async function readRawBody(
  req: IncomingMessage,
  limit: number = MAX_REQUEST_BODY_SIZE,
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let length = 0;
    let settled = false;

    req.on('data', (chunk: Buffer) => {
      if (settled) {
        return;
      }
      chunks.push(chunk);
      length += chunk.length;

      if (length > limit) {
        settled = true;
        reject(new PayloadTooLargeError(limit));
      }
    });

    req.on('end', () => {
      if (settled) {
        return;
      }
      settled = true;
      resolve(Buffer.concat(chunks));
    });

    req.on('error', (error: Error) => {
      if (settled) {
        return;
      }
      settled = true;
      reject(error);
    });
  });
}
