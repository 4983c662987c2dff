import assert from 'node:assert/strict';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { describe, it, mock } from 'node:test';

import { createDispatcher } from '../core/dispatcher.js';
import { buildRouteRegistry } from '../core/route-registry.js';
import { MockIncomingMessage, MockServerResponse } from '../testing/http-doubles.js';
import type { RouteDescriptor } from '../types/routing.js';
import { createRequestListener } from './transport.js';

const routes: RouteDescriptor[] = [
  {
    method: 'GET',
    template: '/users/:id',
    handler: (path, query) => ({ id: path['id'] ?? null, active: query['active'] ?? null }),
  },
  {
    method: 'POST',
    template: '/echo',
    handler: (_path, _query, body) => body,
  },
];

function createLoggerStub() {
  return { info: mock.fn(), warn: mock.fn(), debug: mock.fn(), error: mock.fn() };
}

async function serve(
  req: MockIncomingMessage,
  res: MockServerResponse,
  options: Parameters<typeof createRequestListener>[1] = {},
): Promise<void> {
  const listener = createRequestListener(createDispatcher(buildRouteRegistry(routes)), options);
  await listener(req as unknown as IncomingMessage, res as unknown as ServerResponse);
}

describe('createRequestListener', () => {
  it('dispatches path and query parameters', async () => {
    const req = new MockIncomingMessage('GET', '/users/42?active=true').send();
    const res = new MockServerResponse();

    await serve(req, res);

    assert.equal(res.statusCode, 200);
    assert.equal(res.getHeader('content-type'), 'application/json; charset=utf-8');
    assert.equal(res.body, '{"id":"42","active":"true"}');
  });

  it('forwards the request body', async () => {
    const req = new MockIncomingMessage('post', '/echo').send('{"name":"test"}');
    const res = new MockServerResponse();

    await serve(req, res);

    assert.equal(res.statusCode, 200);
    assert.equal(res.body, '{"name":"test"}');
  });

  it('answers 405 with an Allow header', async () => {
    const req = new MockIncomingMessage('DELETE', '/echo').send();
    const res = new MockServerResponse();

    await serve(req, res);

    assert.equal(res.statusCode, 405);
    assert.equal(res.getHeader('allow'), 'POST');
  });

  it('answers 400 for malformed bodies', async () => {
    const req = new MockIncomingMessage('POST', '/echo').send('{broken');
    const res = new MockServerResponse();

    await serve(req, res);

    assert.equal(res.statusCode, 400);
    assert.equal(res.body, '{"error":"Invalid JSON payload"}');
  });

  it('rejects oversized bodies and closes the connection', async () => {
    const req = new MockIncomingMessage('POST', '/echo').send('{"name":"too long"}');
    const res = new MockServerResponse();

    await serve(req, res, { maxBodySize: 8 });

    assert.equal(res.statusCode, 413);
    assert.equal(res.getHeader('connection'), 'close');
    assert.equal(res.body, '{"error":"Request body exceeds 8 bytes"}');
  });

  it('logs one debug line per request', async () => {
    const logger = createLoggerStub();
    const req = new MockIncomingMessage('GET', '/missing').send();
    const res = new MockServerResponse();

    await serve(req, res, { logger });

    assert.equal(res.statusCode, 404);
    assert.equal(logger.debug.mock.calls.length, 1);
    assert.match(String(logger.debug.mock.calls[0]?.arguments[0]), /^GET \/missing 404 \d+ms$/);
  });

  it('discards the response when the client has gone away', async () => {
    const logger = createLoggerStub();
    const req = new MockIncomingMessage('GET', '/users/7').send();
    const res = new MockServerResponse();
    res.destroyed = true;

    await serve(req, res, { logger });

    assert.equal(res.statusCode, 0);
    assert.equal(res.body, '');
    assert.equal(
      logger.debug.mock.calls[0]?.arguments[0],
      'GET /users/7 client went away; discarding 200 response',
    );
  });

  it('logs and answers 500 when the request stream fails', async () => {
    const logger = createLoggerStub();
    const req = new MockIncomingMessage('POST', '/echo');
    const res = new MockServerResponse();

    const pending = serve(req, res, { logger });
    req.emit('error', new Error('socket reset'));
    await pending;

    assert.equal(res.statusCode, 500);
    assert.equal(res.body, '{"error":"Internal server error"}');
    assert.equal(logger.error.mock.calls[0]?.arguments[0], 'POST /echo aborted:');
  });
});
