import assert from 'node:assert/strict';
import { describe, it, mock } from 'node:test';

import { buildRouteRegistry, RouteRegistryBuilder } from './route-registry.js';
import { matchTemplate } from './path-template.js';
import { InvalidTemplateError, RegistryBuildError, RegistryFrozenError } from '../infrastructure/errors/index.js';
import type { HttpMethod, RouteDescriptor, RouteRegistry } from '../types/routing.js';

const noop = () => null;

function route(method: HttpMethod, template: string): RouteDescriptor {
  return { method, template, handler: noop };
}

function firstMatch(registry: RouteRegistry, method: string, path: string): string | null {
  const entry = registry.entriesFor(method).find((candidate) => matchTemplate(candidate.compiled, path));
  return entry ? entry.template : null;
}

describe('buildRouteRegistry', () => {
  it('groups entries by method and orders them by descending specificity', () => {
    const registry = buildRouteRegistry([
      route('GET', '/users/:id'),
      route('POST', '/users'),
      route('GET', '/users/new'),
      route('GET', '/:section/:id'),
    ]);

    assert.deepEqual(
      registry.entriesFor('GET').map((entry) => [entry.template, entry.specificity]),
      [
        ['/users/new', 2],
        ['/users/:id', 1],
        ['/:section/:id', 0],
      ],
    );
    assert.deepEqual(registry.entriesFor('POST').map((entry) => entry.template), ['/users']);
    assert.deepEqual(registry.methods, ['GET', 'POST']);
  });

  it('keeps registration order among equally specific entries', () => {
    const registry = buildRouteRegistry([
      route('GET', '/a/:x'),
      route('GET', '/:y/b'),
    ]);

    assert.deepEqual(registry.entriesFor('GET').map((entry) => entry.order), [0, 1]);
    assert.equal(firstMatch(registry, 'GET', '/a/b'), '/a/:x');
  });

  it('looks methods up case-insensitively and returns an empty list for unknown methods', () => {
    const registry = buildRouteRegistry([route('GET', '/')]);
    assert.equal(registry.entriesFor('get').length, 1);
    assert.deepEqual(registry.entriesFor('DELETE'), []);
  });

  it('keeps duplicate templates with the earliest registration winning', () => {
    const first = () => 'first';
    const second = () => 'second';
    const warn = mock.fn();
    const registry = buildRouteRegistry(
      [
        { method: 'GET', template: '/users/:id', handler: first },
        { method: 'GET', template: '/users/:userId', handler: second },
      ],
      { logger: { info: mock.fn(), error: mock.fn(), warn, debug: mock.fn() } },
    );

    const entries = registry.entriesFor('GET');
    assert.equal(entries.length, 2);
    assert.equal(entries[0]?.handler, first);
    assert.equal(warn.mock.calls.length, 1);
    assert.equal(
      warn.mock.calls[0]?.arguments[0],
      'Route GET /users/:userId is shadowed by GET /users/:id and will never match',
    );
  });

  it('fails the whole build with the offending template named', () => {
    assert.throws(
      () => buildRouteRegistry([route('GET', '/ok'), route('POST', '/items/:')]),
      (error: unknown) => {
        assert.ok(error instanceof RegistryBuildError);
        assert.equal(error.method, 'POST');
        assert.equal(error.template, '/items/:');
        assert.ok(error.cause instanceof InvalidTemplateError);
        assert.equal(error.message, 'Failed to register POST /items/:: Invalid route template "/items/:": empty parameter name');
        return true;
      },
    );
  });

  it('is idempotent for the same descriptor sequence', () => {
    const descriptors = [
      route('GET', '/users/:id'),
      route('GET', '/users/new'),
      route('PUT', '/users/:id'),
    ];
    const a = buildRouteRegistry(descriptors);
    const b = buildRouteRegistry(descriptors);

    const summary = (registry: RouteRegistry) =>
      registry.entries().map((entry) => `${entry.method} ${entry.template} ${entry.specificity}`);
    assert.deepEqual(summary(a), summary(b));
    for (const path of ['/users/new', '/users/7', '/users']) {
      assert.equal(firstMatch(a, 'GET', path), firstMatch(b, 'GET', path));
    }
  });

  it('produces a frozen registry', () => {
    const registry = buildRouteRegistry([route('GET', '/users/:id')]);
    assert.ok(Object.isFrozen(registry));
    assert.ok(Object.isFrozen(registry.entriesFor('GET')));
    assert.ok(Object.isFrozen(registry.entriesFor('GET')[0]));
  });
});

describe('RouteRegistryBuilder', () => {
  it('rejects registrations once frozen', () => {
    const builder = new RouteRegistryBuilder();
    builder.add(route('GET', '/health'));
    const registry = builder.freeze();

    assert.equal(builder.frozen, true);
    assert.throws(() => builder.add(route('GET', '/late')), RegistryFrozenError);
    assert.equal(builder.freeze(), registry);
    assert.deepEqual(registry.entries().map((entry) => entry.template), ['/health']);
  });

  it('snapshots descriptors without exposing internal state', () => {
    const builder = new RouteRegistryBuilder();
    builder.add(route('GET', '/a'));
    const snapshot = builder.snapshot();
    builder.add(route('GET', '/b'));

    assert.equal(snapshot.length, 1);
    assert.equal(builder.snapshot().length, 2);
  });
});
