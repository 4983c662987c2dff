import assert from 'node:assert/strict';
import { describe, it, mock } from 'node:test';

import {
  warnConfig,
  validatePort,
  validateString,
  validateLogLevel,
  validateBoolean,
  validatePositiveInteger,
  validateStringList,
  pickFirst,
} from './validation.js';

function captureStderr<T>(fn: () => T): { result: T; messages: string[] } {
  const messages: string[] = [];
  const stderrMock = mock.method(process.stderr, 'write', (chunk: string | Uint8Array) => {
    messages.push(typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8'));
    return true;
  });
  try {
    return { result: fn(), messages };
  } finally {
    stderrMock.mock.restore();
  }
}

describe('CLI validation helpers', () => {
  it('warnConfig writes a scoped line to stderr', () => {
    const { messages } = captureStderr(() => warnConfig('Test message'));
    assert.deepEqual(messages, ['[declaroute] Test message\n']);
  });

  it('validates port values and warns on invalid input', () => {
    const { messages } = captureStderr(() => {
      assert.equal(validatePort('8080', 'port', 'config.json'), 8080);
      assert.equal(validatePort(65535, 'port', 'config.json'), 65535);
      assert.equal(validatePort(undefined, 'port', 'config.json'), undefined);
      assert.equal(validatePort(null, 'port', 'config.json'), undefined);
      assert.equal(validatePort('invalid', 'port', 'config.json'), undefined);
      assert.equal(validatePort(0, 'port', 'config.json'), undefined);
    });

    assert.equal(messages.length, 2);
    assert.equal(
      messages[0],
      '[declaroute] Ignoring invalid port in config.json; expected port between 1-65535.\n',
    );
  });

  it('validates strings and trims whitespace', () => {
    const { result } = captureStderr(() => [
      validateString('  value  ', 'field', 'config'),
      validateString(undefined, 'field', 'config'),
      validateString('', 'field', 'config'),
      validateString(12, 'field', 'config'),
    ]);
    assert.deepEqual(result, ['value', undefined, undefined, undefined]);
  });

  it('validates log levels case-insensitively', () => {
    const { result, messages } = captureStderr(() => [
      validateLogLevel('DEBUG', 'logLevel', 'config'),
      validateLogLevel('verbose', 'logLevel', 'config'),
    ]);
    assert.deepEqual(result, ['debug', undefined]);
    assert.equal(
      messages[0],
      '[declaroute] Ignoring invalid logLevel in config; expected one of debug, info, warn, error, silent.\n',
    );
  });

  it('validates booleans from booleans and strings', () => {
    const { result } = captureStderr(() => [
      validateBoolean(true, 'exposeErrors', 'config'),
      validateBoolean(' FALSE ', 'exposeErrors', 'config'),
      validateBoolean('yes', 'exposeErrors', 'config'),
      validateBoolean(undefined, 'exposeErrors', 'config'),
    ]);
    assert.deepEqual(result, [true, false, undefined, undefined]);
  });

  it('validates positive integers', () => {
    const { result } = captureStderr(() => [
      validatePositiveInteger(1024, 'maxBodySize', 'config'),
      validatePositiveInteger('2048', 'maxBodySize', 'config'),
      validatePositiveInteger(0, 'maxBodySize', 'config'),
      validatePositiveInteger(1.5, 'maxBodySize', 'config'),
      validatePositiveInteger('abc', 'maxBodySize', 'config'),
    ]);
    assert.deepEqual(result, [1024, 2048, undefined, undefined, undefined]);
  });

  it('validates string lists and drops bad entries', () => {
    const { result, messages } = captureStderr(() => [
      validateStringList('./routes.js', 'routes', 'config'),
      validateStringList(['./a.js', 3, ' ./b.js '], 'routes', 'config'),
      validateStringList([], 'routes', 'config'),
    ]);
    assert.deepEqual(result, [['./routes.js'], ['./a.js', './b.js'], undefined]);
    assert.equal(messages[0], '[declaroute] Ignoring non-string routes[1] in config.\n');
  });

  it('pickFirst returns the first valid value', () => {
    const { result } = captureStderr(() =>
      pickFirst(
        [
          { value: undefined, name: 'port' },
          { value: 'bad', name: 'server.port' },
          { value: 4000, name: 'fallback.port' },
        ],
        validatePort,
        'config',
      ),
    );
    assert.equal(result, 4000);
  });
});
