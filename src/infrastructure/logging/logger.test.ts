import assert from 'node:assert/strict';
import { describe, it, mock } from 'node:test';

import { createConsoleLogger, createLogger, createSilentLogger, isLogLevel } from './logger.js';

describe('logger', () => {
  it('delegates to provided implementation when methods exist', () => {
    const provided = {
      info: mock.fn(),
      error: mock.fn(),
      warn: mock.fn(),
      debug: mock.fn(),
    };
    const logger = createLogger(provided);

    logger.info('info');
    logger.error('error', { detail: true });
    logger.warn('warn');
    logger.debug('debug');

    assert.equal(provided.info.mock.calls.length, 1);
    assert.equal(provided.error.mock.calls.length, 1);
    assert.equal(provided.warn.mock.calls.length, 1);
    assert.equal(provided.debug.mock.calls.length, 1);
  });

  it('falls back to console when methods are missing', () => {
    const infoMock = mock.method(console, 'info', () => {});
    const errorMock = mock.method(console, 'error', () => {});
    const warnMock = mock.method(console, 'warn', () => {});
    const debugMock = mock.method(console, 'debug', () => {});

    try {
      const logger = createLogger({});
      logger.info('info');
      logger.error('error');
      logger.warn('warn');
      logger.debug('debug');

      assert.equal(infoMock.mock.calls.length, 1);
      assert.equal(errorMock.mock.calls.length, 1);
      assert.equal(warnMock.mock.calls.length, 1);
      assert.equal(debugMock.mock.calls.length, 1);
    } finally {
      infoMock.mock.restore();
      errorMock.mock.restore();
      warnMock.mock.restore();
      debugMock.mock.restore();
    }
  });

  it('createConsoleLogger produces console-backed logger', () => {
    const infoMock = mock.method(console, 'info', () => {});
    try {
      const logger = createConsoleLogger();
      logger.info('message');
      assert.equal(infoMock.mock.calls.length, 1);
    } finally {
      infoMock.mock.restore();
    }
  });
});


describe('logger options', () => {
  it('drops messages below the configured level', () => {
    const provided = { info: mock.fn(), error: mock.fn(), warn: mock.fn(), debug: mock.fn() };
    const logger = createLogger(provided, { level: 'warn' });

    logger.debug('debug');
    logger.info('info');
    logger.warn('warn');
    logger.error('error');

    assert.equal(provided.debug.mock.calls.length, 0);
    assert.equal(provided.info.mock.calls.length, 0);
    assert.equal(provided.warn.mock.calls.length, 1);
    assert.equal(provided.error.mock.calls.length, 1);
  });

  it('prefixes messages with the scope', () => {
    const provided = { info: mock.fn() };
    const logger = createLogger(provided, { scope: 'routes' });

    logger.info('Listening', 3414);

    assert.deepEqual(provided.info.mock.calls[0]?.arguments, ['[routes]', 'Listening', 3414]);
  });

  it('createSilentLogger never writes', () => {
    const errorMock = mock.method(console, 'error', () => {});
    try {
      createSilentLogger().error('ignored');
      assert.equal(errorMock.mock.calls.length, 0);
    } finally {
      errorMock.mock.restore();
    }
  });

  it('isLogLevel accepts known levels only', () => {
    assert.equal(isLogLevel('warn'), true);
    assert.equal(isLogLevel('silent'), true);
    assert.equal(isLogLevel('verbose'), false);
    assert.equal(isLogLevel(3), false);
  });
});
