/**
 * Logger switch tests
 */

import { test, mock } from 'node:test';
import assert from 'node:assert/strict';
import { configureLogging, isLoggingEnabled, logger } from './logger.js';

test('logger - disabled logging silences info but not errors', () => {
  const log = mock.method(console, 'log', () => {});
  const error = mock.method(console, 'error', () => {});

  try {
    configureLogging({ enabled: false });
    assert.equal(isLoggingEnabled(), false);

    logger.info('hidden');
    logger.error('shown');

    assert.equal(log.mock.callCount(), 0);
    assert.equal(error.mock.callCount(), 1);
  } finally {
    configureLogging({ enabled: true, stream: 'stdout' });
    log.mock.restore();
    error.mock.restore();
  }
});

test('logger - stderr stream routes info to console.error', () => {
  const log = mock.method(console, 'log', () => {});
  const error = mock.method(console, 'error', () => {});

  try {
    configureLogging({ enabled: true, stream: 'stderr' });
    logger.info('to stderr');

    assert.equal(log.mock.callCount(), 0);
    assert.deepEqual(error.mock.calls[0].arguments, ['to stderr']);
  } finally {
    configureLogging({ enabled: true, stream: 'stdout' });
    log.mock.restore();
    error.mock.restore();
  }
});
