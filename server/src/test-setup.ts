/**
 * Test runner setup (preloaded by `npm test`)
 * Node 20's test runner reads its results from each test process's stdout,
 * and log lines written there can corrupt that stream. Route logs to stderr.
 */

import { configureLogging } from './logger.js';

configureLogging({ stream: 'stderr' });
