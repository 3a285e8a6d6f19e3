#!/usr/bin/env node
/**
 * Decision loop entry point
 * Boards arrive as JSON lines on stdin; key presses leave as JSON lines on stdout.
 */

import { loadConfig } from './config.js';
import { configureLogging, logger } from './logger.js';
import { LookaheadStrategy } from './ai/strategies/LookaheadStrategy.js';
import { MoveOrchestrator } from './ai/MoveOrchestrator.js';
import { GameLoopManager } from './game/GameLoopManager.js';
import { LineBoardObserver } from './game/LineBoardObserver.js';

const config = loadConfig();

// stdout is reserved for key presses
configureLogging({ enabled: config.loggingEnabled, stream: 'stderr' });

const strategy = new LookaheadStrategy({
  depth: config.lookaheadDepth,
  weights: config.weights,
  pivotThreshold: config.pivotThreshold
});

const orchestrator = new MoveOrchestrator(strategy, {
  press: (move, key) => {
    process.stdout.write(`${JSON.stringify({ move, key })}\n`);
  }
});

const observer = new LineBoardObserver(process.stdin);
const loop = new GameLoopManager(observer, orchestrator, {
  maxCycles: config.maxCycles,
  maxStuckCycles: config.maxStuckCycles,
  cycleDelayMs: config.cycleDelayMs
});

process.on('SIGINT', () => loop.stop());

loop.run()
  .then((summary) => {
    logger.info(`📊 Moves: ${JSON.stringify(summary.moves)}${summary.gameOver ? ' (game over)' : ''}`);
  })
  .catch((error) => {
    logger.error('❌ Decision loop failed:', error);
    process.exitCode = 1;
  })
  .finally(() => observer.close());
