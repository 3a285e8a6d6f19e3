/**
 * GameLoopManager
 * Runs observe → decide → issue cycles until the game stalls or a limit is hit
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { Board, DecisionMove } from './types.js';
import { CYCLE_DELAY_MS, MAX_CYCLES, MAX_STUCK_CYCLES } from './constants.js';
import { createEmptyBoard, formatBoard, getMaxTile, isBoardEmpty, parseBoard } from './Board.js';
import { MoveOrchestrator } from '../ai/MoveOrchestrator.js';
import { logger } from '../logger.js';

/**
 * External perception collaborator (screen capture + tile recognition).
 * Receives the board the engine expects to see; its empty cells are the
 * ones that must be read from the screen again. Resolves null once no
 * further observations will arrive.
 */
export interface BoardObserver {
  observe(previous: Board): Promise<Board | null>;
  // Releases the source; a pending observe() must then resolve null
  close?(): void;
}

export type GameLoopOptions = {
  maxCycles: number;
  maxStuckCycles: number;
  cycleDelayMs: number;
};

export type GameLoopSummary = {
  cycles: number;
  moves: Record<DecisionMove, number>;
  gameOver: boolean;
  stuckCycles: number; // Consecutive stuck cycles at the end of the run
  maxTile: number;
  finalBoard: Board;
};

const DEFAULT_OPTIONS: GameLoopOptions = {
  maxCycles: MAX_CYCLES,
  maxStuckCycles: MAX_STUCK_CYCLES,
  cycleDelayMs: CYCLE_DELAY_MS
};

export class GameLoopManager {
  private observer: BoardObserver;
  private orchestrator: MoveOrchestrator;
  private options: GameLoopOptions;
  private running = false;
  private stopRequested = false;

  constructor(
    observer: BoardObserver,
    orchestrator: MoveOrchestrator,
    options: Partial<GameLoopOptions> = {}
  ) {
    this.observer = observer;
    this.orchestrator = orchestrator;
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Ask a running loop to finish after its current cycle. Closes the
   * observer so a loop waiting for the next board returns as well.
   */
  stop(): void {
    if (this.running) {
      logger.info('🛑 Stop requested, finishing current cycle');
      this.stopRequested = true;
      this.observer.close?.();
    }
  }

  /**
   * Run cycles starting from `initial` (an all-empty board means the first
   * observation reads every cell).
   *
   * @throws InvalidBoardError when the observer returns a malformed board
   */
  async run(initial: Board = createEmptyBoard()): Promise<GameLoopSummary> {
    if (this.running) {
      throw new Error('Game loop is already running');
    }

    this.running = true;
    this.stopRequested = false;

    const moves: Record<DecisionMove, number> = { down: 0, left: 0, right: 0, undo: 0 };
    let board = initial;
    let cycles = 0;
    let stuckCycles = 0;
    let gameOver = false;

    logger.info(`🎮 Starting decision loop (max ${this.options.maxCycles} cycles)`);

    try {
      while (cycles < this.options.maxCycles && !this.stopRequested) {
        if (this.options.cycleDelayMs > 0) {
          await sleep(this.options.cycleDelayMs);
        }

        if (isBoardEmpty(board)) {
          logger.info('🔍 Board reset - full observation required');
        }
        const observation = await this.observer.observe(board);
        if (observation === null) {
          logger.info('📭 Observer has no more boards');
          break;
        }

        const observed = parseBoard(observation);
        logger.info(`📋 Cycle ${cycles + 1} board:\n${formatBoard(observed)}`);

        const result = this.orchestrator.advance(observed);
        cycles++;
        moves[result.move]++;
        board = result.board;

        stuckCycles = result.stuck ? stuckCycles + 1 : 0;
        if (stuckCycles >= this.options.maxStuckCycles) {
          gameOver = true;
          logger.info(`🏁 Board stuck for ${stuckCycles} cycles - game over`);
          break;
        }
      }
    } finally {
      this.running = false;
      this.stopRequested = false;
    }

    const summary: GameLoopSummary = {
      cycles,
      moves,
      gameOver,
      stuckCycles,
      maxTile: getMaxTile(board),
      finalBoard: board
    };

    logger.info(`✅ Decision loop finished after ${cycles} cycles (max tile ${summary.maxTile})`);
    return summary;
  }
}
