/**
 * MoveOrchestrator
 * Turns a strategy decision into an issued move and the resulting board
 */

import type { MoveStrategy } from './strategies/AIStrategy.js';
import type { AdvanceResult, Board, Move, SearchDirection } from '../game/types.js';
import { KEY_MAP, ROTATION_ORDER } from '../game/constants.js';
import { assertBoard, boardsEqual, createEmptyBoard } from '../game/Board.js';
import { applyDirection } from '../game/BoardTransformer.js';
import { logger } from '../logger.js';

/**
 * External collaborator that turns a move into a literal key press.
 * Fire-and-forget: the orchestrator never waits on or retries it.
 */
export interface InputInjector {
  press(move: Move, key: string): void;
}

export class MoveOrchestrator {
  private strategy: MoveStrategy;
  private injector: InputInjector;

  constructor(strategy: MoveStrategy, injector: InputInjector) {
    this.strategy = strategy;
    this.injector = injector;
  }

  /**
   * Decide, apply and issue one move.
   *
   * `undo` resets the board to all-empty so the next observation starts over.
   * A direction that leaves the board unchanged is replaced by the next one in
   * ROTATION_ORDER; after all three have been tried the last one is issued
   * as-is and the result is flagged as stuck.
   */
  advance(board: Board): AdvanceResult {
    assertBoard(board);

    const decision = this.strategy.getMove(board);
    logger.info(`🎯 ${this.strategy.name}: ${decision.reasoning}`);

    if (decision.move === 'undo') {
      this.issue('undo');
      return { board: createEmptyBoard(board.length), move: 'undo', attempts: [], stuck: false };
    }

    let move: SearchDirection = decision.move;
    let next = applyDirection(board, move);
    const attempts: SearchDirection[] = [move];

    while (boardsEqual(board, next) && attempts.length < ROTATION_ORDER.length) {
      const rotated = ROTATION_ORDER[(ROTATION_ORDER.indexOf(move) + 1) % ROTATION_ORDER.length];
      logger.info(`↪️ ${move} is a no-op, trying ${rotated}`);
      move = rotated;
      next = applyDirection(board, move);
      attempts.push(move);
    }

    const stuck = boardsEqual(board, next);
    if (stuck) {
      logger.warn(`⚠️ No direction changes the board, issuing ${move} anyway`);
    }

    this.issue(move);
    return { board: next, move, attempts, stuck };
  }

  private issue(move: Move): void {
    const key = KEY_MAP[move];
    logger.info(`⌨️ Pressing ${key} (${move})`);
    this.injector.press(move, key);
  }
}
