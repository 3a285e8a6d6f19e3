/**
 * MoveStrategy Interface
 * Defines the contract for all move-selection strategies
 */

import type { Board, MoveDecision } from '../../game/types.js';

export interface MoveStrategy {
  readonly name: string;
  readonly version: string;
  readonly description: string;

  /**
   * Decide the next move for the given board.
   * Synchronous: a decision completes before the next board is accepted.
   */
  getMove(board: Board): MoveDecision;
}
