/**
 * PivotChecker
 * Enforces placement of the largest tiles along the corner snake
 *
 * Rank k of the sorted tiles (every BOARD_SIZE-th value, largest first) is a
 * pivot: it must sit at the end of row (rows - 1 - k) where the snake turns.
 * Even ranks turn at the right edge, odd ranks at the left edge. When the
 * previous pivot is seated but the current one is not, the search is skipped
 * and a corrective move is forced.
 */

import type { Board, DecisionMove } from '../game/types.js';
import { EMPTY_CELL, PIVOT_THRESHOLD } from '../game/constants.js';
import { assertBoard } from '../game/Board.js';

/**
 * Find the first occupied cell scanning a row from one edge and decide
 * whether sliding toward that edge would seat the expected pivot.
 * Returns null when the row holds no tiles at all.
 */
function correctiveMove(
  row: readonly number[],
  expected: number,
  edge: 'left' | 'right'
): DecisionMove | null {
  const scan = edge === 'right' ? [...row].reverse() : row;
  const first = scan.find(cell => cell !== EMPTY_CELL);

  if (first === undefined) return null;
  return first === expected ? edge : 'undo';
}

/**
 * Forced move for the current board, or null when the pivots are in order
 * (or every remaining pivot is at or below the threshold).
 */
export function findPivotMove(board: Board, threshold: number = PIVOT_THRESHOLD): DecisionMove | null {
  const rows = board.length;
  const cols = board[0].length;
  const ranked = board.flat().sort((a, b) => b - a);

  for (let rank = 0; rank < rows; rank++) {
    const row = rows - 1 - rank;
    const pivotIndex = rank * cols;
    const expected = ranked[pivotIndex];

    if (expected <= threshold) return null;

    const edgeCol = rank % 2 === 0 ? cols - 1 : 0;
    const previousSeated =
      rank === 0 || board[row + 1][edgeCol] === ranked[pivotIndex - 1];

    if (board[row][edgeCol] !== expected && previousSeated) {
      const move = correctiveMove(board[row], expected, rank % 2 === 0 ? 'right' : 'left');
      if (move) return move;
      // Empty row: nothing to slide, keep checking the next pivot
    }
  }

  return null;
}

/**
 * Validated entry point
 *
 * @throws InvalidBoardError when the board is malformed
 */
export function checkPivots(board: Board, threshold: number = PIVOT_THRESHOLD): DecisionMove | null {
  assertBoard(board);
  return findPivotMove(board, threshold);
}
