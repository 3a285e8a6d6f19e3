/**
 * ScoreEvaluator - Positional scoring for 2048 boards
 *
 * Rewards a descending "snake" of large tiles anchored in the bottom-right
 * corner, plus raw tile growth anywhere on the board. The search only uses
 * the total as a comparator between leaves.
 */

import type { Board, EvaluationWeights } from './types.js';
import { SNAKE_WEIGHT_BASE, TILE_WEIGHT_BASE } from './constants.js';
import { assertBoard } from './Board.js';

/**
 * Detailed breakdown of all scoring factors
 */
export type ScoreBreakdown = {
  total: number;
  snake: number[];     // Monotonic prefix of the traversal, corner first
  snakeScore: number;  // Sum of snakeBase^log2(v) over the snake
  tileScore: number;   // Sum of tileBase^log2(v) over every cell
};

export const DEFAULT_WEIGHTS: EvaluationWeights = {
  snakeBase: SNAKE_WEIGHT_BASE,
  tileBase: TILE_WEIGHT_BASE
};

function tileExponent(value: number): number {
  return Math.round(Math.log2(value));
}

/**
 * Boustrophedon walk over every cell, starting at the bottom-right corner:
 * bottom row right-to-left, next row up left-to-right, and so on.
 * Consecutive cells in the result are always grid-adjacent.
 */
export function snakeTraversal(board: Board): number[] {
  const path: number[] = [];
  const rows = board.length;

  for (let offset = 0; offset < rows; offset++) {
    const row = board[rows - 1 - offset];
    const ordered = offset % 2 === 0 ? [...row].reverse() : row;
    path.push(...ordered);
  }

  return path;
}

/**
 * Longest non-increasing prefix of the traversal. The corner cell always
 * belongs to it; the walk stops at the first increase.
 */
export function findSnakePath(board: Board): number[] {
  const path = snakeTraversal(board);
  const snake: number[] = [];
  let last = path[0];

  for (const value of path) {
    if (value > last) break;
    snake.push(value);
    last = value;
  }

  return snake;
}

/**
 * Evaluate a board under the corner-snake strategy
 *
 * @param weights - Exponent bases, defaulting to 4 (snake) and 3 (tiles)
 */
export function evaluateBoard(
  board: Board,
  weights: EvaluationWeights = DEFAULT_WEIGHTS
): ScoreBreakdown {
  const snake = findSnakePath(board);

  const snakeScore = snake.reduce(
    (sum, value) => sum + Math.pow(weights.snakeBase, tileExponent(value)),
    0
  );

  let tileScore = 0;
  for (const row of board) {
    for (const cell of row) {
      tileScore += Math.pow(weights.tileBase, tileExponent(cell));
    }
  }

  return {
    total: snakeScore + tileScore,
    snake,
    snakeScore,
    tileScore
  };
}

/**
 * Quick evaluation - returns just the total score
 */
export function evaluateBoardQuick(
  board: Board,
  weights: EvaluationWeights = DEFAULT_WEIGHTS
): number {
  return evaluateBoard(board, weights).total;
}

/**
 * Validated entry point for callers outside the search
 *
 * @throws InvalidBoardError when the board is malformed
 */
export function score(board: Board, weights: EvaluationWeights = DEFAULT_WEIGHTS): number {
  assertBoard(board);
  return evaluateBoardQuick(board, weights);
}
