/**
 * Board - Construction, validation and comparison helpers
 *
 * Boards are treated as immutable values: helpers here never write into a
 * board they were given.
 */

import { z } from 'zod';
import type { Board } from './types.js';
import { BOARD_SIZE, EMPTY_CELL } from './constants.js';

/**
 * True for the empty sentinel (2^0) and any power of two >= 2
 */
export function isTileValue(value: number): boolean {
  return Number.isInteger(value) && value >= EMPTY_CELL && Number.isInteger(Math.log2(value));
}

const CellSchema = z
  .number()
  .int()
  .refine(isTileValue, { message: 'Cell must be 1 (empty) or a power of two >= 2' });

export const BoardSchema = z
  .array(z.array(CellSchema).length(BOARD_SIZE, { message: `Each row must have ${BOARD_SIZE} cells` }))
  .length(BOARD_SIZE, { message: `Board must have ${BOARD_SIZE} rows` });

/**
 * Raised at the entry boundary when a board is empty, ragged or holds
 * values that cannot appear on a 2048 grid.
 */
export class InvalidBoardError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid board: ${issues.join('; ')}`);
    this.name = 'InvalidBoardError';
    this.issues = issues;
  }
}

/**
 * Validate untrusted input (socket payloads, tool arguments, observations)
 */
export function parseBoard(input: unknown): Board {
  const result = BoardSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidBoardError(
      result.error.issues.map(issue =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }
  return result.data;
}

/**
 * Same checks as parseBoard, for values that are already typed as Board
 */
export function assertBoard(board: Board): void {
  parseBoard(board);
}

export function createEmptyBoard(size: number = BOARD_SIZE): Board {
  return Array.from({ length: size }, () => Array<number>(size).fill(EMPTY_CELL));
}

export function boardsEqual(a: Board, b: Board): boolean {
  if (a.length !== b.length) return false;
  return a.every((row, r) =>
    row.length === b[r].length && row.every((cell, c) => cell === b[r][c])
  );
}

export function isBoardEmpty(board: Board): boolean {
  return board.every(row => row.every(cell => cell === EMPTY_CELL));
}

export function getMaxTile(board: Board): number {
  let max = EMPTY_CELL;
  for (const row of board) {
    for (const cell of row) {
      max = Math.max(max, cell);
    }
  }
  return max;
}

/**
 * Fixed-width rendering for log output, empty cells shown as dots
 */
export function formatBoard(board: Board): string {
  const width = Math.max(...board.flat().map(cell => String(cell).length));
  return board
    .map(row => row.map(cell => (cell === EMPTY_CELL ? '.' : String(cell)).padStart(width)).join(' '))
    .join('\n');
}
