/**
 * BoardTransformer
 * Slides and merges tiles for a single direction
 *
 * Every direction reduces to the same line operation: lines are read starting
 * at the edge the tiles travel toward, slid, then written back in place.
 */

import type { Board, SearchDirection } from './types.js';
import { EMPTY_CELL } from './constants.js';
import { assertBoard } from './Board.js';

/**
 * Push occupied cells toward index 0, padding the tail with sentinels
 */
function compact(line: readonly number[]): number[] {
  const tiles = line.filter(cell => cell !== EMPTY_CELL);
  return [...tiles, ...Array<number>(line.length - tiles.length).fill(EMPTY_CELL)];
}

/**
 * Slide one line toward index 0.
 *
 * Pairs merge at most once per call: a merged cell is skipped over, so
 * [2, 2, 2, 2] becomes [4, 4, 1, 1] and never [8, 1, 1, 1].
 */
export function slideLine(line: readonly number[]): number[] {
  const cells = compact(line);

  for (let i = 0; i < cells.length - 1; i++) {
    if (cells[i] !== EMPTY_CELL && cells[i] === cells[i + 1]) {
      cells[i] *= 2;
      cells[i + 1] = EMPTY_CELL;
      i++; // Merged cell is done for this move
    }
  }

  return compact(cells);
}

function slideLeft(board: Board): Board {
  return board.map(row => slideLine(row));
}

function slideRight(board: Board): Board {
  return board.map(row => slideLine([...row].reverse()).reverse());
}

function slideDown(board: Board): Board {
  const rows = board.length;
  const cols = board[0].length;
  const result: number[][] = Array.from({ length: rows }, () => Array<number>(cols).fill(EMPTY_CELL));

  for (let col = 0; col < cols; col++) {
    // Bottom cell first so tiles travel toward index 0 of the line
    const column: number[] = [];
    for (let row = rows - 1; row >= 0; row--) {
      column.push(board[row][col]);
    }

    const slid = slideLine(column);
    slid.forEach((cell, i) => {
      result[rows - 1 - i][col] = cell;
    });
  }

  return result;
}

/**
 * Unchecked transform used inside the search, where every board was produced
 * by this module and is already known to be well formed.
 */
export function applyDirection(board: Board, direction: SearchDirection): Board {
  switch (direction) {
    case 'down':
      return slideDown(board);
    case 'left':
      return slideLeft(board);
    case 'right':
      return slideRight(board);
  }
}

/**
 * Resulting board after sliding `board` toward `direction`.
 * Returns a board equal to the input when nothing can slide or merge.
 *
 * @throws InvalidBoardError when the board is malformed
 */
export function transform(board: Board, direction: SearchDirection): Board {
  assertBoard(board);
  return applyDirection(board, direction);
}
