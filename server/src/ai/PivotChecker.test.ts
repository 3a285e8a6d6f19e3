/**
 * PivotChecker Unit Tests
 *
 * Pivots are every fourth tile in descending order. Rank 0 belongs in the
 * bottom-right corner, rank 1 at the left end of row 2, rank 2 at the right
 * end of row 1, rank 3 at the left end of row 0.
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { checkPivots, findPivotMove } from './PivotChecker.js';
import { createEmptyBoard, InvalidBoardError } from '../game/Board.js';
import type { Board } from '../game/types.js';

// Bottom row already holds the four largest tiles in snake order
const SEATED_BOTTOM = [256, 512, 1024, 2048];

function withRows(rows: Record<number, number[]>): Board {
  return createEmptyBoard().map((row, r) => rows[r] ?? [...row]);
}

// ============================================================================
// THRESHOLD
// ============================================================================

test('Pivot - nothing enforced while the largest tile is at or below 64', () => {
  const board = withRows({ 3: [64, 1, 1, 1], 2: [32, 16, 1, 1] });
  assert.equal(findPivotMove(board), null);
});

test('Pivot - empty board has no pivots', () => {
  assert.equal(findPivotMove(createEmptyBoard()), null);
});

test('Pivot - threshold is configurable', () => {
  const board = withRows({ 3: [1, 1, 64, 1] });
  assert.equal(findPivotMove(board), null);
  assert.equal(findPivotMove(board, 32), 'right');
});

// ============================================================================
// RANK 0 - BOTTOM-RIGHT CORNER
// ============================================================================

test('Pivot - largest tile one slide away from the corner forces right', () => {
  const board = withRows({ 3: [1, 1, 128, 1] });
  assert.equal(findPivotMove(board), 'right');
});

test('Pivot - a smaller tile blocking the corner forces undo', () => {
  const board = withRows({ 3: [1, 1, 128, 2] });
  assert.equal(findPivotMove(board), 'undo');
});

test('Pivot - largest tile seated in the corner needs no correction', () => {
  const board = withRows({ 3: [1, 1, 2, 128] });
  assert.equal(findPivotMove(board), null);
});

test('Pivot - empty bottom row is skipped rather than undone', () => {
  // Largest tile is stuck at the top; the next pivot is below the threshold
  const board = withRows({ 0: [128, 1, 1, 1] });
  assert.equal(findPivotMove(board), null);
});

// ============================================================================
// RANK 1 - LEFT END OF ROW 2
// ============================================================================

test('Pivot - next pivot reachable by sliding left forces left', () => {
  const board = withRows({ 3: SEATED_BOTTOM, 2: [1, 128, 4, 2] });
  assert.equal(findPivotMove(board), 'left');
});

test('Pivot - next pivot hidden behind a smaller tile forces undo', () => {
  const board = withRows({ 3: SEATED_BOTTOM, 2: [2, 128, 1, 1] });
  assert.equal(findPivotMove(board), 'undo');
});

test('Pivot - seated second pivot with small tiles after it passes', () => {
  const board = withRows({ 3: SEATED_BOTTOM, 2: [128, 4, 2, 1] });
  assert.equal(findPivotMove(board), null);
});

test('Pivot - nothing forced while the previous pivot is not seated yet', () => {
  // 256 (rank 3) is not at the left end of the bottom row
  const board = withRows({ 3: [512, 256, 1024, 2048], 2: [1, 128, 1, 1] });
  assert.equal(findPivotMove(board), null);
});

// ============================================================================
// RANKS 2 AND 3 - RIGHT END OF ROW 1, LEFT END OF ROW 0
// ============================================================================

// Rows 3 and 2 seated: ranked[7] = 256 sits at (2,3)
const SEATED_LOWER_HALF = {
  3: [2048, 4096, 8192, 16384],
  2: [1024, 512, 256, 256]
};

test('Pivot - third pivot one slide from the right end of row 1 forces right', () => {
  const board = withRows({ ...SEATED_LOWER_HALF, 1: [1, 1, 128, 1] });
  assert.equal(findPivotMove(board), 'right');
});

test('Pivot - third pivot behind a smaller tile forces undo', () => {
  const board = withRows({ ...SEATED_LOWER_HALF, 1: [1, 1, 128, 2] });
  assert.equal(findPivotMove(board), 'undo');
});

test('Pivot - third pivot is left alone while the end of row 2 is unseated', () => {
  // ranked[7] = 256 is at (1,3), not (2,3)
  const board = withRows({
    3: [2048, 4096, 8192, 16384],
    2: [1024, 512, 256, 1],
    1: [1, 1, 128, 256]
  });
  assert.equal(findPivotMove(board), null);
});

// Rows 3, 2 and 1 seated: ranked[11] = 256 sits at (1,0)
const SEATED_THREE_ROWS = {
  3: [4096, 8192, 16384, 32768],
  2: [2048, 1024, 1024, 512],
  1: [256, 256, 256, 512]
};

test('Pivot - fourth pivot one slide from the left end of row 0 forces left', () => {
  const board = withRows({ ...SEATED_THREE_ROWS, 0: [1, 128, 1, 1] });
  assert.equal(findPivotMove(board), 'left');
});

test('Pivot - fourth pivot behind a smaller tile forces undo', () => {
  const board = withRows({ ...SEATED_THREE_ROWS, 0: [2, 128, 1, 1] });
  assert.equal(findPivotMove(board), 'undo');
});

// ============================================================================
// VALIDATION
// ============================================================================

test('checkPivots - rejects malformed boards', () => {
  assert.throws(() => checkPivots([[128]]), InvalidBoardError);
});
