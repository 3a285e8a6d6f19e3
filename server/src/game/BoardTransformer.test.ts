/**
 * BoardTransformer - Slide & merge tests
 *
 * Board coordinates: row 0 is the top, column 0 the left edge.
 * Empty cells are the sentinel 1.
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { slideLine, transform } from './BoardTransformer.js';
import { InvalidBoardError, isTileValue } from './Board.js';
import { SEARCH_DIRECTIONS } from './constants.js';
import type { Board } from './types.js';

// ============================================================================
// Helpers
// ============================================================================

function tiles(board: Board): number[] {
  return board.flat().filter(cell => cell !== 1);
}

function tileSum(board: Board): number {
  return tiles(board).reduce((sum, value) => sum + value, 0);
}

const MIXED_BOARD: Board = [
  [2, 1, 2, 4],
  [4, 4, 8, 8],
  [1, 1, 1, 1],
  [2, 4, 8, 16]
];

// ============================================================================
// LINE TESTS
// ============================================================================

test('slideLine - no chain merges: [2,2,2,2] becomes [4,4,1,1]', () => {
  assert.deepEqual(slideLine([2, 2, 2, 2]), [4, 4, 1, 1]);
});

test('slideLine - compacts across gaps before merging', () => {
  assert.deepEqual(slideLine([2, 1, 2, 4]), [4, 4, 1, 1]);
  assert.deepEqual(slideLine([1, 1, 1, 8]), [8, 1, 1, 1]);
});

test('slideLine - full line of distinct values is untouched', () => {
  assert.deepEqual(slideLine([2, 4, 8, 16]), [2, 4, 8, 16]);
});

test('slideLine - empty line stays empty', () => {
  assert.deepEqual(slideLine([1, 1, 1, 1]), [1, 1, 1, 1]);
});

// ============================================================================
// DIRECTION TESTS
// ============================================================================

test('transform LEFT - merges toward column 0', () => {
  assert.deepEqual(transform(MIXED_BOARD, 'left'), [
    [4, 4, 1, 1],
    [8, 16, 1, 1],
    [1, 1, 1, 1],
    [2, 4, 8, 16]
  ]);
});

test('transform RIGHT - merges toward column 3, pairs closest to the edge first', () => {
  const board: Board = [
    [2, 2, 2, 2],
    [2, 2, 4, 1],
    [4, 4, 8, 8],
    [1, 2, 1, 1]
  ];

  assert.deepEqual(transform(board, 'right'), [
    [1, 1, 4, 4],
    [1, 1, 4, 4],
    [1, 1, 8, 16],
    [1, 1, 1, 2]
  ]);
});

test('transform DOWN - merges toward row 3 column by column', () => {
  const board: Board = [
    [2, 1, 4, 1],
    [2, 2, 1, 1],
    [2, 1, 4, 1],
    [2, 2, 1, 8]
  ];

  assert.deepEqual(transform(board, 'down'), [
    [1, 1, 1, 1],
    [1, 1, 1, 1],
    [4, 1, 1, 1],
    [4, 4, 8, 8]
  ]);
});

test('transform - returns a new board and leaves the input untouched', () => {
  const snapshot = MIXED_BOARD.map(row => [...row]);
  const result = transform(MIXED_BOARD, 'left');

  assert.notStrictEqual(result, MIXED_BOARD);
  assert.deepEqual(MIXED_BOARD, snapshot);
});

// ============================================================================
// INVARIANTS
// ============================================================================

test('transform - no-op direction returns an equal board, and stays a no-op when reapplied', () => {
  const settled: Board = [
    [2, 4, 1, 1],
    [8, 1, 1, 1],
    [1, 1, 1, 1],
    [2, 4, 8, 16]
  ];

  const once = transform(settled, 'left');
  assert.deepEqual(once, settled);
  assert.deepEqual(transform(once, 'left'), settled);
});

test('transform - tile sum is conserved in every direction', () => {
  for (const direction of SEARCH_DIRECTIONS) {
    const result = transform(MIXED_BOARD, direction);
    assert.equal(tileSum(result), tileSum(MIXED_BOARD), `sum changed moving ${direction}`);
  }
});

test('transform - a single merge removes exactly one tile holding the pair sum', () => {
  const board: Board = [
    [2, 2, 4, 8],
    [1, 1, 1, 1],
    [1, 1, 1, 1],
    [1, 1, 1, 1]
  ];

  const result = transform(board, 'left');

  assert.deepEqual(result[0], [4, 4, 8, 1]);
  assert.equal(tiles(result).length, tiles(board).length - 1);
});

test('transform - every produced cell is the sentinel or a power of two', () => {
  for (const direction of SEARCH_DIRECTIONS) {
    const result = transform(MIXED_BOARD, direction);
    assert.ok(result.flat().every(isTileValue), `bad cell after ${direction}`);
  }
});

test('transform - malformed boards fail before any sliding', () => {
  assert.throws(() => transform([], 'left'), InvalidBoardError);
  assert.throws(
    () => transform([[2, 2, 1, 1], [1, 1], [1, 1, 1, 1], [1, 1, 1, 1]], 'down'),
    InvalidBoardError
  );
});
