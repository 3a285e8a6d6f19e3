/**
 * Game Constants
 * Tuning defaults shared across the engine, search and servers
 */

import type { Move, SearchDirection } from './types.js';

// Board geometry
export const BOARD_SIZE = 4;
export const EMPTY_CELL = 1; // Sentinel: log2(1) = 0, never a real tile

// Positional scorer
export const SNAKE_WEIGHT_BASE = 4; // Applied to cells on the monotonic snake
export const TILE_WEIGHT_BASE = 3;  // Applied to every cell

// Pivot discipline only kicks in for tiles above this value
export const PIVOT_THRESHOLD = 64;

// Search
export const LOOKAHEAD_DEPTH = 3;

// Generation order of children at every ply (ties favor earlier entries)
export const SEARCH_DIRECTIONS: readonly SearchDirection[] = ['down', 'left', 'right'];

// Fallback order when the chosen direction does not change the board
export const ROTATION_ORDER: readonly SearchDirection[] = ['down', 'left', 'right'];

// Literal keys the input collaborator presses for each move
export const KEY_MAP = {
  up: 'up',
  down: 'down',
  left: 'left',
  right: 'right',
  undo: 'u'
} as const satisfies Record<Move, string>;

// Decision loop
export const MAX_CYCLES = 1000;
export const MAX_STUCK_CYCLES = 3;
export const CYCLE_DELAY_MS = 0;

// Servers
export const DEFAULT_PORT = 9999;
