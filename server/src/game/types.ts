/**
 * Game Types
 * Centralized type definitions for the 2048 decision engine
 */

// ============================================================================
// Board & Move Types
// ============================================================================

/**
 * Square grid of cell values, row 0 at the top.
 * Empty cells hold the sentinel 1; occupied cells hold powers of two >= 2.
 */
export type Board = ReadonlyArray<ReadonlyArray<number>>;

export type Direction = 'up' | 'down' | 'left' | 'right';

/**
 * Directions the search actually simulates. There is deliberately no `up`
 * transform: the strategy keeps the build corner at the bottom edge.
 */
export type SearchDirection = Exclude<Direction, 'up'>;

/**
 * `undo` asks the input collaborator for a corrective key press instead of a slide
 */
export type Move = Direction | 'undo';

/**
 * Moves a strategy can actually decide on
 */
export type DecisionMove = SearchDirection | 'undo';

// ============================================================================
// Scoring Types
// ============================================================================

export type EvaluationWeights = {
  snakeBase: number; // Exponent base for cells on the monotonic snake
  tileBase: number;  // Exponent base for every cell on the board
};

/**
 * Search leaf: a board reached after the full lookahead, tagged with the
 * first-ply move that leads toward it.
 */
export type ScoredCandidate = {
  board: Board;
  move: SearchDirection;
  score: number;
};

// ============================================================================
// Decision Types
// ============================================================================

export type DecisionAnalysis = {
  source: 'pivot' | 'search' | 'empty';
  leavesEvaluated: number;
  bestScore: number | null;
};

export type MoveDecision = {
  move: DecisionMove;
  reasoning: string;
  analysis: DecisionAnalysis;
};

export type AdvanceResult = {
  board: Board;
  move: DecisionMove;
  attempts: SearchDirection[]; // Directions applied, in order (empty for undo)
  stuck: boolean;              // Every direction was a no-op
};
