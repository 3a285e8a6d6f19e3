/**
 * LookaheadStrategy - Fixed-depth breadth-first search over slide sequences
 *
 * - Pivot check first: a forced move short-circuits the search entirely
 * - Expands down/left/right at every ply (no `up`), up to 3^depth leaves
 * - Leaves are scored with the positional evaluator
 * - The best leaf's first-ply move wins; ties go to the leaf generated first
 */

import type { MoveStrategy } from './AIStrategy.js';
import type {
  Board,
  DecisionMove,
  EvaluationWeights,
  MoveDecision,
  ScoredCandidate,
  SearchDirection
} from '../../game/types.js';
import { LOOKAHEAD_DEPTH, PIVOT_THRESHOLD, SEARCH_DIRECTIONS } from '../../game/constants.js';
import { assertBoard } from '../../game/Board.js';
import { applyDirection } from '../../game/BoardTransformer.js';
import { DEFAULT_WEIGHTS, evaluateBoardQuick } from '../../game/ScoreEvaluator.js';
import { findPivotMove } from '../PivotChecker.js';

// ============================================================================
// Types & Options
// ============================================================================

/**
 * Arena entry: the root has no label yet, every descendant carries the
 * first-ply direction it came from.
 */
type SearchNode = {
  board: Board;
  move: SearchDirection | null;
};

export type Leaf = {
  board: Board;
  move: SearchDirection;
};

export type LookaheadOptions = {
  depth?: number;
  weights?: EvaluationWeights;
  pivotThreshold?: number;
  evaluate?: (board: Board) => number;
  checkPivot?: (board: Board) => DecisionMove | null;
};

// ============================================================================
// Lookahead Strategy
// ============================================================================

export class LookaheadStrategy implements MoveStrategy {
  readonly name = 'Lookahead';
  readonly version = '1.0.0';
  readonly description: string;

  private readonly depth: number;
  private readonly evaluate: (board: Board) => number;
  private readonly checkPivot: (board: Board) => DecisionMove | null;

  constructor(options: LookaheadOptions = {}) {
    this.depth = options.depth ?? LOOKAHEAD_DEPTH;
    if (!Number.isInteger(this.depth) || this.depth < 1) {
      throw new Error(`Lookahead depth must be a positive integer, got ${this.depth}`);
    }

    const weights = options.weights ?? DEFAULT_WEIGHTS;
    const pivotThreshold = options.pivotThreshold ?? PIVOT_THRESHOLD;

    this.evaluate = options.evaluate ?? ((board: Board) => evaluateBoardQuick(board, weights));
    this.checkPivot = options.checkPivot ?? ((board: Board) => findPivotMove(board, pivotThreshold));
    this.description = `${this.depth}-ply down/left/right lookahead with corner pivot override`;
  }

  getMove(board: Board): MoveDecision {
    assertBoard(board);

    const forced = this.checkPivot(board);
    if (forced) {
      return {
        move: forced,
        reasoning: `Pivot override: ${forced}`,
        analysis: { source: 'pivot', leavesEvaluated: 0, bestScore: null }
      };
    }

    const ranked = this.rankLeaves(this.expandLeaves(board));
    if (ranked.length === 0) {
      return {
        move: 'undo',
        reasoning: 'No leaves generated',
        analysis: { source: 'empty', leavesEvaluated: 0, bestScore: null }
      };
    }

    const best = ranked[0];
    return {
      move: best.move,
      reasoning: `Best of ${ranked.length} leaves via ${best.move} (score ${best.score})`,
      analysis: { source: 'search', leavesEvaluated: ranked.length, bestScore: best.score }
    };
  }

  /**
   * Breadth-first expansion, one arena level per ply. Children of each node
   * are appended in SEARCH_DIRECTIONS order, so leaves come out grouped by
   * first-ply move: all `down` leaves, then `left`, then `right`.
   */
  expandLeaves(board: Board): Leaf[] {
    let level: SearchNode[] = [{ board, move: null }];

    for (let ply = 0; ply < this.depth; ply++) {
      const next: SearchNode[] = [];
      for (const node of level) {
        for (const direction of SEARCH_DIRECTIONS) {
          next.push({
            board: applyDirection(node.board, direction),
            move: node.move ?? direction
          });
        }
      }
      level = next;
    }

    const leaves: Leaf[] = [];
    for (const node of level) {
      if (node.move) leaves.push({ board: node.board, move: node.move });
    }
    return leaves;
  }

  /**
   * Score every leaf and sort by descending score. Array.prototype.sort is
   * stable, so equal scores keep generation order.
   */
  rankLeaves(leaves: Leaf[]): ScoredCandidate[] {
    return leaves
      .map(leaf => ({ ...leaf, score: this.evaluate(leaf.board) }))
      .sort((a, b) => b.score - a.score);
  }
}

const defaultStrategy = new LookaheadStrategy();

/**
 * Next move under the default configuration
 */
export function nextMove(board: Board): DecisionMove {
  return defaultStrategy.getMove(board).move;
}
