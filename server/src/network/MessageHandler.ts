/**
 * MessageHandler
 * Routes decision requests from perception clients over WebSocket
 */

import { z } from 'zod';
import type { Board, EvaluationWeights } from '../game/types.js';
import { InvalidBoardError, parseBoard } from '../game/Board.js';
import { evaluateBoard } from '../game/ScoreEvaluator.js';
import { MoveOrchestrator } from '../ai/MoveOrchestrator.js';
import type { MoveStrategy } from '../ai/strategies/AIStrategy.js';
import { logger } from '../logger.js';

/**
 * Anything that can receive a serialized reply (a ws WebSocket in production)
 */
export interface DecisionClient {
  send(data: string): void;
}

// Board is checked separately so invalid boards get a detailed reply
const MessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('nextMove'), payload: z.object({ board: z.unknown() }) }),
  z.object({ type: z.literal('advance'), payload: z.object({ board: z.unknown() }) }),
  z.object({ type: z.literal('score'), payload: z.object({ board: z.unknown() }) })
]);

export class MessageHandler {
  private strategy: MoveStrategy;
  private weights: EvaluationWeights;

  constructor(strategy: MoveStrategy, weights: EvaluationWeights) {
    this.strategy = strategy;
    this.weights = weights;
  }

  /**
   * Entry point for raw socket frames
   */
  handleRaw(client: DecisionClient, data: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (error) {
      logger.error('💥 Error parsing WebSocket message:', error);
      this.sendError(client, 'Message is not valid JSON');
      return;
    }
    this.handleMessage(client, parsed);
  }

  /**
   * Main message router
   */
  handleMessage(client: DecisionClient, message: unknown): void {
    const envelope = MessageSchema.safeParse(message);
    if (!envelope.success) {
      this.sendError(client, 'Unknown or malformed message');
      return;
    }

    let board: Board;
    try {
      board = parseBoard(envelope.data.payload.board);
    } catch (error) {
      if (error instanceof InvalidBoardError) {
        this.sendError(client, error.message, error.issues);
        return;
      }
      throw error;
    }

    const { type } = envelope.data;
    logger.info(`📨 Decision request: ${type}`);

    switch (type) {
      case 'nextMove':
        this.handleNextMove(client, board);
        break;
      case 'advance':
        this.handleAdvance(client, board);
        break;
      case 'score':
        this.handleScore(client, board);
        break;
    }
  }

  private handleNextMove(client: DecisionClient, board: Board): void {
    const decision = this.strategy.getMove(board);
    this.send(client, 'move', { move: decision.move, reasoning: decision.reasoning });
  }

  /**
   * The key press goes back to the same client, which owns the input device
   */
  private handleAdvance(client: DecisionClient, board: Board): void {
    const orchestrator = new MoveOrchestrator(this.strategy, {
      press: (move, key) => this.send(client, 'keyPress', { move, key })
    });

    const result = orchestrator.advance(board);
    this.send(client, 'advanced', { board: result.board, move: result.move, stuck: result.stuck });
  }

  private handleScore(client: DecisionClient, board: Board): void {
    this.send(client, 'score', evaluateBoard(board, this.weights));
  }

  private send(client: DecisionClient, type: string, payload: unknown): void {
    client.send(JSON.stringify({ type, payload }));
  }

  private sendError(client: DecisionClient, message: string, issues?: string[]): void {
    this.send(client, 'error', issues ? { message, issues } : { message });
  }
}
