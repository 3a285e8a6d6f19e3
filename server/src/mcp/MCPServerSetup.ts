/**
 * MCPServerSetup
 * MCP (Model Context Protocol) server configuration for AI assistant integration
 * Exposes the decision engine as tools so an assistant can drive a game
 */

import { z } from 'zod';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolRequest,
  type CallToolResult,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';

import type { EvaluationWeights } from '../game/types.js';
import { InvalidBoardError, parseBoard } from '../game/Board.js';
import { applyDirection } from '../game/BoardTransformer.js';
import { evaluateBoard } from '../game/ScoreEvaluator.js';
import { MoveOrchestrator } from '../ai/MoveOrchestrator.js';
import type { MoveStrategy } from '../ai/strategies/AIStrategy.js';
import { logger } from '../logger.js';

export type ToolContext = {
  strategy: MoveStrategy;
  weights: EvaluationWeights;
};

const boardProperty = {
  type: 'array',
  description: '4x4 grid of tile values, row 0 at the top. Empty cells are 1.',
  items: { type: 'array', items: { type: 'integer' } }
} as const;

export const tools: Tool[] = [
  {
    name: 'next_move',
    description: 'Decide the next move for a board without applying it',
    inputSchema: {
      type: 'object',
      properties: { board: boardProperty },
      required: ['board']
    }
  },
  {
    name: 'advance_board',
    description: 'Decide and apply the next move, returning the key to press and the predicted board',
    inputSchema: {
      type: 'object',
      properties: { board: boardProperty },
      required: ['board']
    }
  },
  {
    name: 'score_board',
    description: 'Positional score breakdown (corner snake + tile values) for a board',
    inputSchema: {
      type: 'object',
      properties: { board: boardProperty },
      required: ['board']
    }
  },
  {
    name: 'transform_board',
    description: 'Slide and merge a board in one direction',
    inputSchema: {
      type: 'object',
      properties: {
        board: boardProperty,
        direction: { type: 'string', enum: ['down', 'left', 'right'], description: 'Direction to slide' }
      },
      required: ['board', 'direction']
    }
  }
];

const boardArgs = z.object({ board: z.unknown() });
const transformArgs = z.object({
  board: z.unknown(),
  direction: z.enum(['down', 'left', 'right'])
});

function textResult(value: unknown): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(value) }]
  };
}

function errorResult(message: string): CallToolResult {
  return {
    content: [{ type: 'text', text: message }],
    isError: true
  };
}

/**
 * Dispatch one tool call. Invalid arguments come back as error results
 * rather than protocol errors so the assistant can correct itself.
 */
export function handleToolCall(context: ToolContext, name: string, args: unknown): CallToolResult {
  try {
    switch (name) {
      case 'next_move': {
        const board = parseBoard(boardArgs.parse(args).board);
        const decision = context.strategy.getMove(board);
        return textResult({ move: decision.move, reasoning: decision.reasoning });
      }

      case 'advance_board': {
        const board = parseBoard(boardArgs.parse(args).board);
        let key = '';
        const orchestrator = new MoveOrchestrator(context.strategy, {
          press: (_move, pressed) => {
            key = pressed;
          }
        });
        const result = orchestrator.advance(board);
        return textResult({ move: result.move, key, board: result.board, stuck: result.stuck });
      }

      case 'score_board': {
        const board = parseBoard(boardArgs.parse(args).board);
        return textResult(evaluateBoard(board, context.weights));
      }

      case 'transform_board': {
        const { board: raw, direction } = transformArgs.parse(args);
        const board = parseBoard(raw);
        return textResult({ board: applyDirection(board, direction) });
      }

      default:
        return errorResult(`Unknown tool: ${name}`);
    }
  } catch (error) {
    if (error instanceof InvalidBoardError) {
      return errorResult(error.message);
    }
    if (error instanceof z.ZodError) {
      return errorResult(`Invalid arguments for ${name}: ${error.issues.map(issue => issue.message).join('; ')}`);
    }
    throw error;
  }
}

/**
 * Create and configure the MCP server
 */
export function createMCPServer(context: ToolContext): Server {
  const server = new Server(
    {
      name: 'corner-snake-2048',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools }));

  server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest) => {
    const { name, arguments: args } = request.params;
    logger.info(`🔧 MCP tool call: ${name}`);
    return handleToolCall(context, name, args ?? {});
  });

  return server;
}

export { SSEServerTransport };
