#!/usr/bin/env node
/**
 * MCP Server Entry Point
 * Exposes the decision engine over stdio via Model Context Protocol
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from '../config.js';
import { configureLogging, logger } from '../logger.js';
import { LookaheadStrategy } from '../ai/strategies/LookaheadStrategy.js';
import { createMCPServer } from './MCPServerSetup.js';

async function main(): Promise<void> {
  const config = loadConfig();

  // stdout carries protocol frames
  configureLogging({ enabled: config.loggingEnabled, stream: 'stderr' });

  const strategy = new LookaheadStrategy({
    depth: config.lookaheadDepth,
    weights: config.weights,
    pivotThreshold: config.pivotThreshold
  });

  const server = createMCPServer({ strategy, weights: config.weights });
  await server.connect(new StdioServerTransport());
  logger.info('✅ MCP decision server running on stdio');
}

main().catch((error) => {
  logger.error('❌ MCP server failed to start:', error);
  process.exit(1);
});
