import {
  createServer,
  type IncomingMessage,
  type ServerResponse,
} from "node:http";
import { URL } from "node:url";
import { WebSocketServer, type WebSocket } from "ws";

import { loadConfig } from "./config.js";
import { configureLogging, logger } from "./logger.js";
import { LookaheadStrategy } from "./ai/strategies/LookaheadStrategy.js";
import { MessageHandler } from "./network/MessageHandler.js";
import { createMCPServer, SSEServerTransport } from "./mcp/MCPServerSetup.js";

const config = loadConfig();
configureLogging({ enabled: config.loggingEnabled });

const strategy = new LookaheadStrategy({
  depth: config.lookaheadDepth,
  weights: config.weights,
  pivotThreshold: config.pivotThreshold,
});

const messageHandler = new MessageHandler(strategy, config.weights);

// One MCP server per SSE session; POSTs are routed by sessionId
const sseTransports = new Map<string, SSEServerTransport>();

async function handleMcpStream(res: ServerResponse): Promise<void> {
  const transport = new SSEServerTransport("/mcp/messages", res);
  sseTransports.set(transport.sessionId, transport);

  res.on("close", () => {
    sseTransports.delete(transport.sessionId);
    logger.info(`🔌 MCP session closed: ${transport.sessionId}`);
  });

  const server = createMCPServer({ strategy, weights: config.weights });
  await server.connect(transport);
  logger.info(`🤝 MCP session opened: ${transport.sessionId}`);
}

async function handleMcpMessage(req: IncomingMessage, res: ServerResponse, url: URL): Promise<void> {
  const sessionId = url.searchParams.get("sessionId");
  const transport = sessionId ? sseTransports.get(sessionId) : undefined;

  if (!transport) {
    res.writeHead(404);
    res.end(JSON.stringify({ error: "Unknown session" }));
    return;
  }

  await transport.handlePostMessage(req, res);
}

// HTTP Server setup
const httpServer = createServer((req: IncomingMessage, res: ServerResponse) => {
  const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

  // Enable CORS
  res.setHeader("Access-Control-Allow-Origin", "*");
  res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
  res.setHeader("Access-Control-Allow-Headers", "Content-Type");

  if (req.method === "OPTIONS") {
    res.writeHead(200);
    res.end();
    return;
  }

  let pending: Promise<void> | null = null;

  if (url.pathname === "/health") {
    res.setHeader("Content-Type", "application/json");
    res.writeHead(200);
    res.end(JSON.stringify({ status: "ok", strategy: strategy.name, version: strategy.version }));
  } else if (url.pathname === "/mcp" && req.method === "GET") {
    pending = handleMcpStream(res);
  } else if (url.pathname === "/mcp/messages" && req.method === "POST") {
    pending = handleMcpMessage(req, res, url);
  } else {
    res.writeHead(404);
    res.end("Not found");
  }

  pending?.catch((error) => {
    logger.error("💥 MCP request failed:", error);
    if (!res.headersSent) {
      res.writeHead(500);
      res.end(JSON.stringify({ error: "Internal server error" }));
    }
  });
});

// WebSocket Server for perception clients
const wss = new WebSocketServer({ server: httpServer, path: "/ws" });

wss.on("connection", (ws: WebSocket) => {
  logger.info("🎮 New WebSocket connection from perception client");

  ws.on("message", (data) => {
    try {
      messageHandler.handleRaw(ws, data.toString());
    } catch (error) {
      logger.error("💥 Error handling WebSocket message:", error);
      ws.send(JSON.stringify({ type: "error", payload: { message: "Internal error" } }));
    }
  });

  ws.on("close", (code) => {
    logger.info(`🔌 WebSocket connection closed. Code: ${code}`);
  });

  ws.on("error", (error) => {
    logger.error("💥 WebSocket error:", error);
  });
});

httpServer.listen(config.port, () => {
  logger.info(`2048 decision server listening on http://localhost:${config.port}`);
  logger.info(`  SSE stream: GET http://localhost:${config.port}/mcp`);
  logger.info(`  Message post endpoint: POST http://localhost:${config.port}/mcp/messages?sessionId=...`);
  logger.info(`  🎮 WebSocket server: ws://localhost:${config.port}/ws`);
});
