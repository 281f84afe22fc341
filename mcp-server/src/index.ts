#!/usr/bin/env node
/**
 * Context Selector MCP Server
 *
 * Supports both stdio (for local agents) and HTTP (for shared services) transport.
 *
 * Usage:
 *   node dist/mcp-server/src/index.js              # stdio mode (default)
 *   node dist/mcp-server/src/index.js --http       # HTTP mode on port 3100
 *   node dist/mcp-server/src/index.js --http 8080  # HTTP mode on custom port
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import express from 'express';
import { randomUUID } from 'node:crypto';
import { createContextEngine } from '../../src/engine/index.js';
import { loadEngineConfigFromEnv } from '../../src/lib/config.js';
import { createServer } from './server.js';
import { SessionRegistry } from './sessions.js';

const DEFAULT_HTTP_PORT = 3100;

async function main() {
  const args = process.argv.slice(2);
  const httpMode = args.includes('--http');
  const portArg = args.find((_, i, arr) => arr[i - 1] === '--http' && !isNaN(parseInt(_, 10)));
  const port = portArg ? parseInt(portArg, 10) : DEFAULT_HTTP_PORT;

  // Engine progress logs would land on stdout, which carries the stdio protocol
  const engine = createContextEngine({ ...loadEngineConfigFromEnv(), verbose: false });

  // Cleanup on exit
  const cleanup = () => {
    const stats = engine.cacheStats();
    console.error(`Shutting down (${stats.size} cached selections, ${stats.hits} hits)...`);
    process.exit(0);
  };

  process.on('SIGINT', cleanup);
  process.on('SIGTERM', cleanup);

  if (httpMode) {
    // HTTP mode - one server and transport per session, all sharing the engine
    const app = express();
    app.use(express.json({ limit: '10mb' }));
    const sessions = new SessionRegistry(
      engine,
      (sessionId) => new StreamableHTTPServerTransport({ sessionIdGenerator: () => sessionId })
    );

    app.post('/mcp', async (req, res) => {
      const header = req.headers['mcp-session-id'];
      const sessionId = typeof header === 'string' ? header : randomUUID();

      try {
        const transport = await sessions.open(sessionId);
        await transport.handleRequest(req, res, req.body);
      } catch (error) {
        console.error('❌ MCP request failed:', error);
        if (!res.headersSent) {
          res.status(500).json({ error: 'Internal server error' });
        }
      }
    });

    // Health check endpoint
    app.get('/health', (_, res) => {
      res.json({ status: 'ok', mode: 'http', port, sessions: sessions.size, cache: engine.cacheStats() });
    });

    app.listen(port, () => {
      console.error(`MCP Server running in HTTP mode on port ${port}`);
      console.error(`Health check: http://localhost:${port}/health`);
    });
  } else {
    // Stdio mode - for local agents
    console.error('MCP Server running in stdio mode');
    const server = createServer(engine);
    const transport = new StdioServerTransport();
    await server.connect(transport);
  }
}

main().catch((error) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
