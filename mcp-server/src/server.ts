/**
 * MCP Server definition for the context selector
 *
 * Exposes tools for:
 * - Selecting context for a task, with or without adaptation
 * - Inspecting snapshots and counting tokens
 * - Feeding execution results back into per-task-type profiles
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { createContextEngine, type ContextEngine } from '../../src/engine/index.js';
import { loadEngineConfigFromEnv } from '../../src/lib/config.js';
import {
  adaptContext,
  adaptContextInput,
  analyzeSnapshot,
  analyzeSnapshotInput,
  cacheStats,
  countTokens,
  countTokensInput,
  evaluateSelection,
  evaluateSelectionInput,
  recordOutcome,
  recordOutcomeInput,
  selectContext,
  selectContextInput,
} from './handlers.js';

// Engine progress logs go to stdout, which carries the stdio protocol
export function createServer(
  engine: ContextEngine = createContextEngine({ ...loadEngineConfigFromEnv(), verbose: false })
): McpServer {
  const server = new McpServer({
    name: 'task-context-selector',
    version: '0.1.0',
  });

  // Tool: Select the files a task needs under a token budget
  server.tool('select_context', selectContextInput.shape, async (args) => selectContext(engine, args));

  // Tool: Select, retrying with adjusted constraints when the budget is underused
  server.tool('adapt_context', adaptContextInput.shape, async (args) => adaptContext(engine, args));

  // Tool: Summarize a snapshot and suggest a budget
  server.tool('analyze_snapshot', analyzeSnapshotInput.shape, async (args) => analyzeSnapshot(engine, args));

  // Tool: Count tokens in a text
  server.tool('count_tokens', countTokensInput.shape, async (args) => countTokens(engine, args));

  // Tool: Record how a task went with a selection
  server.tool('record_outcome', recordOutcomeInput.shape, async (args) => recordOutcome(engine, args));

  // Tool: Compare a selection with the files a task actually touched
  server.tool('evaluate_selection', evaluateSelectionInput.shape, async (args) => evaluateSelection(engine, args));

  // Tool: Cache hit and eviction counters
  server.tool('cache_stats', async () => cacheStats(engine));

  return server;
}
