/**
 * Per-session MCP servers for the HTTP transport.
 *
 * A protocol server talks to one transport at a time, so every session gets
 * its own server. All of them share one engine, and with it the selection
 * cache and the learned task profiles.
 */

import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { ContextEngine } from '../../src/engine/index.js';
import { createServer } from './server.js';

export class SessionRegistry<T extends Transport> {
  private readonly sessions = new Map<string, T>();

  constructor(
    private readonly engine: ContextEngine,
    private readonly createTransport: (sessionId: string) => T
  ) {}

  get size(): number {
    return this.sessions.size;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  /**
   * The session's transport, connecting a new server on first use.
   */
  async open(sessionId: string): Promise<T> {
    const existing = this.sessions.get(sessionId);
    if (existing) return existing;

    const transport = this.createTransport(sessionId);
    const server = createServer(this.engine);
    // connect() chains its own close handler after this one
    transport.onclose = () => {
      this.sessions.delete(sessionId);
    };
    this.sessions.set(sessionId, transport);

    try {
      await server.connect(transport);
    } catch (error) {
      this.sessions.delete(sessionId);
      throw error;
    }
    return transport;
  }
}
