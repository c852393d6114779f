// This module models per-connection MCP session state and the registry that keeps sessions addressable over HTTP.

import { randomUUID } from 'node:crypto';
import type { McpClientInfo } from '../types/mcp.js';

export interface McpSession {
  readonly id: string;
  initialized: boolean;
  protocolVersion: string | null;
  clientInfo: McpClientInfo | null;
  clientCapabilities: Record<string, unknown>;
  readonly createdAt: string;
  lastSeenAt: string;
}

export function createMcpSession(id: string = randomUUID()): McpSession {
  const now = new Date().toISOString();
  return {
    id,
    initialized: false,
    protocolVersion: null,
    clientInfo: null,
    clientCapabilities: {},
    createdAt: now,
    lastSeenAt: now
  };
}

export const DEFAULT_SESSION_IDLE_TTL_MS = 30 * 60 * 1000;
export const DEFAULT_MAX_SESSIONS = 1000;

export interface McpSessionStoreOptions {
  idleTtlMs?: number;
  maxSessions?: number;
}

// Sessions are created by initialize and dropped on DELETE, after idling past the TTL, or when the cap evicts the least recently seen.
export class McpSessionStore {
  private readonly sessions = new Map<string, McpSession>();
  private readonly idleTtlMs: number;
  private readonly maxSessions: number;

  public constructor(options: McpSessionStoreOptions = {}) {
    this.idleTtlMs = options.idleTtlMs ?? DEFAULT_SESSION_IDLE_TTL_MS;
    this.maxSessions = options.maxSessions ?? DEFAULT_MAX_SESSIONS;
  }

  public create(): McpSession {
    this.evictIdle(Date.now());

    // Map iteration follows insertion order, and get() re-inserts, so the first key is the least recently seen.
    while (this.sessions.size >= this.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) {
        break;
      }
      this.sessions.delete(oldest.value);
    }

    const session = createMcpSession();
    this.sessions.set(session.id, session);
    return session;
  }

  public get(id: string): McpSession | null {
    const now = Date.now();
    this.evictIdle(now);

    const session = this.sessions.get(id);
    if (!session) {
      return null;
    }

    session.lastSeenAt = new Date(now).toISOString();
    this.sessions.delete(id);
    this.sessions.set(id, session);
    return session;
  }

  public delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  public size(): number {
    return this.sessions.size;
  }

  private evictIdle(now: number): void {
    for (const [id, session] of this.sessions) {
      if (now - Date.parse(session.lastSeenAt) > this.idleTtlMs) {
        this.sessions.delete(id);
      }
    }
  }
}
