// This test suite verifies the session registry, including idle eviction and the size cap.

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { McpSessionStore } from '../src/mcp/session.js';

const START = new Date('2026-01-01T00:00:00.000Z');

function advanceTo(seconds: number): void {
  vi.setSystemTime(new Date(START.getTime() + seconds * 1000));
}

describe('mcp session store', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(START);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('creates, finds, and deletes sessions', () => {
    const sessions = new McpSessionStore();
    const session = sessions.create();

    expect(session).toMatchObject({ initialized: false, protocolVersion: null, clientInfo: null });
    expect(sessions.get(session.id)).toBe(session);
    expect(sessions.size()).toBe(1);
    expect(sessions.delete(session.id)).toBe(true);
    expect(sessions.get(session.id)).toBeNull();
    expect(sessions.delete(session.id)).toBe(false);
  });

  it('evicts sessions idle past the ttl', () => {
    const sessions = new McpSessionStore({ idleTtlMs: 60_000 });
    const idle = sessions.create();
    advanceTo(30);
    const recent = sessions.create();

    advanceTo(61);

    expect(sessions.get(idle.id)).toBeNull();
    expect(sessions.get(recent.id)).toBe(recent);
    expect(sessions.size()).toBe(1);
  });

  it('refreshes lastSeenAt on lookup', () => {
    const sessions = new McpSessionStore({ idleTtlMs: 60_000 });
    const session = sessions.create();

    advanceTo(50);
    sessions.get(session.id);
    expect(session.lastSeenAt).toBe('2026-01-01T00:00:50.000Z');

    advanceTo(100);
    expect(sessions.get(session.id)).toBe(session);
  });

  it('evicts the least recently seen session at the cap', () => {
    const sessions = new McpSessionStore({ maxSessions: 2 });
    const first = sessions.create();
    const second = sessions.create();
    sessions.get(first.id);

    const third = sessions.create();

    expect(sessions.size()).toBe(2);
    expect(sessions.get(second.id)).toBeNull();
    expect(sessions.get(first.id)).toBe(first);
    expect(sessions.get(third.id)).toBe(third);
  });

  it('stays bounded under repeated creates', () => {
    const sessions = new McpSessionStore({ maxSessions: 100 });

    for (let index = 0; index < 500; index += 1) {
      sessions.create();
    }

    expect(sessions.size()).toBe(100);
  });
});
