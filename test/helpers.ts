// Shared fixtures for store-backed and HTTP-level tests.

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { FastifyBaseLogger } from 'fastify';
import pino from 'pino';
import type { AppConfig } from '../src/config/app-config.js';
import { SqliteStore } from '../src/db/database.js';

export const silentLogger: FastifyBaseLogger = pino({ level: 'silent' });

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'pet-adoption-mcp-test-'));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function openStore(dir: string): SqliteStore {
  return new SqliteStore(join(dir, 'pets.db'));
}

export function makeTestConfig(dir: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    host: '127.0.0.1',
    port: 0,
    dataDir: dir,
    dbPath: join(dir, 'pets.db'),
    logLevel: 'silent',
    strictSession: false,
    sessionIdleTtlMs: 30 * 60 * 1000,
    seedSamplePets: false,
    ...overrides
  };
}
