// This module parses process environment into one immutable runtime configuration.

import { join } from 'node:path';
import { z } from 'zod';
import { AppError } from '../utils/errors.js';

const booleanFlagSchema = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  HOST: z.string().trim().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(5001),
  DATA_DIR: z.string().trim().min(1).default('./data'),
  PETS_DB_PATH: z.string().trim().min(1).optional(),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  MCP_STRICT_SESSION: booleanFlagSchema.default('false'),
  MCP_SESSION_IDLE_TTL_MS: z.coerce.number().int().min(1000).default(30 * 60 * 1000),
  SEED_SAMPLE_PETS: booleanFlagSchema.default('false')
});

export interface AppConfig {
  readonly host: string;
  readonly port: number;
  readonly dataDir: string;
  readonly dbPath: string;
  readonly logLevel: string;
  readonly strictSession: boolean;
  readonly sessionIdleTtlMs: number;
  readonly seedSamplePets: boolean;
}

// This function validates environment variables and derives dependent paths such as the default database file.
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.join('.') ?? 'environment';
    throw new AppError(500, 'invalid_config', `Invalid configuration value for ${variable}: ${issue?.message ?? 'invalid'}`, parsed.error.flatten());
  }

  const values = parsed.data;
  return Object.freeze({
    host: values.HOST,
    port: values.PORT,
    dataDir: values.DATA_DIR,
    dbPath: values.PETS_DB_PATH ?? join(values.DATA_DIR, 'pets.db'),
    logLevel: values.LOG_LEVEL,
    strictSession: values.MCP_STRICT_SESSION,
    sessionIdleTtlMs: values.MCP_SESSION_IDLE_TTL_MS,
    seedSamplePets: values.SEED_SAMPLE_PETS
  });
}
