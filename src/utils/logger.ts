// This module configures the pino logger and bounds the values that tool calls and JSON-RPC params put into log records.

import pino, { type LoggerOptions } from 'pino';
import { MCP_SERVER_NAME } from '../version.js';
import { AppError } from './errors.js';

// Pet descriptions run to 1000 characters and batches to 50 pets, so records keep a preview of each.
const LOG_LIMITS = {
  depth: 4,
  stringLength: 200,
  arrayItems: 10,
  objectKeys: 20
} as const;

function previewString(value: string): string {
  const overflow = value.length - LOG_LIMITS.stringLength;
  return overflow > 0 ? `${value.slice(0, LOG_LIMITS.stringLength)}...(+${overflow} chars)` : value;
}

// This helper copies tool arguments, pet records, or JSON-RPC params into a bounded, JSON-safe shape.
export function shapeForLog(value: unknown, depth = 0): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (typeof value === 'string') {
    return previewString(value);
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (typeof value !== 'object') {
    return String(value);
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (depth >= LOG_LIMITS.depth) {
    return Array.isArray(value) ? `[array:${value.length}]` : '[object]';
  }

  if (Array.isArray(value)) {
    const items = value.slice(0, LOG_LIMITS.arrayItems).map((item) => shapeForLog(item, depth + 1));
    if (value.length > LOG_LIMITS.arrayItems) {
      items.push(`(+${value.length - LOG_LIMITS.arrayItems} items)`);
    }
    return items;
  }

  const entries = Object.entries(value);
  const shaped: Record<string, unknown> = {};
  for (const [key, entry] of entries.slice(0, LOG_LIMITS.objectKeys)) {
    shaped[key] = shapeForLog(entry, depth + 1);
  }
  if (entries.length > LOG_LIMITS.objectKeys) {
    shaped._truncatedKeys = entries.length - LOG_LIMITS.objectKeys;
  }
  return shaped;
}

// Domain errors are expected outcomes, so they log their code without a stack.
export function errorForLog(error: unknown): Record<string, unknown> {
  if (error instanceof AppError) {
    return {
      name: error.name,
      code: error.code,
      statusCode: error.statusCode,
      message: error.message
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
  }

  return { message: String(error) };
}

// Level labels instead of numbers keep records comparable with the MCP level names.
export function buildLoggerOptions(level: string): LoggerOptions {
  return {
    level,
    base: {
      service: MCP_SERVER_NAME
    },
    formatters: {
      level: (label) => ({ level: label })
    },
    timestamp: pino.stdTimeFunctions.isoTime
  };
}
