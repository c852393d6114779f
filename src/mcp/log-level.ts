// This module holds the process-wide MCP logging level and maps it onto pino levels.

export const MCP_LOG_LEVELS = ['debug', 'info', 'notice', 'warning', 'error', 'critical', 'alert', 'emergency'] as const;

export type McpLogLevel = (typeof MCP_LOG_LEVELS)[number];

export type PinoLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const PINO_LEVEL_BY_MCP_LEVEL: Record<McpLogLevel, PinoLevel> = {
  debug: 'debug',
  info: 'info',
  notice: 'info',
  warning: 'warn',
  error: 'error',
  critical: 'fatal',
  alert: 'fatal',
  emergency: 'fatal'
};

// pino has no MCP counterpart for silent, so it reports as the most severe level.
const MCP_LEVEL_BY_PINO_LEVEL: Readonly<Record<string, McpLogLevel>> = {
  trace: 'debug',
  debug: 'debug',
  info: 'info',
  warn: 'warning',
  error: 'error',
  fatal: 'critical',
  silent: 'emergency'
};

export function isMcpLogLevel(value: unknown): value is McpLogLevel {
  return MCP_LOG_LEVELS.some((level) => level === value);
}

export function toPinoLevel(level: McpLogLevel): PinoLevel {
  return PINO_LEVEL_BY_MCP_LEVEL[level];
}

export function fromPinoLevel(level: string): McpLogLevel {
  return MCP_LEVEL_BY_PINO_LEVEL[level] ?? 'info';
}

export class McpLogLevelState {
  private level: McpLogLevel;
  private readonly onChange?: (level: McpLogLevel) => void;

  public constructor(initial: McpLogLevel = 'info', onChange?: (level: McpLogLevel) => void) {
    this.level = initial;
    this.onChange = onChange;
  }

  public getLevel(): McpLogLevel {
    return this.level;
  }

  public setLevel(level: McpLogLevel): void {
    this.level = level;
    this.onChange?.(level);
  }
}
