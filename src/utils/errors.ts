// This module provides a typed application error that can be mapped into JSON-RPC, tool, and HTTP responses.

import { ZodError } from 'zod';

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: unknown;

  public constructor(statusCode: number, code: string, message: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

// This helper renders one zod issue path as a dotted field name, or null for root-level issues.
export function formatIssuePath(path: Array<string | number>): string | null {
  if (path.length === 0) {
    return null;
  }

  return path.map(String).join('.');
}

// This helper builds one human-readable sentence from the first zod issue so callers can name the offending field.
export function describeFirstIssue(error: ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return 'Validation failed.';
  }

  const field = formatIssuePath(issue.path);
  return field ? `Invalid argument "${field}": ${issue.message}` : `Invalid arguments: ${issue.message}`;
}

// This helper normalizes unknown failures into an AppError without leaking internals.
export function normalizeError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof ZodError) {
    return new AppError(400, 'validation_error', describeFirstIssue(error), error.flatten());
  }

  // Framework errors such as malformed JSON bodies carry their own 4xx status.
  if (
    error instanceof Error &&
    'statusCode' in error &&
    typeof error.statusCode === 'number' &&
    error.statusCode >= 400 &&
    error.statusCode < 500
  ) {
    return new AppError(error.statusCode, 'bad_request', error.message);
  }

  if (error instanceof Error) {
    return new AppError(500, 'internal_error', error.message);
  }

  return new AppError(500, 'internal_error', 'An unexpected error occurred.');
}
