import type { ApiError } from './api';

export type AppErrorKind = 'fetch' | 'persistence_write' | 'terminal_setup';

export class AppError extends Error {
  readonly kind: AppErrorKind;

  constructor(kind: AppErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.kind = kind;
  }
}

/**
 * A search request that could not produce a result list: the network failed,
 * the service answered with an error status, or the body was not a JSON array.
 */
export class FetchError extends AppError {
  readonly details: ApiError;

  constructor(details: ApiError, options?: { cause?: unknown }) {
    super('fetch', details.message, options);
    this.name = 'FetchError';
    this.details = details;
  }
}

export class PersistenceWriteError extends AppError {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('persistence_write', `Could not save seen entries to ${filePath}: ${reason}`, { cause });
    this.name = 'PersistenceWriteError';
    this.filePath = filePath;
  }
}

export class TerminalSetupError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('terminal_setup', message, options);
    this.name = 'TerminalSetupError';
  }
}

// One-line report for the process boundary
export function describeError(error: unknown): string {
  if (error instanceof FetchError) {
    const { statusCode, endpoint } = error.details;
    const where = [statusCode, endpoint].filter((part) => part !== null && part !== undefined).join(' ');
    return where ? `${error.name}: ${error.message} (${where})` : `${error.name}: ${error.message}`;
  }
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
