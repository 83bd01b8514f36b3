// src/utils/errors.ts
// ═══════════════════════════════════════════════════════════════════════════
// Error taxonomy for the watcher. Everything below AppError is caught at the
// per-search boundary of a cycle; only ConfigurationError stops the process.
// ═══════════════════════════════════════════════════════════════════════════

import pino from 'pino';

const logger = pino({ name: 'errors' });

export type ErrorCode =
  | 'INTERNAL_ERROR'
  | 'AUTH_ERROR'
  | 'RATE_LIMIT_EXCEEDED'
  | 'TRANSIENT_HTTP_ERROR'
  | 'PERMANENT_HTTP_ERROR'
  | 'STORAGE_CORRUPTION'
  | 'CONFIGURATION_ERROR';

/**
 * Base application error with structured data
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      code?: ErrorCode;
      isOperational?: boolean;
      context?: Record<string, unknown>;
      cause?: unknown;
    } = {},
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = options.code ?? 'INTERNAL_ERROR';
    this.isOperational = options.isOperational ?? true;
    this.context = options.context;

    if (options.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * OAuth credential exchange failed after its retries.
 */
export class AuthError extends AppError {
  public readonly status?: number;

  constructor(message: string, options: { status?: number; attempts?: number; cause?: unknown } = {}) {
    super(message, {
      code: 'AUTH_ERROR',
      context: { status: options.status, attempts: options.attempts },
      cause: options.cause,
    });
    this.status = options.status;
  }
}

/**
 * Local or provider-reported call budget is exhausted. Skip, never retry.
 */
export class RateLimitError extends AppError {
  public readonly source: 'local' | 'provider';

  constructor(message: string, source: 'local' | 'provider', context?: Record<string, unknown>) {
    super(message, {
      code: 'RATE_LIMIT_EXCEEDED',
      context: { source, ...context },
    });
    this.source = source;
  }
}

/**
 * Retryable network or server fault that outlived its retry ceiling.
 */
export class TransientHttpError extends AppError {
  public readonly status?: number;
  public readonly attempts: number;

  constructor(message: string, options: { status?: number; attempts: number; cause?: unknown }) {
    super(message, {
      code: 'TRANSIENT_HTTP_ERROR',
      context: { status: options.status, attempts: options.attempts },
      cause: options.cause,
    });
    this.status = options.status;
    this.attempts = options.attempts;
  }
}

/**
 * 4xx other than 401/429. Not retried.
 */
export class PermanentHttpError extends AppError {
  public readonly status: number;

  constructor(message: string, status: number, context?: Record<string, unknown>) {
    super(message, {
      code: 'PERMANENT_HTTP_ERROR',
      context: { status, ...context },
    });
    this.status = status;
  }
}

/**
 * A persisted state file could not be read back.
 */
export class StorageCorruptionError extends AppError {
  constructor(filePath: string, reason: string, cause?: unknown) {
    super(`State file ${filePath} is unreadable: ${reason}`, {
      code: 'STORAGE_CORRUPTION',
      isOperational: false,
      context: { filePath },
      cause,
    });
  }
}

/**
 * Configuration error
 */
export class ConfigurationError extends AppError {
  constructor(message: string, issues?: string[]) {
    super(message, {
      code: 'CONFIGURATION_ERROR',
      isOperational: false,
      context: { issues },
    });
  }
}

/** Errors a search can end with; the orchestrator handles each kind. */
export type SearchError = AuthError | RateLimitError | TransientHttpError | PermanentHttpError;

/**
 * Safely extracts error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error occurred';
}

/**
 * Creates a structured error object for logging
 */
export function toErrorObject(error: unknown): Record<string, unknown> {
  if (error instanceof AppError) {
    return {
      name: error.name,
      message: error.message,
      code: error.code,
      isOperational: error.isOperational,
      context: error.context,
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: getErrorMessage(error),
    rawError: error,
  };
}

/**
 * Logs an error with appropriate level based on type
 */
export function logError(event: string, error: unknown, context?: Record<string, unknown>): void {
  const errorObj = toErrorObject(error);

  if (error instanceof AppError && error.isOperational) {
    logger.warn({ event, ...errorObj, ...context }, event);
  } else {
    logger.error({ event, ...errorObj, ...context }, event);
  }
}

/**
 * Result type for operations that can fail
 */
export type Result<T, E = AppError> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * Creates a success result
 */
export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

/**
 * Creates a failure result
 */
export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}
