/**
 * Application Errors
 *
 * Every error the orchestrator raises on purpose extends AppError, so the
 * HTTP layer and the scheduler can read `code`, `statusCode` and `retryable`
 * without string matching.
 */

export interface AppErrorOptions {
  statusCode?: number;
  retryable?: boolean;
  context?: Record<string, unknown>;
  cause?: unknown;
}

export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly retryable: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, options: AppErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = options.statusCode ?? 500;
    this.retryable = options.retryable ?? false;
    this.context = options.context;

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      context: this.context,
    };
  }
}

// ═══════════════════════════════════════════════════════════════
// STARTUP / HTTP
// ═══════════════════════════════════════════════════════════════

export class ConfigError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', { context });
    this.name = 'ConfigError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', { statusCode: 404, context });
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', { statusCode: 400, context });
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════
// PROVIDERS
// ═══════════════════════════════════════════════════════════════

export type ProviderErrorKind =
  | 'RATE_LIMITED'
  | 'UNAUTHORIZED'
  | 'UNAVAILABLE'
  | 'MALFORMED_RESPONSE';

const TRANSIENT_KINDS: ReadonlySet<ProviderErrorKind> = new Set(['RATE_LIMITED', 'UNAVAILABLE']);

export class ProviderError extends AppError {
  public readonly kind: ProviderErrorKind;
  public readonly provider: string;

  constructor(
    provider: string,
    kind: ProviderErrorKind,
    message: string,
    options: { statusCode?: number; cause?: unknown; context?: Record<string, unknown> } = {},
  ) {
    super(message, `PROVIDER_${kind}`, {
      statusCode: 502,
      retryable: TRANSIENT_KINDS.has(kind),
      context: { provider, httpStatus: options.statusCode, ...options.context },
      cause: options.cause,
    });
    this.name = 'ProviderError';
    this.kind = kind;
    this.provider = provider;
  }

  /** Rate limits, timeouts and outages: expected to clear on their own. */
  get transient(): boolean {
    return this.retryable;
  }
}

// ═══════════════════════════════════════════════════════════════
// DATA / STORAGE
// ═══════════════════════════════════════════════════════════════

export class DataIntegrityError extends AppError {
  public readonly seriesKey: string;
  public readonly period?: string;

  constructor(seriesKey: string, message: string, period?: string) {
    super(message, 'DATA_INTEGRITY', { context: { seriesKey, period } });
    this.name = 'DataIntegrityError';
    this.seriesKey = seriesKey;
    this.period = period;
  }
}

export class StorageUnavailableError extends AppError {
  constructor(operation: string, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause ?? 'unknown');
    super(`Storage unavailable during ${operation}: ${detail}`, 'STORAGE_UNAVAILABLE', {
      statusCode: 503,
      retryable: true,
      context: { operation },
      cause,
    });
    this.name = 'StorageUnavailableError';
  }
}

// ═══════════════════════════════════════════════════════════════
// AI CAPABILITY
// ═══════════════════════════════════════════════════════════════

export class AIUnavailableError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 'AI_UNAVAILABLE', { statusCode: 503, retryable: true, cause });
    this.name = 'AIUnavailableError';
  }
}

export class ContextTooLargeError extends AppError {
  public readonly estimatedTokens?: number;
  public readonly maxContextTokens?: number;

  constructor(message: string, estimatedTokens?: number, maxContextTokens?: number) {
    super(message, 'CONTEXT_TOO_LARGE', {
      statusCode: 422,
      retryable: false,
      context: { estimatedTokens, maxContextTokens },
    });
    this.name = 'ContextTooLargeError';
    this.estimatedTokens = estimatedTokens;
    this.maxContextTokens = maxContextTokens;
  }
}

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === 'string' ? error : 'Unknown error';
}
