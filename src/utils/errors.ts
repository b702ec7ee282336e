// src/utils/errors.ts
// ═══════════════════════════════════════════════════════════════════════════
// Error types shared by the pipeline, the queue and the HTTP layer
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Base application error with structured data
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly retryable: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      code?: string;
      statusCode?: number;
      isOperational?: boolean;
      retryable?: boolean;
      context?: Record<string, unknown>;
      cause?: unknown;
    } = {}
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = options.code || 'INTERNAL_ERROR';
    this.statusCode = options.statusCode || 500;
    this.isOperational = options.isOperational ?? true;
    this.retryable = options.retryable ?? false;
    this.context = options.context;

    if (options.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The monitored page was removed (or soft-deleted) between trigger and execution.
 * Never retried.
 */
export class PageNotFoundError extends AppError {
  constructor(pageId: string) {
    super(`Monitored page '${pageId}' not found`, {
      code: 'NOT_FOUND',
      statusCode: 404,
      retryable: false,
      context: { pageId },
    });
  }
}

/**
 * The scan engine could not load the page (timeout, network, password page, 404).
 * Retried by the queue up to its attempt cap.
 */
export class ScanEngineError extends AppError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(`Scan engine failure: ${message}`, {
      code: 'SCAN_ENGINE_ERROR',
      statusCode: 502,
      retryable: true,
      context,
      cause,
    });
  }
}

/**
 * External API error (Gemini, e-mail, Telegram)
 */
export class ExternalApiError extends AppError {
  public readonly service: string;

  constructor(
    service: string,
    message: string,
    options: {
      statusCode?: number;
      cause?: unknown;
      context?: Record<string, unknown>;
    } = {}
  ) {
    super(`${service} API error: ${message}`, {
      code: 'EXTERNAL_API_ERROR',
      statusCode: options.statusCode || 502,
      retryable: true,
      context: { service, ...options.context },
      cause: options.cause,
    });
    this.service = service;
  }
}

/**
 * Manual issue transition that the status table does not allow
 */
export class InvalidTransitionError extends AppError {
  constructor(issueId: string, from: string, to: string, reason?: string) {
    super(reason ?? `Cannot move issue from ${from} to ${to}`, {
      code: 'INVALID_TRANSITION',
      statusCode: 409,
      context: { issueId, from, to },
    });
  }
}

/**
 * Not found error for resources other than monitored pages
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string) {
    super(`${resource}${identifier ? ` '${identifier}'` : ''} not found`, {
      code: 'NOT_FOUND',
      statusCode: 404,
      context: { resource, identifier },
    });
  }
}

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
 * Whether the queue should try the job again.
 * Plain errors (DB hiccups, sockets) count as transient.
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.retryable;
  }
  return true;
}
