// src/utils/errors.ts

export class SyncError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// Configuration errors
export class ConfigError extends SyncError {
  constructor(
    message: string,
    public issues: string[] = [message],
    details?: Record<string, unknown>
  ) {
    super(message, 'CONFIG_ERROR', details);
  }
}

// OAuth errors
export class OAuthError extends SyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'OAUTH_ERROR', details);
  }
}

// API errors
export class ApiError extends SyncError {
  constructor(
    message: string,
    public status: number,
    details?: Record<string, unknown>,
    public headers: Record<string, string> = {}
  ) {
    super(message, 'API_ERROR', { ...details, status });
  }
}

export class ApiClientError extends ApiError {
  constructor(message: string, status = 400, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_CLIENT_ERROR';
  }
}

/** 400 responses: the request itself is malformed and will never succeed as sent. */
export class ApiValidationError extends ApiClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, details);
    this.code = 'API_VALIDATION_ERROR';
  }
}

export class AuthenticationError extends ApiClientError {
  constructor(
    message: string = 'Authentication failed',
    details?: Record<string, unknown>
  ) {
    super(message, 401, details);
    this.code = 'AUTHENTICATION_FAILED';
  }
}

export class ApiServerError extends ApiError {
  constructor(message: string, status = 500, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_SERVER_ERROR';
  }
}

export class RateLimitError extends ApiError {
  constructor(
    message: string = 'Rate limit exceeded',
    public retryAfter?: number,
    details?: Record<string, unknown>,
    headers: Record<string, string> = {}
  ) {
    super(message, 429, { ...details, retryAfter }, headers);
    this.code = 'RATE_LIMIT_EXCEEDED';
  }
}

// Network errors
export class NetworkError extends SyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', details);
  }
}

export class NetworkTimeoutError extends NetworkError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NETWORK_TIMEOUT';
  }
}

// Local state errors
export class StateError extends SyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'STATE_ERROR', details);
  }
}

/**
 * fatal: stop and report. transient: worth another attempt.
 * permanent: the same request will fail again.
 */
export type ErrorKind = 'fatal' | 'transient' | 'permanent';

export function classifyError(error: unknown): ErrorKind {
  if (
    error instanceof ConfigError ||
    error instanceof OAuthError ||
    error instanceof AuthenticationError ||
    error instanceof StateError
  ) {
    return 'fatal';
  }
  if (error instanceof RateLimitError || error instanceof ApiServerError || error instanceof NetworkError) {
    return 'transient';
  }
  if (error instanceof ApiClientError) {
    return 'permanent';
  }
  return 'transient';
}

/** Upstream failures mapped by HttpCore that another attempt may fix. */
export function isRetryable(error: Error): boolean {
  return error instanceof SyncError && classifyError(error) === 'transient';
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
