// src/core/http/types.ts

export type ServiceName = 'twitter' | 'notion' | 'fxtwitter';

export interface HttpRequestConfig {
  url: string;
  method?: 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean>;
  body?: unknown;
  timeout?: number;
}

export interface HttpResponse<T = unknown> {
  data: T;
  status: number;
  headers: Record<string, string>;
}

export interface RateLimitConfig {
  qps: number; // Queries per second
  concurrency: number; // Max concurrent requests
}

/**
 * Decides whether a failed attempt is retried.
 * `delayFor` returns the wait in milliseconds, or null to rethrow at once.
 * `attempt` is zero-based.
 */
export interface RetryPolicy {
  maxAttempts: number;
  delayFor(error: Error, attempt: number): number | null;
}

export type Sleep = (ms: number) => Promise<void>;
