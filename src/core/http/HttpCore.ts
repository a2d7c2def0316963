// src/core/http/HttpCore.ts

import axios, { isAxiosError } from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';
import * as http from 'node:http';
import * as https from 'node:https';
import PQueue from 'p-queue';
import { v4 as uuidv4 } from 'uuid';
import type { HttpRequestConfig, HttpResponse, RateLimitConfig, ServiceName } from './types';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import {
  ApiClientError,
  ApiServerError,
  ApiValidationError,
  AuthenticationError,
  NetworkError,
  NetworkTimeoutError,
  RateLimitError,
} from '../../utils/errors';
import { withHttpSpan } from '../../observability/tracing';

export const DEFAULT_RATE_LIMITS: Record<ServiceName, RateLimitConfig> = {
  twitter: { qps: 5, concurrency: 1 },
  notion: { qps: 3, concurrency: 1 },
  fxtwitter: { qps: 5, concurrency: 2 },
};

const SERVICES: readonly ServiceName[] = ['twitter', 'notion', 'fxtwitter'];

const USER_AGENT = 'bookmark-mirror/1.0';

export class HttpCore {
  private axiosInstance: AxiosInstance;
  private rateLimiters: Map<ServiceName, PQueue> = new Map();

  constructor(
    private rateLimits: Record<ServiceName, RateLimitConfig>,
    private metrics: MetricsCollector,
    private logger: Logger,
    timeoutMs = 30000
  ) {
    this.axiosInstance = axios.create({
      timeout: timeoutMs,
      httpAgent: new http.Agent({ keepAlive: true }),
      httpsAgent: new https.Agent({ keepAlive: true }),
    });

    this.initializeRateLimiters();
  }

  async get<T = unknown>(
    url: string,
    config: Omit<HttpRequestConfig, 'url' | 'method'> = {}
  ): Promise<HttpResponse<T>> {
    return this.request<T>({ ...config, url, method: 'GET' });
  }

  async post<T = unknown>(
    url: string,
    body: unknown,
    config: Omit<HttpRequestConfig, 'url' | 'method' | 'body'> = {}
  ): Promise<HttpResponse<T>> {
    return this.request<T>({ ...config, url, method: 'POST', body });
  }

  async patch<T = unknown>(
    url: string,
    body: unknown,
    config: Omit<HttpRequestConfig, 'url' | 'method' | 'body'> = {}
  ): Promise<HttpResponse<T>> {
    return this.request<T>({ ...config, url, method: 'PATCH', body });
  }

  /**
   * Single attempt, run inside the service's rate-limit queue.
   * Failures are rethrown as the typed errors of utils/errors.
   */
  async request<T = unknown>(config: HttpRequestConfig): Promise<HttpResponse<T>> {
    const service = this.extractService(config.url);
    const requestId = uuidv4();
    const method = config.method ?? 'GET';

    this.logger.debug('HTTP request', {
      requestId,
      service,
      url: config.url,
      method,
      query: config.query,
      headerKeys: Object.keys(config.headers ?? {}),
    });

    const headers: Record<string, string> = {
      'X-Request-ID': requestId,
      'User-Agent': USER_AGENT,
      ...config.headers,
    };

    const execute = async (): Promise<HttpResponse<T>> =>
      withHttpSpan(method, config.url, async () => {
        const startTime = Date.now();

        try {
          const axiosResponse = await this.axiosInstance.request<T>({
            url: config.url,
            method,
            headers,
            params: config.query,
            data: config.body,
            timeout: config.timeout,
          });

          this.metrics.incrementCounter('http_requests_total', {
            service,
            method,
            status: axiosResponse.status.toString(),
          });
          this.metrics.recordLatency('http_request_duration', Date.now() - startTime, {
            service,
            status: axiosResponse.status,
          });

          return {
            data: axiosResponse.data,
            status: axiosResponse.status,
            headers: this.toHeaderRecord(axiosResponse.headers),
          };
        } catch (error: unknown) {
          const status = isAxiosError(error) && error.response ? error.response.status : 'error';

          this.metrics.incrementCounter('http_requests_total', {
            service,
            method,
            status: status.toString(),
          });
          this.metrics.incrementCounter('http_errors', { service, status: status.toString() });

          throw this.transformError(error, service);
        }
      });

    return this.runThroughRateLimiter(service, execute);
  }

  private async runThroughRateLimiter<T>(
    service: ServiceName,
    task: () => Promise<T>
  ): Promise<T> {
    const queue = this.rateLimiters.get(service);

    if (!queue) {
      return task();
    }

    const wrappedTask = async (): Promise<T> => {
      try {
        return await task();
      } finally {
        this.metrics.recordGauge('rate_limit_queue_size', queue.size, { service });
      }
    };

    this.metrics.recordGauge('rate_limit_queue_size', queue.size + 1, { service });

    return queue.add(wrappedTask, { throwOnTimeout: true });
  }

  private initializeRateLimiters(): void {
    for (const service of SERVICES) {
      const config = this.rateLimits[service];
      // Fractional QPS becomes one request per longer interval
      const intervalCap = config.qps >= 1 ? config.qps : 1;
      const interval = config.qps >= 1 ? 1000 : Math.floor(1000 / config.qps);

      this.rateLimiters.set(
        service,
        new PQueue({ intervalCap, interval, concurrency: config.concurrency })
      );
    }
  }

  private extractService(url: string): ServiceName {
    if (url.includes('fxtwitter')) return 'fxtwitter';
    if (url.includes('notion')) return 'notion';
    return 'twitter';
  }

  private toHeaderRecord(headers: AxiosResponse['headers']): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        record[key.toLowerCase()] = value;
      } else if (typeof value === 'number') {
        record[key.toLowerCase()] = String(value);
      }
    }
    return record;
  }

  private transformError(error: unknown, service: ServiceName): Error {
    if (!isAxiosError(error)) {
      return new NetworkError('Network error', {
        service,
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    if (error.response) {
      const status = error.response.status;
      const headers = this.toHeaderRecord(error.response.headers);
      const details = { service, status, response: error.response.data };

      this.logger.debug('HTTP error response', {
        service,
        status,
        statusText: error.response.statusText,
        data: error.response.data,
      });

      if (status === 401) {
        return new AuthenticationError(`Authentication failed for ${service}`, details);
      }
      if (status === 429) {
        const retryAfter = Number.parseInt(headers['retry-after'] ?? '', 10);
        return new RateLimitError(
          `Rate limited by ${service}`,
          Number.isNaN(retryAfter) ? undefined : retryAfter,
          details,
          headers
        );
      }
      if (status === 400) {
        return new ApiValidationError(`Bad request to ${service}`, details);
      }
      if (status >= 400 && status < 500) {
        return new ApiClientError(`Client error: ${status}`, status, details);
      }
      return new ApiServerError(`Server error: ${status}`, status, details);
    }

    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new NetworkTimeoutError('Request timeout', { service });
    }
    return new NetworkError(`Network error: ${error.message}`, { service, code: error.code });
  }
}
