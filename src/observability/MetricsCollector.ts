// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram, Gauge } from 'prom-client';
import * as http from 'node:http';
import type { Logger } from './Logger';

export interface MetricsConfig {
  enabled?: boolean;
  port?: number;
  path?: string;
}

type Labels = Record<string, string | number>;

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();
  private gauges: Map<string, Gauge> = new Map();
  private server?: http.Server;
  private logger?: Logger;

  constructor(config: MetricsConfig = {}, logger?: Logger) {
    this.logger = logger;
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();

      if (config.port) {
        this.exposeMetrics(config.port, config.path ?? '/metrics');
      }
    }
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  private initializeMetrics(): void {
    // HTTP metrics
    this.counters.set(
      'http_requests_total',
      new Counter({
        name: 'http_requests_total',
        help: 'Total HTTP requests',
        labelNames: ['service', 'method', 'status'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'http_request_duration',
      new Histogram({
        name: 'http_request_duration_seconds',
        help: 'HTTP request duration',
        labelNames: ['service', 'status'],
        buckets: [0.1, 0.5, 1, 2, 5],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'http_errors',
      new Counter({
        name: 'http_errors_total',
        help: 'HTTP errors',
        labelNames: ['service', 'status'],
        registers: [this.registry],
      })
    );

    // Rate limiting metrics
    this.gauges.set(
      'rate_limit_queue_size',
      new Gauge({
        name: 'rate_limit_queue_size',
        help: 'Current rate limit queue size',
        labelNames: ['service'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'rate_limit_waits',
      new Counter({
        name: 'rate_limit_waits_total',
        help: 'Waits caused by upstream rate limiting',
        labelNames: ['service'],
        registers: [this.registry],
      })
    );

    // Sync metrics
    this.counters.set(
      'items_fetched',
      new Counter({
        name: 'items_fetched_total',
        help: 'Bookmarks yielded by the upstream feed',
        registers: [this.registry],
      })
    );

    this.counters.set(
      'items_synced',
      new Counter({
        name: 'items_synced_total',
        help: 'Bookmarks written to the destination',
        labelNames: ['mode'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'items_skipped',
      new Counter({
        name: 'items_skipped_total',
        help: 'Bookmarks skipped as already synced',
        labelNames: ['mode'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'items_failed',
      new Counter({
        name: 'items_failed_total',
        help: 'Bookmarks that failed to sync',
        labelNames: ['mode'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'cycle_duration',
      new Histogram({
        name: 'sync_cycle_duration_seconds',
        help: 'Duration of a sync cycle or backfill',
        labelNames: ['mode'],
        buckets: [1, 5, 15, 30, 60, 300],
        registers: [this.registry],
      })
    );

    this.gauges.set(
      'last_sync_timestamp',
      new Gauge({
        name: 'last_sync_timestamp_seconds',
        help: 'Unix time of the last completed cycle',
        registers: [this.registry],
      })
    );

    // SMS webhook metrics
    this.counters.set(
      'sms_requests',
      new Counter({
        name: 'sms_requests_total',
        help: 'Inbound SMS webhook requests by outcome',
        labelNames: ['outcome'],
        registers: [this.registry],
      })
    );
  }

  incrementCounter(name: string, labels: Labels = {}): void {
    const counter = this.counters.get(name);
    counter?.inc(labels);
  }

  recordLatency(name: string, durationMs: number, labels: Labels = {}): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  recordGauge(name: string, value: number, labels: Labels = {}): void {
    const gauge = this.gauges.get(name);
    gauge?.set(labels, value);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  private exposeMetrics(port: number, path: string): void {
    const server = http.createServer((req, res) => {
      if (req.url !== path) {
        res.statusCode = 404;
        res.end('Not Found');
        return;
      }
      this.getMetrics()
        .then((body) => {
          res.setHeader('Content-Type', this.registry.contentType);
          res.end(body);
        })
        .catch((error: unknown) => {
          res.statusCode = 500;
          res.end(error instanceof Error ? error.message : String(error));
        });
    });

    server.on('error', (error: Error) => {
      this.logger?.error('Metrics server error', { port, error: error.message });
    });

    server.listen(port, () => {
      this.logger?.info(`Metrics exposed on http://localhost:${port}${path}`);
    });

    this.server = server;
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = undefined;
    return new Promise((resolve) => {
      server.close(() => resolve());
    });
  }
}
