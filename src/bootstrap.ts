// src/bootstrap.ts

import { HttpCore, DEFAULT_RATE_LIMITS } from './core/http/HttpCore';
import { RetryHandler } from './core/http/RetryHandler';
import { Normalizer } from './core/normalizer/Normalizer';
import { StateManager } from './core/state/StateManager';
import type { CoreDeps } from './connectors/types';
import { TwitterConnector } from './connectors/twitter/TwitterConnector';
import { NotionConnector } from './connectors/notion/NotionConnector';
import { FxTwitterConnector } from './connectors/fxtwitter/FxTwitterConnector';
import { SyncService } from './sync/SyncService';
import { Logger } from './observability/Logger';
import type { LoggerConfig } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import type { SyncAppConfig, WebhookAppConfig } from './config/ConfigValidator';
import { createWebhookApp } from './webhook/server';
import type { Express } from 'express';

export interface CoreOptions {
  logging: LoggerConfig;
  metricsPort?: number;
  httpTimeoutMs?: number;
}

/** Shared plumbing every connector is built on. */
export function createCore(options: CoreOptions): CoreDeps {
  const logger = new Logger(options.logging);
  const metrics = new MetricsCollector({ port: options.metricsPort }, logger);

  return {
    http: new HttpCore(DEFAULT_RATE_LIMITS, metrics, logger, options.httpTimeoutMs),
    retry: new RetryHandler(logger),
    normalizer: new Normalizer(),
    logger,
    metrics,
  };
}

export interface SyncContainer {
  core: CoreDeps;
  state: StateManager;
  sink: NotionConnector;
  service: SyncService;
}

export function createSyncContainer(config: SyncAppConfig, core?: CoreDeps): SyncContainer {
  const deps =
    core ??
    createCore({
      logging: { ...config.logging, filePath: config.sync.logFilePath },
      metricsPort: config.metrics.port,
    });

  const state = new StateManager(config.sync.stateFilePath, deps.logger);
  const source = new TwitterConnector(deps, { accessToken: config.twitter.accessToken });
  const sink = new NotionConnector(deps, config.notion);

  const service = new SyncService(
    {
      intervalMinutes: config.sync.intervalMinutes,
      stateFilePath: config.sync.stateFilePath,
      logFilePath: config.sync.logFilePath,
    },
    { source, sink, state, logger: deps.logger, metrics: deps.metrics }
  );

  return { core: deps, state, sink, service };
}

export function createWebhookContainer(
  config: WebhookAppConfig,
  core?: CoreDeps
): { core: CoreDeps; app: Express } {
  const timeoutMs = config.requestTimeoutSeconds * 1000;
  const deps = core ?? createCore({ logging: config.logging, httpTimeoutMs: timeoutMs });

  const app = createWebhookApp(config, {
    fetcher: new FxTwitterConnector(deps, { timeoutMs }),
    writer: new NotionConnector(deps, config.notion),
    logger: deps.logger,
    metrics: deps.metrics,
  });

  return { core: deps, app };
}
