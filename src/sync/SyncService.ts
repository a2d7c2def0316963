// src/sync/SyncService.ts

import fs from 'node:fs/promises';
import path from 'node:path';
import type { NormalizedItem } from '../core/normalizer/types';
import type { StateManager, StateStats } from '../core/state/StateManager';
import type { Sleep } from '../core/http/types';
import { sleep as defaultSleep } from '../core/http/RetryHandler';
import type { AddItemOptions } from '../connectors/notion/NotionConnector';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';
import { withCycleSpan } from '../observability/tracing';
import { toError } from '../utils/errors';

export type SyncPhase = 'IDLE' | 'SETUP' | 'CYCLE' | 'WAITING' | 'STOPPED';

/** Upstream side, implemented by TwitterConnector. */
export interface BookmarkSource {
  getAccountId(): Promise<string>;
  fetchAll(limit?: number): AsyncIterable<NormalizedItem>;
  enrichWithThread(item: NormalizedItem): Promise<NormalizedItem>;
}

/** Destination side, implemented by NotionConnector. */
export interface BookmarkSink {
  addItem(item: NormalizedItem, options?: AddItemOptions): Promise<string | null>;
  databaseHasExpectedShape(): Promise<boolean>;
  ensureDatabaseShape(): Promise<boolean>;
}

export type SyncStateStore = Pick<
  StateManager,
  'isSynced' | 'markSynced' | 'updateLastSyncTime' | 'getStats'
>;

export interface SyncServiceConfig {
  intervalMinutes: number;
  stateFilePath: string;
  logFilePath: string;
  /** Courtesy pause after each written or failed item */
  itemDelayMs?: number;
  /** Granularity at which the inter-cycle wait checks for shutdown */
  waitTickMs?: number;
}

export interface SyncServiceDeps {
  source: BookmarkSource;
  sink: BookmarkSink;
  state: SyncStateStore;
  logger: Logger;
  metrics: MetricsCollector;
  sleep?: Sleep;
}

interface PassCounts {
  synced: number;
  skipped: number;
  errors: number;
}

export interface CycleStats extends PassCounts {
  startedAt: string;
  completedAt: string;
  fetched: number;
  errorMessage?: string;
}

export interface BackfillStats extends PassCounts {
  startedAt: string;
  completedAt: string;
  processed: number;
  errorMessage?: string;
}

export interface SyncStatus {
  phase: SyncPhase;
  running: boolean;
  syncStats: StateStats;
  config: {
    intervalMinutes: number;
    stateFile: string;
    logFile: string;
  };
}

type PassMode = 'cycle' | 'backfill';

const BACKFILL_PROGRESS_EVERY = 10;

/**
 * Drives fetch, dedup check, write and mark, once or on an interval.
 *
 * Items are handled strictly one at a time. A failed item is left unmarked
 * and is attempted again on the next pass.
 */
export class SyncService {
  private phase: SyncPhase = 'IDLE';
  private running = false;
  private readonly sleep: Sleep;
  private readonly itemDelayMs: number;
  private readonly waitTickMs: number;

  constructor(
    private config: SyncServiceConfig,
    private deps: SyncServiceDeps
  ) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.itemDelayMs = config.itemDelayMs ?? 500;
    this.waitTickMs = config.waitTickMs ?? 1000;
  }

  get currentPhase(): SyncPhase {
    return this.phase;
  }

  /**
   * Local directories, destination schema and upstream credentials.
   * Returns false on any failure; nothing here is retried.
   */
  async setup(): Promise<boolean> {
    this.phase = 'SETUP';
    const { logger } = this.deps;
    logger.info('Running initial setup');

    try {
      await fs.mkdir(path.dirname(this.config.stateFilePath), { recursive: true });
      await fs.mkdir(path.dirname(this.config.logFilePath), { recursive: true });
    } catch (error: unknown) {
      logger.error('Failed to create local directories', { error: toError(error).message });
      this.phase = 'STOPPED';
      return false;
    }

    if (!(await this.deps.sink.databaseHasExpectedShape())) {
      logger.info('Attempting to set up database schema');
      if (!(await this.deps.sink.ensureDatabaseShape())) {
        logger.error('Failed to set up Notion database');
        this.phase = 'STOPPED';
        return false;
      }
    }

    try {
      const accountId = await this.deps.source.getAccountId();
      logger.info('Twitter authentication successful', { accountId });
    } catch (error: unknown) {
      logger.error('Twitter authentication failed', { error: toError(error).message });
      this.phase = 'STOPPED';
      return false;
    }

    logger.info('Setup completed successfully');
    this.phase = 'IDLE';
    return true;
  }

  /** Writes one item unless already synced. True when it is synced afterwards. */
  async syncItem(item: NormalizedItem): Promise<boolean> {
    const { state, sink, source, logger } = this.deps;

    if (await state.isSynced(item.id)) {
      logger.debug('Item already synced, skipping', { id: item.id });
      return true;
    }

    try {
      const enriched = await source.enrichWithThread(item);
      const pageId = await sink.addItem(enriched);
      if (!pageId) {
        logger.warn('Failed to sync item', { id: item.id });
        return false;
      }

      await state.markSynced(item.id);
      return true;
    } catch (error: unknown) {
      logger.error('Failed to sync item', { id: item.id, error: toError(error).message });
      return false;
    }
  }

  /** One pass over the whole feed. Always stamps the last sync time. */
  async runCycle(): Promise<CycleStats> {
    this.phase = 'CYCLE';
    const { logger } = this.deps;
    logger.info('Starting sync cycle');

    const { startedAt, seen, counts, errorMessage } = await this.pass('cycle');

    let finalError = errorMessage;
    try {
      await this.deps.state.updateLastSyncTime();
      this.deps.metrics.recordGauge('last_sync_timestamp', Date.now() / 1000);
    } catch (error: unknown) {
      logger.error('Failed to record last sync time', { error: toError(error).message });
      finalError = finalError ?? toError(error).message;
    }

    const stats: CycleStats = {
      startedAt,
      completedAt: new Date().toISOString(),
      fetched: seen,
      ...counts,
      ...(finalError !== undefined ? { errorMessage: finalError } : {}),
    };

    logger.info('Sync cycle complete', {
      synced: stats.synced,
      skipped: stats.skipped,
      errors: stats.errors,
    });

    this.phase = 'IDLE';
    return stats;
  }

  /** One-shot pass over the backlog, optionally capped. Leaves the last sync time alone. */
  async runBackfill(limit?: number): Promise<BackfillStats> {
    this.phase = 'CYCLE';
    const { logger } = this.deps;
    logger.info('Starting backfill', { limit: limit ?? 'none' });

    const { startedAt, seen, counts, errorMessage } = await this.pass('backfill', limit);

    const stats: BackfillStats = {
      startedAt,
      completedAt: new Date().toISOString(),
      processed: seen,
      ...counts,
      ...(errorMessage !== undefined ? { errorMessage } : {}),
    };

    logger.info('Backfill complete', { synced: stats.synced, skipped: stats.skipped });
    this.phase = 'IDLE';
    return stats;
  }

  /**
   * Cycles until `signal` aborts. The wait between cycles checks the signal
   * every tick so shutdown does not wait for the whole interval.
   */
  async run(signal: AbortSignal): Promise<void> {
    const { logger } = this.deps;
    this.running = true;
    const intervalMs = this.config.intervalMinutes * 60 * 1000;

    logger.info('Starting sync service', { intervalMinutes: this.config.intervalMinutes });

    try {
      while (!signal.aborted) {
        try {
          await this.runCycle();
        } catch (error: unknown) {
          logger.error('Unexpected error in sync cycle', { error: toError(error).message });
        }

        if (signal.aborted) break;

        this.phase = 'WAITING';
        logger.info('Waiting until next sync', { minutes: this.config.intervalMinutes });

        for (let waited = 0; waited < intervalMs && !signal.aborted; waited += this.waitTickMs) {
          await this.sleep(this.waitTickMs);
        }
      }
    } finally {
      this.running = false;
      this.phase = 'STOPPED';
      logger.info('Sync service stopped');
    }
  }

  async getStatus(): Promise<SyncStatus> {
    return {
      phase: this.phase,
      running: this.running,
      syncStats: await this.deps.state.getStats(),
      config: {
        intervalMinutes: this.config.intervalMinutes,
        stateFile: this.config.stateFilePath,
        logFile: this.config.logFilePath,
      },
    };
  }

  private async pass(
    mode: PassMode,
    limit?: number
  ): Promise<{ startedAt: string; seen: number; counts: PassCounts; errorMessage?: string }> {
    const { source, state, logger, metrics } = this.deps;
    const startedAt = new Date();
    const counts: PassCounts = { synced: 0, skipped: 0, errors: 0 };
    let seen = 0;

    const errorMessage = await withCycleSpan(mode, async (span): Promise<string | undefined> => {
      let failure: string | undefined;
      try {
        for await (const item of source.fetchAll(limit)) {
          seen++;
          metrics.incrementCounter('items_fetched');

          if (await state.isSynced(item.id)) {
            counts.skipped++;
            metrics.incrementCounter('items_skipped', { mode });
            continue;
          }

          if (await this.syncItem(item)) {
            counts.synced++;
            metrics.incrementCounter('items_synced', { mode });
          } else {
            counts.errors++;
            metrics.incrementCounter('items_failed', { mode });
          }

          if (mode === 'backfill' && seen % BACKFILL_PROGRESS_EVERY === 0) {
            logger.info('Backfill progress', { processed: seen });
          }

          await this.sleep(this.itemDelayMs);
        }
      } catch (error: unknown) {
        failure = toError(error).message;
        logger.error(`Error during ${mode}`, { error: failure });
      }

      span?.setAttribute('sync.synced', counts.synced);
      span?.setAttribute('sync.errors', counts.errors);
      return failure;
    });

    metrics.recordLatency('cycle_duration', Date.now() - startedAt.getTime(), { mode });
    return { startedAt: startedAt.toISOString(), seen, counts, errorMessage };
  }
}
