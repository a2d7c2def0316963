// src/core/state/StateManager.ts

import fs from 'node:fs/promises';
import path from 'node:path';
import lockfile from 'proper-lockfile';
import writeFileAtomic from 'write-file-atomic';
import { SyncState } from './SyncState';
import type { Logger } from '../../observability/Logger';
import { StateError, toError } from '../../utils/errors';

export interface StateStats {
  totalSyncedCount: number;
  uniqueIdCount: number;
  lastSyncTime: string | null;
}

export interface StateManagerOptions {
  lockRetries?: number;
  lockStaleMs?: number;
}

/**
 * Lock-guarded JSON document of synced ids.
 *
 * Reads take no lock. Every mutation locks the file, re-reads what is on
 * disk, applies itself, atomically replaces the whole document and adopts
 * the result as the in-memory state.
 */
export class StateManager {
  private state?: SyncState;
  readonly lockFilePath: string;

  constructor(
    readonly stateFilePath: string,
    private logger: Logger,
    private options: StateManagerOptions = {}
  ) {
    const { dir, name } = path.parse(stateFilePath);
    this.lockFilePath = path.join(dir, `${name}.lock`);
  }

  async isSynced(id: string): Promise<boolean> {
    const state = await this.getLoaded();
    return state.syncedIds.has(id);
  }

  async markSynced(id: string): Promise<void> {
    await this.mutate((state) => {
      state.syncedIds.add(id);
      state.totalSyncedCount += 1;
    });
  }

  /** Adds ids.length to the counter even when some ids were already present. */
  async markManySynced(ids: string[]): Promise<void> {
    await this.mutate((state) => {
      for (const id of ids) state.syncedIds.add(id);
      state.totalSyncedCount += ids.length;
    });
  }

  async updateLastSyncTime(now: Date = new Date()): Promise<void> {
    await this.mutate((state) => {
      state.lastSyncTime = now.toISOString();
    });
  }

  async updateCursor(cursor: string | null): Promise<void> {
    await this.mutate((state) => {
      state.lastCursor = cursor;
    });
  }

  async getStats(): Promise<StateStats> {
    const state = await this.getLoaded();
    return {
      totalSyncedCount: state.totalSyncedCount,
      uniqueIdCount: state.syncedIds.size,
      lastSyncTime: state.lastSyncTime,
    };
  }

  async clear(): Promise<void> {
    await this.mutate((state) => {
      state.syncedIds.clear();
      state.lastSyncTime = null;
      state.totalSyncedCount = 0;
      state.lastCursor = null;
    });
  }

  async reload(): Promise<void> {
    this.state = undefined;
    await this.getLoaded();
  }

  async getState(): Promise<SyncState> {
    const state = await this.getLoaded();
    return state.clone();
  }

  private async getLoaded(): Promise<SyncState> {
    if (!this.state) {
      const loaded = await this.readFromDisk();
      if (loaded === null) {
        // First run: write the empty default document
        await this.mutate(() => undefined);
      } else {
        this.state = loaded;
      }
    }
    return this.state ?? new SyncState();
  }

  /** null when the file does not exist; an empty state when it cannot be parsed. */
  private async readFromDisk(): Promise<SyncState | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.stateFilePath, 'utf8');
    } catch (error: unknown) {
      if (isNotFound(error)) return null;
      throw new StateError('Failed to read state file', {
        path: this.stateFilePath,
        error: toError(error).message,
      });
    }

    try {
      return SyncState.fromJSON(JSON.parse(raw));
    } catch (error: unknown) {
      this.logger.warn('State file is corrupted, starting from empty state', {
        path: this.stateFilePath,
        error: toError(error).message,
      });
      return new SyncState();
    }
  }

  private async mutate(apply: (state: SyncState) => void): Promise<void> {
    await fs.mkdir(path.dirname(this.stateFilePath), { recursive: true });

    let release: () => Promise<void>;
    try {
      release = await lockfile.lock(this.stateFilePath, {
        lockfilePath: this.lockFilePath,
        realpath: false,
        stale: this.options.lockStaleMs ?? 10000,
        retries: {
          retries: this.options.lockRetries ?? 100,
          minTimeout: 10,
          maxTimeout: 200,
          factor: 1.5,
        },
      });
    } catch (error: unknown) {
      throw new StateError('Could not acquire state lock', {
        lockFile: this.lockFilePath,
        error: toError(error).message,
      });
    }

    try {
      const current = (await this.readFromDisk()) ?? new SyncState();
      apply(current);
      await writeFileAtomic(this.stateFilePath, `${JSON.stringify(current.toJSON(), null, 2)}\n`);
      this.state = current;
    } catch (error: unknown) {
      if (error instanceof StateError) throw error;
      throw new StateError('Failed to write state file', {
        path: this.stateFilePath,
        error: toError(error).message,
      });
    } finally {
      await release();
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
