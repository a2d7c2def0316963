// src/core/state/SyncState.ts

import { z } from 'zod';

// Unknown keys are dropped; missing keys take their defaults
export const SyncStateSchema = z.object({
  synced_ids: z.array(z.string()).default([]),
  last_sync_time: z.string().nullable().default(null),
  total_synced_count: z.number().int().nonnegative().default(0),
  last_cursor: z.string().nullable().default(null),
});

export type SyncStateJSON = z.infer<typeof SyncStateSchema>;

export class SyncState {
  constructor(
    public syncedIds: Set<string> = new Set(),
    public lastSyncTime: string | null = null,
    public totalSyncedCount = 0,
    public lastCursor: string | null = null
  ) {}

  static fromJSON(data: unknown): SyncState {
    const parsed = SyncStateSchema.parse(data);
    return new SyncState(
      new Set(parsed.synced_ids),
      parsed.last_sync_time,
      parsed.total_synced_count,
      parsed.last_cursor
    );
  }

  toJSON(): SyncStateJSON {
    return {
      synced_ids: [...this.syncedIds],
      last_sync_time: this.lastSyncTime,
      total_synced_count: this.totalSyncedCount,
      last_cursor: this.lastCursor,
    };
  }

  clone(): SyncState {
    return new SyncState(
      new Set(this.syncedIds),
      this.lastSyncTime,
      this.totalSyncedCount,
      this.lastCursor
    );
  }
}
