// tests/unit/SyncState.test.ts

import { describe, it, expect } from 'vitest';
import { SyncState } from '../../src/core/state/SyncState';

describe('SyncState', () => {
  it('should fill defaults for missing keys', () => {
    const state = SyncState.fromJSON({});

    expect(state.syncedIds.size).toBe(0);
    expect(state.lastSyncTime).toBeNull();
    expect(state.totalSyncedCount).toBe(0);
    expect(state.lastCursor).toBeNull();
  });

  it('should read the persisted document', () => {
    const state = SyncState.fromJSON({
      synced_ids: ['1', '2', '2'],
      last_sync_time: '2024-05-01T10:00:00.000Z',
      total_synced_count: 3,
      last_cursor: 'abc',
      unknown_key: true,
    });

    expect([...state.syncedIds]).toEqual(['1', '2']);
    expect(state.totalSyncedCount).toBe(3);
    expect(state.lastCursor).toBe('abc');
  });

  it('should write the persisted document', () => {
    const state = new SyncState(new Set(['7']), '2024-05-01T10:00:00.000Z', 1, null);

    expect(state.toJSON()).toEqual({
      synced_ids: ['7'],
      last_sync_time: '2024-05-01T10:00:00.000Z',
      total_synced_count: 1,
      last_cursor: null,
    });
  });

  it('should reject a malformed document', () => {
    expect(() => SyncState.fromJSON({ synced_ids: 'nope' })).toThrow();
    expect(() => SyncState.fromJSON({ total_synced_count: -1 })).toThrow();
  });

  it('should clone without sharing the id set', () => {
    const state = new SyncState(new Set(['1']));
    const copy = state.clone();
    copy.syncedIds.add('2');

    expect(state.syncedIds.has('2')).toBe(false);
  });
});
