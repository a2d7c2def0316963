// src/core/normalizer/types.ts

export type ContentKind = 'SHORT' | 'THREAD' | 'LONG_FORM';

export interface NormalizedItem {
  id: string; // Source id, the dedup key
  body: string;
  authorName: string;
  authorHandle: string;
  url: string;
  createdAt: string; // ISO 8601, source-assigned
  observedAt?: string; // ISO 8601, when this process saw the item
  contentKind: ContentKind;
  relatedItems: NormalizedItem[]; // THREAD only, chronological
  isTruncated: boolean;
  title?: string;
}

export type SourceName = 'twitter' | 'fxtwitter';

const THREAD_DIVIDER = '\n\n---\n\n';

/** Body, followed by each related item's body for threads. */
export function fullBody(item: NormalizedItem): string {
  if (item.contentKind !== 'THREAD' || item.relatedItems.length === 0) {
    return item.body;
  }
  return [item.body, ...item.relatedItems.map((related) => related.body)].join(THREAD_DIVIDER);
}

export function authorDisplay(item: Pick<NormalizedItem, 'authorName' | 'authorHandle'>): string {
  return `${item.authorName} (@${item.authorHandle})`;
}
