// src/core/normalizer/Normalizer.ts

import { z } from 'zod';
import type { NormalizedItem, SourceName } from './types';
import { ProviderMappers } from './ProviderMappers';
import type { TwitterTweetResponse, TwitterUser } from '../../connectors/twitter/types';
import type { FxTweet } from '../../connectors/fxtwitter/types';

export const NormalizedItemSchema: z.ZodType<NormalizedItem> = z.lazy(() =>
  z.object({
    id: z.string().min(1),
    body: z.string(),
    authorName: z.string(),
    authorHandle: z.string(),
    url: z.string().url(),
    createdAt: z.string().datetime(),
    observedAt: z.string().datetime().optional(),
    contentKind: z.enum(['SHORT', 'THREAD', 'LONG_FORM']),
    relatedItems: z.array(NormalizedItemSchema),
    isTruncated: z.boolean(),
    title: z.string().optional(),
  })
);

export class Normalizer {
  private mappers: ProviderMappers;

  constructor() {
    this.mappers = new ProviderMappers();
  }

  /**
   * Map one page of tweets, joining each to its author from `includes.users`.
   * Items keep page order.
   */
  normalizeTwitterPage(response: TwitterTweetResponse, observedAt: Date): NormalizedItem[] {
    const users = new Map<string, TwitterUser>(
      (response.includes?.users ?? []).map((user) => [user.id, user])
    );

    return (response.data ?? []).map((raw) =>
      this.validate('twitter', this.mappers.mapTwitter(raw, users, observedAt))
    );
  }

  normalizeFxTwitter(raw: FxTweet, id: string, url: string, observedAt: Date): NormalizedItem {
    return this.validate('fxtwitter', this.mappers.mapFxTwitter(raw, id, url, observedAt));
  }

  private validate(source: SourceName, item: NormalizedItem): NormalizedItem {
    const result = NormalizedItemSchema.safeParse(item);
    if (!result.success) {
      throw new Error(`Schema validation failed for ${source}: ${result.error.message}`);
    }
    return item;
  }
}
