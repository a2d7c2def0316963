// src/core/normalizer/ProviderMappers.ts

import type { ContentKind, NormalizedItem } from './types';
import type { TwitterTweet, TwitterUser } from '../../connectors/twitter/types';
import type { FxArticle, FxTweet } from '../../connectors/fxtwitter/types';

export const LONG_FORM_THRESHOLD = 280;

/**
 * Shape heuristic, first match wins:
 * note payload, reply, over 280 code points, otherwise short.
 */
export function classifyTweet(tweet: TwitterTweet): ContentKind {
  if (tweet.note_tweet) return 'LONG_FORM';

  if (tweet.referenced_tweets?.some((ref) => ref.type === 'replied_to')) {
    return 'THREAD';
  }

  if ([...(tweet.text ?? '')].length > LONG_FORM_THRESHOLD) return 'LONG_FORM';

  return 'SHORT';
}

function toIsoOr(value: string | undefined, fallback: Date): string {
  if (!value) return fallback.toISOString();
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? fallback.toISOString() : parsed.toISOString();
}

export class ProviderMappers {
  // Twitter API v2 bookmark or search result
  mapTwitter(
    raw: TwitterTweet,
    users: ReadonlyMap<string, TwitterUser>,
    observedAt: Date
  ): NormalizedItem {
    const author = raw.author_id ? users.get(raw.author_id) : undefined;
    const authorHandle = author?.username ?? 'unknown';

    return {
      id: raw.id,
      body: raw.note_tweet?.text ?? raw.text ?? '',
      authorName: author?.name ?? 'Unknown',
      authorHandle,
      url: `https://twitter.com/${authorHandle}/status/${raw.id}`,
      createdAt: toIsoOr(raw.created_at, observedAt),
      observedAt: observedAt.toISOString(),
      contentKind: classifyTweet(raw),
      relatedItems: [],
      isTruncated: raw.truncated ?? false,
    };
  }

  // FxTwitter status lookup, used by the SMS path
  mapFxTwitter(raw: FxTweet, id: string, url: string, observedAt: Date): NormalizedItem {
    const text = raw.text ?? '';
    const createdAt =
      raw.created_timestamp !== undefined
        ? new Date(raw.created_timestamp * 1000).toISOString()
        : toIsoOr(raw.created_at, observedAt);

    const base = {
      id: raw.id ?? id,
      authorName: raw.author?.name ?? 'Unknown',
      authorHandle: raw.author?.screen_name ?? 'unknown',
      url,
      createdAt,
      observedAt: observedAt.toISOString(),
      relatedItems: [],
      isTruncated: false,
    };

    if (raw.article) {
      return {
        ...base,
        body: renderArticle(raw.article),
        contentKind: 'LONG_FORM',
        title: raw.article.title || undefined,
      };
    }

    return {
      ...base,
      body: text,
      contentKind: [...text].length > LONG_FORM_THRESHOLD ? 'LONG_FORM' : 'SHORT',
    };
  }
}

/** Article blocks to the prefixed plain text understood by textToBlocks. */
export function renderArticle(article: FxArticle): string {
  const parts: string[] = [];

  for (const block of article.content?.blocks ?? []) {
    const text = block.text ?? '';
    switch (block.type) {
      case 'header-one':
        parts.push(`\n# ${text}\n`);
        break;
      case 'header-two':
        parts.push(`\n## ${text}\n`);
        break;
      case 'header-three':
        parts.push(`\n### ${text}\n`);
        break;
      case 'unordered-list-item':
      case 'ordered-list-item':
        parts.push(`• ${text}`);
        break;
      case 'blockquote':
        parts.push(`> ${text}`);
        break;
      default:
        if (text) parts.push(text);
    }
  }

  return parts.join('\n\n').trim();
}
