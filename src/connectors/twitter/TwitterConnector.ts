import { BaseConnector } from '../BaseConnector';
import type { CoreDeps } from '../types';
import type { NormalizedItem } from '../../core/normalizer/types';
import type { HttpResponse, RetryPolicy } from '../../core/http/types';
import type { TwitterTweetResponse, TwitterUserResponse } from './types';
import { RateLimitTracker } from './RateLimitTracker';
import { RateLimitError, isRetryable, toError } from '../../utils/errors';

export interface TwitterConnectorOptions {
  accessToken: string;
  apiBaseUrl?: string;
  maxAttempts?: number;
  /** Base of the exponential backoff for network errors and 5xx */
  baseDelayMs?: number;
  /** Used when a 429 carries no retry-after */
  defaultRetryAfterSeconds?: number;
  rateLimit?: RateLimitTracker;
}

export interface BookmarkPage {
  items: NormalizedItem[];
  nextCursor?: string;
}

const TWEET_FIELDS = 'author_id,created_at,text,conversation_id,referenced_tweets,note_tweet';
const MAX_PAGE_SIZE = 100;

/**
 * Bookmarks reader for Twitter (X) API v2
 *
 * Uses an OAuth 2.0 user access token (see `bookmark-mirror auth`).
 * Requests wait out an exhausted rate-limit window before they are sent,
 * honor `retry-after` on 429 and back off on network errors and 5xx.
 * A 401 is never retried.
 *
 * @example
 * ```typescript
 * const twitter = new TwitterConnector(deps, { accessToken });
 * for await (const item of twitter.fetchAll(50)) {
 *   console.log(item.url, item.contentKind);
 * }
 * ```
 */
export class TwitterConnector extends BaseConnector {
  readonly name = 'twitter' as const;
  private readonly apiBaseUrl: string;
  private readonly rateLimit: RateLimitTracker;
  private readonly policy: RetryPolicy;
  private accountId?: string;

  constructor(
    deps: CoreDeps,
    private options: TwitterConnectorOptions
  ) {
    super(deps);
    this.apiBaseUrl = options.apiBaseUrl ?? 'https://api.twitter.com/2';
    this.rateLimit = options.rateLimit ?? new RateLimitTracker();

    const baseDelayMs = options.baseDelayMs ?? 1000;
    const defaultRetryAfter = options.defaultRetryAfterSeconds ?? 60;
    this.policy = {
      maxAttempts: options.maxAttempts ?? 3,
      delayFor: (error, attempt) => {
        if (error instanceof RateLimitError) {
          return (error.retryAfter ?? defaultRetryAfter) * 1000;
        }
        return isRetryable(error) ? this.backoff(attempt, baseDelayMs) : null;
      },
    };
  }

  /** Authenticated account id, resolved once per instance. */
  async getAccountId(): Promise<string> {
    if (this.accountId) return this.accountId;

    const response = await this.get<TwitterUserResponse>('users-me', '/users/me');
    this.accountId = response.data.data.id;
    this.deps.logger.info('Authenticated with Twitter', { accountId: this.accountId });
    return this.accountId;
  }

  async fetchPage(pageSize = MAX_PAGE_SIZE, cursor?: string): Promise<BookmarkPage> {
    const accountId = await this.getAccountId();

    const query: Record<string, string | number> = {
      max_results: Math.min(pageSize, MAX_PAGE_SIZE),
      'tweet.fields': TWEET_FIELDS,
      expansions: 'author_id',
      'user.fields': 'name,username',
    };
    if (cursor) query.pagination_token = cursor;

    const response = await this.get<TwitterTweetResponse>(
      'bookmarks',
      `/users/${accountId}/bookmarks`,
      query
    );

    const page = response.data;
    if (page.errors && page.errors.length > 0) {
      this.deps.logger.warn('Twitter API returned partial errors', { errors: page.errors });
    }

    // No bookmark time is exposed upstream; observation time stands in
    const items = this.deps.normalizer.normalizeTwitterPage(page, new Date());

    this.deps.logger.info('Fetched bookmarks page', {
      count: items.length,
      hasMore: Boolean(page.meta?.next_token),
    });

    return { items, nextCursor: page.meta?.next_token };
  }

  /**
   * Every bookmark, page by page from the start of the feed.
   * Stops early once `limit` items have been yielded; 0 means no limit.
   */
  async *fetchAll(limit?: number): AsyncGenerator<NormalizedItem> {
    const cap = limit !== undefined && limit > 0 ? limit : undefined;
    let cursor: string | undefined;
    let yielded = 0;

    do {
      const { items, nextCursor } = await this.fetchPage(MAX_PAGE_SIZE, cursor);

      for (const item of items) {
        yield item;
        yielded++;
        if (cap !== undefined && yielded >= cap) {
          this.deps.logger.info('Reached bookmark limit', { limit: cap });
          return;
        }
      }

      cursor = nextCursor;
    } while (cursor);

    this.deps.logger.info('Finished fetching bookmarks', { total: yielded });
  }

  /**
   * Posts of one author within a conversation, oldest first.
   * Best effort: failures are logged and give an empty list.
   */
  async fetchThread(conversationId: string, authorId: string): Promise<NormalizedItem[]> {
    try {
      const response = await this.get<TwitterTweetResponse>('thread', '/tweets/search/recent', {
        query: `conversation_id:${conversationId} from:${authorId}`,
        'tweet.fields': 'author_id,created_at,text,conversation_id',
        expansions: 'author_id',
        'user.fields': 'name,username',
        max_results: MAX_PAGE_SIZE,
      });

      const items = this.deps.normalizer.normalizeTwitterPage(response.data, new Date());
      return items.sort((a, b) => Date.parse(a.createdAt) - Date.parse(b.createdAt));
    } catch (error: unknown) {
      this.deps.logger.warn('Failed to fetch thread', {
        conversationId,
        error: toError(error).message,
      });
      return [];
    }
  }

  /**
   * Thread items stay as classified; sibling posts are not fetched,
   * which would add one search request per thread.
   */
  async enrichWithThread(item: NormalizedItem): Promise<NormalizedItem> {
    if (item.contentKind === 'THREAD') {
      this.deps.logger.debug('Bookmark is part of a thread', { id: item.id });
    }
    return item;
  }

  private async get<T>(
    label: string,
    path: string,
    query?: Record<string, string | number>
  ): Promise<HttpResponse<T>> {
    await this.waitForRateLimit();

    return this.withRetry(label, this.policy, async () => {
      try {
        const response = await this.deps.http.get<T>(`${this.apiBaseUrl}${path}`, {
          headers: { Authorization: `Bearer ${this.options.accessToken}` },
          query,
        });
        this.rateLimit.update(response.headers);
        return response;
      } catch (error: unknown) {
        if (error instanceof RateLimitError) {
          this.rateLimit.update(error.headers);
          this.deps.metrics.incrementCounter('rate_limit_waits', { service: this.name });
        }
        throw error;
      }
    });
  }

  private async waitForRateLimit(): Promise<void> {
    const waitMs = this.rateLimit.msUntilReady();
    if (waitMs <= 0) return;

    this.deps.logger.warn('Twitter rate limit reached, waiting for reset', {
      waitSeconds: Math.ceil(waitMs / 1000),
    });
    this.deps.metrics.incrementCounter('rate_limit_waits', { service: this.name });
    await this.deps.retry.pause(waitMs);
    this.rateLimit.restore();
  }
}
