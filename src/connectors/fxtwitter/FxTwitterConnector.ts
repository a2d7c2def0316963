// src/connectors/fxtwitter/FxTwitterConnector.ts

import { BaseConnector } from '../BaseConnector';
import type { CoreDeps } from '../types';
import type { NormalizedItem } from '../../core/normalizer/types';
import type { RetryPolicy } from '../../core/http/types';
import type { FxTwitterResponse } from './types';
import { extractTweetId, extractUsername } from './tweetUrl';
import { isRetryable, toError } from '../../utils/errors';

export interface FxTwitterConnectorOptions {
  apiBaseUrl?: string;
  timeoutMs?: number;
  maxAttempts?: number;
  baseDelayMs?: number;
}

/**
 * Single-post lookup through the public FxTwitter API, which needs no
 * credentials and returns long-form articles in full.
 */
export class FxTwitterConnector extends BaseConnector {
  readonly name = 'fxtwitter' as const;
  private readonly apiBaseUrl: string;
  private readonly policy: RetryPolicy;

  constructor(
    deps: CoreDeps,
    private options: FxTwitterConnectorOptions = {}
  ) {
    super(deps);
    this.apiBaseUrl = options.apiBaseUrl ?? 'https://api.fxtwitter.com';

    const baseDelayMs = options.baseDelayMs ?? 500;
    this.policy = {
      maxAttempts: options.maxAttempts ?? 3,
      delayFor: (error, attempt) => (isRetryable(error) ? this.backoff(attempt, baseDelayMs) : null),
    };
  }

  /**
   * The post behind a status link, or null when it cannot be fetched
   * (private, deleted, malformed link or upstream failure).
   */
  async fetchPost(tweetUrl: string): Promise<NormalizedItem | null> {
    const id = extractTweetId(tweetUrl);
    if (!id) {
      this.deps.logger.error('Could not extract post id from URL', { url: tweetUrl });
      return null;
    }

    const username = extractUsername(tweetUrl);

    try {
      const response = await this.withRetry('status', this.policy, () =>
        this.deps.http.get<FxTwitterResponse>(`${this.apiBaseUrl}/${username}/status/${id}`, {
          timeout: this.options.timeoutMs,
        })
      );

      const tweet = response.data.tweet;
      if (!tweet) {
        this.deps.logger.warn('FxTwitter returned no post', {
          id,
          code: response.data.code,
          message: response.data.message,
        });
        return null;
      }

      return this.deps.normalizer.normalizeFxTwitter(tweet, id, tweetUrl, new Date());
    } catch (error: unknown) {
      this.deps.logger.error('Failed to fetch post', {
        id,
        error: toError(error).message,
      });
      return null;
    }
  }
}
