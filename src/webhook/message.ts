// src/webhook/message.ts

import { extractTweetUrl } from '../connectors/fxtwitter/tweetUrl';

export { extractTweetId, extractTweetUrl, extractUsername } from '../connectors/fxtwitter/tweetUrl';

export interface ParsedMessage {
  tweetUrl: string | null;
  category: string | null;
}

const CATEGORY_MAX_LENGTH = 50;

/** First letter upper, the rest lower. */
export function capitalize(word: string): string {
  if (!word) return word;
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * Splits an SMS body into a post link and an optional category, which is
 * the first word left once the link is removed. Either order works:
 * `https://x.com/a/status/1 tech` and `tech https://x.com/a/status/1`.
 */
export function parseMessage(body: string): ParsedMessage {
  const tweetUrl = extractTweetUrl(body);
  if (!tweetUrl) return { tweetUrl: null, category: null };

  const remaining = body.split(tweetUrl).join('').trim();
  const firstWord = remaining.split(/\s+/)[0];
  return { tweetUrl, category: firstWord ? capitalize(firstWord) : null };
}

/**
 * Reduces free text to a safe select option name: tags removed, only
 * letters, digits, whitespace, `-` and `_` kept, at most 50 characters.
 */
export function sanitizeCategory(category: string | null | undefined): string {
  if (!category) return '';

  const cleaned = category
    .replace(/<[^>]*>/g, '')
    .replace(/[^a-zA-Z0-9\s\-_]/g, '')
    .slice(0, CATEGORY_MAX_LENGTH)
    .trim();

  return capitalize(cleaned);
}
