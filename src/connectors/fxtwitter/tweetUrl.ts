// src/connectors/fxtwitter/tweetUrl.ts

export const TWEET_URL_PATTERNS: readonly RegExp[] = [
  /https?:\/\/(?:www\.)?twitter\.com\/\w+\/status\/(\d+)/,
  /https?:\/\/(?:www\.)?x\.com\/\w+\/status\/(\d+)/,
  /https?:\/\/(?:mobile\.)?twitter\.com\/\w+\/status\/(\d+)/,
];

/** First post link in free text, as written. */
export function extractTweetUrl(text: string): string | null {
  for (const pattern of TWEET_URL_PATTERNS) {
    const match = pattern.exec(text);
    if (match) return match[0];
  }
  return null;
}

export function extractTweetId(url: string): string | null {
  for (const pattern of TWEET_URL_PATTERNS) {
    const match = pattern.exec(url);
    if (match?.[1]) return match[1];
  }
  return null;
}

export function extractUsername(url: string): string {
  const match = /(?:twitter\.com|x\.com)\/(\w+)\/status/.exec(url);
  return match?.[1] ?? 'unknown';
}
