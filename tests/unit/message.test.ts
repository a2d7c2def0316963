// tests/unit/message.test.ts

import { describe, it, expect } from 'vitest';
import {
  capitalize,
  extractTweetId,
  extractTweetUrl,
  extractUsername,
  parseMessage,
  sanitizeCategory,
} from '../../src/webhook/message';

describe('extractTweetUrl', () => {
  it('should find twitter, x and mobile links', () => {
    expect(extractTweetUrl('see https://twitter.com/ada/status/123 now')).toBe(
      'https://twitter.com/ada/status/123'
    );
    expect(extractTweetUrl('https://www.x.com/ada/status/456?s=20')).toBe(
      'https://www.x.com/ada/status/456'
    );
    expect(extractTweetUrl('http://mobile.twitter.com/ada/status/789')).toBe(
      'http://mobile.twitter.com/ada/status/789'
    );
  });

  it('should return null without a status link', () => {
    expect(extractTweetUrl('hello https://example.com/ada/status/1')).toBeNull();
    expect(extractTweetUrl('https://x.com/ada')).toBeNull();
  });
});

describe('extractTweetId and extractUsername', () => {
  it('should read the id and handle', () => {
    expect(extractTweetId('https://x.com/ada_l/status/98765')).toBe('98765');
    expect(extractUsername('https://x.com/ada_l/status/98765')).toBe('ada_l');
  });

  it('should fall back for unknown shapes', () => {
    expect(extractTweetId('https://x.com/ada')).toBeNull();
    expect(extractUsername('https://example.com/status/1')).toBe('unknown');
  });
});

describe('parseMessage', () => {
  it('should parse a bare link', () => {
    expect(parseMessage('https://twitter.com/user/status/123')).toEqual({
      tweetUrl: 'https://twitter.com/user/status/123',
      category: null,
    });
  });

  it('should take the word after the link as category', () => {
    expect(parseMessage('https://x.com/user/status/123 tech stuff')).toEqual({
      tweetUrl: 'https://x.com/user/status/123',
      category: 'Tech',
    });
  });

  it('should take the word before the link as category', () => {
    expect(parseMessage('READING https://x.com/user/status/123')).toEqual({
      tweetUrl: 'https://x.com/user/status/123',
      category: 'Reading',
    });
  });

  it('should give nothing without a link', () => {
    expect(parseMessage('just words')).toEqual({ tweetUrl: null, category: null });
  });
});

describe('sanitizeCategory', () => {
  it('should strip tags and symbols', () => {
    expect(sanitizeCategory('<b>ai</b>!')).toBe('Ai');
    expect(sanitizeCategory('<script>alert(1)</script>')).toBe('Alert1');
  });

  it('should keep spaces, dashes and underscores', () => {
    expect(sanitizeCategory('  deep-learning_notes  ')).toBe('Deep-learning_notes');
  });

  it('should cap the length at 50', () => {
    expect(sanitizeCategory('a'.repeat(80))).toBe(`A${'a'.repeat(49)}`);
  });

  it('should give an empty string for nothing usable', () => {
    expect(sanitizeCategory('!!!')).toBe('');
    expect(sanitizeCategory(null)).toBe('');
    expect(sanitizeCategory(undefined)).toBe('');
  });
});

describe('capitalize', () => {
  it('should upper-case the first letter and lower-case the rest', () => {
    expect(capitalize('tECH')).toBe('Tech');
    expect(capitalize('')).toBe('');
  });
});
