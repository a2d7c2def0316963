// tests/unit/Normalizer.test.ts

import { describe, it, expect } from 'vitest';
import { Normalizer } from '../../src/core/normalizer/Normalizer';
import { classifyTweet, renderArticle } from '../../src/core/normalizer/ProviderMappers';
import { authorDisplay, fullBody } from '../../src/core/normalizer/types';
import type { NormalizedItem } from '../../src/core/normalizer/types';

const observedAt = new Date('2024-06-01T12:00:00.000Z');

describe('Normalizer', () => {
  const normalizer = new Normalizer();

  it('should join tweets to their authors and keep page order', () => {
    const items = normalizer.normalizeTwitterPage(
      {
        data: [
          { id: '2', text: 'second', author_id: 'u1', created_at: '2024-05-02T08:00:00Z' },
          { id: '1', text: 'first', author_id: 'u2', created_at: '2024-05-01T08:00:00Z' },
        ],
        includes: {
          users: [
            { id: 'u1', name: 'Ada', username: 'ada' },
            { id: 'u2', name: 'Grace', username: 'grace' },
          ],
        },
      },
      observedAt
    );

    expect(items.map((item) => item.id)).toEqual(['2', '1']);
    expect(items[0]).toEqual({
      id: '2',
      body: 'second',
      authorName: 'Ada',
      authorHandle: 'ada',
      url: 'https://twitter.com/ada/status/2',
      createdAt: '2024-05-02T08:00:00.000Z',
      observedAt: '2024-06-01T12:00:00.000Z',
      contentKind: 'SHORT',
      relatedItems: [],
      isTruncated: false,
    });
  });

  it('should fall back to unknown authors and observation time', () => {
    const [item] = normalizer.normalizeTwitterPage({ data: [{ id: '9', text: 'hi' }] }, observedAt);

    expect(item.authorName).toBe('Unknown');
    expect(item.authorHandle).toBe('unknown');
    expect(item.url).toBe('https://twitter.com/unknown/status/9');
    expect(item.createdAt).toBe('2024-06-01T12:00:00.000Z');
  });

  it('should prefer the note text for long posts', () => {
    const [item] = normalizer.normalizeTwitterPage(
      {
        data: [{ id: '3', text: 'short preview…', note_tweet: { text: 'the whole note' }, truncated: true }],
      },
      observedAt
    );

    expect(item.body).toBe('the whole note');
    expect(item.contentKind).toBe('LONG_FORM');
    expect(item.isTruncated).toBe(true);
  });

  it('should return nothing for an empty page', () => {
    expect(normalizer.normalizeTwitterPage({ meta: {} }, observedAt)).toEqual([]);
  });

  it('should map FxTwitter posts with the submitted URL', () => {
    const item = normalizer.normalizeFxTwitter(
      {
        id: '555',
        text: 'hello world',
        created_timestamp: 1714550400,
        author: { name: 'Ada', screen_name: 'ada' },
      },
      '555',
      'https://x.com/ada/status/555',
      observedAt
    );

    expect(item).toEqual({
      id: '555',
      body: 'hello world',
      authorName: 'Ada',
      authorHandle: 'ada',
      url: 'https://x.com/ada/status/555',
      createdAt: '2024-05-01T08:00:00.000Z',
      observedAt: '2024-06-01T12:00:00.000Z',
      contentKind: 'SHORT',
      relatedItems: [],
      isTruncated: false,
    });
  });

  it('should classify FxTwitter posts by length in code points', () => {
    const at280 = normalizer.normalizeFxTwitter({ text: '😀'.repeat(280) }, '1', 'https://x.com/ada/status/1', observedAt);
    const over = normalizer.normalizeFxTwitter({ text: 'a'.repeat(281) }, '2', 'https://x.com/ada/status/2', observedAt);

    expect(at280.contentKind).toBe('SHORT');
    expect(over.contentKind).toBe('LONG_FORM');
  });

  it('should render FxTwitter articles as long-form with a title', () => {
    const item = normalizer.normalizeFxTwitter(
      {
        text: 'link only',
        author: { name: 'Ada', screen_name: 'ada' },
        article: {
          title: 'On Engines',
          content: { blocks: [{ type: 'unstyled', text: 'Body text' }] },
        },
      },
      '777',
      'https://twitter.com/ada/status/777',
      observedAt
    );

    expect(item.id).toBe('777');
    expect(item.contentKind).toBe('LONG_FORM');
    expect(item.title).toBe('On Engines');
    expect(item.body).toBe('Body text');
  });

  it('should reject items that fail validation', () => {
    expect(() =>
      normalizer.normalizeFxTwitter({ text: 'x' }, '1', 'not a url', observedAt)
    ).toThrow(/^Schema validation failed for fxtwitter/);
  });
});

describe('classifyTweet', () => {
  it('should treat a note payload as long-form first', () => {
    expect(
      classifyTweet({
        id: '1',
        note_tweet: { text: 'n' },
        referenced_tweets: [{ type: 'replied_to', id: '0' }],
      })
    ).toBe('LONG_FORM');
  });

  it('should treat replies as threads', () => {
    expect(classifyTweet({ id: '1', text: 'x', referenced_tweets: [{ type: 'replied_to', id: '0' }] })).toBe(
      'THREAD'
    );
    expect(classifyTweet({ id: '1', text: 'x', referenced_tweets: [{ type: 'quoted', id: '0' }] })).toBe(
      'SHORT'
    );
  });

  it('should count code points against the 280 limit', () => {
    expect(classifyTweet({ id: '1', text: 'a'.repeat(280) })).toBe('SHORT');
    expect(classifyTweet({ id: '1', text: 'a'.repeat(281) })).toBe('LONG_FORM');
    // 200 emoji are 400 UTF-16 units but 200 code points
    expect(classifyTweet({ id: '1', text: '😀'.repeat(200) })).toBe('SHORT');
  });
});

describe('renderArticle', () => {
  it('should prefix headings, list items and quotes', () => {
    const text = renderArticle({
      content: {
        blocks: [
          { type: 'header-one', text: 'Intro' },
          { type: 'unstyled', text: 'Para one' },
          { type: 'unordered-list-item', text: 'A' },
          { type: 'ordered-list-item', text: 'B' },
          { type: 'blockquote', text: 'Q' },
          { type: 'unstyled', text: '' },
        ],
      },
    });

    expect(text).toBe('# Intro\n\n\nPara one\n\n• A\n\n• B\n\n> Q');
  });

  it('should give an empty string for an article without blocks', () => {
    expect(renderArticle({ title: 'Empty' })).toBe('');
  });
});

describe('item helpers', () => {
  const base: NormalizedItem = {
    id: '1',
    body: 'first',
    authorName: 'Ada',
    authorHandle: 'ada',
    url: 'https://twitter.com/ada/status/1',
    createdAt: '2024-05-01T00:00:00.000Z',
    contentKind: 'THREAD',
    relatedItems: [],
    isTruncated: false,
  };

  it('should join thread bodies with a divider', () => {
    const item = { ...base, relatedItems: [{ ...base, id: '2', body: 'second' }] };

    expect(fullBody(item)).toBe('first\n\n---\n\nsecond');
  });

  it('should leave other bodies alone', () => {
    expect(fullBody({ ...base, contentKind: 'SHORT', relatedItems: [{ ...base, body: 'x' }] })).toBe(
      'first'
    );
  });

  it('should format the author', () => {
    expect(authorDisplay(base)).toBe('Ada (@ada)');
  });
});
