// tests/integration/sms-webhook.test.ts

import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import twilio from 'twilio';
import { createWebhookApp, REPLIES } from '../../src/webhook/server';
import type { PostFetcher, PostWriter, WebhookOptions } from '../../src/webhook/server';
import { SlidingWindowRateLimiter } from '../../src/webhook/RateLimiter';
import type { AddItemOptions } from '../../src/connectors/notion/NotionConnector';
import { textToBlocks } from '../../src/connectors/notion/blocks';
import type { NormalizedItem } from '../../src/core/normalizer/types';
import { Logger } from '../../src/observability/Logger';
import { MetricsCollector } from '../../src/observability/MetricsCollector';

const SENDER = '+15550001111';

function twiml(text: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?><Response><Message>${text}</Message></Response>`;
}

function makePost(id: string, body: string): NormalizedItem {
  return {
    id,
    body,
    authorName: 'Ada',
    authorHandle: 'ada',
    url: `https://x.com/ada/status/${id}`,
    createdAt: '2024-05-01T00:00:00.000Z',
    contentKind: 'SHORT',
    relatedItems: [],
    isTruncated: false,
  };
}

class FakeFetcher implements PostFetcher {
  urls: string[] = [];
  post: NormalizedItem | null = makePost('123', 'Hello world from a post');
  error?: Error;

  async fetchPost(tweetUrl: string): Promise<NormalizedItem | null> {
    this.urls.push(tweetUrl);
    if (this.error) throw this.error;
    return this.post;
  }
}

class FakeWriter implements PostWriter {
  calls: Array<{ item: NormalizedItem; options?: AddItemOptions }> = [];
  pageId: string | null = 'page-1';

  async addItem(item: NormalizedItem, options?: AddItemOptions): Promise<string | null> {
    this.calls.push({ item, options });
    return this.pageId;
  }
}

describe('SMS webhook', () => {
  const logger = new Logger({ silent: true });
  let fetcher: FakeFetcher;
  let writer: FakeWriter;
  let metrics: MetricsCollector;
  let options: WebhookOptions;

  const build = (overrides: Partial<WebhookOptions> = {}, rateLimiter?: SlidingWindowRateLimiter) =>
    createWebhookApp({ ...options, ...overrides }, { fetcher, writer, logger, metrics, rateLimiter });

  beforeEach(() => {
    fetcher = new FakeFetcher();
    writer = new FakeWriter();
    metrics = new MetricsCollector({}, logger);
    options = {
      twilio: { validateSignature: false },
      allowedPhoneNumbers: [],
      rateLimit: { requests: 10, windowSeconds: 60 },
    };
  });

  describe('POST /sms', () => {
    it('should save a linked post with its category', async () => {
      const res = await request(build())
        .post('/sms')
        .type('form')
        .send({ Body: 'https://x.com/ada/status/123 tech', From: SENDER });

      expect(res.status).toBe(200);
      expect(res.headers['content-type']).toMatch(/^text\/xml/);
      expect(res.text).toBe(twiml('Saved [Tech]: Hello world from a post...'));
      expect(fetcher.urls).toEqual(['https://x.com/ada/status/123']);
      expect(writer.calls).toHaveLength(1);
      expect(writer.calls[0].options).toEqual({
        category: 'Tech',
        children: textToBlocks('Hello world from a post'),
      });
    });

    it('should save without a category', async () => {
      const res = await request(build())
        .post('/sms')
        .type('form')
        .send({ Body: 'https://twitter.com/ada/status/123', From: SENDER });

      expect(res.text).toBe(twiml('Saved: Hello world from a post...'));
      expect(writer.calls[0].options?.category).toBeUndefined();
    });

    it('should cut the preview to fifty characters on one line', async () => {
      fetcher.post = makePost('123', `line one\n${'x'.repeat(60)}`);

      const res = await request(build())
        .post('/sms')
        .type('form')
        .send({ Body: 'https://x.com/ada/status/123', From: SENDER });

      expect(res.text).toBe(twiml(`Saved: line one ${'x'.repeat(41)}...`));
    });

    it('should ask for a link when none is present', async () => {
      const res = await request(build()).post('/sms').type('form').send({ Body: 'hello', From: SENDER });

      expect(res.text).toBe(twiml(REPLIES.noUrl));
      expect(fetcher.urls).toEqual([]);
    });

    it('should report a post that cannot be fetched', async () => {
      fetcher.post = null;

      const res = await request(build())
        .post('/sms')
        .type('form')
        .send({ Body: 'https://x.com/ada/status/123', From: SENDER });

      expect(res.status).toBe(200);
      expect(res.text).toContain('The tweet might be private or deleted.');
      expect(writer.calls).toEqual([]);
    });

    it('should report a failed save', async () => {
      writer.pageId = null;

      const res = await request(build())
        .post('/sms')
        .type('form')
        .send({ Body: 'https://x.com/ada/status/123', From: SENDER });

      expect(res.text).toBe(twiml(REPLIES.saveFailed));
    });

    it('should turn away numbers not on the allow-list', async () => {
      const res = await request(build({ allowedPhoneNumbers: [SENDER] }))
        .post('/sms')
        .type('form')
        .send({ Body: 'https://x.com/ada/status/123', From: '+15559999999' });

      expect(res.text).toBe(twiml(REPLIES.notAllowed));
      expect(fetcher.urls).toEqual([]);
    });

    it('should rate limit a chatty sender', async () => {
      const app = build({}, new SlidingWindowRateLimiter({ requests: 1, windowSeconds: 60 }, () => 0));

      await request(app).post('/sms').type('form').send({ Body: 'hi', From: SENDER });
      const res = await request(app).post('/sms').type('form').send({ Body: 'hi', From: SENDER });

      expect(res.text).toBe(twiml(REPLIES.rateLimited));
    });

    it('should reply in TwiML when the fetcher throws', async () => {
      fetcher.error = new Error('boom');

      const res = await request(build())
        .post('/sms')
        .type('form')
        .send({ Body: 'https://x.com/ada/status/123', From: SENDER });

      expect(res.status).toBe(200);
      expect(res.headers['content-type']).toMatch(/^text\/xml/);
      expect(res.text).toBe(twiml(REPLIES.saveFailed));
    });

    it('should use the first value of a repeated field', async () => {
      const res = await request(build())
        .post('/sms')
        .type('form')
        .send('Body=https%3A%2F%2Fx.com%2Fada%2Fstatus%2F1&Body=tech&From=%2B15550001111');

      expect(res.status).toBe(200);
      expect(res.text).toBe(twiml('Saved: Hello world from a post...'));
      expect(fetcher.urls).toEqual(['https://x.com/ada/status/1']);
    });

    it('should count unexpected failures', async () => {
      fetcher.error = new Error('boom');
      const app = build();

      await request(app).post('/sms').type('form').send({ Body: 'https://x.com/ada/status/123', From: SENDER });
      const res = await request(app).get('/metrics');

      expect(res.text).toContain('sms_requests_total{outcome="error"} 1');
    });
  });

  describe('signature validation', () => {
    const url = 'https://sms.example.test/sms';
    const params = { Body: 'hello', From: SENDER };

    it('should reject an unsigned request', async () => {
      const app = build({ twilio: { validateSignature: true, authToken: 'test-secret', publicUrl: url } });

      const res = await request(app).post('/sms').type('form').send(params);

      expect(res.status).toBe(403);
      expect(res.text).toBe(twiml(REPLIES.unauthorized));
    });

    it('should accept a correctly signed request', async () => {
      const app = build({ twilio: { validateSignature: true, authToken: 'test-secret', publicUrl: url } });
      const signature = twilio.getExpectedTwilioSignature('test-secret', url, params);

      const res = await request(app)
        .post('/sms')
        .set('X-Twilio-Signature', signature)
        .type('form')
        .send(params);

      expect(res.status).toBe(200);
      expect(res.text).toBe(twiml(REPLIES.noUrl));
    });

    it('should skip validation without an auth token', async () => {
      const app = build({ twilio: { validateSignature: true } });

      const res = await request(app).post('/sms').type('form').send(params);

      expect(res.status).toBe(200);
    });
  });

  it('should set security headers', async () => {
    const res = await request(build()).get('/health');

    expect(res.headers['x-content-type-options']).toBe('nosniff');
    expect(res.headers['x-frame-options']).toBe('DENY');
    expect(res.headers['cache-control']).toBe('no-store, no-cache, must-revalidate');
    expect(res.headers['pragma']).toBe('no-cache');
    expect(res.headers['x-powered-by']).toBeUndefined();
  });

  it('should report health', async () => {
    const res = await request(build()).get('/health');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
    expect(res.body.version).toBe('1.1.0');
    expect(typeof res.body.timestamp).toBe('string');
  });

  it('should expose request outcomes as metrics', async () => {
    const app = build();
    await request(app).post('/sms').type('form').send({ Body: 'hello', From: SENDER });

    const res = await request(app).get('/metrics');

    expect(res.status).toBe(200);
    expect(res.text).toContain('sms_requests_total{outcome="no_url"} 1');
  });
});
