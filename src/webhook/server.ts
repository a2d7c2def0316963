// src/webhook/server.ts

import express from 'express';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import twilio from 'twilio';
import { z } from 'zod';
import type { NormalizedItem } from '../core/normalizer/types';
import type { AddItemOptions } from '../connectors/notion/NotionConnector';
import { textToBlocks } from '../connectors/notion/blocks';
import type { Logger } from '../observability/Logger';
import { maskPhoneNumber } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';
import { toError } from '../utils/errors';
import { parseMessage, sanitizeCategory } from './message';
import { SlidingWindowRateLimiter } from './RateLimiter';

export const WEBHOOK_VERSION = '1.1.0';

export const REPLIES = {
  unauthorized: 'Unauthorized request.',
  notAllowed: 'This service is not available for your phone number.',
  rateLimited: 'Too many requests. Please wait a minute and try again.',
  noUrl: 'No tweet URL found. Send a tweet link to save it to Notion.',
  fetchFailed: "Couldn't fetch tweet data. The tweet might be private or deleted.",
  saveFailed: 'Failed to save to Notion. Please try again.',
} as const;

/** Implemented by FxTwitterConnector. */
export interface PostFetcher {
  fetchPost(tweetUrl: string): Promise<NormalizedItem | null>;
}

/** Implemented by NotionConnector. */
export interface PostWriter {
  addItem(item: NormalizedItem, options?: AddItemOptions): Promise<string | null>;
}

export interface WebhookOptions {
  twilio: {
    authToken?: string;
    validateSignature: boolean;
    /** Public URL Twilio posts to, when the app sits behind a proxy */
    publicUrl?: string;
  };
  allowedPhoneNumbers: string[];
  rateLimit: { requests: number; windowSeconds: number };
}

export interface WebhookDeps {
  fetcher: PostFetcher;
  writer: PostWriter;
  logger: Logger;
  metrics: MetricsCollector;
  rateLimiter?: SlidingWindowRateLimiter;
}

/** Twilio posts flat fields; a repeated field arrives as an array. */
const RawFormSchema = z.record(z.union([z.string(), z.array(z.string())]));
type RawForm = z.infer<typeof RawFormSchema>;

function firstValue(form: RawForm, field: string): string {
  const value = form[field];
  if (Array.isArray(value)) return value[0] ?? '';
  return value ?? '';
}

type SmsOutcome =
  | 'unauthorized'
  | 'not_allowed'
  | 'rate_limited'
  | 'no_url'
  | 'fetch_failed'
  | 'saved'
  | 'save_failed'
  | 'error';

function twimlMessage(text: string): string {
  const response = new twilio.twiml.MessagingResponse();
  response.message(text);
  return response.toString();
}

export function savedReply(body: string, category: string): string {
  const label = category ? ` [${category}]` : '';
  const preview = body.slice(0, 50).replace(/\n/g, ' ');
  return `Saved${label}: ${preview}...`;
}

const asyncHandler =
  (fn: (req: Request, res: Response) => Promise<void>): RequestHandler =>
  (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };

/**
 * Express app receiving Twilio SMS webhooks. Each message carrying a post
 * link is fetched through FxTwitter and saved as a Notion page.
 */
export function createWebhookApp(options: WebhookOptions, deps: WebhookDeps): express.Express {
  const { logger, metrics } = deps;
  const rateLimiter = deps.rateLimiter ?? new SlidingWindowRateLimiter(options.rateLimit);
  const allowed = new Set(options.allowedPhoneNumbers);

  if (options.twilio.validateSignature && !options.twilio.authToken) {
    logger.warn('Twilio auth token not configured, skipping signature validation');
  }

  const app = express();
  app.disable('x-powered-by');
  app.use(express.urlencoded({ extended: false }));

  app.use((req, res, next) => {
    const startedAt = Date.now();
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('Cache-Control', 'no-store, no-cache, must-revalidate');
    res.setHeader('Pragma', 'no-cache');
    res.on('finish', () => {
      logger.debug('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Date.now() - startedAt,
      });
    });
    next();
  });

  const reply = (res: Response, outcome: SmsOutcome, text: string, status = 200): void => {
    metrics.incrementCounter('sms_requests', { outcome });
    res.status(status).type('text/xml').send(twimlMessage(text));
  };

  const signatureIsValid = (req: Request, params: RawForm): boolean => {
    const { authToken, validateSignature, publicUrl } = options.twilio;
    if (!validateSignature || !authToken) return true;

    const signature = req.get('X-Twilio-Signature') ?? '';
    const url = publicUrl ?? `${req.protocol}://${req.get('host') ?? ''}${req.originalUrl}`;
    return twilio.validateRequest(authToken, signature, url, params);
  };

  app.post(
    '/sms',
    asyncHandler(async (req, res) => {
      const parsed = RawFormSchema.safeParse(req.body ?? {});
      const raw: RawForm = parsed.success ? parsed.data : {};
      if (!parsed.success) {
        logger.warn('Unexpected SMS form fields', { issues: parsed.error.issues.length });
      }

      if (!signatureIsValid(req, raw)) {
        logger.warn('Invalid Twilio signature on request');
        reply(res, 'unauthorized', REPLIES.unauthorized, 403);
        return;
      }

      const form = { Body: firstValue(raw, 'Body'), From: firstValue(raw, 'From') };
      const sender = maskPhoneNumber(form.From);
      logger.info('Received SMS', { from: sender });

      if (allowed.size > 0 && !allowed.has(form.From)) {
        logger.warn('Blocked request from number not on the allow-list', { from: sender });
        reply(res, 'not_allowed', REPLIES.notAllowed);
        return;
      }

      if (!rateLimiter.tryAcquire(form.From)) {
        logger.warn('Rate limit exceeded', { from: sender });
        reply(res, 'rate_limited', REPLIES.rateLimited);
        return;
      }

      const { tweetUrl, category } = parseMessage(form.Body);
      if (!tweetUrl) {
        reply(res, 'no_url', REPLIES.noUrl);
        return;
      }

      const item = await deps.fetcher.fetchPost(tweetUrl);
      if (!item) {
        reply(res, 'fetch_failed', REPLIES.fetchFailed);
        return;
      }

      const cleanCategory = sanitizeCategory(category);
      const pageId = await deps.writer.addItem(item, {
        ...(cleanCategory ? { category: cleanCategory } : {}),
        children: textToBlocks(item.body),
      });

      if (!pageId) {
        reply(res, 'save_failed', REPLIES.saveFailed);
        return;
      }

      logger.info('Saved post from SMS', { id: item.id, pageId, category: cleanCategory });
      reply(res, 'saved', savedReply(item.body, cleanCategory));
    })
  );

  // Every SMS gets a readable reply, even when something throws
  app.use('/sms', (error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('Failed to handle SMS', { error: toError(error).message });
    reply(res, 'error', REPLIES.saveFailed);
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString(), version: WEBHOOK_VERSION });
  });

  app.get(
    '/metrics',
    asyncHandler(async (_req, res) => {
      res.type(metrics.contentType).send(await metrics.getMetrics());
    })
  );

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled webhook error', { error: toError(error).message });
    res.status(500).type('text/plain').send('Internal Server Error');
  });

  return app;
}
