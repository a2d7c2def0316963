// src/config/ConfigValidator.ts

import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../utils/errors';
import type { LogLevel } from '../observability/Logger';

export const APP_DIR = '~/.bookmark-mirror';

export function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
  return p;
}

const missing = (key: string) => `Missing required environment variable: ${key}`;

// Unset and empty both count as missing
const required = (key: string) =>
  z.string({ required_error: missing(key) }).trim().min(1, missing(key));

const LoggingEnvSchema = z.object({
  LOG_LEVEL: z
    .string()
    .default('info')
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(['debug', 'info', 'warn', 'error'])),
  LOG_FORMAT: z.enum(['json', 'pretty']).default('pretty'),
});

const NotionEnvSchema = z.object({
  NOTION_TOKEN: required('NOTION_TOKEN'),
  NOTION_DATABASE_ID: required('NOTION_DATABASE_ID'),
});

const OAuthClientEnvSchema = z.object({
  TWITTER_OAUTH2_CLIENT_ID: required('TWITTER_OAUTH2_CLIENT_ID'),
  TWITTER_OAUTH2_CLIENT_SECRET: required('TWITTER_OAUTH2_CLIENT_SECRET'),
  OAUTH_REDIRECT_URI: z.string().url().default('http://localhost:3000/callback'),
});

export const SyncEnvSchema = OAuthClientEnvSchema.merge(NotionEnvSchema)
  .merge(LoggingEnvSchema)
  .extend({
    TWITTER_OAUTH2_ACCESS_TOKEN: required('TWITTER_OAUTH2_ACCESS_TOKEN'),
    TWITTER_OAUTH2_REFRESH_TOKEN: required('TWITTER_OAUTH2_REFRESH_TOKEN'),
    SYNC_INTERVAL_MINUTES: z.coerce.number().int().positive().default(10),
    STATE_FILE_PATH: z.string().default(`${APP_DIR}/state.json`).transform(expandHome),
    LOG_FILE_PATH: z.string().default(`${APP_DIR}/sync.log`).transform(expandHome),
    METRICS_PORT: z.coerce.number().int().min(1).max(65535).optional(),
  });

export const WebhookEnvSchema = NotionEnvSchema.merge(LoggingEnvSchema).extend({
  TWILIO_AUTH_TOKEN: z.string().optional(),
  VALIDATE_TWILIO_SIGNATURE: z
    .string()
    .default('true')
    .transform((value) => value.trim().toLowerCase() === 'true'),
  ALLOWED_PHONE_NUMBERS: z
    .string()
    .default('')
    .transform((value) =>
      value
        .split(',')
        .map((n) => n.trim())
        .filter(Boolean)
    ),
  RATE_LIMIT_REQUESTS: z.coerce.number().int().positive().default(10),
  RATE_LIMIT_WINDOW: z.coerce.number().int().positive().default(60),
  REQUEST_TIMEOUT: z.coerce.number().positive().default(15),
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  WEBHOOK_PUBLIC_URL: z.string().url().optional(),
});

export const AuthEnvSchema = OAuthClientEnvSchema.merge(LoggingEnvSchema).extend({
  TWITTER_OAUTH2_REFRESH_TOKEN: z.string().optional(),
});

export interface LoggingConfig {
  level: LogLevel;
  format: 'json' | 'pretty';
}

export interface NotionConfig {
  token: string;
  databaseId: string;
}

export interface OAuthClientConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

export interface SyncAppConfig {
  twitter: OAuthClientConfig & {
    accessToken: string;
    refreshToken: string;
  };
  notion: NotionConfig;
  sync: {
    intervalMinutes: number;
    stateFilePath: string;
    logFilePath: string;
  };
  logging: LoggingConfig;
  metrics: { port?: number };
}

export interface WebhookAppConfig {
  notion: NotionConfig;
  twilio: {
    authToken?: string;
    validateSignature: boolean;
    publicUrl?: string;
  };
  allowedPhoneNumbers: string[];
  rateLimit: { requests: number; windowSeconds: number };
  requestTimeoutSeconds: number;
  port: number;
  logging: LoggingConfig;
}

export interface AuthAppConfig {
  twitter: OAuthClientConfig & { refreshToken?: string };
  logging: LoggingConfig;
}

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((issue) => {
    const key = issue.path.join('.');
    return issue.message.startsWith('Missing required') ? issue.message : `${key}: ${issue.message}`;
  });
}

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, env: unknown): z.output<S> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(issues.join('; '), issues);
  }
  return result.data;
}

function toSyncConfig(env: z.output<typeof SyncEnvSchema>): SyncAppConfig {
  return {
    twitter: {
      clientId: env.TWITTER_OAUTH2_CLIENT_ID,
      clientSecret: env.TWITTER_OAUTH2_CLIENT_SECRET,
      accessToken: env.TWITTER_OAUTH2_ACCESS_TOKEN,
      refreshToken: env.TWITTER_OAUTH2_REFRESH_TOKEN,
      redirectUri: env.OAUTH_REDIRECT_URI,
    },
    notion: { token: env.NOTION_TOKEN, databaseId: env.NOTION_DATABASE_ID },
    sync: {
      intervalMinutes: env.SYNC_INTERVAL_MINUTES,
      stateFilePath: env.STATE_FILE_PATH,
      logFilePath: env.LOG_FILE_PATH,
    },
    logging: { level: env.LOG_LEVEL, format: env.LOG_FORMAT },
    metrics: { port: env.METRICS_PORT },
  };
}

/**
 * Validate the sync service environment
 *
 * @throws {ConfigError} naming every missing or invalid variable
 */
export function validateConfig(env: NodeJS.ProcessEnv): SyncAppConfig {
  return toSyncConfig(parseOrThrow(SyncEnvSchema, env));
}

export function validateWebhookConfig(env: NodeJS.ProcessEnv): WebhookAppConfig {
  const parsed = parseOrThrow(WebhookEnvSchema, env);
  return {
    notion: { token: parsed.NOTION_TOKEN, databaseId: parsed.NOTION_DATABASE_ID },
    twilio: {
      authToken: parsed.TWILIO_AUTH_TOKEN || undefined,
      validateSignature: parsed.VALIDATE_TWILIO_SIGNATURE,
      publicUrl: parsed.WEBHOOK_PUBLIC_URL,
    },
    allowedPhoneNumbers: parsed.ALLOWED_PHONE_NUMBERS,
    rateLimit: { requests: parsed.RATE_LIMIT_REQUESTS, windowSeconds: parsed.RATE_LIMIT_WINDOW },
    requestTimeoutSeconds: parsed.REQUEST_TIMEOUT,
    port: parsed.PORT,
    logging: { level: parsed.LOG_LEVEL, format: parsed.LOG_FORMAT },
  };
}

export function validateAuthConfig(env: NodeJS.ProcessEnv): AuthAppConfig {
  const parsed = parseOrThrow(AuthEnvSchema, env);
  return {
    twitter: {
      clientId: parsed.TWITTER_OAUTH2_CLIENT_ID,
      clientSecret: parsed.TWITTER_OAUTH2_CLIENT_SECRET,
      redirectUri: parsed.OAUTH_REDIRECT_URI,
      refreshToken: parsed.TWITTER_OAUTH2_REFRESH_TOKEN || undefined,
    },
    logging: { level: parsed.LOG_LEVEL, format: parsed.LOG_FORMAT },
  };
}

/**
 * Validate the sync environment and return user-friendly errors
 *
 * @returns `{ success: true, data }` or `{ success: false, errors }`
 */
export function validateConfigSafe(
  env: NodeJS.ProcessEnv
): { success: true; data: SyncAppConfig } | { success: false; errors: string[] } {
  const result = SyncEnvSchema.safeParse(env);

  if (result.success) {
    return { success: true, data: toSyncConfig(result.data) };
  }

  return { success: false, errors: formatIssues(result.error) };
}
