#!/usr/bin/env node
// src/cli.ts

import type { Server } from 'node:http';
import { Command, InvalidArgumentError } from 'commander';
import express from 'express';
import type { Request, Response } from 'express';
import { loadEnvironment } from './config/loadConfig';
import {
  validateAuthConfig,
  validateConfig,
  validateWebhookConfig,
} from './config/ConfigValidator';
import { createSyncContainer, createWebhookContainer } from './bootstrap';
import { AuthCore } from './core/auth/AuthCore';
import type { TokenSet } from './core/auth/types';
import type { DatabaseStats } from './connectors/notion/NotionConnector';
import { databaseTemplate } from './connectors/notion/properties';
import { Logger } from './observability/Logger';
import type { SyncService } from './sync/SyncService';
import { initializeTracing } from './observability/tracing';
import { ConfigError, toError } from './utils/errors';

interface SyncOptions {
  config?: string;
  backfill?: boolean;
  backfillLimit?: number;
  once?: boolean;
  setupOnly?: boolean;
  status?: boolean;
}

interface ConfigOption {
  config?: string;
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/** Loads the .env file and validates it, printing what is wrong on failure. */
function loadOrExit<T>(configPath: string | undefined, validate: (env: NodeJS.ProcessEnv) => T): T {
  try {
    loadEnvironment(configPath);
    return validate(process.env);
  } catch (error: unknown) {
    if (error instanceof ConfigError) {
      console.error(`Configuration error: ${error.message}`);
      console.error('Please ensure all required environment variables are set.');
      console.error('See .env.example for the required variables.');
      process.exit(1);
    }
    throw error;
  }
}

function abortOnSignals(): AbortController {
  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    console.log(`Received ${signal}, shutting down`);
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);
  return controller;
}

function describeDatabaseStats(stats: DatabaseStats): string {
  if ('error' in stats) return `unavailable (${stats.error})`;
  return stats.hasEntries ? 'has entries' : 'empty';
}

async function runSync(options: SyncOptions): Promise<number> {
  const config = loadOrExit(options.config, validateConfig);
  const { core, sink, service } = createSyncContainer(config);
  const { logger } = core;

  if (options.status) {
    const status = await service.getStatus();
    console.log('Sync Service Status:');
    console.log(`  State file: ${status.config.stateFile}`);
    console.log(`  Log file: ${status.config.logFile}`);
    console.log(`  Poll interval: ${status.config.intervalMinutes} minutes`);
    console.log(`  Total synced: ${status.syncStats.totalSyncedCount}`);
    console.log(`  Unique posts: ${status.syncStats.uniqueIdCount}`);
    console.log(`  Last sync: ${status.syncStats.lastSyncTime ?? 'never'}`);
    console.log(`  Notion database: ${describeDatabaseStats(await sink.getDatabaseStats())}`);
    return 0;
  }

  const tracing = await initializeTracing(logger);
  try {
    return await runService(service, logger, options);
  } finally {
    await tracing?.shutdown();
  }
}

async function runService(service: SyncService, logger: Logger, options: SyncOptions): Promise<number> {
  if (!(await service.setup())) {
    logger.error('Setup failed. Please check your configuration.');
    return 1;
  }

  if (options.setupOnly) {
    logger.info('Setup completed successfully');
    return 0;
  }

  if (options.backfill) {
    const stats = await service.runBackfill(options.backfillLimit);
    return stats.errorMessage === undefined ? 0 : 1;
  }

  if (options.once) {
    const stats = await service.runCycle();
    return stats.errorMessage === undefined ? 0 : 1;
  }

  await service.run(abortOnSignals().signal);
  return 0;
}

async function runWebhook(options: ConfigOption): Promise<void> {
  const config = loadOrExit(options.config, validateWebhookConfig);
  const { core, app } = createWebhookContainer(config);
  const tracing = await initializeTracing(core.logger);

  const server = app.listen(config.port, () => {
    core.logger.info('SMS webhook listening', { port: config.port });
  });

  const { signal } = abortOnSignals();
  signal.addEventListener('abort', () => {
    server.close(() => {
      core.logger.info('SMS webhook stopped');
      tracing?.shutdown().catch((error: unknown) => console.error(toError(error).message));
    });
  });
}

function printTokens(tokens: TokenSet): void {
  console.log('\nAdd these to your .env file:\n');
  console.log(`TWITTER_OAUTH2_ACCESS_TOKEN=${tokens.accessToken}`);
  if (tokens.refreshToken) {
    console.log(`TWITTER_OAUTH2_REFRESH_TOKEN=${tokens.refreshToken}`);
  }
  if (tokens.expiresAt) {
    console.log(`\nThe access token expires at ${tokens.expiresAt.toISOString()}.`);
  }
}

/**
 * Serves the redirect URI until one callback arrives, then exchanges its
 * code for tokens.
 */
async function runAuth(options: ConfigOption): Promise<number> {
  const config = loadOrExit(options.config, validateAuthConfig);
  const logger = new Logger(config.logging);
  const auth = new AuthCore(config.twitter, logger);
  const redirect = new URL(config.twitter.redirectUri);
  const port = Number(redirect.port || (redirect.protocol === 'https:' ? 443 : 80));

  const { url } = auth.createAuthUrl();

  return new Promise<number>((resolve) => {
    const app = express();
    let server: Server | undefined;
    const finish = (code: number) => {
      server?.close();
      resolve(code);
    };

    app.get(redirect.pathname, (req: Request, res: Response) => {
      const { code, state, error } = req.query;

      if (typeof error === 'string') {
        res.status(400).send(`Authorization failed: ${error}`);
        console.error(`Authorization failed: ${error}`);
        finish(1);
        return;
      }
      if (typeof code !== 'string' || typeof state !== 'string') {
        res.status(400).send('Missing code or state');
        return;
      }

      auth
        .exchangeCode(code, state)
        .then((tokens) => {
          res.send('Authorization complete. You can close this window.');
          printTokens(tokens);
          finish(0);
        })
        .catch((exchangeError: unknown) => {
          const message = toError(exchangeError).message;
          res.status(500).send(`Token exchange failed: ${message}`);
          console.error(`Token exchange failed: ${message}`);
          finish(1);
        });
    });

    server = app.listen(port, () => {
      console.log('Open this URL in your browser to authorize access to your bookmarks:\n');
      console.log(url);
      console.log(`\nWaiting for the callback on ${config.twitter.redirectUri} ...`);
    });
  });
}

async function runAuthRefresh(options: ConfigOption): Promise<number> {
  const config = loadOrExit(options.config, validateAuthConfig);
  if (!config.twitter.refreshToken) {
    console.error('Configuration error: Missing required environment variable: TWITTER_OAUTH2_REFRESH_TOKEN');
    return 1;
  }

  const auth = new AuthCore(config.twitter, new Logger(config.logging));
  const tokens = await auth.refreshToken(config.twitter.refreshToken);
  printTokens(tokens);
  return 0;
}

const program = new Command();

program
  .name('bookmark-mirror')
  .description('Mirror X/Twitter bookmarks into a Notion database')
  .enablePositionalOptions()
  .option('-c, --config <path>', 'path to .env configuration file')
  .option('--backfill', 'run a one-time backfill of existing bookmarks')
  .option('--backfill-limit <n>', 'maximum number of bookmarks to sync during backfill', parsePositiveInt)
  .option('--once', 'run a single sync cycle and exit')
  .option('--setup-only', 'only run setup and validation, then exit')
  .option('--status', 'show current sync status and exit')
  .action(async (options: SyncOptions) => {
    process.exit(await runSync(options));
  });

program
  .command('webhook')
  .description('start the SMS webhook server')
  .option('-c, --config <path>', 'path to .env configuration file')
  .action(async (options: ConfigOption) => {
    await runWebhook(options);
  });

program
  .command('schema')
  .description('print the Notion database schema to create by hand')
  .action(() => {
    console.log(JSON.stringify(databaseTemplate(), null, 2));
  });

program
  .command('auth')
  .description('authorize access to your bookmarks and print the tokens')
  .option('-c, --config <path>', 'path to .env configuration file')
  .action(async (options: ConfigOption) => {
    process.exit(await runAuth(options));
  });

program
  .command('auth-refresh')
  .description('exchange the configured refresh token for a new token pair')
  .option('-c, --config <path>', 'path to .env configuration file')
  .action(async (options: ConfigOption) => {
    process.exit(await runAuthRefresh(options));
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(toError(error).message);
  process.exit(1);
});
