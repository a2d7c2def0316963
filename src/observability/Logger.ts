// src/observability/Logger.ts

import fs from 'node:fs';
import path from 'node:path';
import winston from 'winston';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerConfig {
  level?: LogLevel;
  format?: 'json' | 'pretty';
  filePath?: string;
  silent?: boolean;
}

const SENSITIVE_KEYS = [
  'accessToken',
  'refreshToken',
  'token',
  'authToken',
  'clientSecret',
  'notionToken',
];

export class Logger {
  private logger: winston.Logger;

  constructor(config: LoggerConfig = {}) {
    const format =
      config.format === 'json'
        ? winston.format.combine(winston.format.timestamp(), winston.format.json())
        : winston.format.combine(winston.format.colorize(), winston.format.simple());

    const transports: winston.transport[] = [new winston.transports.Console()];

    if (config.filePath) {
      fs.mkdirSync(path.dirname(config.filePath), { recursive: true });
      transports.push(
        new winston.transports.File({
          filename: config.filePath,
          format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
        })
      );
    }

    this.logger = winston.createLogger({
      level: config.level ?? 'info',
      format,
      silent: config.silent ?? false,
      transports,
    });
  }

  private redactSensitive(obj: Record<string, unknown>): Record<string, unknown> {
    const redacted: Record<string, unknown> = { ...obj };

    for (const key of SENSITIVE_KEYS) {
      if (key in redacted) redacted[key] = '[REDACTED]';
    }

    // Nested token set, e.g. the result of an OAuth exchange
    const tokenSet = redacted.tokenSet;
    if (tokenSet && typeof tokenSet === 'object' && !Array.isArray(tokenSet)) {
      const nested: Record<string, unknown> = { ...tokenSet };
      for (const key of SENSITIVE_KEYS) {
        if (key in nested) nested[key] = '[REDACTED]';
      }
      redacted.tokenSet = nested;
    }

    return redacted;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta ? this.redactSensitive(meta) : {});
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta ? this.redactSensitive(meta) : {});
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta ? this.redactSensitive(meta) : {});
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta ? this.redactSensitive(meta) : {});
  }
}

/** `+15551234567` -> `***4567` */
export function maskPhoneNumber(phone: string): string {
  if (phone.length <= 4) return '***';
  return `***${phone.slice(-4)}`;
}
