// src/config/loadConfig.ts

import fs from 'node:fs';
import dotenv from 'dotenv';
import { APP_DIR, expandHome } from './ConfigValidator';
import { ConfigError } from '../utils/errors';

/**
 * Loads a .env file into process.env and returns the path used, if any.
 *
 * An explicit path must exist. Otherwise ./.env, then ~/.bookmark-mirror/.env;
 * variables already set in the environment win.
 */
export function loadEnvironment(configPath?: string): string | undefined {
  const candidates = configPath
    ? [expandHome(configPath)]
    : ['.env', expandHome(`${APP_DIR}/.env`)];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      const result = dotenv.config({ path: candidate });
      if (result.error) {
        throw new ConfigError(`Failed to read config file ${candidate}: ${result.error.message}`);
      }
      return candidate;
    }
  }

  if (configPath) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }
  return undefined;
}
