// src/index.ts

export { SyncService } from './sync/SyncService';
export type {
  BackfillStats,
  BookmarkSink,
  BookmarkSource,
  CycleStats,
  SyncPhase,
  SyncStatus,
} from './sync/SyncService';
export { StateManager } from './core/state/StateManager';
export type { StateStats } from './core/state/StateManager';
export { SyncState } from './core/state/SyncState';
export { TwitterConnector } from './connectors/twitter/TwitterConnector';
export { NotionConnector } from './connectors/notion/NotionConnector';
export type { DatabaseStats } from './connectors/notion/NotionConnector';
export { FxTwitterConnector } from './connectors/fxtwitter/FxTwitterConnector';
export { textToBlocks } from './connectors/notion/blocks';
export { databaseTemplate } from './connectors/notion/properties';
export { AuthCore } from './core/auth/AuthCore';
export type { TokenSet } from './core/auth/types';
export type { ContentKind, NormalizedItem } from './core/normalizer/types';
export { createWebhookApp } from './webhook/server';
export { parseMessage, sanitizeCategory } from './webhook/message';
export { createCore, createSyncContainer, createWebhookContainer } from './bootstrap';
export { validateConfig, validateConfigSafe, validateWebhookConfig } from './config/ConfigValidator';
export type { SyncAppConfig, WebhookAppConfig } from './config/ConfigValidator';

// Error classes for error handling
export {
  SyncError,
  ConfigError,
  OAuthError,
  ApiError,
  ApiClientError,
  ApiValidationError,
  AuthenticationError,
  ApiServerError,
  RateLimitError,
  NetworkError,
  NetworkTimeoutError,
  StateError,
} from './utils/errors';
