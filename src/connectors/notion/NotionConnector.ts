// src/connectors/notion/NotionConnector.ts

import { BaseConnector } from '../BaseConnector';
import type { CoreDeps } from '../types';
import type { RetryPolicy } from '../../core/http/types';
import { authorDisplay, fullBody } from '../../core/normalizer/types';
import type { NormalizedItem } from '../../core/normalizer/types';
import type { Block } from './blocks';
import {
  CONTENT_KIND_LABELS,
  DEFAULT_STATUS,
  EXPECTED_SCHEMA,
  PROPERTY,
  REQUIRED_PROPERTIES,
  dateProperty,
  richTextProperty,
  selectProperty,
  titleProperty,
  truncateTitle,
  urlProperty,
} from './properties';
import type { PageProperties, PropertySchema } from './properties';
import { ApiValidationError, toError } from '../../utils/errors';

export const NOTION_VERSION = '2022-06-28';

export interface NotionConnectorOptions {
  token: string;
  databaseId: string;
  apiBaseUrl?: string;
  /** Base of the `2^attempt` backoff between create attempts */
  baseDelayMs?: number;
}

export interface AddItemOptions {
  retries?: number;
  category?: string;
  children?: Block[];
}

/** `hasEntries` comes from a single-row query, not a count. */
export type DatabaseStats = { hasEntries: boolean; sampleCount: number } | { error: string };

interface DatabaseResponse {
  id: string;
  properties?: Record<string, unknown>;
}

interface PageResponse {
  id: string;
}

interface QueryResponse {
  results?: Array<{ id: string }>;
  has_more?: boolean;
}

/**
 * Writes bookmarks as pages of one Notion database.
 */
export class NotionConnector extends BaseConnector {
  readonly name = 'notion' as const;
  private readonly apiBaseUrl: string;
  private readonly baseDelayMs: number;
  private shapeVerified = false;
  private schemaEnsured = false;

  constructor(
    deps: CoreDeps,
    private options: NotionConnectorOptions
  ) {
    super(deps);
    this.apiBaseUrl = options.apiBaseUrl ?? 'https://api.notion.com/v1';
    this.baseDelayMs = options.baseDelayMs ?? 1000;
  }

  /** Create-page payload properties for one item. */
  buildProperties(item: NormalizedItem, category?: string): PageProperties {
    const titleSource = item.title ?? item.body;
    const title = titleSource.trim()
      ? truncateTitle(titleSource)
      : `Tweet from @${item.authorHandle}…`;

    const properties: PageProperties = {
      [PROPERTY.title]: titleProperty(title),
      [PROPERTY.content]: richTextProperty(fullBody(item)),
      [PROPERTY.author]: richTextProperty(authorDisplay(item)),
      [PROPERTY.url]: urlProperty(item.url),
      [PROPERTY.type]: selectProperty(CONTENT_KIND_LABELS[item.contentKind]),
      [PROPERTY.status]: selectProperty(DEFAULT_STATUS),
      [PROPERTY.tweetDate]: dateProperty(item.createdAt),
    };

    if (item.observedAt) {
      properties[PROPERTY.bookmarkedDate] = dateProperty(item.observedAt);
    }
    if (category) {
      properties[PROPERTY.category] = selectProperty(category);
    }

    return properties;
  }

  /**
   * Creates one page. Rate limits and other transient failures are retried
   * with `2^attempt` backoff within `retries` attempts; a 400 is not.
   *
   * @returns the new page id, or null when the item could not be written
   */
  async addItem(item: NormalizedItem, options: AddItemOptions = {}): Promise<string | null> {
    const policy: RetryPolicy = {
      maxAttempts: options.retries ?? 3,
      delayFor: (error, attempt) =>
        error instanceof ApiValidationError ? null : this.backoff(attempt, this.baseDelayMs),
    };

    const payload = {
      parent: { database_id: this.options.databaseId },
      properties: this.buildProperties(item, options.category),
      ...(options.children && options.children.length > 0 ? { children: options.children } : {}),
    };

    try {
      const response = await this.withRetry('create-page', policy, () =>
        this.deps.http.post<PageResponse>(`${this.apiBaseUrl}/pages`, payload, {
          headers: this.headers(),
        })
      );
      this.deps.logger.info('Added item to Notion', { id: item.id, pageId: response.data.id });
      return response.data.id;
    } catch (error: unknown) {
      this.deps.logger.error('Failed to add item to Notion', {
        id: item.id,
        error: toError(error).message,
      });
      return null;
    }
  }

  /**
   * True when Title, Content and URL exist. Only a positive answer is cached.
   */
  async databaseHasExpectedShape(): Promise<boolean> {
    if (this.shapeVerified) return true;

    try {
      const existing = await this.getPropertyNames();
      const missing = REQUIRED_PROPERTIES.filter((name) => !existing.has(name));

      if (missing.length > 0) {
        this.deps.logger.warn('Database is missing properties', { missing });
        return false;
      }

      this.shapeVerified = true;
      this.deps.logger.info('Database schema validated');
      return true;
    } catch (error: unknown) {
      this.deps.logger.error('Failed to validate database', {
        error: toError(error).message,
      });
      return false;
    }
  }

  /**
   * Adds whichever expected fields are missing, in one update.
   * The title field is never created: every database already has one.
   */
  async ensureDatabaseShape(): Promise<boolean> {
    if (this.schemaEnsured) return true;

    try {
      const existing = await this.getPropertyNames();
      const toAdd: Record<string, PropertySchema> = {};
      for (const [name, schema] of Object.entries(EXPECTED_SCHEMA)) {
        if (!existing.has(name)) toAdd[name] = schema;
      }

      if (Object.keys(toAdd).length > 0) {
        await this.deps.http.patch(
          `${this.apiBaseUrl}/databases/${this.options.databaseId}`,
          { properties: toAdd },
          { headers: this.headers() }
        );
        this.deps.logger.info('Added properties to database', { added: Object.keys(toAdd) });
      }

      if (!existing.has(PROPERTY.title)) {
        this.deps.logger.warn('Database has no Title property; rename its title column to Title');
        return false;
      }

      this.schemaEnsured = true;
      this.shapeVerified = true;
      return true;
    } catch (error: unknown) {
      this.deps.logger.error('Failed to set up database', {
        error: toError(error).message,
      });
      return false;
    }
  }

  /** Whether a page's URL contains `status/<sourceId>`. Errors count as absent. */
  async recordExists(sourceId: string): Promise<boolean> {
    try {
      const response = await this.deps.http.post<QueryResponse>(
        `${this.apiBaseUrl}/databases/${this.options.databaseId}/query`,
        {
          filter: { property: PROPERTY.url, url: { contains: `status/${sourceId}` } },
          page_size: 1,
        },
        { headers: this.headers() }
      );
      return (response.data.results ?? []).length > 0;
    } catch (error: unknown) {
      this.deps.logger.error('Failed to check for existing page', {
        sourceId,
        error: toError(error).message,
      });
      return false;
    }
  }

  async getDatabaseStats(): Promise<DatabaseStats> {
    try {
      const response = await this.deps.http.post<QueryResponse>(
        `${this.apiBaseUrl}/databases/${this.options.databaseId}/query`,
        { page_size: 1 },
        { headers: this.headers() }
      );
      const sampleCount = (response.data.results ?? []).length;
      return { hasEntries: sampleCount > 0 || Boolean(response.data.has_more), sampleCount };
    } catch (error: unknown) {
      const message = toError(error).message;
      this.deps.logger.error('Failed to get database stats', { error: message });
      return { error: message };
    }
  }

  private async getPropertyNames(): Promise<Set<string>> {
    const response = await this.deps.http.get<DatabaseResponse>(
      `${this.apiBaseUrl}/databases/${this.options.databaseId}`,
      { headers: this.headers() }
    );
    return new Set(Object.keys(response.data.properties ?? {}));
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.options.token}`,
      'Notion-Version': NOTION_VERSION,
      'Content-Type': 'application/json',
    };
  }
}
