// src/connectors/notion/properties.ts

import type { ContentKind } from '../../core/normalizer/types';

export const PROPERTY = {
  title: 'Title',
  content: 'Content',
  author: 'Author',
  url: 'URL',
  bookmarkedDate: 'Bookmarked Date',
  tweetDate: 'Tweet Date',
  type: 'Type',
  status: 'Status',
  category: 'Category',
} as const;

export const TITLE_MAX_LENGTH = 100;
export const RICH_TEXT_MAX_LENGTH = 2000;
export const DEFAULT_STATUS = 'Unread';

export const CONTENT_KIND_LABELS: Record<ContentKind, string> = {
  SHORT: 'Regular Tweet',
  THREAD: 'Thread',
  LONG_FORM: 'Long-form',
};

export interface RichTextSegment {
  type: 'text';
  text: { content: string };
}

export interface TitleProperty {
  title: RichTextSegment[];
}

export interface RichTextProperty {
  rich_text: RichTextSegment[];
}

export interface UrlProperty {
  url: string;
}

export interface DateProperty {
  date: { start: string };
}

export interface SelectProperty {
  select: { name: string };
}

export type PageProperty =
  | TitleProperty
  | RichTextProperty
  | UrlProperty
  | DateProperty
  | SelectProperty;

export type PageProperties = Record<string, PageProperty>;

/**
 * Cuts to the budget with an ellipsis. Backtracks to the last space only when
 * that space sits at or after 70% of the budget.
 */
export function truncateTitle(text: string, maxLength = TITLE_MAX_LENGTH): string {
  if (text.length <= maxLength) return text;

  let truncated = text.slice(0, maxLength - 1);
  const lastSpace = truncated.lastIndexOf(' ');
  if (lastSpace >= 0 && lastSpace >= maxLength * 0.7) {
    truncated = truncated.slice(0, lastSpace);
  }

  return `${truncated}…`;
}

/** Fixed-size segments; empty input still gives one empty segment. */
export function chunkRichText(text: string, segmentLength = RICH_TEXT_MAX_LENGTH): RichTextSegment[] {
  const segments: RichTextSegment[] = [];
  for (let i = 0; i < text.length; i += segmentLength) {
    segments.push(textSegment(text.slice(i, i + segmentLength)));
  }
  return segments.length > 0 ? segments : [textSegment('')];
}

export function textSegment(content: string): RichTextSegment {
  return { type: 'text', text: { content } };
}

export function titleProperty(text: string): TitleProperty {
  return { title: [textSegment(text)] };
}

export function richTextProperty(text: string): RichTextProperty {
  return { rich_text: chunkRichText(text) };
}

export function urlProperty(url: string): UrlProperty {
  return { url };
}

export function dateProperty(iso: string): DateProperty {
  return { date: { start: iso } };
}

export function selectProperty(name: string): SelectProperty {
  return { select: { name } };
}

type SelectColor = 'blue' | 'green' | 'purple' | 'red' | 'yellow' | 'gray';

export type PropertySchema =
  | { title: Record<string, never> }
  | { rich_text: Record<string, never> }
  | { url: Record<string, never> }
  | { date: Record<string, never> }
  | { select: { options: Array<{ name: string; color: SelectColor }> } };

/** Every field the database should carry, in the order they are added. */
export const EXPECTED_SCHEMA: Record<string, PropertySchema> = {
  [PROPERTY.content]: { rich_text: {} },
  [PROPERTY.author]: { rich_text: {} },
  [PROPERTY.url]: { url: {} },
  [PROPERTY.bookmarkedDate]: { date: {} },
  [PROPERTY.tweetDate]: { date: {} },
  [PROPERTY.type]: {
    select: {
      options: [
        { name: CONTENT_KIND_LABELS.SHORT, color: 'blue' },
        { name: CONTENT_KIND_LABELS.THREAD, color: 'green' },
        { name: CONTENT_KIND_LABELS.LONG_FORM, color: 'purple' },
      ],
    },
  },
  [PROPERTY.status]: {
    select: {
      options: [
        { name: 'Unread', color: 'red' },
        { name: 'Read', color: 'yellow' },
        { name: 'Archived', color: 'gray' },
      ],
    },
  },
  [PROPERTY.category]: { select: { options: [] } },
};

export const REQUIRED_PROPERTIES = [PROPERTY.title, PROPERTY.content, PROPERTY.url] as const;

export const DATABASE_TITLE = 'Twitter Bookmarks';

export interface DatabaseTemplate {
  title: string;
  properties: Record<string, PropertySchema>;
}

/**
 * Schema for a new database. Notion databases are created by hand in the
 * Notion UI; this is what to create.
 */
export function databaseTemplate(): DatabaseTemplate {
  return {
    title: DATABASE_TITLE,
    properties: { [PROPERTY.title]: { title: {} }, ...EXPECTED_SCHEMA },
  };
}
