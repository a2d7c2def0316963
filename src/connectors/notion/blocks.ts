// src/connectors/notion/blocks.ts

import { RICH_TEXT_MAX_LENGTH, textSegment } from './properties';
import type { RichTextSegment } from './properties';

export const MAX_BLOCKS_PER_REQUEST = 100;

type TextBlockType =
  | 'paragraph'
  | 'heading_1'
  | 'heading_2'
  | 'heading_3'
  | 'quote'
  | 'bulleted_list_item';

export type Block = {
  [K in TextBlockType]: {
    object: 'block';
    type: K;
  } & Record<K, { rich_text: RichTextSegment[] }>;
}[TextBlockType];

function block(type: TextBlockType, content: string): Block {
  const body = { rich_text: [textSegment(content)] };
  switch (type) {
    case 'heading_1':
      return { object: 'block', type: 'heading_1', heading_1: body };
    case 'heading_2':
      return { object: 'block', type: 'heading_2', heading_2: body };
    case 'heading_3':
      return { object: 'block', type: 'heading_3', heading_3: body };
    case 'quote':
      return { object: 'block', type: 'quote', quote: body };
    case 'bulleted_list_item':
      return { object: 'block', type: 'bulleted_list_item', bulleted_list_item: body };
    default:
      return { object: 'block', type: 'paragraph', paragraph: body };
  }
}

const PREFIXES: Array<[string, TextBlockType]> = [
  ['# ', 'heading_1'],
  ['## ', 'heading_2'],
  ['### ', 'heading_3'],
  ['> ', 'quote'],
  ['• ', 'bulleted_list_item'],
];

/**
 * Page body blocks from plain text. Paragraphs are separated by blank lines;
 * a leading `# `, `## `, `### `, `> ` or `• ` picks the block type.
 */
export function textToBlocks(text: string): Block[] {
  const blocks: Block[] = [];

  for (const raw of text.split('\n\n')) {
    const para = raw.trim();
    if (!para) continue;

    const prefixed = PREFIXES.find(([prefix]) => para.startsWith(prefix));
    if (prefixed) {
      const [prefix, type] = prefixed;
      blocks.push(block(type, para.slice(prefix.length).trim().slice(0, RICH_TEXT_MAX_LENGTH)));
      continue;
    }

    for (let i = 0; i < para.length; i += RICH_TEXT_MAX_LENGTH) {
      blocks.push(block('paragraph', para.slice(i, i + RICH_TEXT_MAX_LENGTH)));
    }
  }

  return blocks.slice(0, MAX_BLOCKS_PER_REQUEST);
}
