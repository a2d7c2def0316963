// src/connectors/fxtwitter/types.ts

/**
 * FxTwitter public API shapes (no authentication)
 * @see https://github.com/FixTweet/FxTwitter/wiki/Status-Fetch-API
 */

export type FxArticleBlockType =
  | 'unstyled'
  | 'header-one'
  | 'header-two'
  | 'header-three'
  | 'unordered-list-item'
  | 'ordered-list-item'
  | 'blockquote'
  | (string & {});

export interface FxArticleBlock {
  text?: string;
  type?: FxArticleBlockType;
}

export interface FxArticle {
  title?: string;
  content?: {
    blocks?: FxArticleBlock[];
  };
}

export interface FxTweet {
  id?: string;
  url?: string;
  text?: string;
  created_at?: string;
  created_timestamp?: number;
  replying_to?: string | null;
  author?: {
    name?: string;
    screen_name?: string;
  };
  article?: FxArticle | null;
}

export interface FxTwitterResponse {
  code: number;
  message: string;
  tweet?: FxTweet;
}
