// src/connectors/twitter/types.ts

/**
 * Twitter API v2 response shapes
 * @see https://developer.twitter.com/en/docs/twitter-api/bookmarks/api-reference
 */

export interface TwitterReferencedTweet {
  type: 'replied_to' | 'quoted' | 'retweeted';
  id: string;
}

export interface TwitterTweet {
  id: string;
  text?: string;
  author_id?: string;
  created_at?: string;
  conversation_id?: string;
  referenced_tweets?: TwitterReferencedTweet[];
  note_tweet?: {
    text?: string;
  };
  truncated?: boolean;
}

export interface TwitterUser {
  id: string;
  name?: string;
  username?: string;
}

export interface TwitterTweetResponse {
  data?: TwitterTweet[];
  includes?: {
    users?: TwitterUser[];
  };
  meta?: {
    result_count?: number;
    next_token?: string;
  };
  errors?: Array<{
    message: string;
    type?: string;
  }>;
}

export interface TwitterUserResponse {
  data: {
    id: string;
    name?: string;
    username?: string;
  };
}

export interface TwitterTokenResponse {
  access_token: string;
  refresh_token?: string;
  expires_in?: number;
  scope?: string;
  token_type?: string;
}
