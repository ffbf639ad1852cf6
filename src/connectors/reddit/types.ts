// src/connectors/reddit/types.ts

/**
 * Listing streams read for a user profile
 * - 'submitted': the user's posts
 * - 'comments': the user's comments
 */
export type RedditStream = 'submitted' | 'comments';

/**
 * Per-stream bounds for one collection run
 */
export interface CollectOptions {
  /** Maximum posts to read (0-1000) */
  postLimit: number;
  /** Maximum comments to read (0-1000) */
  commentLimit: number;
}

/**
 * Reddit API response for listing endpoints
 */
export interface RedditListingResponse<T> {
  kind: 'Listing';
  data: {
    after: string | null;
    before: string | null;
    dist?: number;
    children: Array<{
      kind: string;
      data?: T;
    }>;
  };
}

/**
 * Reddit post data structure
 */
export interface RedditPost {
  id: string;
  name: string;
  title: string;
  selftext?: string;
  author?: string;
  subreddit?: string;
  created_utc: number;
  permalink: string;
  url?: string;
  score?: number;
  num_comments?: number;
}

/**
 * Reddit comment data structure
 */
export interface RedditComment {
  id: string;
  name: string;
  body: string;
  author?: string;
  subreddit?: string;
  created_utc: number;
  permalink: string;
  score?: number;
  link_id?: string;
  link_title?: string;
}
