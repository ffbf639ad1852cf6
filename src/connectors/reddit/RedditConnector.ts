// src/connectors/reddit/RedditConnector.ts

import type { ContentCollector, CoreDeps } from '../types';
import type { SourceItem } from '../../core/normalizer/types';
import type {
  CollectOptions,
  RedditComment,
  RedditListingResponse,
  RedditPost,
  RedditStream,
} from './types';
import { ApiClientError, AuthError, NotFoundError } from '../../utils/errors';

export const REDDIT_API_BASE_URL = 'https://oauth.reddit.com';

/** Reddit caps a listing page at 100 items */
export const MAX_PAGE_SIZE = 100;

/** Reddit stops paginating a listing after roughly 1000 items */
export const MAX_STREAM_LIMIT = 1000;

// Thing kind each stream lists; anything else (e.g. 'more' stubs) is skipped
const STREAM_KINDS: Record<RedditStream, string> = {
  submitted: 't3',
  comments: 't1',
};

export const DEFAULT_COLLECT_OPTIONS: CollectOptions = {
  postLimit: 20,
  commentLimit: 20,
};

/**
 * Reddit content collector
 *
 * Reads a user's newest submissions and comments through the app-only
 * OAuth API, following `after` cursors until each stream's bound is met.
 *
 * @example
 * ```typescript
 * const connector = new RedditConnector(deps);
 * const items = await connector.collect('alice', { postLimit: 20, commentLimit: 20 });
 * ```
 */
export class RedditConnector implements ContentCollector {
  readonly name = 'reddit' as const;

  constructor(protected deps: CoreDeps) {}

  /**
   * Collects and merges both streams, newest first
   *
   * @throws {AuthError} If Reddit rejects the credentials or the access token
   * @throws {NotFoundError} If the profile does not exist or is not accessible
   */
  async collect(username: string, options: CollectOptions = DEFAULT_COLLECT_OPTIONS): Promise<SourceItem[]> {
    const postLimit = clampLimit(options.postLimit);
    const commentLimit = clampLimit(options.commentLimit);

    const rawPosts = await this.fetchStream<RedditPost>(username, 'submitted', postLimit);
    const rawComments = await this.fetchStream<RedditComment>(username, 'comments', commentLimit);

    const posts = this.deps.normalizer.normalizePosts(rawPosts);
    const comments = this.deps.normalizer.normalizeComments(rawComments);

    // Array.prototype.sort is stable: posts stay ahead of comments on equal timestamps
    const items = [...posts, ...comments].sort(
      (a, b) => Date.parse(b.createdAt) - Date.parse(a.createdAt)
    );

    this.deps.logger.info('Reddit fetch completed', {
      username,
      postCount: posts.length,
      commentCount: comments.length,
    });

    return items;
  }

  private async fetchStream<T>(username: string, stream: RedditStream, limit: number): Promise<T[]> {
    const collected: T[] = [];
    let after: string | null = null;
    let skipped = 0;

    while (collected.length < limit) {
      const pageSize = Math.min(limit - collected.length, MAX_PAGE_SIZE);
      const listing: RedditListingResponse<T> = await this.fetchPage<T>(username, stream, pageSize, after);

      const children = listing?.data?.children ?? [];
      for (const child of children) {
        if (collected.length >= limit) break;
        if (child?.kind !== STREAM_KINDS[stream] || !child.data || typeof child.data !== 'object') {
          skipped++;
          continue;
        }
        collected.push(child.data);
      }

      after = listing?.data?.after ?? null;
      if (!after || children.length === 0) break;
    }

    this.deps.logger.debug('Reddit stream read', {
      username,
      stream,
      itemCount: collected.length,
      skipped,
    });
    return collected;
  }

  private async fetchPage<T>(
    username: string,
    stream: RedditStream,
    pageSize: number,
    after: string | null
  ): Promise<RedditListingResponse<T>> {
    const accessToken = await this.deps.auth.getAccessToken();

    const query: Record<string, string | number> = {
      limit: pageSize,
      sort: 'new',
      raw_json: 1, // Avoid HTML entity encoding
    };
    if (after) query.after = after;

    try {
      const response = await this.deps.http.get<RedditListingResponse<T>>(
        `${REDDIT_API_BASE_URL}/user/${encodeURIComponent(username)}/${stream}`,
        {
          headers: { Authorization: `Bearer ${accessToken}` },
          query,
        }
      );
      return response.data;
    } catch (error: unknown) {
      if (error instanceof ApiClientError) {
        if (error.status === 401) {
          throw new AuthError('Reddit rejected the access token', { status: error.status });
        }
        // 404: no such user; 403: suspended or otherwise private profile
        if (error.status === 404 || error.status === 403) {
          throw new NotFoundError(`Reddit user u/${username} does not exist or is not accessible`, {
            username,
            status: error.status,
          });
        }
      }
      throw error;
    }
  }
}

function clampLimit(limit: number): number {
  if (!Number.isFinite(limit) || limit <= 0) return 0;
  return Math.min(Math.floor(limit), MAX_STREAM_LIMIT);
}
