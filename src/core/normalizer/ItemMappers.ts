// src/core/normalizer/ItemMappers.ts

import type { RedditComment, RedditPost } from '../../connectors/reddit/types';
import type { SourceItem } from './types';

export const REDDIT_BASE_URL = 'https://www.reddit.com';

/**
 * Reddit timestamps are epoch seconds. Returns '' for anything that is not a
 * finite number so schema validation rejects the item.
 */
export function toIsoTimestamp(createdUtc: unknown): string {
  if (typeof createdUtc !== 'number' || !Number.isFinite(createdUtc)) {
    return '';
  }
  return new Date(createdUtc * 1000).toISOString();
}

export function toAbsolutePermalink(permalink: string): string {
  if (/^https?:\/\//i.test(permalink)) return permalink;
  return `${REDDIT_BASE_URL}${permalink.startsWith('/') ? '' : '/'}${permalink}`;
}

// Post mapper (title, then self text when present)
export function mapPost(raw: RedditPost): SourceItem {
  const title = (raw.title ?? '').trim();
  const body = (raw.selftext ?? '').trim();

  return {
    id: raw.name,
    kind: 'post',
    text: body ? `${title}\n\n${body}` : title,
    permalink: toAbsolutePermalink(raw.permalink ?? ''),
    subreddit: raw.subreddit || undefined,
    createdAt: toIsoTimestamp(raw.created_utc),
  };
}

// Comment mapper
export function mapComment(raw: RedditComment): SourceItem {
  return {
    id: raw.name,
    kind: 'comment',
    text: (raw.body ?? '').trim(),
    permalink: toAbsolutePermalink(raw.permalink ?? ''),
    subreddit: raw.subreddit || undefined,
    createdAt: toIsoTimestamp(raw.created_utc),
  };
}
