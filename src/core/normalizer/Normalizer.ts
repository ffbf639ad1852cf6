// src/core/normalizer/Normalizer.ts

import { z } from 'zod';
import type { RedditComment, RedditPost } from '../../connectors/reddit/types';
import type { SourceItem } from './types';
import { mapComment, mapPost } from './ItemMappers';
import { NormalizationError } from '../../utils/errors';

export const SourceItemSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(['post', 'comment']),
  text: z.string(),
  permalink: z.string().url(),
  subreddit: z.string().optional(),
  createdAt: z.string().datetime(),
});

export class Normalizer {
  normalizePosts(rawPosts: RedditPost[]): SourceItem[] {
    return rawPosts.map((raw) => this.validate(mapPost(raw)));
  }

  normalizeComments(rawComments: RedditComment[]): SourceItem[] {
    return rawComments.map((raw) => this.validate(mapComment(raw)));
  }

  private validate(item: SourceItem): SourceItem {
    const result = SourceItemSchema.safeParse(item);
    if (!result.success) {
      throw new NormalizationError(`Schema validation failed for ${item.kind} ${item.id}`, {
        issues: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
      });
    }
    return Object.freeze(item);
  }
}
