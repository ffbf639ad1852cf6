// src/connectors/types.ts

import type { SourceItem } from '../core/normalizer/types';
import type { CollectOptions } from './reddit/types';
import type { RedditAuth } from '../core/auth/RedditAuth';
import type { HttpCore } from '../core/http/HttpCore';
import type { Normalizer } from '../core/normalizer/Normalizer';
import type { Logger } from '../observability/Logger';

export interface ContentCollector {
  /**
   * Most-recent-first posts and comments of `username`, at most
   * `postLimit + commentLimit` items. Empty when the user has no public activity.
   */
  collect(username: string, options: CollectOptions): Promise<SourceItem[]>;
}

export interface CoreDeps {
  auth: RedditAuth;
  http: HttpCore;
  normalizer: Normalizer;
  logger: Logger;
}
