// src/core/normalizer/types.ts

export type SourceItemKind = 'post' | 'comment';

export interface SourceItem {
  id: string; // Reddit fullname (t3_..., t1_...)
  kind: SourceItemKind;
  text: string;
  permalink: string; // Absolute URL
  subreddit?: string;
  createdAt: string; // ISO 8601 timestamp
}
