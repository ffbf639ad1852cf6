// src/synthesizer/PromptBuilder.ts

import type { SourceItem } from '../core/normalizer/types';

export const SNIPPET_MAX_LENGTH = 300;

const PROMPT_TEMPLATE = `Analyze the following Reddit user's posts and comments and write a detailed user persona in markdown.
Infer demographics (approximate age range, location, occupation), interests, personality, tone, and values only where the content supports it, and say so when the evidence is thin.
Cite the evidence for every trait with the permalink of the post or comment it is drawn from, in the form [source: <permalink>].

User: u/{username}

Posts:
{posts}

Comments:
{comments}

Output format:
# User Persona: u/{username}

**Demographics:** ... [source: ...]
**Interests:** ... [source: ...]
**Personality:** ... [source: ...]
**Tone:** ... [source: ...]
**Values & Communication:** ... [source: ...]

Be concise but insightful.
`;

/**
 * Collapse whitespace and cut at the last word boundary within `maxLength`.
 */
export function toSnippet(text: string, maxLength: number = SNIPPET_MAX_LENGTH): string {
  const clean = text.replace(/\s+/g, ' ').trim();
  if (clean.length <= maxLength) return clean;

  let cut = clean.slice(0, maxLength);
  // Never end on the high half of a surrogate pair
  const last = cut.charCodeAt(cut.length - 1);
  if (last >= 0xd800 && last <= 0xdbff) cut = cut.slice(0, -1);

  const lastSpace = cut.lastIndexOf(' ');
  return `${lastSpace > 0 ? cut.slice(0, lastSpace) : cut}…`;
}

function section(items: readonly SourceItem[]): string {
  if (items.length === 0) return '- (none)';
  return items.map((item) => `- [${item.permalink}] ${toSnippet(item.text)}`).join('\n');
}

/**
 * Build the single prompt sent to the text generator. Items keep their
 * collector order within each section.
 */
export function buildPrompt(username: string, items: readonly SourceItem[]): string {
  const posts = items.filter((item) => item.kind === 'post');
  const comments = items.filter((item) => item.kind === 'comment');

  const values: Record<string, string> = {
    username,
    posts: section(posts),
    comments: section(comments),
  };

  // Single pass, so placeholder-like text inside a snippet is left alone
  return PROMPT_TEMPLATE.replace(/\{(username|posts|comments)\}/g, (_match, key: string) => values[key] ?? '');
}
