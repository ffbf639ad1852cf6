// src/utils/profileUrl.ts

import { InputError } from './errors';

// reddit.com (any subdomain, scheme optional) / user|u / <name> [/...][?...][#...]
const PROFILE_URL_PATTERN =
  /^(?:https?:\/\/)?(?:[a-z0-9-]+\.)*reddit\.com\/(?:user|u)\/([A-Za-z0-9_-]+)(?:[/?#].*)?$/i;

/**
 * Extract the username from a Reddit profile URL
 *
 * @example
 * ```typescript
 * extractUsername('https://www.reddit.com/user/alice/'); // 'alice'
 * ```
 *
 * @throws {InputError} If the URL is not a Reddit profile URL
 */
export function extractUsername(url: string): string {
  const match = PROFILE_URL_PATTERN.exec(url.trim());
  if (!match?.[1]) {
    throw new InputError(`Invalid Reddit profile URL: ${url}`, { url });
  }
  return match[1];
}
