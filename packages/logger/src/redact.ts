/**
 * @fileoverview Credential masking for logged URLs
 * @module @trellis/logger/redact
 */

/** Query parameters that carry credentials on Trello calls. */
export const SENSITIVE_PARAMS: readonly string[] = [
  'key',
  'token',
  'oauth_token',
  'oauth_signature',
  'oauth_consumer_key',
  'oauth_verifier',
];

const MASK = '[REDACTED]';

/**
 * Mask credential query parameters in a URL.
 * Strings that do not parse as absolute URLs are returned unchanged.
 *
 * @example
 * ```typescript
 * redactUrl('https://api.trello.com/1/boards/b1?key=k&token=t');
 * // 'https://api.trello.com/1/boards/b1?key=%5BREDACTED%5D&token=%5BREDACTED%5D'
 * ```
 */
export function redactUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }

  let changed = false;
  for (const name of SENSITIVE_PARAMS) {
    if (parsed.searchParams.has(name)) {
      parsed.searchParams.set(name, MASK);
      changed = true;
    }
  }
  return changed ? parsed.toString() : url;
}

