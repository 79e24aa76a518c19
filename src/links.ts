// Only absolute http(s) URLs in double-quoted href attributes are picked up.
// Relative paths, mailto:, javascript: and friends never match.
const LINK_PATTERN = /href="(https?:\/\/[^"]+)"/g;

/**
 * Extracts every absolute link from a response body.
 * Best-effort pattern match, not an HTML parser. Malformed markup yields fewer links.
 * @param body - Raw response body; Buffers are decoded as UTF-8.
 * @returns URLs in order of appearance, duplicates included.
 */
export function extractLinks(body: Buffer | string): string[] {
  const text = typeof body === 'string' ? body : body.toString('utf8');
  return Array.from(text.matchAll(LINK_PATTERN), (match) => match[1]);
}

/**
 * Checks a URL against the blacklist.
 * Matching is by substring, so an entry of 'facebook.com' also excludes
 * 'https://facebook.com.example.net/'.
 * @param url - Candidate URL.
 * @param blacklist - Substrings to reject.
 * @returns true if any entry occurs anywhere in the URL.
 */
export function isBlacklisted(url: string, blacklist: readonly string[]): boolean {
  return blacklist.some((entry) => url.includes(entry));
}

/**
 * Drops blacklisted links, keeping the order and duplicates of the rest.
 */
export function filterLinks(links: readonly string[], blacklist: readonly string[]): string[] {
  return links.filter((link) => !isBlacklisted(link, blacklist));
}
