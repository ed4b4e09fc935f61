/**
 * URL Utilities
 * Classification and cleanup of link addresses found in wiki markup
 */

// "http://", "ftp://", "irc://" ... and "mailto:"
const EXTERNAL_LINK_PATTERN = /^(?:[a-z][a-z0-9+.-]*:\/\/|mailto:)/i;

/**
 * Check whether a link address points outside the wiki
 *
 * @example
 * isExternalLink("https://example.com") // true
 * isExternalLink("mailto:someone@example.com") // true
 * isExternalLink(":wp:Graph") // false (alias)
 * isExternalLink("Search (AI)") // false
 */
export function isExternalLink(address: string): boolean {
  return EXTERNAL_LINK_PATTERN.test(address);
}

/**
 * Percent-encode characters that are not valid in a URL
 * Existing escapes ("%20") and reserved characters ("/", "?", "#") are kept.
 *
 * @example
 * fixUrl("http://example.com/a b") // "http://example.com/a%20b"
 * fixUrl("http://example.com/a%20b") // "http://example.com/a%20b"
 */
export function fixUrl(url: string): string {
  return encodeURI(url).replace(/%25([0-9A-Fa-f]{2})/g, "%$1");
}
