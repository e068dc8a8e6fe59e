/**
 * URL Utilities
 * Reusable functions for URL inspection
 */

/**
 * Parse a URL, returning null instead of throwing
 */
export function parseUrl(url: string): URL | null {
  try {
    return new URL(url);
  } catch {
    return null;
  }
}

/**
 * True when hostname is the domain itself or one of its subdomains
 *
 * @example
 * isHostOrSubdomain("i.imgur.com", "imgur.com") // true
 * isHostOrSubdomain("notimgur.com", "imgur.com") // false
 */
export function isHostOrSubdomain(hostname: string, domain: string): boolean {
  const host = hostname.toLowerCase();
  const target = domain.toLowerCase();
  return host === target || host.endsWith(`.${target}`);
}

/**
 * Drop everything from the first "?" or "#"
 */
export function stripQueryAndFragment(url: string): string {
  const end = url.search(/[?#]/);
  return end === -1 ? url : url.slice(0, end);
}

/**
 * Final path segment of a URL, taken verbatim (query string included)
 *
 * @example
 * getUrlBasename("http://i.imgur.com/abc.jpg?1") // "abc.jpg?1"
 */
export function getUrlBasename(url: string): string {
  return url.slice(url.lastIndexOf("/") + 1);
}
