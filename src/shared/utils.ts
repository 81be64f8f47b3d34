/**
 * General-purpose utility functions used across every module.
 * All functions are pure (no side effects, no I/O).
 */

// ---------------------------------------------------------------------------
// String utilities
// ---------------------------------------------------------------------------

/**
 * Truncates text to `maxLen` code points, appending an ellipsis if shortened.
 * The ellipsis counts toward `maxLen`.
 */
export function truncate(text: string, maxLen: number): string {
  const chars = Array.from(text);
  if (chars.length <= maxLen) {
    return text;
  }
  return chars.slice(0, maxLen - 1).join('') + '…'; // unicode ellipsis
}

/** Collapses runs of whitespace (including newlines) into single spaces. */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Turns a URL slug into a readable title.
 * Example: "python-course-12345" -> "Python Course 12345"
 */
export function titleFromSlug(slug: string): string {
  return slug
    .split(/[-_]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

// ---------------------------------------------------------------------------
// URL utilities
// ---------------------------------------------------------------------------

/**
 * Returns the last non-empty path segment of a URL or path.
 * Example: "https://example.com/go/python-course/" -> "python-course"
 */
export function lastPathSegment(url: string): string {
  let pathname = url;
  try {
    pathname = new URL(url).pathname;
  } catch {
    // Not absolute; treat the input as a path
    pathname = url.split(/[?#]/)[0] ?? '';
  }
  const segments = pathname.split('/').filter((segment) => segment.length > 0);
  return segments[segments.length - 1] ?? '';
}

/**
 * Resolves a possibly relative href against the page it was found on.
 * Returns null when the result is not a valid URL.
 */
export function resolveHref(href: string, pageUrl: string): string | null {
  try {
    return new URL(href, pageUrl).toString();
  } catch {
    return null;
  }
}

// ---------------------------------------------------------------------------
// Array utilities
// ---------------------------------------------------------------------------

/**
 * Returns a random element from the array.
 * Throws if the array is empty.
 */
export function pickRandom<T>(arr: readonly T[]): T {
  const item = arr[Math.floor(Math.random() * arr.length)];
  if (item === undefined) {
    throw new Error('Cannot pick from an empty array');
  }
  return item;
}
