const SCHEME_PATTERN = /^https?:\/\//i;

/**
 * Normalize a user-entered Redmine URL: trim, drop every trailing slash,
 * and prepend `http://` when no http(s) scheme is present.
 *
 * Applied once, when the URL enters the system.
 */
export function normalizeRedmineUrl(raw: string): string {
  const trimmed = raw.trim().replace(/\/+$/, '');
  return SCHEME_PATTERN.test(trimmed) ? trimmed : `http://${trimmed}`;
}

export function hasScheme(url: string): boolean {
  return SCHEME_PATTERN.test(url);
}
