/**
 * URL canonicalization for dedup, glob matching for include/exclude, origin checks
 */
import picomatch from 'picomatch';
import { InvalidUrlError } from '../errors.js';

/** Query parameters that identify a referral rather than a resource. */
const TRACKING_PARAMS = new Set([
  'utm_source',
  'utm_medium',
  'utm_campaign',
  'utm_term',
  'utm_content',
  'fbclid',
  'gclid',
  'dclid',
  'msclkid',
  'ref',
  'source',
]);

function isTrackingParam(name: string): boolean {
  return TRACKING_PARAMS.has(name.toLowerCase());
}

function parseHttpUrl(url: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new InvalidUrlError(url);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new InvalidUrlError(url, `unsupported scheme ${parsed.protocol}`);
  }
  return parsed;
}

/**
 * Canonical form used as the frontier's dedup key.
 *
 * Scheme and host are lower-cased by URL parsing, the fragment is dropped, an
 * empty path becomes `/` and a trailing slash on any other path is removed.
 * The query string is kept as written: `?a=1&b=2` and `?b=2&a=1` stay distinct.
 *
 * @throws InvalidUrlError when `url` is not an absolute http(s) URL
 */
export function normalizeUrl(url: string): string {
  const parsed = parseHttpUrl(url.trim());
  parsed.hash = '';

  if (parsed.pathname.length > 1 && parsed.pathname.endsWith('/')) {
    parsed.pathname = parsed.pathname.replace(/\/+$/, '') || '/';
  }

  return parsed.href;
}

/**
 * `normalizeUrl` with tracking parameters removed. The remaining parameters
 * keep their order and, when nothing is removed, their original encoding.
 * Content cache keys are derived from this form.
 *
 * @throws InvalidUrlError when `url` is not an absolute http(s) URL
 */
export function stripTrackingParams(url: string): string {
  const parsed = new URL(normalizeUrl(url));
  if (!parsed.search) return parsed.href;

  const params = [...parsed.searchParams.entries()];
  const kept = params.filter(([key]) => !isTrackingParam(key));
  if (kept.length === params.length) return parsed.href;

  parsed.search = kept.length > 0 ? new URLSearchParams(kept).toString() : '';
  return parsed.href;
}

/**
 * Looser key for `deduplicateSimilarUrls`: tracking parameters removed and the
 * remaining parameters sorted by name, then value.
 */
export function normalizeUrlForDedupe(url: string): string {
  const parsed = new URL(normalizeUrl(url));
  if (!parsed.search) return parsed.href;

  const kept = [...parsed.searchParams.entries()]
    .filter(([key]) => !isTrackingParam(key))
    .sort(([ak, av], [bk, bv]) => (ak === bk ? compare(av, bv) : compare(ak, bk)));

  parsed.search = kept.length > 0 ? new URLSearchParams(kept).toString() : '';
  return parsed.href;
}

function compare(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

/** The part of a URL that include/exclude globs are matched against. */
function pathAndQuery(url: string): string | null {
  try {
    const parsed = new URL(url);
    return parsed.pathname + parsed.search;
  } catch {
    return null;
  }
}

/**
 * Build a matcher for a list of globs, tested against the whole path+query.
 * In bash mode a single `*` also crosses `/`, so `*\/api/*` matches `/api/v1`.
 * An empty list matches every URL.
 */
export function createPatternMatcher(patterns: readonly string[]): (url: string) => boolean {
  if (patterns.length === 0) return () => true;
  const isMatch = picomatch([...patterns], { dot: true, bash: true });

  return (url: string) => {
    const target = pathAndQuery(url);
    return target !== null && isMatch(target);
  };
}

export function matchesPatterns(url: string, patterns: readonly string[]): boolean {
  return createPatternMatcher(patterns)(url);
}

/** Scheme, host and port equality. Unparseable input is never same-origin. */
export function isSameOrigin(a: string, b: string): boolean {
  try {
    return new URL(a).origin === new URL(b).origin;
  } catch {
    return false;
  }
}
