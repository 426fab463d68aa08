/**
 * Parse sitemap.xml and sitemap index files
 */
import { gunzipSync } from 'node:zlib';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import { logger } from '../logger.js';
import { fetchRobots, type RobotsPolicy } from './robots-parser.js';
import type { TextFetcher, TextResponse } from './types.js';

export interface SitemapEntry {
  url: string;
  lastModified?: string;
  priority?: number;
}

/** Tried in order when robots.txt declares no sitemap. */
export const CONVENTIONAL_SITEMAP_PATHS = ['/sitemap.xml', '/sitemap_index.xml'];

const DEFAULT_MAX_SITEMAP_ENTRIES = 50_000;
const DEFAULT_MAX_SITEMAP_DEPTH = 3;

export interface SitemapOptions {
  /** Sitemap levels fetched, the top-level sitemap included. */
  maxDepth?: number;
  maxEntries?: number;
}

const LocSchema = z.object({
  loc: z.string(),
  lastmod: z.string().optional(),
  priority: z.string().optional(),
});

const UrlsetSchema = z.object({
  urlset: z.object({ url: z.array(z.unknown()).optional() }),
});

const SitemapIndexSchema = z.object({
  sitemapindex: z.object({ sitemap: z.array(z.unknown()).optional() }),
});

const parser = new XMLParser({
  ignoreAttributes: true,
  removeNSPrefix: true,
  parseTagValue: false,
  isArray: (name) => name === 'url' || name === 'sitemap',
});

function isHttpUrl(url: string): boolean {
  return url.startsWith('http://') || url.startsWith('https://');
}

function getOrigin(url: string): string | null {
  try {
    return new URL(url).origin;
  } catch {
    return null;
  }
}

function locsOf(items: unknown[] | undefined): Array<z.infer<typeof LocSchema>> {
  const locs: Array<z.infer<typeof LocSchema>> = [];
  for (const item of items ?? []) {
    const parsed = LocSchema.safeParse(item);
    if (parsed.success && isHttpUrl(parsed.data.loc.trim())) {
      locs.push({ ...parsed.data, loc: parsed.data.loc.trim() });
    }
  }
  return locs;
}

/**
 * Extract `<url>` entries from a `<urlset>` document and nested `<sitemap>`
 * locations from a `<sitemapindex>` document. Malformed XML, or any other
 * root element, yields no entries.
 */
export function parseSitemapXml(
  xml: string,
  maxEntries: number = DEFAULT_MAX_SITEMAP_ENTRIES
): {
  entries: SitemapEntry[];
  nestedSitemaps: string[];
} {
  const entries: SitemapEntry[] = [];
  const nestedSitemaps: string[] = [];

  const source = xml.replace(/^\uFEFF/, '').trim();
  const validation = XMLValidator.validate(source);
  if (validation !== true) {
    logger.debug({ error: validation.err.msg, line: validation.err.line }, 'Malformed sitemap XML');
    return { entries, nestedSitemaps };
  }

  const document: unknown = parser.parse(source);

  const urlset = UrlsetSchema.safeParse(document);
  if (urlset.success) {
    for (const { loc, lastmod, priority } of locsOf(urlset.data.urlset.url)) {
      if (entries.length >= maxEntries) break;

      const entry: SitemapEntry = { url: loc };
      const lastModified = lastmod?.trim();
      if (lastModified) entry.lastModified = lastModified;
      const parsedPriority = Number.parseFloat(priority?.trim() ?? '');
      if (!Number.isNaN(parsedPriority)) entry.priority = parsedPriority;

      entries.push(entry);
    }
  }

  const index = SitemapIndexSchema.safeParse(document);
  if (index.success) {
    for (const { loc } of locsOf(index.data.sitemapindex.sitemap)) {
      nestedSitemaps.push(loc);
    }
  }

  return { entries, nestedSitemaps };
}

function headerValue(headers: Record<string, string> | undefined, name: string): string {
  for (const [key, value] of Object.entries(headers ?? {})) {
    if (key.toLowerCase() === name) return value;
  }
  return '';
}

function isGzipped(url: string, response: TextResponse, body: Uint8Array): boolean {
  if (new URL(url).pathname.toLowerCase().endsWith('.gz')) return true;
  if (headerValue(response.headers, 'content-encoding').toLowerCase().includes('gzip')) {
    return true;
  }
  return body.length >= 2 && body[0] === 0x1f && body[1] === 0x8b;
}

/**
 * Sitemap XML from a response: gunzipped bytes for `.gz` sitemaps and gzip
 * bodies, otherwise the text. A body that fails to gunzip falls back to the text.
 */
export function sitemapText(url: string, response: TextResponse): string {
  const { body } = response;
  if (!body || !isGzipped(url, response, body)) return response.text;

  try {
    return gunzipSync(body).toString('utf8');
  } catch (e) {
    logger.debug({ url, error: String(e) }, 'Sitemap body is not gzip, reading it as text');
    return response.text;
  }
}

/**
 * Fetch sitemaps and follow index files depth-first.
 * Each sitemap URL is fetched at most once, at most `maxDepth` levels are read,
 * and nested sitemaps on an origin none of the starting URLs share are skipped.
 */
export async function fetchSitemapEntries(
  sitemapUrls: string[],
  fetchFn: TextFetcher,
  options: SitemapOptions = {}
): Promise<SitemapEntry[]> {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_SITEMAP_DEPTH;
  const maxEntries = options.maxEntries ?? DEFAULT_MAX_SITEMAP_ENTRIES;
  const allEntries: SitemapEntry[] = [];
  const visited = new Set<string>();

  const allowedOrigins = new Set<string>();
  for (const url of sitemapUrls) {
    const origin = getOrigin(url);
    if (origin) allowedOrigins.add(origin);
  }

  async function fetchSitemap(url: string, depth: number): Promise<void> {
    if (depth >= maxDepth || visited.has(url)) return;
    if (allEntries.length >= maxEntries) return;
    visited.add(url);

    try {
      const response = await fetchFn(url);
      if (!response?.ok) return;
      const xml = sitemapText(url, response);
      if (!xml) return;

      const remaining = maxEntries - allEntries.length;
      const { entries, nestedSitemaps } = parseSitemapXml(xml, remaining);
      allEntries.push(...entries);

      logger.debug(
        { url, depth, entryCount: entries.length, nestedCount: nestedSitemaps.length },
        'Parsed sitemap'
      );

      for (const nestedUrl of nestedSitemaps) {
        if (allEntries.length >= maxEntries) break;

        const nestedOrigin = getOrigin(nestedUrl);
        if (!nestedOrigin || !allowedOrigins.has(nestedOrigin)) {
          logger.debug({ nestedUrl, url }, 'Skipping cross-origin nested sitemap');
          continue;
        }

        await fetchSitemap(nestedUrl, depth + 1);
      }
    } catch (e) {
      logger.debug({ url, error: String(e) }, 'Failed to read sitemap');
    }
  }

  for (const url of sitemapUrls) {
    if (allEntries.length >= maxEntries) break;
    await fetchSitemap(url, 0);
  }

  return allEntries;
}

/**
 * Find a site's sitemap entries: `Sitemap:` directives from robots.txt first,
 * then the conventional locations until one yields entries.
 * Pass `robots` when it has already been fetched for this origin.
 */
export async function discoverSitemaps(
  origin: string,
  fetchFn: TextFetcher,
  robots?: RobotsPolicy,
  options: SitemapOptions = {}
): Promise<SitemapEntry[]> {
  const policy = robots ?? (await fetchRobots(origin, fetchFn, '*'));

  if (policy.sitemapUrls.length > 0) {
    return fetchSitemapEntries(policy.sitemapUrls, fetchFn, options);
  }

  for (const path of CONVENTIONAL_SITEMAP_PATHS) {
    const entries = await fetchSitemapEntries([`${origin}${path}`], fetchFn, options);
    if (entries.length > 0) return entries;
  }
  return [];
}
