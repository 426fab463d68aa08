/**
 * Crawl options schema and defaults
 */
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError } from './errors.js';

/** Read version from package.json */
export function getVersion(): string {
  const srcDir = dirname(fileURLToPath(import.meta.url));
  const pkgPath = join(srcDir, '..', 'package.json');
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    const parsed = z.object({ version: z.string() }).safeParse(pkg);
    return parsed.success ? parsed.data.version : 'unknown';
  } catch (error) {
    console.debug('Failed to read version from package.json:', error);
    return 'unknown';
  }
}

export const DEFAULT_USER_AGENT = `crawlkit/${getVersion()}`;

export const MAX_PAGES_LIMIT = 10_000;
export const MAX_CONCURRENCY = 50;

export const OutputFormatSchema = z.enum(['markdown', 'html', 'json']);
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

export const CrawlConfigSchema = z.object({
  maxPages: z.number().int().positive().max(MAX_PAGES_LIMIT).default(100),
  maxDepth: z.number().int().nonnegative().default(3),
  concurrency: z.number().int().positive().max(MAX_CONCURRENCY).default(5),
  includePatterns: z.array(z.string().min(1)).default([]),
  excludePatterns: z.array(z.string().min(1)).default([]),
  allowExternalLinks: z.boolean().default(false),
  /** Where page artifacts and manifest.json go; nothing is written when unset. */
  outputDir: z.string().min(1).optional(),
  formats: z.array(OutputFormatSchema).min(1).default(['markdown']),
  /** false keeps manifest.json but skips page files. */
  saveFiles: z.boolean().default(true),
  /** Seed the frontier with sitemap URLs as well as the root. */
  useSitemap: z.boolean().default(false),
  respectRobots: z.boolean().default(true),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  /** Falls back to CRAWLKIT_PROXY, HTTPS_PROXY, HTTP_PROXY. */
  proxy: z.string().url().optional(),
  timeoutMs: z.number().int().positive().default(20_000),
  /** Minimum wait before each fetch; robots.txt crawl-delay raises it. */
  delayMs: z.number().int().nonnegative().default(0),
  /** 0 disables the content cache for this crawl. */
  cacheTtlMs: z.number().int().nonnegative().default(0),
  /** Used when the crawl builds its own ContentCache. */
  cacheDir: z.string().min(1).optional(),
  deduplicateSimilarUrls: z.boolean().default(false),
});

export type CrawlConfigInput = z.input<typeof CrawlConfigSchema>;
export type CrawlConfig = z.output<typeof CrawlConfigSchema>;

/** @throws ConfigError listing every invalid field */
export function resolveCrawlConfig(input: CrawlConfigInput = {}): CrawlConfig {
  const parsed = CrawlConfigSchema.safeParse(input);
  if (!parsed.success) throw ConfigError.fromZod(parsed.error);
  return parsed.data;
}
