/**
 * Crawl orchestrator: an AsyncGenerator of CrawlEvents ending in `complete`
 */
import { ContentCache } from '../cache/content-cache.js';
import { resolveCrawlConfig, type CrawlConfig, type CrawlConfigInput } from '../config.js';
import { CacheIOError } from '../errors.js';
import { MarkdownTransformer, type Transformer } from '../extract/transformer.js';
import { httpRequest, resolveProxy } from '../fetch/http-client.js';
import { HttpRenderer, type Renderer } from '../fetch/renderer.js';
import { logger } from '../logger.js';
import { PageArtifactWriter } from './artifacts.js';
import { CrawlManifest, type ManifestRecord } from './manifest.js';
import { fetchRobots } from './robots-parser.js';
import { CrawlScheduler } from './scheduler.js';
import { discoverSitemaps } from './sitemap-parser.js';
import type { CrawlEvent, CrawlFailure, ScheduledPage, TextFetcher } from './types.js';
import { UrlFrontier } from './url-frontier.js';

export type CrawlOptions = CrawlConfigInput & {
  /** Aborting stops new fetches; pages already in flight still finish. */
  signal?: AbortSignal;
};

export interface CrawlDependencies {
  renderer?: Renderer;
  transformer?: Transformer;
  /** Used when `cacheTtlMs > 0`; null runs without a cache. */
  cache?: ContentCache | null;
  /** GET for robots.txt and sitemaps. */
  fetchText?: TextFetcher;
}

/**
 * Simple fetch wrapper for robots.txt and sitemap fetching.
 * Uses httpRequest under the hood.
 */
function simpleFetch(userAgent: string, timeoutMs: number, proxy?: string): TextFetcher {
  return async (url) => {
    const response = await httpRequest(url, {
      headers: { 'User-Agent': userAgent },
      timeoutMs,
      proxy,
    });
    if (response.statusCode === 0) return null;
    return {
      ok: response.success,
      status: response.statusCode,
      text: response.html ?? '',
      ...(response.body ? { body: response.body } : {}),
      headers: response.headers,
    };
  };
}

function openCache(config: CrawlConfig, deps: CrawlDependencies): ContentCache | null {
  if (config.cacheTtlMs <= 0) return null;
  if (deps.cache !== undefined) return deps.cache;
  try {
    return new ContentCache({ cacheDir: config.cacheDir });
  } catch (e) {
    if (!(e instanceof CacheIOError)) throw e;
    logger.warn({ path: e.path, error: e.message }, 'Cache unavailable, crawling without it');
    return null;
  }
}

/**
 * Crawl a website breadth-first from `rootUrl`.
 *
 * Invalid options and an unusable root URL throw before the first event.
 * After that, per-page failures arrive as `error` events and the sequence
 * always ends with exactly one `complete`.
 */
export async function* crawl(
  rootUrl: string,
  options: CrawlOptions = {},
  deps: CrawlDependencies = {}
): AsyncGenerator<CrawlEvent> {
  const { signal, ...input } = options;
  const config = resolveCrawlConfig(input);
  const frontier = new UrlFrontier(rootUrl, {
    maxDepth: config.maxDepth,
    maxPages: config.maxPages,
    allowExternalLinks: config.allowExternalLinks,
    includePatterns: config.includePatterns,
    excludePatterns: config.excludePatterns,
    deduplicateSimilarUrls: config.deduplicateSimilarUrls,
  });

  const startedAt = Date.now();
  const origin = new URL(frontier.root).origin;
  const proxy = resolveProxy(config.proxy);
  const fetchText = deps.fetchText ?? simpleFetch(config.userAgent, config.timeoutMs, proxy);

  logger.info(
    {
      rootUrl: frontier.root,
      maxPages: config.maxPages,
      maxDepth: config.maxDepth,
      concurrency: config.concurrency,
    },
    'Starting crawl'
  );

  const robots = config.respectRobots
    ? await fetchRobots(origin, fetchText, config.userAgent)
    : null;

  frontier.seedRoot();
  if (config.useSitemap) {
    const entries = await discoverSitemaps(origin, fetchText, robots ?? undefined);
    let seeded = 0;
    for (const entry of entries) {
      if (frontier.add(entry.url, 0) === 'enqueued') seeded++;
    }
    logger.info({ entries: entries.length, seeded }, 'Seeded frontier from sitemaps');
  }

  const scheduler = new CrawlScheduler(frontier, {
    renderer: deps.renderer ?? new HttpRenderer({ userAgent: config.userAgent, proxy }),
    transformer: deps.transformer ?? new MarkdownTransformer(),
    concurrency: config.concurrency,
    timeoutMs: config.timeoutMs,
    delayMs: config.delayMs,
    robots,
    cache: openCache(config, deps),
    cacheTtlMs: config.cacheTtlMs,
    signal,
  });

  const manifest = config.outputDir ? new CrawlManifest(config.outputDir) : null;
  const artifacts =
    config.outputDir && config.saveFiles
      ? new PageArtifactWriter(config.outputDir, config.formats)
      : null;

  const scrapedUrls: string[] = [];
  const failed: CrawlFailure[] = [];
  const blocked: string[] = [];

  async function writeArtifact(page: ScheduledPage): Promise<string | null> {
    if (!artifacts) return null;
    try {
      return await artifacts.write(page);
    } catch (e) {
      logger.warn({ url: page.url, error: String(e) }, 'Failed to write page artifact');
      return null;
    }
  }

  async function record(entry: ManifestRecord): Promise<void> {
    if (!manifest) return;
    try {
      await manifest.record(entry);
    } catch (e) {
      logger.error({ path: manifest.path, error: String(e) }, 'Failed to write manifest');
    }
  }

  for await (const event of scheduler.run()) {
    switch (event.type) {
      case 'page': {
        const { html: _html, ...page } = event;
        scrapedUrls.push(page.url);
        await record({ url: page.url, path: await writeArtifact(event), status: 'success' });
        yield page;
        break;
      }
      case 'error': {
        const { url, kind, message } = event;
        if (kind === 'RobotsDisallowed') {
          blocked.push(url);
          await record({ url, path: null, status: 'blocked' });
        } else {
          failed.push({ url, kind, message });
          await record({ url, path: null, status: 'failed' });
        }
        yield event;
        break;
      }
      case 'progress':
        yield event;
        break;
    }
  }

  let manifestPath: string | null = null;
  if (manifest) {
    try {
      await manifest.flush();
      manifestPath = manifest.path;
    } catch (e) {
      logger.error({ path: manifest.path, error: String(e) }, 'Failed to write manifest');
    }
  }

  const durationMs = Date.now() - startedAt;
  logger.info(
    { pages: scrapedUrls.length, failed: failed.length, blocked: blocked.length, durationMs },
    'Crawl complete'
  );

  yield { type: 'complete', scrapedUrls, failed, blocked, durationMs, manifestPath };
}
