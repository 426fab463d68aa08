/**
 * Drives a UrlFrontier to completion with a sliding window of concurrent tasks
 */
import type { ContentCache } from '../cache/content-cache.js';
import { CachedPageSchema, type CachedPage } from '../cache/types.js';
import { CacheIOError } from '../errors.js';
import type { Transformer } from '../extract/transformer.js';
import type { RenderFailureKind, Renderer } from '../fetch/renderer.js';
import { logger } from '../logger.js';
import { isAllowed, politenessDelayMs, type RobotsPolicy } from './robots-parser.js';
import type {
  CrawlFailure,
  ErrorEvent,
  FrontierEntry,
  ScheduledPage,
  SchedulerEvent,
  SchedulerState,
} from './types.js';
import type { UrlFrontier } from './url-frontier.js';
import { isSameOrigin } from './url-normalizer.js';

export interface SchedulerOptions {
  renderer: Renderer;
  transformer: Transformer;
  concurrency: number;
  timeoutMs: number;
  /** Minimum spacing between renderer calls; robots.txt can raise it. */
  delayMs?: number;
  /** Policy for the root's origin. Other origins are not checked. */
  robots?: RobotsPolicy | null;
  cache?: ContentCache | null;
  /** 0 keeps the cache out of this crawl entirely. */
  cacheTtlMs?: number;
  signal?: AbortSignal;
}

const FAILURE_KINDS: Record<RenderFailureKind, CrawlFailure['kind']> = {
  Timeout: 'Timeout',
  Network: 'Network',
  InvalidUrl: 'InvalidUrl',
  Unknown: 'FetchFailed',
};

type TaskResult = ScheduledPage | ErrorEvent | null;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class CrawlScheduler {
  private readonly frontier: UrlFrontier;
  private readonly options: SchedulerOptions;
  private readonly processed = new Set<string>();
  private readonly delayMs: number;
  private readonly cacheTtlMs: number;
  private nextRenderAt = 0;
  private currentState: SchedulerState = 'seeded';

  /** `frontier` must already hold its seeds. */
  constructor(frontier: UrlFrontier, options: SchedulerOptions) {
    this.frontier = frontier;
    this.options = options;
    this.delayMs = Math.max(
      options.delayMs ?? 0,
      options.robots ? politenessDelayMs(options.robots) : 0
    );
    this.cacheTtlMs = options.cache ? (options.cacheTtlMs ?? 0) : 0;
  }

  get state(): SchedulerState {
    return this.currentState;
  }

  /**
   * Process entries until the frontier is exhausted or the signal aborts.
   * Every processed entry yields its page or error event followed by a
   * progress event. Tasks already started are always awaited, so the
   * generator finishes only when nothing is in flight.
   */
  async *run(): AsyncGenerator<SchedulerEvent> {
    if (this.currentState !== 'seeded') {
      throw new Error(`Scheduler cannot run from state ${this.currentState}`);
    }
    this.currentState = 'running';

    const { concurrency, signal } = this.options;
    let nextId = 0;
    let processedCount = 0;
    const inflight = new Map<number, Promise<{ id: number; result: TaskResult }>>();

    const enqueue = (): void => {
      while (this.currentState === 'running' && inflight.size < concurrency) {
        if (signal?.aborted) {
          this.drain('aborted', inflight.size);
          return;
        }
        const entry = this.frontier.next();
        if (!entry) break;

        const id = nextId++;
        inflight.set(
          id,
          this.process(entry).then((result) => ({ id, result }))
        );
      }

      // Nothing left to admit and nothing queued: only in-flight work remains.
      if (this.currentState === 'running' && this.frontier.isFull && !this.frontier.hasMore()) {
        this.drain('page limit reached', inflight.size);
      }
    };

    enqueue();

    while (inflight.size > 0) {
      const settled = await Promise.race(inflight.values());
      inflight.delete(settled.id);

      if (settled.result) {
        processedCount++;
        yield settled.result;
        yield {
          type: 'progress',
          processed: processedCount,
          totalEstimate: this.frontier.visitedCount,
        };
      }

      enqueue();
    }

    if (this.currentState === 'running') this.drain('frontier empty', 0);
    this.currentState = 'complete';
    logger.debug({ processed: processedCount }, 'Scheduler complete');
  }

  private drain(reason: string, inflight: number): void {
    this.currentState = 'draining';
    logger.debug({ reason, inflight, pending: this.frontier.pending }, 'Scheduler draining');
  }

  /** Never rejects: anything unexpected becomes a FetchFailed event. */
  private async process(entry: FrontierEntry): Promise<TaskResult> {
    if (this.processed.has(entry.url)) return null;
    this.processed.add(entry.url);

    try {
      return await this.processEntry(entry);
    } catch (e) {
      const message = errorMessage(e);
      logger.warn({ url: entry.url, error: message }, 'Page processing failed');
      return { type: 'error', url: entry.url, kind: 'FetchFailed', message };
    }
  }

  private async processEntry(entry: FrontierEntry): Promise<ScheduledPage | ErrorEvent> {
    const { robots, renderer, transformer, timeoutMs } = this.options;

    if (robots && isSameOrigin(entry.url, this.frontier.root) && !isAllowed(robots, entry.url)) {
      logger.debug({ url: entry.url }, 'Blocked by robots.txt');
      return {
        type: 'error',
        url: entry.url,
        kind: 'RobotsDisallowed',
        message: 'Disallowed by robots.txt',
      };
    }

    const cached = await this.readCache(entry.url);
    if (cached) return this.toPage(entry, cached, true);

    await this.politenessWait();
    const rendered = await renderer.render(entry.url, { timeoutMs });
    if (!rendered.ok) {
      const kind = FAILURE_KINDS[rendered.kind];
      logger.warn(
        { url: entry.url, kind, statusCode: rendered.statusCode, error: rendered.message },
        'Page fetch failed'
      );
      return { type: 'error', url: entry.url, kind, message: rendered.message };
    }

    const transformed = await transformer.toMarkdown(rendered.html, entry.url);
    const page: CachedPage = {
      markdown: transformed.markdown,
      html: rendered.html,
      metadata: transformed.metadata,
      outlinks: transformed.outlinks,
    };
    await this.writeCache(entry.url, page);
    return this.toPage(entry, page, false);
  }

  /** Feeds the page's outlinks back into the frontier at depth + 1. */
  private toPage(entry: FrontierEntry, page: CachedPage, fromCache: boolean): ScheduledPage {
    let enqueued = 0;
    for (const link of page.outlinks) {
      if (this.frontier.add(link, entry.depth + 1, entry.url) === 'enqueued') enqueued++;
    }
    logger.debug(
      { url: entry.url, depth: entry.depth, fromCache, outlinks: page.outlinks.length, enqueued },
      'Page processed'
    );

    return {
      type: 'page',
      url: entry.url,
      depth: entry.depth,
      markdown: page.markdown,
      metadata: page.metadata,
      outlinks: page.outlinks,
      fromCache,
      html: page.html,
    };
  }

  private async readCache(url: string): Promise<CachedPage | null> {
    const { cache } = this.options;
    if (!cache || this.cacheTtlMs <= 0) return null;

    try {
      const entry = await cache.get(url);
      if (!entry) return null;
      const parsed = CachedPageSchema.safeParse(JSON.parse(entry.payload));
      if (parsed.success) return parsed.data;
      logger.warn({ url }, 'Ignoring cached page with unexpected shape');
    } catch (e) {
      if (!(e instanceof CacheIOError) && !(e instanceof SyntaxError)) throw e;
      logger.warn({ url, error: e.message }, 'Cache read failed, fetching instead');
    }
    return null;
  }

  private async writeCache(url: string, page: CachedPage): Promise<void> {
    const { cache } = this.options;
    if (!cache || this.cacheTtlMs <= 0) return;

    try {
      await cache.put(url, JSON.stringify(page), this.cacheTtlMs);
    } catch (e) {
      if (!(e instanceof CacheIOError)) throw e;
      logger.warn({ url, error: e.message }, 'Cache write failed');
    }
  }

  /** Reserves the next render slot synchronously so concurrent tasks stay spaced. */
  private async politenessWait(): Promise<void> {
    if (this.delayMs <= 0) return;
    const now = Date.now();
    const startAt = Math.max(now, this.nextRenderAt);
    this.nextRenderAt = startAt + this.delayMs;
    if (startAt > now) await new Promise((r) => setTimeout(r, startAt - now));
  }
}
