/**
 * BFS URL frontier: FIFO queue, visited set, and the admission pipeline every
 * discovered link goes through.
 */
import { InvalidUrlError } from '../errors.js';
import type { FrontierEntry } from './types.js';
import {
  createPatternMatcher,
  isSameOrigin,
  normalizeUrl,
  normalizeUrlForDedupe,
} from './url-normalizer.js';

export interface FrontierOptions {
  maxDepth: number;
  maxPages: number;
  allowExternalLinks?: boolean;
  includePatterns?: readonly string[];
  excludePatterns?: readonly string[];
  deduplicateSimilarUrls?: boolean;
}

/** Why `add` did or did not enqueue a URL. */
export type Admission =
  | 'enqueued'
  | 'invalid'
  | 'duplicate'
  | 'external'
  | 'excluded'
  | 'too-deep'
  | 'limit';

export class UrlFrontier {
  private queue: FrontierEntry[] = [];
  private head = 0;
  private visited = new Set<string>();
  private readonly rootUrl: string;
  private readonly maxDepth: number;
  private readonly maxPages: number;
  private readonly allowExternalLinks: boolean;
  private readonly dedupeKey: (url: string) => string;
  private readonly included: (url: string) => boolean;
  private readonly excluded: ((url: string) => boolean) | null;

  /** @throws InvalidUrlError when `rootUrl` cannot be normalized */
  constructor(rootUrl: string, options: FrontierOptions) {
    this.rootUrl = normalizeUrl(rootUrl);
    this.maxDepth = options.maxDepth;
    this.maxPages = options.maxPages;
    this.allowExternalLinks = options.allowExternalLinks ?? false;
    this.dedupeKey = options.deduplicateSimilarUrls ? normalizeUrlForDedupe : (url) => url;
    this.included = createPatternMatcher(options.includePatterns ?? []);
    this.excluded =
      options.excludePatterns && options.excludePatterns.length > 0
        ? createPatternMatcher(options.excludePatterns)
        : null;
  }

  get root(): string {
    return this.rootUrl;
  }

  /**
   * Enqueue the root at depth 0. Include/exclude patterns do not apply to it,
   * so a filtered crawl still has a page to discover links from.
   */
  seedRoot(): Admission {
    return this.admit(this.rootUrl, 0, undefined, false);
  }

  /**
   * Run a discovered URL through normalize → dedup → scope → patterns →
   * depth → page budget, and enqueue it if every check passes.
   *
   * The visited check and the enqueue happen in one synchronous call, so no
   * other worker can interleave between them.
   */
  add(url: string, depth: number, discoveredFrom?: string): Admission {
    return this.admit(url, depth, discoveredFrom, true);
  }

  private admit(
    url: string,
    depth: number,
    discoveredFrom: string | undefined,
    applyPatterns: boolean
  ): Admission {
    let normalized: string;
    try {
      normalized = normalizeUrl(url);
    } catch (e) {
      if (e instanceof InvalidUrlError) return 'invalid';
      throw e;
    }

    const key = this.dedupeKey(normalized);
    if (this.visited.has(key)) return 'duplicate';
    if (!this.allowExternalLinks && !isSameOrigin(normalized, this.rootUrl)) return 'external';
    if (applyPatterns) {
      if (!this.included(normalized)) return 'excluded';
      if (this.excluded?.(normalized)) return 'excluded';
    }
    if (depth > this.maxDepth) return 'too-deep';
    if (this.visited.size >= this.maxPages) return 'limit';

    this.visited.add(key);
    this.queue.push(
      discoveredFrom ? { url: normalized, depth, discoveredFrom } : { url: normalized, depth }
    );
    return 'enqueued';
  }

  /** Next entry in FIFO order, or null when the queue is empty. */
  next(): FrontierEntry | null {
    if (this.head >= this.queue.length) return null;
    const entry = this.queue[this.head++];
    // Compact occasionally so consumed entries can be collected.
    if (this.head > 1024 && this.head * 2 > this.queue.length) {
      this.queue = this.queue.slice(this.head);
      this.head = 0;
    }
    return entry;
  }

  hasMore(): boolean {
    return this.head < this.queue.length;
  }

  /** Entries waiting to be processed. */
  get pending(): number {
    return this.queue.length - this.head;
  }

  /** URLs admitted so far; never exceeds maxPages. */
  get visitedCount(): number {
    return this.visited.size;
  }

  /** True once the page budget is fully allocated. */
  get isFull(): boolean {
    return this.visited.size >= this.maxPages;
  }
}
