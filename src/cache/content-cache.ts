/**
 * On-disk content cache keyed by normalized URL, with TTL expiry.
 *
 * Layout:
 *   <cacheDir>/pages/<key>.json   key = first 16 hex chars of sha256(stripTrackingParams(url))
 *
 * Writes go to a temp file that is renamed into place, so readers in this or
 * another process never see a partial entry. Operations on one key inside
 * this process run one at a time.
 */
import { createHash, randomUUID } from 'node:crypto';
import { mkdirSync } from 'node:fs';
import { readdir, readFile, rename, stat, unlink, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { basename, join } from 'node:path';
import { CacheIOError } from '../errors.js';
import { logger } from '../logger.js';
import { stripTrackingParams } from '../crawl/url-normalizer.js';
import { CacheEntrySchema, type CacheEntry, type CacheStats } from './types.js';

export const CACHE_DIR_ENV = 'CRAWLKIT_CACHE_DIR';

/** Explicit directory, then $CRAWLKIT_CACHE_DIR, then ~/.crawlkit/cache */
export function resolveCacheDir(explicit?: string): string {
  return explicit || process.env[CACHE_DIR_ENV] || join(homedir(), '.crawlkit', 'cache');
}

export function formatSize(sizeBytes: number): string {
  let size = sizeBytes;
  for (const unit of ['B', 'KB', 'MB', 'GB']) {
    if (size < 1024) return `${size.toFixed(1)} ${unit}`;
    size /= 1024;
  }
  return `${size.toFixed(1)} TB`;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

export interface ContentCacheOptions {
  cacheDir?: string;
  /** Clock in epoch milliseconds. */
  now?: () => number;
}

export class ContentCache {
  readonly cacheDir: string;
  private readonly pagesDir: string;
  private readonly now: () => number;
  private readonly locks = new Map<string, Promise<void>>();

  constructor(options: ContentCacheOptions = {}) {
    this.cacheDir = resolveCacheDir(options.cacheDir);
    this.pagesDir = join(this.cacheDir, 'pages');
    this.now = options.now ?? Date.now;

    try {
      mkdirSync(this.pagesDir, { recursive: true });
    } catch (e) {
      throw new CacheIOError(this.pagesDir, e);
    }
  }

  /** @throws InvalidUrlError for URLs that cannot be normalized */
  static keyFor(url: string): string {
    return createHash('sha256').update(stripTrackingParams(url)).digest('hex').slice(0, 16);
  }

  isExpired(entry: CacheEntry, at: number = this.now()): boolean {
    return entry.storedAt + entry.ttlMs <= at;
  }

  /** The stored entry while it is fresh; null when missing, expired, or unreadable. */
  async get(url: string): Promise<CacheEntry | null> {
    const key = ContentCache.keyFor(url);
    const entry = await this.readEntry(key);

    if (!entry) {
      logger.debug({ url }, 'Cache miss');
      return null;
    }
    if (this.isExpired(entry)) {
      logger.debug({ url, storedAt: entry.storedAt, ttlMs: entry.ttlMs }, 'Cache miss (expired)');
      return null;
    }

    logger.debug({ url, key }, 'Cache hit');
    return entry;
  }

  /** Store `payload` for `url`, replacing any previous entry. */
  async put(url: string, payload: string, ttlMs: number): Promise<CacheEntry> {
    if (!(ttlMs > 0)) throw new RangeError(`ttlMs must be positive, got ${ttlMs}`);

    const normalized = stripTrackingParams(url);
    const key = ContentCache.keyFor(normalized);
    const entry: CacheEntry = {
      key,
      url: normalized,
      storedAt: this.now(),
      ttlMs,
      sizeBytes: Buffer.byteLength(payload, 'utf-8'),
      payload,
    };

    await this.withLock(key, () => this.writeEntry(entry));
    logger.debug({ url: normalized, key, ttlMs }, 'Cached page');
    return entry;
  }

  async stats(): Promise<CacheStats> {
    const at = this.now();
    let entries = 0;
    let expired = 0;
    let sizeBytes = 0;

    for (const key of await this.listKeys()) {
      const path = this.pathFor(key);
      try {
        sizeBytes += (await stat(path)).size;
      } catch (e) {
        if (errorCode(e) === 'ENOENT') continue;
        throw new CacheIOError(path, e);
      }

      entries++;
      const entry = await this.readEntry(key);
      if (!entry || this.isExpired(entry, at)) expired++;
    }

    return {
      entries,
      valid: entries - expired,
      expired,
      sizeBytes,
      sizeHuman: formatSize(sizeBytes),
      cacheDir: this.cacheDir,
    };
  }

  /**
   * Remove the entry for `url` (returns 0 or 1), or every entry when no URL
   * is given (returns how many were removed).
   */
  async clear(url?: string): Promise<number> {
    if (url !== undefined) {
      const key = ContentCache.keyFor(url);
      const removed = await this.withLock(key, () => this.removeEntry(key));
      return removed ? 1 : 0;
    }

    let cleared = 0;
    for (const key of await this.listKeys()) {
      if (await this.withLock(key, () => this.removeEntry(key))) cleared++;
    }
    logger.debug({ cleared }, 'Cleared cache');
    return cleared;
  }

  /**
   * Remove expired entries. Each candidate is read again under its key lock
   * right before deletion, so an entry refreshed by a concurrent `put` survives.
   */
  async prune(): Promise<number> {
    let pruned = 0;

    for (const key of await this.listKeys()) {
      const candidate = await this.readEntry(key);
      if (candidate && !this.isExpired(candidate)) continue;

      const removed = await this.withLock(key, async () => {
        const current = await this.readEntry(key);
        if (current && !this.isExpired(current)) return false;
        return this.removeEntry(key);
      });
      if (removed) pruned++;
    }

    logger.debug({ pruned }, 'Pruned expired cache entries');
    return pruned;
  }

  private pathFor(key: string): string {
    return join(this.pagesDir, `${key}.json`);
  }

  private async listKeys(): Promise<string[]> {
    try {
      const files = await readdir(this.pagesDir);
      return files.filter((f) => f.endsWith('.json')).map((f) => basename(f, '.json'));
    } catch (e) {
      if (errorCode(e) === 'ENOENT') return [];
      throw new CacheIOError(this.pagesDir, e);
    }
  }

  /** Null when the file is missing or does not hold a valid entry. */
  private async readEntry(key: string): Promise<CacheEntry | null> {
    const path = this.pathFor(key);
    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (e) {
      if (errorCode(e) === 'ENOENT') return null;
      throw new CacheIOError(path, e);
    }

    try {
      const parsed = CacheEntrySchema.safeParse(JSON.parse(raw));
      if (parsed.success) return parsed.data;
      logger.warn({ path, issues: parsed.error.issues.length }, 'Ignoring malformed cache entry');
    } catch (e) {
      logger.warn({ path, error: String(e) }, 'Ignoring unreadable cache entry');
    }
    return null;
  }

  private async writeEntry(entry: CacheEntry): Promise<void> {
    const path = this.pathFor(entry.key);
    const tmpPath = join(this.pagesDir, `${entry.key}.${process.pid}.${randomUUID()}.tmp`);
    try {
      await writeFile(tmpPath, JSON.stringify(entry), 'utf-8');
      await rename(tmpPath, path);
    } catch (e) {
      await unlink(tmpPath).catch((cleanupError: unknown) => {
        if (errorCode(cleanupError) !== 'ENOENT') {
          logger.debug({ tmpPath, error: String(cleanupError) }, 'Could not remove temp file');
        }
      });
      throw new CacheIOError(path, e);
    }
  }

  private async removeEntry(key: string): Promise<boolean> {
    const path = this.pathFor(key);
    try {
      await unlink(path);
      return true;
    } catch (e) {
      if (errorCode(e) === 'ENOENT') return false;
      throw new CacheIOError(path, e);
    }
  }

  /** Run `fn` after every earlier operation on `key` has settled. */
  private async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(key) ?? Promise.resolve();
    const run = previous.then(fn);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.locks.get(key) === tail) this.locks.delete(key);
    }
  }
}
