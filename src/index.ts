/**
 * crawlkit - breadth-first site crawler that turns pages into Markdown,
 * with robots.txt and sitemap awareness and an on-disk content cache.
 *
 * @module crawlkit
 */
export * from './crawl/index.js';
export { ContentCache, resolveCacheDir, CACHE_DIR_ENV } from './cache/content-cache.js';
export type { ContentCacheOptions } from './cache/content-cache.js';
export type { CacheEntry, CacheStats, CachedPage } from './cache/types.js';
export { CrawlConfigSchema, resolveCrawlConfig, DEFAULT_USER_AGENT } from './config.js';
export type { CrawlConfig, CrawlConfigInput, OutputFormat } from './config.js';
export { ConfigError, InvalidUrlError, CacheIOError } from './errors.js';
export type { CrawlErrorKind } from './errors.js';
export { HttpRenderer } from './fetch/renderer.js';
export type { Renderer, RenderResult, RenderOptions, RenderFailureKind } from './fetch/renderer.js';
export { MarkdownTransformer } from './extract/transformer.js';
export type { Transformer, TransformResult, PageMetadata } from './extract/transformer.js';
export { httpRequest, closeAllSessions } from './fetch/http-client.js';
export type { HttpResponse } from './fetch/http-client.js';
