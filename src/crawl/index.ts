/**
 * Crawl module barrel exports
 */
export { crawl } from './crawler.js';
export type { CrawlDependencies, CrawlOptions } from './crawler.js';
export { CrawlScheduler } from './scheduler.js';
export type { SchedulerOptions } from './scheduler.js';
export { UrlFrontier } from './url-frontier.js';
export type { Admission, FrontierOptions } from './url-frontier.js';
export {
  normalizeUrl,
  normalizeUrlForDedupe,
  stripTrackingParams,
  matchesPatterns,
  createPatternMatcher,
  isSameOrigin,
} from './url-normalizer.js';
export {
  parseRobotsTxt,
  isAllowed,
  fetchRobots,
  permissivePolicy,
  politenessDelayMs,
} from './robots-parser.js';
export type { RobotsPolicy } from './robots-parser.js';
export { parseSitemapXml, fetchSitemapEntries, discoverSitemaps } from './sitemap-parser.js';
export type { SitemapEntry, SitemapOptions } from './sitemap-parser.js';
export { CrawlManifest, MANIFEST_FILE } from './manifest.js';
export type { ManifestRecord, ManifestStatus, ManifestFile } from './manifest.js';
export { PageArtifactWriter, baseNameFor } from './artifacts.js';
export type {
  CrawlEvent,
  ProgressEvent,
  PageEvent,
  ErrorEvent,
  CompleteEvent,
  CrawlFailure,
  FrontierEntry,
  SchedulerState,
  TextFetcher,
  TextResponse,
} from './types.js';
