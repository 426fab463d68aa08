/**
 * Types for the crawl module
 */
import type { CrawlErrorKind } from '../errors.js';
import type { PageMetadata } from '../extract/transformer.js';

export interface TextResponse {
  ok: boolean;
  status?: number;
  text: string;
  /** Undecoded bytes, for bodies that are not text (gzipped sitemaps). */
  body?: Uint8Array;
  headers?: Record<string, string>;
}

/** Minimal GET used for robots.txt and sitemaps. `null` means the request itself failed. */
export type TextFetcher = (url: string) => Promise<TextResponse | null>;

export interface FrontierEntry {
  readonly url: string;
  readonly depth: number;
  readonly discoveredFrom?: string;
}

export interface ProgressEvent {
  type: 'progress';
  processed: number;
  /** Advisory: min(maxPages, URLs admitted so far). */
  totalEstimate: number;
}

export interface PageEvent {
  type: 'page';
  url: string;
  depth: number;
  markdown: string;
  metadata: PageMetadata;
  outlinks: string[];
  fromCache: boolean;
}

export interface ErrorEvent {
  type: 'error';
  url: string;
  kind: CrawlErrorKind;
  message: string;
}

export interface CrawlFailure {
  url: string;
  kind: Exclude<CrawlErrorKind, 'RobotsDisallowed'>;
  message: string;
}

export interface CompleteEvent {
  type: 'complete';
  /** Pages emitted as `page` events, in emission order. */
  scrapedUrls: string[];
  failed: CrawlFailure[];
  /** URLs skipped because robots.txt disallows them. */
  blocked: string[];
  durationMs: number;
  manifestPath: string | null;
}

export type CrawlEvent = ProgressEvent | PageEvent | ErrorEvent | CompleteEvent;

/** A page as the scheduler hands it over, with the HTML its artifacts need. */
export interface ScheduledPage extends PageEvent {
  html: string;
}

/** What the scheduler yields; `complete` belongs to the orchestrator. */
export type SchedulerEvent = ProgressEvent | ScheduledPage | ErrorEvent;

export type SchedulerState = 'seeded' | 'running' | 'draining' | 'complete';
