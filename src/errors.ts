/**
 * Error taxonomy.
 *
 * Per-URL problems travel as data (`error` events, `{ ok: false }` results);
 * the classes below are thrown only where an operation cannot continue.
 */
import type { ZodError } from 'zod';

/** Kinds carried by `error` crawl events. */
export type CrawlErrorKind = 'InvalidUrl' | 'RobotsDisallowed' | 'FetchFailed' | 'Timeout' | 'Network';

/** Raised before a crawl starts when its options are unusable. */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }

  static fromZod(error: ZodError): ConfigError {
    const issues = error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    return new ConfigError('Invalid crawl options', issues);
  }
}

export class InvalidUrlError extends Error {
  readonly url: string;

  constructor(url: string, reason = 'not an absolute http(s) URL') {
    super(`Invalid URL "${url}": ${reason}`);
    this.name = 'InvalidUrlError';
    this.url = url;
  }
}

/** File-system failure inside the content cache. */
export class CacheIOError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Cache I/O failed for ${path}: ${String(cause)}`, { cause });
    this.name = 'CacheIOError';
    this.path = path;
  }
}
