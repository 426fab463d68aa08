#!/usr/bin/env node
/**
 * CLI entry point for crawlkit
 */
import { fileURLToPath } from 'url';
import { realpathSync } from 'fs';
import { ContentCache } from './cache/content-cache.js';
import {
  getVersion,
  MAX_CONCURRENCY,
  MAX_PAGES_LIMIT,
  type CrawlConfigInput,
  type OutputFormat,
} from './config.js';
import { crawl } from './crawl/crawler.js';
import { ConfigError, InvalidUrlError } from './errors.js';
import { closeAllSessions } from './fetch/http-client.js';

const FORMAT_ALIASES: Record<string, OutputFormat> = {
  md: 'markdown',
  markdown: 'markdown',
  html: 'html',
  json: 'json',
};

type IntFlagResult = { value: number; index: number } | { error: string };

/** Read the integer value following `args[i]`, bounded to [min, max]. */
function parseIntFlag(args: string[], i: number, min: number, max?: number): IntFlagResult {
  const flag = args[i];
  if (i + 1 >= args.length) return { error: `${flag} requires a value` };
  const raw = args[i + 1];
  const value = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(value) || value < min) {
    return {
      error:
        min > 0
          ? `${flag} must be a positive integer`
          : `${flag} must be a non-negative integer`,
    };
  }
  if (max !== undefined && value > max) return { error: `${flag} must not exceed ${max}` };
  return { value, index: i + 1 };
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export interface CrawlCliOptions {
  url: string;
  json: boolean;
  quiet: boolean;
  config: CrawlConfigInput;
}

export type CrawlParseResult =
  | { kind: 'ok'; opts: CrawlCliOptions; warnings: string[] }
  | { kind: 'help' }
  | { kind: 'error'; message: string };

export function parseCrawlArgs(args: string[]): CrawlParseResult {
  const positional: string[] = [];
  const warnings: string[] = [];
  const config: CrawlConfigInput = {};
  let json = false;
  let quiet = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '--json':
        json = true;
        break;
      case '-q':
      case '--quiet':
        quiet = true;
        break;
      case '--limit':
      case '--depth':
      case '--concurrency':
      case '--delay':
      case '--timeout':
      case '--cache-ttl': {
        const bounds: Record<string, [number, number | undefined]> = {
          '--limit': [1, MAX_PAGES_LIMIT],
          '--depth': [0, undefined],
          '--concurrency': [1, MAX_CONCURRENCY],
          '--delay': [0, undefined],
          '--timeout': [1, undefined],
          '--cache-ttl': [0, undefined],
        };
        const [min, max] = bounds[arg];
        const parsed = parseIntFlag(args, i, min, max);
        if ('error' in parsed) return { kind: 'error', message: parsed.error };
        i = parsed.index;
        if (arg === '--limit') config.maxPages = parsed.value;
        else if (arg === '--depth') config.maxDepth = parsed.value;
        else if (arg === '--concurrency') config.concurrency = parsed.value;
        else if (arg === '--delay') config.delayMs = parsed.value;
        else if (arg === '--timeout') config.timeoutMs = parsed.value;
        else config.cacheTtlMs = parsed.value * 1000;
        break;
      }
      case '--include':
        if (i + 1 >= args.length) return { kind: 'error', message: '--include requires a value' };
        config.includePatterns = splitList(args[++i]);
        break;
      case '--exclude':
        if (i + 1 >= args.length) return { kind: 'error', message: '--exclude requires a value' };
        config.excludePatterns = splitList(args[++i]);
        break;
      case '--allow-external':
        config.allowExternalLinks = true;
        break;
      case '--output':
      case '-o':
        if (i + 1 >= args.length) return { kind: 'error', message: `${arg} requires a value` };
        config.outputDir = args[++i];
        break;
      case '--format': {
        if (i + 1 >= args.length) return { kind: 'error', message: '--format requires a value' };
        const formats: OutputFormat[] = [];
        for (const name of splitList(args[++i])) {
          const format = FORMAT_ALIASES[name.toLowerCase()];
          if (!format) {
            return { kind: 'error', message: `Unknown format "${name}" (expected md, html, json)` };
          }
          if (!formats.includes(format)) formats.push(format);
        }
        if (formats.length === 0) return { kind: 'error', message: '--format requires a value' };
        config.formats = formats;
        break;
      }
      case '--no-save-files':
        config.saveFiles = false;
        break;
      case '--sitemap':
        config.useSitemap = true;
        break;
      case '--ignore-robots':
        config.respectRobots = false;
        break;
      case '--dedupe-similar':
        config.deduplicateSimilarUrls = true;
        break;
      case '--cache-dir':
        if (i + 1 >= args.length) return { kind: 'error', message: '--cache-dir requires a value' };
        config.cacheDir = args[++i];
        break;
      case '--user-agent':
        if (i + 1 >= args.length) {
          return { kind: 'error', message: '--user-agent requires a value' };
        }
        config.userAgent = args[++i];
        break;
      case '--proxy':
        if (i + 1 >= args.length) return { kind: 'error', message: '--proxy requires a value' };
        config.proxy = args[++i];
        break;
      default:
        if (arg.startsWith('-')) {
          warnings.push(`Unknown option: ${arg}`);
        } else {
          positional.push(arg);
        }
    }
  }

  if (positional.length === 0) {
    return { kind: 'error', message: 'Missing required <url> argument for crawl' };
  }

  const crawlUrl = positional[0];
  if (!crawlUrl.startsWith('http://') && !crawlUrl.startsWith('https://')) {
    return { kind: 'error', message: 'Crawl URL must start with http:// or https://' };
  }

  return { kind: 'ok', opts: { url: crawlUrl, json, quiet, config }, warnings };
}

export type CacheAction = 'stats' | 'clear' | 'prune';

export interface CacheCliOptions {
  action: CacheAction;
  url?: string;
  cacheDir?: string;
  json: boolean;
}

export type CacheParseResult =
  | { kind: 'ok'; opts: CacheCliOptions; warnings: string[] }
  | { kind: 'help' }
  | { kind: 'error'; message: string };

function isCacheAction(value: string): value is CacheAction {
  return value === 'stats' || value === 'clear' || value === 'prune';
}

export function parseCacheArgs(args: string[]): CacheParseResult {
  const warnings: string[] = [];
  let action: CacheAction | undefined;
  let url: string | undefined;
  let cacheDir: string | undefined;
  let json = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '--json':
        json = true;
        break;
      case '--url':
        if (i + 1 >= args.length) return { kind: 'error', message: '--url requires a value' };
        url = args[++i];
        break;
      case '--cache-dir':
        if (i + 1 >= args.length) return { kind: 'error', message: '--cache-dir requires a value' };
        cacheDir = args[++i];
        break;
      default:
        if (arg.startsWith('-')) {
          warnings.push(`Unknown option: ${arg}`);
        } else if (action === undefined && isCacheAction(arg)) {
          action = arg;
        } else {
          return { kind: 'error', message: `Unknown cache command: ${arg}` };
        }
    }
  }

  if (!action) {
    return { kind: 'error', message: 'Missing cache command (stats, clear, prune)' };
  }
  if (url !== undefined && action !== 'clear') {
    return { kind: 'error', message: '--url is only valid with "cache clear"' };
  }

  return { kind: 'ok', opts: { action, url, cacheDir, json }, warnings };
}

function printUsage(): void {
  console.log(`Usage: crawlkit crawl <url> [options]
       crawlkit cache <stats|clear|prune> [cache-options]

Crawl options:
  --limit <n>         Max pages to process (default: 100, max: ${MAX_PAGES_LIMIT})
  --depth <n>         Max link-following depth (default: 3)
  --concurrency <n>   Parallel requests (default: 5, max: ${MAX_CONCURRENCY})
  --include <globs>   Path globs to include, e.g. "/docs/*" (comma-separated)
  --exclude <globs>   Path globs to exclude (comma-separated)
  --allow-external    Follow links to other origins
  -o, --output <dir>  Write pages and manifest.json to this directory
  --format <list>     Page formats: md, html, json (default: md)
  --no-save-files     Write only manifest.json
  --sitemap           Also seed the crawl from the site's sitemaps
  --ignore-robots     Do not consult robots.txt
  --delay <ms>        Minimum delay between requests (default: 0)
  --timeout <ms>      Request timeout in milliseconds (default: 20000)
  --cache-ttl <s>     Reuse cached pages younger than this (default: 0, off)
  --cache-dir <dir>   Cache directory (env: CRAWLKIT_CACHE_DIR)
  --dedupe-similar    Ignore tracking parameters and query order when deduplicating
  --user-agent <ua>   User-Agent header and robots.txt token
  --proxy <url>       HTTP/SOCKS proxy URL (env: CRAWLKIT_PROXY, HTTPS_PROXY, HTTP_PROXY)
  --json              One JSON event per line
  -q, --quiet         Print only crawled URLs

Cache options:
  --url <url>         With "clear": remove only this URL's entry
  --cache-dir <dir>   Cache directory (env: CRAWLKIT_CACHE_DIR)
  --json              JSON output

  -v, --version       Show version number
  -h, --help          Show this help message

Disclaimer:
  Users are responsible for complying with website terms of service,
  robots.txt directives, and applicable laws.`);
}

async function runCrawl(args: string[]): Promise<void> {
  const result = parseCrawlArgs(args);

  if (result.kind === 'help') {
    printUsage();
    process.exit(0);
    return;
  }
  if (result.kind === 'error') {
    console.error(`Error: ${result.message}`);
    printUsage();
    process.exit(1);
    return;
  }

  const { opts, warnings } = result;
  for (const warning of warnings) {
    console.error(`Warning: ${warning}`);
  }

  const controller = new AbortController();
  const onSigint = (): void => {
    if (!opts.quiet) console.error('\nStopping: waiting for in-flight pages to finish...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    for await (const event of crawl(opts.url, { ...opts.config, signal: controller.signal })) {
      if (opts.json) {
        console.log(JSON.stringify(event));
        continue;
      }

      switch (event.type) {
        case 'page':
          console.log(
            opts.quiet
              ? event.url
              : `${event.url} (depth ${event.depth}${event.fromCache ? ', cached' : ''})`
          );
          break;
        case 'error':
          if (!opts.quiet) console.error(`${event.kind}: ${event.url} (${event.message})`);
          break;
        case 'complete':
          if (!opts.quiet) {
            console.error(
              `\nCrawl complete: ${event.scrapedUrls.length} pages, ${event.failed.length} failed, ${event.blocked.length} blocked, ${event.durationMs}ms`
            );
            if (event.manifestPath) console.error(`Manifest: ${event.manifestPath}`);
          }
          break;
        case 'progress':
          break;
      }
    }
  } catch (e) {
    if (e instanceof ConfigError || e instanceof InvalidUrlError) {
      console.error(`Error: ${e.message}`);
      process.exit(1);
      return;
    }
    throw e;
  } finally {
    process.removeListener('SIGINT', onSigint);
    await closeAllSessions();
  }
}

async function runCache(args: string[]): Promise<void> {
  const result = parseCacheArgs(args);

  if (result.kind === 'help') {
    printUsage();
    process.exit(0);
    return;
  }
  if (result.kind === 'error') {
    console.error(`Error: ${result.message}`);
    printUsage();
    process.exit(1);
    return;
  }

  const { opts, warnings } = result;
  for (const warning of warnings) {
    console.error(`Warning: ${warning}`);
  }

  const cache = new ContentCache({ cacheDir: opts.cacheDir });

  switch (opts.action) {
    case 'stats': {
      const stats = await cache.stats();
      if (opts.json) {
        console.log(JSON.stringify(stats));
      } else {
        console.log(`Cache directory: ${stats.cacheDir}`);
        console.log(`Entries: ${stats.entries} (${stats.valid} valid, ${stats.expired} expired)`);
        console.log(`Size: ${stats.sizeHuman}`);
      }
      break;
    }
    case 'clear': {
      let removed: number;
      try {
        removed = await cache.clear(opts.url);
      } catch (e) {
        if (!(e instanceof InvalidUrlError)) throw e;
        console.error(`Error: ${e.message}`);
        process.exit(1);
        return;
      }
      console.log(opts.json ? JSON.stringify({ removed }) : `Removed ${removed} cache entries`);
      break;
    }
    case 'prune': {
      const pruned = await cache.prune();
      console.log(opts.json ? JSON.stringify({ pruned }) : `Pruned ${pruned} expired cache entries`);
      break;
    }
  }
}

export async function main(): Promise<void> {
  const rawArgs = process.argv.slice(2);
  const command = rawArgs[0];

  switch (command) {
    case 'crawl':
      await runCrawl(rawArgs.slice(1));
      return;
    case 'cache':
      await runCache(rawArgs.slice(1));
      return;
    case '-v':
    case '--version':
      console.log(`crawlkit ${getVersion()}`);
      process.exit(0);
      return;
    case undefined:
    case '-h':
    case '--help':
      printUsage();
      process.exit(command === undefined ? 1 : 0);
      return;
    default:
      console.error(`Error: Unknown command "${command}"`);
      printUsage();
      process.exit(1);
  }
}

const isDirectRun =
  process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1]);
if (isDirectRun) {
  main()
    .then(() => {
      // httpcloak's native library keeps the event loop alive; exit once cleanup is done.
      process.exit(0);
    })
    .catch((err) => {
      console.error(`Fatal: ${err}`);
      process.exit(1);
    });
}
