/**
 * Shared httpcloak client with browser TLS fingerprints.
 * Used for robots.txt, sitemaps, and page fetches by the HTTP renderer.
 */
import httpcloak from 'httpcloak';
import { logger } from '../logger.js';

/** Session metadata for lifecycle management */
interface SessionMetadata {
  session: httpcloak.Session;
  /** Cache key with proxy credentials redacted */
  logKey: string;
  created: number;
  requestCount: number;
  inFlightRequests: number;
}

/** Session cache keyed by composite key (preset|proxy|timeout) */
const sessionCache = new Map<string, SessionMetadata>();

const MIN_SESSION_TIMEOUT_SEC = 30;
const SESSION_MAX_AGE_MS = 60 * 60 * 1000;
const SESSION_MAX_REQUESTS = 10000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 20000;
const MAX_RESPONSE_SIZE = 10 * 1024 * 1024;

const DEFAULT_PRESET = httpcloak.Preset.CHROME_143;

/**
 * Transport timeout for a session serving requests raced against `timeoutMs`.
 * It outlasts the race so a slow response is reported as a timeout.
 */
export function sessionTimeoutSec(timeoutMs: number): number {
  return Math.max(MIN_SESSION_TIMEOUT_SEC, Math.ceil(timeoutMs / 1000) + 1);
}

/**
 * Redact credentials from a proxy URL for safe logging.
 */
export function redactProxyUrl(proxy: string): string {
  try {
    const url = new URL(proxy);
    if (url.password) url.password = '***';
    if (url.username) url.username = '***';
    return url.toString();
  } catch {
    return '<invalid-proxy-url>';
  }
}

/**
 * Resolve proxy URL from explicit option or environment variables.
 * Priority: explicit > CRAWLKIT_PROXY > HTTPS_PROXY > HTTP_PROXY
 */
export function resolveProxy(explicit?: string): string | undefined {
  return (
    explicit || process.env.CRAWLKIT_PROXY || process.env.HTTPS_PROXY || process.env.HTTP_PROXY
  );
}

function closeQuietly(logKey: string, session: httpcloak.Session): void {
  try {
    session.close();
  } catch (error) {
    logger.warn({ key: logKey, error: String(error) }, 'Error closing httpcloak session');
  }
}

/**
 * Get or create the session for a preset/proxy pair and count the request
 * against it. Sessions are recycled after an hour or 10,000 requests, but only
 * once nothing is in flight on them.
 */
function acquireSession(
  preset: string,
  proxy: string | undefined,
  timeoutSec: number
): SessionMetadata {
  const cacheKey = `${preset}|${proxy || 'direct'}|${timeoutSec}`;
  const logKey = `${preset}|${proxy ? redactProxyUrl(proxy) : 'direct'}|${timeoutSec}`;
  const existing = sessionCache.get(cacheKey);

  if (existing) {
    const expired =
      Date.now() - existing.created > SESSION_MAX_AGE_MS ||
      existing.requestCount >= SESSION_MAX_REQUESTS;

    if (!expired || existing.inFlightRequests > 0) {
      existing.requestCount++;
      existing.inFlightRequests++;
      return existing;
    }

    logger.debug({ key: logKey, requests: existing.requestCount }, 'Recycling httpcloak session');
    closeQuietly(logKey, existing.session);
    sessionCache.delete(cacheKey);
  }

  const metadata: SessionMetadata = {
    session: new httpcloak.Session({
      preset,
      timeout: timeoutSec,
      ...(proxy ? { proxy } : {}),
    }),
    logKey,
    created: Date.now(),
    requestCount: 1,
    inFlightRequests: 1,
  };
  sessionCache.set(cacheKey, metadata);
  return metadata;
}

/**
 * Close all httpcloak sessions.
 * Call this before the process exits.
 */
export async function closeAllSessions(): Promise<void> {
  const entries = Array.from(sessionCache.values());
  sessionCache.clear();
  for (const metadata of entries) {
    closeQuietly(metadata.logKey, metadata.session);
  }
}

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
  proxy?: string;
  preset?: string;
}

export interface HttpResponse {
  success: boolean;
  statusCode: number;
  html?: string;
  /** Undecoded response bytes, when the client exposes them. */
  body?: Buffer;
  headers: Record<string, string>;
  error?: string;
  /** Set when the request was abandoned at `timeoutMs`. */
  timedOut?: boolean;
}

class RequestTimeoutError extends Error {
  constructor(url: string, timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms for ${url}`);
    this.name = 'RequestTimeoutError';
  }
}

/** Create a timeout promise that rejects after the specified timeout. */
function createRequestTimeout(
  url: string,
  timeoutMs: number
): { promise: Promise<never>; cancel: () => void } {
  let timeoutId: NodeJS.Timeout | undefined;
  const promise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new RequestTimeoutError(url, timeoutMs)), timeoutMs);
  });
  return { promise, cancel: () => clearTimeout(timeoutId) };
}

function rawBody(response: object): Buffer | undefined {
  if ('content' in response && Buffer.isBuffer(response.content)) return response.content;
  if ('body' in response && Buffer.isBuffer(response.body)) return response.body;
  return undefined;
}

function failure(error: unknown, statusCode = 0): HttpResponse {
  return {
    success: false,
    statusCode,
    headers: {},
    error: String(error),
    timedOut: error instanceof RequestTimeoutError,
  };
}

/**
 * HTTP GET with a browser fingerprint. Never throws: transport failures come
 * back as `{ success: false, statusCode: 0, error }`.
 */
export async function httpRequest(
  url: string,
  options: HttpRequestOptions = {}
): Promise<HttpResponse> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  let metadata: SessionMetadata | undefined;
  const timeout = createRequestTimeout(url, timeoutMs);

  try {
    metadata = acquireSession(
      options.preset ?? DEFAULT_PRESET,
      options.proxy,
      sessionTimeoutSec(timeoutMs)
    );

    const requestOptions: httpcloak.RequestOptions = {
      headers: { 'Cache-Control': 'no-cache', ...options.headers },
    };
    logger.debug(
      { url, proxy: options.proxy ? redactProxyUrl(options.proxy) : undefined },
      'Making httpcloak request'
    );

    const response = await Promise.race([
      metadata.session.get(url, requestOptions),
      timeout.promise,
    ]);

    const headers = response.headers || {};
    const contentLength = Number.parseInt(headers['content-length'] ?? '', 10);
    if (contentLength > MAX_RESPONSE_SIZE) {
      logger.warn({ url, contentLength, limit: MAX_RESPONSE_SIZE }, 'Response too large');
      return failure('response_too_large', response.statusCode);
    }

    // httpcloak exposes text as a property on some versions and a method on others
    const textValue = response.text as string | (() => string);
    const html = typeof textValue === 'function' ? textValue() : textValue;

    const body = rawBody(response);
    const size = Math.max(html?.length ?? 0, body?.length ?? 0);
    if (size > MAX_RESPONSE_SIZE) {
      logger.warn({ url, size, limit: MAX_RESPONSE_SIZE }, 'Response too large');
      return failure('response_too_large', response.statusCode);
    }

    logger.debug(
      { url, statusCode: response.statusCode, bodyLength: html?.length ?? 0 },
      'httpcloak request complete'
    );

    return {
      success: response.ok,
      statusCode: response.statusCode,
      html,
      ...(body ? { body } : {}),
      headers,
    };
  } catch (error) {
    logger.debug({ url, error: String(error) }, 'httpcloak request failed');
    return failure(error);
  } finally {
    timeout.cancel();
    if (metadata) metadata.inFlightRequests--;
  }
}
