/**
 * Renderer contract and the plain-HTTP implementation
 */
import { closeAllSessions, httpRequest } from './http-client.js';

export type RenderFailureKind = 'Timeout' | 'Network' | 'InvalidUrl' | 'Unknown';

export type RenderResult =
  | { ok: true; html: string; rawHtml: string; statusCode: number }
  | { ok: false; kind: RenderFailureKind; message: string; statusCode?: number };

export interface RenderOptions {
  timeoutMs: number;
  headers?: Record<string, string>;
}

/**
 * Turns a URL into HTML. Implementations own their transport (browser, HTTP
 * session pool) and report expected failures as `{ ok: false }` results.
 */
export interface Renderer {
  render(url: string, options: RenderOptions): Promise<RenderResult>;
  close?(): Promise<void>;
}

export interface HttpRendererOptions {
  userAgent?: string;
  proxy?: string;
  preset?: string;
}

const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml+xml', 'text/plain'];

function headerValue(headers: Record<string, string>, name: string): string | undefined {
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === name) return value;
  }
  return undefined;
}

/**
 * Fetches pages over HTTP without executing scripts, so `html` and `rawHtml`
 * are the same document.
 */
export class HttpRenderer implements Renderer {
  private readonly options: HttpRendererOptions;

  constructor(options: HttpRendererOptions = {}) {
    this.options = options;
  }

  async render(url: string, options: RenderOptions): Promise<RenderResult> {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return { ok: false, kind: 'InvalidUrl', message: `Cannot parse URL: ${url}` };
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      return { ok: false, kind: 'InvalidUrl', message: `Unsupported scheme ${parsed.protocol}` };
    }

    const headers: Record<string, string> = { ...options.headers };
    if (this.options.userAgent) headers['User-Agent'] = this.options.userAgent;

    const response = await httpRequest(url, {
      headers,
      timeoutMs: options.timeoutMs,
      proxy: this.options.proxy,
      preset: this.options.preset,
    });

    if (response.timedOut) {
      return { ok: false, kind: 'Timeout', message: response.error ?? 'Request timed out' };
    }
    if (response.statusCode === 0) {
      return { ok: false, kind: 'Network', message: response.error ?? 'Request failed' };
    }
    if (!response.success) {
      return {
        ok: false,
        kind: 'Unknown',
        message: response.error ?? `HTTP ${response.statusCode}`,
        statusCode: response.statusCode,
      };
    }

    const contentType = headerValue(response.headers, 'content-type')?.toLowerCase();
    if (contentType && !HTML_CONTENT_TYPES.some((type) => contentType.includes(type))) {
      return {
        ok: false,
        kind: 'Unknown',
        message: `Unsupported content type ${contentType}`,
        statusCode: response.statusCode,
      };
    }

    const html = response.html ?? '';
    return { ok: true, html, rawHtml: html, statusCode: response.statusCode };
  }

  async close(): Promise<void> {
    await closeAllSessions();
  }
}
