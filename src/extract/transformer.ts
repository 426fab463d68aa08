/**
 * Content transformer: rendered HTML in, Markdown + metadata + outlinks out
 */
import { parseHTML } from 'linkedom';
import { extractLinks } from '../crawl/link-extractor.js';
import { htmlToMarkdown } from './markdown.js';
import { extractDescription, extractTitle } from './metadata.js';

export interface PageMetadata {
  title: string | null;
  description: string | null;
}

export interface TransformResult {
  markdown: string;
  metadata: PageMetadata;
  outlinks: string[];
}

export interface Transformer {
  toMarkdown(html: string, baseUrl: string): TransformResult | Promise<TransformResult>;
}

/** Elements dropped before conversion; they carry page chrome, not content. */
const NON_CONTENT_SELECTORS = ['script', 'style', 'noscript', 'template', 'svg'];

/** Rewrite relative link and image targets so saved Markdown works outside the site. */
function absolutizeUrls(document: Document, baseUrl: string): void {
  const targets: Array<[string, string]> = [
    ['a[href]', 'href'],
    ['img[src]', 'src'],
  ];
  for (const [selector, attribute] of targets) {
    for (const el of document.querySelectorAll(selector)) {
      const value = el.getAttribute(attribute)?.trim();
      if (!value || value.startsWith('#') || /^[a-z][a-z0-9+.-]*:/i.test(value)) continue;
      if (URL.canParse(value, baseUrl)) el.setAttribute(attribute, new URL(value, baseUrl).href);
    }
  }
}

/**
 * Default transformer built on linkedom and turndown.
 * Links are collected from the whole page; Markdown is produced from `<body>`.
 */
export class MarkdownTransformer implements Transformer {
  toMarkdown(html: string, baseUrl: string): TransformResult {
    const { document } = parseHTML(html);

    const metadata: PageMetadata = {
      title: extractTitle(document),
      description: extractDescription(document),
    };
    const outlinks = extractLinks(document, baseUrl);

    for (const el of document.querySelectorAll(NON_CONTENT_SELECTORS.join(','))) {
      el.remove();
    }
    absolutizeUrls(document, baseUrl);
    const body = document.body?.innerHTML ?? document.documentElement?.innerHTML ?? html;

    return { markdown: htmlToMarkdown(body), metadata, outlinks };
  }
}
