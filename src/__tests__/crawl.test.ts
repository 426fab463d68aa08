import { gzipSync } from 'node:zlib';
import { describe, it, expect, vi } from 'vitest';
import { parseHTML } from 'linkedom';
import {
  parseRobotsTxt,
  isAllowed,
  fetchRobots,
  politenessDelayMs,
  permissivePolicy,
} from '../crawl/robots-parser.js';
import {
  parseSitemapXml,
  fetchSitemapEntries,
  discoverSitemaps,
  sitemapText,
} from '../crawl/sitemap-parser.js';
import { extractLinks } from '../crawl/link-extractor.js';
import { UrlFrontier } from '../crawl/url-frontier.js';
import {
  normalizeUrl,
  normalizeUrlForDedupe,
  stripTrackingParams,
  matchesPatterns,
  isSameOrigin,
} from '../crawl/url-normalizer.js';
import { InvalidUrlError } from '../errors.js';
import type { TextFetcher } from '../crawl/types.js';

vi.mock('../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

/**
 * TextFetcher answering from a URL → body map; anything else is a 404.
 * Buffer bodies are served as raw bytes alongside their UTF-8 text.
 */
function fetcherFrom(pages: Record<string, string | Buffer>): TextFetcher {
  return vi.fn(async (url: string) => {
    if (!(url in pages)) return { ok: false, status: 404, text: '' };
    const page = pages[url];
    return typeof page === 'string'
      ? { ok: true, status: 200, text: page }
      : { ok: true, status: 200, text: page.toString('utf8'), body: page };
  });
}

describe('url-normalizer', () => {
  describe('normalizeUrl', () => {
    it('lower-cases scheme and host and adds the root path', () => {
      expect(normalizeUrl('HTTPS://Example.COM')).toBe('https://example.com/');
    });

    it('removes the fragment', () => {
      expect(normalizeUrl('https://example.com/page#section')).toBe('https://example.com/page');
    });

    it('removes a trailing slash from non-root paths', () => {
      expect(normalizeUrl('https://example.com/docs/')).toBe('https://example.com/docs');
      expect(normalizeUrl('https://example.com/docs/?v=2')).toBe('https://example.com/docs?v=2');
    });

    it('keeps the root slash', () => {
      expect(normalizeUrl('https://example.com/')).toBe('https://example.com/');
    });

    it('drops default ports', () => {
      expect(normalizeUrl('https://example.com:443/a')).toBe('https://example.com/a');
    });

    it('keeps query parameter order', () => {
      expect(normalizeUrl('https://example.com/p?b=2&a=1')).toBe('https://example.com/p?b=2&a=1');
      expect(normalizeUrl('https://example.com/p?b=2&a=1')).not.toBe(
        normalizeUrl('https://example.com/p?a=1&b=2')
      );
    });

    it('throws InvalidUrlError for relative and non-http URLs', () => {
      expect(() => normalizeUrl('/relative')).toThrow(InvalidUrlError);
      expect(() => normalizeUrl('mailto:someone@example.com')).toThrow(InvalidUrlError);
      expect(() => normalizeUrl('ftp://example.com/file')).toThrow(InvalidUrlError);
    });
  });

  describe('normalizeUrlForDedupe', () => {
    it('drops tracking parameters and sorts the rest', () => {
      expect(
        normalizeUrlForDedupe('https://example.com/p?utm_source=x&b=2&a=1&fbclid=z')
      ).toBe('https://example.com/p?a=1&b=2');
    });

    it('removes the query entirely when only tracking parameters remain', () => {
      expect(normalizeUrlForDedupe('https://example.com/p?utm_medium=email&ref=home')).toBe(
        'https://example.com/p'
      );
    });
  });

  describe('stripTrackingParams', () => {
    it('drops tracking parameters and keeps the rest in order', () => {
      expect(
        stripTrackingParams('https://example.com/p?b=2&utm_source=news&a=1&GCLID=x#top')
      ).toBe('https://example.com/p?b=2&a=1');
    });

    it('removes the query when only tracking parameters were present', () => {
      expect(stripTrackingParams('https://example.com/docs/?utm_campaign=spring&source=feed')).toBe(
        'https://example.com/docs'
      );
    });

    it('leaves a query without tracking parameters untouched', () => {
      expect(stripTrackingParams('https://example.com/p?q=a%20b&x')).toBe(
        'https://example.com/p?q=a%20b&x'
      );
    });
  });

  describe('matchesPatterns', () => {
    it('matches everything with no patterns', () => {
      expect(matchesPatterns('https://example.com/anything', [])).toBe(true);
    });

    it('lets * cross path segments', () => {
      expect(matchesPatterns('https://example.com/api/v1', ['*/api/*'])).toBe(true);
      expect(matchesPatterns('https://example.com/docs', ['*/api/*'])).toBe(false);
      expect(matchesPatterns('https://example.com/blog/2024/01/post', ['/blog/*'])).toBe(true);
    });

    it('anchors patterns at both ends', () => {
      expect(matchesPatterns('https://example.com/docs/intro', ['/docs'])).toBe(false);
      expect(matchesPatterns('https://example.com/v2/docs', ['/docs*'])).toBe(false);
    });

    it('matches against the query string too', () => {
      expect(matchesPatterns('https://example.com/search?q=x', ['/search?q=*'])).toBe(true);
    });

    it('matches when any pattern in the list matches', () => {
      expect(matchesPatterns('https://example.com/guide/setup', ['/api/*', '/guide/*'])).toBe(true);
    });

    it('matches dot segments and dotfiles', () => {
      expect(matchesPatterns('https://example.com/.well-known/security.txt', ['/*'])).toBe(true);
    });

    it('treats dots literally', () => {
      expect(matchesPatterns('https://example.com/a.html', ['/a.html'])).toBe(true);
      expect(matchesPatterns('https://example.com/aXhtml', ['/a.html'])).toBe(false);
    });
  });

  describe('isSameOrigin', () => {
    it('compares scheme, host and port', () => {
      expect(isSameOrigin('https://a.com/x', 'https://a.com:443/y')).toBe(true);
      expect(isSameOrigin('https://a.com/x', 'http://a.com/x')).toBe(false);
      expect(isSameOrigin('https://a.com/x', 'https://b.a.com/x')).toBe(false);
      expect(isSameOrigin('not a url', 'https://a.com')).toBe(false);
    });
  });
});

describe('robots-parser', () => {
  describe('parseRobotsTxt', () => {
    it('parses Disallow rules for wildcard user-agent', () => {
      const content = `User-agent: *
Disallow: /admin
Disallow: /private/
`;
      const policy = parseRobotsTxt(content);
      expect(policy.disallowRules).toEqual(['/admin', '/private/']);
    });

    it('ignores groups for other user-agents', () => {
      const content = `User-agent: Googlebot
Disallow: /no-google

User-agent: *
Disallow: /blocked
`;
      const policy = parseRobotsTxt(content, 'crawlkit/1.0');
      expect(policy.disallowRules).toEqual(['/blocked']);
    });

    it('prefers and merges groups naming our product token', () => {
      const content = `User-agent: *
Disallow: /everyone

User-agent: CrawlKit
Disallow: /one

User-agent: other
User-agent: crawlkit
Disallow: /two
Allow: /two/public
`;
      const policy = parseRobotsTxt(content, 'crawlkit/0.3.0');
      expect(policy.disallowRules).toEqual(['/one', '/two']);
      expect(policy.allowRules).toEqual(['/two/public']);
    });

    it('extracts Sitemap directives from anywhere in the file', () => {
      const content = `Sitemap: https://example.com/sitemap.xml
User-agent: *
Disallow: /admin

Sitemap: https://example.com/sitemap-news.xml
`;
      const policy = parseRobotsTxt(content);
      expect(policy.sitemapUrls).toEqual([
        'https://example.com/sitemap.xml',
        'https://example.com/sitemap-news.xml',
      ]);
    });

    it('handles empty content', () => {
      expect(parseRobotsTxt('')).toEqual(permissivePolicy('*'));
    });

    it('strips full-line and inline comments', () => {
      const content = `# This is a comment
User-agent: * # everyone
# Another comment
Disallow: /test # not /test2
`;
      expect(parseRobotsTxt(content).disallowRules).toEqual(['/test']);
    });

    it('ignores an empty Disallow', () => {
      const content = `User-agent: *
Disallow:
`;
      expect(parseRobotsTxt(content).disallowRules).toEqual([]);
    });

    it('reads Crawl-delay and Request-rate', () => {
      const content = `User-agent: *
Crawl-delay: 2
Request-rate: 1/5
`;
      const policy = parseRobotsTxt(content);
      expect(policy.crawlDelaySeconds).toBe(2);
      expect(policy.requestRate).toBe(0.2);
    });
  });

  describe('isAllowed', () => {
    const policy = parseRobotsTxt(`User-agent: *
Disallow: /private/
Disallow: /*.pdf$
Allow: /private/open
Disallow: /shop
Allow: /shop
`);

    it('allows paths no rule matches', () => {
      expect(isAllowed(policy, 'https://example.com/public')).toBe(true);
    });

    it('blocks paths under a Disallow prefix', () => {
      expect(isAllowed(policy, 'https://example.com/private/x')).toBe(false);
    });

    it('lets a longer Allow override a Disallow', () => {
      expect(isAllowed(policy, 'https://example.com/private/open/doc')).toBe(true);
    });

    it('lets Allow win a tie', () => {
      expect(isAllowed(policy, 'https://example.com/shop/cart')).toBe(true);
    });

    it('supports * wildcards and $ anchors', () => {
      expect(isAllowed(policy, 'https://example.com/files/report.pdf')).toBe(false);
      expect(isAllowed(policy, 'https://example.com/files/report.pdf?download=1')).toBe(true);
    });

    it('allows everything under the permissive policy', () => {
      expect(isAllowed(permissivePolicy('*'), 'https://example.com/private/x')).toBe(true);
    });
  });

  describe('politenessDelayMs', () => {
    it('takes the stricter of Crawl-delay and Request-rate', () => {
      expect(politenessDelayMs({ ...permissivePolicy('*'), crawlDelaySeconds: 1.5 })).toBe(1500);
      expect(
        politenessDelayMs({ ...permissivePolicy('*'), crawlDelaySeconds: 1, requestRate: 0.25 })
      ).toBe(4000);
      expect(politenessDelayMs(permissivePolicy('*'))).toBe(0);
    });
  });

  describe('fetchRobots', () => {
    it('parses the robots.txt of the origin', async () => {
      const fetchFn = fetcherFrom({
        'https://example.com/robots.txt': 'User-agent: *\nDisallow: /private/\n',
      });
      const policy = await fetchRobots('https://example.com', fetchFn, 'crawlkit/1.0');
      expect(fetchFn).toHaveBeenCalledWith('https://example.com/robots.txt');
      expect(policy.disallowRules).toEqual(['/private/']);
    });

    it('falls back to the permissive policy on 404', async () => {
      const policy = await fetchRobots('https://example.com', fetcherFrom({}), 'crawlkit/1.0');
      expect(policy).toEqual(permissivePolicy('crawlkit/1.0'));
    });

    it('falls back to the permissive policy when the fetch throws', async () => {
      const fetchFn: TextFetcher = vi.fn().mockRejectedValue(new Error('connection reset'));
      const policy = await fetchRobots('https://example.com', fetchFn, 'crawlkit/1.0');
      expect(policy).toEqual(permissivePolicy('crawlkit/1.0'));
    });
  });
});

describe('sitemap-parser', () => {
  describe('parseSitemapXml', () => {
    it('parses URL entries from sitemap', () => {
      const xml = `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
  <url>
    <loc>https://example.com/</loc>
    <lastmod>2024-01-01</lastmod>
    <priority>1.0</priority>
  </url>
  <url>
    <loc>https://example.com/about</loc>
    <priority>0.8</priority>
  </url>
</urlset>`;

      const { entries, nestedSitemaps } = parseSitemapXml(xml);
      expect(entries).toEqual([
        { url: 'https://example.com/', lastModified: '2024-01-01', priority: 1 },
        { url: 'https://example.com/about', priority: 0.8 },
      ]);
      expect(nestedSitemaps).toEqual([]);
    });

    it('parses sitemap index with nested sitemaps', () => {
      const xml = `<?xml version="1.0" encoding="UTF-8"?>
<sitemapindex xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
  <sitemap>
    <loc>https://example.com/sitemap-pages.xml</loc>
  </sitemap>
  <sitemap>
    <loc>https://example.com/sitemap-posts.xml</loc>
  </sitemap>
</sitemapindex>`;

      const { entries, nestedSitemaps } = parseSitemapXml(xml);
      expect(entries).toEqual([]);
      expect(nestedSitemaps).toEqual([
        'https://example.com/sitemap-pages.xml',
        'https://example.com/sitemap-posts.xml',
      ]);
    });

    it('skips non-http locations and honours the entry cap', () => {
      const xml = `<urlset>
  <url><loc>javascript:alert(1)</loc></url>
  <url><loc>https://example.com/a</loc></url>
  <url><loc>https://example.com/b</loc></url>
</urlset>`;
      expect(parseSitemapXml(xml, 1).entries).toEqual([{ url: 'https://example.com/a' }]);
    });

    it('yields nothing for content that is not a sitemap', () => {
      expect(parseSitemapXml('this is not xml <<<')).toEqual({ entries: [], nestedSitemaps: [] });
    });

    it('yields nothing for truncated XML', () => {
      const xml =
        '<urlset><url><loc>https://example.com/a</loc></url><url><loc>https://example.com/b';
      expect(parseSitemapXml(xml)).toEqual({ entries: [], nestedSitemaps: [] });
    });

    it('yields nothing for mismatched tags', () => {
      const xml = '<urlset><url><loc>https://example.com/a</lox></url></urlset>';
      expect(parseSitemapXml(xml)).toEqual({ entries: [], nestedSitemaps: [] });
    });

    it('reads url entries only under a urlset root', () => {
      const xml = `<html><body><url><loc>https://example.com/a</loc></url></body></html>`;
      expect(parseSitemapXml(xml)).toEqual({ entries: [], nestedSitemaps: [] });
    });

    it('ignores sitemap elements inside a urlset', () => {
      const xml = `<urlset>
  <url><loc>https://example.com/a</loc></url>
  <sitemap><loc>https://example.com/nested.xml</loc></sitemap>
</urlset>`;
      expect(parseSitemapXml(xml)).toEqual({
        entries: [{ url: 'https://example.com/a' }],
        nestedSitemaps: [],
      });
    });

    it('decodes entities in locations', () => {
      const xml = '<urlset><url><loc>https://example.com/p?a=1&amp;b=2</loc></url></urlset>';
      expect(parseSitemapXml(xml).entries).toEqual([{ url: 'https://example.com/p?a=1&b=2' }]);
    });
  });

  describe('sitemapText', () => {
    const xml = '<urlset><url><loc>https://example.com/a</loc></url></urlset>';

    it('gunzips a body sent with Content-Encoding: gzip', () => {
      const body = gzipSync(Buffer.from(xml));
      expect(
        sitemapText('https://example.com/sitemap.xml', {
          ok: true,
          text: '',
          body,
          headers: { 'Content-Encoding': 'gzip' },
        })
      ).toBe(xml);
    });

    it('falls back to the text when a .gz body is not gzip', () => {
      expect(
        sitemapText('https://example.com/sitemap.xml.gz', {
          ok: true,
          text: xml,
          body: Buffer.from(xml),
        })
      ).toBe(xml);
    });

    it('uses the text when there is no gzip marker', () => {
      expect(
        sitemapText('https://example.com/sitemap.xml', {
          ok: true,
          text: xml,
          body: Buffer.from(xml),
        })
      ).toBe(xml);
    });
  });

  describe('fetchSitemapEntries', () => {
    it('follows nested sitemaps and fetches each one once', async () => {
      const fetchFn = fetcherFrom({
        'https://example.com/sitemap.xml': `<sitemapindex>
  <sitemap><loc>https://example.com/pages.xml</loc></sitemap>
  <sitemap><loc>https://example.com/pages.xml</loc></sitemap>
  <sitemap><loc>https://example.com/sitemap.xml</loc></sitemap>
</sitemapindex>`,
        'https://example.com/pages.xml':
          '<urlset><url><loc>https://example.com/one</loc></url></urlset>',
      });

      const entries = await fetchSitemapEntries(['https://example.com/sitemap.xml'], fetchFn);
      expect(entries).toEqual([{ url: 'https://example.com/one' }]);
      expect(fetchFn).toHaveBeenCalledTimes(2);
    });

    it('skips nested sitemaps on another origin', async () => {
      const fetchFn = fetcherFrom({
        'https://example.com/sitemap.xml':
          '<sitemapindex><sitemap><loc>https://elsewhere.test/s.xml</loc></sitemap></sitemapindex>',
      });

      const entries = await fetchSitemapEntries(['https://example.com/sitemap.xml'], fetchFn);
      expect(entries).toEqual([]);
      expect(fetchFn).toHaveBeenCalledTimes(1);
    });

    it('reads gzipped sitemaps', async () => {
      const fetchFn = fetcherFrom({
        'https://example.com/sitemap.xml.gz': gzipSync(
          Buffer.from('<urlset><url><loc>https://example.com/zipped</loc></url></urlset>')
        ),
      });

      const entries = await fetchSitemapEntries(['https://example.com/sitemap.xml.gz'], fetchFn);
      expect(entries).toEqual([{ url: 'https://example.com/zipped' }]);
    });

    it('reads at most maxDepth levels', async () => {
      const fetchFn = fetcherFrom({
        'https://example.com/s0.xml':
          '<sitemapindex><sitemap><loc>https://example.com/s1.xml</loc></sitemap></sitemapindex>',
        'https://example.com/s1.xml':
          '<sitemapindex><sitemap><loc>https://example.com/s2.xml</loc></sitemap></sitemapindex>',
        'https://example.com/s2.xml':
          '<urlset><url><loc>https://example.com/deep</loc></url></urlset>',
      });

      const entries = await fetchSitemapEntries(['https://example.com/s0.xml'], fetchFn, {
        maxDepth: 2,
      });
      expect(entries).toEqual([]);
      expect(fetchFn).toHaveBeenCalledTimes(2);
      expect(fetchFn).not.toHaveBeenCalledWith('https://example.com/s2.xml');
    });
  });

  describe('discoverSitemaps', () => {
    it('uses Sitemap directives from robots.txt first', async () => {
      const fetchFn = fetcherFrom({
        'https://example.com/custom.xml':
          '<urlset><url><loc>https://example.com/from-robots</loc></url></urlset>',
        'https://example.com/sitemap.xml':
          '<urlset><url><loc>https://example.com/conventional</loc></url></urlset>',
      });
      const robots = parseRobotsTxt('Sitemap: https://example.com/custom.xml');

      const entries = await discoverSitemaps('https://example.com', fetchFn, robots);
      expect(entries).toEqual([{ url: 'https://example.com/from-robots' }]);
    });

    it('falls back to the conventional locations in order', async () => {
      const fetchFn = fetcherFrom({
        'https://example.com/sitemap_index.xml':
          '<urlset><url><loc>https://example.com/from-index</loc></url></urlset>',
      });

      const entries = await discoverSitemaps('https://example.com', fetchFn, permissivePolicy('*'));
      expect(entries).toEqual([{ url: 'https://example.com/from-index' }]);
      expect(fetchFn).toHaveBeenCalledWith('https://example.com/sitemap.xml');
      expect(fetchFn).toHaveBeenCalledWith('https://example.com/sitemap_index.xml');
    });
  });
});

describe('link-extractor', () => {
  function links(html: string, pageUrl = 'https://example.com/docs/page'): string[] {
    const { document } = parseHTML(html);
    return extractLinks(document, pageUrl);
  }

  it('resolves relative links and keeps document order', () => {
    expect(
      links('<a href="/about">About</a><a href="next">Next</a><a href="https://other.test/x">X</a>')
    ).toEqual([
      'https://example.com/about',
      'https://example.com/docs/next',
      'https://other.test/x',
    ]);
  });

  it('drops fragments, fragment-only links and duplicates', () => {
    expect(links('<a href="#top">Top</a><a href="/a#one">A</a><a href="/a#two">A again</a>')).toEqual(
      ['https://example.com/a']
    );
  });

  it('skips non-http schemes', () => {
    expect(
      links('<a href="mailto:x@example.com">Mail</a><a href="javascript:void(0)">JS</a>')
    ).toEqual([]);
  });

  it('honours <base href>', () => {
    expect(
      links('<html><head><base href="https://cdn.example.com/root/"></head><body><a href="page">P</a></body></html>')
    ).toEqual(['https://cdn.example.com/root/page']);
  });
});

describe('UrlFrontier', () => {
  const defaults = { maxDepth: 3, maxPages: 100 };

  it('normalizes the root and seeds it at depth 0', () => {
    const frontier = new UrlFrontier('https://Example.com/docs/', defaults);
    expect(frontier.root).toBe('https://example.com/docs');
    expect(frontier.seedRoot()).toBe('enqueued');
    expect(frontier.next()).toEqual({ url: 'https://example.com/docs', depth: 0 });
    expect(frontier.next()).toBeNull();
  });

  it('rejects an unusable root', () => {
    expect(() => new UrlFrontier('not a url', defaults)).toThrow(InvalidUrlError);
  });

  it('dedupes normalized URLs', () => {
    const frontier = new UrlFrontier('https://example.com', defaults);
    frontier.seedRoot();
    expect(frontier.add('https://example.com/a', 1)).toBe('enqueued');
    expect(frontier.add('https://example.com/a/#x', 1)).toBe('duplicate');
    expect(frontier.add('https://example.com/', 1)).toBe('duplicate');
    expect(frontier.pending).toBe(2);
  });

  it('keeps query order significant unless similar URLs are deduplicated', () => {
    const strict = new UrlFrontier('https://example.com', defaults);
    expect(strict.add('https://example.com/p?a=1&b=2', 1)).toBe('enqueued');
    expect(strict.add('https://example.com/p?b=2&a=1', 1)).toBe('enqueued');

    const loose = new UrlFrontier('https://example.com', {
      ...defaults,
      deduplicateSimilarUrls: true,
    });
    expect(loose.add('https://example.com/p?a=1&b=2', 1)).toBe('enqueued');
    expect(loose.add('https://example.com/p?b=2&a=1&utm_source=x', 1)).toBe('duplicate');
  });

  it('drops external links unless allowed', () => {
    const frontier = new UrlFrontier('https://example.com', defaults);
    expect(frontier.add('https://other.test/page', 1)).toBe('external');

    const open = new UrlFrontier('https://example.com', { ...defaults, allowExternalLinks: true });
    expect(open.add('https://other.test/page', 1)).toBe('enqueued');
  });

  it('applies include and exclude patterns to discovered links only', () => {
    const frontier = new UrlFrontier('https://example.com', {
      ...defaults,
      includePatterns: ['*/api/*'],
      excludePatterns: ['*/internal*'],
    });
    expect(frontier.seedRoot()).toBe('enqueued');
    expect(frontier.add('https://example.com/api/v1', 1)).toBe('enqueued');
    expect(frontier.add('https://example.com/docs', 1)).toBe('excluded');
    expect(frontier.add('https://example.com/api/internal/x', 1)).toBe('excluded');
  });

  it('refuses links deeper than maxDepth', () => {
    const frontier = new UrlFrontier('https://example.com', { ...defaults, maxDepth: 1 });
    expect(frontier.add('https://example.com/a', 1)).toBe('enqueued');
    expect(frontier.add('https://example.com/b', 2)).toBe('too-deep');
  });

  it('never admits more than maxPages URLs', () => {
    const frontier = new UrlFrontier('https://example.com', { ...defaults, maxPages: 2 });
    frontier.seedRoot();
    expect(frontier.add('https://example.com/a', 1)).toBe('enqueued');
    expect(frontier.add('https://example.com/b', 1)).toBe('limit');
    expect(frontier.visitedCount).toBe(2);
    expect(frontier.isFull).toBe(true);
  });

  it('reports invalid links without throwing', () => {
    const frontier = new UrlFrontier('https://example.com', defaults);
    expect(frontier.add('javascript:void(0)', 1)).toBe('invalid');
  });

  it('serves entries in FIFO order with their origin page', () => {
    const frontier = new UrlFrontier('https://example.com', defaults);
    frontier.seedRoot();
    frontier.add('https://example.com/a', 1, 'https://example.com/');
    frontier.add('https://example.com/b', 1, 'https://example.com/');

    expect(frontier.next()?.url).toBe('https://example.com/');
    expect(frontier.next()).toEqual({
      url: 'https://example.com/a',
      depth: 1,
      discoveredFrom: 'https://example.com/',
    });
    expect(frontier.next()?.url).toBe('https://example.com/b');
    expect(frontier.hasMore()).toBe(false);
  });
});
