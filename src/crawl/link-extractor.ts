/**
 * Outlink discovery from a parsed page
 */

/**
 * Absolute http(s) targets of every `<a href>` / `<area href>` in document
 * order, fragments removed, first occurrence kept.
 * Relative links resolve against `<base href>` when the page declares one.
 */
export function extractLinks(document: Document, pageUrl: string): string[] {
  const baseHref = document.querySelector('base[href]')?.getAttribute('href')?.trim();
  const base =
    baseHref && URL.canParse(baseHref, pageUrl) ? new URL(baseHref, pageUrl).href : pageUrl;

  const links: string[] = [];
  const seen = new Set<string>();

  for (const anchor of document.querySelectorAll('a[href], area[href]')) {
    const href = anchor.getAttribute('href')?.trim();
    if (!href || href.startsWith('#')) continue;

    let resolved: URL;
    try {
      resolved = new URL(href, base);
    } catch {
      continue;
    }
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') continue;

    resolved.hash = '';
    if (!seen.has(resolved.href)) {
      seen.add(resolved.href);
      links.push(resolved.href);
    }
  }

  return links;
}
