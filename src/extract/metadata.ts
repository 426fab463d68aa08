/**
 * Page metadata helpers: title and description.
 */

function metaContent(document: Document, selector: string): string | null {
  const content = document.querySelector(selector)?.getAttribute('content')?.trim();
  return content ? content : null;
}

/**
 * Title from og:title, then <title>, then the first <h1>.
 */
export function extractTitle(document: Document): string | null {
  const ogTitle = metaContent(document, 'meta[property="og:title"]');
  if (ogTitle) return ogTitle;

  const title = document.querySelector('title')?.textContent?.trim();
  if (title) return title;

  const h1 = document.querySelector('h1')?.textContent?.trim();
  return h1 ? h1 : null;
}

export function extractDescription(document: Document): string | null {
  return (
    metaContent(document, 'meta[name="description"]') ??
    metaContent(document, 'meta[property="og:description"]')
  );
}
