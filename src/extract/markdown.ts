import TurndownService from 'turndown';
import { gfm } from 'turndown-plugin-gfm';
import { logger } from '../logger.js';

const LANGUAGE_CLASS = /\b(?:language|lang)-([\w+#-]+)/;

function codeLanguage(pre: HTMLElement): string | null {
  const code = pre.firstElementChild;
  if (!code || code.nodeName !== 'CODE') return null;
  return LANGUAGE_CLASS.exec(code.className)?.[1] ?? null;
}

function createTurndownService(): TurndownService {
  const td = new TurndownService({
    headingStyle: 'atx',
    hr: '---',
    bulletListMarker: '-',
    codeBlockStyle: 'fenced',
    emDelimiter: '*',
    strongDelimiter: '**',
    linkStyle: 'inlined',
  });
  td.use(gfm);
  td.remove(['script', 'style', 'noscript', 'template']);

  // <pre><code class="language-ts"> keeps its language on the fence
  td.addRule('fencedCodeWithLanguage', {
    filter: (node) => node.nodeName === 'PRE' && codeLanguage(node) !== null,
    replacement: (_content, node) => {
      const code = node.firstElementChild?.textContent ?? '';
      return `\n\n\`\`\`${codeLanguage(node) ?? ''}\n${code.replace(/\n$/, '')}\n\`\`\`\n\n`;
    },
  });

  // Icon-only navigation links would otherwise become "[](/path)"
  td.addRule('emptyLinks', {
    filter: (node) =>
      node.nodeName === 'A' && !node.textContent?.trim() && !node.querySelector('img'),
    replacement: () => '',
  });

  return td;
}

/** Module-level singleton, shared by every transformer instance. */
const turndown = createTurndownService();

export function htmlToMarkdown(html: string): string {
  if (!html || !html.trim()) return '';
  try {
    return turndown
      .turndown(html)
      .replace(/\n{3,}/g, '\n\n')
      .trim();
  } catch (e) {
    logger.debug({ error: String(e), htmlLength: html.length }, 'Turndown conversion failed');
    return '';
  }
}
