/**
 * Page artifacts written under a crawl's output directory
 */
import { createHash } from 'node:crypto';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { OutputFormat } from '../config.js';
import type { PageMetadata } from '../extract/transformer.js';
import { MANIFEST_FILE } from './manifest.js';

export interface PageArtifact {
  url: string;
  markdown: string;
  html: string;
  metadata: PageMetadata;
}

const FORMAT_EXTENSIONS: Record<OutputFormat, string> = {
  markdown: 'md',
  html: 'html',
  json: 'json',
};

/** Reported in the manifest when several formats are written. */
const PRIMARY_ORDER: OutputFormat[] = ['markdown', 'html', 'json'];

const MAX_BASE_NAME_LENGTH = 120;

/** "/docs/getting-started/" → "docs_getting-started"; "/" → "index" */
export function baseNameFor(url: string): string {
  const { pathname } = new URL(url);
  const base = pathname
    .replace(/^\/+|\/+$/g, '')
    .replace(/\//g, '_')
    .replace(/[^A-Za-z0-9._-]/g, '_')
    .slice(0, MAX_BASE_NAME_LENGTH);
  return base || 'index';
}

export function renderMarkdownArtifact(page: PageArtifact): string {
  const frontMatter = ['---', `source_url: ${page.url}`];
  if (page.metadata.title) frontMatter.push(`title: ${JSON.stringify(page.metadata.title)}`);
  frontMatter.push('---');
  return `${frontMatter.join('\n')}\n\n${page.markdown}\n`;
}

function renderJsonArtifact(page: PageArtifact): string {
  return JSON.stringify(
    {
      url: page.url,
      markdown: page.markdown,
      html: page.html,
      metadata: page.metadata,
    },
    null,
    2
  );
}

export class PageArtifactWriter {
  private readonly outputDir: string;
  private readonly formats: OutputFormat[];
  private readonly usedNames = new Set<string>([MANIFEST_FILE.replace(/\.json$/, '')]);
  private ready: Promise<string | undefined> | null = null;

  constructor(outputDir: string, formats: readonly OutputFormat[]) {
    this.outputDir = outputDir;
    this.formats = PRIMARY_ORDER.filter((format) => formats.includes(format));
  }

  /**
   * Write one file per configured format and return the primary file's path,
   * relative to the output directory. Two URLs mapping to the same name are
   * told apart by a hash suffix.
   */
  async write(page: PageArtifact): Promise<string> {
    const name = this.reserveName(page.url);
    this.ready ??= mkdir(this.outputDir, { recursive: true });
    await this.ready;

    const files: string[] = [];
    for (const format of this.formats) {
      const file = `${name}.${FORMAT_EXTENSIONS[format]}`;
      const body =
        format === 'markdown'
          ? renderMarkdownArtifact(page)
          : format === 'html'
            ? page.html
            : renderJsonArtifact(page);
      await writeFile(join(this.outputDir, file), body, 'utf-8');
      files.push(file);
    }
    return files[0];
  }

  private reserveName(url: string): string {
    let name = baseNameFor(url);
    if (this.usedNames.has(name)) {
      name = `${name}_${createHash('sha256').update(url).digest('hex').slice(0, 8)}`;
    }
    this.usedNames.add(name);
    return name;
  }
}
