/**
 * manifest.json: one record per URL a crawl processed, rewritten as it grows
 */
import { randomUUID } from 'node:crypto';
import { mkdir, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

export const MANIFEST_FILE = 'manifest.json';

export type ManifestStatus = 'success' | 'failed' | 'blocked';

export interface ManifestRecord {
  url: string;
  /** Primary artifact, relative to the output directory */
  path: string | null;
  status: ManifestStatus;
}

/** On-disk shape */
export interface ManifestFile {
  scraped_urls: ManifestRecord[];
}

/**
 * A fresh manifest per crawl: the first write replaces whatever a previous
 * run left in the directory. Writes are serialized and land via rename.
 */
export class CrawlManifest {
  readonly path: string;
  private readonly outputDir: string;
  private readonly records: ManifestRecord[] = [];
  private readonly urls = new Set<string>();
  private writes: Promise<void> = Promise.resolve();

  constructor(outputDir: string) {
    this.outputDir = outputDir;
    this.path = join(outputDir, MANIFEST_FILE);
  }

  get entries(): readonly ManifestRecord[] {
    return this.records;
  }

  /** Append a record and persist. A URL already recorded is ignored. */
  record(record: ManifestRecord): Promise<void> {
    if (this.urls.has(record.url)) return this.writes;
    this.urls.add(record.url);
    this.records.push({ ...record });
    return this.flush();
  }

  flush(): Promise<void> {
    const next = this.writes.then(() => this.persist());
    this.writes = next.catch(() => undefined);
    return next;
  }

  private async persist(): Promise<void> {
    const body: ManifestFile = { scraped_urls: this.records };
    const tmpPath = `${this.path}.${randomUUID()}.tmp`;
    await mkdir(this.outputDir, { recursive: true });
    await writeFile(tmpPath, JSON.stringify(body, null, 2), 'utf-8');
    await rename(tmpPath, this.path);
  }
}
