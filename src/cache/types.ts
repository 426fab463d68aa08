/**
 * Types for the content cache
 */
import { z } from 'zod';

export const CacheEntrySchema = z.object({
  key: z.string(),
  /** Normalized URL the entry was stored under */
  url: z.string(),
  /** Epoch milliseconds */
  storedAt: z.number(),
  ttlMs: z.number().nonnegative(),
  sizeBytes: z.number().int().nonnegative(),
  payload: z.string(),
});

export type CacheEntry = z.infer<typeof CacheEntrySchema>;

export interface CacheStats {
  entries: number;
  valid: number;
  expired: number;
  sizeBytes: number;
  sizeHuman: string;
  cacheDir: string;
}

/** What the crawler stores per page. */
export const CachedPageSchema = z.object({
  markdown: z.string(),
  html: z.string(),
  metadata: z.object({
    title: z.string().nullable(),
    description: z.string().nullable(),
  }),
  outlinks: z.array(z.string()),
});

export type CachedPage = z.infer<typeof CachedPageSchema>;
