import { z } from 'zod';

export const CACHE_FORMAT = 'husk-help-cache';
export const CACHE_SCHEMA_VERSION = 1;

/** Cached entries are trusted for 24 hours at most. */
export const HELP_CACHE_TTL_MS = 24 * 60 * 60 * 1000;

export const CacheEntrySchema = z.object({
  /** Captured output, already rebranded. */
  content: z.string(),
  wrapperVersion: z.string(),
  wrappedVersion: z.string(),
  /** ms since epoch */
  createdAt: z.number().int().nonnegative(),
});

export type CacheEntry = z.infer<typeof CacheEntrySchema>;

export const CacheFileSchema = z.object({
  format: z.literal(CACHE_FORMAT),
  schemaVersion: z.literal(CACHE_SCHEMA_VERSION),
  entries: z.record(z.string(), CacheEntrySchema),
});

export type CacheFile = z.infer<typeof CacheFileSchema>;

/** `"<kind>:<subcommand path>"`, e.g. `help:channels login` or `version:`. */
export type CacheKey = `${CacheableKind}:${string}`;

export type CacheableKind = 'help' | 'version';

export type CacheStore = {
  entries: Partial<Record<CacheKey, CacheEntry>>;
};

export type VersionPair = {
  wrapperVersion: string;
  wrappedVersion: string;
};
