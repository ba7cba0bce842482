import { existsSync, readFileSync, rmSync } from 'node:fs';

import { HuskError, errorMessage } from '../dx/errors.js';
import { logDebug } from '../dx/logger.js';
import { warn } from '../dx/warnings.js';
import { writeFileAtomic } from './atomicWrite.js';
import {
  CACHE_FORMAT,
  CACHE_SCHEMA_VERSION,
  CacheFileSchema,
  type CacheEntry,
  type CacheFile,
  type CacheKey,
  type CacheStore,
} from './cacheTypes.js';

export function emptyStore(): CacheStore {
  return { entries: {} };
}

export function isCacheKey(value: string): value is CacheKey {
  return value.startsWith('help:') || value.startsWith('version:');
}

function fromFile(file: CacheFile): CacheStore {
  const store = emptyStore();
  for (const [key, entry] of Object.entries(file.entries)) {
    if (isCacheKey(key)) store.entries[key] = entry;
  }
  return store;
}

function toFile(store: CacheStore): CacheFile {
  const entries: Record<string, CacheEntry> = {};
  for (const [key, entry] of Object.entries(store.entries)) {
    if (entry) entries[key] = entry;
  }
  return { format: CACHE_FORMAT, schemaVersion: CACHE_SCHEMA_VERSION, entries };
}

/**
 * Reads the help cache from disk.
 *
 * Never throws: a missing, unreadable, corrupt or foreign file is a cold cache.
 */
export function loadCacheStore(path: string): CacheStore {
  if (!existsSync(path)) return emptyStore();

  let raw: string;
  try {
    raw = readFileSync(path, 'utf8');
  } catch (err) {
    warn({ code: 'CACHE_UNREADABLE', message: `cannot read ${path}: ${errorMessage(err)}` });
    return emptyStore();
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    logDebug('cache file is not valid JSON, ignoring', { path });
    return emptyStore();
  }

  const parsed = CacheFileSchema.safeParse(json);
  if (!parsed.success) {
    logDebug('cache file has an unrecognized shape, ignoring', { path, issues: parsed.error.issues.length });
    return emptyStore();
  }
  return fromFile(parsed.data);
}

export function getCacheEntry(store: CacheStore, key: CacheKey): CacheEntry | undefined {
  return store.entries[key];
}

/**
 * Stores `entry` under `key` and persists the whole file atomically.
 *
 * The latest file on disk is re-read first so entries written by concurrent
 * invocations since `store` was loaded survive; entries recorded under other
 * versions than `entry` are dropped. Returns the store as written.
 * Throws `HuskError('CACHE_WRITE_FAILED')` when the file cannot be written.
 */
export function putCacheEntry(store: CacheStore, key: CacheKey, entry: CacheEntry, path: string): CacheStore {
  const latest = loadCacheStore(path);
  const next = emptyStore();

  for (const [k, e] of Object.entries({ ...store.entries, ...latest.entries })) {
    if (!e || !isCacheKey(k)) continue;
    if (e.wrapperVersion !== entry.wrapperVersion || e.wrappedVersion !== entry.wrappedVersion) continue;
    next.entries[k] = e;
  }
  next.entries[key] = entry;

  try {
    writeFileAtomic(path, JSON.stringify(toFile(next), null, 2) + '\n');
  } catch (err) {
    throw new HuskError('CACHE_WRITE_FAILED', `failed to write help cache ${path}: ${errorMessage(err)}`, { path, key }, {
      cause: err,
    });
  }

  logDebug('cache write', { key, path, entries: Object.keys(next.entries).length });
  return next;
}

export function clearCacheStore(path: string): void {
  rmSync(path, { force: true });
}
