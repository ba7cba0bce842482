import { HELP_CACHE_TTL_MS, type CacheEntry, type VersionPair } from './cacheTypes.js';

export type StaleReason = 'wrapper-version' | 'wrapped-version' | 'expired';

export type CacheDecision =
  | { kind: 'hit'; content: string }
  | { kind: 'miss' }
  | { kind: 'stale'; reason: StaleReason };

/**
 * Decides whether a cached entry may be served.
 *
 * Version drift is checked before age: a version bump invalidates even a
 * one-second-old entry. An entry dated in the future is expired as well.
 */
export function decideCache(
  entry: CacheEntry | undefined,
  current: VersionPair,
  now: number,
  ttlMs: number = HELP_CACHE_TTL_MS,
): CacheDecision {
  if (!entry) return { kind: 'miss' };
  if (entry.wrapperVersion !== current.wrapperVersion) return { kind: 'stale', reason: 'wrapper-version' };
  if (entry.wrappedVersion !== current.wrappedVersion) return { kind: 'stale', reason: 'wrapped-version' };

  const age = now - entry.createdAt;
  if (age < 0 || age >= ttlMs) return { kind: 'stale', reason: 'expired' };

  return { kind: 'hit', content: entry.content };
}
