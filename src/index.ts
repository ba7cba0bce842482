export { Dispatcher, EXIT_NOT_EXECUTABLE, EXIT_NOT_FOUND } from './dispatch/dispatcher.js';
export type { DispatcherDeps, InstallerHook, Unavailable } from './dispatch/dispatcher.js';
export { classify, cacheKeyFor, normalizedArgs } from './dispatch/classify.js';
export type { CacheableRequest, Classification, DelegateReason } from './dispatch/classify.js';
export { createRebrander, createVersionStamper, rebrand, stampVersion } from './dispatch/rebrand.js';
export type { RebrandOptions } from './dispatch/rebrand.js';

export { Delegator } from './delegate/delegator.js';
export type { DelegationResult, DelegatorOptions, OutputSink, StreamTransform } from './delegate/delegator.js';
export { NodeProcessRunner, exitCodeFor } from './delegate/processRunner.js';
export type { OutputTargets, ProcessRunner, RunOptions, RunResult } from './delegate/processRunner.js';

export { clearCacheStore, emptyStore, getCacheEntry, loadCacheStore, putCacheEntry } from './cache/cacheStore.js';
export { decideCache } from './cache/cachePolicy.js';
export type { CacheDecision, StaleReason } from './cache/cachePolicy.js';
export { getCacheFilePath, userConfigDir } from './cache/cachePaths.js';
export { HELP_CACHE_TTL_MS } from './cache/cacheTypes.js';
export type { CacheEntry, CacheKey, CacheStore, CacheableKind, VersionPair } from './cache/cacheTypes.js';

export { locateWrappedCli } from './runtime/detectWrappedCli.js';
export { detectRuntime } from './runtime/detectRuntime.js';
export { probeVersion, probeVersions } from './runtime/probeVersion.js';
export type { ProbeError, ProbeResult, ProbedVersions, RuntimeInfo, WrappedCli } from './runtime/runtimeTypes.js';

export { loadConfig } from './dx/config.js';
export type { HuskConfig } from './dx/config.js';
export { HuskError, SpawnError } from './dx/errors.js';
export type { HuskErrorCode } from './dx/errors.js';
export { HUSK_VERSION, currentWrapperVersion } from './version.js';
