import { decideCache } from '../cache/cachePolicy.js';
import { getCacheEntry, loadCacheStore, putCacheEntry } from '../cache/cacheStore.js';
import { Delegator, type OutputSink } from '../delegate/delegator.js';
import type { ProcessRunner } from '../delegate/processRunner.js';
import type { HuskConfig } from '../dx/config.js';
import { SpawnError, errorMessage } from '../dx/errors.js';
import { logDebug } from '../dx/logger.js';
import { warn } from '../dx/warnings.js';
import { detectRuntime, installGuidance } from '../runtime/detectRuntime.js';
import { locateWrappedCli } from '../runtime/detectWrappedCli.js';
import { probeVersions } from '../runtime/probeVersion.js';
import type { ProbedVersions, RuntimeInfo, WrappedCli } from '../runtime/runtimeTypes.js';
import { classify, normalizedArgs, type CacheableRequest, type Classification } from './classify.js';
import { createRebrander, createVersionStamper, type RebrandOptions } from './rebrand.js';

/** Exit status when the wrapped CLI is not installed (shell convention for "command not found"). */
export const EXIT_NOT_FOUND = 127;
/** Exit status when the wrapped CLI exists but cannot be executed. */
export const EXIT_NOT_EXECUTABLE = 126;

export type Unavailable = { reason: 'not-found' } | { reason: 'spawn-failed'; error: SpawnError };

/**
 * Called when the wrapped CLI cannot be run. Resolving `'available'` makes the
 * dispatcher locate it again and retry once.
 */
export type InstallerHook = (failure: Unavailable) => Promise<'available' | 'unavailable'>;

export type DispatcherDeps = {
  config: HuskConfig;
  runner: ProcessRunner;
  stdout: OutputSink;
  stderr: OutputSink;
  now?: () => number;
  locate?: () => WrappedCli | null;
  probe?: (cli: WrappedCli | null) => ProbedVersions;
  detectRuntime?: () => RuntimeInfo;
  onUnavailable?: InstallerHook;
};

type CacheableClassification = Extract<Classification, { kind: 'cacheable' }>;

export class Dispatcher {
  private readonly deps: DispatcherDeps;

  constructor(deps: DispatcherDeps) {
    this.deps = deps;
  }

  /** Runs one invocation and resolves with the exit code husk should exit with. */
  async handle(argv: string[]): Promise<number> {
    const classification = classify(argv);
    logDebug('classified', { argv, classification });

    const first = await this.attempt(classification, argv);
    if (typeof first === 'number') return first;

    let failure = first;
    if (this.deps.onUnavailable && (await this.deps.onUnavailable(failure)) === 'available') {
      const retried = await this.attempt(classification, argv);
      if (typeof retried === 'number') return retried;
      failure = retried;
    }
    return this.reportUnavailable(failure);
  }

  private locate(): WrappedCli | null {
    if (this.deps.locate) return this.deps.locate();
    return locateWrappedCli(this.deps.config, { selfPath: process.argv[1] });
  }

  private async attempt(classification: Classification, argv: string[]): Promise<number | Unavailable> {
    const cli = this.locate();
    try {
      if (classification.kind === 'cacheable') return await this.serveCacheable(cli, classification);
      if (!cli) return { reason: 'not-found' };
      const res = await this.delegator(cli).run(argv, false);
      return res.exitCode;
    } catch (err) {
      if (err instanceof SpawnError) return { reason: 'spawn-failed', error: err };
      throw err;
    }
  }

  private delegator(cli: WrappedCli, versions?: ProbedVersions, request?: CacheableRequest): Delegator {
    const { config, runner, stdout } = this.deps;
    const options: RebrandOptions = {
      wrappedCommand: config.wrappedCommand,
      wrappedDisplayName: config.wrappedDisplayName,
      brand: config.brand,
      brandVersion: versions?.wrapperVersion ?? '',
      wrappedVersion: versions?.wrapped.ok ? versions.wrapped.version : undefined,
    };
    // `husk --version` reports both versions; everything else is rebranded help text.
    const rootVersion = request?.kind === 'version' && request.path.length === 0;
    return new Delegator(cli, {
      runner,
      stdout,
      createTransform: () => (rootVersion ? createVersionStamper(options) : createRebrander(options)),
    });
  }

  private async serveCacheable(cli: WrappedCli | null, classification: CacheableClassification): Promise<number | Unavailable> {
    const { config } = this.deps;
    const { key, request } = classification;
    const now = this.deps.now ?? Date.now;

    // Probed once; the same versions gate the lookup and stamp the write.
    const versions = this.deps.probe ? this.deps.probe(cli) : probeVersions(cli, config.wrappedPackage);
    const store = loadCacheStore(config.cacheFile);

    if (versions.wrapped.ok) {
      const decision = decideCache(
        getCacheEntry(store, key),
        { wrapperVersion: versions.wrapperVersion, wrappedVersion: versions.wrapped.version },
        now(),
      );
      logDebug('cache decision', { key, decision: decision.kind, reason: decision.kind === 'stale' ? decision.reason : undefined });
      if (decision.kind === 'hit') {
        this.deps.stdout.write(decision.content);
        return 0;
      }
    } else if (cli) {
      warn({ code: 'PROBE_FAILED', message: versions.wrapped.error.message, hint: 'help output will not be cached' });
    }

    if (!cli) return { reason: 'not-found' };

    const res = await this.delegator(cli, versions, request).run(normalizedArgs(request), true);
    const content = res.capturedOutput ?? '';

    if (res.exitCode === 0 && content.trim() && versions.wrapped.ok) {
      try {
        putCacheEntry(
          store,
          key,
          {
            content,
            wrapperVersion: versions.wrapperVersion,
            wrappedVersion: versions.wrapped.version,
            createdAt: now(),
          },
          config.cacheFile,
        );
      } catch (err) {
        warn({ code: 'CACHE_WRITE_FAILED', message: errorMessage(err) });
      }
    }

    return res.exitCode;
  }

  private reportUnavailable(failure: Unavailable): number {
    const { config, stderr } = this.deps;
    const runtime = (this.deps.detectRuntime ?? detectRuntime)();

    const lines: string[] = [];
    let code = EXIT_NOT_FOUND;
    if (failure.reason === 'not-found') {
      lines.push(`${config.brand}: ${config.wrappedCommand} was not found on PATH or in a global install location.`);
      lines.push(...installGuidance(config, runtime));
    } else {
      const { error } = failure;
      if (error.errno === 'EACCES') code = EXIT_NOT_EXECUTABLE;
      lines.push(`${config.brand}: could not run ${config.wrappedCommand} (${error.command}): ${error.errno ?? error.message}`);
      if (code === EXIT_NOT_EXECUTABLE) lines.push(`Check the file permissions of ${error.command}.`);
      else lines.push(...installGuidance(config, runtime));
    }

    stderr.write(lines.join('\n') + '\n');
    return code;
  }
}
