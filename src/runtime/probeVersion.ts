import { execFileSync } from 'node:child_process';
import { existsSync, readFileSync, realpathSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { z } from 'zod';

import { errorMessage } from '../dx/errors.js';
import { logDebug } from '../dx/logger.js';
import { currentWrapperVersion } from '../version.js';
import type { ProbeResult, ProbedVersions, WrappedCli } from './runtimeTypes.js';

const PackageJsonSchema = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
});

const VERSION_TOKEN = /\d+(?:\.\d+)+(?:-[0-9A-Za-z.]+)?/;

/** First version-looking token of the first non-empty line. */
export function parseVersionOutput(text: string): string | null {
  const line = text.split(/\r?\n/).find((l) => l.trim().length > 0);
  if (!line) return null;
  return line.match(VERSION_TOKEN)?.[0] ?? null;
}

/**
 * Walks up from `start` (after resolving symlinks) to the package.json of
 * `packageName` and returns its version.
 */
export function findPackageVersion(start: string, packageName: string): string | null {
  let cur: string;
  try {
    cur = dirname(realpathSync(start));
  } catch {
    return null;
  }

  for (let i = 0; i < 8; i++) {
    const candidate = join(cur, 'package.json');
    if (existsSync(candidate)) {
      try {
        const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(candidate, 'utf8')));
        if (parsed.success && parsed.data.name === packageName && parsed.data.version) {
          return parsed.data.version;
        }
      } catch (err) {
        logDebug('unreadable package.json while probing', { path: candidate, error: errorMessage(err) });
      }
    }
    const parent = dirname(cur);
    if (parent === cur) break;
    cur = parent;
  }
  return null;
}

function execVersion(cli: WrappedCli): ProbeResult {
  let out: string;
  try {
    out = execFileSync(cli.command, [...cli.prefixArgs, '--version'], {
      encoding: 'utf8',
      stdio: ['ignore', 'pipe', 'ignore'],
    });
  } catch (err) {
    return { ok: false, error: { reason: 'exec-failed', message: `${cli.path} --version failed: ${errorMessage(err)}` } };
  }

  const version = parseVersionOutput(out);
  if (!version) {
    return { ok: false, error: { reason: 'unparseable', message: `no version in output of ${cli.path} --version` } };
  }
  return { ok: true, version, source: 'exec' };
}

/**
 * Version of the wrapped CLI: read from its package.json when reachable from
 * the located file, otherwise by running it once with `--version`.
 */
export function probeVersion(cli: WrappedCli | null, packageName: string): ProbeResult {
  if (!cli) {
    return { ok: false, error: { reason: 'not-found', message: 'wrapped CLI not found' } };
  }

  const fromPackage = findPackageVersion(cli.path, packageName);
  if (fromPackage) return { ok: true, version: fromPackage, source: 'package-json' };

  return execVersion(cli);
}

/** Probes both versions; call once per invocation and reuse the result. */
export function probeVersions(cli: WrappedCli | null, packageName: string): ProbedVersions {
  return {
    wrapperVersion: currentWrapperVersion(),
    wrapped: probeVersion(cli, packageName),
  };
}
