import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';

import { getAppDir, getCacheFilePath } from '../cache/cachePaths.js';
import { errorMessage } from './errors.js';
import { logDebug } from './logger.js';
import { warn } from './warnings.js';

const ConfigFileSchema = z
  .object({
    /** Command name looked up on PATH, and the word rebranded in help text. */
    wrappedCommand: z.string().min(1),
    /** npm package name of the wrapped CLI (read from its package.json to probe the version). */
    wrappedPackage: z.string().min(1),
    /** Script entry inside the package, used when nothing is on PATH. */
    wrappedEntry: z.string().min(1),
    /** Banner prefix the wrapped CLI prints above its help text. */
    wrappedDisplayName: z.string().min(1),
    brand: z.string().min(1),
    /** Explicit path to the wrapped CLI; skips PATH lookup. */
    wrappedBin: z.string().min(1),
    /** Override the help cache location. */
    cacheFile: z.string().min(1),
    /** Enable debug logs without env var */
    debug: z.boolean(),
  })
  .partial()
  .strict();

export type HuskConfigFile = z.infer<typeof ConfigFileSchema>;

export type HuskConfig = {
  wrappedCommand: string;
  wrappedPackage: string;
  wrappedEntry: string;
  wrappedDisplayName: string;
  brand: string;
  wrappedBin?: string;
  cacheFile: string;
  debug: boolean;
};

type Env = Record<string, string | undefined>;

export const DEFAULT_CONFIG = {
  wrappedCommand: 'openclaw',
  wrappedPackage: 'openclaw',
  wrappedEntry: 'openclaw.mjs',
  wrappedDisplayName: 'OpenClaw',
  brand: 'husk',
  debug: false,
} as const;

let cached: { loaded: true; config: HuskConfig } | { loaded: false } = { loaded: false };

export function configPath(env: Env = process.env): string {
  return join(getAppDir(env), 'config.json');
}

function readConfigFile(p: string): HuskConfigFile {
  if (!existsSync(p)) return {};
  try {
    const parsed = ConfigFileSchema.safeParse(JSON.parse(readFileSync(p, 'utf8')));
    if (parsed.success) {
      logDebug('loaded config', { path: p });
      return parsed.data;
    }
    warn({
      code: 'CONFIG_IGNORED',
      message: `${p} does not match the expected shape: ${parsed.error.issues.map((i) => i.message).join('; ')}`,
    });
  } catch (err) {
    warn({ code: 'CONFIG_IGNORED', message: `${p} could not be read: ${errorMessage(err)}` });
  }
  return {};
}

// A brand containing the wrapped command as a word would be rewritten again on a second pass.
export function brandConflicts(brand: string, wrappedCommand: string): boolean {
  return brand.split(/[^A-Za-z0-9_-]+/).includes(wrappedCommand);
}

function resolveBrand(brand: string | undefined, wrappedCommand: string): string {
  if (brand === undefined || !brandConflicts(brand, wrappedCommand)) return brand ?? DEFAULT_CONFIG.brand;
  warn({
    code: 'CONFIG_IGNORED',
    message: `brand "${brand}" contains the wrapped command "${wrappedCommand}" as a word`,
    hint: `falling back to "${DEFAULT_CONFIG.brand}"`,
  });
  return DEFAULT_CONFIG.brand;
}

/**
 * Resolves the runtime configuration.
 *
 * Precedence: defaults < `<config dir>/husk/config.json` < environment
 * (`HUSK_WRAPPED_BIN`, `HUSK_CACHE_FILE`, `HUSK_DEBUG`).
 * Read at most once per process.
 */
export function loadConfig(env: Env = process.env): HuskConfig {
  if (cached.loaded) return cached.config;

  const file = readConfigFile(configPath(env));
  const wrappedCommand = file.wrappedCommand ?? DEFAULT_CONFIG.wrappedCommand;
  const config: HuskConfig = {
    wrappedCommand,
    wrappedPackage: file.wrappedPackage ?? file.wrappedCommand ?? DEFAULT_CONFIG.wrappedPackage,
    wrappedEntry: file.wrappedEntry ?? DEFAULT_CONFIG.wrappedEntry,
    wrappedDisplayName: file.wrappedDisplayName ?? DEFAULT_CONFIG.wrappedDisplayName,
    brand: resolveBrand(file.brand, wrappedCommand),
    wrappedBin: env.HUSK_WRAPPED_BIN || file.wrappedBin,
    cacheFile: env.HUSK_CACHE_FILE || file.cacheFile || getCacheFilePath(env),
    debug: env.HUSK_DEBUG === '1' || (file.debug ?? DEFAULT_CONFIG.debug),
  };
  cached = { loaded: true, config };
  return config;
}

/** For tests only. */
export function __resetConfigCacheForTests() {
  cached = { loaded: false };
}
