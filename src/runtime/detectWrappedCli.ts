import { existsSync, readdirSync, realpathSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import type { HuskConfig } from '../dx/config.js';
import { logDebug } from '../dx/logger.js';
import { which } from '../utils/which.js';
import type { WrappedCli, WrappedCliSource } from './runtimeTypes.js';

type Env = Record<string, string | undefined>;

export type LocateOptions = {
  env?: Env;
  /** Our own entry script; never returned as the wrapped CLI. */
  selfPath?: string;
};

const SCRIPT_ENTRY = /\.[cm]?js$/;

type LocateConfig = Pick<HuskConfig, 'wrappedCommand' | 'wrappedPackage' | 'wrappedEntry' | 'wrappedBin'>;

export function wrappedCliFromPath(path: string, source: WrappedCliSource): WrappedCli {
  if (SCRIPT_ENTRY.test(path)) {
    return { path, command: process.execPath, prefixArgs: [path], source };
  }
  return { path, command: path, prefixArgs: [], source };
}

function safeRealpath(p: string): string {
  try {
    return realpathSync(p);
  } catch {
    return p;
  }
}

// pnpm keeps global packages in a content-addressed store: .pnpm/<name>@<version>/node_modules/<name>
function pnpmStoreEntries(storeDir: string, config: LocateConfig): string[] {
  if (!existsSync(storeDir)) return [];
  try {
    return readdirSync(storeDir)
      .filter((name) => name.startsWith(`${config.wrappedPackage}@`))
      .sort()
      .reverse()
      .map((name) => join(storeDir, name, 'node_modules', config.wrappedPackage, config.wrappedEntry));
  } catch {
    return [];
  }
}

/** Known global install locations of the wrapped package's script entry, most specific first. */
export function globalInstallCandidates(config: LocateConfig, env: Env = process.env): string[] {
  const home = env.HOME ?? homedir();
  const pkgEntry = (modulesDir: string) => join(modulesDir, config.wrappedPackage, config.wrappedEntry);
  const pnpmHome = env.PNPM_HOME ?? join(home, '.local', 'share', 'pnpm');

  return [
    ...pnpmStoreEntries(join(pnpmHome, 'global', '5', '.pnpm'), config),
    pkgEntry(join(pnpmHome, 'global', '5', 'node_modules')),
    pkgEntry(join('/usr', 'lib', 'node_modules')),
    pkgEntry(join('/usr', 'local', 'lib', 'node_modules')),
    pkgEntry(join(home, '.npm-global', 'lib', 'node_modules')),
    pkgEntry(join(home, 'node_modules')),
  ];
}

/**
 * Finds the wrapped CLI: explicit configuration first, then PATH, then the
 * package entry in a known global install location.
 */
export function locateWrappedCli(config: LocateConfig, options: LocateOptions = {}): WrappedCli | null {
  const env = options.env ?? process.env;

  if (config.wrappedBin) {
    return existsSync(config.wrappedBin) ? wrappedCliFromPath(config.wrappedBin, 'config') : null;
  }

  const self = options.selfPath ? safeRealpath(options.selfPath) : undefined;
  const onPath = which(config.wrappedCommand, env, (full) => self !== undefined && safeRealpath(full) === self);
  if (onPath) {
    logDebug('wrapped cli on PATH', { path: onPath });
    return wrappedCliFromPath(onPath, 'path');
  }

  for (const candidate of globalInstallCandidates(config, env)) {
    if (existsSync(candidate)) {
      logDebug('wrapped cli in global install', { path: candidate });
      return wrappedCliFromPath(candidate, 'global-install');
    }
  }

  return null;
}
