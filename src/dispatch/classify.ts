import type { CacheKey, CacheableKind } from '../cache/cacheTypes.js';

export type CacheableRequest = {
  kind: CacheableKind;
  /** Subcommand path, empty for the main command. */
  path: string[];
};

export type DelegateReason =
  | 'no-trigger'
  | 'separator'
  | 'extra-option'
  | 'trailing-argument'
  | 'unrecognized-path'
  | 'path-too-deep';

export type Classification =
  | { kind: 'cacheable'; key: CacheKey; request: CacheableRequest }
  | { kind: 'delegate'; reason: DelegateReason };

const HELP_FLAGS = new Set(['--help', '-h']);
const VERSION_FLAGS = new Set(['--version', '-V']);
const PATH_TOKEN = /^[A-Za-z0-9][A-Za-z0-9:_-]*$/;
export const MAX_PATH_DEPTH = 3;

export function cacheKeyFor(request: CacheableRequest): CacheKey {
  return `${request.kind}:${request.path.join(' ')}`;
}

/** Argument vector that makes the wrapped CLI print the text cached under `request`. */
export function normalizedArgs(request: CacheableRequest): string[] {
  return [...request.path, request.kind === 'help' ? '--help' : '--version'];
}

function cacheable(kind: CacheableKind, path: string[]): Classification {
  const request: CacheableRequest = { kind, path };
  return { kind: 'cacheable', key: cacheKeyFor(request), request };
}

/**
 * Decides whether `argv` only asks for help or version text.
 *
 * Cacheable shapes: no arguments at all (main help), or
 * `[...path, ...triggers]` where the path tokens are plain words and every
 * trigger is one of `--help -h --version -V`. Help wins over version.
 * Anything else, including any other option, a word after a trigger or a
 * `--` separator, is delegated untouched.
 */
export function classify(argv: readonly string[]): Classification {
  if (argv.length === 0) return cacheable('help', []);
  if (argv.includes('--')) return { kind: 'delegate', reason: 'separator' };

  let triggerAt = -1;
  let kind: CacheableKind | null = null;
  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    const isHelp = HELP_FLAGS.has(token);
    if (!isHelp && !VERSION_FLAGS.has(token)) {
      if (token.startsWith('-')) return { kind: 'delegate', reason: 'extra-option' };
      // `--help word`: what the word means is up to the wrapped CLI
      if (triggerAt !== -1) return { kind: 'delegate', reason: 'trailing-argument' };
      continue;
    }
    if (triggerAt === -1) triggerAt = i;
    if (isHelp) kind = 'help';
    else if (kind === null) kind = 'version';
  }

  if (kind === null) return { kind: 'delegate', reason: 'no-trigger' };

  const path = argv.slice(0, triggerAt);
  if (path.length > MAX_PATH_DEPTH) return { kind: 'delegate', reason: 'path-too-deep' };
  if (!path.every((t) => PATH_TOKEN.test(t))) return { kind: 'delegate', reason: 'unrecognized-path' };

  return cacheable(kind, path);
}
