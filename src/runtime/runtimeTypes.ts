export type WrappedCliSource = 'config' | 'path' | 'global-install';

/** How to start the wrapped CLI. */
export type WrappedCli = {
  /** Located executable or script entry. */
  path: string;
  /** Program to spawn: `path` itself, or the Node executable for script entries. */
  command: string;
  /** Arguments placed before the user's (the script path when run through Node). */
  prefixArgs: string[];
  source: WrappedCliSource;
};

export type ProbeErrorReason = 'not-found' | 'exec-failed' | 'unparseable';

export type ProbeError = {
  reason: ProbeErrorReason;
  message: string;
};

export type ProbeResult =
  | { ok: true; version: string; source: 'package-json' | 'exec' }
  | { ok: false; error: ProbeError };

export type ProbedVersions = {
  wrapperVersion: string;
  wrapped: ProbeResult;
};

export type RuntimeInfo = {
  node: string | null;
  npm: string | null;
  pnpm: string | null;
};
