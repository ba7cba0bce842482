export type HuskErrorCode = 'CACHE_WRITE_FAILED' | 'SPAWN_FAILED';

export class HuskError extends Error {
  readonly code: HuskErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: HuskErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'HuskError';
    this.code = code;
    this.details = details;
  }
}

/**
 * The wrapped CLI could not be started at all (missing binary, permission denied).
 *
 * Distinct from the child running and exiting non-zero, which is a legitimate
 * result and is passed through untouched.
 */
export class SpawnError extends HuskError {
  readonly command: string;
  /** errno code reported by the OS, e.g. `ENOENT` or `EACCES`. */
  readonly errno?: string;

  constructor(command: string, errno: string | undefined, message: string, options?: { cause?: unknown }) {
    super('SPAWN_FAILED', message, { command, errno }, options);
    this.name = 'SpawnError';
    this.command = command;
    this.errno = errno;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Node's system errors carry a string `code` (ENOENT, EACCES, ...). */
export function errnoCode(err: unknown): string | undefined {
  if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
