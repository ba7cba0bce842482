import { isDebugEnabled, writeLog } from './logger.js';

export type HuskWarningCode =
  | 'CACHE_WRITE_FAILED'
  | 'CACHE_UNREADABLE'
  | 'PROBE_FAILED'
  | 'CONFIG_IGNORED';

export type HuskWarning = {
  code: HuskWarningCode;
  message: string;
  hint?: string;
};

// Printed with debug logging off: each means a setting or a cache write the user expects did not happen.
const ALWAYS_REPORTED: ReadonlySet<HuskWarningCode> = new Set(['CACHE_WRITE_FAILED', 'CONFIG_IGNORED']);

export function formatWarning(w: HuskWarning): string {
  return w.hint ? `${w.code}: ${w.message} (${w.hint})` : `${w.code}: ${w.message}`;
}

/** Reports a condition husk recovered from. The command itself carries on. */
export function warn(w: HuskWarning): void {
  if (!ALWAYS_REPORTED.has(w.code) && !isDebugEnabled()) return;
  writeLog('warn', [formatWarning(w)]);
}
