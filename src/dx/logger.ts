export type LogLevel = 'debug' | 'warn';

let enabled = false;

// Keep this extremely low overhead when disabled.
export function isDebugEnabled(): boolean {
  return enabled || process.env.HUSK_DEBUG === '1';
}

/**
 * Enable/disable husk debug logging programmatically.
 *
 * The CLI entry calls this when the config file sets `debug: true`; tests use it too.
 */
export function setDebugEnabled(v: boolean) {
  enabled = v;
}

// Everything goes to stderr: stdout belongs to the wrapped CLI's output.
export function writeLog(level: LogLevel, args: unknown[]) {
  // eslint-disable-next-line no-console
  console.error(level === 'debug' ? '[husk]' : `[husk:${level}]`, ...args);
}

export function logDebug(...args: unknown[]) {
  if (!isDebugEnabled()) return;
  writeLog('debug', args);
}
