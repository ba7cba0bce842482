import { describe, it, expect, afterEach, vi } from 'vitest';

import { isDebugEnabled, logDebug, setDebugEnabled, writeLog } from './logger.js';

describe('dx logger', () => {
  const prev = process.env.HUSK_DEBUG;

  afterEach(() => {
    setDebugEnabled(false);
    vi.restoreAllMocks();
    if (prev == null) delete process.env.HUSK_DEBUG;
    else process.env.HUSK_DEBUG = prev;
  });

  it('is disabled by default', () => {
    delete process.env.HUSK_DEBUG;
    expect(isDebugEnabled()).toBe(false);
  });

  it('enables via env var', () => {
    process.env.HUSK_DEBUG = '1';
    expect(isDebugEnabled()).toBe(true);
  });

  it('enables via setter (tests)', () => {
    delete process.env.HUSK_DEBUG;
    setDebugEnabled(true);
    expect(isDebugEnabled()).toBe(true);
  });

  it('writes to stderr only, never stdout', () => {
    delete process.env.HUSK_DEBUG;
    setDebugEnabled(true);
    const err = vi.spyOn(console, 'error').mockImplementation(() => {});
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});

    logDebug('cache hit', { key: 'help:' });
    writeLog('warn', ['disk full']);

    expect(out).not.toHaveBeenCalled();
    expect(err).toHaveBeenNthCalledWith(1, '[husk]', 'cache hit', { key: 'help:' });
    expect(err).toHaveBeenNthCalledWith(2, '[husk:warn]', 'disk full');
  });

  it('stays silent when disabled', () => {
    delete process.env.HUSK_DEBUG;
    const err = vi.spyOn(console, 'error').mockImplementation(() => {});
    logDebug('nothing');
    expect(err).not.toHaveBeenCalled();
  });
});
