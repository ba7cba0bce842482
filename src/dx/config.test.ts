import { describe, it, expect, afterEach, vi } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { __resetConfigCacheForTests, brandConflicts, configPath, loadConfig } from './config.js';

const dirs: string[] = [];

function tempHome(): string {
  const dir = mkdtempSync(join(tmpdir(), 'husk-cfg-'));
  dirs.push(dir);
  return dir;
}

function writeConfig(env: Record<string, string>, body: string) {
  const p = configPath(env);
  mkdirSync(join(p, '..'), { recursive: true });
  writeFileSync(p, body, 'utf8');
}

describe('config loader', () => {
  afterEach(() => {
    __resetConfigCacheForTests();
    vi.restoreAllMocks();
    for (const d of dirs.splice(0)) rmSync(d, { recursive: true, force: true });
  });

  it('uses defaults when the config file is missing', () => {
    const home = tempHome();
    const env = { HOME: home, XDG_CONFIG_HOME: join(home, '.config') };
    const cfg = loadConfig(env);
    expect(cfg.wrappedCommand).toBe('openclaw');
    expect(cfg.brand).toBe('husk');
    expect(cfg.debug).toBe(false);
    expect(cfg.wrappedBin).toBeUndefined();
    expect(cfg.cacheFile).toBe(join(home, '.config', 'husk', 'help_cache.json'));
  });

  it('reads config.json from the app directory', () => {
    const home = tempHome();
    const env = { HOME: home, XDG_CONFIG_HOME: join(home, '.config') };
    writeConfig(env, JSON.stringify({ wrappedCommand: 'slowtool', brand: 'quick', debug: true }));

    const cfg = loadConfig(env);
    expect(cfg.wrappedCommand).toBe('slowtool');
    // package name follows the command unless set explicitly
    expect(cfg.wrappedPackage).toBe('slowtool');
    expect(cfg.brand).toBe('quick');
    expect(cfg.debug).toBe(true);
  });

  it('lets environment variables override the file', () => {
    const home = tempHome();
    const env = {
      HOME: home,
      XDG_CONFIG_HOME: join(home, '.config'),
      HUSK_WRAPPED_BIN: '/opt/bin/openclaw',
      HUSK_CACHE_FILE: '/tmp/husk-cache.json',
    };
    writeConfig(env, JSON.stringify({ wrappedBin: '/usr/bin/openclaw', cacheFile: '/var/cache.json' }));

    const cfg = loadConfig(env);
    expect(cfg.wrappedBin).toBe('/opt/bin/openclaw');
    expect(cfg.cacheFile).toBe('/tmp/husk-cache.json');
  });

  it('ignores a config file with unknown keys', () => {
    const home = tempHome();
    const env = { HOME: home, XDG_CONFIG_HOME: join(home, '.config') };
    writeConfig(env, JSON.stringify({ brand: 'quick', colour: 'red' }));

    expect(loadConfig(env).brand).toBe('husk');
  });

  it('ignores a config file that is not JSON', () => {
    const home = tempHome();
    const env = { HOME: home, XDG_CONFIG_HOME: join(home, '.config') };
    writeConfig(env, '{ brand: ');

    expect(loadConfig(env).brand).toBe('husk');
  });

  it('falls back to the default brand when the configured one contains the wrapped command', () => {
    const home = tempHome();
    const env = { HOME: home, XDG_CONFIG_HOME: join(home, '.config') };
    writeConfig(env, JSON.stringify({ brand: 'my openclaw', debug: true }));
    const err = vi.spyOn(console, 'error').mockImplementation(() => {});

    const cfg = loadConfig(env);
    expect(cfg.brand).toBe('husk');
    // the rest of the file still applies
    expect(cfg.debug).toBe(true);
    expect(err).toHaveBeenCalledWith(
      '[husk:warn]',
      'CONFIG_IGNORED: brand "my openclaw" contains the wrapped command "openclaw" as a word (falling back to "husk")',
    );
  });

  it('is read once per process', () => {
    const home = tempHome();
    const env = { HOME: home, XDG_CONFIG_HOME: join(home, '.config') };
    const first = loadConfig(env);
    writeConfig(env, JSON.stringify({ brand: 'quick' }));
    expect(loadConfig(env)).toBe(first);
  });
});

describe('brandConflicts', () => {
  it('accepts a brand unrelated to the wrapped command', () => {
    expect(brandConflicts('husk', 'openclaw')).toBe(false);
    expect(brandConflicts('openclawx', 'openclaw')).toBe(false);
  });

  it('flags a brand containing the wrapped command as a word', () => {
    expect(brandConflicts('fast openclaw', 'openclaw')).toBe(true);
    expect(brandConflicts('openclaw', 'openclaw')).toBe(true);
  });
});
