import { describe, expect, it, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { clearCacheStore, emptyStore, getCacheEntry, loadCacheStore, putCacheEntry } from './cacheStore.js';
import type { CacheEntry } from './cacheTypes.js';

const dirs: string[] = [];

function tempCacheFile(): string {
  const dir = mkdtempSync(join(tmpdir(), 'husk-cache-'));
  dirs.push(dir);
  return join(dir, 'husk', 'help_cache.json');
}

function entry(content: string, overrides: Partial<CacheEntry> = {}): CacheEntry {
  return { content, wrapperVersion: '0.1.0', wrappedVersion: '2026.2.1', createdAt: 1_000, ...overrides };
}

afterEach(() => {
  for (const d of dirs.splice(0)) rmSync(d, { recursive: true, force: true });
});

describe('cache store load', () => {
  it('returns an empty store when the file is absent', () => {
    expect(loadCacheStore(tempCacheFile())).toEqual({ entries: {} });
  });

  it('returns an empty store for a corrupt file', () => {
    const path = tempCacheFile();
    mkdirSync(join(path, '..'), { recursive: true });
    writeFileSync(path, '{"format":"husk-help-cache","schemaVer');
    expect(loadCacheStore(path)).toEqual({ entries: {} });
  });

  it('returns an empty store for an unknown schema version', () => {
    const path = tempCacheFile();
    mkdirSync(join(path, '..'), { recursive: true });
    writeFileSync(path, JSON.stringify({ format: 'husk-help-cache', schemaVersion: 2, entries: {} }));
    expect(loadCacheStore(path)).toEqual({ entries: {} });
  });

  it('returns an empty store for a foreign file', () => {
    const path = tempCacheFile();
    mkdirSync(join(path, '..'), { recursive: true });
    writeFileSync(path, JSON.stringify({ commands: { '': 'help' }, timestamp: 1 }));
    expect(loadCacheStore(path)).toEqual({ entries: {} });
  });

  it('returns an empty store when the path is a directory', () => {
    const path = tempCacheFile();
    mkdirSync(path, { recursive: true });
    expect(loadCacheStore(path)).toEqual({ entries: {} });
  });

  it('skips keys that are not cache keys', () => {
    const path = tempCacheFile();
    mkdirSync(join(path, '..'), { recursive: true });
    writeFileSync(
      path,
      JSON.stringify({
        format: 'husk-help-cache',
        schemaVersion: 1,
        entries: { 'help:gateway': entry('gw'), bogus: entry('x') },
      }),
    );
    expect(loadCacheStore(path)).toEqual({ entries: { 'help:gateway': entry('gw') } });
  });
});

describe('cache store put', () => {
  it('creates the file lazily and reads it back', () => {
    const path = tempCacheFile();
    expect(existsSync(path)).toBe(false);

    putCacheEntry(emptyStore(), 'help:', entry('main help'), path);

    const store = loadCacheStore(path);
    expect(getCacheEntry(store, 'help:')).toEqual(entry('main help'));
    const onDisk = JSON.parse(readFileSync(path, 'utf8'));
    expect(onDisk.format).toBe('husk-help-cache');
    expect(onDisk.schemaVersion).toBe(1);
  });

  it('keeps other subcommands and replaces the written key', () => {
    const path = tempCacheFile();
    let store = putCacheEntry(emptyStore(), 'help:', entry('main'), path);
    store = putCacheEntry(store, 'help:gateway', entry('gateway v1'), path);
    store = putCacheEntry(store, 'help:gateway', entry('gateway v2'), path);

    const loaded = loadCacheStore(path);
    expect(getCacheEntry(loaded, 'help:')?.content).toBe('main');
    expect(getCacheEntry(loaded, 'help:gateway')?.content).toBe('gateway v2');
    expect(getCacheEntry(loaded, 'help:agent')).toBeUndefined();
  });

  it('merges entries written by another process since load', () => {
    const path = tempCacheFile();
    const mine = loadCacheStore(path);
    // another invocation writes meanwhile
    putCacheEntry(emptyStore(), 'help:agent', entry('agent'), path);

    putCacheEntry(mine, 'help:gateway', entry('gateway'), path);

    const loaded = loadCacheStore(path);
    expect(Object.keys(loaded.entries).sort()).toEqual(['help:agent', 'help:gateway']);
  });

  it('drops entries recorded under other versions', () => {
    const path = tempCacheFile();
    putCacheEntry(emptyStore(), 'help:', entry('old', { wrappedVersion: '2026.1.0' }), path);
    putCacheEntry(emptyStore(), 'version:', entry('new', { wrappedVersion: '2026.2.1' }), path);

    expect(loadCacheStore(path)).toEqual({ entries: { 'version:': entry('new') } });
  });

  it('leaves no temp files behind', () => {
    const path = tempCacheFile();
    putCacheEntry(emptyStore(), 'help:', entry('a'), path);
    putCacheEntry(emptyStore(), 'help:x', entry('b'), path);
    expect(readdirSync(join(path, '..'))).toEqual(['help_cache.json']);
  });

  it('ignores a stray temp file left by a killed writer', () => {
    const path = tempCacheFile();
    putCacheEntry(emptyStore(), 'help:', entry('committed'), path);
    writeFileSync(join(path, '..', '.help_cache.json.999.deadbeef.tmp'), '{"format":"husk-help-cache","entr');

    expect(getCacheEntry(loadCacheStore(path), 'help:')?.content).toBe('committed');
  });

  it('clears the file', () => {
    const path = tempCacheFile();
    putCacheEntry(emptyStore(), 'help:', entry('a'), path);
    clearCacheStore(path);
    expect(existsSync(path)).toBe(false);
    expect(() => clearCacheStore(path)).not.toThrow();
  });
});
