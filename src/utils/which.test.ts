import { describe, it, expect, afterEach } from 'vitest';
import { chmodSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { delimiter, join } from 'node:path';

import { which } from './which.js';

const dirs: string[] = [];

function binDir(): string {
  const dir = mkdtempSync(join(tmpdir(), 'husk-which-'));
  dirs.push(dir);
  return dir;
}

function executable(dir: string, name: string) {
  const p = join(dir, name);
  writeFileSync(p, '#!/bin/sh\nexit 0\n');
  chmodSync(p, 0o755);
  return p;
}

afterEach(() => {
  for (const d of dirs.splice(0)) rmSync(d, { recursive: true, force: true });
});

describe.skipIf(process.platform === 'win32')('which', () => {
  it('finds the first executable on PATH', () => {
    const a = binDir();
    const b = binDir();
    const expected = executable(a, 'tool');
    executable(b, 'tool');
    expect(which('tool', { PATH: [a, b].join(delimiter) })).toBe(expected);
  });

  it('returns null when nothing matches', () => {
    expect(which('tool', { PATH: binDir() })).toBe(null);
    expect(which('tool', {})).toBe(null);
  });

  it('ignores directories with the command name', () => {
    const a = binDir();
    mkdirSync(join(a, 'tool'));
    expect(which('tool', { PATH: a })).toBe(null);
  });

  it('honours the skip filter', () => {
    const a = binDir();
    const b = binDir();
    const own = executable(a, 'tool');
    const next = executable(b, 'tool');
    expect(which('tool', { PATH: [a, b].join(delimiter) }, (full) => full === own)).toBe(next);
  });
});
