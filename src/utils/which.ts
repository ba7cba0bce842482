import { accessSync, constants, statSync } from 'node:fs';
import { delimiter, join } from 'node:path';

function isExecutableFile(full: string): boolean {
  try {
    accessSync(full, constants.X_OK);
    return statSync(full).isFile();
  } catch {
    return false;
  }
}

/**
 * Resolves `cmd` against PATH. On Windows each PATHEXT extension is tried too.
 * `skip` filters out candidates (e.g. our own executable when installed under the same name).
 */
export function which(
  cmd: string,
  env: Record<string, string | undefined> = process.env,
  skip: (full: string) => boolean = () => false,
): string | null {
  const paths = env.PATH?.split(delimiter).filter(Boolean) ?? [];
  const exts = process.platform === 'win32' ? ['', ...(env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';')] : [''];
  for (const p of paths) {
    for (const ext of exts) {
      const full = join(p, cmd + ext);
      if (isExecutableFile(full) && !skip(full)) return full;
    }
  }
  return null;
}
