import { homedir } from 'node:os';
import { join } from 'node:path';

export const APP_DIR_NAME = 'husk';
export const CACHE_FILE_NAME = 'help_cache.json';

type Env = Record<string, string | undefined>;

function homeDir(env: Env): string {
  // HOME wins over the passwd entry when set.
  return env.HOME ?? homedir();
}

/** The per-user configuration directory of the current platform. */
export function userConfigDir(env: Env = process.env, platform: NodeJS.Platform = process.platform): string {
  if (platform === 'win32') {
    return env.APPDATA ?? join(homeDir(env), 'AppData', 'Roaming');
  }
  if (platform === 'darwin') {
    return join(homeDir(env), 'Library', 'Application Support');
  }
  return env.XDG_CONFIG_HOME || join(homeDir(env), '.config');
}

export function getAppDir(env: Env = process.env, platform: NodeJS.Platform = process.platform): string {
  return join(userConfigDir(env, platform), APP_DIR_NAME);
}

export function getCacheFilePath(env: Env = process.env, platform: NodeJS.Platform = process.platform): string {
  return join(getAppDir(env, platform), CACHE_FILE_NAME);
}
