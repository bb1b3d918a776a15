import path from 'node:path';
import os from 'node:os';

/**
 * Expands a leading `~` to the given home directory.
 *
 * @param p The path to expand.
 * @param homeDir The home directory, defaulting to `os.homedir()`.
 */
export function expandHome(p: string, homeDir: string = os.homedir()): string {
  if (p === '~') return homeDir;
  if (p.startsWith('~/') || p.startsWith('~\\')) {
    return path.join(homeDir, p.slice(2));
  }
  return p;
}

export interface CacheHomeOptions {
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  platform?: NodeJS.Platform;
}

/**
 * Resolves the per-user cache directory.
 *
 * `%LOCALAPPDATA%` on Windows; elsewhere `$XDG_CACHE_HOME` when it is an
 * absolute path, otherwise `~/.cache`.
 */
export function cacheHome(options: CacheHomeOptions = {}): string {
  const env = options.env ?? process.env;
  const homeDir = options.homeDir ?? os.homedir();
  const platform = options.platform ?? process.platform;

  if (platform === 'win32') {
    return env.LOCALAPPDATA || path.join(homeDir, 'AppData', 'Local');
  }

  const xdg = env.XDG_CACHE_HOME;
  if (xdg && path.isAbsolute(xdg)) {
    return xdg;
  }
  return path.join(homeDir, '.cache');
}
