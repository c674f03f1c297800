/**
 * Config path resolution.
 */

import * as path from 'path';
import * as os from 'os';

export const CONFIG_FILE = 'config.json';

/**
 * Gets the pkglist config directory.
 * ~/.config/pkglist on Unix, %APPDATA%/pkglist on Windows.
 */
export function getConfigDir(): string {
  if (process.platform === 'win32') {
    return path.join(process.env.APPDATA || os.homedir(), 'pkglist');
  }
  return path.join(os.homedir(), '.config', 'pkglist');
}

/** Path of the user config file. */
export function getConfigFilePath(): string {
  return path.join(getConfigDir(), CONFIG_FILE);
}

/** Resolve a user-supplied path (with `~` expansion) against a base directory. */
export function resolveUserPath(p: string, baseDir: string = process.cwd()): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/') || p.startsWith('~\\')) {
    return path.join(os.homedir(), p.slice(2));
  }
  return path.resolve(baseDir, p);
}
