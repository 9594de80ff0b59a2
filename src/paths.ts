/**
 * XDG Base Directory compliant paths for stepwright.
 *
 * - Config: ~/.config/stepwright/ (or $XDG_CONFIG_HOME/stepwright/)
 * - State: ~/.local/state/stepwright/ (or $XDG_STATE_HOME/stepwright/)
 *   REPL history and logs
 * - Cache: ~/.cache/stepwright/ (or $XDG_CACHE_HOME/stepwright/)
 *   Update-check results
 * - Project: .stepwright/ in the working directory
 *
 * @see https://specifications.freedesktop.org/basedir-spec/basedir-spec-latest.html
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

const APP_DIR = 'stepwright';

export function getConfigDir(): string {
  const xdg = process.env.XDG_CONFIG_HOME;
  return xdg ? join(xdg, APP_DIR) : join(homedir(), '.config', APP_DIR);
}

export function getStateDir(): string {
  const xdg = process.env.XDG_STATE_HOME;
  return xdg ? join(xdg, APP_DIR) : join(homedir(), '.local', 'state', APP_DIR);
}

export function getCacheDir(): string {
  const xdg = process.env.XDG_CACHE_HOME;
  return xdg ? join(xdg, APP_DIR) : join(homedir(), '.cache', APP_DIR);
}

/**
 * Always `.stepwright/` within the given working directory.
 */
export function getProjectDir(cwd: string = process.cwd()): string {
  return join(cwd, '.stepwright');
}

// ============================================================================
// Specific file paths
// ============================================================================

export function getConfigPath(): string {
  return join(getConfigDir(), 'config.json');
}

export function getProjectConfigPath(cwd?: string): string {
  return join(getProjectDir(cwd), 'config.json');
}

export function getHistoryPath(): string {
  return join(getStateDir(), 'history');
}

export function getUpdateCachePath(): string {
  return join(getCacheDir(), 'update-check.json');
}
