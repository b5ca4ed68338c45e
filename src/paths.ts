/**
 * XDG Base Directory paths for convene.
 *
 * - Config: ~/.config/convene/ (or $XDG_CONFIG_HOME/convene/)
 * - Data: ~/.local/share/convene/ (or $XDG_DATA_HOME/convene/)
 *   Transcript database
 * - State: ~/.local/state/convene/ (or $XDG_STATE_HOME/convene/)
 *   Log files
 * - Project: .convene/ in the working directory
 *
 * @see https://specifications.freedesktop.org/basedir-spec/basedir-spec-latest.html
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

const APP_DIR = 'convene';

/**
 * Uses $XDG_CONFIG_HOME if set, otherwise ~/.config/convene/
 */
export function getConfigDir(): string {
  const xdg = process.env.XDG_CONFIG_HOME;
  return xdg ? join(xdg, APP_DIR) : join(homedir(), '.config', APP_DIR);
}

/**
 * Uses $XDG_DATA_HOME if set, otherwise ~/.local/share/convene/
 */
export function getDataDir(): string {
  const xdg = process.env.XDG_DATA_HOME;
  return xdg ? join(xdg, APP_DIR) : join(homedir(), '.local', 'share', APP_DIR);
}

/**
 * Uses $XDG_STATE_HOME if set, otherwise ~/.local/state/convene/
 */
export function getStateDir(): string {
  const xdg = process.env.XDG_STATE_HOME;
  return xdg ? join(xdg, APP_DIR) : join(homedir(), '.local', 'state', APP_DIR);
}

/**
 * Always .convene/ within the working directory.
 */
export function getProjectDir(cwd: string = process.cwd()): string {
  return join(cwd, '.convene');
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

export function getTranscriptsDbPath(): string {
  return join(getDataDir(), 'transcripts.db');
}

export function getLogPath(): string {
  return join(getStateDir(), 'convene.log');
}
