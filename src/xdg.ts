// XDG Base Directory Specification support
// https://specifications.freedesktop.org/basedir/latest/

import { homedir } from 'node:os';
import { join } from 'node:path';
import { Env } from './env.ts';

const APP_NAME = 'blockcat';

/**
 * Get the home directory, with Windows fallback
 */
function getHomeDir(): string {
  return Env.get('HOME') || Env.get('USERPROFILE') || homedir();
}

/**
 * Get the XDG config directory for user-specific configuration files.
 *
 * Default: $HOME/.config/blockcat
 */
export function getConfigDir(): string {
  const baseDir = Env.get('XDG_CONFIG_HOME') || join(getHomeDir(), '.config');
  return join(baseDir, APP_NAME);
}
