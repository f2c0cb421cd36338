/**
 * Well-known filesystem locations.
 *
 * The endpoint lives in the per-user runtime directory when the environment
 * provides one, and in the system temporary directory otherwise. Filesystem
 * permissions on that directory are the only access control.
 */

import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';

export const SOCKET_FILE_NAME = 'pomobar.sock';
export const CONFIG_DIR_NAME = 'pomobar';
export const CONFIG_FILE_NAME = 'config.json';

type Env = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value : undefined;
}

/**
 * Directory holding the endpoint: `$XDG_RUNTIME_DIR`, else the temp dir.
 */
export function resolveRuntimeDir(env: Env = process.env): string {
  return nonEmpty(env.XDG_RUNTIME_DIR) ?? tmpdir();
}

export function resolveSocketPath(env: Env = process.env): string {
  return join(resolveRuntimeDir(env), SOCKET_FILE_NAME);
}

/**
 * Default configuration file: `$XDG_CONFIG_HOME/pomobar/config.json`, else
 * `~/.config/pomobar/config.json`.
 */
export function resolveDefaultConfigPath(env: Env = process.env): string {
  const base = nonEmpty(env.XDG_CONFIG_HOME) ?? join(homedir(), '.config');
  return join(base, CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}
