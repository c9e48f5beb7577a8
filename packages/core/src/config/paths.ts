/**
 * @wanwatch/core - Config path resolution
 */

import { join, resolve } from 'node:path';

export const CONFIG_FILE_NAME = 'wanwatch.json';

/**
 * Resolve the wanwatch home directory.
 * Priority: WANWATCH_HOME env var > /etc/wanwatch
 */
export function resolveWanwatchHome(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env['WANWATCH_HOME'];
  if (fromEnv) {
    return resolve(fromEnv);
  }
  return '/etc/wanwatch';
}

/**
 * Resolve the config file path.
 * Priority: WANWATCH_CONFIG env var > WANWATCH_HOME/wanwatch.json
 */
export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env['WANWATCH_CONFIG'];
  if (fromEnv) {
    return resolve(fromEnv);
  }
  return join(resolveWanwatchHome(env), CONFIG_FILE_NAME);
}
