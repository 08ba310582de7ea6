/**
 * sysindex Runtime Host — Home Directory Resolution
 *
 * Precedence:
 *   1. explicit `home` option (the CLI's --home flag)
 *   2. SYSINDEX_HOME environment variable
 *   3. ~/.sysindex
 *
 * Layout under the resolved home:
 *
 *   <home>/
 *     state/
 *       cluster-metadata.json
 *       installer-config.json   (optional overrides)
 *     logs/
 *       install-events.jsonl
 */

import { existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';

export const HOME_ENV_VAR = 'SYSINDEX_HOME';

export interface ResolveHomeOptions {
  readonly home?: string | undefined;
  /** Environment to read SYSINDEX_HOME from. Defaults to process.env. */
  readonly env?: NodeJS.ProcessEnv | undefined;
}

/**
 * Resolve the home directory and create it if missing.
 *
 * @returns absolute or caller-supplied path of the home directory
 */
export function resolveHome(opts?: ResolveHomeOptions): string {
  const env = opts?.env ?? process.env;
  const fromEnv = env[HOME_ENV_VAR];

  let home: string;
  if (typeof opts?.home === 'string' && opts.home !== '') {
    home = opts.home;
  } else if (typeof fromEnv === 'string' && fromEnv !== '') {
    home = fromEnv;
  } else {
    home = join(homedir(), '.sysindex');
  }

  if (!existsSync(home)) {
    mkdirSync(home, { recursive: true });
  }
  return home;
}
