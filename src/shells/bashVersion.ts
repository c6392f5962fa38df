/**
 * Probe for the installed bash version
 *
 * The activation script needs `complete -o nosort`, which bash gained in
 * 4.4. The probe is advisory: if bash cannot be run or its version cannot
 * be read, the script is still produced.
 */

import { spawnSync } from 'child_process';
import { API_TIMEOUTS, MIN_BASH_VERSION } from '../config/constants.js';
import { logger } from '../services/Logger.js';
import { formatError } from '../utils/errorUtils.js';

/**
 * Extract `[major, minor, patch]` from `bash --version` output
 */
export function parseBashVersion(output: string): [number, number, number] | null {
  const match = /(\d+)\.(\d+)\.(\d+)/.exec(output);
  if (!match) {
    return null;
  }
  return [Number(match[1]), Number(match[2]), Number(match[3])];
}

/**
 * Whether the installed bash is too old for the activation script
 */
export function bashVersionNotUsable(): boolean {
  const result = spawnSync('bash', ['--version'], {
    encoding: 'utf8',
    timeout: API_TIMEOUTS.VERSION_CHECK,
  });

  if (result.error) {
    logger.debug('[SHELL] bash --version failed:', formatError(result.error));
    return false;
  }

  const version = parseBashVersion(result.stdout);
  if (!version) {
    logger.debug('[SHELL] Could not read a version from bash --version');
    return false;
  }

  const [major, minor] = version;
  const [minMajor, minMinor] = MIN_BASH_VERSION;
  logger.debug(`[SHELL] Detected bash ${version.join('.')}`);
  return major < minMajor || (major === minMajor && minor < minMinor);
}
