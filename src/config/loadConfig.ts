/**
 * Runtime configuration from the environment
 */

import { logger } from '../services/Logger.js';
import { CONFIG_ENV, DEFAULT_CONFIG, validateConfigValue } from './defaults.js';
import type { CompletionConfig } from './defaults.js';

/**
 * Name of the variable that triggers completion for a program:
 * `my-tool` -> `_MY_TOOL_COMPLETE`
 */
export function getCompleteVar(progName: string): string {
  return `_${progName.replace(/-/g, '_')}_COMPLETE`.toUpperCase();
}

/**
 * Settings for `progName`, with environment overrides applied. Invalid
 * overrides are reported and ignored.
 */
export function loadConfig(
  progName: string,
  env: Readonly<Record<string, string | undefined>> = process.env
): CompletionConfig {
  const config: CompletionConfig = {
    ...DEFAULT_CONFIG,
    completeVar: getCompleteVar(progName),
  };

  const logLevel = env[CONFIG_ENV.LOG_LEVEL];
  if (logLevel) {
    const result = validateConfigValue('logLevel', logLevel);
    if (result.valid) {
      config.logLevel = result.coercedValue;
    } else {
      logger.warn(`Ignoring ${CONFIG_ENV.LOG_LEVEL}: ${result.error}`);
    }
  }

  const defaultShell = env[CONFIG_ENV.DEFAULT_SHELL];
  if (defaultShell) {
    const result = validateConfigValue('defaultShell', defaultShell);
    if (result.valid) {
      config.defaultShell = result.coercedValue;
    } else {
      logger.warn(`Ignoring ${CONFIG_ENV.DEFAULT_SHELL}: ${result.error}`);
    }
  }

  return config;
}
