/**
 * Default runtime settings and their validation
 *
 * These are the settings a program's user can change through the
 * environment (see loadConfig.ts). Internal constants live in constants.ts.
 */

import { DEFAULT_SHELL } from './constants.js';

export const LOG_LEVEL_NAMES = ['error', 'warn', 'info', 'verbose', 'debug'] as const;

export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

export interface CompletionConfig {
  /** Environment variable that switches the program into completion mode */
  completeVar: string;
  /** Shell assumed by instructions that name none */
  defaultShell: string;
  logLevel: LogLevelName;
}

/**
 * Environment variables read by loadConfig
 */
export const CONFIG_ENV = {
  LOG_LEVEL: 'CMDCOMPLETE_LOG_LEVEL',
  DEFAULT_SHELL: 'CMDCOMPLETE_DEFAULT_SHELL',
} as const;

export const DEFAULT_CONFIG: Omit<CompletionConfig, 'completeVar'> = {
  defaultShell: DEFAULT_SHELL,
  logLevel: 'warn',
};

function isLogLevelName(value: string): value is LogLevelName {
  return LOG_LEVEL_NAMES.some(name => name === value);
}

export type ConfigValidation<K extends keyof CompletionConfig> =
  | { valid: true; coercedValue: CompletionConfig[K] }
  | { valid: false; error: string };

/**
 * Validate and coerce a raw (string) setting
 */
export function validateConfigValue<K extends keyof CompletionConfig>(
  key: K,
  value: string
): ConfigValidation<K>;
export function validateConfigValue(
  key: keyof CompletionConfig,
  value: string
): ConfigValidation<keyof CompletionConfig> {
  const trimmed = value.trim();

  switch (key) {
    case 'logLevel': {
      const lowerValue = trimmed.toLowerCase();
      if (isLogLevelName(lowerValue)) {
        return { valid: true, coercedValue: lowerValue };
      }
      return { valid: false, error: `logLevel must be one of: ${LOG_LEVEL_NAMES.join(', ')}` };
    }

    case 'defaultShell':
    case 'completeVar':
      if (/^[A-Za-z_][A-Za-z0-9_]*$/.test(trimmed)) {
        return { valid: true, coercedValue: trimmed };
      }
      return { valid: false, error: `${key} must be a plain identifier, got '${value}'` };
  }
}
