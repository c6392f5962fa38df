/**
 * Configuration module exports
 *
 * Centralized export point for all configuration-related components
 */

export { DEFAULT_CONFIG, CONFIG_ENV, LOG_LEVEL_NAMES, validateConfigValue } from './defaults.js';
export type { CompletionConfig, ConfigValidation, LogLevelName } from './defaults.js';
export { getCompleteVar, loadConfig } from './loadConfig.js';
