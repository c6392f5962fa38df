/**
 * CLI Module Exports
 */

export { ArgumentParser, CLI_NAME, CLI_VERSION, type CLIAction, type CLIOptions } from './ArgumentParser.js';
export { runCli, type RunOptions } from './run.js';
