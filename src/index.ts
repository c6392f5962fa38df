/**
 * cmdcomplete - shell completion for command trees
 *
 * A program declares its commands (directly or through commander), then
 * calls `handleShellCompletion` at startup; the activation script printed
 * by `getCompletionScript` makes the shell call back into it.
 */

export * from './commands/index.js';
export {
  getCompletions,
  resolvePartialValue,
  splitWordBreak,
  valueCandidates,
  type Candidate,
  type CandidateType,
  type PartialValue,
} from './completion/CompletionEngine.js';
export { resolveContext } from './completion/ContextResolver.js';
export { isArgumentAwaitingValue, isOptionAwaitingValue, startsOption } from './completion/primitives.js';
export * from './shells/index.js';
export { fromCommander } from './integrations/commander.js';
export * from './config/index.js';
export { logger, Logger, LogLevel } from './services/Logger.js';
export { formatError } from './utils/errorUtils.js';
