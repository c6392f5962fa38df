/**
 * Shell adapters and completion entry points
 */

export { ShellComplete, writeStdout } from './ShellComplete.js';
export { BashComplete } from './BashComplete.js';
export { ZshComplete } from './ZshComplete.js';
export { FishComplete } from './FishComplete.js';
export { ShellRegistry, createDefaultRegistry } from './ShellRegistry.js';
export { ShellError } from './ShellError.js';
export type { ShellErrorCode } from './ShellError.js';
export { bashVersionNotUsable, parseBashVersion } from './bashVersion.js';
export { completionFunctionName, fillTemplate, loadTemplate } from './scripts.js';
export type { ScriptVariables, TemplateName } from './scripts.js';
export {
  getCompletionScript,
  handleShellCompletion,
  parseInstruction,
  shellComplete,
} from './dispatch.js';
export type { Instruction, ShellCompletionOptions } from './dispatch.js';
export type { ShellAdapter, ShellAdapterClass, ShellCompleteOptions, ShellEnv } from './types.js';
