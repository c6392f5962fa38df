/**
 * Completion entry points for programs
 *
 * A program built on the command tree calls `handleShellCompletion` at
 * startup. When the shell's activation script invokes it with the trigger
 * variable set, it prints either the script itself (`source`) or the
 * candidates for the current line (`complete`) instead of running normally.
 */

import { getCompleteVar, loadConfig } from '../config/loadConfig.js';
import { DEFAULT_SHELL } from '../config/constants.js';
import { logger } from '../services/Logger.js';
import { completionFunctionName, fillTemplate } from './scripts.js';
import { writeStdout } from './ShellComplete.js';
import { ShellError } from './ShellError.js';
import { createDefaultRegistry } from './ShellRegistry.js';
import type { ShellRegistry } from './ShellRegistry.js';
import type { ShellCompleteOptions } from './types.js';

export interface ShellCompletionOptions extends ShellCompleteOptions {
  /** Defaults to a registry of the built-in shells */
  registry?: ShellRegistry;
  /** Shell for instructions without a `_<shell>` suffix */
  defaultShell?: string;
}

export interface Instruction {
  command: string;
  shell: string;
}

/**
 * Split `<command>` or `<command>_<shell>` at the first underscore
 */
export function parseInstruction(instruction: string, defaultShell: string = DEFAULT_SHELL): Instruction {
  const separator = instruction.indexOf('_');
  if (separator === -1) {
    return { command: instruction, shell: defaultShell };
  }
  return {
    command: instruction.slice(0, separator),
    shell: instruction.slice(separator + 1),
  };
}

/**
 * Activation script for `shell`, with the function name, program name and
 * trigger variable filled in
 */
export function getCompletionScript(options: ShellCompletionOptions, shell: string): string {
  const registry = options.registry ?? createDefaultRegistry();
  const Adapter = registry.get(shell);
  const adapter = new Adapter(options);

  return fillTemplate(adapter.source(), {
    completeFunc: completionFunctionName(options.progName),
    scriptNames: options.progName,
    completeVar: options.completeVar,
  });
}

/**
 * Carry out a trigger instruction. Returns false, writing nothing, for an
 * instruction that is neither `source` nor `complete`.
 */
export function shellComplete(options: ShellCompletionOptions, instruction: string): boolean {
  const { command, shell } = parseInstruction(instruction, options.defaultShell);
  const registry = options.registry ?? createDefaultRegistry();

  if (command !== 'source' && command !== 'complete') {
    logger.debug(`[SHELL] Ignoring unknown instruction '${instruction}'`);
    return false;
  }

  if (!registry.has(shell)) {
    logger.warn(`Unknown shell '${shell}'; registered shells: ${registry.names().join(', ')}`);
  }

  if (command === 'source') {
    const write = options.write ?? writeStdout;
    write(getCompletionScript({ ...options, registry }, shell));
    return true;
  }

  const Adapter = registry.get(shell);
  logger.debug(`[SHELL] Completing for ${shell} with ${Adapter.name}`);
  return new Adapter(options).complete();
}

/**
 * Run completion if the program was started by an activation script.
 *
 * @returns null when the trigger variable is unset (run the program
 *   normally), otherwise the exit code the program should exit with
 */
export function handleShellCompletion(
  options: Omit<ShellCompletionOptions, 'completeVar'> & { completeVar?: string }
): number | null {
  const env = options.env ?? process.env;
  const completeVar = options.completeVar ?? getCompleteVar(options.progName);

  const instruction = env[completeVar];
  if (!instruction) {
    return null;
  }

  const config = loadConfig(options.progName, env);
  logger.setLevelFromName(config.logLevel);
  logger.debug(`[SHELL] ${completeVar}=${instruction}`);

  try {
    const handled = shellComplete(
      { ...options, env, completeVar, defaultShell: options.defaultShell ?? config.defaultShell },
      instruction
    );
    return handled ? 0 : 1;
  } catch (error) {
    if (error instanceof ShellError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }
}
