/**
 * Shell adapter types
 */

import type { CommandNode } from '../commands/Command.js';
import type { ShellComplete } from './ShellComplete.js';

/**
 * Environment as read by the adapters (a subset of process.env)
 */
export type ShellEnv = Readonly<Record<string, string | undefined>>;

export interface ShellCompleteOptions {
  /** Root of the command tree */
  cli: CommandNode;
  /** Program name the script is registered for */
  progName: string;
  /** Environment variable that triggers completion mode */
  completeVar: string;
  /** Defaults to process.env */
  env?: ShellEnv;
  /** Receives each output line without its newline; defaults to stdout */
  write?: (line: string) => void;
}

/**
 * Contract every shell adapter fulfils
 */
export interface ShellAdapter {
  /**
   * Activation script template with `{complete_func}`, `{script_names}`
   * and `{complete_var}` placeholders
   */
  source(): string;

  /**
   * Read the shell's completion request from the environment, write the
   * candidates and report success
   */
  complete(): boolean;
}

/**
 * Constructor of a registrable adapter
 */
export type ShellAdapterClass = new (options: ShellCompleteOptions) => ShellComplete;
