/**
 * Context - one activation of a command against a slice of the command line
 *
 * Contexts form a singly linked chain from the innermost command back to
 * the root through `parent`. A chain lives for a single parse or
 * completion request and is never mutated once the parse that built it
 * has finished.
 */

import type { CommandNode } from './Command.js';

export interface ContextOptions {
  parent: Context | null;
  infoName: string;
  resilientParsing: boolean;
  allowExtraArgs: boolean;
  allowInterspersedArgs: boolean;
}

export class Context {
  readonly command: CommandNode;
  readonly parent: Context | null;
  /** Name the command was invoked under (program name for the root) */
  readonly infoName: string;
  readonly resilientParsing: boolean;
  readonly allowExtraArgs: boolean;
  readonly allowInterspersedArgs: boolean;

  /** Parsed values keyed by parameter name; null when nothing was parsed */
  params: Record<string, unknown> = {};

  /** Leftover tokens not consumed by this command's parameters */
  args: string[] = [];

  /**
   * Tokens reserved for subcommands: the subcommand name (and for chained
   * groups, everything after it)
   */
  protectedArgs: string[] = [];

  constructor(command: CommandNode, options: ContextOptions) {
    this.command = command;
    this.parent = options.parent;
    this.infoName = options.infoName;
    this.resilientParsing = options.resilientParsing;
    this.allowExtraArgs = options.allowExtraArgs;
    this.allowInterspersedArgs = options.allowInterspersedArgs;
  }

  /**
   * Space separated invocation path from the root, e.g. "cli sub leaf"
   */
  get commandPath(): string {
    return this.parent ? `${this.parent.commandPath} ${this.infoName}` : this.infoName;
  }

  /**
   * Walk from this context up to the root
   */
  *lineage(): Generator<Context> {
    let current: Context | null = this;
    while (current) {
      yield current;
      current = current.parent;
    }
  }
}
