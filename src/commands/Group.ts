/**
 * Group - a command that dispatches to named subcommands
 *
 * A group parses its own options, then reserves the remaining tokens for
 * its subcommands in `ctx.protectedArgs`. A chained group accepts a
 * sequence of subcommands (`cli a --x b c`); a plain group accepts one.
 */

import { BaseCommand, createContext, isGroup } from './Command.js';
import type { CommandNode, CommandOptions } from './Command.js';
import type { Context } from './Context.js';
import { UsageError } from './errors.js';
import type { MakeContextOptions } from './types.js';

export interface GroupOptions extends CommandOptions {
  chain?: boolean;
  commands?: readonly CommandNode[];
}

export interface ResolvedCommand {
  name: string | null;
  command: CommandNode | null;
  /** Tokens after the subcommand name */
  rest: string[];
}

export class Group extends BaseCommand {
  readonly kind = 'group' as const;
  readonly allowExtraArgs: boolean = true;
  readonly allowInterspersedArgs: boolean = false;
  readonly chain: boolean;

  private readonly commands = new Map<string, CommandNode>();

  constructor(name: string, options: GroupOptions = {}) {
    super(name, options);
    this.chain = options.chain ?? false;

    for (const command of options.commands ?? []) {
      this.addCommand(command);
    }
  }

  /**
   * Register a subcommand under `name` (its own name by default)
   */
  addCommand(command: CommandNode, name: string = command.name): this {
    if (this.chain && isGroup(command)) {
      throw new TypeError(
        `Cannot add group '${name}' to chained group '${this.name}': chained groups only take plain commands`
      );
    }
    this.commands.set(name, command);
    return this;
  }

  /**
   * Registered subcommand names, sorted
   */
  listCommands(_ctx: Context): string[] {
    return [...this.commands.keys()].sort();
  }

  getCommand(_ctx: Context, name: string): CommandNode | undefined {
    return this.commands.get(name);
  }

  makeContext(infoName: string, args: readonly string[], options: MakeContextOptions = {}): Context {
    return createContext(this, infoName, args, options);
  }

  parseArgs(ctx: Context, args: readonly string[]): string[] {
    const rest = super.parseArgs(ctx, args);

    if (this.chain) {
      ctx.protectedArgs = rest;
      ctx.args = [];
    } else if (rest.length > 0) {
      ctx.protectedArgs = rest.slice(0, 1);
      ctx.args = rest.slice(1);
    }
    return ctx.args;
  }

  /**
   * Look up the subcommand named by the first token. An unknown name is a
   * usage error, except during resilient parsing where it yields nulls.
   */
  resolveCommand(ctx: Context, args: readonly string[]): ResolvedCommand {
    const [name, ...rest] = args;
    if (name === undefined) {
      return { name: null, command: null, rest: [] };
    }

    const command = this.getCommand(ctx, name);
    if (!command) {
      if (!ctx.resilientParsing) {
        throw new UsageError(`No such command '${name}'.`, ctx);
      }
      return { name: null, command: null, rest };
    }
    return { name: command.name, command, rest };
  }
}
