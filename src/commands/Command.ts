/**
 * Command - a node of the command tree
 *
 * Leaf commands and groups share parsing through BaseCommand; groups
 * additionally own named subcommands (see Group.ts).
 */

import { HELP_OPTION, SHORT_HELP_LIMIT } from '../config/constants.js';
import { makeDefaultShortHelp } from '../utils/stringUtils.js';
import { Context } from './Context.js';
import { UsageError } from './errors.js';
import type { Group } from './Group.js';
import { OptionParser } from './OptionParser.js';
import { Option } from './Parameter.js';
import type { Param } from './Parameter.js';
import type { MakeContextOptions } from './types.js';

export interface CommandOptions {
  params?: readonly Param[];
  /** Full help text; its first sentence doubles as the short help */
  help?: string;
  /** Overrides the summary derived from `help` */
  shortHelp?: string;
  hidden?: boolean;
  /** Adds `--help`; defaults to true */
  addHelpOption?: boolean;
}

/**
 * Any node of the command tree
 */
export type CommandNode = Command | Group;

export function isGroup(command: CommandNode): command is Group {
  return command.kind === 'group';
}

export abstract class BaseCommand {
  abstract readonly kind: 'command' | 'group';
  abstract readonly allowExtraArgs: boolean;
  abstract readonly allowInterspersedArgs: boolean;

  readonly name: string;
  readonly params: readonly Param[];
  readonly help: string | undefined;
  readonly hidden: boolean;
  private readonly shortHelp: string | undefined;
  private readonly helpOption: Option | null;

  protected constructor(name: string, options: CommandOptions) {
    this.name = name;
    this.params = options.params ?? [];
    this.help = options.help;
    this.shortHelp = options.shortHelp;
    this.hidden = options.hidden ?? false;
    this.helpOption =
      options.addHelpOption === false
        ? null
        : new Option([HELP_OPTION.FLAG], {
            isFlag: true,
            exposeValue: false,
            help: HELP_OPTION.DESCRIPTION,
          });
  }

  abstract makeContext(infoName: string, args: readonly string[], options?: MakeContextOptions): Context;

  /**
   * Declared parameters followed by the implicit help option
   */
  getParams(_ctx: Context): Param[] {
    return this.helpOption ? [...this.params, this.helpOption] : [...this.params];
  }

  /**
   * Parse this command's own parameters from `args` into `ctx`.
   * Returns the leftover tokens, also stored as `ctx.args`.
   */
  parseArgs(ctx: Context, args: readonly string[]): string[] {
    const parser = this.makeParser(ctx);
    const { opts, largs } = parser.parseArgs(args);

    for (const param of this.getParams(ctx)) {
      param.handleParseResult(ctx, opts);
    }

    if (largs.length > 0 && !ctx.allowExtraArgs && !ctx.resilientParsing) {
      const plural = largs.length === 1 ? '' : 's';
      throw new UsageError(`Got unexpected extra argument${plural} (${largs.join(' ')})`, ctx);
    }

    ctx.args = largs;
    return largs;
  }

  /**
   * One-line summary for listings; empty when there is no help text
   */
  getShortHelp(limit: number = SHORT_HELP_LIMIT): string {
    if (this.shortHelp !== undefined) {
      return this.shortHelp;
    }
    return this.help ? makeDefaultShortHelp(this.help, limit) : '';
  }

  private makeParser(ctx: Context): OptionParser {
    const parser = new OptionParser(ctx);
    for (const param of this.getParams(ctx)) {
      if (param.kind === 'option') {
        parser.addOption(param);
      } else {
        parser.addArgument(param);
      }
    }
    return parser;
  }
}

/**
 * Build a context for `command` and parse `args` into it
 */
export function createContext(
  command: CommandNode,
  infoName: string,
  args: readonly string[],
  options: MakeContextOptions = {}
): Context {
  const ctx = new Context(command, {
    parent: options.parent ?? null,
    infoName,
    resilientParsing: options.resilientParsing ?? false,
    allowExtraArgs: options.allowExtraArgs ?? command.allowExtraArgs,
    allowInterspersedArgs: options.allowInterspersedArgs ?? command.allowInterspersedArgs,
  });
  command.parseArgs(ctx, args);
  return ctx;
}

export class Command extends BaseCommand {
  readonly kind = 'command' as const;
  readonly allowExtraArgs: boolean = false;
  readonly allowInterspersedArgs: boolean = true;

  constructor(name: string, options: CommandOptions = {}) {
    super(name, options);
  }

  makeContext(infoName: string, args: readonly string[], options: MakeContextOptions = {}): Context {
    return createContext(this, infoName, args, options);
  }
}
