/**
 * OptionParser - splits a token list into option values and positionals
 *
 * Tokens are scanned left to right. Long options match on their exact
 * spelling (with an optional `=value`), short options may be clustered
 * (`-abc`) and may carry their value attached (`-mfoo`). A bare `--` ends
 * option processing. Remaining positionals are distributed over the
 * declared arguments by `nargs`, with at most one unbounded argument.
 */

import { END_OF_OPTIONS, OPTION_PREFIXES } from '../config/constants.js';
import type { Context } from './Context.js';
import { BadArgumentUsage, BadOptionUsage, NoSuchOption, UsageError } from './errors.js';
import { splitOpt } from './Parameter.js';
import type { Argument, Option } from './Parameter.js';
import type { RawValue } from './types.js';

type OptionAction = 'store' | 'storeConst' | 'append' | 'appendConst';

interface ParserOption {
  obj: Option;
  dest: string;
  action: OptionAction;
  nargs: number;
  /** Stored for flags: true for primary spellings, false for secondary */
  constValue: boolean;
}

export interface ParseResult {
  opts: Map<string, RawValue>;
  /** Positionals left over once every argument has taken its share */
  largs: string[];
}

class ParsingState {
  readonly opts = new Map<string, RawValue>();
  largs: string[] = [];
  rargs: string[];

  constructor(args: readonly string[]) {
    this.rargs = [...args];
  }
}

function isRawList(value: RawValue | undefined): value is readonly RawValue[] {
  return Array.isArray(value);
}

/**
 * Distribute positionals over argument slots. At most one slot may be
 * unbounded (-1); slots after it are filled from the end of the line.
 * Missing values are null. Returns the values per slot and the leftovers.
 */
export function unpackArgs(
  args: readonly string[],
  nargsSpec: readonly number[]
): [values: RawValue[], rest: string[]] {
  const queue = [...args];
  const spec = [...nargsSpec];
  const values: RawValue[] = [];
  let variadicSlot: number | null = null;

  const take = <T>(items: T[]): T | undefined => (variadicSlot === null ? items.shift() : items.pop());

  while (spec.length > 0) {
    const nargs = take(spec);
    if (nargs === undefined) {
      break;
    }

    if (nargs === 1) {
      values.push(take(queue) ?? null);
    } else if (nargs > 1) {
      const group = Array.from({ length: nargs }, () => take(queue) ?? null);
      if (variadicSlot !== null) {
        group.reverse();
      }
      values.push(group);
    } else if (nargs < 0) {
      if (variadicSlot !== null) {
        throw new TypeError('Cannot have two unbounded arguments');
      }
      variadicSlot = values.length;
      values.push(null);
    }
  }

  if (variadicSlot !== null) {
    values[variadicSlot] = queue.splice(0);
    const tail = values.splice(variadicSlot + 1).reverse();
    values.push(...tail);
  }

  return [values, queue];
}

export class OptionParser {
  private readonly longOpts = new Map<string, ParserOption>();
  private readonly shortOpts = new Map<string, ParserOption>();
  private readonly args: Argument[] = [];
  private readonly ctx: Context | null;

  /** When false, the first positional stops option processing */
  allowInterspersedArgs: boolean;

  constructor(ctx: Context | null = null) {
    this.ctx = ctx;
    this.allowInterspersedArgs = ctx?.allowInterspersedArgs ?? true;
  }

  addOption(option: Option): void {
    let action: OptionAction;
    if (option.isFlag) {
      action = option.multiple ? 'appendConst' : 'storeConst';
    } else {
      action = option.multiple ? 'append' : 'store';
    }

    const base = { obj: option, dest: option.name, action, nargs: option.nargs };
    this.register(option.opts, { ...base, constValue: true });
    this.register(option.secondaryOpts, { ...base, constValue: false });
  }

  addArgument(argument: Argument): void {
    this.args.push(argument);
  }

  /**
   * Parse the tokens. Usage errors propagate unless the context is
   * resilient, in which case parsing stops and the state so far is kept.
   */
  parseArgs(args: readonly string[]): ParseResult {
    const state = new ParsingState(args);
    try {
      this.processArgsForOptions(state);
      this.processArgsForArgs(state);
    } catch (error) {
      if (!(error instanceof UsageError) || !this.ctx?.resilientParsing) {
        throw error;
      }
    }
    return { opts: state.opts, largs: state.largs };
  }

  private register(spellings: readonly string[], record: ParserOption): void {
    for (const opt of spellings) {
      const [prefix, body] = splitOpt(opt);
      if (prefix.length === 1 && body.length === 1) {
        this.shortOpts.set(opt, record);
      } else {
        this.longOpts.set(opt, record);
      }
    }
  }

  private processArgsForArgs(state: ParsingState): void {
    const [values, rest] = unpackArgs(
      [...state.largs, ...state.rargs],
      this.args.map(argument => argument.nargs)
    );

    this.args.forEach((argument, index) => {
      this.processArgument(argument, values[index] ?? null, state);
    });

    state.largs = rest;
    state.rargs = [];
  }

  private processArgument(argument: Argument, value: RawValue, state: ParsingState): void {
    let stored = value;
    if (argument.nargs > 1 && isRawList(value)) {
      const holes = value.filter(item => item === null).length;
      if (holes === value.length) {
        stored = null;
      } else if (holes !== 0) {
        throw new BadArgumentUsage(
          `Argument '${argument.name}' takes ${argument.nargs} values.`,
          this.ctx
        );
      }
    }

    state.opts.set(argument.name, stored);
  }

  private processArgsForOptions(state: ParsingState): void {
    while (state.rargs.length > 0) {
      const arg = state.rargs.shift();
      if (arg === undefined) {
        return;
      }

      if (arg === END_OF_OPTIONS) {
        return;
      }

      if (arg.length > 1 && OPTION_PREFIXES.has(arg.charAt(0))) {
        this.processOpts(arg, state);
      } else if (this.allowInterspersedArgs) {
        state.largs.push(arg);
      } else {
        state.rargs.unshift(arg);
        return;
      }
    }
  }

  private processOpts(arg: string, state: ParsingState): void {
    let longOpt = arg;
    let explicitValue: string | null = null;

    const eq = arg.indexOf('=');
    if (eq !== -1) {
      longOpt = arg.slice(0, eq);
      explicitValue = arg.slice(eq + 1);
    }

    try {
      this.matchLongOpt(longOpt, explicitValue, state);
    } catch (error) {
      // "-abc" may still be a cluster of short options; "--abc" may not
      if (!(error instanceof NoSuchOption) || OPTION_PREFIXES.has(arg.slice(0, 2))) {
        throw error;
      }
      this.matchShortOpt(arg, state);
    }
  }

  private matchLongOpt(opt: string, explicitValue: string | null, state: ParsingState): void {
    const option = this.longOpts.get(opt);
    if (!option) {
      throw new NoSuchOption(opt, this.ctx);
    }

    let value: RawValue = null;
    if (option.obj.takesValue) {
      if (explicitValue !== null) {
        state.rargs.unshift(explicitValue);
      }
      value = this.getValueFromState(opt, option, state);
    } else if (explicitValue !== null) {
      throw new BadOptionUsage(opt, `Option '${opt}' does not take a value.`, this.ctx);
    }

    this.processOption(option, value, state);
  }

  private matchShortOpt(arg: string, state: ParsingState): void {
    const prefix = arg.charAt(0);
    let index = 1;

    for (const ch of arg.slice(1)) {
      const opt = `${prefix}${ch}`;
      const option = this.shortOpts.get(opt);
      index += 1;

      if (!option) {
        throw new NoSuchOption(opt, this.ctx);
      }

      let value: RawValue = null;
      let stop = false;
      if (option.obj.takesValue) {
        // The rest of the cluster is this option's value
        if (index < arg.length) {
          state.rargs.unshift(arg.slice(index));
          stop = true;
        }
        value = this.getValueFromState(opt, option, state);
      }

      this.processOption(option, value, state);
      if (stop) {
        return;
      }
    }
  }

  private getValueFromState(name: string, option: ParserOption, state: ParsingState): RawValue {
    const { nargs } = option;
    if (state.rargs.length < nargs) {
      const wanted = nargs === 1 ? 'an argument' : `${nargs} arguments`;
      throw new BadOptionUsage(name, `Option '${name}' requires ${wanted}.`, this.ctx);
    }

    const taken = state.rargs.splice(0, nargs);
    if (nargs === 1) {
      return taken[0] ?? null;
    }
    return taken;
  }

  private processOption(option: ParserOption, value: RawValue, state: ParsingState): void {
    const previous = state.opts.get(option.dest);
    const collected = isRawList(previous) ? previous : [];

    switch (option.action) {
      case 'store':
        state.opts.set(option.dest, value);
        break;
      case 'storeConst':
        state.opts.set(option.dest, option.constValue);
        break;
      case 'append':
        state.opts.set(option.dest, [...collected, value]);
        break;
      case 'appendConst':
        state.opts.set(option.dest, [...collected, option.constValue]);
        break;
    }
  }
}
