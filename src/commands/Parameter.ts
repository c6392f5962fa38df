/**
 * Parameters - options and positional arguments of a command
 *
 * A parameter knows how many tokens it consumes (`nargs`), where its
 * completion candidates come from (a fixed choice set, a callback, or
 * nothing) and how to turn parsed tokens into a value for the context.
 */

import { UNBOUNDED_NARGS } from '../config/constants.js';
import { formatError } from '../utils/errorUtils.js';
import type { Context } from './Context.js';
import { BadParameter, MissingParameter, UsageError } from './errors.js';
import type { Choice, CompletionCallback, RawValue, ValueConverter } from './types.js';

export interface ParameterOptions {
  /** Tokens consumed per occurrence; -1 for unbounded (arguments only) */
  nargs?: number;
  required?: boolean;
  hidden?: boolean;
  help?: string;
  choices?: readonly Choice[];
  complete?: CompletionCallback;
  convert?: ValueConverter;
  default?: unknown;
  /** Whether the parsed value is stored in `ctx.params` */
  exposeValue?: boolean;
}

export interface OptionOptions extends ParameterOptions {
  /** Consumes no value; implied by an on/off pair such as `--shout/--no-shout` */
  isFlag?: boolean;
  /** May be given more than once; values are collected into a list */
  multiple?: boolean;
}

export abstract class Parameter {
  abstract readonly kind: 'option' | 'argument';
  abstract readonly multiple: boolean;

  readonly name: string;
  readonly nargs: number;
  readonly required: boolean;
  readonly hidden: boolean;
  readonly help: string | undefined;
  readonly choices: readonly Choice[] | undefined;
  readonly complete: CompletionCallback | undefined;
  readonly convert: ValueConverter | undefined;
  readonly defaultValue: unknown;
  readonly exposeValue: boolean;

  protected constructor(name: string, nargs: number, options: ParameterOptions) {
    this.name = name;
    this.nargs = nargs;
    this.required = options.required ?? false;
    this.hidden = options.hidden ?? false;
    this.help = options.help;
    this.choices = options.choices;
    this.complete = options.complete;
    this.convert = options.convert;
    this.defaultValue = options.default;
    this.exposeValue = options.exposeValue ?? true;
  }

  /**
   * Store this parameter's value from the parser output into the context.
   * Usage errors are absorbed (value becomes null) during resilient parsing.
   */
  handleParseResult(ctx: Context, opts: ReadonlyMap<string, RawValue>): unknown {
    let value: unknown;
    try {
      value = this.fullProcessValue(ctx, opts.get(this.name));
    } catch (error) {
      if (!(error instanceof UsageError) || !ctx.resilientParsing) {
        throw error;
      }
      value = null;
    }

    if (this.exposeValue) {
      ctx.params[this.name] = value;
    }
    return value;
  }

  /**
   * Convert, then fall back to the default (never while completing), then
   * enforce `required`
   */
  fullProcessValue(ctx: Context, raw: RawValue | undefined): unknown {
    let value = this.processValue(ctx, raw);

    if (value === null && !ctx.resilientParsing) {
      value = this.defaultValue ?? null;
    }

    if (this.required && this.valueIsMissing(value)) {
      throw new MissingParameter(this.name, ctx);
    }
    return value;
  }

  processValue(ctx: Context, raw: RawValue | undefined): unknown {
    if (raw === undefined || raw === null) {
      return null;
    }
    const depth = (this.nargs !== 1 ? 1 : 0) + (this.multiple ? 1 : 0);
    return this.convertValue(ctx, raw, depth);
  }

  valueIsMissing(value: unknown): boolean {
    if (value === null || value === undefined) {
      return true;
    }
    return (this.nargs !== 1 || this.multiple) && Array.isArray(value) && value.length === 0;
  }

  private convertValue(ctx: Context, raw: RawValue, depth: number): unknown {
    if (typeof raw === 'boolean' || raw === null) {
      return raw;
    }
    if (depth === 0) {
      if (typeof raw !== 'string') {
        throw new BadParameter('expected a single value', ctx, this.name);
      }
      return this.convertToken(ctx, raw);
    }
    if (typeof raw === 'string') {
      throw new BadParameter('expected a group of values', ctx, this.name);
    }
    return raw.map(item => this.convertValue(ctx, item, depth - 1));
  }

  private convertToken(ctx: Context, token: string): unknown {
    if (this.choices) {
      const match = this.choices.find(choice => String(choice) === token);
      if (match === undefined) {
        const allowed = this.choices.map(choice => `'${choice}'`).join(', ');
        throw new BadParameter(`'${token}' is not one of ${allowed}.`, ctx, this.name);
      }
      return match;
    }

    if (this.convert) {
      try {
        return this.convert(token);
      } catch (error) {
        throw new BadParameter(formatError(error), ctx, this.name);
      }
    }
    return token;
  }
}

/**
 * Split an option spelling into its prefix and body: "--foo" -> ["--", "foo"]
 */
export function splitOpt(opt: string): [prefix: string, body: string] {
  const first = opt.charAt(0);
  if (/[A-Za-z0-9]/.test(first)) {
    return ['', opt];
  }
  if (opt.charAt(1) === first) {
    return [first + first, opt.slice(2)];
  }
  return [first, opt.slice(1)];
}

function toAttributeName(body: string): string {
  return body.toLowerCase().replace(/[-_]+([a-z0-9])/g, (_match, ch: string) => ch.toUpperCase());
}

/**
 * Parse option declarations such as `['--message', '-m']`,
 * `['--shout/--no-shout']` or `['dest', '--out']` (a bare identifier names
 * the parameter explicitly)
 */
function parseOptionDecls(decls: readonly string[]): {
  name: string;
  opts: string[];
  secondaryOpts: string[];
} {
  let name: string | null = null;
  const opts: string[] = [];
  const secondaryOpts: string[] = [];

  for (const decl of decls) {
    if (/^[A-Za-z_]\w*$/.test(decl)) {
      if (name !== null) {
        throw new TypeError(`Name '${name}' defined twice`);
      }
      name = decl;
      continue;
    }

    const slash = decl.indexOf('/');
    if (slash === -1) {
      opts.push(decl);
      continue;
    }
    const first = decl.slice(0, slash).trimEnd();
    const second = decl.slice(slash + 1).trimStart();
    if (first) {
      opts.push(first);
    }
    if (second) {
      secondaryOpts.push(second);
    }
  }

  if (opts.length === 0) {
    throw new TypeError(`No option spellings declared${name ? ` for '${name}'` : ''}`);
  }

  if (name === null) {
    const [longest] = [...opts].sort((a, b) => splitOpt(b)[0].length - splitOpt(a)[0].length);
    name = longest ? toAttributeName(splitOpt(longest)[1]) : '';
  }
  if (!name) {
    throw new TypeError(`Could not determine a name for option ${decls.join(' ')}`);
  }

  return { name, opts, secondaryOpts };
}

export class Option extends Parameter {
  readonly kind = 'option' as const;
  readonly opts: readonly string[];
  readonly secondaryOpts: readonly string[];
  readonly isFlag: boolean;
  readonly multiple: boolean;

  constructor(decls: readonly string[], options: OptionOptions = {}) {
    const { name, opts, secondaryOpts } = parseOptionDecls(decls);
    const isFlag = options.isFlag ?? secondaryOpts.length > 0;
    super(name, isFlag ? 0 : options.nargs ?? 1, options);

    this.opts = opts;
    this.secondaryOpts = secondaryOpts;
    this.isFlag = isFlag;
    this.multiple = options.multiple ?? false;

    if (this.nargs < 1 && !isFlag) {
      throw new TypeError(`Option '${name}' must take at least one value`);
    }
  }

  get takesValue(): boolean {
    return !this.isFlag;
  }
}

export class Argument extends Parameter {
  readonly kind = 'argument' as const;
  readonly multiple = false;

  constructor(name: string, options: ParameterOptions = {}) {
    const nargs = options.nargs ?? 1;
    super(name, nargs, {
      ...options,
      required: options.required ?? (options.default === undefined && nargs > 0),
    });

    if (nargs === 0 || nargs < UNBOUNDED_NARGS) {
      throw new TypeError(`Argument '${name}' has invalid nargs ${nargs}`);
    }
  }

  get isVariadic(): boolean {
    return this.nargs === UNBOUNDED_NARGS;
  }
}

/**
 * Any parameter a command can declare
 */
export type Param = Option | Argument;
