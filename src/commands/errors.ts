/**
 * Usage errors raised while parsing a command line
 *
 * Every error carries the context being built when it was raised. During
 * resilient parsing none of these escape: the parser and the parameters
 * absorb them and leave the context partially populated.
 */

import type { Context } from './Context.js';

export class UsageError extends Error {
  readonly ctx: Context | null;

  constructor(message: string, ctx: Context | null = null) {
    super(message);
    this.name = 'UsageError';
    this.ctx = ctx;
  }
}

/**
 * An option spelling that no parameter of the command declares
 */
export class NoSuchOption extends UsageError {
  readonly optionName: string;

  constructor(optionName: string, ctx: Context | null = null) {
    super(`No such option: ${optionName}`, ctx);
    this.name = 'NoSuchOption';
    this.optionName = optionName;
  }
}

/**
 * A known option used incorrectly (missing values, value given to a flag)
 */
export class BadOptionUsage extends UsageError {
  readonly optionName: string;

  constructor(optionName: string, message: string, ctx: Context | null = null) {
    super(message, ctx);
    this.name = 'BadOptionUsage';
    this.optionName = optionName;
  }
}

/**
 * Positional values that cannot be distributed over the arguments
 */
export class BadArgumentUsage extends UsageError {
  constructor(message: string, ctx: Context | null = null) {
    super(message, ctx);
    this.name = 'BadArgumentUsage';
  }
}

/**
 * A value rejected by a parameter's choices or converter
 */
export class BadParameter extends UsageError {
  readonly paramName: string | null;

  constructor(message: string, ctx: Context | null = null, paramName: string | null = null) {
    super(paramName ? `Invalid value for '${paramName}': ${message}` : `Invalid value: ${message}`, ctx);
    this.name = 'BadParameter';
    this.paramName = paramName;
  }
}

export class MissingParameter extends UsageError {
  readonly paramName: string;

  constructor(paramName: string, ctx: Context | null = null) {
    super(`Missing parameter: ${paramName}`, ctx);
    this.name = 'MissingParameter';
    this.paramName = paramName;
  }
}
