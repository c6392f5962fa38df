/**
 * Token classification used by the completion engine
 */

import { WORDBREAK } from '../config/constants.js';
import type { Param } from '../commands/Parameter.js';

/**
 * Whether a token begins an option spelling ("-x", "--long")
 */
export function startsOption(token: string): boolean {
  return token.startsWith('-');
}

/**
 * Whether `param` is an option that was just opened on the command line and
 * still needs a value.
 *
 * Only the last `nargs` tokens are considered (word-break `=` tokens are
 * skipped). The nearest option-like token in that window decides: the
 * option is awaiting a value iff that token is one of its spellings.
 */
export function isOptionAwaitingValue(allArgs: readonly string[], param: Param): boolean {
  if (param.kind !== 'option' || param.isFlag) {
    return false;
  }

  const tokens = allArgs.filter(arg => arg !== WORDBREAK);
  const window = tokens.slice(Math.max(0, tokens.length - param.nargs)).reverse();
  const nearest = window.find(startsOption);

  return nearest !== undefined && param.opts.includes(nearest);
}

/**
 * Whether `param` is a positional argument that can still take a value,
 * given the values parsed so far
 */
export function isArgumentAwaitingValue(
  params: Readonly<Record<string, unknown>>,
  param: Param
): boolean {
  if (param.kind !== 'argument') {
    return false;
  }

  const value = params[param.name];
  if (value === null || value === undefined) {
    return true;
  }
  if (param.isVariadic) {
    return true;
  }
  return param.nargs > 1 && Array.isArray(value) && value.length < param.nargs;
}
