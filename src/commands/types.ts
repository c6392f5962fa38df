/**
 * Shared types for the command tree and its parameters
 */

import type { Context } from './Context.js';

/**
 * A completion with its description, as yielded by a completion callback
 */
export type CompletionPair = readonly [value: string, description: string | undefined];

/**
 * What a completion callback may yield: a bare value or a described pair
 */
export type CompletionValue = string | CompletionPair;

/**
 * Dynamic value source for a parameter.
 *
 * Receives the resolved context, every completed token on the line and the
 * partial token under the cursor. Must return a finite iterable; a thrown
 * error propagates to whoever asked for completions.
 */
export type CompletionCallback = (
  ctx: Context,
  args: readonly string[],
  incomplete: string
) => Iterable<CompletionValue>;

/**
 * Converts one raw token into a typed value. Throws to reject the token.
 */
export type ValueConverter = (raw: string) => unknown;

/**
 * A member of a fixed choice set
 */
export type Choice = string | number;

/**
 * Raw value produced by the parser for one destination: a token, a flag
 * constant, a group of `nargs` tokens (holes are null), or a list of those
 * for repeatable options.
 */
export type RawValue = string | boolean | null | readonly RawValue[];

/**
 * Options accepted by `makeContext`
 */
export interface MakeContextOptions {
  parent?: Context | null;
  resilientParsing?: boolean;
  /** Defaults to the command's own setting (true for groups) */
  allowExtraArgs?: boolean;
  /** Defaults to the command's own setting (false for groups) */
  allowInterspersedArgs?: boolean;
}
