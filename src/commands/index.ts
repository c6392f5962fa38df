/**
 * Command tree: commands, groups, parameters and the contexts they parse into
 */

export { Command, BaseCommand, createContext, isGroup } from './Command.js';
export type { CommandNode, CommandOptions } from './Command.js';
export { Group } from './Group.js';
export type { GroupOptions, ResolvedCommand } from './Group.js';
export { Context } from './Context.js';
export type { ContextOptions } from './Context.js';
export { Option, Argument, Parameter, splitOpt } from './Parameter.js';
export type { Param, ParameterOptions, OptionOptions } from './Parameter.js';
export { OptionParser, unpackArgs } from './OptionParser.js';
export type { ParseResult } from './OptionParser.js';
export {
  UsageError,
  NoSuchOption,
  BadOptionUsage,
  BadArgumentUsage,
  BadParameter,
  MissingParameter,
} from './errors.js';
export { toInt, toFloat } from './valueTypes.js';
export type {
  Choice,
  CompletionCallback,
  CompletionPair,
  CompletionValue,
  MakeContextOptions,
  RawValue,
  ValueConverter,
} from './types.js';
