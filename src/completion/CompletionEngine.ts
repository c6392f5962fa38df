/**
 * CompletionEngine - turns a partial command line into completion candidates
 *
 * Features:
 * - Option name completion for the active command
 * - Option and argument value completion from choices or callbacks
 * - Subcommand name completion, including siblings of chained groups
 * - `--opt=value` handling for shells that split words at "="
 */

import { isGroup } from '../commands/Command.js';
import type { CommandNode } from '../commands/Command.js';
import type { Context } from '../commands/Context.js';
import type { Argument, Option, Param } from '../commands/Parameter.js';
import type { CompletionValue } from '../commands/types.js';
import { CANDIDATE_TYPES, END_OF_OPTIONS, WORDBREAK } from '../config/constants.js';
import { logger } from '../services/Logger.js';
import { resolveContext } from './ContextResolver.js';
import { isArgumentAwaitingValue, isOptionAwaitingValue, startsOption } from './primitives.js';

/**
 * Candidate kinds understood by the shell scripts. Only 'none' (plain
 * value) is produced; 'dir' and 'file' are reserved for path completion.
 */
export type CandidateType = (typeof CANDIDATE_TYPES)[keyof typeof CANDIDATE_TYPES];

export interface Candidate {
  type: CandidateType;
  value: string;
  description?: string;
}

interface PartialValueBase {
  ctx: Context;
  /** Completed tokens, extended with the option part of an `--opt=` token */
  args: string[];
  incomplete: string;
}

/**
 * What the token under the cursor completes
 */
export type PartialValue = PartialValueBase &
  (
    | { kind: 'optionName' }
    | { kind: 'optionValue'; param: Option }
    | { kind: 'argumentValue'; param: Argument }
    | { kind: 'commandName' }
  );

/**
 * Split `--opt=val` under the cursor into a completed `--opt` token and the
 * incomplete `val`. A lone "=" becomes an empty incomplete token.
 */
export function splitWordBreak(
  args: readonly string[],
  incomplete: string
): { args: string[]; incomplete: string } {
  const eq = incomplete.indexOf(WORDBREAK);
  if (startsOption(incomplete) && eq !== -1) {
    return {
      args: [...args, incomplete.slice(0, eq)],
      incomplete: incomplete.slice(eq + 1),
    };
  }
  if (incomplete === WORDBREAK) {
    return { args: [...args], incomplete: '' };
  }
  return { args: [...args], incomplete };
}

/**
 * Classify the incomplete token against an already resolved context.
 * Priority: option names, then an open option, then an open argument,
 * then subcommand names.
 */
export function resolvePartialValue(ctx: Context, args: readonly string[], incomplete: string): PartialValue {
  const hasDoubleDash = args.includes(END_OF_OPTIONS);
  const normalized = splitWordBreak(args, incomplete);
  const base = { ctx, args: normalized.args, incomplete: normalized.incomplete };

  if (!hasDoubleDash && startsOption(normalized.incomplete)) {
    return { ...base, kind: 'optionName' };
  }

  const params = ctx.command.getParams(ctx);

  for (const param of params) {
    if (param.kind === 'option' && isOptionAwaitingValue(normalized.args, param)) {
      return { ...base, kind: 'optionValue', param };
    }
  }

  for (const param of params) {
    if (param.kind === 'argument' && isArgumentAwaitingValue(ctx.params, param)) {
      return { ...base, kind: 'argumentValue', param };
    }
  }

  return { ...base, kind: 'commandName' };
}

/**
 * Completion candidates for the token under the cursor.
 *
 * @param cli - Root of the command tree
 * @param progName - Name the program was invoked as
 * @param args - Completed tokens after the program name
 * @param incomplete - Partial token under the cursor (may be empty)
 */
export function getCompletions(
  cli: CommandNode,
  progName: string,
  args: readonly string[],
  incomplete: string
): Candidate[] {
  const normalized = splitWordBreak(args, incomplete);
  const ctx = resolveContext(cli, progName, normalized.args);
  const partial = resolvePartialValue(ctx, args, incomplete);

  logger.debug(`[COMPLETION] Completing ${partial.kind} '${partial.incomplete}' in ${ctx.commandPath}`);

  switch (partial.kind) {
    case 'optionName':
      return optionNameCandidates(ctx, partial.args, partial.incomplete);
    case 'optionValue':
    case 'argumentValue':
      return valueCandidates(ctx, partial.param, partial.args, partial.incomplete);
    case 'commandName':
      return commandNameCandidates(ctx, partial.incomplete);
  }
}

/**
 * Visible option spellings starting with `incomplete`. A spelling already
 * on the line is offered again only for repeatable options.
 */
function optionNameCandidates(ctx: Context, allArgs: readonly string[], incomplete: string): Candidate[] {
  const candidates: Candidate[] = [];

  for (const param of ctx.command.getParams(ctx)) {
    if (param.kind !== 'option' || param.hidden) {
      continue;
    }

    for (const spelling of [...param.opts, ...param.secondaryOpts]) {
      if (!spelling.startsWith(incomplete)) {
        continue;
      }
      if (!param.multiple && allArgs.includes(spelling)) {
        continue;
      }
      candidates.push({ type: CANDIDATE_TYPES.NONE, value: spelling, description: param.help });
    }
  }

  return candidates;
}

function toCandidate(item: CompletionValue): Candidate {
  if (typeof item === 'string') {
    return { type: CANDIDATE_TYPES.NONE, value: item };
  }
  const [value, description] = item;
  return { type: CANDIDATE_TYPES.NONE, value, description };
}

/**
 * Values for an option or argument, in the order their source yields them
 */
export function valueCandidates(
  ctx: Context,
  param: Param,
  allArgs: readonly string[],
  incomplete: string
): Candidate[] {
  if (param.choices) {
    return param.choices
      .map(choice => String(choice))
      .filter(choice => choice.startsWith(incomplete))
      .map(value => ({ type: CANDIDATE_TYPES.NONE, value }));
  }

  if (param.complete) {
    return Array.from(param.complete(ctx, allArgs, incomplete), toCandidate);
  }

  return [];
}

/**
 * Visible subcommands of the active group and of every chained ancestor,
 * minus the links each ancestor has already consumed, sorted by name
 */
function commandNameCandidates(ctx: Context, incomplete: string): Candidate[] {
  const found = new Map<string, Candidate>();

  const collect = (groupCtx: Context, consumed: readonly string[]): void => {
    const command = groupCtx.command;
    if (!isGroup(command)) {
      return;
    }

    for (const name of command.listCommands(groupCtx)) {
      if (!name.startsWith(incomplete) || found.has(name) || consumed.includes(name)) {
        continue;
      }
      const sub = command.getCommand(groupCtx, name);
      if (!sub || sub.hidden) {
        continue;
      }
      found.set(name, { type: CANDIDATE_TYPES.NONE, value: name, description: sub.getShortHelp() });
    }
  };

  // Chained ancestors skip the links already on the line
  for (const groupCtx of ctx.lineage()) {
    if (groupCtx === ctx) {
      collect(groupCtx, []);
    } else if (isGroup(groupCtx.command) && groupCtx.command.chain) {
      collect(groupCtx, groupCtx.protectedArgs);
    }
  }

  return [...found.values()].sort((a, b) => (a.value < b.value ? -1 : a.value > b.value ? 1 : 0));
}
