/**
 * ContextResolver - walks a partial command line down the command tree
 *
 * Every context is built with resilient parsing, so an unfinished line
 * never fails: the walk simply stops at the deepest command it can reach.
 */

import { isGroup } from '../commands/Command.js';
import type { CommandNode } from '../commands/Command.js';
import type { Context } from '../commands/Context.js';
import { logger } from '../services/Logger.js';

/**
 * Resolve the innermost active context for `args` (completed tokens only)
 */
export function resolveContext(cli: CommandNode, progName: string, args: readonly string[]): Context {
  let ctx = cli.makeContext(progName, args, { resilientParsing: true });
  let remaining = [...ctx.protectedArgs, ...ctx.args];

  while (remaining.length > 0) {
    const command = ctx.command;
    if (!isGroup(command)) {
      break;
    }

    if (!command.chain) {
      const resolved = command.resolveCommand(ctx, remaining);
      if (!resolved.command || resolved.name === null) {
        logger.debug(`[COMPLETION] No subcommand '${remaining[0]}' under ${ctx.commandPath}`);
        return ctx;
      }

      ctx = resolved.command.makeContext(resolved.name, resolved.rest, {
        parent: ctx,
        resilientParsing: true,
      });
      remaining = [...ctx.protectedArgs, ...ctx.args];
      continue;
    }

    // Chained: each subcommand hands its leftovers to the next one
    let last: Context | null = null;
    while (remaining.length > 0) {
      const resolved = command.resolveCommand(ctx, remaining);
      if (!resolved.command || resolved.name === null) {
        logger.debug(`[COMPLETION] No chained subcommand '${remaining[0]}' under ${ctx.commandPath}`);
        return ctx;
      }

      last = resolved.command.makeContext(resolved.name, resolved.rest, {
        parent: ctx,
        allowExtraArgs: true,
        allowInterspersedArgs: false,
        resilientParsing: true,
      });
      remaining = last.args;
    }

    if (!last) {
      break;
    }
    ctx = last;
    remaining = [...last.protectedArgs, ...last.args];
  }

  logger.debug(`[COMPLETION] Resolved context: ${ctx.commandPath}`);
  return ctx;
}
