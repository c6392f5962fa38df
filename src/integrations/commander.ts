/**
 * Commander integration - builds a completion command tree from a
 * commander program
 *
 * Visibility follows commander's own help output: anything its help hides
 * is hidden from completion too, but stays resolvable when typed in full.
 */

import type {
  Argument as CommanderArgument,
  Command as CommanderCommand,
  Help,
  Option as CommanderOption,
} from 'commander';
import { Command } from '../commands/Command.js';
import type { CommandNode } from '../commands/Command.js';
import { Group } from '../commands/Group.js';
import { Argument, Option } from '../commands/Parameter.js';
import type { Param } from '../commands/Parameter.js';
import { UNBOUNDED_NARGS } from '../config/constants.js';

function spellings(option: CommanderOption): string[] {
  return [option.short, option.long].filter((flag): flag is string => Boolean(flag));
}

/**
 * Convert a command's options. A `--no-x` negation is folded into `--x` as
 * its secondary spelling when both are declared.
 */
function convertOptions(command: CommanderCommand, help: Help): Option[] {
  const visible = help.visibleOptions(command);
  const all = [...command.options, ...visible.filter(option => !command.options.includes(option))];
  const negations = new Map<string, CommanderOption>();

  for (const option of all) {
    if (option.negate) {
      negations.set(option.attributeName(), option);
    }
  }

  const folded = new Set<CommanderOption>();
  for (const option of all) {
    const negation = negations.get(option.attributeName());
    if (option.isBoolean() && option.long && negation?.long) {
      folded.add(negation);
    }
  }

  const converted: Option[] = [];
  for (const option of all) {
    if (folded.has(option)) {
      continue;
    }

    const hidden = !visible.includes(option);
    const common = {
      help: option.description || undefined,
      hidden,
      choices: option.argChoices,
      default: option.defaultValue,
    };
    const decls = [option.attributeName(), ...spellings(option)];

    if (option.isBoolean()) {
      const negation = negations.get(option.attributeName());
      if (negation && folded.has(negation)) {
        const flags = decls.filter(decl => decl !== option.long);
        converted.push(new Option([...flags, `${option.long}/${negation.long}`], { ...common, isFlag: true }));
      } else {
        converted.push(new Option(decls, { ...common, isFlag: true }));
      }
    } else if (option.negate) {
      converted.push(new Option(decls, { ...common, isFlag: true }));
    } else {
      converted.push(new Option(decls, { ...common, multiple: option.variadic }));
    }
  }

  return converted;
}

function convertArgument(argument: CommanderArgument): Argument {
  return new Argument(argument.name(), {
    nargs: argument.variadic ? UNBOUNDED_NARGS : 1,
    required: argument.required,
    choices: argument.argChoices,
    help: argument.description || undefined,
    default: argument.defaultValue,
  });
}

function convertCommand(command: CommanderCommand, help: Help, hidden: boolean): CommandNode {
  const params: Param[] = [...convertOptions(command, help), ...command.registeredArguments.map(convertArgument)];
  const options = {
    params,
    help: command.description() || undefined,
    shortHelp: command.summary() || undefined,
    hidden,
    addHelpOption: false,
  };

  const visible = help.visibleCommands(command);
  const subcommands = [...command.commands, ...visible.filter(sub => !command.commands.includes(sub))];
  if (subcommands.length === 0) {
    return new Command(command.name(), options);
  }

  const group = new Group(command.name(), options);
  for (const sub of subcommands) {
    group.addCommand(convertCommand(sub, help, !visible.includes(sub)));
  }
  return group;
}

/**
 * Build the completion tree for a commander program
 */
export function fromCommander(program: CommanderCommand): CommandNode {
  return convertCommand(program, program.createHelp(), false);
}
