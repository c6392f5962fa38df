/**
 * ShellComplete - base class of the shell adapters
 *
 * Holds what every adapter needs (command tree, program name, trigger
 * variable, environment and output sink). `source` and `complete` must be
 * overridden; the base class doubles as the adapter for unknown shells and
 * reports both as not implemented.
 */

import type { CommandNode } from '../commands/Command.js';
import { getCompletions } from '../completion/CompletionEngine.js';
import type { Candidate } from '../completion/CompletionEngine.js';
import { COMPLETION_ENV } from '../config/constants.js';
import { splitShellWords } from '../utils/stringUtils.js';
import { ShellError } from './ShellError.js';
import type { ShellAdapter, ShellCompleteOptions, ShellEnv } from './types.js';

/**
 * Default output sink: one line on stdout
 */
export function writeStdout(line: string): void {
  process.stdout.write(`${line}\n`);
}

export class ShellComplete implements ShellAdapter {
  readonly cli: CommandNode;
  readonly progName: string;
  readonly completeVar: string;
  protected readonly env: ShellEnv;
  protected readonly write: (line: string) => void;

  constructor(options: ShellCompleteOptions) {
    this.cli = options.cli;
    this.progName = options.progName;
    this.completeVar = options.completeVar;
    this.env = options.env ?? process.env;
    this.write = options.write ?? writeStdout;
  }

  source(): string {
    throw new ShellError('NOT_IMPLEMENTED', 'source function needs to be overridden');
  }

  complete(): boolean {
    throw new ShellError('NOT_IMPLEMENTED', 'complete function needs to be overridden');
  }

  /**
   * Words of the line being completed, split with shell quoting rules
   */
  protected readWords(): string[] {
    return splitShellWords(this.env[COMPLETION_ENV.WORDS] ?? '');
  }

  /**
   * Split the line at the cursor index exported by bash and zsh: the words
   * between the program name and the cursor, and the word at the cursor.
   * A missing or unparsable index puts the cursor after the last word.
   */
  protected readCursor(): { args: string[]; incomplete: string } {
    const words = this.readWords();
    const parsed = Number.parseInt(this.env[COMPLETION_ENV.CWORD] ?? '', 10);
    const cword = Number.isNaN(parsed) ? words.length : parsed;

    return {
      args: words.slice(1, cword),
      incomplete: words[cword] ?? '',
    };
  }

  protected getCompletions(args: readonly string[], incomplete: string): Candidate[] {
    return getCompletions(this.cli, this.progName, args, incomplete);
  }
}
