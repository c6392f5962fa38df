/**
 * ArgumentParser - command-line parsing for the cmdcomplete executable
 */

import { Command, Option } from 'commander';
import { DEFAULT_SHELL } from '../config/constants.js';

export const CLI_NAME = 'cmdcomplete';
export const CLI_VERSION = '1.0.0';

/**
 * What the invocation asked for
 */
export type CLIAction =
  | { kind: 'script'; program: string; shell: string; completeVar?: string }
  | { kind: 'shells' }
  | { kind: 'none' };

export interface CLIOptions {
  // Logging
  verbose?: boolean;
  debug?: boolean;

  action: CLIAction;
}

/**
 * ArgumentParser class
 *
 * Wraps a commander program; subcommand handlers only record the requested
 * action, which the caller then carries out.
 */
export class ArgumentParser {
  private program: Command;
  private action: CLIAction = { kind: 'none' };

  /**
   * @param shells - Shell names accepted by `script --shell`
   */
  constructor(shells: readonly string[]) {
    this.program = new Command();
    this.setupArguments(shells);
  }

  private setupArguments(shells: readonly string[]): void {
    this.program
      .name(CLI_NAME)
      .description('Shell completion scripts for command-line programs')
      .version(CLI_VERSION);

    // Logging
    this.program
      .option('--verbose', 'Enable verbose logging on stderr')
      .option('--debug', 'Enable debug logging on stderr')
      .action(() => {
        this.action = { kind: 'none' };
      });

    this.program
      .command('script')
      .summary('Print an activation script')
      .description('Print the completion activation script for a program')
      .argument('<program>', 'Name the program is invoked as')
      .addOption(
        new Option('--shell <shell>', 'Shell to generate the script for')
          .choices([...shells])
          .default(DEFAULT_SHELL)
      )
      .option('--complete-var <name>', 'Environment variable that triggers completion')
      .action((program: string, opts: { shell: string; completeVar?: string }) => {
        this.action = { kind: 'script', program, shell: opts.shell, completeVar: opts.completeVar };
      });

    this.program
      .command('shells')
      .summary('List supported shells')
      .description('List the shells completion scripts can be generated for')
      .action(() => {
        this.action = { kind: 'shells' };
      });
  }

  /**
   * Parse command-line arguments
   *
   * @param argv - Process arguments (defaults to process.argv)
   * @returns Parsed CLI options
   */
  parse(argv: string[] = process.argv): CLIOptions {
    this.program.parse(argv);
    const opts = this.program.opts<{ verbose?: boolean; debug?: boolean }>();

    return {
      verbose: opts.verbose,
      debug: opts.debug,
      action: this.action,
    };
  }

  /**
   * The underlying commander program (used to complete this CLI itself)
   */
  getProgram(): Command {
    return this.program;
  }

  /**
   * Get usage information
   */
  getUsage(): string {
    return this.program.helpInformation();
  }
}
