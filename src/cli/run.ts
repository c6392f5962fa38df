/**
 * Runs the cmdcomplete executable: answers completion requests for itself,
 * then carries out the parsed subcommand
 */

import { Command } from '../commands/Command.js';
import { getCompleteVar } from '../config/loadConfig.js';
import { fromCommander } from '../integrations/commander.js';
import { logger } from '../services/Logger.js';
import { getCompletionScript, handleShellCompletion } from '../shells/dispatch.js';
import { writeStdout } from '../shells/ShellComplete.js';
import { ShellError } from '../shells/ShellError.js';
import { createDefaultRegistry } from '../shells/ShellRegistry.js';
import type { ShellEnv } from '../shells/types.js';
import { ArgumentParser, CLI_NAME } from './ArgumentParser.js';

export interface RunOptions {
  env?: ShellEnv;
  write?: (line: string) => void;
}

/**
 * @returns Process exit code
 */
export function runCli(argv: string[], options: RunOptions = {}): number {
  const env = options.env ?? process.env;
  const write = options.write ?? writeStdout;
  const registry = createDefaultRegistry();
  const parser = new ArgumentParser(registry.names());

  const completion = handleShellCompletion({
    cli: fromCommander(parser.getProgram()),
    progName: CLI_NAME,
    env,
    write,
    registry,
  });
  if (completion !== null) {
    return completion;
  }

  const cliOptions = parser.parse(argv);
  logger.configure(cliOptions);
  const { action } = cliOptions;

  switch (action.kind) {
    case 'script':
      try {
        write(
          getCompletionScript(
            {
              cli: new Command(action.program),
              progName: action.program,
              completeVar: action.completeVar ?? getCompleteVar(action.program),
              env,
              registry,
            },
            action.shell
          )
        );
        return 0;
      } catch (error) {
        if (error instanceof ShellError) {
          logger.error(error.message);
          return 1;
        }
        throw error;
      }

    case 'shells':
      for (const name of registry.names()) {
        write(name);
      }
      return 0;

    case 'none':
      write(parser.getUsage().trimEnd());
      return 1;
  }
}
