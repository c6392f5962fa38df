/**
 * Tests for the completion entry points
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Command } from '../../commands/Command.js';
import { Option } from '../../commands/Parameter.js';
import { LogLevel, logger } from '../../services/Logger.js';
import { getCompletionScript, handleShellCompletion, parseInstruction, shellComplete } from '../dispatch.js';
import type { ShellEnv } from '../types.js';

describe('parseInstruction', () => {
  it('should split at the first underscore', () => {
    expect(parseInstruction('source_zsh')).toEqual({ command: 'source', shell: 'zsh' });
    expect(parseInstruction('complete_fish_x')).toEqual({ command: 'complete', shell: 'fish_x' });
  });

  it('should fall back to the default shell', () => {
    expect(parseInstruction('complete')).toEqual({ command: 'complete', shell: 'bash' });
    expect(parseInstruction('source', 'fish')).toEqual({ command: 'source', shell: 'fish' });
  });
});

describe('getCompletionScript', () => {
  const base = { cli: new Command('foo-bar'), progName: 'foo-bar', completeVar: '_FOO_BAR_COMPLETE' };

  it('should fill the zsh script', () => {
    const script = getCompletionScript(base, 'zsh');

    expect(script.startsWith('#compdef foo-bar\n')).toBe(true);
    expect(script).toContain('(( ! $+commands[foo-bar] )) && return 1');
    expect(script).toContain('_FOO_BAR_COMPLETE="complete_zsh"');
    expect(script.endsWith('compdef _foo_bar_completion foo-bar;')).toBe(true);
  });

  it('should fill the fish script', () => {
    const script = getCompletionScript(base, 'fish');

    expect(script.startsWith('function _foo_bar_completion_complete;')).toBe(true);
    expect(script).toContain('env _FOO_BAR_COMPLETE=complete_fish');
    expect(script.endsWith('"(_foo_bar_completion_complete)";')).toBe(true);
  });
});

describe('shell completion dispatch', () => {
  const cli = new Command('cli', {
    params: [new Option(['--opt1'], { choices: ['opt11', 'opt12'] })],
  });

  let lines: string[];

  function options(env: ShellEnv) {
    return { cli, progName: 'cli', env, write: (line: string) => lines.push(line) };
  }

  beforeEach(() => {
    lines = [];
    logger.clearLogs();
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('shellComplete', () => {
    it('should ignore unknown instructions', () => {
      expect(shellComplete({ ...options({}), completeVar: '_CLI_COMPLETE' }, 'bogus_zsh')).toBe(false);
      expect(lines).toEqual([]);
    });

    it('should write the script for source', () => {
      expect(shellComplete({ ...options({}), completeVar: '_CLI_COMPLETE' }, 'source_zsh')).toBe(true);
      expect(lines).toHaveLength(1);
      expect(lines[0]?.startsWith('#compdef cli')).toBe(true);
    });
  });

  describe('handleShellCompletion', () => {
    it('should return null when the trigger variable is unset', () => {
      expect(handleShellCompletion(options({ COMP_WORDS: 'cli ' }))).toBeNull();
      expect(lines).toEqual([]);
    });

    it('should not read settings during a normal startup', () => {
      const code = handleShellCompletion(
        options({ CMDCOMPLETE_LOG_LEVEL: 'loud', CMDCOMPLETE_DEFAULT_SHELL: 'tcsh' })
      );

      expect(code).toBeNull();
      expect(logger.getLogsAtOrAbove(LogLevel.WARN)).toEqual([]);
    });

    it('should complete for the named shell', () => {
      const code = handleShellCompletion(
        options({ _CLI_COMPLETE: 'complete_zsh', COMP_WORDS: 'cli --opt1 ', COMP_CWORD: '2' })
      );

      expect(code).toBe(0);
      expect(lines).toEqual(['opt11', '_', 'opt12', '_']);
    });

    it('should use the configured default shell', () => {
      handleShellCompletion(
        options({
          _CLI_COMPLETE: 'complete',
          CMDCOMPLETE_DEFAULT_SHELL: 'fish',
          COMP_WORDS: 'cli --opt1 op',
          COMP_CWORD: 'op',
        })
      );
      expect(lines).toEqual(['none,opt11', 'none,opt12']);
    });

    it('should honour a custom trigger variable', () => {
      const code = handleShellCompletion({ ...options({ MY_TRIGGER: 'source_fish' }), completeVar: 'MY_TRIGGER' });

      expect(code).toBe(0);
      expect(lines[0]).toContain('env MY_TRIGGER=complete_fish');
    });

    it('should fail for an unknown instruction', () => {
      expect(handleShellCompletion(options({ _CLI_COMPLETE: 'nonsense' }))).toBe(1);
    });

    it('should report unsupported shells and fail', () => {
      const code = handleShellCompletion(options({ _CLI_COMPLETE: 'source_tcsh' }));

      expect(code).toBe(1);
      expect(lines).toEqual([]);
      expect(logger.getLogsAtOrAbove(LogLevel.WARN).map(entry => entry.message)).toEqual([
        "Unknown shell 'tcsh'; registered shells: bash, zsh, fish",
        'source function needs to be overridden',
      ]);
    });
  });
});
