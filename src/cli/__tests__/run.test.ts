/**
 * Tests for the cmdcomplete executable
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { runCli } from '../run.js';

describe('runCli', () => {
  let lines: string[];
  const write = (line: string): void => {
    lines.push(line);
  };

  beforeEach(() => {
    lines = [];
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should list the supported shells', () => {
    expect(runCli(['node', 'cmdcomplete', 'shells'], { env: {}, write })).toBe(0);
    expect(lines).toEqual(['bash', 'zsh', 'fish']);
  });

  it('should print the activation script for a program', () => {
    const code = runCli(['node', 'cmdcomplete', 'script', 'my-tool', '--shell', 'zsh'], { env: {}, write });

    expect(code).toBe(0);
    expect(lines).toHaveLength(1);
    expect(lines[0]?.startsWith('#compdef my-tool\n')).toBe(true);
    expect(lines[0]).toContain('_MY_TOOL_COMPLETE="complete_zsh"');
  });

  it('should use a custom trigger variable', () => {
    runCli(['node', 'cmdcomplete', 'script', 'my-tool', '--shell', 'fish', '--complete-var', 'MY_VAR'], {
      env: {},
      write,
    });
    expect(lines[0]).toContain('env MY_VAR=complete_fish');
  });

  it('should print usage without a command', () => {
    expect(runCli(['node', 'cmdcomplete'], { env: {}, write })).toBe(1);
    expect(lines[0]?.startsWith('Usage: cmdcomplete [options] [command]')).toBe(true);
  });

  it('should complete its own command line', () => {
    const env = {
      _CMDCOMPLETE_COMPLETE: 'complete_zsh',
      COMP_WORDS: 'cmdcomplete script x --shell ',
      COMP_CWORD: '4',
    };

    expect(runCli(['node', 'cmdcomplete'], { env, write })).toBe(0);
    expect(lines).toEqual(['bash', '_', 'zsh', '_', 'fish', '_']);
  });

  it('should complete its own subcommands', () => {
    const env = { _CMDCOMPLETE_COMPLETE: 'complete_fish', COMP_WORDS: 'cmdcomplete s', COMP_CWORD: 's' };

    expect(runCli(['node', 'cmdcomplete'], { env, write })).toBe(0);
    expect(lines).toEqual([
      'none,script\tPrint an activation script',
      'none,shells\tList supported shells',
    ]);
  });
});
