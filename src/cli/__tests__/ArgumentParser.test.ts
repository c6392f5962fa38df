/**
 * Tests for ArgumentParser
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ArgumentParser } from '../ArgumentParser.js';

describe('ArgumentParser', () => {
  let parser: ArgumentParser;

  beforeEach(() => {
    parser = new ArgumentParser(['bash', 'zsh', 'fish']);
  });

  describe('script', () => {
    it('should parse the program name with the default shell', () => {
      const options = parser.parse(['node', 'cmdcomplete', 'script', 'my-tool']);
      expect(options.action).toEqual({ kind: 'script', program: 'my-tool', shell: 'bash', completeVar: undefined });
    });

    it('should parse --shell', () => {
      const options = parser.parse(['node', 'cmdcomplete', 'script', 'my-tool', '--shell', 'zsh']);
      expect(options.action).toEqual({ kind: 'script', program: 'my-tool', shell: 'zsh', completeVar: undefined });
    });

    it('should parse --complete-var', () => {
      const options = parser.parse(['node', 'cmdcomplete', 'script', 'my-tool', '--complete-var', 'MY_VAR']);
      expect(options.action).toEqual({ kind: 'script', program: 'my-tool', shell: 'bash', completeVar: 'MY_VAR' });
    });
  });

  describe('shells', () => {
    it('should parse the shells command', () => {
      const options = parser.parse(['node', 'cmdcomplete', 'shells']);
      expect(options.action).toEqual({ kind: 'shells' });
    });
  });

  describe('Logging', () => {
    it('should parse --verbose flag', () => {
      const options = parser.parse(['node', 'cmdcomplete', '--verbose', 'shells']);
      expect(options.verbose).toBe(true);
    });

    it('should parse --debug flag', () => {
      const options = parser.parse(['node', 'cmdcomplete', '--debug', 'shells']);
      expect(options.debug).toBe(true);
    });
  });

  describe('Default Values', () => {
    it('should return undefined for unprovided optional flags', () => {
      const options = parser.parse(['node', 'cmdcomplete', 'shells']);
      expect(options.verbose).toBeUndefined();
      expect(options.debug).toBeUndefined();
    });

    it('should report no action without a subcommand', () => {
      const options = parser.parse(['node', 'cmdcomplete']);
      expect(options.action).toEqual({ kind: 'none' });
    });
  });

  describe('Usage', () => {
    it('should describe the program', () => {
      expect(parser.getUsage().startsWith('Usage: cmdcomplete [options] [command]')).toBe(true);
    });
  });
});
