/**
 * Tests for string utilities
 */

import { describe, it, expect } from 'vitest';
import { makeDefaultShortHelp, splitShellWords } from '../stringUtils.js';

describe('makeDefaultShortHelp', () => {
  it('should stop after the first sentence', () => {
    expect(makeDefaultShortHelp('Build things. Then more.')).toBe('Build things.');
  });

  it('should truncate with an ellipsis', () => {
    expect(makeDefaultShortHelp('This command does a great many different things for everyone involved')).toBe(
      'This command does a great many different...'
    );
  });

  it('should honour a custom limit', () => {
    expect(makeDefaultShortHelp('one two three', 7)).toBe('one two...');
  });

  it('should collapse whitespace', () => {
    expect(makeDefaultShortHelp('  spread\n  over   lines  ')).toBe('spread over lines');
  });

  it('should return an empty string for empty help', () => {
    expect(makeDefaultShortHelp('')).toBe('');
  });
});

describe('splitShellWords', () => {
  it('should honour quotes and escapes', () => {
    expect(splitShellWords('cli "a b" c\\ d')).toEqual(['cli', 'a b', 'c d']);
  });

  it('should keep variables unexpanded', () => {
    expect(splitShellWords('cli $HOME')).toEqual(['cli', '$HOME']);
  });

  it('should render operators and comments as words', () => {
    expect(splitShellWords('a | b')).toEqual(['a', '|', 'b']);
    expect(splitShellWords('a #note')).toEqual(['a', '#note']);
  });

  it('should return no words for an empty line', () => {
    expect(splitShellWords('')).toEqual([]);
  });
});
