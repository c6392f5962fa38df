/**
 * String manipulation utilities
 */

import { parse } from 'shell-quote';
import { SHORT_HELP_LIMIT } from '../config/constants.js';

/**
 * Derive a one-line summary from help text: words are taken up to and
 * including the first one ending in ".", and "..." replaces whatever would
 * push the summary past `maxLength`.
 */
export function makeDefaultShortHelp(help: string, maxLength: number = SHORT_HELP_LIMIT): string {
  const words = help.split(/\s+/).filter(Boolean);
  let result = '';
  let totalLength = 0;

  for (const word of words) {
    const newLength = result ? word.length + 1 : word.length;
    if (totalLength + newLength > maxLength) {
      return `${result}...`;
    }

    result = result ? `${result} ${word}` : word;
    if (word.endsWith('.')) {
      return result;
    }
    totalLength += newLength;
  }

  return result;
}

/**
 * Split a command line into words the way a POSIX shell would, without
 * expanding variables or globs
 */
export function splitShellWords(line: string): string[] {
  const entries = parse(line, key => `$${key}`);
  return entries.map(entry => {
    if (typeof entry === 'string') {
      return entry;
    }
    if ('comment' in entry) {
      return `#${entry.comment}`;
    }
    if ('pattern' in entry) {
      return entry.pattern;
    }
    return entry.op;
  });
}
