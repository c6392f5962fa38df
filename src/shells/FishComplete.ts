/**
 * FishComplete - fish adapter
 *
 * Fish exports the token under the cursor itself as COMP_CWORD, and a
 * partially typed token also shows up as the last word of COMP_WORDS.
 *
 * Output protocol: `<type>,<value>` with `\t<description>` appended when
 * there is one.
 */

import { COMPLETION_ENV } from '../config/constants.js';
import { loadTemplate } from './scripts.js';
import { ShellComplete } from './ShellComplete.js';

export class FishComplete extends ShellComplete {
  source(): string {
    return loadTemplate('fish.fish');
  }

  complete(): boolean {
    const args = this.readWords().slice(1);
    const incomplete = this.env[COMPLETION_ENV.CWORD] ?? '';

    if (incomplete && args[args.length - 1] === incomplete) {
      args.pop();
    }

    for (const candidate of this.getCompletions(args, incomplete)) {
      const line = `${candidate.type},${candidate.value}`;
      this.write(candidate.description ? `${line}\t${candidate.description}` : line);
    }
    return true;
  }
}
