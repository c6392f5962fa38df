/**
 * ZshComplete - zsh adapter
 *
 * Output protocol: two lines per candidate, the value then its description
 * ("_" when there is none).
 */

import { ZSH_NO_DESCRIPTION } from '../config/constants.js';
import { loadTemplate } from './scripts.js';
import { ShellComplete } from './ShellComplete.js';

export class ZshComplete extends ShellComplete {
  source(): string {
    return loadTemplate('zsh.zsh');
  }

  complete(): boolean {
    const { args, incomplete } = this.readCursor();

    for (const candidate of this.getCompletions(args, incomplete)) {
      this.write(candidate.value);
      this.write(candidate.description || ZSH_NO_DESCRIPTION);
    }
    return true;
  }
}
