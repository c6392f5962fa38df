/**
 * BashComplete - bash adapter
 *
 * Output protocol: one `<type>,<value>` line per candidate.
 */

import { loadTemplate } from './scripts.js';
import { bashVersionNotUsable } from './bashVersion.js';
import { ShellComplete } from './ShellComplete.js';
import { ShellError } from './ShellError.js';

export class BashComplete extends ShellComplete {
  source(): string {
    if (bashVersionNotUsable()) {
      throw new ShellError(
        'UNSUPPORTED_SHELL',
        'Shell completion is not supported for bash versions older than 4.4',
        'bash'
      );
    }
    return loadTemplate('bash.sh');
  }

  complete(): boolean {
    const { args, incomplete } = this.readCursor();

    for (const candidate of this.getCompletions(args, incomplete)) {
      this.write(`${candidate.type},${candidate.value}`);
    }
    return true;
  }
}
