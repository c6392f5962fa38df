/**
 * Registry of shell adapters, keyed by the shell name used in the trigger
 * instruction (`source_<shell>`, `complete_<shell>`)
 */

import { BashComplete } from './BashComplete.js';
import { FishComplete } from './FishComplete.js';
import { ShellComplete } from './ShellComplete.js';
import { ShellError } from './ShellError.js';
import type { ShellAdapterClass } from './types.js';
import { ZshComplete } from './ZshComplete.js';

export class ShellRegistry {
  private readonly shells = new Map<string, ShellAdapterClass>();

  /**
   * Register an adapter under `name`, replacing any previous one.
   *
   * The class must extend ShellComplete and override both `source` and
   * `complete`.
   */
  register(name: string, adapterClass: ShellAdapterClass): this {
    const proto: unknown = adapterClass.prototype;

    if (!(proto instanceof ShellComplete)) {
      throw new ShellError('INVALID_ADAPTER', 'Completion class must extend ShellComplete', name);
    }

    const missing = (['source', 'complete'] as const).filter(
      method => proto[method] === ShellComplete.prototype[method]
    );
    if (missing.length > 0) {
      throw new ShellError(
        'INVALID_ADAPTER',
        `Completion class for '${name}' must override ${missing.join(' and ')}`,
        name
      );
    }

    this.shells.set(name, adapterClass);
    return this;
  }

  /**
   * Adapter for `name`; unknown shells get the base class, whose methods
   * report that they are not implemented
   */
  get(name: string): ShellAdapterClass {
    return this.shells.get(name) ?? ShellComplete;
  }

  has(name: string): boolean {
    return this.shells.has(name);
  }

  /**
   * Registered shell names in registration order
   */
  names(): string[] {
    return [...this.shells.keys()];
  }
}

/**
 * A registry holding the built-in bash, zsh and fish adapters
 */
export function createDefaultRegistry(): ShellRegistry {
  return new ShellRegistry()
    .register('bash', BashComplete)
    .register('zsh', ZshComplete)
    .register('fish', FishComplete);
}
