/**
 * Tests for ShellRegistry
 */

import { describe, it, expect } from 'vitest';
import { BashComplete } from '../BashComplete.js';
import { ShellComplete } from '../ShellComplete.js';
import { ShellError } from '../ShellError.js';
import { ShellRegistry, createDefaultRegistry } from '../ShellRegistry.js';
import { ZshComplete } from '../ZshComplete.js';

class SourceOnly extends ShellComplete {
  source(): string {
    return '';
  }
}

class ZshVariant extends ZshComplete {}

describe('ShellRegistry', () => {
  it('should hold the built-in shells in order', () => {
    expect(createDefaultRegistry().names()).toEqual(['bash', 'zsh', 'fish']);
  });

  it('should fall back to the base adapter for unknown shells', () => {
    const registry = createDefaultRegistry();
    expect(registry.get('bash')).toBe(BashComplete);
    expect(registry.get('tcsh')).toBe(ShellComplete);
    expect(registry.has('tcsh')).toBe(false);
  });

  it('should accept indirect subclasses', () => {
    const registry = new ShellRegistry().register('zsh5', ZshVariant);
    expect(registry.get('zsh5')).toBe(ZshVariant);
  });

  it('should replace an earlier registration', () => {
    const registry = createDefaultRegistry().register('zsh', ZshVariant);
    expect(registry.get('zsh')).toBe(ZshVariant);
    expect(registry.names()).toEqual(['bash', 'zsh', 'fish']);
  });

  it('should reject adapters that do not override both methods', () => {
    const registry = new ShellRegistry();
    expect(() => registry.register('partial', SourceOnly)).toThrow(
      "Completion class for 'partial' must override complete"
    );
    expect(() => registry.register('partial', SourceOnly)).toThrow(ShellError);
  });

  it('should reject the base class itself', () => {
    expect(() => new ShellRegistry().register('base', ShellComplete)).toThrow(
      'Completion class must extend ShellComplete'
    );
  });
});
