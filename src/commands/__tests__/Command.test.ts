/**
 * Tests for the command tree: parameters, commands and groups
 */

import { describe, it, expect } from 'vitest';
import { Command, isGroup } from '../Command.js';
import { Group } from '../Group.js';
import { Argument, Option, splitOpt } from '../Parameter.js';

describe('Option', () => {
  it('should derive the name from the longest spelling', () => {
    const option = new Option(['-n', '--dry-run']);
    expect(option.name).toBe('dryRun');
    expect(option.opts).toEqual(['-n', '--dry-run']);
  });

  it('should take an explicit name from a bare identifier', () => {
    const option = new Option(['dest', '--out', '-o']);
    expect(option.name).toBe('dest');
    expect(option.opts).toEqual(['--out', '-o']);
  });

  it('should treat an on/off pair as a flag', () => {
    const option = new Option(['--shout/--no-shout']);
    expect(option.name).toBe('shout');
    expect(option.opts).toEqual(['--shout']);
    expect(option.secondaryOpts).toEqual(['--no-shout']);
    expect(option.isFlag).toBe(true);
    expect(option.nargs).toBe(0);
    expect(option.takesValue).toBe(false);
  });

  it('should reject declarations without spellings', () => {
    expect(() => new Option(['dest'])).toThrow("No option spellings declared for 'dest'");
  });

  it('should reject two names', () => {
    expect(() => new Option(['a', 'b', '--x'])).toThrow("Name 'a' defined twice");
  });

  it('should reject a valued option with nargs 0', () => {
    expect(() => new Option(['--x'], { nargs: 0 })).toThrow("Option 'x' must take at least one value");
  });
});

describe('Argument', () => {
  it('should be required unless it has a default', () => {
    expect(new Argument('src').required).toBe(true);
    expect(new Argument('src', { default: '.' }).required).toBe(false);
    expect(new Argument('files', { nargs: -1 }).required).toBe(false);
  });

  it('should report variadic arguments', () => {
    expect(new Argument('files', { nargs: -1 }).isVariadic).toBe(true);
    expect(new Argument('src').isVariadic).toBe(false);
  });

  it('should reject invalid nargs', () => {
    expect(() => new Argument('x', { nargs: 0 })).toThrow("Argument 'x' has invalid nargs 0");
    expect(() => new Argument('x', { nargs: -2 })).toThrow("Argument 'x' has invalid nargs -2");
  });
});

describe('splitOpt', () => {
  it('should split prefix and body', () => {
    expect(splitOpt('--foo')).toEqual(['--', 'foo']);
    expect(splitOpt('-f')).toEqual(['-', 'f']);
    expect(splitOpt('+w')).toEqual(['+', 'w']);
    expect(splitOpt('name')).toEqual(['', 'name']);
  });
});

describe('Command', () => {
  it('should append the help option after declared parameters', () => {
    const verbose = new Option(['--verbose'], { isFlag: true });
    const cli = new Command('cli', { params: [verbose] });
    const ctx = cli.makeContext('cli', [], { resilientParsing: true });

    const params = cli.getParams(ctx);
    expect(params).toHaveLength(2);
    expect(params[0]).toBe(verbose);
    expect(params[1]?.name).toBe('help');
  });

  it('should leave out the help option when asked', () => {
    const cli = new Command('cli', { addHelpOption: false });
    const ctx = cli.makeContext('cli', []);
    expect(cli.getParams(ctx)).toEqual([]);
  });

  it('should summarise help text', () => {
    expect(new Command('a', { help: 'Build things. Then more.' }).getShortHelp()).toBe('Build things.');
    expect(
      new Command('b', {
        help: 'This command does a great many different things for everyone involved',
      }).getShortHelp()
    ).toBe('This command does a great many different...');
    expect(new Command('c', { help: 'Long text', shortHelp: 'Short' }).getShortHelp()).toBe('Short');
    expect(new Command('d').getShortHelp()).toBe('');
  });

  it('should tell groups from leaf commands', () => {
    expect(isGroup(new Command('cli'))).toBe(false);
    expect(isGroup(new Group('cli'))).toBe(true);
  });
});

describe('Group', () => {
  const cli = new Group('cli', {
    commands: [new Command('zeta'), new Command('alpha'), new Group('nested')],
  });

  it('should list subcommands sorted', () => {
    const ctx = cli.makeContext('cli', []);
    expect(cli.listCommands(ctx)).toEqual(['alpha', 'nested', 'zeta']);
  });

  it('should register a subcommand under another name', () => {
    const group = new Group('cli');
    const command = new Command('original');
    group.addCommand(command, 'renamed');
    const ctx = group.makeContext('cli', []);
    expect(group.getCommand(ctx, 'renamed')).toBe(command);
    expect(group.getCommand(ctx, 'original')).toBeUndefined();
  });

  it('should resolve the subcommand named by the first token', () => {
    const ctx = cli.makeContext('cli', ['alpha', 'x']);
    const resolved = cli.resolveCommand(ctx, ctx.protectedArgs);
    expect(resolved.name).toBe('alpha');
    expect(resolved.rest).toEqual([]);
  });

  it('should reject an unknown subcommand outside resilient parsing', () => {
    const ctx = cli.makeContext('cli', []);
    expect(() => cli.resolveCommand(ctx, ['nope'])).toThrow("No such command 'nope'.");
  });

  it('should yield nulls for an unknown subcommand when resilient', () => {
    const ctx = cli.makeContext('cli', [], { resilientParsing: true });
    expect(cli.resolveCommand(ctx, ['nope', 'x'])).toEqual({ name: null, command: null, rest: ['x'] });
  });

  it('should refuse groups inside a chained group', () => {
    const chained = new Group('cli', { chain: true });
    expect(() => chained.addCommand(new Group('sub'))).toThrow(
      "Cannot add group 'sub' to chained group 'cli': chained groups only take plain commands"
    );
  });

  it('should build the command path through parents', () => {
    const root = cli.makeContext('cli', ['nested']);
    const nested = new Group('nested');
    const child = nested.makeContext('nested', [], { parent: root });
    expect(child.commandPath).toBe('cli nested');
    expect([...child.lineage()].map(ctx => ctx.infoName)).toEqual(['nested', 'cli']);
  });
});
