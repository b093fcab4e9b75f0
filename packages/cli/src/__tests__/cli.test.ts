/**
 * Argument Parsing Tests
 */

import { describe, it, expect, vi } from 'vitest';

import { USAGE, main, parseArgs } from '../cli.js';

describe('parseArgs', () => {
  it('should return help for no arguments or a help flag', () => {
    expect(parseArgs([])).toEqual({ kind: 'help' });
    expect(parseArgs(['build', '-h'])).toEqual({ kind: 'help' });
    expect(parseArgs(['--help'])).toEqual({ kind: 'help' });
  });

  it('should parse build options', () => {
    expect(parseArgs(['build', '--config', 'ci.json', '--keep-workspace'])).toEqual({
      kind: 'command',
      command: 'build',
      configPath: 'ci.json',
      keepWorkspace: true,
    });
  });

  it('should default to no config path', () => {
    expect(parseArgs(['clean'])).toEqual({
      kind: 'command',
      command: 'clean',
      configPath: undefined,
      keepWorkspace: false,
    });
  });

  it('should parse monitor options', () => {
    expect(parseArgs(['monitor', '--keep-workspace'])).toEqual({
      kind: 'command',
      command: 'monitor',
      configPath: undefined,
      keepWorkspace: true,
    });
  });

  it('should reject an unknown command', () => {
    expect(parseArgs(['deploy'])).toEqual({
      kind: 'error',
      message: 'Unknown command: "deploy"\nValid commands: build, clean, monitor',
    });
  });

  it('should reject --config without a value', () => {
    expect(parseArgs(['build', '--config'])).toEqual({
      kind: 'error',
      message: '--config flag requires a path argument',
    });
  });

  it('should reject unknown options', () => {
    expect(parseArgs(['build', '--force'])).toEqual({ kind: 'error', message: 'Unknown option: --force' });
  });
});

describe('main', () => {
  it('should print usage and exit 0 for help', async () => {
    const io = { out: vi.fn(), err: vi.fn() };

    expect(await main(['--help'], io)).toBe(0);
    expect(io.out).toHaveBeenCalledWith(USAGE);
  });

  it('should print the parse error and exit 1', async () => {
    const io = { out: vi.fn(), err: vi.fn() };

    expect(await main(['build', '--force'], io)).toBe(1);
    expect(io.err).toHaveBeenCalledWith('Unknown option: --force');
  });
});
