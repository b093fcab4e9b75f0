/**
 * Discovery Adapter Tests
 */

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { DiscoveryError } from '../../errors.js';
import { silentLogger } from '../../logging/logger.js';
import { TypeScriptDiscoveryAdapter, isInExcludedDirectory, isSourceFile } from '../discovery.js';

const MATH_SOURCE = `import { round } from './util.js';
import type { Options } from './options';

/**
 * Add two numbers.
 */
export function add(a: number, b: number): number {
  return round(a + b);
}

function hidden(): void {}

export function _internal(): void {}

export const double = (n: number): number => n * 2;

export function first<T>(items: T[]): T | undefined;
export function first<T>(items: T[], fallback: T): T;
export function first<T>(items: T[], fallback?: T): T | undefined {
  return items[0] ?? fallback;
}

export class Calculator {
  constructor(private readonly options: Options) {}

  /** Multiply two numbers */
  multiply(a: number, b: number): number {
    return a * b;
  }

  private secret(): void {}

  protected guarded(): void {}

  _skip(): void {}
}

class Internal {
  run(): void {}
}
`;

describe('isSourceFile', () => {
  it('should accept TypeScript sources and reject tests and declarations', () => {
    expect(isSourceFile('index.ts')).toBe(true);
    expect(isSourceFile('view.tsx')).toBe(true);
    expect(isSourceFile('index.test.ts')).toBe(false);
    expect(isSourceFile('view.spec.tsx')).toBe(false);
    expect(isSourceFile('types.d.ts')).toBe(false);
    expect(isSourceFile('index.js')).toBe(false);
  });
});

describe('isInExcludedDirectory', () => {
  it('should match an excluded segment at any depth', () => {
    expect(isInExcludedDirectory('src/__tests__/helper.ts')).toBe(true);
    expect(isInExcludedDirectory('docs')).toBe(true);
    expect(isInExcludedDirectory('packages/a/node_modules/b/index.ts')).toBe(true);
    expect(isInExcludedDirectory('src/testing/helper.ts')).toBe(false);
    expect(isInExcludedDirectory('')).toBe(false);
  });
});

describe('TypeScriptDiscoveryAdapter', () => {
  let root: string;
  const adapter = new TypeScriptDiscoveryAdapter({ logger: silentLogger });

  async function write(relative: string, content: string): Promise<string> {
    const file = path.join(root, relative);
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(file, content, 'utf8');
    return file;
  }

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'docforge-discovery-'));
    await write('src/math.ts', MATH_SOURCE);
    await write('src/util.ts', 'export function round(value: number): number {\n  return Math.round(value);\n}\n');
    await write('src/options/index.ts', 'export interface Options {\n  precision: number;\n}\n');
    await write('src/math.test.ts', 'export function shouldNotAppear(): void {}\n');
    await write('src/types.d.ts', 'export declare function declared(): void;\n');
    await write('tests/helper.ts', 'export function helper(): void {}\n');
    await write('node_modules/pkg/index.ts', 'export function vendored(): void {}\n');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should find exported functions, arrow functions and public methods', async () => {
    const units = await adapter.discover(root);

    expect(units.map((unit) => `${unit.module}:${unit.name}`)).toEqual([
      'src/math:add',
      'src/math:double',
      'src/math:first',
      'src/math:Calculator.multiply',
      'src/util:round',
    ]);
  });

  it('should capture docstrings, signatures and kinds', async () => {
    const units = await adapter.discover(root);
    const byName = new Map(units.map((unit) => [unit.name, unit]));

    expect(byName.get('add')).toMatchObject({
      kind: 'function',
      docstring: 'Add two numbers.',
      signature: 'add(a: number, b: number): number',
      sourcePath: path.join(root, 'src/math.ts'),
    });
    expect(byName.get('double')).toMatchObject({
      docstring: null,
      signature: 'double(n: number): number',
    });
    expect(byName.get('first')?.signature).toBe('first<T>(items: T[], fallback?: T): T | undefined');
    expect(byName.get('Calculator.multiply')).toMatchObject({
      kind: 'method',
      docstring: 'Multiply two numbers',
      signature: 'Calculator.multiply(a: number, b: number): number',
    });
  });

  it('should resolve local imports to source files', async () => {
    const units = await adapter.discover(root);
    const add = units.find((unit) => unit.name === 'add');
    const round = units.find((unit) => unit.name === 'round');

    expect(add?.dependencies).toEqual([
      path.join(root, 'src/util.ts'),
      path.join(root, 'src/options/index.ts'),
    ]);
    expect(round?.dependencies).toEqual([]);
  });

  it('should restrict discovery to configured paths', async () => {
    const units = await adapter.discover(root, { paths: ['src/util.ts'] });

    expect(units.map((unit) => unit.name)).toEqual(['round']);
  });

  it('should skip configured paths that escape the root', async () => {
    const units = await adapter.discover(root, { paths: ['../outside', 'src/util.ts'] });

    expect(units.map((unit) => unit.name)).toEqual(['round']);
  });

  it('should exclude configured paths inside test and docs directories', async () => {
    await write('src/__tests__/helper.ts', 'export function fixture(): void {}\n');
    await write('docs/build/conf.ts', 'export function configure(): void {}\n');

    const units = await adapter.discover(root, {
      paths: ['src/util.ts', 'src/__tests__/helper.ts', 'tests', 'docs/build'],
    });

    expect(units.map((unit) => `${unit.module}:${unit.name}`)).toEqual(['src/util:round']);
  });

  it('should throw DiscoveryError for a missing root', async () => {
    await expect(adapter.discover(path.join(root, 'missing'))).rejects.toBeInstanceOf(DiscoveryError);
  });

  it('should stop when the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(adapter.discover(root, { signal: controller.signal })).rejects.toThrow();
  });
});
