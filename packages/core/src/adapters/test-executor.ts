/**
 * Generated test executor
 *
 * Writes the test to a scratch file, runs the configured test command on
 * it and removes the file afterwards, whatever the outcome.
 */

import { mkdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { ulid } from 'ulid';

import { DEFAULT_TEST_COMMAND } from '../constants.js';
import { toError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../logging/logger.js';
import { runCommand, type CommandRunner } from '../process/command.js';
import type { TestExecutionResult } from '../types/index.js';
import type { AdapterCallOptions, TestExecutionAdapter } from './types.js';

/**
 * Line coverage from the `all files` row of a coverage table, 0 when absent
 */
export function parseCoverage(output: string): number {
  const match = /all files\s*\|\s*([\d.]+)/.exec(output);
  const value = match?.[1] ? Number.parseFloat(match[1]) : Number.NaN;
  return Number.isFinite(value) ? value : 0;
}

export interface NodeTestExecutorOptions {
  /** Command and arguments; the test file path is appended */
  command?: readonly string[];
  /** Where scratch test files are written */
  scratchDir?: string;
  fileExtension?: string;
  runner?: CommandRunner;
  logger?: Logger;
}

export class NodeTestExecutor implements TestExecutionAdapter {
  private readonly command: readonly string[];
  private readonly scratchDir: string;
  private readonly fileExtension: string;
  private readonly runner: CommandRunner;
  private readonly log: Logger;

  constructor(options: NodeTestExecutorOptions = {}) {
    this.command = options.command ?? DEFAULT_TEST_COMMAND;
    this.scratchDir = options.scratchDir ?? path.join(os.tmpdir(), 'docforge-tests');
    this.fileExtension = options.fileExtension ?? '.test.mjs';
    this.runner = options.runner ?? runCommand;
    this.log = (options.logger ?? defaultLogger).child({ component: 'test-executor' });
  }

  /**
   * @throws when the command cannot be started or is aborted
   */
  async execute(testCode: string, options?: AdapterCallOptions): Promise<TestExecutionResult> {
    const [executable, ...args] = this.command;
    if (!executable) {
      throw new Error('Test command is empty');
    }

    await mkdir(this.scratchDir, { recursive: true });
    const testFile = path.join(this.scratchDir, `generated-${ulid()}${this.fileExtension}`);

    try {
      await writeFile(testFile, testCode, 'utf8');
      const result = await this.runner(executable, [...args, testFile], {
        cwd: this.scratchDir,
        signal: options?.signal,
      });

      const coveragePercentage = parseCoverage(result.stdout);
      if (result.exitCode === 0) {
        return { passed: true, coveragePercentage };
      }

      const errorMessage = `Tests failed with exit code ${result.exitCode ?? 'none'}`;
      this.log.warn('Generated test failed', {
        errorMessage,
        stderr: result.stderr.slice(-2000),
      });
      return { passed: false, coveragePercentage, errorMessage };
    } finally {
      await rm(testFile, { force: true }).catch((error: unknown) => {
        this.log.warn('Failed to remove scratch test file', {
          testFile,
          error: toError(error).message,
        });
      });
    }
  }
}
