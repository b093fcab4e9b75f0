/**
 * `docforge build`
 *
 * Runs one build, prints the BuildResult as JSON and removes the workspace
 * afterwards unless asked to keep it. Exit code 0 only when validation and
 * tests both passed.
 */

import {
  CacheLockError,
  ConfigurationError,
  Logger,
  ReportEmissionError,
  getEnv,
  loadBuildConfig,
  parseLogLevel,
  type BuildConfig,
  type BuildResult,
  type DocforgeEnv,
} from '@docforge/core';

import { createDocumentationBuilder, type Builder, type BuilderFactory } from '../compose.js';
import type { CliIo } from '../io.js';

export interface BuildCommandOptions {
  configPath?: string;
  keepWorkspace?: boolean;
  env?: DocforgeEnv;
  createBuilder?: BuilderFactory;
  logger?: Logger;
}

/**
 * Outcome of one build attempt. `failed` means the build did not run to
 * completion and the reason was already written to `io.err`.
 */
export type BuildRun = { kind: 'completed'; result: BuildResult } | { kind: 'failed' };

export function exitCodeOf(run: BuildRun): number {
  return run.kind === 'completed' && run.result.validationPassed && run.result.testsPassed ? 0 : 1;
}

export async function runBuildCommand(options: BuildCommandOptions, io: CliIo): Promise<number> {
  const env = options.env ?? getEnv();
  const configPath = options.configPath ?? env.DOCFORGE_CONFIG;

  if (!env.ANTHROPIC_API_KEY) {
    io.err('ANTHROPIC_API_KEY is not set');
    return 1;
  }

  let config: BuildConfig;
  try {
    config = await loadBuildConfig(configPath);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      io.err(error.message);
      return 1;
    }
    throw error;
  }

  const log = options.logger ?? new Logger({ level: parseLogLevel(env.LOG_LEVEL) });
  return exitCodeOf(await executeBuild(config, env.ANTHROPIC_API_KEY, log, options, io));
}

/**
 * Build a loaded configuration, print the result and clean up
 */
export async function executeBuild(
  config: BuildConfig,
  apiKey: string,
  log: Logger,
  options: Pick<BuildCommandOptions, 'keepWorkspace' | 'createBuilder'>,
  io: CliIo
): Promise<BuildRun> {
  const createBuilder = options.createBuilder ?? createDocumentationBuilder;

  let builder: Builder;
  try {
    builder = createBuilder(config, apiKey, log);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      io.err(error.message);
      return { kind: 'failed' };
    }
    throw error;
  }

  try {
    const result = await builder.build(config.sources);
    io.out(JSON.stringify(result, null, 2));
    return { kind: 'completed', result };
  } catch (error) {
    if (error instanceof ReportEmissionError || error instanceof CacheLockError) {
      io.err(error.message);
      return { kind: 'failed' };
    }
    throw error;
  } finally {
    if (!options.keepWorkspace) {
      await builder.cleanup();
    }
  }
}
