/**
 * `docforge clean`: remove a workspace left behind by `build --keep-workspace`
 */

import {
  ConfigurationError,
  Logger,
  getEnv,
  loadBuildConfig,
  parseLogLevel,
  permanentPaths,
  removeWorkspace,
  type BuildConfig,
  type DocforgeEnv,
} from '@docforge/core';

import type { CliIo } from '../io.js';

export interface CleanCommandOptions {
  configPath?: string;
  env?: DocforgeEnv;
  logger?: Logger;
}

export async function runCleanCommand(options: CleanCommandOptions, io: CliIo): Promise<number> {
  const env = options.env ?? getEnv();

  let config: BuildConfig;
  try {
    config = await loadBuildConfig(options.configPath ?? env.DOCFORGE_CONFIG);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      io.err(error.message);
      return 1;
    }
    throw error;
  }

  const log = options.logger ?? new Logger({ level: parseLogLevel(env.LOG_LEVEL) });
  try {
    await removeWorkspace(config.workspaceDir, permanentPaths(config));
  } catch (error) {
    if (error instanceof ConfigurationError) {
      io.err(error.message);
      return 1;
    }
    throw error;
  }
  log.info('Workspace removed', { workspace: config.workspaceDir });
  return 0;
}
