/**
 * `docforge monitor`
 *
 * Checks the watched SDK packages for new releases and runs a build when
 * one appears. The new versions are recorded only after that build ran to
 * completion, so a build that could not run is retried by the next check.
 */

import {
  ConfigurationError,
  Logger,
  getEnv,
  loadBuildConfig,
  parseLogLevel,
  type BuildConfig,
} from '@docforge/core';

import { createVersionMonitor, type MonitorFactory } from '../compose.js';
import type { CliIo } from '../io.js';
import { executeBuild, exitCodeOf, type BuildCommandOptions } from './build.js';

export interface MonitorCommandOptions extends BuildCommandOptions {
  createMonitor?: MonitorFactory;
}

export async function runMonitorCommand(options: MonitorCommandOptions, io: CliIo): Promise<number> {
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
  const monitor = (options.createMonitor ?? createVersionMonitor)(config, log);

  const check = await monitor.check();
  io.out(JSON.stringify({ updates: check.updates, failures: check.failures }, null, 2));

  if (check.updates.length === 0) {
    await monitor.record(check);
    return 0;
  }

  if (!env.ANTHROPIC_API_KEY) {
    io.err('ANTHROPIC_API_KEY is not set');
    return 1;
  }

  log.info('SDK releases changed; running a build', {
    updates: check.updates.map((update) => `${update.name}: ${update.current ?? 'none'} -> ${update.latest}`),
  });
  const run = await executeBuild(config, env.ANTHROPIC_API_KEY, log, options, io);
  if (run.kind === 'completed') {
    await monitor.record(check);
  }
  return exitCodeOf(run);
}
