/**
 * Build configuration and environment
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { isRemoteLocation } from '../adapters/sync.js';
import { ConfigurationError, isErrnoException, toError } from '../errors.js';
import { BuildConfigSchema, type BuildConfig } from '../schemas/index.js';

/** Default configuration file, relative to the working directory */
export const DEFAULT_CONFIG_FILE = 'docforge.config.json';

/**
 * Environment configuration
 */
export interface DocforgeEnv {
  ANTHROPIC_API_KEY: string;
  LOG_LEVEL: string;
  DOCFORGE_CONFIG: string;
}

/**
 * Get environment configuration
 */
export function getEnv(env: NodeJS.ProcessEnv = process.env): DocforgeEnv {
  return {
    ANTHROPIC_API_KEY: env.ANTHROPIC_API_KEY ?? '',
    LOG_LEVEL: env.LOG_LEVEL ?? 'INFO',
    DOCFORGE_CONFIG: env.DOCFORGE_CONFIG ?? DEFAULT_CONFIG_FILE,
  };
}

/**
 * Validate a parsed configuration object and apply defaults
 *
 * @throws {ConfigurationError} on the first schema violation
 */
export function parseBuildConfig(raw: unknown): BuildConfig {
  const result = BuildConfigSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new ConfigurationError(`Invalid configuration at ${where}: ${issue?.message ?? 'unknown error'}`);
  }
  return result.data;
}

/**
 * Read and validate a JSON configuration file. Relative directories in the
 * file are resolved against the file's own directory.
 *
 * @throws {ConfigurationError} if the file is missing, not JSON or invalid
 */
export async function loadBuildConfig(configPath: string): Promise<BuildConfig> {
  const absolute = path.resolve(configPath);

  let content: string;
  try {
    content = await readFile(absolute, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${absolute}`);
    }
    throw new ConfigurationError(`Failed to read configuration ${absolute}: ${toError(error).message}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Configuration ${absolute} is not valid JSON: ${toError(error).message}`);
  }

  const config = parseBuildConfig(raw);
  const baseDir = path.dirname(absolute);
  return {
    ...config,
    workspaceDir: path.resolve(baseDir, config.workspaceDir),
    cacheFile: path.resolve(baseDir, config.cacheFile),
    reportsDir: path.resolve(baseDir, config.reportsDir),
    docsDir: path.resolve(baseDir, config.docsDir),
    monitor: { ...config.monitor, versionsFile: path.resolve(baseDir, config.monitor.versionsFile) },
    sources: config.sources.map((source) =>
      isRemoteLocation(source.location)
        ? source
        : { ...source, location: path.resolve(baseDir, source.location) }
    ),
  };
}
