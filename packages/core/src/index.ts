/**
 * @docforge/core
 *
 * Incremental documentation builds: change tracking, build orchestration,
 * pipeline adapters, the Claude client and Markdown reports.
 */

// Types and schemas
export * from './types/index.js';
export * from './schemas/index.js';
export * from './constants.js';
export * from './errors.js';

// Configuration and logging
export { getEnv, loadBuildConfig, parseBuildConfig, DEFAULT_CONFIG_FILE } from './config/index.js';
export type { DocforgeEnv } from './config/index.js';
export { Logger, logger, silentLogger, parseLogLevel } from './logging/logger.js';
export type { LogLevel, LogSink, LoggerOptions } from './logging/logger.js';

// Change tracking
export * from './cache/index.js';

// Build orchestration
export * from './build/index.js';

// Adapters
export * from './adapters/index.js';
export { runCommand } from './process/command.js';
export type { CommandResult, CommandRunner, RunCommandOptions } from './process/command.js';

// LLM
export * from './llm/index.js';

// SDK release monitoring
export * from './monitor/index.js';

// Documentation and reports
export * from './docs/index.js';
export * from './reports/index.js';
