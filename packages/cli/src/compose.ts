/**
 * Composition root: wires the default adapters into a DocumentationBuilder
 * and the registry client into a VersionMonitor
 */

import path from 'node:path';

import {
  ChangeTracker,
  ClaudeDocumentationValidator,
  ClaudeExampleGenerator,
  DocumentationBuilder,
  GitSyncAdapter,
  HttpPackageRegistry,
  MarkdownReportEmitter,
  NodeTestExecutor,
  TypeScriptDiscoveryAdapter,
  VersionMonitor,
  VersionStore,
  createClaudeClient,
  type BuildConfig,
  type Logger,
} from '@docforge/core';

/**
 * What the commands need from a builder
 */
export type Builder = Pick<DocumentationBuilder, 'build' | 'cleanup'>;

export type BuilderFactory = (config: BuildConfig, apiKey: string, log: Logger) => Builder;

export const createDocumentationBuilder: BuilderFactory = (config, apiKey, log) => {
  const client = createClaudeClient(apiKey, config.model);

  return new DocumentationBuilder(
    {
      tracker: new ChangeTracker({ cacheFile: config.cacheFile, logger: log }),
      sync: new GitSyncAdapter({ logger: log }),
      discovery: new TypeScriptDiscoveryAdapter({ logger: log }),
      generation: new ClaudeExampleGenerator(client, log),
      validation: new ClaudeDocumentationValidator(client, log),
      testExecution: new NodeTestExecutor({
        command: config.testCommand,
        scratchDir: path.join(config.workspaceDir, 'tests'),
        logger: log,
      }),
      reports: new MarkdownReportEmitter(config.reportsDir, log),
      logger: log,
    },
    {
      workspaceDir: config.workspaceDir,
      reportsDir: config.reportsDir,
      docsDir: config.docsDir,
      concurrency: config.concurrency,
      adapterTimeoutMs: config.adapterTimeoutMs,
      buildDeadlineMs: config.buildDeadlineMs,
    }
  );
};

/**
 * What `docforge monitor` needs from a version monitor
 */
export type Monitor = Pick<VersionMonitor, 'check' | 'record'>;

export type MonitorFactory = (config: BuildConfig, log: Logger) => Monitor;

export const createVersionMonitor: MonitorFactory = (config, log) =>
  new VersionMonitor({
    store: new VersionStore(config.monitor.versionsFile, log),
    registry: new HttpPackageRegistry(),
    packages: config.monitor.packages,
    requestTimeoutMs: config.monitor.requestTimeoutMs,
    logger: log,
  });
