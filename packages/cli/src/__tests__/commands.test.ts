/**
 * Build and Clean Command Tests
 *
 * The builder is replaced through the factory option; configuration files
 * are real files in a temporary directory.
 */

import { mkdir, mkdtemp, rm, stat, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import {
  CacheLockError,
  ReportEmissionError,
  silentLogger,
  type BuildResult,
  type DocforgeEnv,
  type VersionCheck,
} from '@docforge/core';

import { runBuildCommand } from '../commands/build.js';
import { runCleanCommand } from '../commands/clean.js';
import { runMonitorCommand } from '../commands/monitor.js';
import type { Builder, BuilderFactory, Monitor, MonitorFactory } from '../compose.js';

const RESULT: BuildResult = {
  buildId: '01J0000000000000000000TEST',
  validationPassed: true,
  testsPassed: true,
  errorMessage: null,
  stats: {
    sourcesSynced: 1,
    sourcesFailed: 0,
    unitsDiscovered: 2,
    filesProcessed: 1,
    filesSkipped: 0,
    testsExecuted: 2,
    durationMs: 5,
  },
};

describe('commands', () => {
  let dir: string;
  let configPath: string;
  let env: DocforgeEnv;
  let io: { out: ReturnType<typeof vi.fn>; err: ReturnType<typeof vi.fn> };

  function fakeBuilder(build: Builder['build']): { builder: Builder; factory: ReturnType<typeof vi.fn<BuilderFactory>> } {
    const builder: Builder = { build, cleanup: vi.fn<Builder['cleanup']>().mockResolvedValue(undefined) };
    return { builder, factory: vi.fn<BuilderFactory>().mockReturnValue(builder) };
  }

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'docforge-cli-'));
    configPath = path.join(dir, 'docforge.config.json');
    await writeFile(configPath, JSON.stringify({ sources: [{ location: 'lib' }] }), 'utf8');
    env = { ANTHROPIC_API_KEY: 'test-api-key', LOG_LEVEL: 'ERROR', DOCFORGE_CONFIG: configPath };
    io = { out: vi.fn(), err: vi.fn() };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('runBuildCommand', () => {
    it('should print the result, clean up and exit 0 when everything passed', async () => {
      const { builder, factory } = fakeBuilder(vi.fn<Builder['build']>().mockResolvedValue(RESULT));

      const code = await runBuildCommand({ env, createBuilder: factory, logger: silentLogger }, io);

      expect(code).toBe(0);
      expect(io.out).toHaveBeenCalledWith(JSON.stringify(RESULT, null, 2));
      expect(builder.build).toHaveBeenCalledWith([{ location: path.join(dir, 'lib') }]);
      expect(builder.cleanup).toHaveBeenCalledTimes(1);

      const [config, apiKey] = factory.mock.calls[0] ?? [];
      expect(apiKey).toBe('test-api-key');
      expect(config?.reportsDir).toBe(path.join(dir, 'docs/reports'));
    });

    it('should exit 1 when tests failed', async () => {
      const { factory } = fakeBuilder(
        vi.fn<Builder['build']>().mockResolvedValue({ ...RESULT, testsPassed: false })
      );

      expect(await runBuildCommand({ env, createBuilder: factory, logger: silentLogger }, io)).toBe(1);
    });

    it('should keep the workspace when asked', async () => {
      const { builder, factory } = fakeBuilder(vi.fn<Builder['build']>().mockResolvedValue(RESULT));

      await runBuildCommand({ env, createBuilder: factory, keepWorkspace: true, logger: silentLogger }, io);

      expect(builder.cleanup).not.toHaveBeenCalled();
    });

    it('should exit 1 without an API key', async () => {
      const { factory } = fakeBuilder(vi.fn<Builder['build']>().mockResolvedValue(RESULT));

      const code = await runBuildCommand({ env: { ...env, ANTHROPIC_API_KEY: '' }, createBuilder: factory }, io);

      expect(code).toBe(1);
      expect(io.err).toHaveBeenCalledWith('ANTHROPIC_API_KEY is not set');
      expect(factory).not.toHaveBeenCalled();
    });

    it('should exit 1 on an invalid configuration', async () => {
      await writeFile(configPath, JSON.stringify({ sources: [] }), 'utf8');
      const { factory } = fakeBuilder(vi.fn<Builder['build']>().mockResolvedValue(RESULT));

      const code = await runBuildCommand({ env, createBuilder: factory }, io);

      expect(code).toBe(1);
      expect(io.err).toHaveBeenCalledWith('Invalid configuration at sources: At least one source is required');
    });

    it('should prefer --config over DOCFORGE_CONFIG', async () => {
      const { factory } = fakeBuilder(vi.fn<Builder['build']>().mockResolvedValue(RESULT));
      const missing = path.join(dir, 'other.json');

      const code = await runBuildCommand({ env, configPath: missing, createBuilder: factory }, io);

      expect(code).toBe(1);
      expect(io.err).toHaveBeenCalledWith(`Configuration file not found: ${missing}`);
    });

    it('should report emission failures, still cleaning up', async () => {
      const { builder, factory } = fakeBuilder(
        vi
          .fn<Builder['build']>()
          .mockRejectedValue(new ReportEmissionError('Failed to write report r.md: EACCES', 'r.md'))
      );

      const code = await runBuildCommand({ env, createBuilder: factory, logger: silentLogger }, io);

      expect(code).toBe(1);
      expect(io.err).toHaveBeenCalledWith('Failed to write report r.md: EACCES');
      expect(builder.cleanup).toHaveBeenCalledTimes(1);
    });

    it('should rethrow unexpected errors', async () => {
      const { factory } = fakeBuilder(vi.fn<Builder['build']>().mockRejectedValue(new Error('boom')));

      await expect(runBuildCommand({ env, createBuilder: factory, logger: silentLogger }, io)).rejects.toThrow(
        'boom'
      );
    });
  });

  describe('runCleanCommand', () => {
    it('should remove the configured workspace', async () => {
      const workspace = path.join(dir, '.docforge', 'workspace');
      await mkdir(path.join(workspace, 'sources'), { recursive: true });

      expect(await runCleanCommand({ env, logger: silentLogger }, io)).toBe(0);
      await expect(stat(workspace)).rejects.toThrow();
    });

    it('should succeed when there is no workspace', async () => {
      expect(await runCleanCommand({ env, logger: silentLogger }, io)).toBe(0);
    });

    it('should refuse a workspace containing the reports directory', async () => {
      await writeFile(
        configPath,
        JSON.stringify({ sources: [{ location: 'lib' }], workspaceDir: 'docs' }),
        'utf8'
      );

      expect(await runCleanCommand({ env, logger: silentLogger }, io)).toBe(1);
      expect(io.err).toHaveBeenCalledWith(
        `Workspace ${path.join(dir, 'docs')} must not contain the reports directory ${path.join(dir, 'docs/reports')}`
      );
    });

    it('should refuse a workspace containing the docs directory', async () => {
      const workspace = path.join(dir, 'site');
      await mkdir(workspace, { recursive: true });
      await writeFile(
        configPath,
        JSON.stringify({ sources: [{ location: 'lib' }], workspaceDir: 'site', docsDir: 'site/api' }),
        'utf8'
      );

      expect(await runCleanCommand({ env, logger: silentLogger }, io)).toBe(1);
      expect(io.err).toHaveBeenCalledWith(
        `Workspace ${workspace} must not contain the docs directory ${path.join(dir, 'site/api')}`
      );
      expect((await stat(workspace)).isDirectory()).toBe(true);
    });
  });

  describe('runMonitorCommand', () => {
    const UPDATED: VersionCheck = {
      checkedAt: new Date('2026-01-02T03:04:05.000Z'),
      updates: [{ registry: 'npm', name: '@anthropic-ai/sdk', current: '0.39.0', latest: '0.40.1' }],
      failures: [],
      versions: { 'npm:@anthropic-ai/sdk': '0.40.1' },
    };
    const UNCHANGED: VersionCheck = { ...UPDATED, updates: [] };

    function fakeMonitor(check: VersionCheck): { monitor: Monitor; factory: MonitorFactory } {
      const monitor: Monitor = {
        check: vi.fn<Monitor['check']>().mockResolvedValue(check),
        record: vi.fn<Monitor['record']>().mockResolvedValue(undefined),
      };
      return { monitor, factory: vi.fn<MonitorFactory>().mockReturnValue(monitor) };
    }

    it('should record the check and skip the build when nothing changed', async () => {
      const { monitor, factory: createMonitor } = fakeMonitor(UNCHANGED);
      const { factory: createBuilder } = fakeBuilder(vi.fn<Builder['build']>().mockResolvedValue(RESULT));

      const code = await runMonitorCommand({ env, createMonitor, createBuilder, logger: silentLogger }, io);

      expect(code).toBe(0);
      expect(io.out).toHaveBeenCalledWith(JSON.stringify({ updates: [], failures: [] }, null, 2));
      expect(createBuilder).not.toHaveBeenCalled();
      expect(monitor.record).toHaveBeenCalledWith(UNCHANGED);
    });

    it('should build and then record new releases', async () => {
      const { monitor, factory: createMonitor } = fakeMonitor(UPDATED);
      const { builder, factory: createBuilder } = fakeBuilder(vi.fn<Builder['build']>().mockResolvedValue(RESULT));

      const code = await runMonitorCommand({ env, createMonitor, createBuilder, logger: silentLogger }, io);

      expect(code).toBe(0);
      expect(builder.build).toHaveBeenCalledWith([{ location: path.join(dir, 'lib') }]);
      expect(io.out).toHaveBeenLastCalledWith(JSON.stringify(RESULT, null, 2));
      expect(builder.cleanup).toHaveBeenCalledTimes(1);
      expect(monitor.record).toHaveBeenCalledWith(UPDATED);
    });

    it('should record new releases after a build that failed validation', async () => {
      const { monitor, factory: createMonitor } = fakeMonitor(UPDATED);
      const { factory: createBuilder } = fakeBuilder(
        vi.fn<Builder['build']>().mockResolvedValue({ ...RESULT, validationPassed: false })
      );

      const code = await runMonitorCommand({ env, createMonitor, createBuilder, logger: silentLogger }, io);

      expect(code).toBe(1);
      expect(monitor.record).toHaveBeenCalledTimes(1);
    });

    it('should not record releases when the build could not run', async () => {
      const { monitor, factory: createMonitor } = fakeMonitor(UPDATED);
      const { factory: createBuilder } = fakeBuilder(
        vi.fn<Builder['build']>().mockRejectedValue(new CacheLockError(path.join(dir, 'cache.lock'), 4242))
      );

      const code = await runMonitorCommand({ env, createMonitor, createBuilder, logger: silentLogger }, io);

      expect(code).toBe(1);
      expect(monitor.record).not.toHaveBeenCalled();
    });

    it('should exit 1 without an API key when a release is new', async () => {
      const { monitor, factory: createMonitor } = fakeMonitor(UPDATED);
      const { factory: createBuilder } = fakeBuilder(vi.fn<Builder['build']>().mockResolvedValue(RESULT));

      const code = await runMonitorCommand(
        { env: { ...env, ANTHROPIC_API_KEY: '' }, createMonitor, createBuilder, logger: silentLogger },
        io
      );

      expect(code).toBe(1);
      expect(io.err).toHaveBeenCalledWith('ANTHROPIC_API_KEY is not set');
      expect(createBuilder).not.toHaveBeenCalled();
      expect(monitor.record).not.toHaveBeenCalled();
    });
  });
});
