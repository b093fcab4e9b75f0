/**
 * Documentation Build Orchestrator
 *
 * Sequences sync, discovery, change filtering, generation, validation,
 * test execution, persistence and reporting for one build, and folds the
 * per-file outcomes into a single BuildResult.
 *
 * Per-unit adapter failures become recorded outcomes. Only discovery
 * failures (returned as a failed result) and report emission failures
 * (thrown) end a build early.
 */

import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { ulid } from 'ulid';

import { isRemoteLocation } from '../adapters/sync.js';
import { DEFAULT_ADAPTER_TIMEOUT_MS, DEFAULT_CONCURRENCY } from '../constants.js';
import { renderUnitDocumentation } from '../docs/markdown.js';
import {
  ReportEmissionError,
  toError,
  type AdapterOutcome,
} from '../errors.js';
import { logger as defaultLogger, type Logger } from '../logging/logger.js';
import type { TestReportEntry } from '../reports/types.js';
import type { BuildResult, BuildStats, DocumentableUnit, RepoConfig } from '../types/index.js';
import { guardAdapterCall, mapWithConcurrency } from './concurrency.js';
import type { BuildDependencies, BuildOptions, FileOutcome } from './types.js';
import {
  assertWorkspaceExcludes,
  permanentPaths,
  removeWorkspace,
  type ProtectedPath,
} from './workspace.js';

/**
 * Directory name for one configured source inside the workspace.
 * Stable across builds so cache keys keep matching.
 */
export function sourceSlug(location: string, index: number): string {
  const base = isRemoteLocation(location)
    ? (location.replace(/\/+$/, '').replace(/\.git$/, '').split(/[/:]/).pop() ?? '')
    : path.basename(path.resolve(location));
  const safe = base.replace(/[^A-Za-z0-9._-]/g, '_');
  return `${index + 1}-${safe && safe !== '.' && safe !== '..' ? safe : 'source'}`;
}

type AdapterFailure = Extract<AdapterOutcome<never>, { ok: false }>;

/**
 * Error text for a failed guarded call; timeouts already name the stage
 */
function describeFailure(stage: string, outcome: AdapterFailure): string {
  return outcome.kind === 'timeout' ? outcome.message : `${stage} failed: ${outcome.message}`;
}

function pushUnique(list: string[], value: string): void {
  if (!list.includes(value)) {
    list.push(value);
  }
}

interface SyncedSource {
  config: RepoConfig;
  root: string;
  slug: string;
}

interface BuildContext {
  buildId: string;
  log: Logger;
  signal: AbortSignal;
  stats: BuildStats;
  testResults: TestReportEntry[];
}

export class DocumentationBuilder {
  private readonly deps: BuildDependencies;
  private readonly workspaceDir: string;
  private readonly reportsDir: string;
  private readonly docsDir: string;
  private readonly protectedPaths: ProtectedPath[];
  private readonly concurrency: number;
  private readonly adapterTimeoutMs: number;
  private readonly buildDeadlineMs: number | undefined;
  private readonly log: Logger;

  /**
   * @throws {ConfigurationError} if the workspace would contain the cache
   * file, the reports directory or the docs directory
   */
  constructor(deps: BuildDependencies, options: BuildOptions) {
    this.deps = deps;
    this.workspaceDir = path.resolve(options.workspaceDir);
    this.reportsDir = path.resolve(options.reportsDir);
    this.docsDir = path.resolve(options.docsDir);
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.adapterTimeoutMs = options.adapterTimeoutMs ?? DEFAULT_ADAPTER_TIMEOUT_MS;
    this.buildDeadlineMs = options.buildDeadlineMs;
    this.log = (deps.logger ?? defaultLogger).child({ component: 'orchestrator' });

    this.protectedPaths = permanentPaths({
      cacheFile: deps.tracker.cacheFilePath,
      reportsDir: this.reportsDir,
      docsDir: this.docsDir,
    });
    assertWorkspaceExcludes(this.workspaceDir, this.protectedPaths);
  }

  get workspace(): string {
    return this.workspaceDir;
  }

  /**
   * Run one build over `sources`
   *
   * @throws {ReportEmissionError} if the reports cannot be written
   * @throws {CacheLockError} if another build holds the cache
   */
  async build(sources: RepoConfig[]): Promise<BuildResult> {
    const buildId = ulid();
    const log = this.log.child({ buildId });

    // Before the deadline timer: a held lock must not leave it running
    const ownsTracker = !this.deps.tracker.isOpen();
    if (ownsTracker) {
      await this.deps.tracker.open();
    }

    const deadline = new AbortController();
    const timer =
      this.buildDeadlineMs === undefined
        ? undefined
        : setTimeout(() => deadline.abort(), this.buildDeadlineMs);

    const ctx: BuildContext = {
      buildId,
      log,
      signal: deadline.signal,
      testResults: [],
      stats: {
        sourcesSynced: 0,
        sourcesFailed: 0,
        unitsDiscovered: 0,
        filesProcessed: 0,
        filesSkipped: 0,
        testsExecuted: 0,
        durationMs: 0,
      },
    };

    log.info('Build started', { sources: sources.length, workspace: this.workspaceDir });
    const startedAt = Date.now();

    try {
      const result = await this.run(ctx, sources);
      result.stats.durationMs = Date.now() - startedAt;
      log.info('Build complete', {
        validationPassed: result.validationPassed,
        testsPassed: result.testsPassed,
        ...result.stats,
      });
      return result;
    } finally {
      clearTimeout(timer);
      if (ownsTracker) {
        await this.deps.tracker.close();
      }
    }
  }

  /**
   * Remove the transient workspace. Safe to call repeatedly.
   */
  async cleanup(): Promise<void> {
    await removeWorkspace(this.workspaceDir, this.protectedPaths);
    this.log.info('Workspace removed', { workspace: this.workspaceDir });
  }

  // ==========================================================================
  // Stages
  // ==========================================================================

  private async run(ctx: BuildContext, sources: RepoConfig[]): Promise<BuildResult> {
    const { log, stats } = ctx;
    const errors: string[] = [];

    if (sources.length === 0) {
      errors.push('No sources configured');
    }

    // 1. Acquire
    const synced: SyncedSource[] = [];
    for (const [index, config] of sources.entries()) {
      const slug = sourceSlug(config.location, index);
      const root = path.join(this.workspaceDir, 'sources', slug);
      const outcome = await this.acquire(ctx, config, root);
      if (outcome.ok) {
        synced.push({ config, root, slug });
        stats.sourcesSynced++;
      } else {
        stats.sourcesFailed++;
        pushUnique(errors, `Sync failed for ${config.location}: ${outcome.message}`);
        log.warn('Source sync failed', { location: config.location, error: outcome.message });
      }
    }

    // 2. Discover
    const units: DocumentableUnit[] = [];
    const pageDirByFile = new Map<string, string>();
    for (const source of synced) {
      const outcome = await guardAdapterCall(
        'discovery',
        this.adapterTimeoutMs,
        (signal) => this.deps.discovery.discover(source.root, { paths: source.config.paths, signal }),
        ctx.signal
      );
      if (!outcome.ok) {
        const message = `Discovery failed for ${source.config.location}: ${outcome.message}`;
        log.error('Discovery failed; aborting build', undefined, {
          location: source.config.location,
          error: outcome.message,
        });
        return {
          buildId: ctx.buildId,
          validationPassed: false,
          testsPassed: false,
          errorMessage: message,
          stats,
        };
      }
      units.push(...outcome.value);
      for (const unit of outcome.value) {
        pageDirByFile.set(unit.sourcePath, path.join(this.docsDir, source.slug, unit.module));
      }
    }
    stats.unitsDiscovered = units.length;

    // 3. Filter
    const unitsByFile = new Map<string, DocumentableUnit[]>();
    for (const unit of units) {
      const list = unitsByFile.get(unit.sourcePath);
      if (list) {
        list.push(unit);
      } else {
        unitsByFile.set(unit.sourcePath, [unit]);
      }
    }
    const candidates = [...unitsByFile.keys()];
    const { reprocess, changedSupportFiles } = await this.selectFilesToProcess(candidates, units);
    log.info('Change detection complete', {
      candidates: candidates.length,
      reprocess: reprocess.size,
      changedSupportFiles: changedSupportFiles.length,
    });

    // 4-7. Generate, validate, test and persist changed files
    const toProcess = candidates.filter((file) => reprocess.has(file));
    const processed = await mapWithConcurrency(toProcess, this.concurrency, (file) =>
      this.processFile(ctx, file, unitsByFile.get(file) ?? [], pageDirByFile.get(file))
    );
    const processedByFile = new Map(processed.map((outcome) => [outcome.file, outcome]));
    for (const file of changedSupportFiles) {
      await this.deps.tracker.updateState(file, [], true);
    }

    const outcomes: FileOutcome[] = candidates.map(
      (file) => processedByFile.get(file) ?? this.reuseCached(file, unitsByFile.get(file) ?? [])
    );
    stats.filesProcessed = toProcess.length;
    stats.filesSkipped = candidates.length - toProcess.length;

    const suggestions: string[] = [];
    for (const outcome of outcomes) {
      outcome.errors.forEach((error) => pushUnique(errors, error));
      outcome.suggestions.forEach((suggestion) => pushUnique(suggestions, suggestion));
    }

    // 8-9. Aggregate, then report
    const validationPassed = synced.length > 0 && outcomes.every((outcome) => outcome.valid);
    const testsPassed = ctx.testResults.every((result) => result.passed);

    await this.emitReports(ctx, {
      isValid: validationPassed,
      errors,
      suggestions,
      filesValidated: stats.filesProcessed,
      filesReused: stats.filesSkipped,
    });

    return {
      buildId: ctx.buildId,
      validationPassed,
      testsPassed,
      errorMessage: errors.length > 0 ? errors.join('; ') : null,
      stats,
    };
  }

  private async acquire(ctx: BuildContext, config: RepoConfig, root: string): Promise<AdapterOutcome<void>> {
    try {
      await rm(root, { recursive: true, force: true });
      await mkdir(root, { recursive: true });
    } catch (error) {
      return { ok: false, kind: 'error', message: toError(error).message };
    }
    return guardAdapterCall(
      'sync',
      this.adapterTimeoutMs,
      (signal) => this.deps.sync.sync(config.location, root, { signal }),
      ctx.signal
    );
  }

  /**
   * Changed candidates plus every candidate that depends on a changed file.
   * Imported files without units of their own are hashed too; the changed
   * ones are returned so the build can record them.
   */
  private async selectFilesToProcess(
    candidates: string[],
    units: DocumentableUnit[]
  ): Promise<{ reprocess: Set<string>; changedSupportFiles: string[] }> {
    const { tracker } = this.deps;
    const candidateSet = new Set(candidates);
    const supportFiles = [
      ...new Set(units.flatMap((unit) => unit.dependencies).filter((file) => !candidateSet.has(file))),
    ];

    const reprocess = new Set(await tracker.getChangedUnits(candidates));
    const changedSupportFiles = await tracker.getChangedUnits(supportFiles);

    for (const file of [...reprocess, ...changedSupportFiles]) {
      for (const dependent of tracker.getDependents(file)) {
        if (candidateSet.has(dependent)) {
          reprocess.add(dependent);
        }
      }
    }
    return { reprocess, changedSupportFiles };
  }

  private reuseCached(file: string, units: DocumentableUnit[]): FileOutcome {
    const valid = this.deps.tracker.getState(file)?.lastValidationResult ?? false;
    const label = units[0]?.module ?? file;
    return {
      file,
      valid,
      errors: valid ? [] : [`${label}: validation failed in a previous build`],
      suggestions: [],
      cached: true,
    };
  }

  private async processFile(
    ctx: BuildContext,
    file: string,
    units: DocumentableUnit[],
    pageDir: string | undefined
  ): Promise<FileOutcome> {
    const outcome: FileOutcome = { file, valid: true, errors: [], suggestions: [], cached: false };
    // Timeouts and thrown errors leave the file out of the cache so it is retried
    let transient = false;

    let source: string;
    try {
      source = await readFile(file, 'utf8');
    } catch (error) {
      outcome.valid = false;
      outcome.errors.push(`${units[0]?.module ?? file}: source unreadable: ${toError(error).message}`);
      return outcome;
    }

    for (const unit of units) {
      const label = `${unit.module}.${unit.name}`;

      const generated = await guardAdapterCall(
        'generation',
        this.adapterTimeoutMs,
        (signal) => this.deps.generation.generate(unit, { signal }),
        ctx.signal
      );
      const artifacts = generated.ok ? generated.value : [];
      if (!generated.ok) {
        transient = true;
        pushUnique(outcome.errors, `${label}: ${describeFailure('generation', generated)}`);
      }

      const documentation = renderUnitDocumentation(unit, artifacts);
      if (pageDir) {
        try {
          await this.writePage(path.join(pageDir, `${unit.name}.md`), documentation);
        } catch (error) {
          transient = true;
          pushUnique(outcome.errors, `${label}: page not written: ${toError(error).message}`);
        }
      }

      const verdict = await guardAdapterCall(
        'validation',
        this.adapterTimeoutMs,
        (signal) => this.deps.validation.validate({ source, documentation }, { signal }),
        ctx.signal
      );
      if (!verdict.ok) {
        transient = true;
        outcome.valid = false;
        pushUnique(outcome.errors, `${label}: ${describeFailure('validation', verdict)}`);
      } else {
        if (verdict.value.incomplete) {
          transient = true;
        }
        if (!verdict.value.isValid) {
          outcome.valid = false;
          const reasons = verdict.value.errors.length > 0 ? verdict.value.errors : ['documentation is invalid'];
          reasons.forEach((reason) => pushUnique(outcome.errors, `${label}: ${reason}`));
        }
        verdict.value.suggestions.forEach((suggestion) =>
          pushUnique(outcome.suggestions, `${label}: ${suggestion}`)
        );
      }

      for (const [index, artifact] of artifacts.entries()) {
        if (artifact.testCode) {
          ctx.testResults.push(await this.runTest(ctx, label, index + 1, artifact.testCode));
        }
      }
    }

    // 7. Persist
    if (transient) {
      ctx.log.info('Not caching file after a transient failure', { file });
    } else {
      await this.deps.tracker.updateState(file, units[0]?.dependencies ?? [], outcome.valid);
    }
    return outcome;
  }

  private async writePage(pagePath: string, documentation: string): Promise<void> {
    await mkdir(path.dirname(pagePath), { recursive: true });
    await writeFile(pagePath, documentation, 'utf8');
  }

  private async runTest(
    ctx: BuildContext,
    label: string,
    example: number,
    testCode: string
  ): Promise<TestReportEntry> {
    ctx.stats.testsExecuted++;
    const executed = await guardAdapterCall(
      'test execution',
      this.adapterTimeoutMs,
      (signal) => this.deps.testExecution.execute(testCode, { signal }),
      ctx.signal
    );

    if (!executed.ok) {
      return {
        unit: label,
        example,
        passed: false,
        coveragePercentage: 0,
        errorMessage: describeFailure('test execution', executed),
      };
    }
    return {
      unit: label,
      example,
      passed: executed.value.passed,
      coveragePercentage: executed.value.coveragePercentage,
      ...(executed.value.errorMessage ? { errorMessage: executed.value.errorMessage } : {}),
    };
  }

  private async emitReports(
    ctx: BuildContext,
    validation: {
      isValid: boolean;
      errors: string[];
      suggestions: string[];
      filesValidated: number;
      filesReused: number;
    }
  ): Promise<void> {
    const generatedAt = new Date();
    try {
      await this.deps.reports.emit(
        { buildId: ctx.buildId, generatedAt, results: ctx.testResults },
        { buildId: ctx.buildId, generatedAt, ...validation }
      );
    } catch (error) {
      if (error instanceof ReportEmissionError) {
        throw error;
      }
      throw new ReportEmissionError(
        `Failed to emit reports: ${toError(error).message}`,
        this.reportsDir,
        toError(error)
      );
    }
  }
}
