/**
 * Zod validation schemas for docforge
 *
 * Used wherever data crosses a trust boundary: the persisted cache file,
 * the build configuration file, and tool output returned by Claude.
 */

import { z } from 'zod';

import {
  DEFAULT_ADAPTER_TIMEOUT_MS,
  DEFAULT_CACHE_FILE,
  DEFAULT_CONCURRENCY,
  DEFAULT_DOCS_DIR,
  DEFAULT_REGISTRY_TIMEOUT_MS,
  DEFAULT_REPORTS_DIR,
  DEFAULT_TEST_COMMAND,
  DEFAULT_VERSIONS_FILE,
  DEFAULT_WATCHED_PACKAGES,
  DEFAULT_WORKSPACE_DIR,
} from '../constants.js';

// ============================================================================
// Persisted Cache
// ============================================================================

export const TrackedUnitStateSchema = z
  .object({
    contentHash: z.string(),
    dependencies: z.array(z.string()),
    lastValidationResult: z.boolean(),
  })
  .strict();

export const PersistedCacheSchema = z.record(z.string(), TrackedUnitStateSchema);

// ============================================================================
// Configuration
// ============================================================================

export const RepoConfigSchema = z
  .object({
    location: z.string().min(1),
    paths: z.array(z.string().min(1)).optional(),
  })
  .strict();

export const ModelAliasSchema = z.enum(['haiku', 'sonnet']);

export const WatchedPackageSchema = z
  .object({
    registry: z.enum(['npm', 'pypi']),
    name: z.string().min(1),
  })
  .strict();

export const MonitorConfigSchema = z
  .object({
    versionsFile: z.string().min(1).default(DEFAULT_VERSIONS_FILE),
    packages: z
      .array(WatchedPackageSchema)
      .min(1)
      .default(() => DEFAULT_WATCHED_PACKAGES.map((watched) => ({ ...watched }))),
    requestTimeoutMs: z.number().int().positive().default(DEFAULT_REGISTRY_TIMEOUT_MS),
  })
  .strict();

export const BuildConfigSchema = z
  .object({
    sources: z.array(RepoConfigSchema).min(1, 'At least one source is required'),
    workspaceDir: z.string().min(1).default(DEFAULT_WORKSPACE_DIR),
    cacheFile: z.string().min(1).default(DEFAULT_CACHE_FILE),
    reportsDir: z.string().min(1).default(DEFAULT_REPORTS_DIR),
    docsDir: z.string().min(1).default(DEFAULT_DOCS_DIR),
    concurrency: z.number().int().min(1).max(32).default(DEFAULT_CONCURRENCY),
    adapterTimeoutMs: z.number().int().positive().default(DEFAULT_ADAPTER_TIMEOUT_MS),
    buildDeadlineMs: z.number().int().positive().optional(),
    model: ModelAliasSchema.default('sonnet'),
    testCommand: z
      .array(z.string().min(1))
      .min(1)
      .default([...DEFAULT_TEST_COMMAND]),
    monitor: MonitorConfigSchema.default({}),
  })
  .strict();

// ============================================================================
// Tracked SDK Versions
// ============================================================================

export const TrackedVersionsSchema = z.object({
  versions: z.record(z.string(), z.string()),
  lastChecked: z.string().datetime(),
});

// ============================================================================
// Package Registry Responses
// ============================================================================

export const NpmPackumentSchema = z.object({
  'dist-tags': z.object({ latest: z.string().min(1) }),
});

export const PypiProjectSchema = z.object({
  info: z.object({ version: z.string().min(1) }),
});

// ============================================================================
// Tool Outputs
// ============================================================================

export const RecordExamplesOutputSchema = z.object({
  examples: z.array(
    z.object({
      description: z.string(),
      code: z.string(),
      expected_output: z.string(),
      test_code: z.string().optional(),
    })
  ),
});

export const RecordValidationOutputSchema = z.object({
  is_valid: z.boolean(),
  errors: z.array(z.string()),
  suggestions: z.array(z.string()),
});

// ============================================================================
// Inferred Types
// ============================================================================

export type BuildConfigInput = z.input<typeof BuildConfigSchema>;
export type BuildConfig = z.output<typeof BuildConfigSchema>;
export type ModelAlias = z.infer<typeof ModelAliasSchema>;
export type WatchedPackage = z.infer<typeof WatchedPackageSchema>;
export type MonitorConfig = z.output<typeof MonitorConfigSchema>;
export type TrackedVersions = z.infer<typeof TrackedVersionsSchema>;
export type RecordExamplesOutput = z.infer<typeof RecordExamplesOutputSchema>;
export type RecordValidationOutput = z.infer<typeof RecordValidationOutputSchema>;
