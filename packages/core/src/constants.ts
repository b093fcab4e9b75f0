/**
 * Application constants
 */

/** Project-relative location of the persisted change-tracking cache */
export const DEFAULT_CACHE_FILE = '.cache/build_state.json';

/** Project-relative location of the transient build workspace */
export const DEFAULT_WORKSPACE_DIR = '.docforge/workspace';

/** Permanent reports directory */
export const DEFAULT_REPORTS_DIR = 'docs/reports';

/** Permanent directory for rendered API pages */
export const DEFAULT_DOCS_DIR = 'docs/api';

/** Report file names inside the reports directory */
export const REPORT_FILES = {
  TEST: 'test_report.md',
  VALIDATION: 'validation_report.md',
} as const;

/** Chunk size used when folding file content into a digest */
export const HASH_CHUNK_SIZE_BYTES = 4096;

/** Maximum number of files processed concurrently */
export const DEFAULT_CONCURRENCY = 4;

/** Timeout applied to every external adapter call */
export const DEFAULT_ADAPTER_TIMEOUT_MS = 120_000;

/** Command used to execute generated tests (the test file path is appended) */
export const DEFAULT_TEST_COMMAND = [
  'node',
  '--test',
  '--experimental-test-coverage',
] as const;

/** Directories never scanned for documentable units */
export const EXCLUDED_DIRECTORIES = [
  '.git',
  'node_modules',
  'dist',
  'build',
  'coverage',
  'test',
  'tests',
  '__tests__',
  'docs',
] as const;

/** Extensions of source files scanned for documentable units */
export const SOURCE_EXTENSIONS = ['.ts', '.tsx', '.mts', '.cts'] as const;

/** Project-relative record of the last seen SDK versions */
export const DEFAULT_VERSIONS_FILE = '.cache/sdk_versions.json';

/** Timeout for one package registry request */
export const DEFAULT_REGISTRY_TIMEOUT_MS = 30_000;

/** SDK releases that trigger a rebuild when a new version appears */
export const DEFAULT_WATCHED_PACKAGES = [
  { registry: 'npm', name: '@anthropic-ai/sdk' },
  { registry: 'pypi', name: 'anthropic' },
] as const;
