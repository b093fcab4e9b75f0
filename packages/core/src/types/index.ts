/**
 * Core TypeScript types for docforge
 *
 * Runtime-validated counterparts live in ../schemas/index.ts.
 */

// ============================================================================
// Change Tracking
// ============================================================================

/**
 * Cached outcome for one tracked file, keyed by canonical path.
 * An entry exists only once the file has been fully processed and validated.
 */
export interface TrackedUnitState {
  /** Hex SHA-256 of the file content */
  contentHash: string;
  /** Canonical paths this file's correctness depends on */
  dependencies: string[];
  lastValidationResult: boolean;
}

/** Durable record of build history */
export type PersistedCache = Record<string, TrackedUnitState>;

// ============================================================================
// Build Inputs and Outputs
// ============================================================================

/**
 * One configured source. `location` is a git URL or a local directory;
 * `paths` restricts discovery to a subset of the synced tree.
 */
export interface RepoConfig {
  location: string;
  paths?: string[];
}

export interface BuildStats {
  sourcesSynced: number;
  sourcesFailed: number;
  unitsDiscovered: number;
  filesProcessed: number;
  filesSkipped: number;
  testsExecuted: number;
  durationMs: number;
}

/**
 * Outcome of one orchestration run. Never persisted.
 */
export interface BuildResult {
  buildId: string;
  validationPassed: boolean;
  testsPassed: boolean;
  errorMessage: string | null;
  stats: BuildStats;
}

// ============================================================================
// Pipeline Entities
// ============================================================================

export type UnitKind = 'function' | 'method';

/**
 * A documentable API member found by discovery
 */
export interface DocumentableUnit {
  name: string;
  /** Module id: source path relative to the discovery root, without extension */
  module: string;
  kind: UnitKind;
  docstring: string | null;
  signature: string;
  /** Absolute path of the file declaring the unit */
  sourcePath: string;
  /** Absolute paths of local files imported by `sourcePath` */
  dependencies: string[];
}

/**
 * Generated example (and optional test) for a documentable unit
 */
export interface GeneratedArtifact {
  description: string;
  exampleCode: string;
  expectedOutput: string;
  testCode?: string;
}

export interface ValidationVerdict {
  isValid: boolean;
  errors: string[];
  suggestions: string[];
  /** Set when no verdict could be obtained; the file is retried next build */
  incomplete?: boolean;
}

export interface TestExecutionResult {
  passed: boolean;
  coveragePercentage: number;
  errorMessage?: string;
}

/** Input to the validation adapter */
export interface DocumentationPair {
  source: string;
  documentation: string;
}
