/**
 * External collaborator contracts
 *
 * The orchestrator only talks to these interfaces. Every call receives an
 * AbortSignal that fires on the per-call timeout or the build deadline.
 */

import type {
  DocumentableUnit,
  DocumentationPair,
  GeneratedArtifact,
  TestExecutionResult,
  ValidationVerdict,
} from '../types/index.js';

export interface AdapterCallOptions {
  signal?: AbortSignal;
}

export interface DiscoverOptions extends AdapterCallOptions {
  /** Restrict discovery to these paths, relative to the root */
  paths?: string[];
}

/** Materialises a source location into a local directory */
export interface SourceSyncAdapter {
  /**
   * @throws {SyncError} when the source cannot be fetched
   */
  sync(location: string, destination: string, options?: AdapterCallOptions): Promise<void>;
}

/** Enumerates documentable units under a synced root */
export interface DiscoveryAdapter {
  /**
   * @throws {DiscoveryError} when the root cannot be scanned
   */
  discover(root: string, options?: DiscoverOptions): Promise<DocumentableUnit[]>;
}

/** Produces usage examples for one unit; returns [] on failure */
export interface GenerationAdapter {
  generate(unit: DocumentableUnit, options?: AdapterCallOptions): Promise<GeneratedArtifact[]>;
}

/** Checks rendered documentation against source code */
export interface ValidationAdapter {
  validate(pair: DocumentationPair, options?: AdapterCallOptions): Promise<ValidationVerdict>;
}

/** Runs one generated test */
export interface TestExecutionAdapter {
  execute(testCode: string, options?: AdapterCallOptions): Promise<TestExecutionResult>;
}
