/**
 * Build orchestrator types
 */

import type {
  DiscoveryAdapter,
  GenerationAdapter,
  SourceSyncAdapter,
  TestExecutionAdapter,
  ValidationAdapter,
} from '../adapters/types.js';
import type { ChangeTracker } from '../cache/tracker.js';
import type { Logger } from '../logging/logger.js';
import type { ReportEmitter } from '../reports/types.js';

export interface BuildOptions {
  /** Transient workspace, removed by cleanup() */
  workspaceDir: string;
  /** Permanent reports directory; must lie outside the workspace */
  reportsDir: string;
  /** Permanent directory for rendered unit pages; must lie outside the workspace */
  docsDir: string;
  /** Files processed at once */
  concurrency?: number;
  /** Timeout for each external call */
  adapterTimeoutMs?: number;
  /** Overall deadline; pending and later calls time out once it passes */
  buildDeadlineMs?: number;
}

export interface BuildDependencies {
  /** Opened and closed by build() unless the caller already opened it */
  tracker: ChangeTracker;
  sync: SourceSyncAdapter;
  discovery: DiscoveryAdapter;
  generation: GenerationAdapter;
  validation: ValidationAdapter;
  testExecution: TestExecutionAdapter;
  reports: ReportEmitter;
  logger?: Logger;
}

/**
 * Processing outcome of one file
 */
export interface FileOutcome {
  file: string;
  valid: boolean;
  /** Error lines in the order they were recorded */
  errors: string[];
  suggestions: string[];
  /** Reused from the cache rather than processed */
  cached: boolean;
}
