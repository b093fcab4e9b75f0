/**
 * Build module
 *
 * Orchestrates incremental documentation builds.
 */

export { DocumentationBuilder, sourceSlug } from './orchestrator.js';
export { withTimeout, guardAdapterCall, mapWithConcurrency } from './concurrency.js';
export {
  assertWorkspaceExcludes,
  permanentPaths,
  removeWorkspace,
  type ProtectedPath,
} from './workspace.js';
export type { BuildOptions, BuildDependencies, FileOutcome } from './types.js';
