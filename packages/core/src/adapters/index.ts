/**
 * Adapters module
 *
 * Contracts for the build's external collaborators and their default
 * implementations.
 */

export { GitSyncAdapter, isRemoteLocation } from './sync.js';
export type { GitSyncAdapterOptions } from './sync.js';
export { TypeScriptDiscoveryAdapter, isInExcludedDirectory, isSourceFile } from './discovery.js';
export type { TypeScriptDiscoveryAdapterOptions } from './discovery.js';
export { ClaudeExampleGenerator, buildExamplePrompt } from './generation.js';
export { ClaudeDocumentationValidator, buildValidationPrompt, validationFailure } from './validation.js';
export { NodeTestExecutor, parseCoverage } from './test-executor.js';
export type { NodeTestExecutorOptions } from './test-executor.js';
export type {
  AdapterCallOptions,
  DiscoverOptions,
  SourceSyncAdapter,
  DiscoveryAdapter,
  GenerationAdapter,
  ValidationAdapter,
  TestExecutionAdapter,
} from './types.js';
