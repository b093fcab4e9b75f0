/**
 * LLM module
 *
 * Claude API client with tool-use support.
 */

export {
  ClaudeClient,
  createClaudeClient,
  DEFAULT_RETRY_POLICY,
  costUsd,
  describeApiError,
  isRetryableApiError,
  PRICING,
  MODEL_ALIASES,
} from './client.js';
export type { CallOptions } from './client.js';
export {
  RECORD_EXAMPLES_TOOL,
  RECORD_VALIDATION_TOOL,
  EXAMPLE_GENERATION_SYSTEM_PROMPT,
  DOCUMENTATION_VALIDATION_SYSTEM_PROMPT,
} from './tools.js';
export type {
  LlmConfig,
  LlmResponse,
  TokenUsage,
  ToolDefinition,
  JsonSchema,
  JsonSchemaProperty,
  ModelId,
  RetryPolicy,
  ModelPricing,
} from './types.js';
