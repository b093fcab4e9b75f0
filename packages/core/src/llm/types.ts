/**
 * LLM module types
 */

/** Claude models the pipeline can run on */
export type ModelId = 'claude-3-5-haiku-20241022' | 'claude-sonnet-4-5-20250929';

export interface ModelPricing {
  input: number;
  output: number;
  cacheRead: number;
  cacheWrite: number;
}

export interface LlmConfig {
  apiKey: string;
  model: ModelId;
  /** Default output allowance; CallOptions.maxTokens overrides it per call */
  maxTokens?: number;
  temperature?: number;
}

/**
 * Outcome of one callWithTools invocation, retries included
 */
export interface LlmResponse<T = unknown> {
  success: boolean;
  /** Validated tool input, present only on success */
  data?: T;
  error?: string;
  usage: TokenUsage;
  toolName?: string;
  durationMs?: number;
  stopReason?: string | null;
  /** Whether the final failure was a transient API condition */
  retryable?: boolean;
  retriesUsed?: number;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  cacheReadTokens?: number;
  cacheWriteTokens?: number;
  costUsd: number;
}

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** HTTP statuses retried besides rate limits and connection failures */
  retryableStatusCodes: number[];
}

/**
 * A tool Claude may call; `input_schema` describes the structured answer
 */
export interface ToolDefinition {
  name: string;
  description: string;
  input_schema: JsonSchema;
}

/** Top-level tool input schema */
export type JsonSchema = {
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required?: string[];
  additionalProperties?: boolean;
};

export type JsonSchemaProperty =
  | JsonSchemaString
  | JsonSchemaBoolean
  | JsonSchemaArray
  | JsonSchemaObject;

export interface JsonSchemaString {
  type: 'string';
  description?: string;
  minLength?: number;
}

export interface JsonSchemaBoolean {
  type: 'boolean';
  description?: string;
}

export interface JsonSchemaArray {
  type: 'array';
  description?: string;
  items: JsonSchemaProperty;
  minItems?: number;
  maxItems?: number;
}

export interface JsonSchemaObject {
  type: 'object';
  description?: string;
  properties: Record<string, JsonSchemaProperty>;
  required?: string[];
  additionalProperties?: boolean;
}
