/**
 * Claude API client
 *
 * Every model output arrives as a tool call and is parsed with a zod
 * schema before it reaches the caller. Transient API failures are retried
 * with exponential backoff; `callWithTools` itself never throws.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { z } from 'zod';

import type { ModelAlias } from '../schemas/index.js';
import type {
  LlmConfig,
  LlmResponse,
  ModelId,
  ModelPricing,
  RetryPolicy,
  TokenUsage,
  ToolDefinition,
} from './types.js';

/** USD per million tokens */
export const PRICING: Record<ModelId, ModelPricing> = {
  'claude-3-5-haiku-20241022': { input: 0.8, output: 4, cacheRead: 0.08, cacheWrite: 1 },
  'claude-sonnet-4-5-20250929': { input: 3, output: 15, cacheRead: 0.3, cacheWrite: 3.75 },
};

export const MODEL_ALIASES = {
  haiku: 'claude-3-5-haiku-20241022',
  sonnet: 'claude-sonnet-4-5-20250929',
} as const satisfies Record<ModelAlias, ModelId>;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  retryableStatusCodes: [429, 500, 502, 503, 504],
};

const DEFAULT_MAX_TOKENS = 4096;

export interface CallOptions {
  /** Require the model to call this tool */
  forceTool?: string;
  maxTokens?: number;
  skipRetry?: boolean;
  /** Aborts the in-flight request and any pending retry */
  signal?: AbortSignal;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Resolve after `ms`, or as soon as `signal` aborts
 */
function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const wake = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', wake);
      resolve();
    };
    const timer = setTimeout(wake, ms);
    signal?.addEventListener('abort', wake, { once: true });
  });
}

/**
 * Whether the SDK error describes a condition worth retrying
 */
export function isRetryableApiError(error: unknown, policy: RetryPolicy = DEFAULT_RETRY_POLICY): boolean {
  if (error instanceof Anthropic.RateLimitError || error instanceof Anthropic.APIConnectionError) {
    return true;
  }
  return (
    error instanceof Anthropic.APIError &&
    error.status !== undefined &&
    policy.retryableStatusCodes.includes(error.status)
  );
}

/**
 * Caller-facing message for a failed request, checked most specific first
 */
export function describeApiError(error: unknown): string {
  if (error instanceof Anthropic.RateLimitError) {
    return 'Rate limited by Claude API after all retries exhausted.';
  }
  if (error instanceof Anthropic.AuthenticationError) {
    return 'Claude API authentication failed. Check API key.';
  }
  if (error instanceof Anthropic.BadRequestError) {
    return `Claude API bad request: ${error.message}`;
  }
  if (error instanceof Anthropic.APIConnectionError) {
    return `Claude API connection error: ${error.message}`;
  }
  if (error instanceof Anthropic.APIError) {
    return `Claude API error: ${error.message} (status: ${error.status ?? 'none'})`;
  }
  return error instanceof Error ? error.message : 'Unknown error';
}

/**
 * Wait before the next attempt: the server's Retry-After when a rate
 * limit carries one, otherwise exponential backoff plus jitter
 */
function retryDelayMs(error: unknown, attempt: number, policy: RetryPolicy): number {
  if (error instanceof Anthropic.RateLimitError) {
    const seconds = Number.parseInt(error.headers?.['retry-after'] ?? '', 10);
    if (seconds > 0) {
      return Math.min(seconds * 1000, policy.maxDelayMs);
    }
  }
  const backoff = policy.baseDelayMs * 2 ** attempt + Math.random() * policy.baseDelayMs * 0.5;
  return Math.min(backoff, policy.maxDelayMs);
}

export function costUsd(
  model: ModelId,
  counts: { input: number; output: number; cacheRead?: number; cacheWrite?: number }
): number {
  const price = PRICING[model];
  const total =
    counts.input * price.input +
    counts.output * price.output +
    (counts.cacheRead ?? 0) * price.cacheRead +
    (counts.cacheWrite ?? 0) * price.cacheWrite;
  return total / 1_000_000;
}

function addUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  const cacheRead = (a.cacheReadTokens ?? 0) + (b.cacheReadTokens ?? 0);
  const cacheWrite = (a.cacheWriteTokens ?? 0) + (b.cacheWriteTokens ?? 0);
  return {
    inputTokens: a.inputTokens + b.inputTokens,
    outputTokens: a.outputTokens + b.outputTokens,
    cacheReadTokens: cacheRead || undefined,
    cacheWriteTokens: cacheWrite || undefined,
    costUsd: a.costUsd + b.costUsd,
  };
}

// ============================================================================
// Client
// ============================================================================

export class ClaudeClient {
  private readonly anthropic: Anthropic;
  private readonly config: LlmConfig;
  private readonly retry: RetryPolicy;

  constructor(config: LlmConfig, retry?: Partial<RetryPolicy>) {
    this.config = config;
    this.retry = { ...DEFAULT_RETRY_POLICY, ...retry };
    this.anthropic = new Anthropic({ apiKey: config.apiKey });
  }

  getModel(): ModelId {
    return this.config.model;
  }

  calculateCost(inputTokens: number, outputTokens: number, cacheReadTokens = 0, cacheWriteTokens = 0): number {
    return costUsd(this.config.model, {
      input: inputTokens,
      output: outputTokens,
      cacheRead: cacheReadTokens,
      cacheWrite: cacheWriteTokens,
    });
  }

  /**
   * Ask Claude to answer through one of `tools` and validate the tool input
   * against `outputSchema`. Usage accumulates across retried attempts.
   */
  async callWithTools<T>(
    systemPrompt: string,
    userMessage: string,
    tools: ToolDefinition[],
    outputSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options?: CallOptions
  ): Promise<LlmResponse<T>> {
    const startedAt = Date.now();
    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model: this.config.model,
      max_tokens: options?.maxTokens ?? this.config.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: this.config.temperature ?? 0,
      system: systemPrompt,
      messages: [{ role: 'user', content: userMessage }],
      tools: tools.map((tool) => ({
        name: tool.name,
        description: tool.description,
        input_schema: tool.input_schema,
      })),
      tool_choice: options?.forceTool ? { type: 'tool', name: options.forceTool } : { type: 'auto' },
    };

    let usage: TokenUsage = { inputTokens: 0, outputTokens: 0, costUsd: 0 };
    let attempt = 0;

    for (;;) {
      let message: Anthropic.Message;
      try {
        message = await this.anthropic.messages.create(params, { signal: options?.signal });
      } catch (error) {
        const canRetry =
          !options?.skipRetry &&
          attempt < this.retry.maxRetries &&
          !options?.signal?.aborted &&
          isRetryableApiError(error, this.retry);

        if (canRetry) {
          await delay(retryDelayMs(error, attempt, this.retry), options?.signal);
          if (!options?.signal?.aborted) {
            attempt++;
            continue;
          }
        }

        return {
          success: false,
          error: describeApiError(error),
          usage,
          durationMs: Date.now() - startedAt,
          retryable: isRetryableApiError(error, this.retry),
          retriesUsed: attempt,
        };
      }

      usage = addUsage(usage, this.toTokenUsage(message.usage));
      return {
        ...this.readToolOutput(message, outputSchema),
        usage,
        durationMs: Date.now() - startedAt,
        retriesUsed: attempt,
      };
    }
  }

  private readToolOutput<T>(
    message: Anthropic.Message,
    outputSchema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Pick<LlmResponse<T>, 'success' | 'data' | 'error' | 'toolName' | 'stopReason' | 'retryable'> {
    const toolUse = message.content.find(
      (block): block is Anthropic.ToolUseBlock => block.type === 'tool_use'
    );

    if (!toolUse) {
      const text = message.content
        .filter((block): block is Anthropic.TextBlock => block.type === 'text')
        .map((block) => block.text)
        .join('\n');
      return { success: false, error: `Model did not use a tool. Response: ${text.slice(0, 200)}` };
    }

    const parsed = outputSchema.safeParse(toolUse.input);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      return {
        success: false,
        error: `Tool ${toolUse.name} returned invalid input: ${issues}`,
        toolName: toolUse.name,
        retryable: false,
      };
    }

    return {
      success: true,
      data: parsed.data,
      toolName: toolUse.name,
      stopReason: message.stop_reason,
    };
  }

  private toTokenUsage(usage: Anthropic.Usage): TokenUsage {
    const cacheRead = usage.cache_read_input_tokens ?? 0;
    const cacheWrite = usage.cache_creation_input_tokens ?? 0;
    return {
      inputTokens: usage.input_tokens,
      outputTokens: usage.output_tokens,
      cacheReadTokens: cacheRead || undefined,
      cacheWriteTokens: cacheWrite || undefined,
      costUsd: this.calculateCost(usage.input_tokens, usage.output_tokens, cacheRead, cacheWrite),
    };
  }
}

/**
 * Client for a model alias. Sonnet gets the larger output allowance since
 * examples with test code run long.
 */
export function createClaudeClient(apiKey: string, alias: ModelAlias): ClaudeClient {
  return new ClaudeClient({
    apiKey,
    model: MODEL_ALIASES[alias],
    maxTokens: alias === 'sonnet' ? 8192 : DEFAULT_MAX_TOKENS,
    temperature: 0,
  });
}
