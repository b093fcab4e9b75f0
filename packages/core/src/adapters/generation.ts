/**
 * Claude-backed example generator
 */

import { toError } from '../errors.js';
import { EXAMPLE_GENERATION_SYSTEM_PROMPT, RECORD_EXAMPLES_TOOL } from '../llm/tools.js';
import type { ClaudeClient } from '../llm/client.js';
import { logger as defaultLogger, type Logger } from '../logging/logger.js';
import { RecordExamplesOutputSchema } from '../schemas/index.js';
import type { DocumentableUnit, GeneratedArtifact } from '../types/index.js';
import type { AdapterCallOptions, GenerationAdapter } from './types.js';

/**
 * User message describing one unit
 */
export function buildExamplePrompt(unit: DocumentableUnit): string {
  return `Generate usage examples for this API member.

Module: ${unit.module}
Name: ${unit.name}
Kind: ${unit.kind}
Signature: ${unit.signature}
Documentation: ${unit.docstring ?? '(none)'}`;
}

export class ClaudeExampleGenerator implements GenerationAdapter {
  private readonly log: Logger;

  constructor(
    private readonly client: ClaudeClient,
    logger?: Logger
  ) {
    this.log = (logger ?? defaultLogger).child({ component: 'generation' });
  }

  /**
   * Never throws; any failure is logged and yields no artifacts
   */
  async generate(unit: DocumentableUnit, options?: AdapterCallOptions): Promise<GeneratedArtifact[]> {
    try {
      const response = await this.client.callWithTools(
        EXAMPLE_GENERATION_SYSTEM_PROMPT,
        buildExamplePrompt(unit),
        [RECORD_EXAMPLES_TOOL],
        RecordExamplesOutputSchema,
        { forceTool: RECORD_EXAMPLES_TOOL.name, signal: options?.signal }
      );

      if (!response.success || !response.data) {
        this.log.warn('Example generation failed', {
          unit: `${unit.module}.${unit.name}`,
          error: response.error,
        });
        return [];
      }

      this.log.debug('Generated examples', {
        unit: `${unit.module}.${unit.name}`,
        count: response.data.examples.length,
        costUsd: response.usage.costUsd,
      });

      return response.data.examples.map((example) => ({
        description: example.description,
        exampleCode: example.code,
        expectedOutput: example.expected_output,
        ...(example.test_code?.trim() ? { testCode: example.test_code } : {}),
      }));
    } catch (error) {
      this.log.error('Example generation threw', toError(error), {
        unit: `${unit.module}.${unit.name}`,
      });
      return [];
    }
  }
}
