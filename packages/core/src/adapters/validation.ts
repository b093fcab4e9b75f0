/**
 * Claude-backed documentation validator
 */

import { toError } from '../errors.js';
import { DOCUMENTATION_VALIDATION_SYSTEM_PROMPT, RECORD_VALIDATION_TOOL } from '../llm/tools.js';
import type { ClaudeClient } from '../llm/client.js';
import { logger as defaultLogger, type Logger } from '../logging/logger.js';
import { RecordValidationOutputSchema } from '../schemas/index.js';
import type { DocumentationPair, ValidationVerdict } from '../types/index.js';
import type { AdapterCallOptions, ValidationAdapter } from './types.js';

export function buildValidationPrompt(pair: DocumentationPair): string {
  return `Validate the following API documentation against the source code.

Source Code:
\`\`\`typescript
${pair.source}
\`\`\`

Documentation:
\`\`\`markdown
${pair.documentation}
\`\`\``;
}

/**
 * Verdict used when the model cannot produce one
 */
export function validationFailure(message: string): ValidationVerdict {
  return { isValid: false, errors: [`Validation error: ${message}`], suggestions: [], incomplete: true };
}

export class ClaudeDocumentationValidator implements ValidationAdapter {
  private readonly log: Logger;

  constructor(
    private readonly client: ClaudeClient,
    logger?: Logger
  ) {
    this.log = (logger ?? defaultLogger).child({ component: 'validation' });
  }

  async validate(pair: DocumentationPair, options?: AdapterCallOptions): Promise<ValidationVerdict> {
    try {
      const response = await this.client.callWithTools(
        DOCUMENTATION_VALIDATION_SYSTEM_PROMPT,
        buildValidationPrompt(pair),
        [RECORD_VALIDATION_TOOL],
        RecordValidationOutputSchema,
        { forceTool: RECORD_VALIDATION_TOOL.name, signal: options?.signal }
      );

      if (!response.success || !response.data) {
        const message = response.error ?? 'no verdict returned';
        this.log.warn('Validation call failed', { error: message });
        return validationFailure(message);
      }

      const { is_valid, errors, suggestions } = response.data;
      // A verdict listing errors is never valid
      return { isValid: is_valid && errors.length === 0, errors, suggestions };
    } catch (error) {
      const err = toError(error);
      this.log.error('Validation threw', err);
      return validationFailure(err.message);
    }
  }
}
