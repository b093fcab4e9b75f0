/**
 * LLM Tool definitions for Claude function calling
 *
 * All structured outputs from Claude use tool-use (function calling).
 * Each tool's input is validated with the matching zod schema in
 * `schemas/index.ts` before use.
 */

import type { ToolDefinition } from './types.js';

// ============================================================================
// Generation
// ============================================================================

/**
 * record_examples - Used by the example generator
 *
 * One call records every example for a single documentable unit.
 */
export const RECORD_EXAMPLES_TOOL: ToolDefinition = {
  name: 'record_examples',
  description:
    'Record usage examples for a single exported function or method, each with runnable code, the output it produces and an optional unit test.',
  input_schema: {
    type: 'object',
    properties: {
      examples: {
        type: 'array',
        description: 'Two or three examples covering different use cases',
        minItems: 1,
        maxItems: 5,
        items: {
          type: 'object',
          properties: {
            description: {
              type: 'string',
              description: 'What the example demonstrates, in one or two sentences',
            },
            code: {
              type: 'string',
              description: 'TypeScript example code calling the unit',
            },
            expected_output: {
              type: 'string',
              description: 'What running the example prints or returns',
            },
            test_code: {
              type: 'string',
              description:
                'A self-contained JavaScript ES module test using node:test and node:assert that verifies the example',
            },
          },
          required: ['description', 'code', 'expected_output'],
        },
      },
    },
    required: ['examples'],
  },
};

// ============================================================================
// Validation
// ============================================================================

/**
 * record_validation - Used by the documentation validator
 */
export const RECORD_VALIDATION_TOOL: ToolDefinition = {
  name: 'record_validation',
  description:
    'Record whether the documentation accurately describes the source code, with specific errors and suggestions.',
  input_schema: {
    type: 'object',
    properties: {
      is_valid: {
        type: 'boolean',
        description: 'True only if the documentation matches the source code',
      },
      errors: {
        type: 'array',
        description: 'Specific inaccuracies found (empty when valid)',
        items: { type: 'string' },
      },
      suggestions: {
        type: 'array',
        description: 'Improvements worth making even if the documentation is valid',
        items: { type: 'string' },
      },
    },
    required: ['is_valid', 'errors', 'suggestions'],
  },
};

// ============================================================================
// System Prompts
// ============================================================================

export const EXAMPLE_GENERATION_SYSTEM_PROMPT = `You write API documentation examples for TypeScript libraries.

## Your Role

Given one exported function or method (name, signature, doc comment), produce two or three examples that show different use cases.

## Rules

- Examples must only use parameters and return values present in the signature
- Prefer small, realistic inputs over placeholders
- \`expected_output\` is exactly what the example prints or evaluates to
- When you include \`test_code\`, write it as a plain JavaScript ES module that runs with \`node --test\` without network access, using \`node:test\` and \`node:assert/strict\`
- Do not invent behaviour the doc comment and signature do not support

## Output Format

Call \`record_examples\` exactly once with all examples.
`;

export const DOCUMENTATION_VALIDATION_SYSTEM_PROMPT = `You review API documentation against the source code it describes.

## Checks

1. Every documented function and parameter exists in the source and matches its name and type
2. Return types and descriptions are accurate
3. Example code is correct for the current signature
4. Nothing important in the source is missing or outdated in the documentation

## Output Format

Call \`record_validation\` exactly once.
- \`is_valid\` is true only when there are no errors
- Each entry in \`errors\` names one concrete problem, such as "Parameter mismatch: docs list 'limit', source takes 'max'"
- \`suggestions\` may be non-empty even when the documentation is valid
`;
