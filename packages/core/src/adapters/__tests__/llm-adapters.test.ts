/**
 * Claude-backed generation and validation adapter tests
 *
 * The client is real but `callWithTools` is stubbed, so nothing leaves
 * the process.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

import { ClaudeClient } from '../../llm/client.js';
import { silentLogger } from '../../logging/logger.js';
import type { DocumentableUnit } from '../../types/index.js';
import { ClaudeExampleGenerator, buildExamplePrompt } from '../generation.js';
import { ClaudeDocumentationValidator } from '../validation.js';

const usage = { inputTokens: 10, outputTokens: 5, costUsd: 0.001 };

const unit: DocumentableUnit = {
  name: 'add',
  module: 'src/math',
  kind: 'function',
  docstring: 'Add two numbers.',
  signature: 'add(a: number, b: number): number',
  sourcePath: '/work/src/math.ts',
  dependencies: [],
};

describe('ClaudeExampleGenerator', () => {
  let client: ClaudeClient;

  beforeEach(() => {
    client = new ClaudeClient({ apiKey: 'test-secret', model: 'claude-3-5-haiku-20241022' });
  });

  it('should describe the unit in the prompt', () => {
    expect(buildExamplePrompt({ ...unit, docstring: null })).toBe(
      [
        'Generate usage examples for this API member.',
        '',
        'Module: src/math',
        'Name: add',
        'Kind: function',
        'Signature: add(a: number, b: number): number',
        'Documentation: (none)',
      ].join('\n')
    );
  });

  it('should map tool output to artifacts', async () => {
    const call = vi.spyOn(client, 'callWithTools').mockResolvedValue({
      success: true,
      usage,
      data: {
        examples: [
          { description: 'Adds', code: 'add(1, 2)', expected_output: '3', test_code: 'test()' },
          { description: 'Negative', code: 'add(-1, 1)', expected_output: '0', test_code: '  ' },
        ],
      },
    });

    const artifacts = await new ClaudeExampleGenerator(client, silentLogger).generate(unit);

    expect(artifacts).toEqual([
      { description: 'Adds', exampleCode: 'add(1, 2)', expectedOutput: '3', testCode: 'test()' },
      { description: 'Negative', exampleCode: 'add(-1, 1)', expectedOutput: '0' },
    ]);
    expect(call).toHaveBeenCalledWith(
      expect.any(String),
      buildExamplePrompt(unit),
      [expect.objectContaining({ name: 'record_examples' })],
      expect.anything(),
      { forceTool: 'record_examples', signal: undefined }
    );
  });

  it('should return no artifacts when the call fails', async () => {
    vi.spyOn(client, 'callWithTools').mockResolvedValue({ success: false, usage, error: 'overloaded' });

    expect(await new ClaudeExampleGenerator(client, silentLogger).generate(unit)).toEqual([]);
  });

  it('should return no artifacts when the client throws', async () => {
    vi.spyOn(client, 'callWithTools').mockRejectedValue(new Error('boom'));

    expect(await new ClaudeExampleGenerator(client, silentLogger).generate(unit)).toEqual([]);
  });
});

describe('ClaudeDocumentationValidator', () => {
  let client: ClaudeClient;
  const pair = { source: 'export function add() {}', documentation: '# add' };

  beforeEach(() => {
    client = new ClaudeClient({ apiKey: 'test-secret', model: 'claude-3-5-haiku-20241022' });
  });

  it('should map the verdict', async () => {
    vi.spyOn(client, 'callWithTools').mockResolvedValue({
      success: true,
      usage,
      data: { is_valid: false, errors: ['Parameter mismatch'], suggestions: ['Update docs'] },
    });

    expect(await new ClaudeDocumentationValidator(client, silentLogger).validate(pair)).toEqual({
      isValid: false,
      errors: ['Parameter mismatch'],
      suggestions: ['Update docs'],
    });
  });

  it('should not report valid when errors are listed', async () => {
    vi.spyOn(client, 'callWithTools').mockResolvedValue({
      success: true,
      usage,
      data: { is_valid: true, errors: ['Missing return type'], suggestions: [] },
    });

    const verdict = await new ClaudeDocumentationValidator(client, silentLogger).validate(pair);

    expect(verdict.isValid).toBe(false);
  });

  it('should turn a failed call into an incomplete invalid verdict', async () => {
    vi.spyOn(client, 'callWithTools').mockResolvedValue({
      success: false,
      usage,
      error: 'Claude API connection error: socket hang up',
    });

    expect(await new ClaudeDocumentationValidator(client, silentLogger).validate(pair)).toEqual({
      isValid: false,
      errors: ['Validation error: Claude API connection error: socket hang up'],
      suggestions: [],
      incomplete: true,
    });
  });

  it('should turn a thrown error into an incomplete invalid verdict', async () => {
    vi.spyOn(client, 'callWithTools').mockRejectedValue(new Error('boom'));

    expect(await new ClaudeDocumentationValidator(client, silentLogger).validate(pair)).toEqual({
      isValid: false,
      errors: ['Validation error: boom'],
      suggestions: [],
      incomplete: true,
    });
  });
});
