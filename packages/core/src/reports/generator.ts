/**
 * Build Report Generator
 *
 * Deterministic Markdown rendering of test and validation outcomes.
 */

import type { TestReportInput, ValidationReportInput } from './types.js';

/**
 * `YYYY-MM-DD HH:MM:SS UTC`
 */
export function formatTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

function bulletList(items: string[]): string[] {
  return items.map((item) => `- ${item}`);
}

export function buildTestReport(input: TestReportInput): string {
  const total = input.results.length;
  const passed = input.results.filter((result) => result.passed).length;
  const failures = input.results.filter((result) => !result.passed);

  const lines = [
    '# Test Execution Report',
    '',
    `Build: ${input.buildId}`,
    `Generated on: ${formatTimestamp(input.generatedAt)}`,
    '',
    '## Summary',
    '',
    `- Total Tests: ${total}`,
    `- Passed: ${passed}`,
    `- Failed: ${total - passed}`,
  ];

  if (total > 0) {
    const average =
      input.results.reduce((sum, result) => sum + result.coveragePercentage, 0) / total;
    lines.push(`- Average Coverage: ${average.toFixed(2)}%`);
  }

  if (failures.length > 0) {
    lines.push(
      '',
      '## Failures',
      '',
      ...bulletList(
        failures.map(
          (failure) =>
            `\`${failure.unit}\` (example ${failure.example}): ${failure.errorMessage ?? 'failed'}`
        )
      )
    );
  }

  return lines.join('\n') + '\n';
}

export function buildValidationReport(input: ValidationReportInput): string {
  const lines = [
    '# Documentation Validation Report',
    '',
    `Build: ${input.buildId}`,
    `Generated on: ${formatTimestamp(input.generatedAt)}`,
    '',
    '## Status',
    '',
    `- Overall Status: ${input.isValid ? '✅ Valid' : '❌ Invalid'}`,
    `- Files Validated: ${input.filesValidated}`,
    `- Files Reused From Cache: ${input.filesReused}`,
  ];

  if (input.errors.length > 0) {
    lines.push('', '## Errors', '', ...bulletList(input.errors));
  }

  if (input.suggestions.length > 0) {
    lines.push('', '## Suggestions', '', ...bulletList(input.suggestions));
  }

  return lines.join('\n') + '\n';
}
