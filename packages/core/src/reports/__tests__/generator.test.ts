/**
 * Report Generator Tests
 */

import { describe, it, expect } from 'vitest';

import { buildTestReport, buildValidationReport, formatTimestamp } from '../generator.js';

const generatedAt = new Date('2026-03-04T05:06:07.890Z');

describe('formatTimestamp', () => {
  it('should format in UTC to the second', () => {
    expect(formatTimestamp(generatedAt)).toBe('2026-03-04 05:06:07 UTC');
  });
});

describe('buildTestReport', () => {
  it('should summarise an empty run', () => {
    expect(buildTestReport({ buildId: 'b1', generatedAt, results: [] })).toBe(
      [
        '# Test Execution Report',
        '',
        'Build: b1',
        'Generated on: 2026-03-04 05:06:07 UTC',
        '',
        '## Summary',
        '',
        '- Total Tests: 0',
        '- Passed: 0',
        '- Failed: 0',
        '',
      ].join('\n')
    );
  });

  it('should list failures and average coverage', () => {
    const report = buildTestReport({
      buildId: 'b2',
      generatedAt,
      results: [
        { unit: 'src/math.add', example: 1, passed: true, coveragePercentage: 80 },
        {
          unit: 'src/math.add',
          example: 2,
          passed: false,
          coveragePercentage: 3,
          errorMessage: 'Tests failed with exit code 1',
        },
      ],
    });

    expect(report).toBe(
      [
        '# Test Execution Report',
        '',
        'Build: b2',
        'Generated on: 2026-03-04 05:06:07 UTC',
        '',
        '## Summary',
        '',
        '- Total Tests: 2',
        '- Passed: 1',
        '- Failed: 1',
        '- Average Coverage: 41.50%',
        '',
        '## Failures',
        '',
        '- `src/math.add` (example 2): Tests failed with exit code 1',
        '',
      ].join('\n')
    );
  });
});

describe('buildValidationReport', () => {
  it('should report a valid build without error sections', () => {
    expect(
      buildValidationReport({
        buildId: 'b3',
        generatedAt,
        isValid: true,
        errors: [],
        suggestions: [],
        filesValidated: 2,
        filesReused: 1,
      })
    ).toBe(
      [
        '# Documentation Validation Report',
        '',
        'Build: b3',
        'Generated on: 2026-03-04 05:06:07 UTC',
        '',
        '## Status',
        '',
        '- Overall Status: ✅ Valid',
        '- Files Validated: 2',
        '- Files Reused From Cache: 1',
        '',
      ].join('\n')
    );
  });

  it('should list errors and suggestions', () => {
    const report = buildValidationReport({
      buildId: 'b4',
      generatedAt,
      isValid: false,
      errors: ['src/math.add: Parameter mismatch'],
      suggestions: ['Update docs'],
      filesValidated: 1,
      filesReused: 0,
    });

    expect(report).toContain('- Overall Status: ❌ Invalid');
    expect(report.endsWith(
      [
        '## Errors',
        '',
        '- src/math.add: Parameter mismatch',
        '',
        '## Suggestions',
        '',
        '- Update docs',
        '',
      ].join('\n')
    )).toBe(true);
  });
});
