/**
 * Markdown rendering of generated documentation
 */

import type { DocumentableUnit, GeneratedArtifact } from '../types/index.js';

function codeBlock(language: string, code: string): string {
  return ['```' + language, code.trimEnd(), '```'].join('\n');
}

/**
 * Render the documentation page for one unit. This is the text the
 * validator checks against the source.
 */
export function renderUnitDocumentation(
  unit: DocumentableUnit,
  artifacts: readonly GeneratedArtifact[]
): string {
  const sections: string[] = [
    `## \`${unit.module}.${unit.name}\``,
    codeBlock('typescript', unit.signature),
    unit.docstring ?? '_No description._',
  ];

  artifacts.forEach((artifact, index) => {
    sections.push(`### Example ${index + 1}`, artifact.description);
    sections.push(codeBlock('typescript', artifact.exampleCode));
    if (artifact.expectedOutput.trim()) {
      sections.push('Expected output:', codeBlock('text', artifact.expectedOutput));
    }
    if (artifact.testCode) {
      sections.push('Unit test:', codeBlock('javascript', artifact.testCode));
    }
  });

  return sections.join('\n\n') + '\n';
}
