/**
 * Reports module exports
 */
export * from './types.js';
export { buildTestReport, buildValidationReport, formatTimestamp } from './generator.js';
export { MarkdownReportEmitter } from './emitter.js';
