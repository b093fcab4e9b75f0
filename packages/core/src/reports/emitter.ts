/**
 * Markdown report emitter
 *
 * Writes both reports into the permanent reports directory, replacing the
 * previous build's copies.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { REPORT_FILES } from '../constants.js';
import { ReportEmissionError, toError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../logging/logger.js';
import { buildTestReport, buildValidationReport } from './generator.js';
import type {
  EmittedReports,
  ReportEmitter,
  TestReportInput,
  ValidationReportInput,
} from './types.js';

export class MarkdownReportEmitter implements ReportEmitter {
  private readonly reportsDir: string;
  private readonly log: Logger;

  constructor(reportsDir: string, logger?: Logger) {
    this.reportsDir = path.resolve(reportsDir);
    this.log = (logger ?? defaultLogger).child({ component: 'reports' });
  }

  async emit(test: TestReportInput, validation: ValidationReportInput): Promise<EmittedReports> {
    const testReportPath = path.join(this.reportsDir, REPORT_FILES.TEST);
    const validationReportPath = path.join(this.reportsDir, REPORT_FILES.VALIDATION);

    await this.write(testReportPath, buildTestReport(test));
    await this.write(validationReportPath, buildValidationReport(validation));

    return { testReportPath, validationReportPath };
  }

  private async write(reportPath: string, content: string): Promise<void> {
    try {
      await mkdir(path.dirname(reportPath), { recursive: true });
      await writeFile(reportPath, content, 'utf8');
      this.log.info('Wrote report', { reportPath });
    } catch (error) {
      const err = toError(error);
      this.log.error('Failed to write report', err, { reportPath });
      throw new ReportEmissionError(`Failed to write report ${reportPath}: ${err.message}`, reportPath, err);
    }
  }
}
