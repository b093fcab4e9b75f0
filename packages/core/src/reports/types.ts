/**
 * Build report types
 */

export interface TestReportEntry {
  /** `<module>.<name>` of the unit the test belongs to */
  unit: string;
  /** 1-based index of the example within the unit */
  example: number;
  passed: boolean;
  coveragePercentage: number;
  errorMessage?: string;
}

export interface TestReportInput {
  buildId: string;
  generatedAt: Date;
  results: TestReportEntry[];
}

export interface ValidationReportInput {
  buildId: string;
  generatedAt: Date;
  isValid: boolean;
  errors: string[];
  suggestions: string[];
  filesValidated: number;
  filesReused: number;
}

export interface EmittedReports {
  testReportPath: string;
  validationReportPath: string;
}

/** Writes the build's reports */
export interface ReportEmitter {
  /**
   * @throws {ReportEmissionError} when a report cannot be written
   */
  emit(test: TestReportInput, validation: ValidationReportInput): Promise<EmittedReports>;
}
