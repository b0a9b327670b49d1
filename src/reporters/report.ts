import type {
  Environment,
  OutputFormat,
  TestReport,
  TestResult,
} from '../types.js';

export interface ReportOptions {
  environment: Environment;
  outputFormat: OutputFormat;
  /** Seconds. */
  duration: number;
}

export function createReport(
  results: readonly TestResult[],
  options: ReportOptions,
): TestReport {
  const passed = results.filter((result) => result.success).length;
  const totalTests = results.length;

  return Object.freeze({
    environment: options.environment,
    totalTests,
    passed,
    failed: totalTests - passed,
    successRate: totalTests === 0 ? 0 : passed / totalTests,
    duration: options.duration,
    outputFormat: options.outputFormat,
    allTests: Object.freeze([...results]),
  });
}

export function allPassed(report: TestReport): boolean {
  return report.failed === 0;
}

export function failedTests(report: TestReport): TestResult[] {
  return report.allTests.filter((result) => !result.success);
}

/** The error message of a failed result, falling back to its message. */
export function failureReason(result: TestResult): string {
  return result.error?.message ?? result.message;
}
