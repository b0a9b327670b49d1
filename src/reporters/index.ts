import type { TestReport } from '../types.js';
import { renderConsole } from './console-reporter.js';
import { renderJSON } from './json-reporter.js';
import { renderJUnit } from './junit-reporter.js';

export { renderConsole, renderJSON, renderJUnit };
export {
  allPassed,
  createReport,
  failedTests,
  type ReportOptions,
} from './report.js';
export { ReportStore } from './report-store.js';

/** Renders the report in the format it was created for. */
export function renderReport(report: TestReport): string {
  switch (report.outputFormat) {
    case 'json':
      return renderJSON(report);
    case 'junit':
      return renderJUnit(report);
    case 'console':
      return renderConsole(report);
  }
}
