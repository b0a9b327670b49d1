import { CATEGORY_LABELS, TEST_CATEGORIES, type TestReport } from '../types.js';
import { failedTests, failureReason } from './report.js';

export function renderConsole(report: TestReport): string {
  const lines: string[] = [
    '',
    '📊 Test Results',
    '================',
    `Environment: ${report.environment}`,
    `Total Tests: ${report.totalTests}`,
    `Passed: ✅ ${report.passed}`,
    `Failed: ❌ ${report.failed}`,
    `Success Rate: ${(report.successRate * 100).toFixed(1)}%`,
    `Duration: ${report.duration.toFixed(2)}s`,
  ];

  const byCategory = TEST_CATEGORIES.flatMap((category) => {
    const results = report.allTests.filter((r) => r.category === category);
    if (results.length === 0) return [];
    const passed = results.filter((r) => r.success).length;
    return [`  ${CATEGORY_LABELS[category]}: ${passed}/${results.length}`];
  });
  if (byCategory.length > 0) {
    lines.push('', 'By Category:', ...byCategory);
  }

  const failures = failedTests(report);
  if (failures.length > 0) {
    lines.push('', '❌ Failed Tests:');
    for (const result of failures) {
      lines.push(`  - ${result.name}: ${failureReason(result)}`);
    }
  }

  lines.push('', '✅ Test run completed!');
  return lines.join('\n');
}
