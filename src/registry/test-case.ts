import { TestError } from '../errors.js';
import type { ContextLease } from '../runner/run-context.js';
import type { ContextKey, TestCategory, TestResult } from '../types.js';

export interface TestCaseInfo {
  readonly name: string;
  readonly category: TestCategory;
}

export interface TestCase extends TestCaseInfo {
  readonly description: string;
  readonly requiresAuth: boolean;
  /** Seconds. Used for the ETA only, never enforced. */
  readonly expectedDuration: number;
  /** Run-context keys this case reads, written by an earlier case. */
  readonly requires: readonly ContextKey[];
  /** Run-context keys this case writes for later cases. */
  readonly provides: readonly ContextKey[];
  run(ctx: ContextLease, info: TestCaseInfo): Promise<TestResult>;
}

export type TestCaseDefinition = Omit<
  TestCase,
  'requires' | 'provides' | 'requiresAuth'
> &
  Partial<Pick<TestCase, 'requires' | 'provides' | 'requiresAuth'>>;

export function defineTestCase(definition: TestCaseDefinition): TestCase {
  return Object.freeze({
    ...definition,
    requiresAuth: definition.requiresAuth ?? false,
    requires: Object.freeze([...(definition.requires ?? [])]),
    provides: Object.freeze([...(definition.provides ?? [])]),
  });
}

/**
 * Result for a case whose correlation data from an earlier case is missing.
 * Reported as a failure with its own code, never skipped.
 */
export function unmet(
  info: TestCaseInfo,
  code: string,
  message: string,
): TestResult {
  return {
    name: info.name,
    category: info.category,
    success: false,
    message,
    executionTime: 0,
    error: new TestError(code, message),
  };
}

export interface UnmetDependency {
  testName: string;
  key: ContextKey;
}

/**
 * Lists `requires` keys that no earlier case in the selection provides.
 * Such cases will report a precondition failure unless the key is already
 * present in the run context.
 */
export function findUnmetDependencies(
  cases: readonly TestCase[],
): UnmetDependency[] {
  const provided = new Set<ContextKey>();
  const unmetDependencies: UnmetDependency[] = [];

  for (const testCase of cases) {
    for (const key of testCase.requires) {
      if (!provided.has(key)) {
        unmetDependencies.push({ testName: testCase.name, key });
      }
    }
    for (const key of testCase.provides) {
      provided.add(key);
    }
  }

  return unmetDependencies;
}
