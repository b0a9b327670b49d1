import type { TestCategory } from '../types.js';
import { createAccountLinkingTests } from './account-linking-tests.js';
import { createAuthenticationTests } from './authentication-tests.js';
import { createEdgeCaseTests } from './edge-case-tests.js';
import { createProfileTests } from './profile-tests.js';
import type { SuiteDependencies } from './suite.js';
import type { TestCase } from './test-case.js';
import { createTokenTests } from './token-tests.js';

export interface TestRegistry {
  /** Every case, in execution order. */
  all(): readonly TestCase[];
  forCategory(category: TestCategory): readonly TestCase[];
}

export class StaticRegistry implements TestRegistry {
  private readonly cases: readonly TestCase[];

  constructor(cases: readonly TestCase[]) {
    const seen = new Set<string>();
    for (const testCase of cases) {
      if (seen.has(testCase.name)) {
        throw new Error(`Duplicate test case name: ${testCase.name}`);
      }
      seen.add(testCase.name);
    }
    this.cases = Object.freeze([...cases]);
  }

  all(): readonly TestCase[] {
    return this.cases;
  }

  forCategory(category: TestCategory): readonly TestCase[] {
    return this.cases.filter((testCase) => testCase.category === category);
  }
}

/**
 * Full suite. Categories run in this order because later ones read the
 * account that authentication creates.
 */
export function createDefaultRegistry(deps: SuiteDependencies): TestRegistry {
  return new StaticRegistry([
    ...createAuthenticationTests(deps),
    ...createProfileTests(deps),
    ...createAccountLinkingTests(deps),
    ...createTokenTests(deps),
    ...createEdgeCaseTests(deps),
  ]);
}
