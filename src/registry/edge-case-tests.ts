import type { TestCategory } from '../types.js';
import { type TestCase, defineTestCase } from './test-case.js';
import { type SuiteDependencies, uniqueTestEmail } from './suite.js';

const category: TestCategory = 'edge-cases';

const CONCURRENT_SESSION_COUNT = 2;

export function createEdgeCaseTests({
  services,
}: SuiteDependencies): TestCase[] {
  const { auth, token } = services;

  return [
    defineTestCase({
      name: 'Invalid Email Code',
      category,
      description: 'A wrong verification code is rejected',
      expectedDuration: 1,
      run: () => auth.rejectInvalidCode(uniqueTestEmail()),
    }),

    defineTestCase({
      name: 'Rate Limiting',
      category,
      description: 'Bursts of send-code requests eventually get a 429',
      expectedDuration: 5,
      run: () => auth.probeRateLimit(),
    }),

    defineTestCase({
      name: 'Concurrent Sessions',
      category,
      description: 'Independent guest sessions are accepted side by side',
      expectedDuration: 2,
      requiresAuth: true,
      run: async () => {
        const tokens: string[] = [];
        for (let i = 0; i < CONCURRENT_SESSION_COUNT; i++) {
          const guest = await auth.authenticateGuest();
          if (!guest.account) return guest.result;
          tokens.push(guest.account.accessToken);
        }
        return token.concurrentSessions(tokens);
      },
    }),
  ];
}
