import { generateTestWallet } from '../services/auth-service.js';
import type { TestCategory } from '../types.js';
import { type TestCase, defineTestCase, unmet } from './test-case.js';
import { type SuiteDependencies, uniqueTestEmail } from './suite.js';

const category: TestCategory = 'authentication';

export function createAuthenticationTests({
  services,
  configuration,
}: SuiteDependencies): TestCase[] {
  const { auth } = services;

  return [
    defineTestCase({
      name: 'Email Auth - New User',
      category,
      description: 'Sends a verification code to a fresh address and signs up',
      expectedDuration: 2,
      provides: ['account'],
      run: async (ctx) => {
        const email = uniqueTestEmail();
        const sent = await auth.sendEmailCode(email);
        if (!sent.success) return sent;

        const attempt = await auth.authenticateEmail(email, true);
        if (attempt.account) ctx.set('account', attempt.account);
        return attempt.result;
      },
    }),

    defineTestCase({
      name: 'Email Auth - Returning User',
      category,
      description: 'Signs in with the configured existing test address',
      expectedDuration: 2,
      run: async () => {
        const sent = await auth.sendEmailCode(configuration.testEmail);
        if (!sent.success) return sent;

        const attempt = await auth.authenticateEmail(
          configuration.testEmail,
          false,
        );
        return attempt.result;
      },
    }),

    defineTestCase({
      name: 'Wallet Auth - New User',
      category,
      description: 'Signs up with a freshly generated wallet',
      expectedDuration: 2,
      provides: ['wallet'],
      run: async (ctx) => {
        const wallet = generateTestWallet();
        const attempt = await auth.authenticateWallet(wallet, true);
        if (attempt.result.success) ctx.set('wallet', wallet);
        return attempt.result;
      },
    }),

    defineTestCase({
      name: 'Wallet Auth - Returning User',
      category,
      description: 'Signs in again with the wallet created earlier in the run',
      expectedDuration: 2,
      requires: ['wallet'],
      run: async (ctx, info) => {
        const wallet = ctx.get('wallet');
        if (!wallet) {
          return unmet(info, 'NO_WALLET', 'No wallet from a previous test');
        }
        const attempt = await auth.authenticateWallet(wallet, false);
        return attempt.result;
      },
    }),

    defineTestCase({
      name: 'Guest Authentication',
      category,
      description: 'Creates a guest session',
      expectedDuration: 1,
      run: async () => (await auth.authenticateGuest()).result,
    }),

    defineTestCase({
      name: 'Logout',
      category,
      description: 'Logs out a throwaway guest session',
      expectedDuration: 1,
      requiresAuth: true,
      run: async () => {
        const guest = await auth.authenticateGuest();
        if (!guest.account) return guest.result;
        return auth.logout(guest.account.accessToken);
      },
    }),
  ];
}
