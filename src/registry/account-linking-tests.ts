import { generateTestWallet } from '../services/auth-service.js';
import type { TestCategory } from '../types.js';
import { type TestCase, defineTestCase, unmet } from './test-case.js';
import { type SuiteDependencies, uniqueTestEmail } from './suite.js';

const category: TestCategory = 'account-linking';

export function createAccountLinkingTests({
  services,
}: SuiteDependencies): TestCase[] {
  const { auth, linking } = services;

  return [
    defineTestCase({
      name: 'Link Email to Wallet',
      category,
      description: 'Signs up with a wallet and links a fresh email to it',
      expectedDuration: 3,
      requiresAuth: true,
      provides: ['link'],
      run: async (ctx) => {
        const signUp = await auth.authenticateWallet(
          generateTestWallet(),
          true,
        );
        if (!signUp.account) return signUp.result;

        const { accessToken } = signUp.account;
        const attempt = await linking.linkAccount(
          accessToken,
          'email',
          uniqueTestEmail('link'),
        );
        if (attempt.linkedAccountId) {
          ctx.set('link', {
            accessToken,
            linkedAccountId: attempt.linkedAccountId,
          });
        }
        return attempt.result;
      },
    }),

    defineTestCase({
      name: 'Link Wallet to Email',
      category,
      description: 'Signs up with email and links a fresh wallet to it',
      expectedDuration: 3,
      requiresAuth: true,
      run: async () => {
        const email = uniqueTestEmail('link');
        const sent = await auth.sendEmailCode(email);
        if (!sent.success) return sent;
        const signUp = await auth.authenticateEmail(email, true);
        if (!signUp.account) return signUp.result;

        const attempt = await linking.linkAccount(
          signUp.account.accessToken,
          'wallet',
          generateTestWallet().address,
        );
        return attempt.result;
      },
    }),

    defineTestCase({
      name: 'Get Identity Graph',
      category,
      description: 'Reads the identity graph of a linked session',
      expectedDuration: 1,
      requiresAuth: true,
      requires: ['account'],
      run: async (ctx, info) => {
        const token =
          ctx.get('link')?.accessToken ?? ctx.get('account')?.accessToken;
        if (!token) {
          return unmet(info, 'NO_TOKEN', 'No access token available');
        }
        return linking.getIdentityGraph(token);
      },
    }),

    defineTestCase({
      name: 'Update Privacy Mode',
      category,
      description: 'Cycles the link created earlier through every privacy mode',
      expectedDuration: 3,
      requiresAuth: true,
      requires: ['link'],
      run: async (ctx, info) => {
        const link = ctx.get('link');
        if (!link) {
          return unmet(
            info,
            'NO_LINKED_ACCOUNT',
            'No linked account from a previous test',
          );
        }
        return linking.sweepPrivacyModes(
          link.accessToken,
          link.linkedAccountId,
        );
      },
    }),
  ];
}
