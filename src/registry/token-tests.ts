import type { TestCategory } from '../types.js';
import { type TestCase, defineTestCase, unmet } from './test-case.js';
import type { SuiteDependencies } from './suite.js';

const category: TestCategory = 'token-management';

export function createTokenTests({ services }: SuiteDependencies): TestCase[] {
  const { auth, token } = services;

  return [
    defineTestCase({
      name: 'Token Refresh',
      category,
      description:
        'Exchanges the run refresh token, signing in as a guest if none',
      expectedDuration: 2,
      requiresAuth: true,
      provides: ['account'],
      run: async (ctx, info) => {
        let account = ctx.get('account');
        if (!account) {
          account = (await auth.authenticateGuest()).account;
          if (account) ctx.set('account', account);
        }
        if (!account || !account.refreshToken) {
          return unmet(info, 'NO_REFRESH_TOKEN', 'No refresh token available');
        }

        const result = await token.refresh(account.refreshToken);
        const accessToken = result.details?.accessToken;
        const refreshToken = result.details?.refreshToken;
        if (result.success && accessToken && refreshToken) {
          ctx.set('account', { ...account, accessToken, refreshToken });
        }
        return result;
      },
    }),

    defineTestCase({
      name: 'Token Validation',
      category,
      description: 'The run access token is accepted by a protected endpoint',
      expectedDuration: 1,
      requiresAuth: true,
      requires: ['account'],
      run: async (ctx, info) => {
        const account = ctx.get('account');
        if (!account) {
          return unmet(info, 'NO_TOKEN', 'No access token available');
        }
        return token.validate(account.accessToken);
      },
    }),

    defineTestCase({
      name: 'Token Expiration',
      category,
      description: 'An expired token is rejected with 401',
      expectedDuration: 1,
      run: () => token.expectExpired(),
    }),

    defineTestCase({
      name: 'Token Blacklist',
      category,
      description: 'A logged-out token is rejected with 401',
      expectedDuration: 2,
      requiresAuth: true,
      run: async () => {
        const guest = await auth.authenticateGuest();
        if (!guest.account) return guest.result;
        return token.blacklist(guest.account.accessToken);
      },
    }),

    defineTestCase({
      name: 'Token Lifecycle',
      category,
      description: 'Validate, refresh, validate again, then blacklist',
      expectedDuration: 4,
      requiresAuth: true,
      run: async (_ctx, info) => {
        const guest = await auth.authenticateGuest();
        if (!guest.account) return guest.result;
        if (!guest.account.refreshToken) {
          return unmet(info, 'NO_TOKENS', 'No tokens available');
        }
        return token.lifecycle(
          guest.account.accessToken,
          guest.account.refreshToken,
        );
      },
    }),
  ];
}
