import type { TestCategory } from '../types.js';
import { type TestCase, defineTestCase, unmet } from './test-case.js';
import type { SuiteDependencies } from './suite.js';

const category: TestCategory = 'profile';

const NO_TOKEN_MESSAGE = 'No access token available';

const DELETE_PROFILE_NAME = 'Profile to Delete';

export function createProfileTests({
  services,
}: SuiteDependencies): TestCase[] {
  const { auth, profile } = services;

  return [
    defineTestCase({
      name: 'Automatic Profile Creation',
      category,
      description: 'A new account starts with exactly the default profile',
      expectedDuration: 1,
      requiresAuth: true,
      requires: ['account'],
      run: async (ctx, info) => {
        const account = ctx.get('account');
        if (!account) return unmet(info, 'NO_TOKEN', NO_TOKEN_MESSAGE);
        return profile.verifyAutomaticProfile(account.accessToken);
      },
    }),

    defineTestCase({
      name: 'Get Profiles',
      category,
      description:
        'Lists the profiles of the run account, signing in as a guest if none',
      expectedDuration: 1,
      requiresAuth: true,
      provides: ['account'],
      run: async (ctx, info) => {
        let account = ctx.get('account');
        if (!account) {
          account = (await auth.authenticateGuest()).account;
          if (!account) return unmet(info, 'NO_TOKEN', NO_TOKEN_MESSAGE);
          ctx.set('account', account);
        }
        return profile.getProfiles(account.accessToken);
      },
    }),

    defineTestCase({
      name: 'Create Additional Profile',
      category,
      description: 'Adds a second profile to the run account',
      expectedDuration: 2,
      requiresAuth: true,
      requires: ['account'],
      provides: ['additionalProfileId'],
      run: async (ctx, info) => {
        const account = ctx.get('account');
        if (!account) return unmet(info, 'NO_TOKEN', NO_TOKEN_MESSAGE);

        const name = `Test Profile ${Date.now()}`;
        const result = await profile.createProfile(account.accessToken, name);
        const profileId = result.details?.profileId;
        if (result.success && profileId) {
          ctx.set('additionalProfileId', profileId);
          const created = { id: profileId, name, isActive: false };
          ctx.set('account', {
            ...account,
            profiles: [...account.profiles, created],
          });
        }
        return result;
      },
    }),

    defineTestCase({
      name: 'Switch Profile',
      category,
      description: 'Makes a non-active profile the active one',
      expectedDuration: 1,
      requiresAuth: true,
      requires: ['account'],
      run: async (ctx, info) => {
        const account = ctx.get('account');
        if (!account) return unmet(info, 'NO_TOKEN', NO_TOKEN_MESSAGE);

        const targetId =
          ctx.get('additionalProfileId') ??
          account.profiles.find((p) => !p.isActive)?.id;
        if (!targetId) {
          return unmet(
            info,
            'NO_SECOND_PROFILE',
            'Need at least 2 profiles to test switching',
          );
        }

        const result = await profile.switchProfile(
          account.accessToken,
          targetId,
        );
        if (result.success) {
          ctx.set('account', {
            ...account,
            profiles: account.profiles.map((p) => ({
              ...p,
              isActive: p.id === targetId,
            })),
          });
        }
        return result;
      },
    }),

    defineTestCase({
      name: 'Update Profile',
      category,
      description: 'Renames the additional profile',
      expectedDuration: 1,
      requiresAuth: true,
      requires: ['account', 'additionalProfileId'],
      run: async (ctx, info) => {
        const account = ctx.get('account');
        if (!account) return unmet(info, 'NO_TOKEN', NO_TOKEN_MESSAGE);
        const profileId = ctx.get('additionalProfileId');
        if (!profileId) {
          return unmet(info, 'NO_PROFILE_ID', 'No profile id to update');
        }
        return profile.updateProfile(
          account.accessToken,
          profileId,
          `Updated Profile ${Date.now()}`,
        );
      },
    }),

    defineTestCase({
      name: 'Delete Profile',
      category,
      description:
        'Deletes a throwaway profile, or checks the last one is protected',
      expectedDuration: 3,
      requiresAuth: true,
      requires: ['account'],
      run: async (ctx, info) => {
        const account = ctx.get('account');
        if (!account) {
          return unmet(info, 'NO_ACCOUNT', 'No account from a previous test');
        }

        const created = await profile.createProfile(
          account.accessToken,
          DELETE_PROFILE_NAME,
        );
        const throwawayId = created.details?.profileId;
        if (created.success && throwawayId) {
          return profile.deleteProfile(account.accessToken, throwawayId);
        }

        // Without a throwaway, only the last-profile guard can be checked.
        const [only, ...rest] = account.profiles;
        if (!only || rest.length > 0) return created;
        return profile.deleteProfile(account.accessToken, only.id);
      },
    }),
  ];
}
