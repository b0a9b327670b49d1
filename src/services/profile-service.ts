import { TestError } from '../errors.js';
import type { NetworkClient } from '../network/network-client.js';
import type { TestCategory, TestResult } from '../types.js';
import {
  ProfileListResponseSchema,
  ProfileResponseSchema,
  SuccessResponseSchema,
  SwitchProfileResponseSchema,
  profileList,
  singleProfile,
} from './responses.js';
import { PARSE_ERROR, Scenario, bearer } from './scenario.js';

const CATEGORY: TestCategory = 'profile';

export const DEFAULT_PROFILE_NAME = 'My Smartprofile';

export class ProfileService {
  constructor(private readonly client: NetworkClient) {}

  async getProfiles(token: string): Promise<TestResult> {
    const scenario = new Scenario(
      'Get Profiles',
      CATEGORY,
      'GET_PROFILES_FAILED',
    );
    scenario.details.accessToken = token;
    const step = await scenario.fetch(
      () => this.client.get('/profiles', bearer(token)),
      ProfileListResponseSchema,
      'Failed to retrieve profiles',
    );
    if (!step.ok) return step.result;

    const profiles = profileList(step.value);
    if (!profiles) return missingProfileList(scenario);

    return scenario.conclude(
      {
        'at least one profile': profiles.length > 0,
        'one profile active': profiles.some((p) => p.isActive === true),
        'every profile has a session wallet': profiles.every((p) =>
          Boolean(p.sessionWalletAddress),
        ),
      },
      `Retrieved ${profiles.length} profile(s)`,
      `Retrieved ${profiles.length} profile(s) but validation failed`,
    );
  }

  /** A brand-new account must own exactly the default profile. */
  async verifyAutomaticProfile(token: string): Promise<TestResult> {
    const scenario = new Scenario(
      'First Time Profile Creation',
      CATEGORY,
      'AUTO_PROFILE_FAILED',
    );
    scenario.details.accessToken = token;
    const step = await scenario.fetch(
      () => this.client.get('/profiles', bearer(token)),
      ProfileListResponseSchema,
      'Failed to verify automatic profile creation',
    );
    if (!step.ok) return step.result;

    const profiles = profileList(step.value);
    if (!profiles) return missingProfileList(scenario);
    if (profiles.length === 1) {
      scenario.details.profileId = profiles[0].id;
    }

    return scenario.conclude(
      {
        'exactly one profile': profiles.length === 1,
        [`profile named "${DEFAULT_PROFILE_NAME}"`]: profiles.some(
          (p) => p.name === DEFAULT_PROFILE_NAME,
        ),
      },
      'Automatic profile creation verified',
      'Automatic profile creation failed',
    );
  }

  async createProfile(token: string, name: string): Promise<TestResult> {
    const scenario = new Scenario(
      'Create Profile',
      CATEGORY,
      'CREATE_PROFILE_FAILED',
    );
    scenario.details.accessToken = token;
    const step = await scenario.fetch(
      () =>
        this.client.post(
          '/profiles',
          { name, isDevelopmentWallet: true },
          bearer(token),
        ),
      ProfileResponseSchema,
      'Failed to create profile',
    );
    if (!step.ok) return step.result;

    const profile = singleProfile(step.value);
    scenario.details.profileId = profile?.id;

    return scenario.conclude(
      {
        'profile id present': Boolean(profile?.id),
        'session wallet present': Boolean(profile?.sessionWalletAddress),
        'name matches': profile?.name === name,
      },
      `Successfully created profile '${name}'`,
      'Profile creation validation failed',
    );
  }

  async switchProfile(token: string, profileId: string): Promise<TestResult> {
    const scenario = new Scenario(
      'Switch Profile',
      CATEGORY,
      'SWITCH_PROFILE_FAILED',
    );
    scenario.details.accessToken = token;
    scenario.details.profileId = profileId;
    const step = await scenario.fetch(
      () =>
        this.client.post(
          `/auth/switch-profile/${encodeURIComponent(profileId)}`,
          undefined,
          bearer(token),
        ),
      SwitchProfileResponseSchema,
      'Failed to switch profile',
    );
    if (!step.ok) return step.result;

    return scenario.conclude(
      {
        'success flag set': step.value.success === true,
        'active profile is target': step.value.activeProfile?.id === profileId,
      },
      'Successfully switched to profile',
      'Profile switch validation failed',
    );
  }

  async updateProfile(
    token: string,
    profileId: string,
    newName: string,
  ): Promise<TestResult> {
    const scenario = new Scenario(
      'Update Profile',
      CATEGORY,
      'UPDATE_PROFILE_FAILED',
    );
    scenario.details.accessToken = token;
    scenario.details.profileId = profileId;
    const step = await scenario.fetch(
      () =>
        this.client.put(
          `/profiles/${encodeURIComponent(profileId)}`,
          { name: newName },
          bearer(token),
        ),
      ProfileResponseSchema,
      'Failed to update profile',
    );
    if (!step.ok) return step.result;

    const profile = singleProfile(step.value);
    return scenario.conclude(
      { 'name matches': profile?.name === newName },
      `Successfully updated profile name to '${newName}'`,
      'Profile update validation failed',
    );
  }

  /**
   * Counts profiles, then attempts the deletion. Deleting the only profile
   * must be rejected by the server; that rejection is this scenario's pass.
   */
  async deleteProfile(token: string, profileId: string): Promise<TestResult> {
    const scenario = new Scenario(
      'Delete Profile',
      CATEGORY,
      'DELETE_PROFILE_FAILED',
    );
    scenario.details.accessToken = token;
    scenario.details.profileId = profileId;

    const listing = await scenario.fetch(
      () => this.client.get('/profiles', bearer(token)),
      ProfileListResponseSchema,
      'Failed to count profiles before deletion',
    );
    if (!listing.ok) return listing.result;
    const profiles = profileList(listing.value);
    if (!profiles) return missingProfileList(scenario);
    const isLastProfile = profiles.length === 1;

    const deletion = await scenario.send(
      () =>
        this.client.delete(
          `/profiles/${encodeURIComponent(profileId)}`,
          bearer(token),
        ),
      'Failed to delete profile',
    );
    if (!deletion.ok) return deletion.result;
    const response = deletion.value;

    if (!response.ok) {
      if (isLastProfile) {
        return scenario.pass('Correctly prevented deletion of last profile');
      }
      return scenario.fail(
        'Failed to delete profile',
        new TestError(
          'DELETE_PROFILE_FAILED',
          `HTTP ${response.statusCode} while ${profiles.length} profiles existed`,
        ),
      );
    }

    if (isLastProfile) {
      return scenario.fail(
        'Server deleted the last remaining profile',
        new TestError(
          'LAST_PROFILE_DELETED',
          'Deletion of the only profile was expected to be rejected',
        ),
      );
    }

    const parsed = scenario.parse(response, SuccessResponseSchema);
    if (!parsed.ok) return parsed.result;
    return scenario.conclude(
      { 'success flag set': parsed.value.success === true },
      'Successfully deleted profile',
      'Profile deletion failed',
    );
  }
}

function missingProfileList(scenario: Scenario): TestResult {
  return scenario.fail(
    'Failed to parse profiles response',
    new TestError(PARSE_ERROR, 'Response has neither "data" nor "profiles"'),
  );
}
