import { describe, it, expect, beforeEach } from 'vitest';
import type { TestServices } from '../../src/services/index.js';
import { FakeApi } from '../helpers/fake-api.js';
import { createTestServices } from '../helpers/services.js';

const TOKEN = 'test-access';

const smartprofile = {
  id: 'p-1',
  name: 'My Smartprofile',
  isActive: true,
  sessionWalletAddress: '0x1',
};
const second = {
  id: 'p-2',
  name: 'Work',
  isActive: false,
  sessionWalletAddress: '0x2',
};

describe('ProfileService', () => {
  let api: FakeApi;
  let services: TestServices;

  beforeEach(() => {
    api = new FakeApi();
    services = createTestServices(api.adapter);
  });

  describe('getProfiles', () => {
    it('accepts profiles under either data or profiles', async () => {
      api.sequence('GET', '/profiles', [
        { status: 200, body: { data: [smartprofile] } },
        { status: 200, body: { profiles: [smartprofile, second] } },
      ]);

      const first = await services.profile.getProfiles(TOKEN);
      const again = await services.profile.getProfiles(TOKEN);

      expect(first.message).toBe('Retrieved 1 profile(s)');
      expect(again.message).toBe('Retrieved 2 profile(s)');
      expect(api.requests[0].authorization).toBe(`Bearer ${TOKEN}`);
    });

    it('requires a session wallet on every profile', async () => {
      api.on('GET', '/profiles', {
        status: 200,
        body: { data: [smartprofile, { ...second, sessionWalletAddress: null }] },
      });

      const result = await services.profile.getProfiles(TOKEN);

      expect(result.success).toBe(false);
      expect(result.error?.message).toBe(
        'Failed checks: every profile has a session wallet',
      );
    });

    it('reports a response without a profile list as PARSE_ERROR', async () => {
      api.on('GET', '/profiles', { status: 200, body: { success: true } });

      const result = await services.profile.getProfiles(TOKEN);

      expect(result.error?.code).toBe('PARSE_ERROR');
      expect(result.error?.message).toBe(
        'Response has neither "data" nor "profiles"',
      );
    });
  });

  describe('verifyAutomaticProfile', () => {
    it('passes for exactly one default profile', async () => {
      api.on('GET', '/profiles', { status: 200, body: { data: [smartprofile] } });

      const result = await services.profile.verifyAutomaticProfile(TOKEN);

      expect(result.success).toBe(true);
      expect(result.details?.profileId).toBe('p-1');
    });

    it('fails when more than one profile exists', async () => {
      api.on('GET', '/profiles', {
        status: 200,
        body: { data: [smartprofile, second] },
      });

      const result = await services.profile.verifyAutomaticProfile(TOKEN);

      expect(result.error?.message).toBe('Failed checks: exactly one profile');
    });
  });

  describe('createProfile', () => {
    it('checks the created profile', async () => {
      api.on('POST', '/profiles', {
        status: 201,
        body: { success: true, data: { ...second, name: 'Gaming' } },
      });

      const result = await services.profile.createProfile(TOKEN, 'Gaming');

      expect(result.success).toBe(true);
      expect(result.message).toBe("Successfully created profile 'Gaming'");
      expect(result.details?.profileId).toBe('p-2');
      expect(api.requests[0].body).toEqual({
        name: 'Gaming',
        isDevelopmentWallet: true,
      });
    });
  });

  describe('switchProfile', () => {
    it('requires the target to become active', async () => {
      api.on('POST', '/auth/switch-profile/p-2', {
        status: 200,
        body: { success: true, activeProfile: smartprofile },
      });

      const result = await services.profile.switchProfile(TOKEN, 'p-2');

      expect(result.error?.message).toBe(
        'Failed checks: active profile is target',
      );
    });
  });

  describe('updateProfile', () => {
    it('requires the new name to round-trip', async () => {
      api.on('PUT', '/profiles/p-2', {
        status: 200,
        body: { success: true, data: { ...second, name: 'Renamed' } },
      });

      const result = await services.profile.updateProfile(TOKEN, 'p-2', 'Renamed');

      expect(result.success).toBe(true);
      expect(api.requests[0].body).toEqual({ name: 'Renamed' });
    });
  });

  describe('deleteProfile', () => {
    it('passes when deleting the last profile is refused', async () => {
      api
        .on('GET', '/profiles', { status: 200, body: { data: [smartprofile] } })
        .on('DELETE', '/profiles/p-1', {
          status: 400,
          body: { error: 'Cannot delete last profile' },
        });

      const result = await services.profile.deleteProfile(TOKEN, 'p-1');

      expect(result.success).toBe(true);
      expect(result.message).toBe('Correctly prevented deletion of last profile');
      expect(result.details?.statusCode).toBe(400);
    });

    it('fails when the last profile is deleted', async () => {
      api
        .on('GET', '/profiles', { status: 200, body: { data: [smartprofile] } })
        .on('DELETE', '/profiles/p-1', { status: 200, body: { success: true } });

      const result = await services.profile.deleteProfile(TOKEN, 'p-1');

      expect(result.success).toBe(false);
      expect(result.error?.code).toBe('LAST_PROFILE_DELETED');
    });

    it('passes when a non-last profile is deleted', async () => {
      api
        .on('GET', '/profiles', {
          status: 200,
          body: { data: [smartprofile, second] },
        })
        .on('DELETE', '/profiles/p-2', { status: 200, body: { success: true } });

      const result = await services.profile.deleteProfile(TOKEN, 'p-2');

      expect(result.success).toBe(true);
      expect(result.message).toBe('Successfully deleted profile');
    });

    it('fails when a non-last deletion is refused', async () => {
      api
        .on('GET', '/profiles', {
          status: 200,
          body: { data: [smartprofile, second] },
        })
        .on('DELETE', '/profiles/p-2', { status: 400 });

      const result = await services.profile.deleteProfile(TOKEN, 'p-2');

      expect(result.success).toBe(false);
      expect(result.error?.code).toBe('DELETE_PROFILE_FAILED');
      expect(result.error?.message).toBe('HTTP 400 while 2 profiles existed');
    });
  });
});
