import { describe, it, expect, beforeEach } from 'vitest';
import type { TestServices } from '../../src/services/index.js';
import { EXPIRED_ACCESS_TOKEN } from '../../src/services/token-service.js';
import { FakeApi } from '../helpers/fake-api.js';
import { MockBackend } from '../helpers/mock-backend.js';
import { createTestServices } from '../helpers/services.js';

describe('TokenService', () => {
  let api: FakeApi;
  let services: TestServices;

  beforeEach(() => {
    api = new FakeApi();
    services = createTestServices(api.adapter);
  });

  describe('refresh', () => {
    it('requires the success flag and both new tokens', async () => {
      api.on('POST', '/auth/refresh', {
        status: 200,
        body: { success: true, tokens: { accessToken: 'test-access-2' } },
      });

      const result = await services.token.refresh('test-refresh');

      expect(api.requests[0].body).toEqual({ refreshToken: 'test-refresh' });
      expect(result.error?.message).toBe(
        'Failed checks: new refresh token present',
      );
      expect(result.details?.accessToken).toBe('test-access-2');
    });
  });

  describe('validate', () => {
    it('distinguishes an invalid token from a failed request', async () => {
      api.sequence('GET', '/profiles', [{ status: 401 }, { status: 502 }]);

      const invalid = await services.token.validate('test-access');
      const failed = await services.token.validate('test-access');

      expect(invalid.error?.code).toBe('INVALID_TOKEN');
      expect(invalid.message).toBe('Access token is invalid or expired');
      expect(failed.error?.code).toBe('VALIDATION_REQUEST_FAILED');
      expect(failed.error?.message).toBe('Unexpected HTTP 502');
    });
  });

  describe('expectExpired', () => {
    it('passes on exactly 401', async () => {
      api.on('GET', '/profiles', { status: 401 });

      const result = await services.token.expectExpired();

      expect(result.success).toBe(true);
      expect(result.message).toBe('Correctly rejected expired token');
      expect(api.requests[0].authorization).toBe(
        `Bearer ${EXPIRED_ACCESS_TOKEN}`,
      );
    });

    it('fails when the token is accepted', async () => {
      api.on('GET', '/profiles', { status: 200, body: { data: [] } });

      const result = await services.token.expectExpired();

      expect(result.success).toBe(false);
      expect(result.error?.code).toBe('TOKEN_ACCEPTED');
    });

    it('fails on any other rejection status', async () => {
      api.on('GET', '/profiles', { status: 403 });

      const result = await services.token.expectExpired();

      expect(result.error?.code).toBe('UNEXPECTED_STATUS');
      expect(result.error?.message).toBe('Expected HTTP 401, got 403');
    });
  });

  describe('blacklist', () => {
    it('logs out and then expects the token to be rejected', async () => {
      api
        .on('POST', '/auth/logout', { status: 200, body: { success: true } })
        .on('GET', '/profiles', { status: 401 });

      const result = await services.token.blacklist('test-access');

      expect(result.success).toBe(true);
      expect(result.name).toBe('Token Blacklist');
      expect(result.message).toBe('Correctly rejected blacklisted token');
      expect(api.requests.map((r) => `${r.method} ${r.path}`)).toEqual([
        'POST /auth/logout',
        'GET /profiles',
      ]);
    });

    it('fails with BLACKLIST_TEST_FAILED when logout fails', async () => {
      api.on('POST', '/auth/logout', { status: 500 });

      const result = await services.token.blacklist('test-access');

      expect(result.error?.code).toBe('BLACKLIST_TEST_FAILED');
      expect(api.requests).toHaveLength(1);
    });
  });

  describe('lifecycle', () => {
    it('summarizes every step', async () => {
      const backend = new MockBackend();
      const live = createTestServices(backend.adapter);
      const guest = await live.auth.authenticateGuest();
      const tokens = guest.account ?? { accessToken: '', refreshToken: '' };

      const result = await live.token.lifecycle(
        tokens.accessToken,
        tokens.refreshToken,
      );

      expect(result.success).toBe(true);
      expect(result.message).toBe(
        'Lifecycle test: Initial validation: ✓, Token refresh: ✓, New token validation: ✓, Token blacklist: ✓',
      );
    });

    it('stops after a failed refresh', async () => {
      api
        .on('GET', '/profiles', { status: 200, body: { data: [] } })
        .on('POST', '/auth/refresh', { status: 401, body: { error: 'expired' } });

      const result = await services.token.lifecycle('test-access', 'test-refresh');

      expect(result.message).toBe(
        'Lifecycle test: Initial validation: ✓, Token refresh: ✗',
      );
      expect(result.error?.code).toBe('LIFECYCLE_FAILED');
      expect(result.error?.message).toBe(
        'Token refresh failed: HTTP 401: {"error":"expired"}',
      );
    });
  });

  describe('concurrentSessions', () => {
    it('passes when every session is accepted', async () => {
      const backend = new MockBackend();
      const live = createTestServices(backend.adapter);
      const first = await live.auth.authenticateGuest();
      const second = await live.auth.authenticateGuest();
      const tokens = [first.account, second.account].flatMap((a) =>
        a ? [a.accessToken] : [],
      );

      const result = await live.token.concurrentSessions(tokens);

      expect(result.success).toBe(true);
      expect(result.message).toBe('Concurrent sessions: 2/2 sessions valid');
    });

    it('fails when one session is rejected', async () => {
      api.sequence('GET', '/profiles', [{ status: 200 }, { status: 401 }]);

      const result = await services.token.concurrentSessions(['test-a', 'test-b']);

      expect(result.success).toBe(false);
      expect(result.message).toBe('Concurrent sessions: 1/2 sessions valid');
      expect(result.error?.message).toBe('Token validation failed with HTTP 401');
    });
  });
});
