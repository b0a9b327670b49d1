import { randomUUID } from 'crypto';
import { TestError } from '../errors.js';
import type { NetworkClient } from '../network/network-client.js';
import type {
  AccountType,
  TestAccount,
  TestCategory,
  TestHubConfiguration,
  TestProfile,
  TestResult,
  TestWallet,
} from '../types.js';
import {
  AuthResponseSchema,
  SuccessResponseSchema,
  type AuthResponse,
} from './responses.js';
import { Scenario, bearer } from './scenario.js';

const CATEGORY: TestCategory = 'authentication';

export interface RateLimitProbeOptions {
  /** Requests fired back to back per burst. */
  burstSize?: number;
  /** Bursts attempted before concluding that no limit is enforced. */
  maxBursts?: number;
  /** Milliseconds between bursts. */
  pauseMs?: number;
}

export const RATE_LIMIT_BURST_SIZE = 20;
export const RATE_LIMIT_MAX_BURSTS = 2;
export const RATE_LIMIT_PAUSE_MS = 1000;

export interface AuthAttempt {
  result: TestResult;
  /** Present only when the attempt passed validation. */
  account?: TestAccount;
}

export class AuthService {
  constructor(
    private readonly client: NetworkClient,
    private readonly configuration: TestHubConfiguration,
  ) {}

  async sendEmailCode(email: string): Promise<TestResult> {
    const scenario = new Scenario(
      'Send Email Verification Code',
      CATEGORY,
      'SEND_CODE_FAILED',
    );
    const step = await scenario.sendExpectingSuccess(
      () => this.client.post('/auth/send-email-code', { email }),
      'Failed to send verification code',
    );
    if (!step.ok) return step.result;
    return scenario.pass(`Successfully sent verification code to ${email}`);
  }

  async authenticateEmail(
    email: string,
    isNewUser: boolean,
    code: string = this.configuration.verificationCode,
  ): Promise<AuthAttempt> {
    const scenario = new Scenario(
      `Email Authentication - ${isNewUser ? 'New' : 'Returning'} User`,
      CATEGORY,
      'AUTH_FAILED',
    );
    const step = await scenario.fetch(
      () =>
        this.client.post('/auth/authenticate', {
          strategy: 'email',
          email,
          verificationCode: code,
        }),
      AuthResponseSchema,
      'Authentication failed',
    );
    if (!step.ok) return { result: step.result };

    const response = step.value;
    recordAuthDetails(scenario, response);
    const profiles = response.profiles ?? [];

    const result = scenario.conclude(
      {
        'access token present': Boolean(response.tokens?.accessToken),
        [`isNewUser is ${isNewUser}`]: response.isNewUser === isNewUser,
        'profile list non-empty': profiles.length > 0,
      },
      'Successfully authenticated with email',
      'Authentication succeeded but validation failed',
    );
    return withAccount(result, response, 'email', email);
  }

  async authenticateWallet(
    wallet: TestWallet,
    isNewUser: boolean,
  ): Promise<AuthAttempt> {
    const scenario = new Scenario(
      `Wallet Authentication - ${isNewUser ? 'New' : 'Returning'} User`,
      CATEGORY,
      'WALLET_AUTH_FAILED',
    );
    const message = `Sign in to Interspace\nTimestamp: ${Date.now() / 1000}`;
    const step = await scenario.fetch(
      () =>
        this.client.post('/auth/authenticate', {
          strategy: 'wallet',
          walletAddress: wallet.address,
          message,
          signature: mockSignature(message, wallet),
          walletType: 'metamask',
        }),
      AuthResponseSchema,
      'Authentication failed',
    );
    if (!step.ok) return { result: step.result };

    const response = step.value;
    recordAuthDetails(scenario, response);

    const result = scenario.conclude(
      {
        'access token present': Boolean(response.tokens?.accessToken),
        [`isNewUser is ${isNewUser}`]: response.isNewUser === isNewUser,
      },
      'Successfully authenticated with wallet',
      'Authentication succeeded but validation failed',
    );
    return withAccount(result, response, 'wallet', wallet.address);
  }

  async authenticateGuest(): Promise<AuthAttempt> {
    const scenario = new Scenario(
      'Guest Authentication',
      CATEGORY,
      'GUEST_AUTH_FAILED',
    );
    const deviceId = randomUUID();
    const step = await scenario.fetch(
      () =>
        this.client.post('/auth/authenticate', {
          strategy: 'guest',
          deviceId,
        }),
      AuthResponseSchema,
      'Guest authentication failed',
    );
    if (!step.ok) return { result: step.result };

    const response = step.value;
    recordAuthDetails(scenario, response);

    const result = scenario.conclude(
      {
        'access token present': Boolean(response.tokens?.accessToken),
        'isNewUser is true': response.isNewUser === true,
        'account type is guest': response.account?.type === 'guest',
      },
      'Successfully authenticated as guest',
      'Guest authentication validation failed',
    );
    return withAccount(result, response, 'guest', deviceId);
  }

  async logout(token: string): Promise<TestResult> {
    const scenario = new Scenario('Logout', CATEGORY, 'LOGOUT_FAILED');
    scenario.details.accessToken = token;
    const step = await scenario.fetch(
      () => this.client.post('/auth/logout', undefined, bearer(token)),
      SuccessResponseSchema,
      'Logout request failed',
    );
    if (!step.ok) return step.result;

    return scenario.conclude(
      { 'success flag set': step.value.success === true },
      'Successfully logged out',
      'Logout failed',
    );
  }

  /** Expected-failure probe: a wrong verification code must get 400 or 401. */
  async rejectInvalidCode(
    email: string,
    invalidCode = '000000',
  ): Promise<TestResult> {
    const scenario = new Scenario(
      'Invalid Email Code',
      'edge-cases',
      'AUTH_REQUEST_FAILED',
    );
    const step = await scenario.send(
      () =>
        this.client.post('/auth/authenticate', {
          strategy: 'email',
          email,
          verificationCode: invalidCode,
        }),
      'Authentication request failed',
    );
    if (!step.ok) return step.result;

    const { statusCode } = step.value;
    if (statusCode === 400 || statusCode === 401) {
      return scenario.pass('Correctly rejected invalid code');
    }
    if (step.value.ok) {
      return scenario.fail(
        'Should have failed with invalid code',
        new TestError('UNEXPECTED_SUCCESS', `HTTP ${statusCode}`),
      );
    }
    return scenario.fail(
      'Unexpected status for invalid code',
      new TestError(
        'UNEXPECTED_STATUS',
        `Expected HTTP 400 or 401, got ${statusCode}`,
      ),
    );
  }

  /**
   * Fires bursts of send-code requests, pausing between bursts, until one
   * is answered with 429. Tolerance: the probe passes if any 429 is seen
   * within maxBursts × burstSize requests, and fails otherwise. A limiter
   * that needs more traffic than that to trip is reported as not observed.
   */
  async probeRateLimit(
    options: RateLimitProbeOptions = {},
  ): Promise<TestResult> {
    const burstSize = options.burstSize ?? RATE_LIMIT_BURST_SIZE;
    const maxBursts = options.maxBursts ?? RATE_LIMIT_MAX_BURSTS;
    const pauseMs = options.pauseMs ?? RATE_LIMIT_PAUSE_MS;
    const scenario = new Scenario(
      'Rate Limiting',
      'edge-cases',
      'RATE_LIMIT_PROBE_FAILED',
    );

    let sent = 0;
    for (let burst = 0; burst < maxBursts; burst++) {
      if (burst > 0) {
        await new Promise((resolve) => setTimeout(resolve, pauseMs));
      }
      for (let i = 0; i < burstSize; i++) {
        const email = `ratelimit_${burst}_${i}@interspace.test`;
        const step = await scenario.send(
          () => this.client.post('/auth/send-email-code', { email }),
          'Rate limit probe request failed',
        );
        if (!step.ok) return step.result;
        sent++;

        if (step.value.statusCode === 429) {
          return scenario.pass(
            `Rate limiting is working correctly (429 after ${sent} requests)`,
          );
        }
      }
    }

    return scenario.fail(
      'Did not hit rate limit as expected',
      new TestError(
        'RATE_LIMIT_NOT_OBSERVED',
        `No HTTP 429 after ${sent} requests in ${maxBursts} bursts`,
      ),
    );
  }
}

export function generateTestWallet(): TestWallet {
  const hex = (randomUUID() + randomUUID()).replace(/-/g, '');
  return { address: `0x${hex.slice(0, 40)}`, privateKey: 'mock_private_key' };
}

/** Hex of message and key, accepted by the API in test mode. */
export function mockSignature(message: string, wallet: TestWallet): string {
  const bytes = Buffer.from(message + wallet.privateKey, 'utf-8');
  return `0x${bytes.toString('hex')}`;
}

function recordAuthDetails(scenario: Scenario, response: AuthResponse): void {
  scenario.details.accountId = response.account?.id;
  scenario.details.profileId = response.activeProfile?.id;
  scenario.details.accessToken = response.tokens?.accessToken;
  scenario.details.refreshToken = response.tokens?.refreshToken;
  scenario.details.sessionId = response.sessionId;
}

function withAccount(
  result: TestResult,
  response: AuthResponse,
  type: AccountType,
  identifier: string,
): AuthAttempt {
  const accessToken = response.tokens?.accessToken;
  if (!result.success || !accessToken) return { result };

  const profiles: TestProfile[] = (response.profiles ?? []).map((profile) => ({
    id: profile.id,
    name: profile.name ?? '',
    isActive: profile.isActive ?? false,
  }));

  return {
    result,
    account: {
      accountId: response.account?.id ?? '',
      type,
      identifier,
      accessToken,
      refreshToken: response.tokens?.refreshToken ?? '',
      profiles,
    },
  };
}
