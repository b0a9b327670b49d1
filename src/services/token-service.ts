import { TestError } from '../errors.js';
import type { NetworkClient } from '../network/network-client.js';
import type { TestCategory, TestResult } from '../types.js';
import { RefreshResponseSchema } from './responses.js';
import { Scenario, bearer } from './scenario.js';

const CATEGORY: TestCategory = 'token-management';

/** Protected endpoint used to probe whether a token is accepted. */
const PROTECTED_ENDPOINT = '/profiles';

/** Signed for an expiry in 2021; any server must reject it. */
export const EXPIRED_ACCESS_TOKEN =
  'eyJhbGciOiJIUzI1NiIsInR5cCI6IkpXVCJ9.eyJleHAiOjE2MDk0NTkyMDB9.invalid';

export class TokenService {
  constructor(private readonly client: NetworkClient) {}

  async refresh(refreshToken: string): Promise<TestResult> {
    const scenario = new Scenario('Token Refresh', CATEGORY, 'REFRESH_FAILED');
    scenario.details.refreshToken = refreshToken;
    const step = await scenario.fetch(
      () => this.client.post('/auth/refresh', { refreshToken }),
      RefreshResponseSchema,
      'Failed to refresh token',
    );
    if (!step.ok) return step.result;

    const { success, tokens } = step.value;
    scenario.details.accessToken = tokens?.accessToken;
    scenario.details.refreshToken = tokens?.refreshToken;

    return scenario.conclude(
      {
        'success flag set': success === true,
        'new access token present': Boolean(tokens?.accessToken),
        'new refresh token present': Boolean(tokens?.refreshToken),
      },
      'Successfully refreshed tokens',
      'Token refresh validation failed',
    );
  }

  async validate(accessToken: string): Promise<TestResult> {
    const scenario = new Scenario(
      'Token Validation',
      CATEGORY,
      'VALIDATION_REQUEST_FAILED',
    );
    scenario.details.accessToken = accessToken;
    const step = await scenario.send(
      () => this.client.get(PROTECTED_ENDPOINT, bearer(accessToken)),
      'Token validation request failed',
    );
    if (!step.ok) return step.result;

    const { statusCode } = step.value;
    if (statusCode === 200) {
      return scenario.pass('Access token is valid');
    }
    if (statusCode === 401) {
      return scenario.fail(
        'Access token is invalid or expired',
        new TestError('INVALID_TOKEN', 'Token validation failed with HTTP 401'),
      );
    }
    return scenario.fail(
      'Token validation request failed',
      new TestError(
        'VALIDATION_REQUEST_FAILED',
        `Unexpected HTTP ${statusCode}`,
      ),
    );
  }

  /**
   * Expected-failure probe: the token must be rejected with exactly 401.
   * Acceptance, or any other status, fails the scenario.
   */
  async expectRejected(
    token: string,
    scenarioName: string,
    reason: string,
  ): Promise<TestResult> {
    const scenario = new Scenario(scenarioName, CATEGORY, 'UNEXPECTED_ERROR');
    scenario.details.accessToken = token;
    const step = await scenario.send(
      () => this.client.get(PROTECTED_ENDPOINT, bearer(token)),
      `Unexpected error when testing ${reason} token`,
    );
    if (!step.ok) return step.result;

    const { statusCode } = step.value;
    if (statusCode === 401) {
      return scenario.pass(`Correctly rejected ${reason} token`);
    }
    if (step.value.ok) {
      return scenario.fail(
        `Expected ${reason} token to be rejected but request succeeded`,
        new TestError('TOKEN_ACCEPTED', `HTTP ${statusCode}`),
      );
    }
    return scenario.fail(
      `Expected 401 for ${reason} token`,
      new TestError(
        'UNEXPECTED_STATUS',
        `Expected HTTP 401, got ${statusCode}`,
      ),
    );
  }

  expectExpired(token: string = EXPIRED_ACCESS_TOKEN): Promise<TestResult> {
    return this.expectRejected(token, 'Token Expiration', 'expired');
  }

  /** Logs the token out, then requires the server to reject it. */
  async blacklist(token: string): Promise<TestResult> {
    const scenario = new Scenario(
      'Token Blacklist',
      CATEGORY,
      'BLACKLIST_TEST_FAILED',
    );
    scenario.details.accessToken = token;
    const logout = await scenario.sendExpectingSuccess(
      () => this.client.post('/auth/logout', undefined, bearer(token)),
      'Logout before blacklist check failed',
    );
    if (!logout.ok) return logout.result;

    const probe = await this.expectRejected(
      token,
      'Token Blacklist',
      'blacklisted',
    );
    return { ...probe, executionTime: scenario.elapsed };
  }

  /** Validate, refresh, validate the new token, then blacklist it. */
  async lifecycle(
    initialAccessToken: string,
    initialRefreshToken: string,
  ): Promise<TestResult> {
    const scenario = new Scenario(
      'Complete Token Lifecycle',
      CATEGORY,
      'LIFECYCLE_FAILED',
    );
    const steps: Array<[string, TestResult]> = [];

    steps.push(['Initial validation', await this.validate(initialAccessToken)]);
    const refreshed = await this.refresh(initialRefreshToken);
    steps.push(['Token refresh', refreshed]);

    const newAccessToken = refreshed.details?.accessToken;
    if (newAccessToken) {
      steps.push(['New token validation', await this.validate(newAccessToken)]);
      steps.push(['Token blacklist', await this.blacklist(newAccessToken)]);
    }

    const summary = steps
      .map(([label, result]) => `${label}: ${result.success ? '✓' : '✗'}`)
      .join(', ');
    const firstFailure = steps.find(([, result]) => !result.success);

    if (!firstFailure) {
      return scenario.pass(`Lifecycle test: ${summary}`);
    }
    const [label, result] = firstFailure;
    return scenario.fail(
      `Lifecycle test: ${summary}`,
      new TestError(
        'LIFECYCLE_FAILED',
        `${label} failed: ${result.error?.message ?? result.message}`,
        result.error,
      ),
    );
  }

  /** Every session token must stay valid while the others are in use. */
  async concurrentSessions(
    accessTokens: readonly string[],
  ): Promise<TestResult> {
    const scenario = new Scenario(
      'Concurrent Sessions',
      'edge-cases',
      'CONCURRENT_SESSIONS_FAILED',
    );
    const results = await Promise.all(
      accessTokens.map((token) => this.validate(token)),
    );
    const valid = results.filter((result) => result.success).length;
    const message = `${valid}/${accessTokens.length} sessions valid`;

    if (accessTokens.length > 0 && valid === accessTokens.length) {
      return scenario.pass(`Concurrent sessions: ${message}`);
    }
    const firstFailure = results.find((result) => !result.success);
    return scenario.fail(
      `Concurrent sessions: ${message}`,
      new TestError(
        'CONCURRENT_SESSIONS_FAILED',
        firstFailure?.error?.message ?? 'No sessions to validate',
        firstFailure?.error,
      ),
    );
  }
}
