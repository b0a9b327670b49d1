import { TestError } from '../errors.js';
import type { JsonBody, NetworkClient } from '../network/network-client.js';
import type { TestCategory, TestResult } from '../types.js';
import {
  IdentityGraphResponseSchema,
  LinkAccountResponseSchema,
  PrivacyModeResponseSchema,
} from './responses.js';
import { Scenario, bearer } from './scenario.js';

const CATEGORY: TestCategory = 'account-linking';

export type LinkTargetType = 'email' | 'wallet' | 'social';
export type PrivacyMode = 'linked' | 'partial' | 'isolated';

export const PRIVACY_MODES: readonly PrivacyMode[] = [
  'linked',
  'partial',
  'isolated',
];

export interface LinkAttempt {
  result: TestResult;
  linkedAccountId?: string;
}

export class AccountLinkingService {
  constructor(private readonly client: NetworkClient) {}

  async linkAccount(
    token: string,
    targetType: LinkTargetType,
    targetIdentifier: string,
    privacyMode: PrivacyMode = 'linked',
  ): Promise<LinkAttempt> {
    const scenario = new Scenario(
      `Link Account - ${targetType}`,
      CATEGORY,
      'LINK_FAILED',
    );
    scenario.details.accessToken = token;

    const body: JsonBody =
      targetType === 'social'
        ? {
            targetType,
            targetIdentifier,
            privacyMode,
            targetProvider: 'google',
          }
        : { targetType, targetIdentifier, privacyMode };
    const sent = await scenario.send(
      () => this.client.post('/auth/link-accounts', body, bearer(token)),
      'Failed to link account',
    );
    if (!sent.ok) return { result: sent.result };

    const response = sent.value;
    if (response.statusCode === 409) {
      return {
        result: scenario.fail(
          'Account already linked',
          new TestError('ALREADY_LINKED', 'Account is already linked'),
        ),
      };
    }
    if (!response.ok) {
      return {
        result: scenario.fail(
          'Failed to link account',
          new TestError('LINK_FAILED', `HTTP ${response.statusCode}`),
        ),
      };
    }

    const parsed = scenario.parse(response, LinkAccountResponseSchema);
    if (!parsed.ok) return { result: parsed.result };
    const { success, linkedAccount, link } = parsed.value;

    const result = scenario.conclude(
      {
        'success flag set': success === true,
        'linked account present': linkedAccount !== undefined,
        [`linked account type is ${targetType}`]:
          linkedAccount?.type === targetType,
        [`privacy mode is ${privacyMode}`]: link?.privacyMode === privacyMode,
      },
      `Successfully linked ${targetType} account`,
      'Account linking validation failed',
    );
    return result.success
      ? { result, linkedAccountId: linkedAccount?.id }
      : { result };
  }

  /**
   * The graph must name the current account, hold at least one account and
   * only link accounts it contains.
   */
  async getIdentityGraph(token: string): Promise<TestResult> {
    const scenario = new Scenario(
      'Get Identity Graph',
      CATEGORY,
      'GRAPH_FAILED',
    );
    scenario.details.accessToken = token;
    const step = await scenario.fetch(
      () => this.client.get('/auth/identity-graph', bearer(token)),
      IdentityGraphResponseSchema,
      'Failed to retrieve identity graph',
    );
    if (!step.ok) return step.result;

    const accounts = step.value.accounts ?? [];
    const links = step.value.links ?? [];
    scenario.details.accountId = step.value.currentAccountId;

    const knownIds = new Set(
      accounts.flatMap((account) => (account.id ? [account.id] : [])),
    );
    const graphIsConsistent = links.every((link) =>
      [link.accountAId, link.accountBId].every(
        (id) => id === undefined || knownIds.has(id),
      ),
    );

    return scenario.conclude(
      {
        'current account id present': Boolean(step.value.currentAccountId),
        'at least one account': accounts.length > 0,
        'links reference known accounts': graphIsConsistent,
      },
      `Retrieved identity graph with ${accounts.length} accounts and ${links.length} links`,
      'Identity graph validation failed',
    );
  }

  async updatePrivacyMode(
    token: string,
    targetAccountId: string,
    privacyMode: PrivacyMode,
  ): Promise<TestResult> {
    const scenario = new Scenario(
      'Update Privacy Mode',
      CATEGORY,
      'PRIVACY_UPDATE_FAILED',
    );
    scenario.details.accessToken = token;
    scenario.details.accountId = targetAccountId;
    const step = await scenario.fetch(
      () =>
        this.client.put(
          '/auth/link-privacy',
          { targetAccountId, privacyMode },
          bearer(token),
        ),
      PrivacyModeResponseSchema,
      'Failed to update privacy mode',
    );
    if (!step.ok) return step.result;

    return scenario.conclude(
      {
        'success flag set': step.value.success === true,
        [`privacy mode is ${privacyMode}`]:
          step.value.link?.privacyMode === privacyMode,
      },
      `Successfully updated privacy mode to '${privacyMode}'`,
      'Privacy mode update validation failed',
    );
  }

  /** Cycles the link through every privacy mode. */
  async sweepPrivacyModes(
    token: string,
    targetAccountId: string,
  ): Promise<TestResult> {
    const scenario = new Scenario(
      'Privacy Mode Scenarios',
      CATEGORY,
      'PRIVACY_UPDATE_FAILED',
    );
    scenario.details.accountId = targetAccountId;
    const outcomes: Array<[PrivacyMode, TestResult]> = [];
    for (const mode of PRIVACY_MODES) {
      outcomes.push([
        mode,
        await this.updatePrivacyMode(token, targetAccountId, mode),
      ]);
    }

    const summary = outcomes
      .map(([mode, result]) => `${mode}: ${result.success ? '✓' : '✗'}`)
      .join(', ');
    const failure = outcomes.find(([, result]) => !result.success);
    if (!failure) {
      return scenario.pass(`Privacy mode tests: ${summary}`);
    }
    const [mode, result] = failure;
    return scenario.fail(
      `Privacy mode tests: ${summary}`,
      new TestError(
        'PRIVACY_UPDATE_FAILED',
        `Switching to ${mode} failed: ${result.error?.message ?? result.message}`,
        result.error,
      ),
    );
  }
}
