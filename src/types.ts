import type { TestError } from './errors.js';

export const TEST_CATEGORIES = [
  'authentication',
  'profile',
  'account-linking',
  'token-management',
  'edge-cases',
] as const;

export type TestCategory = (typeof TEST_CATEGORIES)[number];

export const CATEGORY_LABELS: Record<TestCategory, string> = {
  authentication: 'Authentication',
  profile: 'Profile Management',
  'account-linking': 'Account Linking',
  'token-management': 'Token Management',
  'edge-cases': 'Edge Cases',
};

export type Environment = 'dev' | 'staging' | 'prod';

export type OutputFormat = 'console' | 'json' | 'junit';

export interface TestHubConfiguration {
  environment: Environment;
  baseURL: string;
  apiVersion: string;
  category?: TestCategory;
  outputFormat: OutputFormat;
  verbose: boolean;
  reportDir?: string;
  testEmail: string;
  verificationCode: string;
}

/**
 * Correlation data extracted from responses. Later test cases discover
 * tokens and ids produced by earlier ones through these fields.
 */
export interface TestDetails {
  accessToken?: string;
  refreshToken?: string;
  accountId?: string;
  profileId?: string;
  sessionId?: string;
  statusCode?: number;
  requestUrl?: string;
  requestMethod?: string;
}

export interface TestResult {
  name: string;
  category: TestCategory;
  success: boolean;
  message: string;
  /** Seconds, wall-clock. */
  executionTime: number;
  error?: TestError;
  details?: TestDetails;
}

export interface TestReport {
  readonly environment: Environment;
  readonly totalTests: number;
  readonly passed: number;
  readonly failed: number;
  readonly successRate: number;
  /** Seconds. */
  readonly duration: number;
  readonly outputFormat: OutputFormat;
  readonly allTests: readonly TestResult[];
}

export interface TestProfile {
  id: string;
  name: string;
  isActive: boolean;
}

export type AccountType = 'email' | 'wallet' | 'guest';

export interface TestAccount {
  accountId: string;
  type: AccountType;
  identifier: string;
  accessToken: string;
  refreshToken: string;
  profiles: TestProfile[];
}

export interface TestWallet {
  address: string;
  privateKey: string;
}

/** Session that linked a second account, kept for the privacy-mode checks. */
export interface AccountLink {
  accessToken: string;
  linkedAccountId: string;
}

export interface RunState {
  account?: TestAccount;
  wallet?: TestWallet;
  additionalProfileId?: string;
  link?: AccountLink;
}

export type ContextKey = keyof RunState;
