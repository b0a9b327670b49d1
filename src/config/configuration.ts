import { ConfigurationError } from '../errors.js';
import type {
  Environment,
  OutputFormat,
  TestCategory,
  TestHubConfiguration,
} from '../types.js';

export const ENVIRONMENTS: readonly Environment[] = ['dev', 'staging', 'prod'];
export const OUTPUT_FORMATS: readonly OutputFormat[] = [
  'console',
  'json',
  'junit',
];

export const API_VERSION = 'v2';
export const DEFAULT_TEST_EMAIL = 'existing@interspace.test';
export const MOCK_VERIFICATION_CODE = '123456';

const BASE_URLS: Record<Environment, string> = {
  dev: 'http://localhost:3000',
  staging: 'https://api-staging.interspace.fi',
  prod: 'https://api.interspace.fi',
};

const CATEGORY_ALIASES = new Map<string, TestCategory>([
  ['auth', 'authentication'],
  ['authentication', 'authentication'],
  ['profile', 'profile'],
  ['profiles', 'profile'],
  ['linking', 'account-linking'],
  ['account-linking', 'account-linking'],
  ['token', 'token-management'],
  ['tokens', 'token-management'],
  ['token-management', 'token-management'],
  ['edge', 'edge-cases'],
  ['edge-cases', 'edge-cases'],
]);

export function resolveBaseURL(environment: Environment): string {
  return BASE_URLS[environment];
}

export function parseEnvironment(value: string): Environment {
  const environment = ENVIRONMENTS.find((env) => env === value.toLowerCase());
  if (!environment) {
    throw new ConfigurationError(
      `Unknown environment "${value}". Expected one of: ${ENVIRONMENTS.join(', ')}`,
    );
  }
  return environment;
}

export function parseCategory(value: string): TestCategory {
  const category = CATEGORY_ALIASES.get(value.toLowerCase());
  if (!category) {
    throw new ConfigurationError(
      `Unknown category "${value}". Expected one of: ${[...CATEGORY_ALIASES.keys()].join(', ')}`,
    );
  }
  return category;
}

export function parseOutputFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find((f) => f === value.toLowerCase());
  if (!format) {
    throw new ConfigurationError(
      `Unknown output format "${value}". Expected one of: ${OUTPUT_FORMATS.join(', ')}`,
    );
  }
  return format;
}

export interface ConfigurationOptions {
  environment?: Environment;
  category?: TestCategory;
  outputFormat?: OutputFormat;
  verbose?: boolean;
  reportDir?: string;
  testEmail?: string;
}

export function createConfiguration(
  options: ConfigurationOptions = {},
): TestHubConfiguration {
  const environment = options.environment ?? 'dev';
  return Object.freeze({
    environment,
    baseURL: resolveBaseURL(environment),
    apiVersion: API_VERSION,
    category: options.category,
    outputFormat: options.outputFormat ?? 'console',
    verbose: options.verbose ?? false,
    reportDir: options.reportDir,
    testEmail: options.testEmail ?? DEFAULT_TEST_EMAIL,
    verificationCode: MOCK_VERIFICATION_CODE,
  });
}
