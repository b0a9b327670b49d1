import { describe, it, expect } from 'vitest';
import {
  createConfiguration,
  parseCategory,
  parseEnvironment,
  parseOutputFormat,
  resolveBaseURL,
} from '../../src/config/configuration.js';
import { ConfigurationError } from '../../src/errors.js';

describe('resolveBaseURL', () => {
  it('maps each environment to its host', () => {
    expect(resolveBaseURL('dev')).toBe('http://localhost:3000');
    expect(resolveBaseURL('staging')).toBe('https://api-staging.interspace.fi');
    expect(resolveBaseURL('prod')).toBe('https://api.interspace.fi');
  });
});

describe('parseCategory', () => {
  it('accepts every alias case-insensitively', () => {
    expect(parseCategory('auth')).toBe('authentication');
    expect(parseCategory('Profiles')).toBe('profile');
    expect(parseCategory('linking')).toBe('account-linking');
    expect(parseCategory('TOKENS')).toBe('token-management');
    expect(parseCategory('edge')).toBe('edge-cases');
  });

  it('rejects unknown categories', () => {
    expect(() => parseCategory('billing')).toThrow(ConfigurationError);
    expect(() => parseCategory('constructor')).toThrow(
      /^Unknown category "constructor"/,
    );
  });
});

describe('parseEnvironment and parseOutputFormat', () => {
  it('accept known values', () => {
    expect(parseEnvironment('Staging')).toBe('staging');
    expect(parseOutputFormat('junit')).toBe('junit');
  });

  it('reject unknown values', () => {
    expect(() => parseEnvironment('qa')).toThrow(
      'Unknown environment "qa". Expected one of: dev, staging, prod',
    );
    expect(() => parseOutputFormat('xml')).toThrow(
      'Unknown output format "xml". Expected one of: console, json, junit',
    );
  });
});

describe('createConfiguration', () => {
  it('applies defaults and derives the base URL', () => {
    const configuration = createConfiguration();

    expect(configuration).toMatchObject({
      environment: 'dev',
      baseURL: 'http://localhost:3000',
      apiVersion: 'v2',
      outputFormat: 'console',
      verbose: false,
      testEmail: 'existing@interspace.test',
      verificationCode: '123456',
    });
    expect(configuration.category).toBeUndefined();
    expect(Object.isFrozen(configuration)).toBe(true);
  });

  it('follows the chosen environment', () => {
    expect(createConfiguration({ environment: 'prod' }).baseURL).toBe(
      'https://api.interspace.fi',
    );
  });
});
