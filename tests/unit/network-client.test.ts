import { describe, it, expect, beforeEach } from 'vitest';
import { AxiosError, CanceledError, type AxiosAdapter } from 'axios';
import {
  NetworkClient,
  classifyError,
} from '../../src/network/network-client.js';
import { NetworkError } from '../../src/network/network-error.js';
import { Logger } from '../../src/utils/logger.js';
import { FakeApi } from '../helpers/fake-api.js';

function createClient(adapter: AxiosAdapter, logger: Logger) {
  return new NetworkClient({
    baseURL: 'http://localhost:3000/',
    apiVersion: 'v2',
    logger,
    adapter,
  });
}

describe('NetworkClient', () => {
  let api: FakeApi;
  let logger: Logger;
  let client: NetworkClient;

  beforeEach(() => {
    api = new FakeApi();
    logger = new Logger({ verbose: true, color: false, write: () => undefined });
    client = createClient(api.adapter, logger);
  });

  it('prefixes endpoints with the API version and appends the query', async () => {
    api.on('GET', '/profiles', { status: 200, body: { data: [] } });

    const response = await client.get('/profiles', undefined, { limit: '5' });

    expect(response.url).toBe('http://localhost:3000/api/v2/profiles?limit=5');
    expect(response.method).toBe('GET');
    expect(response.statusCode).toBe(200);
    expect(response.ok).toBe(true);
    expect(response.json()).toEqual({ data: [] });
    expect(api.requests[0].query.get('limit')).toBe('5');
  });

  it('sends JSON bodies', async () => {
    api.on('POST', '/auth/send-email-code', { status: 200, body: {} });

    await client.post('/auth/send-email-code', { email: 'a@interspace.test' });

    expect(api.requests[0].body).toEqual({ email: 'a@interspace.test' });
  });

  it('rejects endpoints that carry the /api/ prefix or no leading slash', async () => {
    await expect(client.get('/api/v2/profiles')).rejects.toMatchObject({
      kind: 'invalidURL',
    });
    await expect(client.get('profiles')).rejects.toBeInstanceOf(NetworkError);
    expect(api.requests).toHaveLength(0);
  });

  it('returns non-2xx responses instead of throwing', async () => {
    api.on('GET', '/boom', { status: 500, body: { error: 'broken' } });

    const response = await client.get('/boom');

    expect(response.statusCode).toBe(500);
    expect(response.ok).toBe(false);
    expect(response.text()).toBe('{"error":"broken"}');
  });

  it('raises noData when reading JSON from an empty body', async () => {
    api.on('DELETE', '/profiles/p-1', { status: 204 });

    const response = await client.delete('/profiles/p-1');

    expect(response.data).toHaveLength(0);
    expect(() => response.json()).toThrow('No data received');
  });

  it('sends default and caller headers', async () => {
    let userAgent: unknown;
    let authorization: unknown;
    const adapter: AxiosAdapter = async (config) => {
      userAgent = config.headers.get('User-Agent');
      authorization = config.headers.get('Authorization');
      return { data: '', status: 200, statusText: '', headers: {}, config };
    };

    await createClient(adapter, logger).get('/profiles', {
      Authorization: 'Bearer test-token',
    });

    expect(userAgent).toBe('api-test-hub/1.0');
    expect(authorization).toBe('Bearer test-token');
  });

  it('logs requests with the Authorization header redacted', async () => {
    api.on('GET', '/profiles', { status: 200, body: {} });

    await client.get('/profiles', { Authorization: 'Bearer test-token' });

    const messages = logger.getEntries('Network').map((e) => e.message);
    expect(messages[0]).toBe('GET http://localhost:3000/api/v2/profiles');
    expect(messages[1]).toBe('   Headers: {"Authorization":"Bearer [redacted]"}');
    expect(messages.some((m) => m.includes('test-token'))).toBe(false);
  });

  it('truncates logged payloads to 1000 characters', async () => {
    api.on('GET', '/large', { status: 200, body: 'x'.repeat(2000) });

    await client.get('/large');

    const payload = logger
      .getEntries('Network')
      .find((e) => e.message.startsWith('   Response: '));
    expect(payload?.message).toBe(`   Response: ${'x'.repeat(997)}...`);
  });

  it('logs non-2xx responses as warnings', async () => {
    api.on('GET', '/boom', { status: 500 });

    await client.get('/boom');

    const warning = logger.getEntries('Network').find((e) => e.level === 'warn');
    expect(warning?.message).toMatch(
      /^500 GET http:\/\/localhost:3000\/api\/v2\/boom \(\d+\.\d{2}s\)$/,
    );
  });

  it('turns transport failures into NetworkError and logs them', async () => {
    api.on('GET', '/profiles', (_request, config) => {
      throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config);
    });

    await expect(client.get('/profiles')).rejects.toMatchObject({
      kind: 'noConnection',
      message: 'No internet connection',
    });
    const errors = logger.getEntries('Network').filter((e) => e.level === 'error');
    expect(errors).toHaveLength(1);
  });
});

describe('classifyError', () => {
  it('maps timeouts', () => {
    expect(classifyError(new AxiosError('timeout', 'ECONNABORTED')).kind).toBe(
      'timeout',
    );
    expect(classifyError(new AxiosError('timeout', 'ETIMEDOUT')).kind).toBe(
      'timeout',
    );
    expect(classifyError(new CanceledError()).kind).toBe('timeout');
  });

  it('maps connectivity failures', () => {
    for (const code of ['ERR_NETWORK', 'ENOTFOUND', 'ECONNREFUSED']) {
      expect(classifyError(new AxiosError('offline', code)).kind).toBe(
        'noConnection',
      );
    }
  });

  it('maps invalid URLs', () => {
    expect(classifyError(new AxiosError('bad', 'ERR_INVALID_URL')).kind).toBe(
      'invalidURL',
    );
  });

  it('wraps anything else as requestFailed', () => {
    const error = classifyError(new Error('boom'));

    expect(error.kind).toBe('requestFailed');
    expect(error.message).toBe('Request failed: boom');
    expect(error.cause).toBeInstanceOf(Error);
  });

  it('passes NetworkError through unchanged', () => {
    const original = new NetworkError('noData');

    expect(classifyError(original)).toBe(original);
  });
});
