import axios, { AxiosHeaders } from 'axios';
import type { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import type { Logger } from '../utils/logger.js';
import { NetworkError } from './network-error.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonBody = { [key: string]: JsonValue };

export interface RequestOptions {
  method: HttpMethod;
  endpoint: string;
  headers?: Record<string, string>;
  query?: Record<string, string>;
  body?: JsonBody;
}

export interface NetworkClientOptions {
  baseURL: string;
  apiVersion: string;
  logger: Logger;
  requestTimeoutMs?: number;
  resourceTimeoutMs?: number;
  /** Replaces the HTTP transport, used by tests to stay in-process. */
  adapter?: AxiosAdapter;
}

export const REQUEST_TIMEOUT_MS = 30_000;
export const RESOURCE_TIMEOUT_MS = 60_000;
const MAX_LOGGED_PAYLOAD = 1000;
const USER_AGENT = 'api-test-hub/1.0';

const NO_CONNECTION_CODES = new Set([
  'ERR_NETWORK',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ECONNREFUSED',
  'ENETUNREACH',
  'EHOSTUNREACH',
]);

export class NetworkResponse {
  constructor(
    readonly method: HttpMethod,
    readonly url: string,
    readonly statusCode: number,
    readonly headers: Record<string, string>,
    readonly data: Buffer,
    /** Seconds. */
    readonly duration: number,
  ) {}

  get ok(): boolean {
    return this.statusCode >= 200 && this.statusCode < 300;
  }

  text(): string {
    return this.data.toString('utf-8');
  }

  /**
   * Throws NetworkError('noData') on an empty body and SyntaxError on bad
   * JSON.
   */
  json(): unknown {
    if (this.data.length === 0) {
      throw new NetworkError('noData');
    }
    return JSON.parse(this.text());
  }
}

/**
 * Issues one request per call against `{baseURL}/api/{version}{endpoint}`.
 * Every HTTP status is returned to the caller; only transport failures
 * throw, always as a NetworkError.
 */
export class NetworkClient {
  private readonly http: AxiosInstance;
  private readonly baseURL: string;
  private readonly apiVersion: string;
  private readonly logger: Logger;
  private readonly resourceTimeoutMs: number;

  constructor(options: NetworkClientOptions) {
    this.baseURL = options.baseURL.replace(/\/+$/, '');
    this.apiVersion = options.apiVersion;
    this.logger = options.logger;
    this.resourceTimeoutMs = options.resourceTimeoutMs ?? RESOURCE_TIMEOUT_MS;
    this.http = axios.create({
      timeout: options.requestTimeoutMs ?? REQUEST_TIMEOUT_MS,
      responseType: 'arraybuffer',
      validateStatus: () => true,
      adapter: options.adapter,
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
        'User-Agent': USER_AGENT,
      },
    });
  }

  get(
    endpoint: string,
    headers?: Record<string, string>,
    query?: Record<string, string>,
  ): Promise<NetworkResponse> {
    return this.request({ method: 'GET', endpoint, headers, query });
  }

  post(
    endpoint: string,
    body?: JsonBody,
    headers?: Record<string, string>,
  ): Promise<NetworkResponse> {
    return this.request({ method: 'POST', endpoint, headers, body });
  }

  put(
    endpoint: string,
    body?: JsonBody,
    headers?: Record<string, string>,
  ): Promise<NetworkResponse> {
    return this.request({ method: 'PUT', endpoint, headers, body });
  }

  delete(
    endpoint: string,
    headers?: Record<string, string>,
  ): Promise<NetworkResponse> {
    return this.request({ method: 'DELETE', endpoint, headers });
  }

  buildURL(endpoint: string, query?: Record<string, string>): string {
    if (!endpoint.startsWith('/') || endpoint.startsWith('/api/')) {
      throw new NetworkError('invalidURL');
    }

    let url: URL;
    try {
      url = new URL(`${this.baseURL}/api/${this.apiVersion}${endpoint}`);
    } catch (error) {
      throw new NetworkError('invalidURL', error);
    }

    if (query) {
      for (const [key, value] of Object.entries(query)) {
        url.searchParams.set(key, value);
      }
    }
    return url.toString();
  }

  async request(options: RequestOptions): Promise<NetworkResponse> {
    const { method, endpoint, headers = {}, query, body } = options;
    const startTime = Date.now();

    let url: string;
    try {
      url = this.buildURL(endpoint, query);
    } catch (error) {
      this.logFailure(method, endpoint, error, 0);
      throw error;
    }

    this.logRequest(method, url, headers, body);

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.request<unknown>({
        method,
        url,
        headers,
        data: body,
        signal: AbortSignal.timeout(this.resourceTimeoutMs),
      });
    } catch (error) {
      const duration = (Date.now() - startTime) / 1000;
      const networkError = classifyError(error);
      this.logFailure(method, url, networkError, duration);
      throw networkError;
    }

    const duration = (Date.now() - startTime) / 1000;
    if (typeof response.status !== 'number') {
      const networkError = new NetworkError('invalidResponse');
      this.logFailure(method, url, networkError, duration);
      throw networkError;
    }

    const result = new NetworkResponse(
      method,
      url,
      response.status,
      normalizeHeaders(response.headers),
      toBuffer(response.data),
      duration,
    );
    this.logResponse(result);
    return result;
  }

  private logRequest(
    method: HttpMethod,
    url: string,
    headers: Record<string, string>,
    body?: JsonBody,
  ): void {
    this.logger.debug(`${method} ${url}`, 'Network');
    if (Object.keys(headers).length > 0) {
      this.logger.debug(
        `   Headers: ${JSON.stringify(redactHeaders(headers))}`,
        'Network',
      );
    }
    if (body) {
      this.logger.debug(`   Body: ${JSON.stringify(body)}`, 'Network');
    }
  }

  private logResponse(response: NetworkResponse): void {
    const { statusCode, method, url, duration } = response;
    const line = `${statusCode} ${method} ${url} (${duration.toFixed(2)}s)`;
    if (response.ok) {
      this.logger.debug(line, 'Network');
    } else {
      this.logger.warn(line, 'Network');
    }
    const payload = response.text();
    if (payload) {
      this.logger.debug(
        `   Response: ${truncate(payload, MAX_LOGGED_PAYLOAD)}`,
        'Network',
      );
    }
  }

  private logFailure(
    method: HttpMethod,
    url: string,
    error: unknown,
    duration: number,
  ): void {
    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(
      `${method} ${url} failed (${duration.toFixed(2)}s): ${message}`,
      'Network',
    );
  }
}

export function classifyError(error: unknown): NetworkError {
  if (error instanceof NetworkError) return error;

  // The only abort source is the resource timeout signal.
  if (axios.isCancel(error)) {
    return new NetworkError('timeout', error);
  }

  if (axios.isAxiosError(error)) {
    const code = error.code ?? '';
    if (code === 'ECONNABORTED' || code === 'ETIMEDOUT') {
      return new NetworkError('timeout', error);
    }
    if (code === 'ERR_INVALID_URL') {
      return new NetworkError('invalidURL', error);
    }
    if (NO_CONNECTION_CODES.has(code)) {
      return new NetworkError('noConnection', error);
    }
  }

  return new NetworkError('requestFailed', error);
}

function normalizeHeaders(headers: unknown): Record<string, string> {
  const raw =
    headers instanceof AxiosHeaders ? headers.toJSON() : (headers ?? {});
  const result: Record<string, string> = {};
  if (typeof raw !== 'object' || raw === null) return result;

  for (const [key, value] of Object.entries(raw)) {
    if (value === undefined || value === null) continue;
    result[key.toLowerCase()] = Array.isArray(value)
      ? value.join(', ')
      : String(value);
  }
  return result;
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (typeof data === 'string') return Buffer.from(data, 'utf-8');
  if (data === undefined || data === null) return Buffer.alloc(0);
  return Buffer.from(JSON.stringify(data), 'utf-8');
}

function redactHeaders(
  headers: Record<string, string>,
): Record<string, string> {
  const redacted: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    redacted[key] =
      key.toLowerCase() === 'authorization' ? 'Bearer [redacted]' : value;
  }
  return redacted;
}

function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  return str.slice(0, maxLen - 3) + '...';
}
