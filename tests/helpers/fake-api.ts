import type {
  AxiosAdapter,
  AxiosResponse,
  InternalAxiosRequestConfig,
} from 'axios';

export interface RecordedRequest {
  method: string;
  /** Path below /api/v2, without the query string. */
  path: string;
  url: string;
  query: URLSearchParams;
  authorization?: string;
  body: unknown;
}

export interface FakeReply {
  status: number;
  /** Objects are sent as JSON, strings as-is. */
  body?: unknown;
  headers?: Record<string, string>;
}

export type FakeHandler = (
  request: RecordedRequest,
  config: InternalAxiosRequestConfig,
) => FakeReply | Promise<FakeReply>;

interface Route {
  method: string;
  path: string | RegExp;
  handler: FakeHandler;
}

const API_PREFIX = '/api/v2';

/**
 * In-process stand-in for the HTTP transport. Routes are matched in the
 * order they were added; unmatched requests get a 404.
 */
export class FakeApi {
  readonly requests: RecordedRequest[] = [];
  private readonly routes: Route[] = [];

  on(method: string, path: string | RegExp, reply: FakeReply | FakeHandler): this {
    const handler = typeof reply === 'function' ? reply : () => reply;
    this.routes.push({ method: method.toUpperCase(), path, handler });
    return this;
  }

  /** Replies from the list in turn, repeating the last one once exhausted. */
  sequence(method: string, path: string | RegExp, replies: FakeReply[]): this {
    let next = 0;
    return this.on(method, path, () => {
      const reply = replies[Math.min(next, replies.length - 1)];
      next++;
      return reply;
    });
  }

  readonly adapter: AxiosAdapter = async (config) => {
    const url = new URL(config.url ?? '');
    const path = url.pathname.startsWith(API_PREFIX)
      ? url.pathname.slice(API_PREFIX.length)
      : url.pathname;
    const authorization = config.headers.get('Authorization');
    const request: RecordedRequest = {
      method: (config.method ?? 'get').toUpperCase(),
      path,
      url: url.toString(),
      query: url.searchParams,
      authorization:
        typeof authorization === 'string' ? authorization : undefined,
      body: typeof config.data === 'string' ? JSON.parse(config.data) : undefined,
    };
    this.requests.push(request);

    const route = this.routes.find(
      (r) =>
        r.method === request.method &&
        (typeof r.path === 'string' ? r.path === path : r.path.test(path)),
    );
    const reply = route
      ? await route.handler(request, config)
      : { status: 404, body: { error: `No route for ${request.method} ${path}` } };

    const response: AxiosResponse = {
      data:
        reply.body === undefined
          ? ''
          : typeof reply.body === 'string'
            ? reply.body
            : JSON.stringify(reply.body),
      status: reply.status,
      statusText: '',
      headers: { 'content-type': 'application/json', ...reply.headers },
      config,
    };
    return response;
  };

  requestsTo(method: string, path: string): RecordedRequest[] {
    return this.requests.filter(
      (r) => r.method === method.toUpperCase() && r.path === path,
    );
  }
}
