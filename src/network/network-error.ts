export type NetworkErrorKind =
  | 'invalidURL'
  | 'invalidResponse'
  | 'noData'
  | 'timeout'
  | 'noConnection'
  | 'requestFailed';

const DESCRIPTIONS: Record<NetworkErrorKind, string> = {
  invalidURL: 'Invalid URL',
  invalidResponse: 'Invalid response from server',
  noData: 'No data received',
  timeout: 'Request timed out',
  noConnection: 'No internet connection',
  requestFailed: 'Request failed',
};

/** Transport-level failure. Never retried by the client. */
export class NetworkError extends Error {
  readonly kind: NetworkErrorKind;

  constructor(kind: NetworkErrorKind, cause?: unknown) {
    const description = DESCRIPTIONS[kind];
    const message =
      kind === 'requestFailed' && cause instanceof Error
        ? `${description}: ${cause.message}`
        : description;
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'NetworkError';
    this.kind = kind;
  }
}
