export interface TestErrorJSON {
  code: string;
  message: string;
  underlyingError?: string;
}

/**
 * A failure attached to a TestResult, or thrown by a test body when a
 * precondition is missing.
 */
export class TestError extends Error {
  readonly code: string;

  constructor(code: string, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'TestError';
    this.code = code;
  }

  toJSON(): TestErrorJSON {
    const json: TestErrorJSON = { code: this.code, message: this.message };
    if (this.cause !== undefined) {
      json.underlyingError = describeError(this.cause);
    }
    return json;
  }
}

/** Raised while turning CLI options into a TestHubConfiguration. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
