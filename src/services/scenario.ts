import type { z } from 'zod';
import { TestError, describeError } from '../errors.js';
import type { NetworkResponse } from '../network/network-client.js';
import { NetworkError } from '../network/network-error.js';
import type { TestCategory, TestDetails, TestResult } from '../types.js';

export type Step<T> =
  | { ok: true; value: T }
  | { ok: false; result: TestResult };

export const PARSE_ERROR = 'PARSE_ERROR';
export const VALIDATION_FAILED = 'VALIDATION_FAILED';

/**
 * Builds the TestResult of one service scenario: times it, collects
 * correlation data and turns transport, status and parse problems into
 * failing results with distinguishable codes.
 */
export class Scenario {
  readonly details: TestDetails = {};
  private readonly startTime = Date.now();

  constructor(
    readonly name: string,
    readonly category: TestCategory,
    /** Code used for transport failures and unexpected HTTP statuses. */
    readonly failureCode: string,
  ) {}

  get elapsed(): number {
    return (Date.now() - this.startTime) / 1000;
  }

  /** Sends a request; only a NetworkError becomes a failing step. */
  async send(
    request: () => Promise<NetworkResponse>,
    failureMessage: string,
  ): Promise<Step<NetworkResponse>> {
    try {
      const response = await request();
      this.details.statusCode = response.statusCode;
      this.details.requestUrl = response.url;
      this.details.requestMethod = response.method;
      return { ok: true, value: response };
    } catch (error) {
      if (!(error instanceof NetworkError)) throw error;
      return {
        ok: false,
        result: this.fail(
          failureMessage,
          new TestError(this.failureCode, error.message, error),
        ),
      };
    }
  }

  /** Sends a request and requires a 2xx status. */
  async sendExpectingSuccess(
    request: () => Promise<NetworkResponse>,
    failureMessage: string,
  ): Promise<Step<NetworkResponse>> {
    const step = await this.send(request, failureMessage);
    if (!step.ok) return step;
    if (!step.value.ok) {
      return {
        ok: false,
        result: this.fail(
          failureMessage,
          new TestError(
            this.failureCode,
            `HTTP ${step.value.statusCode}: ${summarizeBody(step.value)}`,
          ),
        ),
      };
    }
    return step;
  }

  parse<T>(
    response: NetworkResponse,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Step<T> {
    let body: unknown;
    try {
      body = response.json();
    } catch (error) {
      return {
        ok: false,
        result: this.fail(
          'Failed to parse response',
          new TestError(PARSE_ERROR, describeError(error), error),
        ),
      };
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      return {
        ok: false,
        result: this.fail(
          'Failed to parse response',
          new TestError(PARSE_ERROR, issues),
        ),
      };
    }
    return { ok: true, value: parsed.data };
  }

  /** Sends, requires 2xx and parses against the schema. */
  async fetch<T>(
    request: () => Promise<NetworkResponse>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    failureMessage: string,
  ): Promise<Step<T>> {
    const step = await this.sendExpectingSuccess(request, failureMessage);
    if (!step.ok) return step;
    return this.parse(step.value, schema);
  }

  /**
   * Passes when every check holds; otherwise fails with VALIDATION_FAILED
   * naming the checks that did not.
   */
  conclude(
    checks: Record<string, boolean>,
    successMessage: string,
    failureMessage: string,
  ): TestResult {
    const failedChecks = Object.entries(checks)
      .filter(([, passed]) => !passed)
      .map(([check]) => check);

    if (failedChecks.length === 0) {
      return this.pass(successMessage);
    }
    return this.fail(
      failureMessage,
      new TestError(
        VALIDATION_FAILED,
        `Failed checks: ${failedChecks.join(', ')}`,
      ),
    );
  }

  pass(message: string): TestResult {
    return this.result(true, message);
  }

  fail(message: string, error: TestError): TestResult {
    return this.result(false, message, error);
  }

  private result(
    success: boolean,
    message: string,
    error?: TestError,
  ): TestResult {
    const result: TestResult = {
      name: this.name,
      category: this.category,
      success,
      message,
      executionTime: this.elapsed,
      details: { ...this.details },
    };
    if (error) result.error = error;
    return result;
  }
}

export function bearer(token: string): Record<string, string> {
  return { Authorization: `Bearer ${token}` };
}

function summarizeBody(response: NetworkResponse): string {
  const text = response.text().trim();
  if (!text) return 'empty response';
  return text.length > 200 ? `${text.slice(0, 197)}...` : text;
}
