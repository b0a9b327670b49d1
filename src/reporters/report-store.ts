import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { TestError, describeError } from '../errors.js';
import {
  TEST_CATEGORIES,
  type TestReport,
  type TestResult,
} from '../types.js';
import { createReport } from './report.js';
import { renderJSON } from './json-reporter.js';

const REPORT_FILE_PATTERN =
  /^TestReport_(\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2})(?:-(\d+))?\.json$/;

const StoredResultSchema = z.object({
  name: z.string(),
  category: z.enum(TEST_CATEGORIES),
  success: z.boolean(),
  message: z.string(),
  executionTime: z.number(),
  error: z
    .object({
      code: z.string(),
      message: z.string(),
      underlyingError: z.string().optional(),
    })
    .optional(),
  details: z
    .object({
      accessToken: z.string().optional(),
      refreshToken: z.string().optional(),
      accountId: z.string().optional(),
      profileId: z.string().optional(),
      sessionId: z.string().optional(),
      statusCode: z.number().optional(),
      requestUrl: z.string().optional(),
      requestMethod: z.string().optional(),
    })
    .optional(),
});

const StoredReportSchema = z.object({
  environment: z.enum(['dev', 'staging', 'prod']),
  outputFormat: z.enum(['console', 'json', 'junit']),
  duration: z.number(),
  allTests: z.array(StoredResultSchema),
});

export interface ReportStoreOptions {
  now?: () => Date;
}

/** Keeps one JSON file per run in a directory. */
export class ReportStore {
  private readonly now: () => Date;

  constructor(
    readonly directory: string,
    options: ReportStoreOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /** Writes the report and returns the path of the new file. */
  saveReport(report: TestReport): string {
    fs.mkdirSync(this.directory, { recursive: true });

    const stamp = formatTimestamp(this.now());
    let filePath = path.join(this.directory, `TestReport_${stamp}.json`);
    for (let n = 1; fs.existsSync(filePath); n++) {
      filePath = path.join(this.directory, `TestReport_${stamp}-${n}.json`);
    }

    fs.writeFileSync(filePath, renderJSON(report));
    return filePath;
  }

  /** Stored report paths, newest first. */
  listReports(): string[] {
    if (!fs.existsSync(this.directory)) return [];
    return fs
      .readdirSync(this.directory)
      .filter((file) => REPORT_FILE_PATTERN.test(file))
      .sort(compareReportFiles)
      .reverse()
      .map((file) => path.join(this.directory, file));
  }

  loadReport(filePath: string): TestReport {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (e) {
      throw new Error(`Invalid JSON in report file: ${describeError(e)}`);
    }

    const stored = StoredReportSchema.safeParse(parsed);
    if (!stored.success) {
      const issue = stored.error.issues[0];
      throw new Error(
        `Invalid report file ${filePath}: ${issue.path.join('.')}: ${issue.message}`,
      );
    }

    const results: TestResult[] = stored.data.allTests.map((entry) => {
      const { error, ...rest } = entry;
      return error
        ? {
            ...rest,
            error: new TestError(
              error.code,
              error.message,
              error.underlyingError,
            ),
          }
        : rest;
    });
    return createReport(results, stored.data);
  }
}

/** Local time as yyyy-MM-dd_HH-mm-ss. */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`
  );
}

// Same-second duplicates carry a numeric suffix and sort after their base.
function compareReportFiles(a: string, b: string): number {
  const key = (file: string) => {
    const match = REPORT_FILE_PATTERN.exec(file);
    return { stamp: match?.[1] ?? file, n: Number(match?.[2] ?? 0) };
  };
  const ka = key(a);
  const kb = key(b);
  if (ka.stamp !== kb.stamp) return ka.stamp < kb.stamp ? -1 : 1;
  return ka.n - kb.n;
}
