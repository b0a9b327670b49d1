import { TestError, describeError } from '../errors.js';
import { createReport } from '../reporters/report.js';
import type { ReportStore } from '../reporters/report-store.js';
import type { TestRegistry } from '../registry/test-registry.js';
import { type TestCase, findUnmetDependencies } from '../registry/test-case.js';
import type {
  TestCategory,
  TestHubConfiguration,
  TestReport,
  TestResult,
} from '../types.js';
import type { Logger } from '../utils/logger.js';
import { RunContext } from './run-context.js';

const LOG_CATEGORY = 'Runner';

export type RunnerState = 'idle' | 'running' | 'completed';

export interface RunProgress {
  completed: number;
  total: number;
  /** completed / total, 1 once the run has finished. */
  fraction: number;
  /** Case about to run; absent on the final event. */
  currentTest?: string;
  /** Seconds left, extrapolated from the cases finished so far. */
  etaSeconds: number;
}

export type ProgressListener = (progress: RunProgress) => void;
export type ResultListener = (result: TestResult) => void;

export interface TestRunnerOptions {
  registry: TestRegistry;
  configuration: TestHubConfiguration;
  logger: Logger;
  /** When set, every finished run is also written here. */
  store?: ReportStore;
  context?: RunContext;
}

export class TestRunner {
  private _state: RunnerState = 'idle';
  private _results: TestResult[] = [];
  private _lastReport: TestReport | undefined;
  private readonly progressListeners = new Set<ProgressListener>();
  private readonly resultListeners = new Set<ResultListener>();
  private readonly context: RunContext;

  constructor(private readonly options: TestRunnerOptions) {
    this.context = options.context ?? new RunContext();
  }

  get state(): RunnerState {
    return this._state;
  }

  get results(): readonly TestResult[] {
    return this._results;
  }

  get lastReport(): TestReport | undefined {
    return this._lastReport;
  }

  /** Returns a function that removes the listener. */
  onProgress(listener: ProgressListener): () => void {
    this.progressListeners.add(listener);
    return () => this.progressListeners.delete(listener);
  }

  onResult(listener: ResultListener): () => void {
    this.resultListeners.add(listener);
    return () => this.resultListeners.delete(listener);
  }

  runAll(): Promise<TestReport> {
    return this.run(this.options.registry.all());
  }

  runCategory(category: TestCategory): Promise<TestReport> {
    return this.run(this.options.registry.forCategory(category));
  }

  private async run(cases: readonly TestCase[]): Promise<TestReport> {
    if (this._state === 'running') {
      throw new Error('A test run is already in progress');
    }
    const { logger, configuration, store } = this.options;

    this._state = 'running';
    this._results = [];
    this._lastReport = undefined;
    this.context.reset();

    for (const { testName, key } of findUnmetDependencies(cases)) {
      logger.warn(
        `"${testName}" reads "${key}" but no earlier selected test provides it`,
        LOG_CATEGORY,
      );
    }
    logger.info(
      `Running ${cases.length} tests against ${configuration.baseURL}`,
      LOG_CATEGORY,
    );

    const runStart = Date.now();
    for (let i = 0; i < cases.length; i++) {
      const testCase = cases[i];
      this.publishProgress({
        completed: i,
        total: cases.length,
        fraction: i / cases.length,
        currentTest: testCase.name,
        etaSeconds: estimateRemaining(cases, i, (Date.now() - runStart) / 1000),
      });
      logger.debug(
        `[${i + 1}/${cases.length}] Running: ${testCase.name}`,
        LOG_CATEGORY,
      );

      const result = await this.execute(testCase);
      this._results.push(result);

      if (result.success) {
        logger.success(
          `${result.name} (${result.executionTime.toFixed(2)}s)`,
          LOG_CATEGORY,
        );
      } else {
        logger.error(
          `${result.name}: ${result.error?.message ?? result.message}`,
          LOG_CATEGORY,
        );
      }
      this.publishResult(result);
    }

    const report = createReport(this._results, {
      environment: configuration.environment,
      outputFormat: configuration.outputFormat,
      duration: (Date.now() - runStart) / 1000,
    });
    this._lastReport = report;
    this._state = 'completed';
    this.publishProgress({
      completed: cases.length,
      total: cases.length,
      fraction: 1,
      etaSeconds: 0,
    });

    if (store) {
      try {
        const filePath = store.saveReport(report);
        logger.info(`Report saved to ${filePath}`, LOG_CATEGORY);
      } catch (error) {
        logger.error(
          `Failed to save report: ${describeError(error)}`,
          LOG_CATEGORY,
        );
      }
    }

    return report;
  }

  /**
   * Runs one body with the single writable context lease. A throwing body
   * becomes an EXECUTION_ERROR result; name, category and wall-clock time
   * always come from the case, not the body.
   */
  private async execute(testCase: TestCase): Promise<TestResult> {
    const info = { name: testCase.name, category: testCase.category };
    const lease = this.context.acquire(testCase.name);
    const start = Date.now();

    let result: TestResult;
    try {
      result = await testCase.run(lease, info);
    } catch (error) {
      result = {
        ...info,
        success: false,
        message: 'Test execution failed',
        executionTime: 0,
        error: new TestError('EXECUTION_ERROR', describeError(error), error),
      };
    } finally {
      this.context.release();
    }

    return {
      ...result,
      name: testCase.name,
      category: testCase.category,
      executionTime: (Date.now() - start) / 1000,
    };
  }

  private publishProgress(progress: RunProgress): void {
    for (const listener of this.progressListeners) {
      this.notify(() => listener(progress));
    }
  }

  private publishResult(result: TestResult): void {
    for (const listener of this.resultListeners) {
      this.notify(() => listener(result));
    }
  }

  private notify(deliver: () => void): void {
    try {
      deliver();
    } catch (error) {
      this.options.logger.warn(
        `Run observer threw: ${describeError(error)}`,
        LOG_CATEGORY,
      );
    }
  }
}

/**
 * Before any case has finished, the declared expected durations are the only
 * estimate; afterwards the observed average per case is used.
 */
function estimateRemaining(
  cases: readonly TestCase[],
  completed: number,
  elapsedSeconds: number,
): number {
  if (completed === 0) {
    return cases.reduce((sum, testCase) => sum + testCase.expectedDuration, 0);
  }
  return (elapsedSeconds / completed) * (cases.length - completed);
}
