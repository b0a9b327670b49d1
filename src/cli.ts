import { Command, CommanderError } from 'commander';
import type { AxiosAdapter } from 'axios';
import {
  createConfiguration,
  parseCategory,
  parseEnvironment,
  parseOutputFormat,
} from './config/configuration.js';
import { ConfigurationError, describeError } from './errors.js';
import { NetworkClient } from './network/network-client.js';
import { allPassed, renderReport } from './reporters/index.js';
import { ReportStore } from './reporters/report-store.js';
import type { SuiteDependencies } from './registry/suite.js';
import {
  type TestRegistry,
  createDefaultRegistry,
} from './registry/test-registry.js';
import { TestRunner } from './runner/test-runner.js';
import { createServices } from './services/index.js';
import type { TestHubConfiguration } from './types.js';
import { Logger } from './utils/logger.js';

export const VERSION = '1.0.0';

type CliOptions = {
  env: string;
  category?: string;
  output: string;
  verbose?: boolean;
  saveReport?: string;
};

export interface CliDependencies {
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  /** HTTP transport override; tests use it to stay in-process. */
  adapter?: AxiosAdapter;
  createRegistry?: (deps: SuiteDependencies) => TestRegistry;
}

function createProgram(
  stdout: (text: string) => void,
  stderr: (text: string) => void,
): Command {
  return new Command()
    .name('test-hub')
    .description('Run the categorized V2 API integration test suite')
    .version(VERSION)
    .option(
      '-e, --env <environment>',
      'Set environment (dev, staging, prod)',
      'dev',
    )
    .option(
      '-c, --category <category>',
      'Run specific category (auth, profile, linking, token, edge)',
    )
    .option(
      '-o, --output <format>',
      'Output format (console, json, junit)',
      'console',
    )
    .option('-v, --verbose', 'Enable verbose logging')
    .option('--save-report <dir>', 'Also write the JSON report to a directory')
    .addHelpText(
      'after',
      `
Examples:
  test-hub                           # Run all tests against dev
  test-hub -e prod                   # Run all tests against production
  test-hub -c auth -v                # Run auth tests with verbose logging
  test-hub -o junit > results.xml    # Output JUnit XML format`,
    )
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({ writeOut: stdout, writeErr: stderr });
}

function toConfiguration(options: CliOptions): TestHubConfiguration {
  return createConfiguration({
    environment: parseEnvironment(options.env),
    category:
      options.category === undefined
        ? undefined
        : parseCategory(options.category),
    outputFormat: parseOutputFormat(options.output),
    verbose: options.verbose ?? false,
    reportDir: options.saveReport,
  });
}

/**
 * Parses `argv` (arguments only, without the node binary and script), runs
 * the selected tests and prints the report to stdout. Resolves to the
 * process exit code: 0 when every test passed or help/version was shown,
 * 1 otherwise.
 */
export async function runCli(
  argv: readonly string[],
  deps: CliDependencies = {},
): Promise<number> {
  const stdout =
    deps.stdout ??
    ((text: string) => {
      process.stdout.write(text);
    });
  const stderr =
    deps.stderr ??
    ((text: string) => {
      process.stderr.write(text);
    });

  let configuration: TestHubConfiguration;
  try {
    const program = createProgram(stdout, stderr);
    await program.parseAsync([...argv], { from: 'user' });
    configuration = toConfiguration(program.opts<CliOptions>());
  } catch (error) {
    if (error instanceof CommanderError) {
      // Commander has already written help, version or the parse error.
      return error.exitCode;
    }
    if (error instanceof ConfigurationError) {
      stderr(`Error: ${error.message}\n`);
      return 1;
    }
    throw error;
  }

  try {
    const logger = new Logger({
      verbose: configuration.verbose,
      color: deps.stderr ? false : undefined,
      write: (line) => stderr(`${line}\n`),
    });
    const client = new NetworkClient({
      baseURL: configuration.baseURL,
      apiVersion: configuration.apiVersion,
      logger,
      adapter: deps.adapter,
    });
    const suite: SuiteDependencies = {
      services: createServices(client, configuration),
      configuration,
    };
    const registry = (deps.createRegistry ?? createDefaultRegistry)(suite);
    const runner = new TestRunner({
      registry,
      configuration,
      logger,
      store: configuration.reportDir
        ? new ReportStore(configuration.reportDir)
        : undefined,
    });

    stderr(`🚀 Interspace V2 API Test Suite (${configuration.environment})\n`);
    const report = configuration.category
      ? await runner.runCategory(configuration.category)
      : await runner.runAll();

    stdout(`${renderReport(report)}\n`);
    return allPassed(report) ? 0 : 1;
  } catch (error) {
    stderr(`Error: ${describeError(error)}\n`);
    return 1;
  }
}
