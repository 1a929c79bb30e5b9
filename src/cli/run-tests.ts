import { availableParallelism } from 'node:os';
import type { OutputConfiguration } from 'commander';
import type { ICompilerInvoker } from '@domain/ports/compiler-invoker.js';
import type { TestDescriptor } from '@domain/types/test-case.js';
import { buildSuite, createSuiteDeps } from '@features/suite/build-suite.js';
import { resolveModes } from '@features/suite/mode-dispatcher.js';
import { createConfig, parseTesterEnv } from '@infra/config/config-loader.js';
import type { OutputSink } from '@infra/execution/console-reporter.js';
import { runConsole, type RunnerOptions } from '@infra/execution/parallel-runner.js';
import { setColorEnabled } from '@shared/lib/ansi.js';
import { logger, setLoggerOptions } from '@shared/lib/logger.js';
import { parseCliArgs, type CliArgs } from './program.js';
import { EXIT_CODES, exitCodeForParseError, reportFatalError } from './utils.js';

export interface RunTestsOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Where the run report goes; defaults to stdout. */
  out?: OutputSink;
  /** Compiler invocation; defaults to spawning the binary. */
  compiler?: ICompilerInvoker;
  /** Commander output overrides (help and parse errors). */
  cliOutput?: OutputConfiguration;
  now?: () => number;
}

interface Prepared {
  tests: TestDescriptor[];
  runner: RunnerOptions;
}

function prepare(args: CliArgs, options: RunTestsOptions): Prepared {
  const env = parseTesterEnv(options.env);
  // Resolved first: an unknown mode must abort before anything touches the disk.
  const modes = resolveModes(env);

  const config = createConfig({
    ...(args.compiler !== undefined ? { binaryPath: args.compiler } : {}),
    ...(args.root !== undefined ? { root: args.root } : {}),
    bless: args.bless,
    verbose: args.verbose,
    ...(options.env !== undefined ? { env: options.env } : {}),
    ...(options.cwd !== undefined ? { cwd: options.cwd } : {}),
  });

  const tests = buildSuite(config, modes, createSuiteDeps(options.compiler));

  return {
    tests,
    runner: {
      filters: args.filters,
      exact: args.exact,
      skip: args.skip,
      ignored: args.ignored,
      list: args.list,
      testThreads: args.testThreads ?? env.TESTER_THREADS ?? availableParallelism(),
      format: args.format,
    },
  };
}

/**
 * Parse arguments, build the suite and run it.
 *
 * Resolves to the process exit code: 0 when everything selected passed (or
 * nothing was selected), 1 when a test failed, 101 for argument errors,
 * build-phase failures and I/O failures of the runner.
 */
export async function runTests(argv: string[], options: RunTestsOptions = {}): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv, options.cliOutput);
  } catch (error) {
    return exitCodeForParseError(error);
  }

  setLoggerOptions({ level: args.verbose ? 'debug' : 'info', json: args.jsonLogs });
  if (args.format === 'json') {
    setColorEnabled(false);
  }

  let prepared: Prepared;
  try {
    prepared = prepare(args, options);
  } catch (error) {
    reportFatalError(error, args.verbose);
    return EXIT_CODES.fatal;
  }

  try {
    const ok = await runConsole(prepared.runner, prepared.tests, {
      ...(options.out !== undefined ? { out: options.out } : {}),
      ...(options.now !== undefined ? { now: options.now } : {}),
    });
    if (ok) return EXIT_CODES.ok;
    logger.error('Some tests failed');
    return EXIT_CODES.testsFailed;
  } catch (error) {
    reportFatalError(error, args.verbose, 'I/O failure during tests');
    return EXIT_CODES.fatal;
  }
}
