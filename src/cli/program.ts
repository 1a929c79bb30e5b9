import { Command, Option, type OutputConfiguration } from 'commander';
import { z } from 'zod/v4';
import type { IgnoredPolicy } from '@infra/execution/parallel-runner.js';
import type { OutputFormat } from '@infra/execution/console-reporter.js';
import { ArgumentError } from '@shared/lib/errors.js';

const VERSION = '0.1.0';

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

const CliOptionsSchema = z.object({
  exact: z.boolean().default(false),
  skip: z.array(z.string()).default([]),
  ignored: z.boolean().default(false),
  includeIgnored: z.boolean().default(false),
  list: z.boolean().default(false),
  testThreads: z.coerce.number().int().positive().optional(),
  format: z.enum(['pretty', 'terse', 'json']).optional(),
  quiet: z.boolean().default(false),
  compiler: z.string().min(1).optional(),
  root: z.string().min(1).optional(),
  bless: z.boolean().default(false),
  verbose: z.boolean().default(false),
  jsonLogs: z.boolean().default(false),
});

export interface CliArgs {
  filters: string[];
  exact: boolean;
  skip: string[];
  ignored: IgnoredPolicy;
  list: boolean;
  testThreads?: number;
  format: OutputFormat;
  compiler?: string;
  root?: string;
  bless: boolean;
  verbose: boolean;
  jsonLogs: boolean;
}

export function createProgram(output?: OutputConfiguration): Command {
  const program = new Command();

  program
    .name('sol-tester')
    .description('Run the compiler test suite: UI snapshots and upstream conformance fixtures')
    .version(VERSION)
    .argument('[filters...]', 'Run only tests whose names contain one of the filters')
    .option('--exact', 'Match filters (and --skip) against the whole test name')
    .option('--skip <filter>', 'Skip tests whose names contain <filter> (repeatable)', collect, [])
    .addOption(new Option('--ignored', 'Run only ignored tests').conflicts('includeIgnored'))
    .option('--include-ignored', 'Run ignored and not ignored tests')
    .option('--list', 'List all tests and exit')
    .option('--test-threads <n>', 'Number of tests to run in parallel (default: available parallelism)')
    .addOption(new Option('--format <format>', 'Output format').choices(['pretty', 'terse', 'json']))
    .option('-q, --quiet', 'One character per test (same as --format terse)')
    .option('--compiler <path>', 'Compiler binary under test (env: TESTER_COMPILER)')
    .option('--root <path>', 'Project root holding the fixture trees (env: TESTER_ROOT)')
    .option('--bless', 'Overwrite expected outputs with actual outputs (env: TESTER_BLESS)')
    .option('--verbose', 'Enable verbose logging')
    .option('--json-logs', 'Write log lines as JSON')
    .exitOverride();

  if (output) {
    program.configureOutput(output);
  }

  return program;
}

/**
 * Parse tester arguments (without the node and script entries).
 * @throws CommanderError for help/version output and parse errors
 * @throws ArgumentError for values commander accepts but the tester does not
 */
export function parseCliArgs(argv: string[], output?: OutputConfiguration): CliArgs {
  const program = createProgram(output);
  program.parse(argv, { from: 'user' });

  const result = CliOptionsSchema.safeParse(program.opts());
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `--${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ArgumentError(`Invalid arguments: ${issues}`);
  }

  const opts = result.data;
  const ignored: IgnoredPolicy = opts.ignored ? 'only' : opts.includeIgnored ? 'include' : 'default';

  return {
    filters: [...program.args],
    exact: opts.exact,
    skip: opts.skip,
    ignored,
    list: opts.list,
    ...(opts.testThreads !== undefined ? { testThreads: opts.testThreads } : {}),
    // Output stays condensed unless a format is asked for explicitly.
    format: opts.quiet ? 'terse' : opts.format ?? 'terse',
    ...(opts.compiler !== undefined ? { compiler: opts.compiler } : {}),
    ...(opts.root !== undefined ? { root: opts.root } : {}),
    bless: opts.bless,
    verbose: opts.verbose,
    jsonLogs: opts.jsonLogs,
  };
}
