import type { TestDescriptor } from '@domain/types/test-case.js';
import { compareNames } from '@domain/services/suite-assembler.js';
import { TestFailedError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';
import { ConsoleReporter, type OutputFormat, type OutputSink, type RunSummary, type TestEvent } from './console-reporter.js';

export type IgnoredPolicy = 'default' | 'only' | 'include';

export interface RunnerOptions {
  /** Run tests whose names contain (or, with `exact`, equal) any filter. */
  filters: string[];
  exact: boolean;
  /** Exclude tests whose names contain (or equal) any of these. */
  skip: string[];
  ignored: IgnoredPolicy;
  list: boolean;
  testThreads: number;
  format: OutputFormat;
}

export interface RunnerDeps {
  out?: OutputSink;
  now?: () => number;
}

interface Selection {
  tests: TestDescriptor[];
  filteredOut: number;
}

function matches(name: string, pattern: string, exact: boolean): boolean {
  return exact ? name === pattern : name.includes(pattern);
}

/** Apply name filters and the ignored policy, preserving input order. */
export function selectTests(options: Pick<RunnerOptions, 'filters' | 'exact' | 'skip' | 'ignored'>, tests: readonly TestDescriptor[]): Selection {
  const selected = tests.filter((t) => {
    if (options.filters.length > 0 && !options.filters.some((f) => matches(t.name, f, options.exact))) {
      return false;
    }
    if (options.skip.some((s) => matches(t.name, s, options.exact))) {
      return false;
    }
    return options.ignored !== 'only' || t.ignore;
  });
  return { tests: selected, filteredOut: tests.length - selected.length };
}

/**
 * Run `worker` over `items` with at most `concurrency` in flight. Workers
 * pull the next item as soon as they finish the previous one. The first
 * worker rejection rejects the pool and no further items are started.
 */
export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<void>,
): Promise<void> {
  // one iterator shared by every lane acts as the work queue
  const queue = items.values();
  const lanes = Math.max(1, Math.min(concurrency, items.length));
  // set by the first failing worker; the other lanes stop pulling
  let stopped = false;
  const lane = async (): Promise<void> => {
    for (const item of queue) {
      if (stopped) return;
      try {
        await worker(item);
      } catch (err) {
        stopped = true;
        throw err;
      }
    }
  };
  await Promise.all(Array.from({ length: lanes }, lane));
}

async function execute(test: TestDescriptor, runIgnored: boolean, now: () => number): Promise<TestEvent> {
  if (test.ignore && !runIgnored) {
    return { name: test.name, kind: 'ignored', ...(test.ignoreMessage ? { reason: test.ignoreMessage } : {}) };
  }

  const start = now();
  try {
    const outcome = await test.run();
    if (outcome.status === 'ignored') {
      return { name: test.name, kind: 'ignored', reason: outcome.reason };
    }
    return { name: test.name, kind: 'passed', durationMs: now() - start };
  } catch (err) {
    const durationMs = now() - start;
    if (err instanceof TestFailedError) {
      return {
        name: test.name,
        kind: 'failed',
        durationMs,
        message: err.message,
        ...(err.details !== undefined ? { details: err.details } : {}),
      };
    }
    const message = err instanceof Error ? err.message : String(err);
    logger.debug('Test run threw', { test: test.name, error: message });
    return {
      name: test.name,
      kind: 'failed',
      durationMs,
      message,
      ...(err instanceof Error && err.stack ? { details: err.stack } : {}),
    };
  }
}

/**
 * Select, run and report a suite on the console.
 * Resolves to true when no selected test failed.
 */
export async function runConsole(
  options: RunnerOptions,
  tests: readonly TestDescriptor[],
  deps: RunnerDeps = {},
): Promise<boolean> {
  const out = deps.out ?? process.stdout;
  const now = deps.now ?? Date.now;
  const reporter = new ConsoleReporter(options.format, out);
  const { tests: selected, filteredOut } = selectTests(options, tests);

  if (options.list) {
    reporter.list(selected.map((t) => t.name));
    return true;
  }

  const runIgnored = options.ignored !== 'default';
  const summary: RunSummary = { passed: 0, failed: 0, ignored: 0, filteredOut, durationMs: 0, failures: [] };
  const start = now();

  reporter.plan(selected.length);
  logger.debug('Running tests', { count: selected.length, threads: options.testThreads });

  await runPool(selected, options.testThreads, async (test) => {
    const event = await execute(test, runIgnored, now);
    switch (event.kind) {
      case 'passed':
        summary.passed++;
        break;
      case 'failed':
        summary.failed++;
        summary.failures.push(event);
        break;
      case 'ignored':
        summary.ignored++;
        break;
    }
    reporter.result(event);
  });

  summary.durationMs = now() - start;
  summary.failures.sort((a, b) => compareNames(a.name, b.name));
  reporter.summary(summary);
  return summary.failed === 0;
}
