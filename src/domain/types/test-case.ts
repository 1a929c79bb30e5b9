import type { Mode } from './mode.js';

/** Verdict of a mode handler's run function. */
export type TestResult =
  | { status: 'passed' }
  | { status: 'failed'; details?: string }
  | { status: 'skipped'; reason: string };

/** Verdict of a mode handler's cheap, metadata-only check. */
export type CheckResult =
  | { skip: false }
  | { skip: true; reason: string };

/** What a run closure reports back to the scheduler. */
export type RunOutcome =
  | { status: 'ok' }
  | { status: 'ignored'; reason: string };

/**
 * One schedulable test case. Built during the build phase, never mutated,
 * consumed once by the runner.
 */
export interface TestDescriptor {
  /** `[<mode>] <root-relative path>[#<revision>]`, unique across the suite. */
  readonly name: string;
  readonly mode: Mode;
  readonly fixturePath: string;
  readonly revision?: string;
  readonly ignore: boolean;
  readonly ignoreMessage?: string;
  /** Rejects with TestFailedError (or anything else) when the case fails. */
  readonly run: () => Promise<RunOutcome>;
}

export const PASSED: TestResult = { status: 'passed' };
export const NOT_SKIPPED: CheckResult = { skip: false };

export function failed(details?: string): TestResult {
  return details === undefined ? { status: 'failed' } : { status: 'failed', details };
}

export function skipped(reason: string): TestResult {
  return { status: 'skipped', reason };
}

export function skipCheck(reason: string): CheckResult {
  return { skip: true, reason };
}
