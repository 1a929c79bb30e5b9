/**
 * Base class for every error raised by the tester itself.
 *
 * Anything other than TestFailedError means the harness is misconfigured and
 * the run aborts with exit code 101 before (or instead of) executing tests.
 */
export class TesterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TesterError';
  }
}

export class ConfigError extends TesterError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ArgumentError extends TesterError {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

export class UnknownModeError extends ConfigError {
  constructor(
    public readonly mode: string,
    known: readonly string[],
  ) {
    super(`unknown mode: ${mode} (expected one of: ${known.join(', ')})`);
    this.name = 'UnknownModeError';
  }
}

export class DiscoveryError extends TesterError {
  constructor(
    public readonly path: string,
    public readonly cause?: unknown,
  ) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Failed to read fixture tree at ${path}${reason}`);
    this.name = 'DiscoveryError';
  }
}

export class FixtureHeaderError extends TesterError {
  constructor(
    public readonly fixture: string,
    message: string,
  ) {
    super(`${fixture}: ${message}`);
    this.name = 'FixtureHeaderError';
  }
}

export class DescriptorError extends TesterError {
  constructor(
    public readonly fixture: string,
    message: string,
  ) {
    super(`Cannot build test for ${fixture}: ${message}`);
    this.name = 'DescriptorError';
  }
}

export class DuplicateTestNameError extends TesterError {
  constructor(public readonly testName: string) {
    super(`Duplicate test name "${testName}". Two fixtures map to the same test.`);
    this.name = 'DuplicateTestNameError';
  }
}

/** Raised by a run closure when its mode handler judged the case as failed. */
export class TestFailedError extends TesterError {
  constructor(
    message: string,
    public readonly details?: string,
  ) {
    super(message);
    this.name = 'TestFailedError';
  }
}
