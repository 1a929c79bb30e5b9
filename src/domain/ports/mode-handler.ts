import type { TesterConfig } from '@domain/types/config.js';
import type { CheckResult, TestResult } from '@domain/types/test-case.js';
import type { TestProps } from '@domain/types/test-props.js';

export interface TestPaths {
  /** Absolute path of the fixture file. */
  file: string;
  /** Fixture's parent directory relative to the project root ('' at the root). */
  relativeDir: string;
}

/** Everything a run function needs; assembled fresh for every test run. */
export interface ExecutionContext {
  config: TesterConfig;
  paths: TestPaths;
  src: string;
  props: TestProps;
  revision?: string;
  /** Artifact directory for this fixture; exists before run() is called. */
  outputDir: string;
}

/** The check/run pair a mode contributes. */
export interface IModeHandler {
  /** Cheap metadata-only check, called at build time. Must not run the compiler. */
  check(config: TesterConfig, fixturePath: string): CheckResult;
  run(cx: ExecutionContext): Promise<TestResult>;
}
