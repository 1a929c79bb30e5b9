// Mode
export { ModeSchema, ALL_MODES, usesStructuredHeaders, type Mode } from './mode.js';

// Config
export { TesterEnvSchema, type TesterConfig, type TesterEnv } from './config.js';

// Test cases
export {
  PASSED,
  NOT_SKIPPED,
  failed,
  skipped,
  skipCheck,
  type TestResult,
  type CheckResult,
  type RunOutcome,
  type TestDescriptor,
} from './test-case.js';

// Fixture properties
export {
  TestPropsSchema,
  PlatformSchema,
  hostPlatform,
  type TestProps,
  type Platform,
} from './test-props.js';
