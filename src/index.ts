export { runTests, type RunTestsOptions } from '@cli/run-tests.js';
export { buildSuite, createSuiteDeps, type SuiteDeps } from '@features/suite/build-suite.js';
export { getModeSpec, resolveModes, createModeHandlers, type ModeSpec, type ModeHandlers } from '@features/suite/mode-dispatcher.js';
export { createConfig } from '@infra/config/config-loader.js';
export { runConsole, type RunnerOptions } from '@infra/execution/parallel-runner.js';
export type { IModeHandler, ExecutionContext, IPropsLoader, IRevisionLister, ICompilerInvoker, ProcessResult } from '@domain/ports/index.js';
export * from '@domain/types/index.js';
export * from '@shared/lib/index.js';
