import type { ICompilerInvoker } from '@domain/ports/compiler-invoker.js';
import type { TesterConfig } from '@domain/types/config.js';
import type { Mode } from '@domain/types/mode.js';
import type { TestDescriptor } from '@domain/types/test-case.js';
import { assembleSuite } from '@domain/services/suite-assembler.js';
import { DirectivePropsLoader } from '@infra/headers/directives.js';
import { SolcPropsLoader } from '@infra/headers/solc-sections.js';
import { CompilerProcess } from '@infra/execution/compiler-process.js';
import { logger } from '@shared/lib/logger.js';
import { makeTests, type DescriptorDeps } from './descriptor-builder.js';
import { createModeHandlers, getModeSpec, type ModeHandlers } from './mode-dispatcher.js';

export interface SuiteDeps extends DescriptorDeps {
  handlers: ModeHandlers;
}

export function createSuiteDeps(compiler: ICompilerInvoker = new CompilerProcess()): SuiteDeps {
  const directives = new DirectivePropsLoader();
  return {
    handlers: createModeHandlers(compiler),
    plainLoader: directives,
    structuredLoader: new SolcPropsLoader(),
    revisionLister: directives,
  };
}

/**
 * Build phase: collect every active mode's test cases into one suite sorted
 * by name. Completes before any test runs; any error here is fatal.
 */
export function buildSuite(config: TesterConfig, modes: readonly Mode[], deps: SuiteDeps): TestDescriptor[] {
  const groups = modes.map((mode) => makeTests(config, getModeSpec(mode, deps.handlers), deps));
  const suite = assembleSuite(groups);
  logger.debug('Suite assembled', { modes: [...modes], tests: suite.length });
  return suite;
}
