import { readFile } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import type { IPropsLoader, IRevisionLister } from '@domain/ports/props-loader.js';
import type { TesterConfig } from '@domain/types/config.js';
import type { RunOutcome, TestDescriptor } from '@domain/types/test-case.js';
import { displayName, locateFixture } from '@domain/services/test-naming.js';
import { expandRevisions } from '@domain/services/revision-expander.js';
import { collectFixtures } from '@infra/discovery/fixture-walker.js';
import { OutputDirError, OutputDirs } from '@infra/persistence/output-dirs.js';
import { DescriptorError, TestFailedError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';
import { discoveryRootFor, type ModeSpec } from './mode-dispatcher.js';

export interface DescriptorDeps {
  /** Loader for the plain directive dialect. */
  plainLoader: IPropsLoader;
  /** Loader for the structured conformance dialect. */
  structuredLoader: IPropsLoader;
  revisionLister: IRevisionLister;
}

/**
 * Build the descriptor for one (mode, fixture, revision). Runs the mode's
 * check eagerly; everything that touches the compiler is deferred to `run`.
 *
 * @throws DescriptorError if the fixture is outside the root or its
 *   artifact directory cannot be created
 */
export function buildDescriptor(
  config: TesterConfig,
  spec: ModeSpec,
  fixturePath: string,
  revision: string | undefined,
  deps: DescriptorDeps,
): TestDescriptor {
  const { relativePath, relativeDir } = locateFixture(config.root, fixturePath);

  if (!spec.usesStructuredHeaders) {
    try {
      OutputDirs.ensure(config, relativeDir);
    } catch (err) {
      if (err instanceof OutputDirError) throw new DescriptorError(fixturePath, err.message);
      throw err;
    }
  }

  const name = displayName(spec.mode, relativePath, revision);
  const check = spec.handler.check(config, fixturePath);
  const loader = spec.usesStructuredHeaders ? deps.structuredLoader : deps.plainLoader;
  const handler = spec.handler;

  const run = async (): Promise<RunOutcome> => {
    const src = await readFile(fixturePath, 'utf-8');
    const props = loader.load(src, revision);
    const outputDir = OutputDirs.ensure(config, relativeDir);

    const result = await handler.run({
      config,
      paths: { file: fixturePath, relativeDir },
      src,
      props,
      revision,
      outputDir,
    });

    switch (result.status) {
      case 'passed':
        return { status: 'ok' };
      case 'skipped':
        return { status: 'ignored', reason: result.reason };
      case 'failed':
        throw new TestFailedError('test failed', result.details);
    }
  };

  return Object.freeze({
    name,
    mode: spec.mode,
    fixturePath,
    ...(revision !== undefined ? { revision } : {}),
    ignore: check.skip,
    ...(check.skip ? { ignoreMessage: check.reason } : {}),
    run,
  });
}

/**
 * Expected-output and artifact files are named after the fixture without its
 * extension, so `a.sol` and `a.yul` in one directory cannot both be fixtures.
 * @throws DescriptorError when another fixture already owns the stem
 */
function claimOutputStem(stems: Map<string, string>, fixturePath: string): void {
  const stem = join(dirname(fixturePath), basename(fixturePath, extname(fixturePath)));
  const owner = stems.get(stem);
  if (owner !== undefined) {
    throw new DescriptorError(fixturePath, `expected output files collide with ${owner}`);
  }
  stems.set(stem, fixturePath);
}

/**
 * Discover, expand and describe every test case a mode contributes.
 * @throws DescriptorError if two fixtures would share expected-output files
 */
export function makeTests(config: TesterConfig, spec: ModeSpec, deps: DescriptorDeps): TestDescriptor[] {
  const fixtures = collectFixtures(discoveryRootFor(config, spec), spec.extensions);
  const tests: TestDescriptor[] = [];
  const stems = new Map<string, string>();

  for (const fixturePath of fixtures) {
    if (!spec.usesStructuredHeaders) claimOutputStem(stems, fixturePath);
    for (const revision of expandRevisions(spec.mode, fixturePath, deps.revisionLister)) {
      tests.push(buildDescriptor(config, spec, fixturePath, revision, deps));
    }
  }

  logger.debug(`Collected ${spec.mode} tests`, { fixtures: fixtures.length, tests: tests.length });
  return tests;
}
