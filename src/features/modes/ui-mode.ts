import { readFileSync, writeFileSync } from 'node:fs';
import { basename, dirname, extname, join } from 'node:path';
import type { ExecutionContext, IModeHandler } from '@domain/ports/mode-handler.js';
import type { ICompilerInvoker, ProcessResult } from '@domain/ports/compiler-invoker.js';
import type { TesterConfig } from '@domain/types/config.js';
import { NOT_SKIPPED, PASSED, failed, skipCheck, type CheckResult, type TestResult } from '@domain/types/test-case.js';
import { hostPlatform, PlatformSchema, type Platform } from '@domain/types/test-props.js';
import { parseDirectives } from '@infra/headers/directives.js';
import { FixtureHeaderError } from '@shared/lib/errors.js';
import { blessExpected, formatMismatch, normalizeOutput, readExpected } from './expected-output.js';

export interface UiModeDeps {
  compiler: ICompilerInvoker;
  /** Host platform for only-/ignore- directives; defaults to the running one. */
  platform?: Platform;
}

const OUTPUT_STREAMS = ['stdout', 'stderr'] as const;

/** Decide from the fixture's directives whether it should run on this host. */
export function checkUiFixture(src: string, fixturePath: string, platform: Platform | undefined): CheckResult {
  for (const d of parseDirectives(src, fixturePath)) {
    if (d.scope !== undefined) continue;
    if (d.name === 'ignore-test') {
      return skipCheck(d.value ?? 'ignored');
    }
    const [kind, ...rest] = d.name.split('-');
    const target = PlatformSchema.safeParse(rest.join('-'));
    if (!target.success) continue;
    if (kind === 'ignore' && target.data === platform) {
      return skipCheck(`ignored on ${target.data}`);
    }
    if (kind === 'only' && target.data !== platform) {
      return skipCheck(`only runs on ${target.data}`);
    }
  }
  return NOT_SKIPPED;
}

/** File stem shared by a fixture's expectation and artifact files. */
function outputStem(fixturePath: string, revision?: string): string {
  const stem = basename(fixturePath, extname(fixturePath));
  return revision === undefined ? stem : `${stem}.${revision}`;
}

/**
 * UI snapshot mode: compile the fixture, then compare exit code, stdout and
 * stderr against `<stem>[.<revision>].stdout|.stderr` beside the fixture.
 */
export function createUiMode(deps: UiModeDeps): IModeHandler {
  const platform = deps.platform ?? hostPlatform();

  return {
    check(_config: TesterConfig, fixturePath: string): CheckResult {
      let src: string;
      try {
        src = readFileSync(fixturePath, 'utf-8');
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new FixtureHeaderError(fixturePath, `cannot read fixture: ${reason}`);
      }
      return checkUiFixture(src, fixturePath, platform);
    },

    async run(cx: ExecutionContext): Promise<TestResult> {
      const { config, paths, props, revision } = cx;
      const args = [...props.compileFlags, paths.file];

      let res: ProcessResult;
      try {
        res = await deps.compiler.invoke(config.binaryPath, args, { cwd: config.root });
      } catch (err) {
        return failed(err instanceof Error ? err.message : String(err));
      }

      if (res.status === null) {
        return failed(`compiler terminated by signal ${res.signal ?? 'unknown'}\ncommand: ${res.commandLine}`);
      }

      const stem = outputStem(paths.file, revision);
      const problems: string[] = [];

      const expectedExit = props.expectedExitCode ?? 0;
      if (res.status !== expectedExit) {
        problems.push(`exit code: expected ${expectedExit}, found ${res.status}`);
      }

      for (const stream of OUTPUT_STREAMS) {
        const actual = normalizeOutput(res[stream], config.root);
        writeFileSync(join(cx.outputDir, `${stem}.${stream}`), actual, 'utf-8');

        const expectedPath = join(dirname(paths.file), `${stem}.${stream}`);
        if (config.bless) {
          blessExpected(expectedPath, actual);
          continue;
        }
        const expected = readExpected(expectedPath);
        if (expected !== actual) {
          problems.push(formatMismatch(stream, expectedPath, expected, actual));
        }
      }

      if (problems.length === 0) return PASSED;
      if (config.verbose) {
        problems.push(`raw stderr:\n${res.stderr}`);
      }
      return failed([`command: ${res.commandLine}`, ...problems].join('\n\n'));
    },
  };
}
