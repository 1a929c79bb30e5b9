import { readFileSync } from 'node:fs';
import type { ExecutionContext, IModeHandler } from '@domain/ports/mode-handler.js';
import type { ICompilerInvoker, ProcessResult } from '@domain/ports/compiler-invoker.js';
import type { TesterConfig } from '@domain/types/config.js';
import { NOT_SKIPPED, PASSED, failed, skipCheck, type CheckResult, type TestResult } from '@domain/types/test-case.js';
import { locateFixture } from '@domain/services/test-naming.js';
import { expectedErrors } from '@infra/headers/solc-sections.js';
import { FixtureHeaderError } from '@shared/lib/errors.js';

export type SolcLanguage = 'solidity' | 'yul';

interface SkipRule {
  /** Matched against '/' + the fixture's root-relative path. */
  segment: string;
  reason: string;
}

const SKIPPED_DIRS: Record<SolcLanguage, readonly SkipRule[]> = {
  solidity: [
    { segment: '/cmdlineTests/', reason: 'command-line tests are not supported' },
    { segment: '/lsp/', reason: 'language server tests are not supported' },
    { segment: '/experimental/', reason: 'experimental Solidity is not supported' },
    { segment: '/libsolidity/ASTJSON/', reason: 'AST JSON output is not supported' },
    { segment: '/libsolidity/gasTests/', reason: 'gas estimation is not supported' },
    { segment: '/libsolidity/natspecJSON/', reason: 'NatSpec JSON output is not supported' },
  ],
  yul: [
    { segment: '/libyul/evmCodeTransform/', reason: 'code generation tests are not supported' },
    { segment: '/libyul/objectCompiler/', reason: 'code generation tests are not supported' },
    { segment: '/libyul/yulInterpreterTests/', reason: 'interpreter tests are not supported' },
    { segment: '/libyul/yulOptimizerTests/', reason: 'optimizer tests are not supported' },
  ],
};

const EXPERIMENTAL_PRAGMA_RE = /pragma\s+experimental\s+solidity\b/;

export interface SolcModeDeps {
  compiler: ICompilerInvoker;
}

function compilerArgs(language: SolcLanguage, file: string): string[] {
  return language === 'yul' ? ['--language', 'yul', file] : [file];
}

/**
 * Conformance mode over the upstream compiler's test corpus. A fixture whose
 * expectations list an error must fail to compile; any other must succeed.
 */
export function createSolcMode(language: SolcLanguage, deps: SolcModeDeps): IModeHandler {
  return {
    check(config: TesterConfig, fixturePath: string): CheckResult {
      const { relativePath } = locateFixture(config.root, fixturePath);
      const rule = SKIPPED_DIRS[language].find((r) => `/${relativePath}`.includes(r.segment));
      if (rule) return skipCheck(rule.reason);

      let src: string;
      try {
        src = readFileSync(fixturePath, 'utf-8');
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new FixtureHeaderError(fixturePath, `cannot read fixture: ${reason}`);
      }
      if (language === 'solidity' && EXPERIMENTAL_PRAGMA_RE.test(src)) {
        return skipCheck('experimental Solidity is not supported');
      }
      return NOT_SKIPPED;
    },

    async run(cx: ExecutionContext): Promise<TestResult> {
      const { config, paths, props } = cx;

      let res: ProcessResult;
      try {
        res = await deps.compiler.invoke(config.binaryPath, compilerArgs(language, paths.file), { cwd: config.root });
      } catch (err) {
        return failed(err instanceof Error ? err.message : String(err));
      }

      if (res.status === null) {
        return failed(`compiler terminated by signal ${res.signal ?? 'unknown'}\ncommand: ${res.commandLine}`);
      }

      const errors = expectedErrors(props);
      const succeeded = res.status === 0;

      if (errors.length > 0 && succeeded) {
        return failed(
          [`command: ${res.commandLine}`, 'expected compilation to fail with:', ...errors.map((e) => `  ${e}`)].join('\n'),
        );
      }
      if (errors.length === 0 && !succeeded) {
        const output = config.verbose ? `${res.stdout}${res.stderr}` : res.stderr;
        return failed(
          [`command: ${res.commandLine}`, `expected compilation to succeed, exit code ${res.status}:`, output.trimEnd()].join('\n'),
        );
      }
      return PASSED;
    },
  };
}
