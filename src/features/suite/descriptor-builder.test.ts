import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { ICompilerInvoker, ProcessResult } from '@domain/ports/compiler-invoker.js';
import type { TesterConfig } from '@domain/types/config.js';
import { NOT_SKIPPED, skipped } from '@domain/types/test-case.js';
import { DescriptorError, DiscoveryError, TestFailedError } from '@shared/lib/errors.js';
import { createSuiteDeps } from './build-suite.js';
import { buildDescriptor, makeTests } from './descriptor-builder.js';
import { getModeSpec, type ModeSpec } from './mode-dispatcher.js';

class ScriptedCompiler implements ICompilerInvoker {
  readonly invoked: string[][] = [];

  constructor(private readonly statusFor: (args: string[]) => number = () => 0) {}

  async invoke(_binaryPath: string, args: string[]): Promise<ProcessResult> {
    this.invoked.push(args);
    return { status: this.statusFor(args), signal: null, stdout: '', stderr: '', commandLine: `solar ${args.join(' ')}` };
  }
}

describe('descriptor-builder', () => {
  let root: string;
  let config: TesterConfig;

  function fixture(rel: string, src = 'contract C {}\n'): string {
    const path = join(root, rel);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, src);
    return path;
  }

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'tester-desc-'));
    config = {
      binaryPath: '/bin/solar',
      root,
      buildBase: join(root, 'target', 'tester'),
      bless: false,
      verbose: false,
    };
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  describe('makeTests', () => {
    it('names each fixture and fans revisions out in declared order', () => {
      fixture('tests/ui/a/b.sol');
      fixture('tests/ui/a/c.sol', '//@ revisions: legacy default\ncontract C {}\n');
      const deps = createSuiteDeps(new ScriptedCompiler());

      const tests = makeTests(config, getModeSpec('ui', deps.handlers), deps);

      expect(tests.map((t) => t.name)).toEqual([
        '[ui] tests/ui/a/b.sol',
        '[ui] tests/ui/a/c.sol#legacy',
        '[ui] tests/ui/a/c.sol#default',
      ]);
      expect(tests.map((t) => t.revision)).toEqual([undefined, 'legacy', 'default']);
    });

    it('creates one shared artifact directory for a revisioned fixture', () => {
      fixture('tests/ui/a/c.sol', '//@ revisions: legacy default\n');
      const deps = createSuiteDeps(new ScriptedCompiler());

      makeTests(config, getModeSpec('ui', deps.handlers), deps);

      expect(existsSync(join(root, 'target', 'tester', 'tests', 'ui', 'a'))).toBe(true);
    });

    it('does not create artifact directories for conformance modes', () => {
      fixture('testdata/solidity/test/libsolidity/syntaxTests/x.sol');
      const deps = createSuiteDeps(new ScriptedCompiler());

      const tests = makeTests(config, getModeSpec('solc-solidity', deps.handlers), deps);

      expect(tests.map((t) => t.name)).toEqual(['[solc-solidity] testdata/solidity/test/libsolidity/syntaxTests/x.sol']);
      expect(existsSync(join(root, 'target', 'tester', 'testdata'))).toBe(false);
    });

    it('does not expand revisions outside ui mode', () => {
      fixture('testdata/solidity/test/libyul/r.yul', '//@ revisions: a b\n{}\n');
      const deps = createSuiteDeps(new ScriptedCompiler());

      const tests = makeTests(config, getModeSpec('solc-yul', deps.handlers), deps);

      expect(tests.map((t) => t.name)).toEqual(['[solc-yul] testdata/solidity/test/libyul/r.yul']);
    });

    it('marks fixtures rejected by the check as ignored', () => {
      fixture('tests/ui/skip.sol', '//@ ignore-test: not yet\n');
      const deps = createSuiteDeps(new ScriptedCompiler());

      const [test] = makeTests(config, getModeSpec('ui', deps.handlers), deps);

      expect(test?.ignore).toBe(true);
      expect(test?.ignoreMessage).toBe('not yet');
    });

    it('never invokes the compiler while building', () => {
      fixture('tests/ui/a.sol');
      const compiler = new ScriptedCompiler();
      const deps = createSuiteDeps(compiler);

      makeTests(config, getModeSpec('ui', deps.handlers), deps);

      expect(compiler.invoked).toEqual([]);
    });

    it('rejects fixtures that differ only by extension', () => {
      fixture('tests/ui/a.sol');
      const yul = fixture('tests/ui/a.yul', '{}\n');
      const deps = createSuiteDeps(new ScriptedCompiler());

      expect(() => makeTests(config, getModeSpec('ui', deps.handlers), deps)).toThrow(
        `Cannot build test for ${yul}: expected output files collide with ${join(root, 'tests', 'ui', 'a.sol')}`,
      );
    });

    it('accepts the same stem in different directories', () => {
      fixture('tests/ui/x/a.sol');
      fixture('tests/ui/y/a.yul', '{}\n');
      const deps = createSuiteDeps(new ScriptedCompiler());

      expect(makeTests(config, getModeSpec('ui', deps.handlers), deps).map((t) => t.name)).toEqual([
        '[ui] tests/ui/x/a.sol',
        '[ui] tests/ui/y/a.yul',
      ]);
    });

    it('allows same-stem fixtures in conformance modes', () => {
      fixture('testdata/solidity/test/libyul/a.sol');
      fixture('testdata/solidity/test/libyul/a.yul', '{}\n');
      const deps = createSuiteDeps(new ScriptedCompiler());

      expect(makeTests(config, getModeSpec('solc-yul', deps.handlers), deps)).toHaveLength(2);
    });

    it('fails when the discovery root is missing', () => {
      const deps = createSuiteDeps(new ScriptedCompiler());
      expect(() => makeTests(config, getModeSpec('ui', deps.handlers), deps)).toThrow(DiscoveryError);
    });
  });

  describe('buildDescriptor', () => {
    it('names a root-relative fixture and creates its artifact directory', () => {
      const path = fixture('a/b.sol');
      const deps = createSuiteDeps(new ScriptedCompiler());

      const test = buildDescriptor(config, getModeSpec('ui', deps.handlers), path, undefined, deps);

      expect(test.name).toBe('[ui] a/b.sol');
      expect(test.ignore).toBe(false);
      expect(existsSync(join(root, 'target', 'tester', 'a'))).toBe(true);
    });

    it('rejects a fixture outside the root', () => {
      const deps = createSuiteDeps(new ScriptedCompiler());
      const outside = join(tmpdir(), 'elsewhere.sol');
      expect(() => buildDescriptor(config, getModeSpec('ui', deps.handlers), outside, undefined, deps)).toThrow(DescriptorError);
    });

    it('reports an uncreatable artifact directory as a DescriptorError', () => {
      const path = fixture('tests/ui/a.sol');
      writeFileSync(join(root, 'target'), '');
      const deps = createSuiteDeps(new ScriptedCompiler());
      expect(() => buildDescriptor(config, getModeSpec('ui', deps.handlers), path, undefined, deps)).toThrow(
        DescriptorError,
      );
    });

    it('returns a frozen descriptor', () => {
      const path = fixture('tests/ui/a.sol');
      const deps = createSuiteDeps(new ScriptedCompiler());
      expect(Object.isFrozen(buildDescriptor(config, getModeSpec('ui', deps.handlers), path, undefined, deps))).toBe(true);
    });
  });

  describe('run', () => {
    it('resolves ok when the mode passes', async () => {
      const path = fixture('tests/ui/a.sol');
      const deps = createSuiteDeps(new ScriptedCompiler());
      const test = buildDescriptor(config, getModeSpec('ui', deps.handlers), path, undefined, deps);

      await expect(test.run()).resolves.toEqual({ status: 'ok' });
    });

    it('loads the revision-scoped header for each revision', async () => {
      const path = fixture('tests/ui/c.sol', '//@ revisions: legacy default\n//@[legacy] compile-flags: --legacy\n');
      const compiler = new ScriptedCompiler();
      const deps = createSuiteDeps(compiler);
      const spec = getModeSpec('ui', deps.handlers);

      await buildDescriptor(config, spec, path, 'legacy', deps).run();
      await buildDescriptor(config, spec, path, 'default', deps).run();

      expect(compiler.invoked).toEqual([['--legacy', path], [path]]);
    });

    it('rejects with TestFailedError carrying the mode details', async () => {
      const path = fixture('tests/ui/a.sol');
      const deps = createSuiteDeps(new ScriptedCompiler(() => 1));
      const test = buildDescriptor(config, getModeSpec('ui', deps.handlers), path, undefined, deps);

      const error = await test.run().then(
        () => undefined,
        (err: unknown) => err,
      );

      expect(error).toBeInstanceOf(TestFailedError);
      if (!(error instanceof TestFailedError)) return;
      expect(error.message).toBe('test failed');
      expect(error.details).toBe(`command: solar ${path}\n\nexit code: expected 0, found 1`);
    });

    it('reports a runtime skip from the mode as ignored', async () => {
      const path = fixture('tests/ui/a.sol');
      const deps = createSuiteDeps(new ScriptedCompiler());
      const spec: ModeSpec = {
        ...getModeSpec('ui', deps.handlers),
        handler: {
          check: () => NOT_SKIPPED,
          run: async () => skipped('needs an EVM backend'),
        },
      };

      await expect(buildDescriptor(config, spec, path, undefined, deps).run()).resolves.toEqual({
        status: 'ignored',
        reason: 'needs an EVM backend',
      });
    });

    it('rejects when the header is invalid', async () => {
      const path = fixture('tests/ui/a.sol', '//@ bogus: 1\n');
      const deps = createSuiteDeps(new ScriptedCompiler());
      const test = buildDescriptor(config, getModeSpec('ui', deps.handlers), path, undefined, deps);

      await expect(test.run()).rejects.toThrow('unknown directive "bogus"');
    });
  });
});
