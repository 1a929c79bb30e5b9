import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { TesterConfig } from '@domain/types/config.js';
import { OutputDirError, OutputDirs } from './output-dirs.js';

describe('OutputDirs', () => {
  let root: string;
  let config: TesterConfig;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'tester-out-'));
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

  it('mirrors the fixture directory under the build base', () => {
    expect(OutputDirs.pathFor(config, 'tests/ui/parser')).toBe(
      join(root, 'target', 'tester', 'tests', 'ui', 'parser'),
    );
  });

  it('maps the root directory to the build base itself', () => {
    expect(OutputDirs.pathFor(config, '')).toBe(join(root, 'target', 'tester'));
  });

  it('creates missing parents', () => {
    const dir = OutputDirs.ensure(config, 'tests/ui/a/b');
    expect(dir).toBe(join(root, 'target', 'tester', 'tests', 'ui', 'a', 'b'));
    expect(existsSync(dir)).toBe(true);
  });

  it('succeeds when the directory already exists', () => {
    OutputDirs.ensure(config, 'tests/ui');
    expect(() => OutputDirs.ensure(config, 'tests/ui')).not.toThrow();
  });

  it('throws OutputDirError when a file blocks the path', () => {
    writeFileSync(join(root, 'target'), '');
    expect(() => OutputDirs.ensure(config, 'tests')).toThrow(OutputDirError);
  });
});
