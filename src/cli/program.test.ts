import { CommanderError } from 'commander';
import { ArgumentError } from '@shared/lib/errors.js';
import { createProgram, parseCliArgs } from './program.js';

const silent = { writeOut: () => {}, writeErr: () => {} };

describe('createProgram', () => {
  it('creates a commander program with the correct name', () => {
    expect(createProgram().name()).toBe('sol-tester');
  });

  it('registers the harness options', () => {
    const flags = createProgram().options.map((o) => o.long);
    expect(flags).toEqual(
      expect.arrayContaining(['--exact', '--skip', '--ignored', '--include-ignored', '--list', '--test-threads', '--format', '--bless', '--compiler', '--root']),
    );
  });
});

describe('parseCliArgs', () => {
  it('applies defaults', () => {
    expect(parseCliArgs([], silent)).toEqual({
      filters: [],
      exact: false,
      skip: [],
      ignored: 'default',
      list: false,
      format: 'terse',
      bless: false,
      verbose: false,
      jsonLogs: false,
    });
  });

  it('collects positional filters and repeated skips', () => {
    const args = parseCliArgs(['parser', 'lexer', '--skip', 'slow', '--skip', 'huge', '--exact'], silent);
    expect(args.filters).toEqual(['parser', 'lexer']);
    expect(args.skip).toEqual(['slow', 'huge']);
    expect(args.exact).toBe(true);
  });

  it('maps the ignored flags to a policy', () => {
    expect(parseCliArgs(['--ignored'], silent).ignored).toBe('only');
    expect(parseCliArgs(['--include-ignored'], silent).ignored).toBe('include');
  });

  it('rejects --ignored together with --include-ignored', () => {
    expect(() => parseCliArgs(['--ignored', '--include-ignored'], silent)).toThrow(CommanderError);
  });

  it('parses the thread count', () => {
    expect(parseCliArgs(['--test-threads', '4'], silent).testThreads).toBe(4);
  });

  it('rejects a non-positive thread count', () => {
    expect(() => parseCliArgs(['--test-threads', '0'], silent)).toThrow(ArgumentError);
    expect(() => parseCliArgs(['--test-threads', 'x'], silent)).toThrow(/--testThreads/);
  });

  it('keeps an explicit format', () => {
    expect(parseCliArgs(['--format', 'pretty'], silent).format).toBe('pretty');
    expect(parseCliArgs(['--format', 'json'], silent).format).toBe('json');
  });

  it('forces terse output with --quiet', () => {
    expect(parseCliArgs(['--format', 'pretty', '-q'], silent).format).toBe('terse');
  });

  it('rejects an unknown format', () => {
    expect(() => parseCliArgs(['--format', 'xml'], silent)).toThrow(CommanderError);
  });

  it('passes compiler, root and bless through', () => {
    const args = parseCliArgs(['--compiler', '/bin/solar', '--root', '/repo', '--bless', '--verbose'], silent);
    expect(args.compiler).toBe('/bin/solar');
    expect(args.root).toBe('/repo');
    expect(args.bless).toBe(true);
    expect(args.verbose).toBe(true);
  });

  it('throws CommanderError with exit code 0 for --help', () => {
    let caught: unknown;
    try {
      parseCliArgs(['--help'], silent);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(CommanderError);
    expect(caught instanceof CommanderError && caught.exitCode).toBe(0);
  });
});
