/** Directory layout the tester reads from and writes to, relative to the project root. */
export const TESTER_DIRS = {
  ui: 'tests/ui',
  solidity: 'testdata/solidity/test',
  yul: 'testdata/solidity/test/libyul',
  build: 'target/tester',
} as const;

/** A directory holding any of these marks the project root. */
export const ROOT_MARKERS = ['tests/ui', 'testdata/solidity'] as const;

export const TESTER_ENV = {
  mode: 'TESTER_MODE',
  bless: 'TESTER_BLESS',
  compiler: 'TESTER_COMPILER',
  root: 'TESTER_ROOT',
  threads: 'TESTER_THREADS',
} as const;
