import { mkdirSync, statSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { TesterEnvSchema, type TesterConfig, type TesterEnv } from '@domain/types/config.js';
import { ROOT_MARKERS, TESTER_DIRS, TESTER_ENV } from '@shared/constants/paths.js';
import { ConfigError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';

export interface ConfigInput {
  /** Compiler under test; falls back to TESTER_COMPILER. */
  binaryPath?: string;
  /** Explicit project root; falls back to TESTER_ROOT, then to a marker search. */
  root?: string;
  /** `--bless`; ORed with TESTER_BLESS. */
  bless?: boolean;
  verbose?: boolean;
  env?: NodeJS.ProcessEnv;
  /** Anchor for the marker search and for resolving relative paths. */
  cwd?: string;
}

/**
 * Validate the tester's environment variables.
 * @throws ConfigError when a variable has an unusable value
 */
export function parseTesterEnv(env: NodeJS.ProcessEnv = process.env): TesterEnv {
  const result = TesterEnvSchema.safeParse({
    TESTER_MODE: env[TESTER_ENV.mode],
    TESTER_BLESS: env[TESTER_ENV.bless],
    TESTER_COMPILER: env[TESTER_ENV.compiler],
    TESTER_ROOT: env[TESTER_ENV.root],
    TESTER_THREADS: env[TESTER_ENV.threads],
  });
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment: ${issues}`);
  }
  return result.data;
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Walk up from `anchor` to the nearest directory holding a fixture tree.
 * Returns undefined when no ancestor qualifies.
 */
export function findProjectRoot(anchor: string): string | undefined {
  let dir = resolve(anchor);
  for (;;) {
    if (ROOT_MARKERS.some((marker) => isDirectory(join(dir, marker)))) {
      return dir;
    }
    const parent = dirname(dir);
    if (parent === dir) return undefined;
    dir = parent;
  }
}

/**
 * Build the process-wide config and create the artifact base directory.
 * @throws ConfigError if no compiler or root can be determined, or the
 *   base directory cannot be created
 */
export function createConfig(input: ConfigInput = {}): TesterConfig {
  const env = parseTesterEnv(input.env);
  const cwd = input.cwd ?? process.cwd();

  const binary = input.binaryPath ?? env.TESTER_COMPILER;
  if (!binary) {
    throw new ConfigError(
      `No compiler binary given. Pass --compiler <path> or set ${TESTER_ENV.compiler}.`,
    );
  }

  const explicitRoot = input.root ?? env.TESTER_ROOT;
  const root = explicitRoot ? resolve(cwd, explicitRoot) : findProjectRoot(cwd);
  if (!root) {
    throw new ConfigError(
      `No project root found above ${cwd} (looked for ${ROOT_MARKERS.join(' or ')}). ` +
        `Pass --root <path> or set ${TESTER_ENV.root}.`,
    );
  }

  const buildBase = join(root, TESTER_DIRS.build);
  try {
    mkdirSync(buildBase, { recursive: true });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to create output directory ${buildBase}: ${reason}`);
  }

  const config: TesterConfig = Object.freeze({
    binaryPath: resolve(cwd, binary),
    root,
    buildBase,
    bless: (input.bless ?? false) || env.TESTER_BLESS,
    verbose: input.verbose ?? false,
  });
  logger.debug('Tester config', { ...config });
  return config;
}
