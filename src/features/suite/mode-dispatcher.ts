import { join } from 'node:path';
import type { IModeHandler } from '@domain/ports/mode-handler.js';
import type { ICompilerInvoker } from '@domain/ports/compiler-invoker.js';
import type { TesterConfig, TesterEnv } from '@domain/types/config.js';
import { ALL_MODES, ModeSchema, usesStructuredHeaders, type Mode } from '@domain/types/mode.js';
import { createSolcMode } from '@features/modes/solc-mode.js';
import { createUiMode } from '@features/modes/ui-mode.js';
import { TESTER_DIRS } from '@shared/constants/paths.js';
import { UnknownModeError } from '@shared/lib/errors.js';

export type ModeHandlers = Record<Mode, IModeHandler>;

export interface ModeSpec {
  mode: Mode;
  /** Discovery root relative to the project root. */
  discoveryRoot: string;
  /** Accepted fixture extensions, without the dot. */
  extensions: readonly string[];
  handler: IModeHandler;
  usesStructuredHeaders: boolean;
}

export function createModeHandlers(compiler: ICompilerInvoker): ModeHandlers {
  return {
    'ui': createUiMode({ compiler }),
    'solc-solidity': createSolcMode('solidity', { compiler }),
    'solc-yul': createSolcMode('yul', { compiler }),
  };
}

function discoveryLayout(mode: Mode): Pick<ModeSpec, 'discoveryRoot' | 'extensions'> {
  switch (mode) {
    case 'ui':
      return { discoveryRoot: TESTER_DIRS.ui, extensions: ['sol', 'yul'] };
    case 'solc-solidity':
      return { discoveryRoot: TESTER_DIRS.solidity, extensions: ['sol'] };
    case 'solc-yul':
      return { discoveryRoot: TESTER_DIRS.yul, extensions: ['sol', 'yul'] };
  }
}

export function getModeSpec(mode: Mode, handlers: ModeHandlers): ModeSpec {
  return {
    mode,
    ...discoveryLayout(mode),
    handler: handlers[mode],
    usesStructuredHeaders: usesStructuredHeaders(mode),
  };
}

export function discoveryRootFor(config: TesterConfig, spec: ModeSpec): string {
  return join(config.root, spec.discoveryRoot);
}

/**
 * Active modes: the one named by TESTER_MODE, or all of them.
 * @throws UnknownModeError when TESTER_MODE names no known mode
 */
export function resolveModes(env: Pick<TesterEnv, 'TESTER_MODE'>): Mode[] {
  if (env.TESTER_MODE === undefined) return [...ALL_MODES];
  const parsed = ModeSchema.safeParse(env.TESTER_MODE);
  if (!parsed.success) {
    throw new UnknownModeError(env.TESTER_MODE, ALL_MODES);
  }
  return [parsed.data];
}
