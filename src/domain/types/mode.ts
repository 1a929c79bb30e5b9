import { z } from 'zod/v4';

/**
 * Test modes, in the order they run when no mode is selected.
 * - 'ui': this project's own fixtures, judged against expected compiler output
 * - 'solc-solidity': the upstream compiler's Solidity syntax test corpus
 * - 'solc-yul': the upstream compiler's Yul test corpus
 */
export const ModeSchema = z.enum(['ui', 'solc-solidity', 'solc-yul']);

export type Mode = z.infer<typeof ModeSchema>;

export const ALL_MODES: readonly Mode[] = ModeSchema.options;

/** Conformance modes read the richer upstream header format. */
export function usesStructuredHeaders(mode: Mode): boolean {
  return mode === 'solc-solidity' || mode === 'solc-yul';
}
