import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import type { TesterConfig } from '@domain/types/config.js';

export class OutputDirError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'OutputDirError';
  }
}

/**
 * Per-fixture artifact directories under `<buildBase>`, mirroring each
 * fixture's directory relative to the project root. Never cleaned here.
 */
export const OutputDirs = {
  pathFor(config: TesterConfig, relativeDir: string): string {
    return join(config.buildBase, relativeDir);
  },

  /**
   * Create the directory and its parents; a no-op when it already exists,
   * so revisions of one fixture may race on it freely.
   * @throws OutputDirError if the directory cannot be created
   */
  ensure(config: TesterConfig, relativeDir: string): string {
    const dir = OutputDirs.pathFor(config, relativeDir);
    try {
      mkdirSync(dir, { recursive: true });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new OutputDirError(`Failed to create output directory ${dir}: ${reason}`, dir, err);
    }
    return dir;
  },
};
