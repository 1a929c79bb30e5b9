import { isAbsolute, posix, relative, sep } from 'node:path';
import type { Mode } from '@domain/types/mode.js';
import { DescriptorError } from '@shared/lib/errors.js';

export interface FixtureLocation {
  /** Root-relative path with '/' separators on every platform. */
  relativePath: string;
  /** Parent of relativePath; '' for a fixture directly under the root. */
  relativeDir: string;
}

/**
 * Locate a discovered fixture relative to the project root.
 * @throws DescriptorError if the fixture is not strictly under the root
 */
export function locateFixture(root: string, fixturePath: string): FixtureLocation {
  const rel = relative(root, fixturePath);
  if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw new DescriptorError(fixturePath, `not under the project root ${root}`);
  }

  const relativePath = rel.split(sep).join('/');
  const parent = posix.dirname(relativePath);
  return { relativePath, relativeDir: parent === '.' ? '' : parent };
}

/** `[<mode>] <relativePath>` plus `#<revision>` for revisioned cases. */
export function displayName(mode: Mode, relativePath: string, revision?: string): string {
  const suffix = revision === undefined ? '' : `#${revision}`;
  return `[${mode}] ${relativePath}${suffix}`;
}
