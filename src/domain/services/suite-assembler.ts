import type { TestDescriptor } from '@domain/types/test-case.js';
import { DuplicateTestNameError } from '@shared/lib/errors.js';

/** Byte-wise ordering of the names' UTF-8 encodings. */
export function compareNames(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, 'utf-8'), Buffer.from(b, 'utf-8'));
}

/**
 * Merge every mode's descriptors into one suite sorted by name.
 * @throws DuplicateTestNameError if two descriptors share a name
 */
export function assembleSuite(groups: ReadonlyArray<readonly TestDescriptor[]>): TestDescriptor[] {
  const suite = groups.flat().sort((a, b) => compareNames(a.name, b.name));

  for (let i = 1; i < suite.length; i++) {
    const prev = suite[i - 1];
    const current = suite[i];
    if (prev && current && prev.name === current.name) {
      throw new DuplicateTestNameError(current.name);
    }
  }

  return suite;
}
