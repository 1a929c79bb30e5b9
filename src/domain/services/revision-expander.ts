import type { Mode } from '@domain/types/mode.js';
import type { IRevisionLister } from '@domain/ports/props-loader.js';
import { FixtureHeaderError } from '@shared/lib/errors.js';

/**
 * Fan one fixture out into the revisions it runs under.
 *
 * Only 'ui' fixtures can declare revisions; every other mode yields a single
 * unrevisioned entry without reading the fixture.
 */
export function expandRevisions(
  mode: Mode,
  fixturePath: string,
  lister: IRevisionLister,
): Array<string | undefined> {
  if (mode !== 'ui') return [undefined];

  const revisions = lister.listRevisions(fixturePath);
  if (revisions.length === 0) return [undefined];

  const seen = new Set<string>();
  for (const revision of revisions) {
    if (seen.has(revision)) {
      throw new FixtureHeaderError(fixturePath, `duplicate revision "${revision}"`);
    }
    seen.add(revision);
  }
  return [...revisions];
}
