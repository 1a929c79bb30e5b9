import type { TestProps } from '@domain/types/test-props.js';

export interface IPropsLoader {
  /**
   * Load fixture properties, applying directives scoped to `revision`.
   * @throws FixtureHeaderError on a malformed header
   */
  load(src: string, revision?: string): TestProps;
}

export interface IRevisionLister {
  /**
   * Declared revision tags in header order; empty for single-revision fixtures.
   * @throws FixtureHeaderError on duplicate tags
   */
  listRevisions(fixturePath: string): string[];
}
