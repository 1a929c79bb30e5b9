import type { IPropsLoader } from '@domain/ports/props-loader.js';
import { TestPropsSchema, type TestProps } from '@domain/types/test-props.js';
import { FixtureHeaderError } from '@shared/lib/errors.js';

const SETTINGS_DELIMITER = '// ====';
const EXPECTATIONS_DELIMITER = '// ----';

/** Error kinds that make an expectation line a compilation error. */
const ERROR_LINE_RE = /^[A-Za-z]*Error\b/;

function stripComment(line: string): string {
  return line.replace(/^\/\/ ?/, '').trimEnd();
}

/**
 * Section-based header used by the upstream conformance corpus:
 *
 *   contract C { ... }
 *   // ====
 *   // EVMVersion: >=byzantium
 *   // ----
 *   // TypeError 1234: (12-20): Message
 *
 * Both sections are optional. The settings block configures the upstream
 * test runner and is skipped here. Revisions are not part of this dialect.
 */
export class SolcPropsLoader implements IPropsLoader {
  load(src: string, revision?: string): TestProps {
    if (revision !== undefined) {
      throw new FixtureHeaderError('header', `revisions are not supported here (got "${revision}")`);
    }

    const lines = src.split(/\r?\n/).map((line) => line.trimEnd());
    const settingsAt = lines.indexOf(SETTINGS_DELIMITER);
    const expectationsAt = lines.indexOf(EXPECTATIONS_DELIMITER);

    if (settingsAt !== -1 && expectationsAt !== -1 && settingsAt > expectationsAt) {
      throw new FixtureHeaderError('header', 'settings section must come before expectations');
    }

    const expectations =
      expectationsAt === -1
        ? []
        : lines
            .slice(expectationsAt + 1)
            .filter((line) => line.startsWith('//'))
            .map(stripComment)
            .filter((line) => line !== '');

    return TestPropsSchema.parse({ expectations });
  }
}

/** Expectation lines that report a compilation error. */
export function expectedErrors(props: TestProps): string[] {
  return props.expectations.filter((line) => ERROR_LINE_RE.test(line));
}
