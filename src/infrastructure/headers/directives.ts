import { readFileSync } from 'node:fs';
import type { IPropsLoader, IRevisionLister } from '@domain/ports/props-loader.js';
import { TestPropsSchema, type TestProps } from '@domain/types/test-props.js';
import { FixtureHeaderError } from '@shared/lib/errors.js';

/** One `//@[scope] name: value` comment line. */
export interface Directive {
  line: number;
  scope?: string;
  name: string;
  value?: string;
}

const DIRECTIVE_RE = /^\s*\/\/@(?:\[([^\]]*)\])?\s*([a-z][a-z0-9-]*)\s*(?::\s*(.*?))?\s*$/;

const PLATFORM_DIRECTIVE_RE = /^(?:ignore|only)-(?:linux|macos|windows)$/;

function isKnownDirective(name: string): boolean {
  switch (name) {
    case 'revisions':
    case 'compile-flags':
    case 'exit-code':
    case 'ignore-test':
      return true;
    default:
      return PLATFORM_DIRECTIVE_RE.test(name);
  }
}

function words(value: string | undefined): string[] {
  return value ? value.split(/\s+/).filter((w) => w.length > 0) : [];
}

/**
 * Extract every directive comment from a fixture. Lines that start with `//@`
 * but do not parse are reported rather than silently dropped.
 */
export function parseDirectives(src: string, location = 'fixture'): Directive[] {
  const directives: Directive[] = [];
  const lines = src.split(/\r?\n/);

  lines.forEach((text, index) => {
    if (!text.trimStart().startsWith('//@')) return;
    const line = index + 1;
    const match = DIRECTIVE_RE.exec(text);
    if (!match) {
      throw new FixtureHeaderError(location, `line ${line}: malformed directive "${text.trim()}"`);
    }
    const [, scope, name, value] = match;
    if (name === undefined) return;
    if (scope !== undefined && scope.trim() === '') {
      throw new FixtureHeaderError(location, `line ${line}: empty revision scope`);
    }
    directives.push({
      line,
      name,
      ...(scope !== undefined ? { scope: scope.trim() } : {}),
      ...(value !== undefined && value !== '' ? { value } : {}),
    });
  });

  return directives;
}

function declaredRevisions(directives: Directive[], location: string): string[] {
  const revisions: string[] = [];
  for (const d of directives) {
    if (d.name !== 'revisions') continue;
    if (d.scope !== undefined) {
      throw new FixtureHeaderError(location, `line ${d.line}: "revisions" cannot be revision-scoped`);
    }
    for (const rev of words(d.value)) {
      if (revisions.includes(rev)) {
        throw new FixtureHeaderError(location, `line ${d.line}: duplicate revision "${rev}"`);
      }
      revisions.push(rev);
    }
  }
  return revisions;
}

function parseExitCode(d: Directive, location: string): number {
  if (d.value === undefined || !/^\d+$/.test(d.value)) {
    throw new FixtureHeaderError(location, `line ${d.line}: exit-code expects an integer, got "${d.value ?? ''}"`);
  }
  const code = Number(d.value);
  if (code > 255) {
    throw new FixtureHeaderError(location, `line ${d.line}: exit-code ${code} is out of range`);
  }
  return code;
}

/**
 * Plain `//@` directive dialect used by the UI fixtures.
 *
 *   //@ revisions: legacy default
 *   //@ compile-flags: --emit=abi
 *   //@[legacy] compile-flags: --legacy
 *   //@ exit-code: 1
 *   //@ ignore-test: tracked upstream
 *   //@ only-linux
 */
export class DirectivePropsLoader implements IPropsLoader, IRevisionLister {
  constructor(private readonly readFile: (path: string) => string = (path) => readFileSync(path, 'utf-8')) {}

  load(src: string, revision?: string): TestProps {
    const location = revision === undefined ? 'header' : `header (revision "${revision}")`;
    const directives = parseDirectives(src, location);
    const revisions = declaredRevisions(directives, location);

    if (revision !== undefined && !revisions.includes(revision)) {
      throw new FixtureHeaderError(location, `revision "${revision}" is not declared`);
    }

    const compileFlags: string[] = [];
    let expectedExitCode: number | undefined;

    for (const d of directives) {
      if (!isKnownDirective(d.name)) {
        throw new FixtureHeaderError(location, `line ${d.line}: unknown directive "${d.name}"`);
      }
      if (d.scope !== undefined) {
        if (!revisions.includes(d.scope)) {
          throw new FixtureHeaderError(location, `line ${d.line}: unknown revision "${d.scope}"`);
        }
        if (d.scope !== revision) continue;
      }

      switch (d.name) {
        case 'compile-flags':
          compileFlags.push(...words(d.value));
          break;
        case 'exit-code':
          expectedExitCode = parseExitCode(d, location);
          break;
        default:
          // revisions were read above; skip conditions belong to the check
          break;
      }
    }

    return TestPropsSchema.parse({
      revisions,
      compileFlags,
      ...(expectedExitCode !== undefined ? { expectedExitCode } : {}),
    });
  }

  listRevisions(fixturePath: string): string[] {
    let src: string;
    try {
      src = this.readFile(fixturePath);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new FixtureHeaderError(fixturePath, `cannot read fixture: ${reason}`);
    }
    return declaredRevisions(parseDirectives(src, fixturePath), fixturePath);
  }
}
