import { existsSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { TESTER_ENV } from '@shared/constants/paths.js';

export const ROOT_PLACEHOLDER = '$ROOT';

/** Line endings to LF, trailing whitespace off every line, one final newline. */
export function normalizeText(text: string): string {
  const lines = text.replace(/\r\n?/g, '\n').split('\n').map((line) => line.trimEnd());
  while (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.length === 0 ? '' : lines.join('\n') + '\n';
}

/** Compiler output with machine-specific paths replaced by a placeholder. */
export function normalizeOutput(text: string, root: string): string {
  const posixRoot = root.split('\\').join('/');
  return normalizeText(text.split(root).join(ROOT_PLACEHOLDER).split(posixRoot).join(ROOT_PLACEHOLDER));
}

/** Expected output stored beside a fixture; a missing file means no output. */
export function readExpected(path: string): string {
  return existsSync(path) ? normalizeText(readFileSync(path, 'utf-8')) : '';
}

/** Store `actual` as the new expectation, removing the file when it is empty. */
export function blessExpected(path: string, actual: string): void {
  if (actual === '') {
    rmSync(path, { force: true });
  } else {
    writeFileSync(path, actual, 'utf-8');
  }
}

export function formatMismatch(stream: string, path: string, expected: string, actual: string): string {
  const show = (text: string) => (text === '' ? '(empty)\n' : text);
  return [
    `${stream} differs from ${path}`,
    `--- expected ${stream}`,
    show(expected) + `--- actual ${stream}`,
    show(actual) + `(set ${TESTER_ENV.bless}=1 to update the expected output)`,
  ].join('\n');
}
