import { readdirSync, type Dirent } from 'node:fs';
import { extname, join } from 'node:path';
import { DiscoveryError } from '@shared/lib/errors.js';

function byName(a: Dirent, b: Dirent): number {
  return Buffer.compare(Buffer.from(a.name, 'utf-8'), Buffer.from(b.name, 'utf-8'));
}

function readSorted(dir: string): Dirent[] {
  try {
    return readdirSync(dir, { withFileTypes: true }).sort(byName);
  } catch (err) {
    throw new DiscoveryError(dir, err);
  }
}

/**
 * Recursively collect fixture files under `root` whose extension (without the
 * dot) is one of `extensions`.
 *
 * Entries of each directory are visited in byte order of their names, so a
 * given tree always produces the same list. Symlinks are not followed.
 *
 * @throws DiscoveryError if any directory, including the root, cannot be read
 */
export function collectFixtures(root: string, extensions: readonly string[]): string[] {
  const wanted = new Set(extensions.map((ext) => `.${ext}`));
  const files: string[] = [];

  const walk = (dir: string): void => {
    for (const entry of readSorted(dir)) {
      const path = join(dir, entry.name);
      if (entry.isDirectory()) {
        walk(path);
      } else if (entry.isFile() && wanted.has(extname(entry.name))) {
        files.push(path);
      }
    }
  };

  walk(root);
  return files;
}
