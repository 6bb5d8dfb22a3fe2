import { realpathSync } from 'node:fs';
import path from 'node:path';
import { errnoCode } from './errors.js';

/**
 * Maps an absolute path to its canonical form (symlinks followed).
 * Must not modify anything on disk.
 */
export type LinkResolver = (absolutePath: string) => string;

/**
 * Check whether `target` is `root` itself or lies beneath it.
 * Both paths must be absolute.
 */
export function isWithinRoot(root: string, target: string): boolean {
  const relative = path.relative(root, target);
  if (relative === '') {
    return true;
  }
  if (path.isAbsolute(relative)) {
    return false;
  }
  return relative !== '..' && !relative.startsWith(`..${path.sep}`);
}

/**
 * Resolver backed by realpath. Paths that do not exist yet are resolved
 * through their nearest existing ancestor, so a symlinked parent directory
 * still counts even when the leaf is missing.
 */
export function realpathResolver(): LinkResolver {
  return (absolutePath: string): string => {
    let existing = absolutePath;
    const missing: string[] = [];

    while (true) {
      try {
        const real = realpathSync.native(existing);
        return missing.length > 0 ? path.join(real, ...missing.reverse()) : real;
      } catch (error) {
        const code = errnoCode(error);
        if (code !== 'ENOENT' && code !== 'ENOTDIR') {
          throw error;
        }
        const parent = path.dirname(existing);
        if (parent === existing) {
          return absolutePath;
        }
        missing.push(path.basename(existing));
        existing = parent;
      }
    }
  };
}
