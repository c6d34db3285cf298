/**
 * Small synchronous file helpers shared by the stages
 */

import { copyFileSync, existsSync, mkdirSync, readdirSync, rmSync, statSync } from 'node:fs';
import path from 'node:path';
import fg from 'fast-glob';

export function isDirectory(dir: string): boolean {
  return existsSync(dir) && statSync(dir).isDirectory();
}

/**
 * Names of the regular files directly inside dir, sorted. Symlinks are
 * followed.
 */
export function listFiles(dir: string): string[] {
  return readdirSync(dir)
    .filter((name) => {
      const stats = statSync(path.join(dir, name), { throwIfNoEntry: false });
      return stats?.isFile() ?? false;
    })
    .sort();
}

/**
 * Relative paths (forward slashes) of every file below root, sorted
 */
export function listTree(root: string): string[] {
  if (!isDirectory(root)) return [];
  return fg.sync('**/*', { cwd: root, onlyFiles: true, dot: true, followSymbolicLinks: true }).sort();
}

export function copyFile(source: string, target: string): void {
  mkdirSync(path.dirname(target), { recursive: true });
  copyFileSync(source, target);
}

/** Remove and recreate a stage output directory */
export function resetDirectory(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
  mkdirSync(dir, { recursive: true });
}
