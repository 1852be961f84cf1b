/**
 * Project root lookup shared by the config loader and the scripts, so
 * relative paths mean the same thing however the process was started.
 *
 * @module core/paths
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Nearest directory holding package.json (repo root from src/ and from dist/src/)
 */
export function findProjectRoot(start: string): string {
  let dir = start;
  while (!fs.existsSync(path.join(dir, 'package.json'))) {
    const parent = path.dirname(dir);
    if (parent === dir) return path.resolve(start, '..', '..');
    dir = parent;
  }
  return dir;
}

export const projectRoot = findProjectRoot(__dirname);

/**
 * Absolute paths pass through; relative ones hang off `root`
 */
export function resolveFromRoot(value: string, root: string = projectRoot): string {
  return path.isAbsolute(value) ? value : path.join(root, value);
}
