/**
 * Atomic file publication (temp file + rename in the same directory).
 * Readers see either the previous file or the complete new one.
 */

import fs from 'fs/promises';
import path from 'path';

let tempCounter = 0;

/**
 * Temp path beside `target` so the final rename never crosses filesystems.
 * Dot-prefixed so directory listings can skip it.
 */
export function tempPathFor(target: string): string {
  tempCounter = (tempCounter + 1) % 1_000_000;
  const dir = path.dirname(target);
  const base = path.basename(target);
  return path.join(dir, `.${base}.${process.pid}.${tempCounter}.tmp`);
}

export function isTempFile(name: string): boolean {
  return name.startsWith('.') && name.endsWith('.tmp');
}

export async function removeIfExists(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Let `writer` fill a temp file, then rename it over `target`.
 * The temp file is removed when the writer fails.
 */
export async function publishAtomically(
  target: string,
  writer: (tempPath: string) => Promise<void>,
): Promise<string> {
  const temp = tempPathFor(target);
  try {
    await writer(temp);
    await fs.rename(temp, target);
  } catch (error) {
    await removeIfExists(temp);
    throw error;
  }
  return target;
}

export async function writeFileAtomic(target: string, data: string | Buffer): Promise<void> {
  await publishAtomically(target, (temp) => fs.writeFile(temp, data));
}
