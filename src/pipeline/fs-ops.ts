/**
 * Filesystem primitives shared by the pipeline stages.
 */

import { copyFileSync, mkdirSync, renameSync, rmSync, statSync } from 'node:fs';
import { dirname } from 'node:path';

export function isDirectory(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

export function isFile(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isFile() ?? false;
}

export function ensureDir(dirPath: string): void {
  mkdirSync(dirPath, { recursive: true });
}

export function removePath(path: string): void {
  rmSync(path, { recursive: true, force: true });
}

/** Copy to a temporary sibling, then rename into place */
export function copyFileAtomic(src: string, dest: string, tempPath: string): void {
  ensureDir(dirname(dest));
  try {
    copyFileSync(src, tempPath);
    renameSync(tempPath, dest);
  } catch (error) {
    rmSync(tempPath, { force: true });
    throw error;
  }
}

/** True for the `ENOENT` error node:fs raises on a missing path */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
