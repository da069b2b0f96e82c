/**
 * Utility functions
 */

import { cp, lstat, realpath, rename, rm, stat } from 'fs/promises';
import type { Stats } from 'fs';
import { resolve } from 'path';

/**
 * Narrow an unknown error to a Node.js system error with a code
 */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/**
 * lstat a path, returning null when nothing is there
 */
export async function lstatOrNull(path: string): Promise<Stats | null> {
  try {
    return await lstat(path);
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      return null;
    }
    throw err;
  }
}

/**
 * Check if a path exists without following a final symlink
 */
export async function pathExists(path: string): Promise<boolean> {
  return (await lstatOrNull(path)) !== null;
}

/**
 * Check if a path is a directory, following symlinks
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (err) {
    if (isErrnoException(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) {
      return false;
    }
    throw err;
  }
}

/**
 * Absolute path with every symlink resolved.
 * Paths that do not exist (yet) are only made absolute.
 */
export async function canonicalPath(path: string): Promise<string> {
  try {
    return await realpath(path);
  } catch (err) {
    if (isErrnoException(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) {
      return resolve(path);
    }
    throw err;
  }
}

/**
 * Move a file or directory, copying across filesystems when rename cannot
 */
export async function movePath(src: string, dest: string): Promise<void> {
  try {
    await rename(src, dest);
  } catch (err) {
    if (!isErrnoException(err) || err.code !== 'EXDEV') {
      throw err;
    }
    await cp(src, dest, { recursive: true, errorOnExist: true, force: false, verbatimSymlinks: true });
    await rm(src, { recursive: true });
  }
}
