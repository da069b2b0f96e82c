/**
 * Active pointer
 * The symlink at the store working path that exposes exactly one vault
 */

import { mkdir, readlink, rename, rm, symlink } from 'fs/promises';
import { randomBytes } from 'crypto';
import { basename, dirname, join, resolve } from 'path';
import type { Logger } from 'pino';
import { canonicalPath, lstatOrNull } from '../utils/index.js';
import { VaultError } from './errors.js';

/**
 * Resolve the active pointer one level.
 * Returns the absolute target path, or null when there is no symlink.
 */
export async function readActivePointer(storeDir: string): Promise<string | null> {
  const stats = await lstatOrNull(storeDir);
  if (!stats || !stats.isSymbolicLink()) {
    return null;
  }
  const target = await readlink(storeDir);
  return resolve(dirname(storeDir), target);
}

/**
 * Check whether the pointer designates `vaultDir`.
 * Both sides are canonicalized, so spellings through other symlinks agree.
 */
export async function isActive(storeDir: string, vaultDir: string): Promise<boolean> {
  const target = await readActivePointer(storeDir);
  if (target === null) {
    return false;
  }
  return (await canonicalPath(target)) === (await canonicalPath(vaultDir));
}

/**
 * Throw SYMLINK_CONFLICT when something other than a symlink sits at `storeDir`
 */
export async function assertPointerReplaceable(storeDir: string): Promise<void> {
  const stats = await lstatOrNull(storeDir);
  if (stats && !stats.isSymbolicLink()) {
    throw new VaultError('SYMLINK_CONFLICT', { path: storeDir });
  }
}

/**
 * Point `storeDir` at `vaultDir`.
 *
 * The new link is created beside the old one and renamed over it, so the
 * working path always holds either the old or the new symlink.
 */
export async function activate(
  storeDir: string,
  vaultDir: string,
  logger?: Logger
): Promise<void> {
  await assertPointerReplaceable(storeDir);

  const target = resolve(vaultDir);
  const parent = dirname(storeDir);
  const staging = join(
    parent,
    `.${basename(storeDir)}.${process.pid}.${randomBytes(4).toString('hex')}`
  );

  await mkdir(parent, { recursive: true });
  await symlink(target, staging);
  try {
    await rename(staging, storeDir);
  } catch (err) {
    await rm(staging, { force: true });
    throw err;
  }

  logger?.info({ link: storeDir, target }, 'ln: linked active store');
}
