/**
 * Advisory lock around mutating vault operations
 *
 * The lock is a file under the vault root, created exclusively and holding
 * the owner's pid. A lock whose owner is gone is stale and gets replaced.
 */

import { randomBytes } from 'crypto';
import { link, readFile, rename, rm, writeFile } from 'fs/promises';
import { isErrnoException } from '../utils/index.js';
import { VaultError } from './errors.js';

/**
 * A held vault lock
 */
export interface VaultLock {
  path: string;
  pid: number;
  acquiredAt: Date;
}

/**
 * Check whether a process with this pid is running
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: exists but belongs to someone else
    return isErrnoException(err) && err.code === 'EPERM';
  }
}

/**
 * Read the pid recorded in a lock file, or null if it is unreadable
 */
export async function readLockHolder(path: string): Promise<number | null> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return null;
    throw err;
  }
  const pid = Number.parseInt(content.trim(), 10);
  return Number.isInteger(pid) && pid > 0 ? pid : null;
}

function sidePath(path: string): string {
  return `${path}.${process.pid}.${randomBytes(4).toString('hex')}`;
}

/**
 * Publish a lock file holding our pid.
 * The pid is written to a private file first and hard-linked into place,
 * so the lock never appears empty and `link` fails if one already exists.
 */
async function tryCreate(path: string): Promise<VaultLock | null> {
  const staging = sidePath(path);
  await writeFile(staging, `${process.pid}\n`, { encoding: 'utf-8', flag: 'wx' });
  try {
    await link(staging, path);
    return { path, pid: process.pid, acquiredAt: new Date() };
  } catch (err) {
    if (isErrnoException(err) && err.code === 'EEXIST') return null;
    throw err;
  } finally {
    await rm(staging, { force: true });
  }
}

/**
 * Replace a lock that still records `stalePid`.
 *
 * The lock is renamed aside, which only one contender can do. If the file
 * moved aside is not the stale one, another process published a fresh lock
 * in the meantime: it is linked back and null is returned.
 */
export async function takeOverStaleLock(
  path: string,
  stalePid: number | null
): Promise<VaultLock | null> {
  const aside = sidePath(path);
  try {
    await rename(path, aside);
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return tryCreate(path);
    throw err;
  }

  try {
    if ((await readLockHolder(aside)) !== stalePid) {
      await restoreLock(aside, path);
      return null;
    }
    return await tryCreate(path);
  } finally {
    await rm(aside, { force: true });
  }
}

async function restoreLock(aside: string, path: string): Promise<void> {
  try {
    await link(aside, path);
  } catch (err) {
    // a newer lock is already in place
    if (!isErrnoException(err) || err.code !== 'EEXIST') throw err;
  }
}

/**
 * Acquire the lock at `path`
 * @throws VaultError LOCKED if a live process holds it
 */
export async function acquireVaultLock(path: string): Promise<VaultLock> {
  const lock = await tryCreate(path);
  if (lock) return lock;

  const holder = await readLockHolder(path);
  if (holder !== null && isProcessAlive(holder)) {
    throw new VaultError('LOCKED', { path, detail: `held by pid ${holder}` });
  }

  const taken = await takeOverStaleLock(path, holder);
  if (!taken) {
    throw new VaultError('LOCKED', { path });
  }
  return taken;
}

/**
 * Release a lock previously acquired by this process
 */
export async function releaseVaultLock(lock: VaultLock): Promise<void> {
  const holder = await readLockHolder(lock.path);
  if (holder === lock.pid) {
    await rm(lock.path, { force: true });
  }
}

/**
 * Execute a function while holding the vault lock
 * The lock is released when done (even on error)
 */
export async function withVaultLock<T>(path: string, fn: () => Promise<T>): Promise<T> {
  const lock = await acquireVaultLock(path);
  try {
    return await fn();
  } finally {
    await releaseVaultLock(lock);
  }
}
