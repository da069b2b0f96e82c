/**
 * Vault name validation
 * One rule shared by every operation that takes a name
 */

import { VaultError } from './errors.js';

/**
 * Throw unless `name` is usable as a vault directory name.
 * `emptyCode` lets `rename` report a missing argument instead of an empty name.
 */
export function assertVaultName(
  name: string | undefined,
  emptyCode: 'EMPTY_NAME' | 'MISSING_ARGUMENT' = 'EMPTY_NAME'
): asserts name is string {
  if (name === undefined || name === '') {
    throw new VaultError(emptyCode);
  }
  if (/\s/.test(name)) {
    throw new VaultError('NAME_HAS_SPACES', { name });
  }
  if (name.startsWith('.') || name.includes('/') || name.includes('\\')) {
    throw new VaultError('INVALID_NAME', { name });
  }
}

/**
 * Non-throwing variant of assertVaultName
 */
export function isValidVaultName(name: string): boolean {
  try {
    assertVaultName(name);
    return true;
  } catch {
    return false;
  }
}
