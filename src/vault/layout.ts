/**
 * Filesystem layout of the vault root
 */

import { join, resolve } from 'path';

export const EXTENSIONS_DIR = '.extensions';
export const LOCK_FILE = '.lock';
export const IDENTITY_FILE = '.gpg-id';
export const DEFAULT_VAULT = 'main';

/**
 * Resolved paths for one vault root and its active pointer
 */
export class VaultLayout {
  readonly storeDir: string;
  readonly vaultsDir: string;

  constructor(storeDir: string, vaultsDir: string) {
    this.storeDir = resolve(storeDir);
    this.vaultsDir = resolve(vaultsDir);
  }

  vaultPath(name: string): string {
    return join(this.vaultsDir, name);
  }

  get extensionsPath(): string {
    return join(this.vaultsDir, EXTENSIONS_DIR);
  }

  get lockPath(): string {
    return join(this.vaultsDir, LOCK_FILE);
  }

  /** Identity file as seen through the active pointer */
  get activeIdentityPath(): string {
    return join(this.storeDir, IDENTITY_FILE);
  }

  /** Extensions of a store that predates the vault root */
  get legacyExtensionsPath(): string {
    return join(this.storeDir, EXTENSIONS_DIR);
  }
}
