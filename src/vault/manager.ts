/**
 * Vault manager
 * Lifecycle of vaults and activation of one of them behind the active pointer
 */

import { readdir, rename, rm } from 'fs/promises';
import { basename, dirname } from 'path';
import type { Logger } from 'pino';
import type { Config } from '../config/index.js';
import { PassStore } from '../store/pass.js';
import type { CredentialStore } from '../store/types.js';
import { createLogger } from '../utils/logger.js';
import { canonicalPath, isDirectory, pathExists } from '../utils/index.js';
import { VaultError } from './errors.js';
import { initVaultRoot, linkExtensions, provisionVault } from './init.js';
import type { InitOptions, InitResult } from './init.js';
import { VaultLayout } from './layout.js';
import { withVaultLock } from './lock.js';
import { assertVaultName } from './names.js';
import { activate, assertPointerReplaceable, isActive, readActivePointer } from './pointer.js';
import type { ConfirmDeletion } from './prompt.js';

/**
 * Vault manager options
 */
export interface VaultManagerOptions {
  /** Working path of the active store (the active pointer) */
  storeDir: string;
  /** Vault root */
  vaultsDir: string;
  /** Credential store used to provision new vaults */
  store: CredentialStore;
  logger?: Logger;
}

/**
 * One vault as reported by list()
 */
export interface VaultEntry {
  name: string;
  path: string;
  active: boolean;
}

export interface AddResult {
  name: string;
  path: string;
  identity: string;
}

export interface RenameResult {
  from: string;
  to: string;
  path: string;
  /** Whether the vault was active before the rename */
  wasActive: boolean;
}

export interface RemoveResult {
  name: string;
  /** false when the user declined the confirmation */
  removed: boolean;
}

/**
 * Vault manager
 *
 * Holds no state of its own between calls: which vault is active is read
 * from the active pointer every time.
 */
export class VaultManager {
  readonly layout: VaultLayout;
  private readonly store: CredentialStore;
  private readonly logger: Logger;

  constructor(options: VaultManagerOptions) {
    this.layout = new VaultLayout(options.storeDir, options.vaultsDir);
    this.store = options.store;
    this.logger = options.logger ?? createLogger({ module: 'vault' });
  }

  /**
   * Build a manager from configuration, backed by the `pass` executable
   */
  static fromConfig(config: Config, logger?: Logger): VaultManager {
    return new VaultManager({
      storeDir: config.storeDir,
      vaultsDir: config.vaultsDir,
      store: new PassStore(config.passCommand),
      logger,
    });
  }

  async isInitialized(): Promise<boolean> {
    return isDirectory(this.layout.vaultsDir);
  }

  async exists(name: string): Promise<boolean> {
    return isDirectory(this.layout.vaultPath(name));
  }

  /**
   * Name of the active vault, or null when the pointer is absent or
   * designates something outside the vault root
   */
  async activeVault(): Promise<string | null> {
    const target = await readActivePointer(this.layout.storeDir);
    if (target === null) {
      return null;
    }
    const [parent, root] = await Promise.all([
      canonicalPath(dirname(target)),
      canonicalPath(this.layout.vaultsDir),
    ]);
    return parent === root ? basename(target) : null;
  }

  /**
   * Create the vault root and the `main` vault
   */
  async init(options: InitOptions = {}): Promise<InitResult> {
    const result = await initVaultRoot(this.layout, this.store, this.logger, options);
    this.logger.info({ vault: result.vault, migrated: result.migrated }, 'vaults initialized');
    return result;
  }

  /**
   * Create a vault sharing the active vault's identity and activate it
   */
  async add(name: string): Promise<AddResult> {
    await this.assertInitialized();
    assertVaultName(name);

    return this.locked(async () => {
      const path = this.layout.vaultPath(name);
      if (await pathExists(path)) {
        throw new VaultError('ALREADY_EXISTS', { name });
      }

      const identity = await this.store.readIdentity(this.layout.storeDir);
      if (identity === null) {
        throw new VaultError('IDENTITY_MISSING', { path: this.layout.activeIdentityPath });
      }
      await assertPointerReplaceable(this.layout.storeDir);

      await provisionVault(this.layout, this.store, name, identity, this.logger);
      await linkExtensions(this.layout, name, this.logger);
      await activate(this.layout.storeDir, path, this.logger);

      return { name, path, identity };
    });
  }

  /**
   * All vaults, sorted by name, with the active one flagged
   */
  async list(): Promise<VaultEntry[]> {
    await this.assertInitialized();

    const pointer = await readActivePointer(this.layout.storeDir);
    const target = pointer === null ? null : await canonicalPath(pointer);
    const entries = await readdir(this.layout.vaultsDir, { withFileTypes: true });
    const vaults: VaultEntry[] = [];

    for (const entry of entries) {
      if (entry.name.startsWith('.')) continue;
      const path = this.layout.vaultPath(entry.name);
      const isVault =
        entry.isDirectory() || (entry.isSymbolicLink() && (await isDirectory(path)));
      if (!isVault) continue;
      const active = target !== null && target === (await canonicalPath(path));
      vaults.push({ name: entry.name, path, active });
    }

    return vaults.sort((a, b) => a.name.localeCompare(b.name));
  }

  /**
   * Make `name` the active vault
   */
  async switch(name: string): Promise<void> {
    assertVaultName(name);
    if (!(await this.exists(name))) {
      throw new VaultError('NOT_FOUND', { name });
    }

    await this.locked(() => activate(this.layout.storeDir, this.layout.vaultPath(name), this.logger));
  }

  /**
   * Rename a vault and activate it under its new name.
   * The renamed vault becomes active even if it was not active before.
   */
  async rename(oldName: string, newName: string): Promise<RenameResult> {
    assertVaultName(oldName, 'MISSING_ARGUMENT');
    assertVaultName(newName, 'MISSING_ARGUMENT');
    await this.assertInitialized();

    return this.locked(async () => {
      const from = this.layout.vaultPath(oldName);
      const to = this.layout.vaultPath(newName);
      if (!(await this.exists(oldName))) {
        throw new VaultError('NOT_FOUND', { name: oldName });
      }
      if (await pathExists(to)) {
        throw new VaultError('ALREADY_EXISTS', { name: newName });
      }
      await assertPointerReplaceable(this.layout.storeDir);

      const wasActive = await isActive(this.layout.storeDir, from);
      await rename(from, to);
      this.logger.info({ from, to }, 'mv: renamed vault');
      await activate(this.layout.storeDir, to, this.logger);

      return { from: oldName, to: newName, path: to, wasActive };
    });
  }

  /**
   * Delete an inactive vault after confirmation
   */
  async remove(name: string, confirm: ConfirmDeletion): Promise<RemoveResult> {
    assertVaultName(name);
    const path = this.layout.vaultPath(name);

    if (await isActive(this.layout.storeDir, path)) {
      throw new VaultError('CANNOT_DELETE_ACTIVE', { name });
    }
    if (!(await this.exists(name))) {
      throw new VaultError('NOT_FOUND', { name });
    }

    return this.locked(async () => {
      if (await isActive(this.layout.storeDir, path)) {
        throw new VaultError('CANNOT_DELETE_ACTIVE', { name });
      }
      if (!(await confirm(name))) {
        this.logger.info({ vault: name }, 'deletion declined');
        return { name, removed: false };
      }

      await rm(path, { recursive: true });
      this.logger.info({ path }, 'rm: removed vault');
      return { name, removed: true };
    });
  }

  private async assertInitialized(): Promise<void> {
    if (!(await this.isInitialized())) {
      throw new VaultError('NOT_INITIALIZED');
    }
  }

  private locked<T>(fn: () => Promise<T>): Promise<T> {
    return withVaultLock(this.layout.lockPath, fn);
  }
}
