/**
 * Vault root initialization
 * One-time creation of the vault root, migrating an existing store into `main`
 */

import { mkdir, rm, symlink } from 'fs/promises';
import { dirname, join } from 'path';
import type { Logger } from 'pino';
import type { CredentialStore } from '../store/types.js';
import { isErrnoException, lstatOrNull, movePath, pathExists } from '../utils/index.js';
import { VaultError } from './errors.js';
import { DEFAULT_VAULT, EXTENSIONS_DIR, type VaultLayout } from './layout.js';
import { withVaultLock } from './lock.js';
import { activate } from './pointer.js';

/** Options for vault root initialization */
export interface InitOptions {
  /** Identity for a fresh `main` store when there is nothing to migrate */
  identity?: string;
}

/** Result of vault root initialization */
export interface InitResult {
  vault: string;
  /** An existing store was moved into the vault root */
  migrated: boolean;
  /** The existing store's extensions became the shared extensions */
  extensionsMigrated: boolean;
  /** A fresh store was provisioned for `main` */
  provisioned: boolean;
}

/**
 * Link the shared extensions directory into a vault
 */
export async function linkExtensions(
  layout: VaultLayout,
  vaultName: string,
  logger: Logger
): Promise<void> {
  const link = join(layout.vaultPath(vaultName), EXTENSIONS_DIR);
  if (await pathExists(link)) {
    logger.debug({ link }, 'extensions already linked');
    return;
  }
  await symlink(layout.extensionsPath, link);
  logger.info({ link, target: layout.extensionsPath }, 'ln: linked extensions');
}

/**
 * Provision a fresh store, removing the directory again if provisioning fails
 */
export async function provisionVault(
  layout: VaultLayout,
  store: CredentialStore,
  vaultName: string,
  identity: string,
  logger: Logger
): Promise<void> {
  const dir = layout.vaultPath(vaultName);
  const existed = await pathExists(dir);
  try {
    await store.provision(dir, identity);
  } catch (err) {
    if (!existed) {
      await rm(dir, { recursive: true, force: true });
    }
    throw new VaultError(
      'PROVISION_FAILED',
      { name: vaultName, detail: err instanceof Error ? err.message : String(err) },
      err
    );
  }
  logger.info({ vault: vaultName, dir }, 'provisioned password-store');
}

async function createRoot(layout: VaultLayout, logger: Logger): Promise<void> {
  await mkdir(dirname(layout.vaultsDir), { recursive: true });
  try {
    await mkdir(layout.vaultsDir);
  } catch (err) {
    if (isErrnoException(err) && err.code === 'EEXIST') {
      throw new VaultError('ALREADY_INITIALIZED', { path: layout.vaultsDir });
    }
    throw err;
  }
  logger.info({ path: layout.vaultsDir }, 'mkdir: created vault root');
}

/**
 * Initialize the vault root.
 *
 * Never overwrites: an existing vault root aborts with ALREADY_INITIALIZED.
 * An existing store at the working path becomes the `main` vault, and its
 * `.extensions` become the shared extensions directory.
 */
export async function initVaultRoot(
  layout: VaultLayout,
  store: CredentialStore,
  logger: Logger,
  options: InitOptions = {}
): Promise<InitResult> {
  if (await pathExists(layout.vaultsDir)) {
    throw new VaultError('ALREADY_INITIALIZED', { path: layout.vaultsDir });
  }

  const legacy = await lstatOrNull(layout.storeDir);
  if (legacy && !legacy.isDirectory()) {
    throw new VaultError('LEGACY_STORE_INVALID', { path: layout.storeDir });
  }

  await createRoot(layout, logger);

  const result: InitResult = {
    vault: DEFAULT_VAULT,
    migrated: false,
    extensionsMigrated: false,
    provisioned: false,
  };

  try {
    return await withVaultLock(layout.lockPath, async () => {
      const mainDir = layout.vaultPath(DEFAULT_VAULT);

      if (legacy) {
        if (await pathExists(layout.legacyExtensionsPath)) {
          await movePath(layout.legacyExtensionsPath, layout.extensionsPath);
          logger.info(
            { from: layout.legacyExtensionsPath, to: layout.extensionsPath },
            'mv: moved extensions'
          );
          result.extensionsMigrated = true;
        }
        await movePath(layout.storeDir, mainDir);
        logger.info({ from: layout.storeDir, to: mainDir }, 'mv: moved store');
        result.migrated = true;
      } else {
        await mkdir(mainDir);
        logger.info({ path: mainDir }, 'mkdir: created vault');
        if (options.identity) {
          await provisionVault(layout, store, DEFAULT_VAULT, options.identity, logger);
          result.provisioned = true;
        }
      }

      await mkdir(layout.extensionsPath, { recursive: true });
      await linkExtensions(layout, DEFAULT_VAULT, logger);
      await activate(layout.storeDir, mainDir, logger);

      return result;
    });
  } catch (err) {
    // Only remove the root while it holds nothing of the user's
    if (!result.migrated && !result.extensionsMigrated) {
      await rm(layout.vaultsDir, { recursive: true, force: true });
      logger.info({ path: layout.vaultsDir }, 'rm: removed incomplete vault root');
    }
    throw err;
  }
}
