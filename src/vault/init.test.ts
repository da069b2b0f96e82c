/**
 * Vault root initialization tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { lstat, mkdir, mkdtemp, readdir, readFile, readlink, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import pino from 'pino';
import { PlainStore } from '../store/plain.js';
import { pathExists } from '../utils/index.js';
import { initVaultRoot, linkExtensions } from './init.js';
import { VaultLayout } from './layout.js';

const logger = pino({ level: 'silent' });

describe('initVaultRoot', () => {
  let testDir: string;
  let layout: VaultLayout;
  let store: PlainStore;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'pass-vaults-init-'));
    layout = new VaultLayout(join(testDir, '.password-store'), join(testDir, '.password-vaults'));
    store = new PlainStore();
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  async function seedLegacyStore(withExtensions: boolean): Promise<void> {
    await mkdir(join(layout.storeDir, 'email'), { recursive: true });
    await writeFile(join(layout.storeDir, '.gpg-id'), 'alice@example.org\n');
    await writeFile(join(layout.storeDir, 'email', 'alice.gpg'), 'ciphertext');
    if (withExtensions) {
      await mkdir(layout.legacyExtensionsPath);
      await writeFile(join(layout.legacyExtensionsPath, 'otp.bash'), '#!/bin/bash\n');
    }
  }

  it('should create an empty main vault when there is no store', async () => {
    const result = await initVaultRoot(layout, store, logger);

    expect(result).toEqual({
      vault: 'main',
      migrated: false,
      extensionsMigrated: false,
      provisioned: false,
    });
    expect(await readlink(layout.storeDir)).toBe(layout.vaultPath('main'));
    expect((await readdir(layout.vaultsDir)).sort()).toEqual(['.extensions', 'main']);
    expect(store.provisioned).toHaveLength(0);
  });

  it('should provision main when given an identity', async () => {
    const result = await initVaultRoot(layout, store, logger, { identity: 'carol@example.org' });

    expect(result.provisioned).toBe(true);
    expect(store.provisioned).toEqual([
      { dir: layout.vaultPath('main'), identity: 'carol@example.org' },
    ]);
    expect(await readFile(join(layout.storeDir, '.gpg-id'), 'utf-8')).toBe('carol@example.org\n');
  });

  it('should migrate an existing store into main', async () => {
    await seedLegacyStore(false);

    const result = await initVaultRoot(layout, store, logger);

    expect(result.migrated).toBe(true);
    expect(result.extensionsMigrated).toBe(false);
    expect(
      await readFile(join(layout.vaultPath('main'), 'email', 'alice.gpg'), 'utf-8')
    ).toBe('ciphertext');
    expect((await lstat(layout.storeDir)).isSymbolicLink()).toBe(true);
    expect(await readFile(join(layout.storeDir, 'email', 'alice.gpg'), 'utf-8')).toBe(
      'ciphertext'
    );
  });

  it('should move existing extensions to the shared directory', async () => {
    await seedLegacyStore(true);

    const result = await initVaultRoot(layout, store, logger);

    expect(result.extensionsMigrated).toBe(true);
    expect(await readFile(join(layout.extensionsPath, 'otp.bash'), 'utf-8')).toBe('#!/bin/bash\n');
    expect(await readlink(join(layout.vaultPath('main'), '.extensions'))).toBe(
      layout.extensionsPath
    );
    expect(await readFile(join(layout.storeDir, '.extensions', 'otp.bash'), 'utf-8')).toBe(
      '#!/bin/bash\n'
    );
  });

  it('should refuse to run twice', async () => {
    await initVaultRoot(layout, store, logger);
    await writeFile(join(layout.vaultPath('main'), 'keep.gpg'), 'keep');

    await expect(initVaultRoot(layout, store, logger)).rejects.toMatchObject({
      code: 'ALREADY_INITIALIZED',
    });
    expect(await readFile(join(layout.vaultPath('main'), 'keep.gpg'), 'utf-8')).toBe('keep');
    expect((await readdir(layout.vaultsDir)).sort()).toEqual(['.extensions', 'main']);
  });

  it('should refuse a working path that is a file', async () => {
    await writeFile(layout.storeDir, 'not a store');

    await expect(initVaultRoot(layout, store, logger)).rejects.toMatchObject({
      code: 'LEGACY_STORE_INVALID',
    });
    expect(await pathExists(layout.vaultsDir)).toBe(false);
    expect(await readFile(layout.storeDir, 'utf-8')).toBe('not a store');
  });

  it('should remove the new root when provisioning fails', async () => {
    store.failure = new Error('gpg: no public key');

    await expect(
      initVaultRoot(layout, store, logger, { identity: 'nobody@example.org' })
    ).rejects.toMatchObject({ code: 'PROVISION_FAILED' });
    expect(await pathExists(layout.vaultsDir)).toBe(false);
    expect(await pathExists(layout.storeDir)).toBe(false);
  });

  it('should not leave the lock file behind', async () => {
    await initVaultRoot(layout, store, logger);

    expect(await pathExists(layout.lockPath)).toBe(false);
  });
});

describe('linkExtensions', () => {
  let testDir: string;
  let layout: VaultLayout;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'pass-vaults-ext-'));
    layout = new VaultLayout(join(testDir, 'store'), join(testDir, 'vaults'));
    await mkdir(layout.extensionsPath, { recursive: true });
    await mkdir(layout.vaultPath('work'));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should link the shared directory into the vault', async () => {
    await linkExtensions(layout, 'work', logger);

    expect(await readlink(join(layout.vaultPath('work'), '.extensions'))).toBe(
      layout.extensionsPath
    );
  });

  it('should leave an existing link alone', async () => {
    await linkExtensions(layout, 'work', logger);
    await linkExtensions(layout, 'work', logger);

    expect(await readlink(join(layout.vaultPath('work'), '.extensions'))).toBe(
      layout.extensionsPath
    );
  });
});
