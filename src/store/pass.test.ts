/**
 * pass adapter tests
 * Runs against a fake `pass` script
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { chmod, mkdir, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { PassCommandError, PassStore, parseIdentity } from './pass.js';

const FAKE_PASS = [
  '#!/bin/sh',
  'if [ "$1" != "init" ]; then',
  '  echo "unsupported: $1" >&2',
  '  exit 2',
  'fi',
  'if [ "$2" = "missing-key" ]; then',
  '  echo "gpg: missing-key: skipped: No public key" >&2',
  '  exit 1',
  'fi',
  'mkdir -p "$PASSWORD_STORE_DIR"',
  'echo "$2" > "$PASSWORD_STORE_DIR/.gpg-id"',
  'echo "Password store initialized for $2"',
  '',
].join('\n');

describe('parseIdentity', () => {
  it('should return the first line', () => {
    expect(parseIdentity('ABCDEF0123456789\nsecond@example.org\n')).toBe('ABCDEF0123456789');
  });

  it('should trim surrounding whitespace and CRLF', () => {
    expect(parseIdentity('  alice@example.org \r\n')).toBe('alice@example.org');
  });

  it('should return null for an empty file', () => {
    expect(parseIdentity('')).toBeNull();
    expect(parseIdentity('\nbob@example.org\n')).toBeNull();
  });
});

describe('PassStore', () => {
  let testDir: string;
  let passPath: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'pass-vaults-pass-'));
    await mkdir(join(testDir, 'bin'));
    passPath = join(testDir, 'bin', 'pass');
    await writeFile(passPath, FAKE_PASS, 'utf-8');
    await chmod(passPath, 0o755);
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should run pass init with PASSWORD_STORE_DIR pointing at the vault', async () => {
    const store = new PassStore(passPath);
    const vaultDir = join(testDir, 'vaults', 'work');

    await store.provision(vaultDir, 'alice@example.org');

    const content = await readFile(join(vaultDir, '.gpg-id'), 'utf-8');
    expect(content).toBe('alice@example.org\n');
  });

  it('should surface pass stderr when init fails', async () => {
    const store = new PassStore(passPath);

    const err = await store
      .provision(join(testDir, 'vaults', 'work'), 'missing-key')
      .then(() => null, (e: unknown) => e);

    expect(err).toBeInstanceOf(PassCommandError);
    if (err instanceof PassCommandError) {
      expect(err.stderr).toBe('gpg: missing-key: skipped: No public key');
      expect(err.exitCode).toBe(1);
      expect(err.message).toBe(`${passPath} init failed: gpg: missing-key: skipped: No public key`);
    }
  });

  it('should read the identity of a provisioned store', async () => {
    const store = new PassStore(passPath);
    const vaultDir = join(testDir, 'vaults', 'main');
    await store.provision(vaultDir, 'bob@example.org');

    expect(await store.readIdentity(vaultDir)).toBe('bob@example.org');
  });

  it('should return null when there is no identity file', async () => {
    const store = new PassStore(passPath);

    expect(await store.readIdentity(join(testDir, 'nowhere'))).toBeNull();
  });
});
