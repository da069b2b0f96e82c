import { describe, it, expect } from 'vitest';
import { VaultError, formatVaultError, isVaultError } from './errors.js';

describe('VaultError', () => {
  it('should carry the code and rendered message', () => {
    const err = new VaultError('NOT_FOUND', { name: 'work' });

    expect(err.code).toBe('NOT_FOUND');
    expect(err.name).toBe('VaultError');
    expect(err.message).toBe('No vault has been created with the name: work');
  });

  it('should keep the underlying cause', () => {
    const cause = new Error('gpg: no public key');
    const err = new VaultError('PROVISION_FAILED', { name: 'work', detail: cause.message }, cause);

    expect(err.cause).toBe(cause);
    expect(err.message).toBe(
      'Failed to initialize a password-store for vault work: gpg: no public key'
    );
  });
});

describe('formatVaultError', () => {
  it('should name the path that blocks the active pointer', () => {
    expect(formatVaultError('SYMLINK_CONFLICT', { path: '/home/u/.password-store' })).toBe(
      'Creating symlink `/home/u/.password-store` would overwrite a real file, aborting!'
    );
  });
});

describe('isVaultError', () => {
  it('should narrow by code', () => {
    const err: unknown = new VaultError('LOCKED', { path: '/v/.lock' });

    expect(isVaultError(err)).toBe(true);
    expect(isVaultError(err, 'LOCKED')).toBe(true);
    expect(isVaultError(err, 'NOT_FOUND')).toBe(false);
    expect(isVaultError(new Error('x'))).toBe(false);
  });
});
