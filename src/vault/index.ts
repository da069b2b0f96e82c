/**
 * Vault module
 * Vault lifecycle and the active pointer
 */

export { VaultManager } from './manager.js';
export type {
  VaultManagerOptions,
  VaultEntry,
  AddResult,
  RenameResult,
  RemoveResult,
} from './manager.js';
export { initVaultRoot, linkExtensions, provisionVault } from './init.js';
export type { InitOptions, InitResult } from './init.js';
export { VaultError, isVaultError, formatVaultError } from './errors.js';
export type { VaultErrorCode } from './errors.js';
export { assertVaultName, isValidVaultName } from './names.js';
export { VaultLayout, DEFAULT_VAULT, EXTENSIONS_DIR, IDENTITY_FILE, LOCK_FILE } from './layout.js';
export { activate, isActive, readActivePointer } from './pointer.js';
export {
  acquireVaultLock,
  releaseVaultLock,
  takeOverStaleLock,
  withVaultLock,
} from './lock.js';
export type { VaultLock } from './lock.js';
export { confirmDeletion, createConfirm, isConsent } from './prompt.js';
export type { ConfirmDeletion, PromptIO } from './prompt.js';
