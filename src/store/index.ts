/**
 * Store module
 * Credential-store collaborator used to provision vaults
 */

export { PassStore, PassCommandError, parseIdentity } from './pass.js';
export type { CredentialStore } from './types.js';
