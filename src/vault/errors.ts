/**
 * Vault error taxonomy
 * Error identity lives in `code`; wording lives in one table
 */

/**
 * Vault error codes
 */
export type VaultErrorCode =
  | 'ALREADY_INITIALIZED'
  | 'NOT_INITIALIZED'
  | 'EMPTY_NAME'
  | 'MISSING_ARGUMENT'
  | 'NAME_HAS_SPACES'
  | 'INVALID_NAME'
  | 'ALREADY_EXISTS'
  | 'NOT_FOUND'
  | 'CANNOT_DELETE_ACTIVE'
  | 'SYMLINK_CONFLICT'
  | 'LEGACY_STORE_INVALID'
  | 'IDENTITY_MISSING'
  | 'PROVISION_FAILED'
  | 'LOCKED';

type MessageContext = {
  name?: string;
  path?: string;
  detail?: string;
};

const MESSAGES: Record<VaultErrorCode, (ctx: MessageContext) => string> = {
  ALREADY_INITIALIZED: ({ path }) => `The directory ${path} already exists, aborting!`,
  NOT_INITIALIZED: () => "vault-store not initialized! Try: 'pass vault init'",
  EMPTY_NAME: () => "Please specify the vault's name!",
  MISSING_ARGUMENT: () => 'Please try: `pass vault mv <old-name> <new-name>`',
  NAME_HAS_SPACES: () => 'Please do not use spaces in your vault name!',
  INVALID_NAME: ({ name }) =>
    `Invalid vault name: ${name} (no path separators, no leading dot)`,
  ALREADY_EXISTS: ({ name }) => `A vault has already been created with the name: ${name}`,
  NOT_FOUND: ({ name }) => `No vault has been created with the name: ${name}`,
  CANNOT_DELETE_ACTIVE: () =>
    'Only inactive vaults can be deleted! Please activate a different vault, first.',
  SYMLINK_CONFLICT: ({ path }) =>
    `Creating symlink \`${path}\` would overwrite a real file, aborting!`,
  LEGACY_STORE_INVALID: ({ path }) =>
    `${path} exists but is not a password-store directory, aborting!`,
  IDENTITY_MISSING: ({ path }) =>
    `Cannot read the identity of the active vault from ${path}`,
  PROVISION_FAILED: ({ name, detail }) =>
    `Failed to initialize a password-store for vault ${name}${detail ? `: ${detail}` : ''}`,
  LOCKED: ({ path, detail }) =>
    `Another vault operation is running (lock ${path}${detail ? `, ${detail}` : ''})`,
};

/**
 * Render the display text for an error code
 */
export function formatVaultError(code: VaultErrorCode, ctx: MessageContext = {}): string {
  return MESSAGES[code](ctx);
}

/**
 * Vault operation error
 */
export class VaultError extends Error {
  constructor(
    public readonly code: VaultErrorCode,
    ctx: MessageContext = {},
    public cause?: unknown
  ) {
    super(formatVaultError(code, ctx));
    this.name = 'VaultError';
  }
}

/**
 * Narrow an unknown error to a VaultError with the given code
 */
export function isVaultError(err: unknown, code?: VaultErrorCode): err is VaultError {
  return err instanceof VaultError && (code === undefined || err.code === code);
}
