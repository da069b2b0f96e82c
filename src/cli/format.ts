/**
 * CLI output formatting
 */

import type { VaultEntry } from '../vault/index.js';
import { version } from '../version.js';

export const INITIALIZED_MESSAGE = 'Password vaults initialized.';
export const ABORT_MESSAGE = 'Aborting.';

/**
 * Render the vault list, marking the active vault with `*`
 */
export function formatVaultList(vaults: VaultEntry[]): string {
  const lines = ['Vaults:'];
  for (const vault of vaults) {
    lines.push(`${vault.active ? '*' : ' '} ${vault.name}`);
  }
  return lines.join('\n') + '\n';
}

/**
 * Version banner
 */
export function formatBanner(): string {
  const width = 42;
  const row = (text: string) => {
    const left = Math.floor((width - text.length) / 2);
    return `=${' '.repeat(left)}${text}${' '.repeat(width - text.length - left)}=`;
  };
  const rule = '='.repeat(width + 2);
  return [
    rule,
    row('Extension: vault'),
    row('Multiple password-stores with ease!'),
    row(''),
    row(`v${version}`),
    rule,
    '',
  ].join('\n');
}

/**
 * Usage text for `help`
 */
export function formatUsage(): string {
  return `Usage:
    pass vault <name>
        Switch to the VAULT with the given name.
    pass vault [list] [--json]
        List all available VAULTS.
    pass vault init [--identity <gpg-id>]
        Initialize the VAULT root, moving an existing store into 'main'.
    pass vault add <name>
        Add a new VAULT with the given name.
    pass vault mv <old-name> <new-name>
        Rename a VAULT and activate it.
    pass vault rm <name>
        Delete an inactive VAULT and all secrets it contains.
    pass vault help
        Display usage information.
    pass vault version
        Display the version of the currently installed VAULT extension.
`;
}
