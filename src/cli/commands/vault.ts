/**
 * Vault CLI commands
 * init, add, list, switch, mv, rm
 */

import { Command } from 'commander';
import { ConfigError } from '../../config/index.js';
import { VaultError, type ConfirmDeletion, type VaultManager } from '../../vault/index.js';
import { createLogger } from '../../utils/logger.js';
import { ABORT_MESSAGE, INITIALIZED_MESSAGE, formatVaultList } from '../format.js';

/**
 * Output sinks for the CLI
 */
export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
}

/**
 * What the vault commands need at run time
 */
export interface VaultCommandDeps {
  /** Built lazily so `help` and `version` need no configuration */
  getManager: () => VaultManager;
  confirm: ConfirmDeletion;
  io: CliIO;
}

/** Options for the init command */
export interface InitCommandOptions {
  identity?: string;
}

/** Options for the list command */
export interface ListCommandOptions {
  json?: boolean;
}

/**
 * Run a command body, turning expected failures into `Error: ...` and exit status 1
 */
export async function runAction(io: CliIO, fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err) {
    if (err instanceof VaultError || err instanceof ConfigError) {
      io.err(`Error: ${err.message}\n`);
    } else {
      createLogger({ module: 'cli' }).error({ err }, 'command failed');
      io.err(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
    }
    process.exitCode = 1;
  }
}

/**
 * Register vault commands on the program
 */
export function registerVaultCommands(program: Command, deps: VaultCommandDeps): void {
  const { io } = deps;

  program
    .command('list', { isDefault: true })
    .alias('l')
    .description('List all vaults, marking the active one')
    .option('--json', 'Output as JSON')
    .action(async (options: ListCommandOptions) => {
      await runAction(io, async () => {
        const vaults = await deps.getManager().list();
        io.out(options.json ? `${JSON.stringify(vaults, null, 2)}\n` : formatVaultList(vaults));
      });
    });

  program
    .command('init')
    .alias('i')
    .description('Initialize the vault root, moving an existing store into "main"')
    .option('--identity <gpg-id>', 'Identity for a fresh "main" store when none exists')
    .action(async (options: InitCommandOptions) => {
      await runAction(io, async () => {
        await deps.getManager().init({ identity: options.identity });
        io.out(`${INITIALIZED_MESSAGE}\n`);
      });
    });

  program
    .command('add')
    .alias('a')
    .argument('[name]', 'Name of the new vault')
    .description("Add a vault sharing the active vault's identity and activate it")
    .action(async (name: string | undefined) => {
      await runAction(io, async () => {
        const result = await deps.getManager().add(name ?? '');
        io.out(`Created vault: ${result.name}\n`);
      });
    });

  program
    .command('switch')
    .argument('[name]', 'Vault to activate')
    .description('Activate a vault (same as `pass vault <name>`)')
    .action(async (name: string | undefined) => {
      await runAction(io, async () => {
        await deps.getManager().switch(name ?? '');
        io.out(`Switched to vault: ${name}\n`);
      });
    });

  program
    .command('mv')
    .aliases(['m', 'move'])
    .argument('[old-name]', 'Current vault name')
    .argument('[new-name]', 'New vault name')
    .description('Rename a vault and activate it')
    .action(async (oldName: string | undefined, newName: string | undefined) => {
      await runAction(io, async () => {
        const result = await deps.getManager().rename(oldName ?? '', newName ?? '');
        io.out(`Renamed vault: ${result.from} -> ${result.to}\n`);
      });
    });

  program
    .command('rm')
    .aliases(['r', 'd', 'remove', 'del', 'delete'])
    .argument('[name]', 'Vault to delete')
    .description('Delete an inactive vault and every secret in it')
    .action(async (name: string | undefined) => {
      await runAction(io, async () => {
        const result = await deps.getManager().remove(name ?? '', deps.confirm);
        io.out(result.removed ? `Removed vault: ${result.name}\n` : `${ABORT_MESSAGE}\n`);
      });
    });
}
