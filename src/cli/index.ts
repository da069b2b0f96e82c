#!/usr/bin/env node
/**
 * pass-vault CLI - Main entry point
 * Multiple password-stores behind one symlink
 */

import { Command } from 'commander';
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { getConfig } from '../config/index.js';
import { createLogger } from '../utils/logger.js';
import { VaultManager, createConfirm, type ConfirmDeletion } from '../vault/index.js';
import { version } from '../version.js';
import { registerInfoCommands } from './commands/info.js';
import { registerVaultCommands, type CliIO } from './commands/vault.js';

/**
 * Overrides for tests and embedding
 */
export interface ProgramOptions {
  createManager?: () => VaultManager;
  confirm?: ConfirmDeletion;
  io?: CliIO;
}

const defaultIO: CliIO = {
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
};

/**
 * Build the manager from environment configuration
 */
function createManagerFromEnv(): VaultManager {
  const config = getConfig();
  if (!config.extensionsEnabled) {
    createLogger({ module: 'cli' }).warn(
      'PASSWORD_STORE_ENABLE_EXTENSIONS is not set; pass will not load the vault extension'
    );
  }
  return VaultManager.fromConfig(config);
}

/**
 * Create and configure the CLI program
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const io = options.io ?? defaultIO;
  const program = new Command();

  program
    .name('pass-vault')
    .description('Manage multiple password-store vaults')
    .version(version)
    .helpCommand(false)
    .configureOutput({ writeOut: io.out, writeErr: io.err });

  registerVaultCommands(program, {
    getManager: options.createManager ?? createManagerFromEnv,
    confirm: options.confirm ?? createConfirm(),
    io,
  });
  registerInfoCommands(program, io);

  return program;
}

/**
 * Rewrite `<name>` to `switch <name>` when the first argument is not a
 * command, an alias or an option
 */
export function normalizeArgs(args: string[], program: Command): string[] {
  const [first, ...rest] = args;
  if (first === undefined || first.startsWith('-')) {
    return args;
  }

  const known = new Set(program.commands.flatMap((cmd) => [cmd.name(), ...cmd.aliases()]));
  if (known.has(first)) {
    return args;
  }
  return ['switch', first, ...rest];
}

/**
 * Parse and run one invocation
 */
export async function main(argv: string[] = process.argv.slice(2), options?: ProgramOptions): Promise<void> {
  const program = createProgram(options);
  await program.parseAsync(normalizeArgs(argv, program), { from: 'user' });
}

function isDirectRun(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

// Run CLI when executed directly (not when imported as module)
if (isDirectRun()) {
  main().catch((err: unknown) => {
    process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 1;
  });
}
