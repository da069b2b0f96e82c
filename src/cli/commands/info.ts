/**
 * Informational CLI commands
 * help, version
 */

import { Command } from 'commander';
import { formatBanner, formatUsage } from '../format.js';
import type { CliIO } from './vault.js';

/**
 * Register help and version commands on the program
 */
export function registerInfoCommands(program: Command, io: CliIO): void {
  program
    .command('help')
    .alias('h')
    .description('Display usage information')
    .action(() => {
      io.out(`${formatBanner()}\n${formatUsage()}`);
    });

  program
    .command('version')
    .alias('v')
    .description('Display the version of the vault extension')
    .action(() => {
      io.out(formatBanner());
    });
}
