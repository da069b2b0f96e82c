/**
 * password-store adapter
 */

import { execFile } from 'child_process';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { promisify } from 'util';
import { isErrnoException } from '../utils/index.js';
import { IDENTITY_FILE } from '../vault/layout.js';
import type { CredentialStore } from './types.js';

const execFileAsync = promisify(execFile);

/**
 * Error raised when `pass init` fails
 */
export class PassCommandError extends Error {
  constructor(
    message: string,
    public readonly stderr: string,
    public readonly exitCode?: number
  ) {
    super(message);
    this.name = 'PassCommandError';
  }
}

/**
 * Extract the identity token from identity file content
 */
export function parseIdentity(content: string): string | null {
  const first = content.split(/\r?\n/, 1)[0]?.trim() ?? '';
  return first === '' ? null : first;
}

/**
 * Credential store backed by the `pass` executable.
 *
 * - `provision` runs `pass init <identity>` with PASSWORD_STORE_DIR set to the target.
 * - `readIdentity` returns the first line of `.gpg-id`.
 */
export class PassStore implements CredentialStore {
  constructor(private readonly command: string = 'pass') {}

  async provision(dir: string, identity: string): Promise<void> {
    try {
      await execFileAsync(this.command, ['init', identity], {
        encoding: 'utf8',
        env: { ...process.env, PASSWORD_STORE_DIR: dir },
      });
    } catch (err) {
      const stderr =
        typeof err === 'object' && err !== null && 'stderr' in err && typeof err.stderr === 'string'
          ? err.stderr.trim()
          : '';
      const exitCode =
        typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'number'
          ? err.code
          : undefined;
      const reason = stderr || (err instanceof Error ? err.message : String(err));
      throw new PassCommandError(`${this.command} init failed: ${reason}`, stderr, exitCode);
    }
  }

  async readIdentity(dir: string): Promise<string | null> {
    try {
      return parseIdentity(await readFile(join(dir, IDENTITY_FILE), 'utf-8'));
    } catch (err) {
      if (isErrnoException(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) {
        return null;
      }
      throw err;
    }
  }
}
