import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { IDENTITY_FILE } from '../vault/layout.js';
import { PassStore } from './pass.js';
import type { CredentialStore } from './types.js';

/**
 * Test credential store that writes the identity file without touching gpg.
 * Set `failure` to make the next provision throw.
 */
export class PlainStore implements CredentialStore {
  readonly provisioned: Array<{ dir: string; identity: string }> = [];
  failure: Error | null = null;

  private readonly reader = new PassStore();

  async provision(dir: string, identity: string): Promise<void> {
    if (this.failure) {
      const err = this.failure;
      this.failure = null;
      throw err;
    }
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, IDENTITY_FILE), `${identity}\n`, 'utf-8');
    this.provisioned.push({ dir, identity });
  }

  async readIdentity(dir: string): Promise<string | null> {
    return this.reader.readIdentity(dir);
  }
}
