/**
 * Credential store collaborator
 * The vault manager treats a store as an opaque directory with an identity file
 */

/**
 * Operations the vault manager needs from the password-store
 */
export interface CredentialStore {
  /** Create a fresh store in `dir` encrypting for `identity` */
  provision(dir: string, identity: string): Promise<void>;
  /** First line of the store's identity file, or null if there is none */
  readIdentity(dir: string): Promise<string | null>;
}
