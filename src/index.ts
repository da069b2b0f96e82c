/**
 * pass-vaults - multiple password-stores behind one symlink
 * Main library entry point
 */

// Re-export modules for programmatic use
export * from './config/index.js';
export * from './store/index.js';
export * from './vault/index.js';
export { version } from './version.js';
