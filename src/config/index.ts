/**
 * Configuration module
 * Handles loading and validating configuration from environment
 */

import { z, ZodError } from 'zod';
import dotenv from 'dotenv';
import { homedir } from 'os';
import { join, resolve } from 'path';

/**
 * Expand a leading `~` to the current user's home directory
 */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

const pathSetting = (fallback: string) =>
  z
    .string()
    .min(1)
    .default(fallback)
    .transform((val) => resolve(expandHome(val)));

/**
 * Configuration schema with zod validation
 * All options have sensible defaults
 */
export const ConfigSchema = z.object({
  // Store layout
  storeDir: pathSetting('~/.password-store')
    .describe('Working path of the active password-store (the active pointer)'),
  vaultsDir: pathSetting('~/.password-vaults')
    .describe('Vault root holding one directory per vault'),

  // Host integration
  extensionsEnabled: z
    .union([z.boolean(), z.string()])
    .transform((val) => {
      if (typeof val === 'boolean') return val;
      return val.toLowerCase() === 'true' || val === '1';
    })
    .default(false)
    .describe('Whether pass loads extensions at all'),
  passCommand: z
    .string()
    .min(1)
    .default('pass')
    .describe('pass executable used to provision new vaults'),

  // Logging Configuration
  logLevel: z
    .enum(['silent', 'debug', 'info', 'warn', 'error'])
    .default('info')
    .describe('Logging verbosity level'),
  logFormat: z
    .enum(['json', 'pretty'])
    .default('pretty')
    .describe('Log output format'),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Configuration error with helpful messages
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: z.ZodIssue[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }

  static fromZodError(error: ZodError): ConfigError {
    const messages = error.issues.map(
      (issue) => `  - ${issue.path.join('.')}: ${issue.message}`
    );
    return new ConfigError(
      `Configuration validation failed:\n${messages.join('\n')}`,
      error.issues
    );
  }
}

/**
 * Load .env file from specified path or the working directory
 */
export function loadEnvFile(envPath?: string): void {
  if (envPath) {
    dotenv.config({ path: resolve(envPath) });
  } else {
    dotenv.config({ path: resolve(process.cwd(), '.env') });
  }
}

/**
 * Build raw config object from environment variables
 */
function buildRawConfig(env: NodeJS.ProcessEnv): Record<string, unknown> {
  return {
    storeDir: env.PASSWORD_STORE_DIR || undefined,
    vaultsDir: env.PASSWORD_STORE_VAULT_DIR || undefined,
    extensionsEnabled: env.PASSWORD_STORE_ENABLE_EXTENSIONS,
    passCommand: env.PASS_VAULT_PASS_COMMAND || undefined,
    logLevel: env.PASS_VAULT_LOG_LEVEL,
    logFormat: env.PASS_VAULT_LOG_FORMAT,
  };
}

/**
 * Load and validate configuration from environment
 * @param envPath Optional path to .env file
 * @throws ConfigError if validation fails
 */
export function loadConfig(envPath?: string, env: NodeJS.ProcessEnv = process.env): Config {
  loadEnvFile(envPath);

  const result = ConfigSchema.safeParse(buildRawConfig(env));

  if (!result.success) {
    throw ConfigError.fromZodError(result.error);
  }

  return result.data;
}

/**
 * Validate a partial config object
 */
export function validateConfig(config: unknown): Config {
  const result = ConfigSchema.safeParse(config);

  if (!result.success) {
    throw ConfigError.fromZodError(result.error);
  }

  return result.data;
}

/**
 * Get default configuration values
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

// Singleton config instance
let _config: Config | null = null;

/**
 * Get the global configuration instance (singleton)
 * Loads from environment on first access
 */
export function getConfig(): Config {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}

/**
 * Set the global configuration instance
 * Useful for testing or programmatic configuration
 */
export function setConfig(config: Partial<Config>): void {
  _config = validateConfig(config);
}

/**
 * Reset the global configuration instance
 * Forces reload on next getConfig() call
 */
export function resetConfig(): void {
  _config = null;
}
