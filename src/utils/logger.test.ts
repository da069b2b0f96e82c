/**
 * Logger tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { resetConfig, setConfig } from '../config/index.js';
import { createLogger, getLogger, resetLogger } from './logger.js';

describe('logger', () => {
  beforeEach(() => {
    setConfig({ logLevel: 'error', logFormat: 'json' });
    resetLogger();
  });

  afterEach(() => {
    resetLogger();
    resetConfig();
  });

  it('should use the configured level', () => {
    expect(getLogger().level).toBe('error');
  });

  it('should keep the cached logger until reset', () => {
    const first = getLogger();
    setConfig({ logLevel: 'debug', logFormat: 'json' });

    expect(getLogger()).toBe(first);

    resetLogger();
    const second = getLogger();
    expect(second).not.toBe(first);
    expect(second.level).toBe('debug');
  });

  it('should bind context on child loggers', () => {
    const logger = createLogger({ module: 'vault' });

    expect(logger.bindings()).toEqual({ module: 'vault' });
    expect(logger.level).toBe('error');
  });
});
