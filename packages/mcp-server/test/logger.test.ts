import { describe, it, expect } from 'vitest';
import { createLogger, silentLogger } from '../src/lib.js';

describe('createLogger', () => {
  it('uses the configured level and names the bridge', () => {
    const logger = createLogger('error');
    expect(logger.level).toBe('error');
    expect(logger.isLevelEnabled('warn')).toBe(false);
    expect(logger.bindings()).toEqual({ name: 'cad-relay-bridge' });
  });

  it('offers a silent logger', () => {
    expect(silentLogger().isLevelEnabled('fatal')).toBe(false);
  });
});
