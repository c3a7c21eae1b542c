import { describe, it, expect } from 'vitest';
import { createLogger, silentLogger } from '../src/index.js';

describe('createLogger', () => {
  it('uses the configured level and names the add-in', () => {
    const logger = createLogger('warn');
    expect(logger.level).toBe('warn');
    expect(logger.isLevelEnabled('info')).toBe(false);
    expect(logger.bindings()).toEqual({ name: 'cad-relay-addin' });
  });

  it('keeps the level on child loggers', () => {
    const child = createLogger('debug', 'host').child({ component: 'listener' });
    expect(child.level).toBe('debug');
    expect(child.bindings()).toEqual({ name: 'host', component: 'listener' });
  });

  it('offers a silent logger', () => {
    expect(silentLogger().level).toBe('silent');
  });
});
