import { afterEach, describe, expect, it, vi } from 'vitest';
import { logger, setLogLevel } from '../src/middleware/logger.js';

describe('logger', () => {
  afterEach(() => {
    setLogLevel('silent');
    vi.doUnmock('../src/utils/config.js');
  });

  it('starts at the level named in the environment', () => {
    expect(logger.level).toBe('silent');
  });

  it('applies a configured level', () => {
    setLogLevel('debug');
    expect(logger.level).toBe('debug');
  });

  it('loads the engine without reading the process config', async () => {
    vi.resetModules();
    vi.doMock('../src/utils/config.js', () => {
      throw new Error('config loaded');
    });

    const engine = await import('../src/core/engine.js');

    expect(typeof engine.createEngine).toBe('function');
  });
});
