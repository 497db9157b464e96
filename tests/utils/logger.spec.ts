import { afterEach, describe, expect, it } from 'vitest';
import { componentLogger, isLogLevel, logger, setLogLevel } from '../../src/utils/logger.js';

describe('logger', () => {
  const initialLevel = logger.level;

  afterEach(() => {
    logger.level = initialLevel;
  });

  it('recognises pino level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('DEBUG')).toBe(false);
  });

  it('tags child loggers with their component', () => {
    expect(componentLogger('polling').bindings()).toMatchObject({ component: 'polling' });
  });

  it('applies a new level to loggers created afterwards', () => {
    setLogLevel('debug');
    expect(logger.level).toBe('debug');
    expect(componentLogger('dispatcher').level).toBe('debug');
  });
});
