import { describe, it, expect } from 'vitest';
import { resolveLogLevel } from '../../../src/server/utils/logger.js';

describe('resolveLogLevel', () => {
  it('uses a valid LOG_LEVEL', () => {
    expect(resolveLogLevel('production', 'warn')).toBe('warn');
    expect(resolveLogLevel('test', 'debug')).toBe('debug');
  });

  it('falls back to the environment default', () => {
    expect(resolveLogLevel('test', undefined)).toBe('silent');
    expect(resolveLogLevel('production', 'verbose')).toBe('info');
    expect(resolveLogLevel(undefined, undefined)).toBe('debug');
  });
});
