import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { requireSiegApiKey, resetEnvCache, validateEnv } from '../../../src/server/config/env.js';
import { ConfigurationError } from '../../../src/server/types/errors.js';

const KEYS = [
  'SIEG_API_KEY',
  'SIEG_BASE_URL',
  'SIEG_PAGE_SIZE',
  'SIEG_REQUEST_INTERVAL_MS',
  'DOWNLOAD_WINDOW_HOURS',
  'OUTPUT_DIR',
] as const;

describe('validateEnv', () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
    resetEnvCache();
  });

  afterEach(() => {
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    resetEnvCache();
  });

  it('applies defaults', () => {
    const env = validateEnv();
    expect(env).toMatchObject({
      NODE_ENV: 'test',
      SIEG_BASE_URL: 'https://api.sieg.com/BaixarXmls',
      SIEG_PAGE_SIZE: 50,
      SIEG_REQUEST_INTERVAL_MS: 3000,
      DOWNLOAD_WINDOW_HOURS: 2,
      OUTPUT_DIR: 'temp',
    });
    expect(env.SIEG_API_KEY).toBeUndefined();
  });

  it('reads configured values and caches them', () => {
    process.env.SIEG_PAGE_SIZE = '20';
    process.env.DOWNLOAD_WINDOW_HOURS = '6';
    process.env.OUTPUT_DIR = 'xmls';

    const env = validateEnv();
    expect(env.SIEG_PAGE_SIZE).toBe(20);
    expect(env.DOWNLOAD_WINDOW_HOURS).toBe(6);
    expect(env.OUTPUT_DIR).toBe('xmls');

    process.env.OUTPUT_DIR = 'other';
    expect(validateEnv()).toBe(env);
  });

  it('collects every invalid value', () => {
    process.env.SIEG_PAGE_SIZE = '500';
    process.env.DOWNLOAD_WINDOW_HOURS = '5';
    process.env.SIEG_BASE_URL = 'ftp://example.test';

    expect(() => validateEnv()).toThrow(ConfigurationError);
    expect(() => validateEnv()).toThrow('SIEG_BASE_URL: Invalid value "ftp://example.test"');
    expect(() => validateEnv()).toThrow('SIEG_PAGE_SIZE: Invalid value "500"');
    expect(() => validateEnv()).toThrow('DOWNLOAD_WINDOW_HOURS: Invalid value "5"');
  });

  it('requires the API key only when asked', () => {
    expect(() => requireSiegApiKey()).toThrow('SIEG_API_KEY');

    process.env.SIEG_API_KEY = 'test-key';
    resetEnvCache();
    expect(requireSiegApiKey()).toBe('test-key');
  });
});
