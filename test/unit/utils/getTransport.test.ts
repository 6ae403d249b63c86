import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { getTransport } from '../../../src/utils/getTransport';
import { clearEnvironmentCache } from '../../../src/config/environment';

describe('getTransport', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    clearEnvironmentCache();
  });

  afterEach(() => {
    process.env = originalEnv;
    clearEnvironmentCache();
  });

  test('returns no transport under test', () => {
    expect(getTransport()).toBeUndefined();
  });

  test('writes plain JSON to stderr in production', () => {
    process.env.NODE_ENV = 'production';

    expect(getTransport()).toEqual({ target: 'pino/file', options: { destination: 2 } });
  });
});
