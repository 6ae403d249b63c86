import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { InitializationService } from '../../../src/services/initialization';
import { clearEnvironmentCache } from '../../../src/config/environment';

describe('Initialization Service', () => {
  let initService: InitializationService;
  const originalEnv = process.env;

  beforeEach(() => {
    initService = new InitializationService();
    process.env = { ...originalEnv };
    clearEnvironmentCache();
  });

  afterEach(() => {
    process.env = originalEnv;
    clearEnvironmentCache();
  });

  test('should initialize successfully with valid environment', async () => {
    await expect(initService.initialize()).resolves.toBeUndefined();
  });

  test('should initialize without a summarization token', async () => {
    delete process.env.OPENAI_API_TOKEN;

    await expect(initService.initialize()).resolves.toBeUndefined();
  });

  test('should fail initialization with an unknown default engine', async () => {
    process.env.DEFAULT_ENGINE = 'altavista';

    await expect(initService.initialize()).rejects.toThrow('Environment validation failed');
  });

  test('should fail initialization with a malformed SearXNG URL', async () => {
    process.env.SEARXNG_URL = 'not a url';

    await expect(initService.initialize()).rejects.toThrow('SEARXNG_URL must be a valid URL');
  });
});
