import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import {
  getEnvironment,
  validateEnvironment,
  clearEnvironmentCache,
  fixDockerUrl,
  isRunningInDocker,
  isSummarizationConfigured,
} from '../../../src/config/environment';

describe('Environment Configuration', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    clearEnvironmentCache();
  });

  afterEach(() => {
    process.env = originalEnv;
    clearEnvironmentCache();
  });

  test('should validate the test environment', () => {
    expect(() => validateEnvironment()).not.toThrow();
  });

  test('should use default values for optional variables', () => {
    delete process.env.DEFAULT_ENGINE;
    delete process.env.OPENAI_MODEL;

    const env = getEnvironment();

    expect(env.DEFAULT_ENGINE).toBe('google');
    expect(env.OPENAI_MODEL).toBe('gpt-3.5-turbo');
    expect(env.SEARCH_TIMEOUT_MS).toBe(30000);
    expect(env.PAGE_FETCH_TIMEOUT_MS).toBe(10000);
    expect(env.SCRAPE_TIMEOUT_MS).toBe(15000);
    expect(env.SUMMARY_TIMEOUT_MS).toBe(60000);
    expect(env.SUMMARY_MAX_INPUT_CHARS).toBe(8000);
  });

  test('should fall back to the local SearXNG URL', () => {
    delete process.env.SEARXNG_URL;

    const expected = isRunningInDocker() ? 'http://host.docker.internal:8080' : 'http://localhost:8080';
    expect(getEnvironment().SEARXNG_URL).toBe(expected);
  });

  test('should strip trailing slashes from service URLs', () => {
    process.env.SEARXNG_URL = 'http://searxng.test:8080/';
    process.env.OPENAI_API_URL = 'https://openrouter.ai/api/v1//';

    const env = getEnvironment();

    expect(env.SEARXNG_URL).toBe('http://searxng.test:8080');
    expect(env.OPENAI_API_URL).toBe('https://openrouter.ai/api/v1');
  });

  test('should coerce numeric timeouts', () => {
    process.env.PAGE_FETCH_TIMEOUT_MS = '2500';

    expect(getEnvironment().PAGE_FETCH_TIMEOUT_MS).toBe(2500);
  });

  test('should reject an unknown default engine', () => {
    process.env.DEFAULT_ENGINE = 'altavista';

    expect(() => getEnvironment()).toThrow('Environment validation failed');
  });

  test('should reject an invalid SearXNG URL', () => {
    process.env.SEARXNG_URL = 'not a url';

    expect(() => getEnvironment()).toThrow('SEARXNG_URL must be a valid URL');
  });

  test('should cache the parsed environment until cleared', () => {
    const first = getEnvironment();
    process.env.OPENAI_MODEL = 'other-model';

    expect(getEnvironment()).toBe(first);

    clearEnvironmentCache();
    expect(getEnvironment().OPENAI_MODEL).toBe('other-model');
  });

  test('should report whether summarization is configured', () => {
    expect(isSummarizationConfigured()).toBe(true);

    delete process.env.OPENAI_API_TOKEN;
    clearEnvironmentCache();

    expect(isSummarizationConfigured()).toBe(false);
  });

  test('fixDockerUrl should rewrite loopback hosts', () => {
    expect(fixDockerUrl('http://localhost:8080')).toBe('http://host.docker.internal:8080');
    expect(fixDockerUrl('http://127.0.0.1:8080')).toBe('http://host.docker.internal:8080');
    expect(fixDockerUrl('http://searxng:8080')).toBe('http://searxng:8080');
  });
});
