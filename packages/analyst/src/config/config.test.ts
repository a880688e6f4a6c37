import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';
import { ConfigValidationError } from '../types/index.js';

function configError(env: Record<string, string>): ConfigValidationError {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected loadConfig to throw');
}

describe('loadConfig', () => {
  it('applies defaults around a single API key', () => {
    const config = loadConfig({ OPENAI_API_KEY: 'test-secret' });

    expect(config).toEqual({
      llm: {
        provider: 'openai',
        apiKey: 'test-secret',
        baseUrl: null,
        model: 'gpt-4o-mini',
        timeoutMs: 30000,
        maxRetries: 3,
      },
      store: { url: null, apiKey: null, dataPath: null, timeoutMs: 5000 },
      catalogPath: null,
      log: { level: 'info', serviceName: 'pitchside' },
    });
  });

  it('prefers LLM_API_KEY over the provider-specific key', () => {
    const config = loadConfig({
      LLM_PROVIDER: 'anthropic',
      LLM_API_KEY: 'test-secret',
      ANTHROPIC_API_KEY: 'other-secret',
    });

    expect(config.llm.apiKey).toBe('test-secret');
    expect(config.llm.model).toBe('claude-3-5-haiku-latest');
  });

  it('falls back to the key of the selected provider', () => {
    const config = loadConfig({
      LLM_PROVIDER: 'anthropic',
      OPENAI_API_KEY: 'wrong-secret',
      ANTHROPIC_API_KEY: 'test-secret',
    });

    expect(config.llm.apiKey).toBe('test-secret');
  });

  it('coerces numeric settings and keeps store options', () => {
    const config = loadConfig({
      OPENAI_API_KEY: 'test-secret',
      MODEL_TIMEOUT_MS: '1500',
      STORE_TIMEOUT_MS: '250',
      MODEL_MAX_RETRIES: '0',
      STORE_URL: 'http://store.test/api',
      STORE_API_KEY: 'test-store-secret',
      CATALOG_PATH: './catalog.json',
      LOG_LEVEL: 'debug',
    });

    expect(config.llm.timeoutMs).toBe(1500);
    expect(config.llm.maxRetries).toBe(0);
    expect(config.store).toEqual({
      url: 'http://store.test/api',
      apiKey: 'test-store-secret',
      dataPath: null,
      timeoutMs: 250,
    });
    expect(config.catalogPath).toBe('./catalog.json');
    expect(config.log.level).toBe('debug');
  });

  it('treats empty values as unset', () => {
    expect(configError({ OPENAI_API_KEY: '  ', LLM_MODEL: '' }).missing).toEqual(['LLM_API_KEY']);
  });

  it('lets an openai-compatible server run without a key', () => {
    const config = loadConfig({
      LLM_PROVIDER: 'openai-compatible',
      LLM_BASE_URL: 'http://localhost:11434',
      LLM_MODEL: 'llama3.1',
    });

    expect(config.llm).toMatchObject({ apiKey: '', baseUrl: 'http://localhost:11434', model: 'llama3.1' });
  });

  it('requires a base URL and model for an openai-compatible server', () => {
    const error = configError({ LLM_PROVIDER: 'openai-compatible' });

    expect(error.missing).toEqual(['LLM_MODEL', 'LLM_BASE_URL']);
  });

  it('separates invalid values from missing ones', () => {
    const error = configError({
      LLM_PROVIDER: 'gemini',
      MODEL_TIMEOUT_MS: 'soon',
      STORE_URL: 'not a url',
    });

    expect(error.missing).toEqual([]);
    expect(error.invalid).toEqual(['LLM_PROVIDER', 'MODEL_TIMEOUT_MS', 'STORE_URL']);
    expect(error.kind).toBe('ConfigValidationError');
  });
});
