import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import {
  AnthropicProvider,
  GeminiProvider,
  OpenAIProvider,
  createLLMProvider,
  getLLMProvider,
  hasApiKey,
  resetProvider,
} from '../../src/server/llm';

describe('LLM Provider Factory', () => {
  const originalEnv = process.env.LLM_PROVIDER;

  beforeEach(() => {
    resetProvider();
  });

  afterEach(() => {
    if (originalEnv === undefined) {
      delete process.env.LLM_PROVIDER;
    } else {
      process.env.LLM_PROVIDER = originalEnv;
    }
    resetProvider();
  });

  it('should default to Anthropic when LLM_PROVIDER is not set', () => {
    delete process.env.LLM_PROVIDER;
    const provider = getLLMProvider();
    expect(provider).toBeInstanceOf(AnthropicProvider);
    expect(provider.name).toBe('anthropic');
  });

  it('should select OpenAI and Gemini by name', () => {
    process.env.LLM_PROVIDER = 'openai';
    expect(getLLMProvider()).toBeInstanceOf(OpenAIProvider);

    process.env.LLM_PROVIDER = 'gemini';
    expect(getLLMProvider()).toBeInstanceOf(GeminiProvider);
  });

  it('should return the cached provider while LLM_PROVIDER is unchanged', () => {
    process.env.LLM_PROVIDER = 'openai';
    const first = getLLMProvider();
    const second = getLLMProvider();
    expect(second).toBe(first);
  });

  it('should build a new provider after resetProvider()', () => {
    process.env.LLM_PROVIDER = 'openai';
    const first = getLLMProvider();
    resetProvider();
    expect(getLLMProvider()).not.toBe(first);
  });

  it('should throw for an unsupported provider', () => {
    process.env.LLM_PROVIDER = 'mystery';
    expect(() => getLLMProvider()).toThrow(
      'Unsupported LLM_PROVIDER: "mystery". Supported values: anthropic, openai, gemini',
    );
  });
});

describe('createLLMProvider', () => {
  it('should build the named provider without touching the environment cache', () => {
    const provider = createLLMProvider('gemini', { apiKey: 'test-secret', model: 'test-model' });
    expect(provider).toBeInstanceOf(GeminiProvider);
    expect(provider.name).toBe('gemini');
  });
});

describe('hasApiKey', () => {
  it('should accept an explicit key', () => {
    expect(hasApiKey('openai', 'test-secret', {})).toBe(true);
  });

  it('should fall back to LLM_API_KEY, then the provider variable', () => {
    expect(hasApiKey('openai', undefined, { LLM_API_KEY: 'test-secret' })).toBe(true);
    expect(hasApiKey('gemini', undefined, { GOOGLE_API_KEY: 'test-secret' })).toBe(true);
    expect(hasApiKey('anthropic', undefined, { OPENAI_API_KEY: 'test-secret' })).toBe(false);
  });
});
