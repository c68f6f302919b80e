import { describe, expect, it } from 'vitest';
import { ProviderConfigError, ProviderNotFoundError } from '../../src/core/errors.js';
import {
  createProvider,
  createProviderFromSettings,
  isProviderId,
  listProviders,
  modelsFor,
} from '../../src/providers/factory.js';
import { OllamaAdapter } from '../../src/providers/ollama.js';
import { OpenRouterAdapter } from '../../src/providers/openrouter.js';

describe('createProvider', () => {
  it('matches identifiers case-insensitively', () => {
    const provider = createProvider(' Ollama ');
    expect(provider).toBeInstanceOf(OllamaAdapter);
    expect(provider.name).toBe('ollama');
  });

  it('passes options to the adapter', () => {
    const provider = createProvider('openrouter', { apiKey: 'test-secret', model: 'openai/gpt-4o' });
    expect(provider).toBeInstanceOf(OpenRouterAdapter);
    expect(provider.model).toBe('openai/gpt-4o');
  });

  it('rejects unknown identifiers', () => {
    expect(() => createProvider('acme')).toThrow(new ProviderNotFoundError('acme'));
    expect(() => createProvider('acme')).toThrow("Provider 'acme' is not available");
  });

  it('surfaces missing credentials from the adapter', () => {
    expect(() => createProvider('huggingface')).toThrow(ProviderConfigError);
  });
});

describe('createProviderFromSettings', () => {
  it('applies the Ollama host only to Ollama', () => {
    const local = createProviderFromSettings({ provider: 'ollama', model: 'llama3.1:8b', ollamaHost: 'http://gpu-box:11434' });
    expect(local).toBeInstanceOf(OllamaAdapter);
    expect(local instanceof OllamaAdapter ? local.host : '').toBe('http://gpu-box:11434');
    expect(local.model).toBe('llama3.1:8b');

    const hosted = createProviderFromSettings({ provider: 'openrouter', apiKey: 'test-secret', ollamaHost: 'http://gpu-box:11434' });
    expect(hosted.model).toBe('deepseek/deepseek-chat');
  });

  it('falls back to the default model for a blank model', () => {
    expect(createProviderFromSettings({ provider: 'ollama', model: '  ' }).model).toBe('qwen2.5-coder:7b');
  });
});

describe('provider catalogue', () => {
  it('lists every provider with its key requirement', () => {
    expect(listProviders().map((info) => [info.id, info.requiresApiKey])).toEqual([
      ['ollama', false],
      ['openrouter', true],
      ['huggingface', true],
      ['groq', true],
    ]);
  });

  it('returns a copy of the recommended models', () => {
    const models = modelsFor('OLLAMA');
    expect(models[0]).toBe('qwen2.5-coder:7b');
    models.length = 0;
    expect(modelsFor('ollama')).toHaveLength(OllamaAdapter.RECOMMENDED_MODELS.length);
  });

  it('narrows provider identifiers', () => {
    expect(isProviderId('groq')).toBe(true);
    expect(isProviderId('Groq')).toBe(false);
    expect(isProviderId('toString')).toBe(false);
  });
});
