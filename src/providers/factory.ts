import { ProviderNotFoundError } from '../core/errors.js';
import { GroqAdapter } from './groq.js';
import { HuggingFaceAdapter } from './huggingface.js';
import { OllamaAdapter } from './ollama.js';
import { OpenRouterAdapter } from './openrouter.js';
import type { ModelAdapter, ProviderId, ProviderOptions } from './types.js';

export interface ProviderInfo {
  id: ProviderId;
  description: string;
  requiresApiKey: boolean;
  defaultModel: string;
}

interface ProviderRegistration extends ProviderInfo {
  models: readonly string[];
  create(options: ProviderOptions): ModelAdapter;
}

export interface ProviderSettings {
  provider: string;
  model?: string;
  apiKey?: string;
  ollamaHost?: string;
  timeoutMs?: number;
}

const PROVIDERS: Record<ProviderId, ProviderRegistration> = {
  ollama: {
    id: 'ollama',
    description: 'Local models served by Ollama',
    requiresApiKey: false,
    defaultModel: OllamaAdapter.DEFAULT_MODEL,
    models: OllamaAdapter.RECOMMENDED_MODELS,
    create: (options) => new OllamaAdapter(options),
  },
  openrouter: {
    id: 'openrouter',
    description: 'Hosted models through OpenRouter',
    requiresApiKey: true,
    defaultModel: OpenRouterAdapter.DEFAULT_MODEL,
    models: OpenRouterAdapter.RECOMMENDED_MODELS,
    create: (options) => new OpenRouterAdapter(options),
  },
  huggingface: {
    id: 'huggingface',
    description: 'Open models on the Hugging Face inference router',
    requiresApiKey: true,
    defaultModel: HuggingFaceAdapter.DEFAULT_MODEL,
    models: HuggingFaceAdapter.RECOMMENDED_MODELS,
    create: (options) => new HuggingFaceAdapter(options),
  },
  groq: {
    id: 'groq',
    description: 'Low-latency hosted models on Groq',
    requiresApiKey: true,
    defaultModel: GroqAdapter.DEFAULT_MODEL,
    models: GroqAdapter.RECOMMENDED_MODELS,
    create: (options) => new GroqAdapter(options),
  },
};

export function isProviderId(value: string): value is ProviderId {
  return Object.hasOwn(PROVIDERS, value);
}

function registrationFor(id: string): ProviderRegistration {
  const normalized = id.trim().toLowerCase();
  if (!isProviderId(normalized)) {
    throw new ProviderNotFoundError(id);
  }
  return PROVIDERS[normalized];
}

/** Instantiate an adapter by identifier. Unknown identifiers raise `ProviderNotFoundError`. */
export function createProvider(id: string, options: ProviderOptions = {}): ModelAdapter {
  return registrationFor(id).create(options);
}

export function createProviderFromSettings(settings: ProviderSettings): ModelAdapter {
  return createProvider(settings.provider, {
    model: settings.model,
    apiKey: settings.apiKey,
    host: settings.provider.trim().toLowerCase() === 'ollama' ? settings.ollamaHost : undefined,
    timeoutMs: settings.timeoutMs,
  });
}

export function listProviders(): ProviderInfo[] {
  return Object.values(PROVIDERS).map(({ id, description, requiresApiKey, defaultModel }) => ({
    id,
    description,
    requiresApiKey,
    defaultModel,
  }));
}

/** Recommended models for a provider, without instantiating it. */
export function modelsFor(id: string): string[] {
  return [...registrationFor(id).models];
}
