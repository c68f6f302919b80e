/**
 * Inventory of the environment keys tooldrive reads, and the merge of those
 * keys over the stored config.
 *
 * Each entry declares:
 *   - `key`         The exact env variable name.
 *   - `type`        Whether the value is a sensitive secret or a plain env var.
 *   - `aliases`     Vendor-standard names accepted when `key` is unset.
 *   - `description` Human-readable purpose.
 */

import { ConfigError } from '../core/errors.js';
import type { ProviderId } from '../providers/types.js';
import {
  MAX_ITERATIONS_RANGE,
  TIMEOUT_SECONDS_RANGE,
  apiKeyFor,
  clamp,
  isKnownProvider,
  type StoredConfig,
} from './json-config.js';

export type ConfigKeyType = 'secret' | 'env';

export interface ConfigKeySpec {
  key: string;
  type: ConfigKeyType;
  aliases?: readonly string[];
  description: string;
}

export const CONFIG_SCHEMA: readonly ConfigKeySpec[] = [
  {
    key: 'TOOLDRIVE_PROVIDER',
    type: 'env',
    description: 'Provider identifier: ollama, openrouter, huggingface or groq.',
  },
  {
    key: 'TOOLDRIVE_MODEL',
    type: 'env',
    description: "Model name. Empty selects the provider's default.",
  },
  {
    key: 'TOOLDRIVE_OLLAMA_HOST',
    type: 'env',
    aliases: ['OLLAMA_HOST'],
    description: 'Base URL of the Ollama server (default: http://localhost:11434).',
  },
  {
    key: 'TOOLDRIVE_OPENROUTER_API_KEY',
    type: 'secret',
    aliases: ['OPENROUTER_API_KEY'],
    description: 'API key for OpenRouter.',
  },
  {
    key: 'TOOLDRIVE_HUGGINGFACE_API_KEY',
    type: 'secret',
    aliases: ['HF_TOKEN'],
    description: 'Access token for the Hugging Face inference router.',
  },
  {
    key: 'TOOLDRIVE_GROQ_API_KEY',
    type: 'secret',
    aliases: ['GROQ_API_KEY'],
    description: 'API key for Groq.',
  },
  {
    key: 'TOOLDRIVE_MAX_ITERATIONS',
    type: 'env',
    description: 'Model calls allowed per user turn (1-100).',
  },
  {
    key: 'TOOLDRIVE_TIMEOUT',
    type: 'env',
    description: 'Timeout in seconds for shell commands and model requests (10-600).',
  },
  {
    key: 'TOOLDRIVE_CONFIG_PATH',
    type: 'env',
    description: 'Location of config.json (default: ~/.config/tooldrive/config.json).',
  },
  {
    key: 'TOOLDRIVE_LOG_DIR',
    type: 'env',
    description: 'Directory for daily Markdown logs (default: ~/.config/tooldrive/logs).',
  },
] as const;

/** Quick lookup map by key name. */
export const CONFIG_SCHEMA_MAP: ReadonlyMap<string, ConfigKeySpec> = new Map(
  CONFIG_SCHEMA.map((spec) => [spec.key, spec]),
);

export type EnvSource = Record<string, string | undefined>;

/** Effective settings for one session: stored config with environment overrides applied. */
export interface ResolvedSettings {
  provider: ProviderId;
  model: string | undefined;
  apiKey: string;
  ollamaHost: string;
  maxIterations: number;
  timeoutSeconds: number;
}

/** Value of `key`, falling back to its aliases; blank values count as unset. */
export function readEnvKey(env: EnvSource, key: string): string | undefined {
  const spec = CONFIG_SCHEMA_MAP.get(key);
  for (const candidate of [key, ...(spec?.aliases ?? [])]) {
    const value = env[candidate]?.trim();
    if (value) {
      return value;
    }
  }
  return undefined;
}

function readIntegerKey(env: EnvSource, key: string): number | undefined {
  const raw = readEnvKey(env, key);
  if (raw === undefined) {
    return undefined;
  }
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`${key} must be a whole number, received '${raw}'.`);
  }
  return Number.parseInt(raw, 10);
}

export function resolveSettings(config: StoredConfig, env: EnvSource = process.env): ResolvedSettings {
  const providerOverride = readEnvKey(env, 'TOOLDRIVE_PROVIDER')?.toLowerCase();
  if (providerOverride !== undefined && !isKnownProvider(providerOverride)) {
    throw new ConfigError(`Unknown provider '${providerOverride}' in TOOLDRIVE_PROVIDER.`);
  }
  const provider = providerOverride ?? config.provider;

  const envKeys: Record<ProviderId, string | undefined> = {
    ollama: undefined,
    openrouter: readEnvKey(env, 'TOOLDRIVE_OPENROUTER_API_KEY'),
    huggingface: readEnvKey(env, 'TOOLDRIVE_HUGGINGFACE_API_KEY'),
    groq: readEnvKey(env, 'TOOLDRIVE_GROQ_API_KEY'),
  };

  const maxIterations = readIntegerKey(env, 'TOOLDRIVE_MAX_ITERATIONS') ?? config.maxIterations;
  const timeoutSeconds = readIntegerKey(env, 'TOOLDRIVE_TIMEOUT') ?? config.timeoutSeconds;

  return {
    provider,
    model: readEnvKey(env, 'TOOLDRIVE_MODEL') ?? (config.model || undefined),
    apiKey: envKeys[provider] ?? apiKeyFor(config, provider),
    ollamaHost: readEnvKey(env, 'TOOLDRIVE_OLLAMA_HOST') ?? config.ollamaHost,
    maxIterations: clamp(maxIterations, MAX_ITERATIONS_RANGE),
    timeoutSeconds: clamp(timeoutSeconds, TIMEOUT_SECONDS_RANGE),
  };
}
