import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ConfigError } from '../core/errors.js';
import { DEFAULT_OLLAMA_HOST } from '../providers/ollama.js';
import type { ProviderId } from '../providers/types.js';

export interface StoredConfig {
    provider: ProviderId;
    /** Empty means the provider's default model. */
    model: string;
    ollamaHost: string;
    openRouterApiKey: string;
    huggingFaceApiKey: string;
    groqApiKey: string;
    maxIterations: number;
    timeoutSeconds: number;
}

export const DEFAULT_CONFIG: StoredConfig = {
    provider: 'ollama',
    model: '',
    ollamaHost: DEFAULT_OLLAMA_HOST,
    openRouterApiKey: '',
    huggingFaceApiKey: '',
    groqApiKey: '',
    maxIterations: 25,
    timeoutSeconds: 120,
};

export const MAX_ITERATIONS_RANGE = { min: 1, max: 100 } as const;
export const TIMEOUT_SECONDS_RANGE = { min: 10, max: 600 } as const;

const PROVIDER_IDS: readonly ProviderId[] = ['ollama', 'openrouter', 'huggingface', 'groq'];

export function isKnownProvider(value: string): value is ProviderId {
    return PROVIDER_IDS.some((id) => id === value);
}

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.TOOLDRIVE_CONFIG_PATH) {
        return path.resolve(process.env.TOOLDRIVE_CONFIG_PATH);
    }
    return path.join(os.homedir(), '.config', 'tooldrive', 'config.json');
}

export async function ensureConfigDir(configPath: string): Promise<void> {
    const dir = path.dirname(configPath);
    if (!existsSync(dir)) {
        await fs.mkdir(dir, { recursive: true });
    }
}

export function clamp(value: number, range: { min: number; max: number }): number {
    return Math.min(range.max, Math.max(range.min, Math.floor(value)));
}

function readStringField(record: Record<string, unknown>, key: keyof StoredConfig, fallback: string): string {
    const value = record[key];
    return typeof value === 'string' ? value.trim() : fallback;
}

function readNumberField(record: Record<string, unknown>, key: keyof StoredConfig, fallback: number): number {
    const value = record[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

/**
 * Overlay a loaded document on the defaults. Unknown keys and values of the
 * wrong type are dropped; numeric limits are clamped into range.
 */
export function mergeWithDefaults(loaded: unknown): StoredConfig {
    const record: Record<string, unknown> =
        typeof loaded === 'object' && loaded !== null && !Array.isArray(loaded) ? { ...loaded } : {};

    const provider = readStringField(record, 'provider', DEFAULT_CONFIG.provider).toLowerCase();

    return {
        provider: isKnownProvider(provider) ? provider : DEFAULT_CONFIG.provider,
        model: readStringField(record, 'model', DEFAULT_CONFIG.model),
        ollamaHost: readStringField(record, 'ollamaHost', DEFAULT_CONFIG.ollamaHost) || DEFAULT_CONFIG.ollamaHost,
        openRouterApiKey: readStringField(record, 'openRouterApiKey', ''),
        huggingFaceApiKey: readStringField(record, 'huggingFaceApiKey', ''),
        groqApiKey: readStringField(record, 'groqApiKey', ''),
        maxIterations: clamp(readNumberField(record, 'maxIterations', DEFAULT_CONFIG.maxIterations), MAX_ITERATIONS_RANGE),
        timeoutSeconds: clamp(
            readNumberField(record, 'timeoutSeconds', DEFAULT_CONFIG.timeoutSeconds),
            TIMEOUT_SECONDS_RANGE,
        ),
    };
}

/** Load the stored config. A missing or unreadable file yields the defaults. */
export async function readConfig(overridePath?: string): Promise<StoredConfig> {
    const targetPath = getConfigPath(overridePath);
    let rawData: string;
    try {
        rawData = await fs.readFile(targetPath, 'utf-8');
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            return mergeWithDefaults({});
        }
        throw new ConfigError(
            `Failed to read config file at ${targetPath}: ${error instanceof Error ? error.message : String(error)}`,
        );
    }

    try {
        return mergeWithDefaults(JSON.parse(rawData));
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`[Config] Ignoring malformed config at ${targetPath}: ${message}. Using defaults.`);
        return mergeWithDefaults({});
    }
}

/** Persist atomically through a temp file and rename; the file is owner-readable only. */
export async function writeConfig(config: StoredConfig, overridePath?: string): Promise<void> {
    const targetPath = getConfigPath(overridePath);
    await ensureConfigDir(targetPath);
    const tempPath = `${targetPath}.${Date.now()}.tmp`;
    try {
        const serialized = JSON.stringify(mergeWithDefaults(config), null, 2);
        await fs.writeFile(tempPath, serialized, { encoding: 'utf-8', mode: 0o600 });
        await fs.rename(tempPath, targetPath);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        await fs.rm(tempPath, { force: true });
        throw new ConfigError(`Failed to save config to ${targetPath}: ${message}`);
    }
}

export async function updateConfig(patch: Partial<StoredConfig>, overridePath?: string): Promise<StoredConfig> {
    const current = await readConfig(overridePath);
    const next = mergeWithDefaults({ ...current, ...patch });
    await writeConfig(next, overridePath);
    return next;
}

export async function resetConfig(overridePath?: string): Promise<StoredConfig> {
    const defaults = mergeWithDefaults({});
    await writeConfig(defaults, overridePath);
    return defaults;
}

/** Stored API key for `provider`; empty for providers that take none. */
export function apiKeyFor(config: StoredConfig, provider: ProviderId): string {
    switch (provider) {
        case 'openrouter':
            return config.openRouterApiKey;
        case 'huggingface':
            return config.huggingFaceApiKey;
        case 'groq':
            return config.groqApiKey;
        case 'ollama':
            return '';
    }
}

/** True when the selected provider has the credential it needs. */
export function isConfigured(config: StoredConfig): boolean {
    return config.provider === 'ollama' || apiKeyFor(config, config.provider).length > 0;
}

/** `abcd...wxyz` style preview for display. */
export function maskSecret(secret: string): string {
    if (!secret) return '(not set)';
    if (secret.length <= 8) return '****';
    return `${secret.slice(0, 4)}...${secret.slice(-4)}`;
}
