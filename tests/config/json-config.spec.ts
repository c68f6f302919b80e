import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import {
    DEFAULT_CONFIG,
    apiKeyFor,
    clamp,
    getConfigPath,
    isConfigured,
    maskSecret,
    mergeWithDefaults,
    readConfig,
    resetConfig,
    updateConfig,
    writeConfig,
} from '../../src/config/json-config.js';

describe('json config', () => {
    let tempDir = '';
    let tempConfigPath = '';

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tooldrive-config-'));
        tempConfigPath = path.join(tempDir, 'nested', 'config.json');
        vi.stubEnv('TOOLDRIVE_CONFIG_PATH', tempConfigPath);
    });

    afterEach(async () => {
        vi.unstubAllEnvs();
        vi.restoreAllMocks();
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('resolves the path from the override, then the environment, then the home directory', () => {
        expect(getConfigPath('/tmp/explicit.json')).toBe(path.resolve('/tmp/explicit.json'));
        expect(getConfigPath()).toBe(tempConfigPath);
        vi.stubEnv('TOOLDRIVE_CONFIG_PATH', '');
        expect(getConfigPath()).toBe(path.join(os.homedir(), '.config', 'tooldrive', 'config.json'));
    });

    it('loads defaults when the file is missing', async () => {
        await expect(readConfig()).resolves.toEqual(DEFAULT_CONFIG);
    });

    it('saves and reads the config, creating the directory', async () => {
        await writeConfig({ ...DEFAULT_CONFIG, provider: 'groq', groqApiKey: 'test-secret', maxIterations: 40 });

        const loaded = await readConfig();
        expect(loaded.provider).toBe('groq');
        expect(loaded.groqApiKey).toBe('test-secret');
        expect(loaded.maxIterations).toBe(40);
    });

    it('writes the file readable by the owner only', async () => {
        await writeConfig(DEFAULT_CONFIG);
        const info = await fs.stat(tempConfigPath);
        if (process.platform !== 'win32') {
            expect(info.mode & 0o777).toBe(0o600);
        }
        const leftovers = (await fs.readdir(path.dirname(tempConfigPath))).filter((name) => name.endsWith('.tmp'));
        expect(leftovers).toEqual([]);
    });

    it('falls back to defaults with a warning on malformed JSON', async () => {
        const warnings: string[] = [];
        vi.spyOn(console, 'warn').mockImplementation((...args) => warnings.push(args.join(' ')));
        await fs.mkdir(path.dirname(tempConfigPath), { recursive: true });
        await fs.writeFile(tempConfigPath, '{ malformed: true ', 'utf8');

        await expect(readConfig()).resolves.toEqual(DEFAULT_CONFIG);
        expect(warnings).toHaveLength(1);
        expect(warnings[0]).toMatch(/^\[Config\] Ignoring malformed config at /);
    });

    it('merges a patch over the stored values', async () => {
        await updateConfig({ provider: 'openrouter', openRouterApiKey: 'test-secret' });
        const updated = await updateConfig({ model: 'deepseek/deepseek-chat' });

        expect(updated.provider).toBe('openrouter');
        expect(updated.model).toBe('deepseek/deepseek-chat');
        expect(await readConfig()).toEqual(updated);
    });

    it('resets to the defaults', async () => {
        await updateConfig({ provider: 'groq' });
        await expect(resetConfig()).resolves.toEqual(DEFAULT_CONFIG);
        await expect(readConfig()).resolves.toEqual(DEFAULT_CONFIG);
    });
});

describe('mergeWithDefaults', () => {
    it('drops unknown keys and values of the wrong type', () => {
        const merged = mergeWithDefaults({ provider: 'GROQ', model: 7, theme: 'dark', maxIterations: '10' });
        expect(merged).toEqual({ ...DEFAULT_CONFIG, provider: 'groq' });
    });

    it('falls back to ollama for unknown providers', () => {
        expect(mergeWithDefaults({ provider: 'acme' }).provider).toBe('ollama');
    });

    it('clamps numeric limits', () => {
        const merged = mergeWithDefaults({ maxIterations: 500, timeoutSeconds: 1 });
        expect(merged.maxIterations).toBe(100);
        expect(merged.timeoutSeconds).toBe(10);
    });

    it('treats non-objects as empty', () => {
        expect(mergeWithDefaults(null)).toEqual(DEFAULT_CONFIG);
        expect(mergeWithDefaults([1, 2])).toEqual(DEFAULT_CONFIG);
    });

    it('restores the default host when it is blank', () => {
        expect(mergeWithDefaults({ ollamaHost: '  ' }).ollamaHost).toBe(DEFAULT_CONFIG.ollamaHost);
    });
});

describe('helpers', () => {
    it('clamp floors and bounds the value', () => {
        expect(clamp(7.9, { min: 1, max: 10 })).toBe(7);
        expect(clamp(-3, { min: 1, max: 10 })).toBe(1);
    });

    it('apiKeyFor picks the key of the provider', () => {
        const config = { ...DEFAULT_CONFIG, openRouterApiKey: 'or', huggingFaceApiKey: 'hf', groqApiKey: 'gq' };
        expect(apiKeyFor(config, 'openrouter')).toBe('or');
        expect(apiKeyFor(config, 'huggingface')).toBe('hf');
        expect(apiKeyFor(config, 'groq')).toBe('gq');
        expect(apiKeyFor(config, 'ollama')).toBe('');
    });

    it('isConfigured requires a key for hosted providers', () => {
        expect(isConfigured(DEFAULT_CONFIG)).toBe(true);
        expect(isConfigured({ ...DEFAULT_CONFIG, provider: 'groq' })).toBe(false);
        expect(isConfigured({ ...DEFAULT_CONFIG, provider: 'groq', groqApiKey: 'test-secret' })).toBe(true);
    });

    it('maskSecret shows only the ends of long secrets', () => {
        expect(maskSecret('')).toBe('(not set)');
        expect(maskSecret('short')).toBe('****');
        expect(maskSecret('test-secret-value')).toBe('test...alue');
    });
});
