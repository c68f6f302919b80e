import {
  MAX_ITERATIONS_RANGE,
  isKnownProvider,
  maskSecret,
  readConfig,
  resetConfig,
  updateConfig,
  getConfigPath,
  type StoredConfig,
} from '../config/json-config.js';
import { listProviders, modelsFor } from '../providers/factory.js';
import type { ProviderId } from '../providers/types.js';
import { errorMessage } from './errors.js';

export const VERSION = '0.1.0';

// ── Help text ────────────────────────────────────────────────────────────────

const HELP_TEXT = `
Usage: tooldrive [command] [options]

Commands:
  (none)              Start an interactive session in the current directory
  config              Show or change the stored configuration
  models              List providers and their recommended models
  logs                Print today's log file

Options:
  --help, -h          Show this help message
  --version, -v       Print the version
  --verbose           Mirror log entries to stderr (session only)

Config options:
  --show                    Print the stored configuration (keys masked)
  --provider <id>           ollama | openrouter | huggingface | groq
  --model <name>            Model name; "" selects the provider default
  --api-key <key>           Store a key for the selected (or given) provider
  --max-iterations <n>      Model calls per turn (1-100)
  --reset                   Restore the defaults

Examples:
  tooldrive
  tooldrive config --provider groq --api-key test-secret
  tooldrive config --show
  tooldrive models --provider ollama
  tooldrive logs --follow
`.trim();

const KNOWN_COMMANDS = new Set(['config', 'models', 'logs']);
const SESSION_FLAGS = new Set(['--verbose']);

// ── Argument helpers ─────────────────────────────────────────────────────────

/**
 * Value following `flag`. `undefined` when the flag is absent; throws when the
 * flag is the last argument.
 */
export function readFlagValue(argv: readonly string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  if (index === -1) return undefined;
  const value = argv[index + 1];
  if (value === undefined) {
    throw new Error(`${flag} requires a value.`);
  }
  return value;
}

function fail(message: string): true {
  console.error(`[tooldrive] ${message}`);
  process.exitCode = 1;
  return true;
}

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle `--help` / `-h`.
 * Returns `true` when the flag was present and help was printed.
 */
export function handleHelpCli(argv: string[]): boolean {
  if (!argv.includes('--help') && !argv.includes('-h')) return false;
  console.log(HELP_TEXT);
  process.exitCode = 0;
  return true;
}

export function handleVersionCli(argv: string[]): boolean {
  if (!argv.includes('--version') && !argv.includes('-v')) return false;
  console.log(`tooldrive ${VERSION}`);
  process.exitCode = 0;
  return true;
}

export function formatConfig(config: StoredConfig, configPath: string): string {
  return [
    `Config file:     ${configPath}`,
    `Provider:        ${config.provider}`,
    `Model:           ${config.model || '(provider default)'}`,
    `Ollama host:     ${config.ollamaHost}`,
    `OpenRouter key:  ${maskSecret(config.openRouterApiKey)}`,
    `HuggingFace key: ${maskSecret(config.huggingFaceApiKey)}`,
    `Groq key:        ${maskSecret(config.groqApiKey)}`,
    `Max iterations:  ${config.maxIterations}`,
    `Timeout:         ${config.timeoutSeconds}s`,
  ].join('\n');
}

function apiKeyPatch(provider: ProviderId, key: string): Partial<StoredConfig> | undefined {
  switch (provider) {
    case 'openrouter':
      return { openRouterApiKey: key };
    case 'huggingface':
      return { huggingFaceApiKey: key };
    case 'groq':
      return { groqApiKey: key };
    case 'ollama':
      return undefined;
  }
}

/**
 * Handle the `config` command.
 * With no option, or with `--show`, prints the stored configuration.
 */
export async function handleConfigCli(argv: string[], configPath?: string): Promise<boolean> {
  if (argv[0] !== 'config') return false;
  const args = argv.slice(1);
  const resolvedPath = getConfigPath(configPath);

  try {
    if (args.includes('--reset')) {
      const defaults = await resetConfig(configPath);
      console.log('[tooldrive] Configuration reset to defaults.');
      console.log(formatConfig(defaults, resolvedPath));
      process.exitCode = 0;
      return true;
    }

    const patch: Partial<StoredConfig> = {};
    const current = await readConfig(configPath);

    const providerArg = readFlagValue(args, '--provider')?.trim().toLowerCase();
    if (providerArg !== undefined) {
      if (!isKnownProvider(providerArg)) {
        return fail(`Unknown provider '${providerArg}'. Run 'tooldrive models' to list providers.`);
      }
      patch.provider = providerArg;
    }

    const modelArg = readFlagValue(args, '--model');
    if (modelArg !== undefined) {
      patch.model = modelArg.trim();
    }

    const keyArg = readFlagValue(args, '--api-key');
    if (keyArg !== undefined) {
      const target = patch.provider ?? current.provider;
      const keyPatch = apiKeyPatch(target, keyArg.trim());
      if (!keyPatch) {
        return fail(`Provider '${target}' does not take an API key.`);
      }
      Object.assign(patch, keyPatch);
    }

    const iterationsArg = readFlagValue(args, '--max-iterations');
    if (iterationsArg !== undefined) {
      const parsed = Number.parseInt(iterationsArg, 10);
      if (
        !/^\d+$/.test(iterationsArg) ||
        parsed < MAX_ITERATIONS_RANGE.min ||
        parsed > MAX_ITERATIONS_RANGE.max
      ) {
        return fail(
          `--max-iterations must be a whole number between ${MAX_ITERATIONS_RANGE.min} and ${MAX_ITERATIONS_RANGE.max}.`,
        );
      }
      patch.maxIterations = parsed;
    }

    if (Object.keys(patch).length === 0) {
      console.log(formatConfig(current, resolvedPath));
      process.exitCode = 0;
      return true;
    }

    const updated = await updateConfig(patch, configPath);
    console.log(`[tooldrive] Saved ${Object.keys(patch).join(', ')}.`);
    if (args.includes('--show')) {
      console.log(formatConfig(updated, resolvedPath));
    }
    process.exitCode = 0;
  } catch (error) {
    return fail(errorMessage(error));
  }

  return true;
}

/**
 * Handle the `models` command.
 * Lists every provider, or the recommended models of one with `--provider`.
 */
export function handleModelsCli(argv: string[]): boolean {
  if (argv[0] !== 'models') return false;

  try {
    const providerArg = readFlagValue(argv, '--provider');
    const providers = listProviders().filter(
      (info) => providerArg === undefined || info.id === providerArg.trim().toLowerCase(),
    );
    if (providers.length === 0) {
      return fail(`Unknown provider '${providerArg ?? ''}'.`);
    }

    const lines: string[] = [];
    for (const info of providers) {
      const keyNote = info.requiresApiKey ? 'API key required' : 'no API key';
      lines.push(`${info.id}: ${info.description} (${keyNote})`);
      for (const model of modelsFor(info.id)) {
        lines.push(`  ${model}${model === info.defaultModel ? '  (default)' : ''}`);
      }
    }
    console.log(lines.join('\n'));
    process.exitCode = 0;
  } catch (error) {
    return fail(errorMessage(error));
  }
  return true;
}

/**
 * Guard against unknown first arguments.
 * Flags fall through to the session; bare words that are not commands fail.
 */
export function handleUnknownCommand(argv: string[]): boolean {
  const command = argv[0];
  if (command === undefined) return false;
  if (KNOWN_COMMANDS.has(command)) return false;
  if (command.startsWith('--') && SESSION_FLAGS.has(command)) return false;

  console.error(`[tooldrive] Unknown command: '${command}'`);
  console.error("Run 'tooldrive --help' for the list of commands.");
  process.exitCode = 1;
  return true;
}
