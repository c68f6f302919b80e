#!/usr/bin/env node
import 'dotenv/config';
import {
    handleConfigCli,
    handleHelpCli,
    handleModelsCli,
    handleUnknownCommand,
    handleVersionCli,
} from './core/cli.js';
import { handleLogsCli } from './core/logs-cli.js';
import { AgentLoop } from './core/agent-loop.js';
import { ChatSession, createConsoleObserver } from './core/session.js';
import { errorMessage } from './core/errors.js';
import { readConfig } from './config/json-config.js';
import { resolveSettings } from './config/env-schema.js';
import { createProviderFromSettings } from './providers/factory.js';
import { ToolRegistry } from './services/tool-registry.js';
import { createBuiltinTools } from './tools/builtin.js';
import { logThought, scrubSensitiveText, setVerboseLogging } from './utils/logger.js';

const argv = process.argv.slice(2);

async function main(): Promise<void> {
    // ── One-shot CLI commands ────────────────────────────────────────────────
    if (handleHelpCli(argv) || handleVersionCli(argv) || handleUnknownCommand(argv)) return;
    if (await handleConfigCli(argv)) return;
    if (handleModelsCli(argv)) return;
    if (await handleLogsCli(argv)) return;

    // ── Interactive session ──────────────────────────────────────────────────
    setVerboseLogging(argv.includes('--verbose'));

    const settings = resolveSettings(await readConfig());
    const provider = createProviderFromSettings({
        provider: settings.provider,
        model: settings.model,
        apiKey: settings.apiKey,
        ollamaHost: settings.ollamaHost,
        timeoutMs: settings.timeoutSeconds * 1000,
    });

    const tools = new ToolRegistry();
    tools.registerMany(createBuiltinTools());

    const workingDir = process.cwd();
    const agent = new AgentLoop({
        provider,
        tools,
        workingDir,
        maxIterations: settings.maxIterations,
        observer: createConsoleObserver(),
        toolTimeoutMs: settings.timeoutSeconds * 1000,
    });

    void logThought(`[tooldrive] Session on ${provider.name}/${provider.model} in ${workingDir}.`);

    const session = new ChatSession({
        agent,
        banner: [
            `tooldrive (${provider.name} · ${provider.model})`,
            `Working directory: ${workingDir}`,
            "Type 'help' for commands, 'exit' to quit.",
        ].join('\n'),
    });
    await session.start();
}

main().catch((error: unknown) => {
    console.error(`[tooldrive] ${scrubSensitiveText(errorMessage(error))}`);
    process.exitCode = 1;
});
