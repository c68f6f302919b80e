import * as readline from 'node:readline';
import type { AgentLoop, AgentObserver } from './agent-loop.js';
import { AgentCancelledError, MaxIterationsError, errorMessage } from './errors.js';
import type { ToolArguments, ToolCall, ToolResult } from './types.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';

const ARGUMENT_PREVIEW_LENGTH = 60;

const SESSION_HELP = `
Commands:
  exit, quit   Leave the session
  clear        Forget the conversation (the system prompt is kept)
  help         Show this message

Press Ctrl+C while the agent is working to cancel the current turn.
`.trim();

export type SessionCommand =
    | { kind: 'exit' }
    | { kind: 'clear' }
    | { kind: 'help' }
    | { kind: 'empty' }
    | { kind: 'prompt'; text: string };

export function parseSessionCommand(line: string): SessionCommand {
    const text = line.trim();
    switch (text.toLowerCase()) {
        case '':
            return { kind: 'empty' };
        case 'exit':
        case 'quit':
            return { kind: 'exit' };
        case 'clear':
            return { kind: 'clear' };
        case 'help':
            return { kind: 'help' };
        default:
            return { kind: 'prompt', text };
    }
}

/** Single-line preview of tool arguments, e.g. `file_path="src/a.ts", limit=20`. */
export function formatArgumentsPreview(args: Readonly<ToolArguments>): string {
    const parts = Object.entries(args).map(([key, value]) => `${key}=${String(JSON.stringify(value))}`);
    const joined = parts.join(', ').replace(/\s+/g, ' ');
    return joined.length > ARGUMENT_PREVIEW_LENGTH ? `${joined.slice(0, ARGUMENT_PREVIEW_LENGTH)}...` : joined;
}

/** Observer that prints one line when each tool starts and one when it ends. */
export function createConsoleObserver(output: NodeJS.WritableStream = process.stdout): AgentObserver {
    const names = new Map<string, string>();
    return {
        onToolStart(call: ToolCall): void {
            names.set(call.id, call.name);
            output.write(`\n  -> ${call.name}(${scrubSensitiveText(formatArgumentsPreview(call.arguments))})\n`);
        },
        onToolEnd(result: ToolResult): void {
            const name = names.get(result.toolCallId) ?? 'tool';
            names.delete(result.toolCallId);
            const firstLine = result.content.split('\n', 1)[0] ?? '';
            output.write(result.isError ? `  x  ${name}: ${firstLine}\n` : `  ok ${name}\n`);
        },
    };
}

export interface SessionOptions {
    agent: AgentLoop;
    input?: NodeJS.ReadableStream;
    output?: NodeJS.WritableStream;
    /** Printed once before the first prompt. */
    banner?: string;
}

/**
 * Line-oriented interactive session over an {@link AgentLoop}.
 * Each non-command line is one user turn; replies are streamed as they arrive.
 */
export class ChatSession {
    readonly #agent: AgentLoop;
    readonly #input: NodeJS.ReadableStream;
    readonly #output: NodeJS.WritableStream;
    readonly #banner: string | undefined;
    #activeTurn: AbortController | undefined;

    constructor(options: SessionOptions) {
        this.#agent = options.agent;
        this.#input = options.input ?? process.stdin;
        this.#output = options.output ?? process.stdout;
        this.#banner = options.banner;
    }

    get busy(): boolean {
        return this.#activeTurn !== undefined;
    }

    /** Abort the running turn. Returns false when no turn is running. */
    cancel(): boolean {
        if (!this.#activeTurn) return false;
        this.#activeTurn.abort();
        return true;
    }

    /** Resolves when the user exits or the input ends. */
    async start(): Promise<void> {
        const rl = readline.createInterface({ input: this.#input, output: this.#output });
        rl.on('SIGINT', () => {
            if (this.cancel()) {
                this.#output.write('\n[tooldrive] Cancelling...\n');
            } else {
                rl.close();
            }
        });

        if (this.#banner) {
            this.#output.write(`${this.#banner}\n`);
        }
        void logThought('[Session] Started.');

        rl.setPrompt('> ');
        rl.prompt();
        try {
            for await (const line of rl) {
                const command = parseSessionCommand(line);
                if (command.kind === 'exit') break;
                await this.handle(command);
                rl.prompt();
            }
        } finally {
            rl.close();
            void logThought('[Session] Ended.');
        }
    }

    async handle(command: SessionCommand): Promise<void> {
        switch (command.kind) {
            case 'empty':
            case 'exit':
                return;
            case 'help':
                this.#output.write(`${SESSION_HELP}\n`);
                return;
            case 'clear':
                this.#agent.reset();
                this.#output.write('Conversation cleared.\n');
                return;
            case 'prompt':
                await this.runTurn(command.text);
                return;
        }
    }

    /** Stream one turn to the output. Errors are printed; the session keeps going. */
    async runTurn(text: string): Promise<void> {
        const controller = new AbortController();
        this.#activeTurn = controller;
        try {
            const turn = this.#agent.stream(text, { signal: controller.signal });
            let step = await turn.next();
            while (!step.done) {
                this.#output.write(step.value);
                step = await turn.next();
            }
            this.#output.write('\n');
        } catch (error) {
            this.#output.write(`\n${describeTurnError(error)}\n`);
            void logThought(`[Session] Turn failed: ${errorMessage(error)}`);
        } finally {
            this.#activeTurn = undefined;
        }
    }
}

export function describeTurnError(error: unknown): string {
    if (error instanceof AgentCancelledError) {
        return '[Cancelled]';
    }
    if (error instanceof MaxIterationsError) {
        return `[Stopped] The agent used all ${error.maxIterations} iterations without finishing. Ask it to continue or raise --max-iterations.`;
    }
    return `Error: ${scrubSensitiveText(errorMessage(error))}`;
}
