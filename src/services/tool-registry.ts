import { DuplicateToolError, ToolExecutionError, ToolNotFoundError, errorMessage } from '../core/errors.js';
import type { ToolArguments, ToolResult, ToolSchema } from '../core/types.js';
import { toolSchema, type Tool, type ToolExecutionContext } from '../tools/types.js';
import { logThought, logToolCall, scrubSensitiveText } from '../utils/logger.js';

const DEFAULT_TOOL_TIMEOUT_MS = 120_000;

/**
 * Name-keyed catalog of tools.
 *
 * The agent loop queries it for schemas on every turn and executes calls
 * through {@link ToolRegistry.executeSafely}, which never rejects: a bad tool
 * call becomes an error result the model can react to.
 *
 * Usage:
 * ```ts
 * const registry = new ToolRegistry();
 * registry.registerMany(createBuiltinTools());
 * const result = await registry.executeSafely('read_file', 'call_0', { file_path: 'README.md' }, context);
 * ```
 */
export class ToolRegistry {
    readonly #tools: Map<string, Tool> = new Map();

    /** Register a single tool. Names are matched exactly and case-sensitively. */
    register(tool: Tool): void {
        if (this.#tools.has(tool.name)) {
            throw new DuplicateToolError(tool.name);
        }
        this.#tools.set(tool.name, tool);
        void logThought(`[Registry] Registered tool '${tool.name}' (${tool.parameters.length} parameters).`);
    }

    registerMany(tools: Tool[]): void {
        for (const tool of tools) {
            this.register(tool);
        }
    }

    /** Returns true if the tool was found and removed. */
    unregister(name: string): boolean {
        return this.#tools.delete(name);
    }

    get(name: string): Tool {
        const tool = this.#tools.get(name);
        if (!tool) {
            throw new ToolNotFoundError(name);
        }
        return tool;
    }

    has(name: string): boolean {
        return this.#tools.has(name);
    }

    list(): Tool[] {
        return [...this.#tools.values()];
    }

    names(): string[] {
        return [...this.#tools.keys()];
    }

    get size(): number {
        return this.#tools.size;
    }

    schemasForAllTools(): ToolSchema[] {
        return this.list().map(toolSchema);
    }

    /**
     * Look up and run a tool, converting every failure into a `ToolResult`
     * with `isError: true`. Unknown tools, `ToolExecutionError`s and unexpected
     * throws are all contained here.
     */
    async executeSafely(
        name: string,
        toolCallId: string,
        args: ToolArguments,
        context: ToolExecutionContext = defaultExecutionContext(),
    ): Promise<ToolResult> {
        const tool = this.#tools.get(name);
        if (!tool) {
            const content = `Error: Tool '${name}' is not registered or unavailable.`;
            console.warn(`[Registry] Tool not found: ${name}`);
            await logToolCall(name, args, content);
            return { toolCallId, content, isError: true };
        }

        try {
            const output = await tool.execute(args, context);
            await logToolCall(name, args, output);
            return { toolCallId, content: output, isError: false };
        } catch (error: unknown) {
            const reason = error instanceof ToolExecutionError ? error.reason : errorMessage(error);
            const content = `Error: ${reason}`;
            console.error(`[Registry] Tool ${name} failed: ${scrubSensitiveText(reason)}`);
            await logToolCall(name, args, content);
            return { toolCallId, content, isError: true };
        }
    }
}

export function defaultExecutionContext(): ToolExecutionContext {
    return { workingDir: process.cwd(), timeoutMs: DEFAULT_TOOL_TIMEOUT_MS };
}
