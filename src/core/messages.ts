import { MessageValidationError } from './errors.js';
import type {
    LLMResponse,
    Message,
    Role,
    StreamChunk,
    ToolArguments,
    ToolCall,
    ToolResult,
    WireMessage,
    WireToolCall,
} from './types.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Normalize tool-call arguments coming off the wire.
 * Objects pass through, JSON strings are parsed, anything else becomes `{}`.
 */
export function parseToolArguments(raw: unknown): ToolArguments {
    if (isPlainObject(raw)) {
        return { ...raw };
    }
    if (typeof raw !== 'string' || raw.trim().length === 0) {
        return {};
    }
    try {
        const parsed: unknown = JSON.parse(raw);
        return isPlainObject(parsed) ? parsed : {};
    } catch {
        return {};
    }
}

export function createToolCall(id: string, name: string, args: ToolArguments = {}): ToolCall {
    return Object.freeze({
        id,
        name,
        arguments: Object.freeze({ ...args }),
    });
}

// ── Role constructors ────────────────────────────────────────────────────────

export function systemMessage(content: string): Message {
    return { role: 'system', content, toolCalls: [] };
}

export function userMessage(content: string): Message {
    return { role: 'user', content, toolCalls: [] };
}

export function assistantMessage(content?: string | null, toolCalls: readonly ToolCall[] = []): Message {
    return {
        role: 'assistant',
        ...(content !== undefined && content !== null ? { content } : {}),
        toolCalls: [...toolCalls],
    };
}

export function toolResponseMessage(toolCallId: string, content: string): Message {
    if (toolCallId.trim().length === 0) {
        throw new MessageValidationError('Tool response messages require a toolCallId.');
    }
    return { role: 'tool', content, toolCalls: [], toolCallId };
}

/** Free-form message for roles other than `tool`, which needs {@link toolResponseMessage}. */
export function plainMessage(role: Exclude<Role, 'tool'>, content: string): Message {
    return { role, content, toolCalls: [] };
}

// ── Wire conversions ─────────────────────────────────────────────────────────

export function toWireToolCall(call: ToolCall): WireToolCall {
    return {
        id: call.id,
        type: 'function',
        function: {
            name: call.name,
            arguments: { ...call.arguments },
        },
    };
}

/** Accepts both mapping and JSON-string arguments. */
export function parseWireToolCall(wire: {
    id: string;
    function: { name: string; arguments?: unknown };
}): ToolCall {
    return createToolCall(wire.id, wire.function.name, parseToolArguments(wire.function.arguments));
}

export function toWireMessage(message: Message): WireMessage {
    const wire: WireMessage = { role: message.role };

    if (message.content !== undefined) {
        wire.content = message.content;
    }
    if (message.toolCalls.length > 0) {
        wire.tool_calls = message.toolCalls.map(toWireToolCall);
    }
    if (message.toolCallId) {
        wire.tool_call_id = message.toolCallId;
    }
    if (message.name) {
        wire.name = message.name;
    }
    return wire;
}

export function toolResultToWireMessage(result: ToolResult): WireMessage {
    return toWireMessage(toolResponseMessage(result.toolCallId, result.content));
}

// ── Responses ────────────────────────────────────────────────────────────────

export function hasToolCalls(response: LLMResponse): boolean {
    return response.toolCalls.length > 0;
}

export function terminalChunk(response: LLMResponse): StreamChunk {
    return {
        content: response.content ?? '',
        toolCalls: response.toolCalls,
        toolCallDeltas: [],
        isComplete: true,
        finishReason: response.finishReason,
    };
}

export function textChunk(content: string): StreamChunk {
    return { content, toolCalls: [], toolCallDeltas: [], isComplete: false };
}
