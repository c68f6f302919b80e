export type Role = 'system' | 'user' | 'assistant' | 'tool';

export type ToolArguments = Record<string, unknown>;

export interface ToolCall {
    readonly id: string;
    readonly name: string;
    readonly arguments: Readonly<ToolArguments>;
}

export interface ToolResult {
    readonly toolCallId: string;
    readonly content: string;
    readonly isError: boolean;
}

export interface Message {
    readonly role: Role;
    readonly content?: string;
    readonly toolCalls: readonly ToolCall[];
    /** Set on `tool` messages only; references a ToolCall id from an earlier assistant turn. */
    readonly toolCallId?: string;
    readonly name?: string;
}

export interface LLMResponse {
    content?: string;
    toolCalls: ToolCall[];
    finishReason?: string;
}

/** A positional fragment of a tool call, as streamed by OpenAI-compatible backends. */
export interface ToolCallDelta {
    index: number;
    id?: string;
    name?: string;
    arguments?: string;
}

export interface StreamChunk {
    content: string;
    /** Complete tool calls; only populated on the terminal chunk. */
    toolCalls: ToolCall[];
    toolCallDeltas: ToolCallDelta[];
    isComplete: boolean;
    finishReason?: string;
}

// ── Wire records ─────────────────────────────────────────────────────────────

export interface WireToolCall {
    id: string;
    type: 'function';
    function: {
        name: string;
        arguments: ToolArguments;
    };
}

export interface WireMessage {
    role: Role;
    content?: string;
    tool_calls?: WireToolCall[];
    tool_call_id?: string;
    name?: string;
}

export interface ToolSchemaProperty {
    type: string;
    description: string;
    enum?: unknown[];
}

export interface ToolSchema {
    type: 'function';
    function: {
        name: string;
        description: string;
        parameters: {
            type: 'object';
            properties: Record<string, ToolSchemaProperty>;
            required: string[];
        };
    };
}
