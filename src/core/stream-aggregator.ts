import { createToolCall, parseToolArguments } from './messages.js';
import type { LLMResponse, StreamChunk, ToolCall, ToolCallDelta } from './types.js';

interface PartialToolCall {
    id: string;
    name: string;
    arguments: string;
}

/**
 * Folds an ordered sequence of stream chunks into the equivalent
 * non-streaming {@link LLMResponse}.
 *
 * Tool-call fragments are keyed by the backend's positional index. Partial
 * entries stay open until the terminal chunk arrives; only then are their
 * argument strings parsed. Finalized calls keep the order in which their
 * index was first seen.
 */
export class StreamAggregator {
    #content = '';
    readonly #partials: Map<number, PartialToolCall> = new Map();
    #terminalToolCalls: ToolCall[] = [];
    #finishReason: string | undefined;
    #complete = false;

    get isComplete(): boolean {
        return this.#complete;
    }

    get content(): string {
        return this.#content;
    }

    push(chunk: StreamChunk): void {
        if (chunk.content) {
            this.#content += chunk.content;
        }

        for (const delta of chunk.toolCallDeltas) {
            this.#mergeDelta(delta);
        }

        if (chunk.isComplete) {
            this.#complete = true;
            this.#terminalToolCalls = [...this.#terminalToolCalls, ...chunk.toolCalls];
            if (chunk.finishReason) {
                this.#finishReason = chunk.finishReason;
            }
        }
    }

    toResponse(): LLMResponse {
        return {
            content: this.#content.length > 0 ? this.#content : undefined,
            toolCalls: this.#complete ? [...this.#finalizePartials(), ...this.#terminalToolCalls] : [],
            finishReason: this.#finishReason,
        };
    }

    #mergeDelta(delta: ToolCallDelta): void {
        // Map iteration order is insertion order, which is the first-seen order of each index.
        let partial = this.#partials.get(delta.index);
        if (!partial) {
            partial = { id: '', name: '', arguments: '' };
            this.#partials.set(delta.index, partial);
        }

        if (delta.id && !partial.id) {
            partial.id = delta.id;
        }
        if (delta.name) {
            partial.name += delta.name;
        }
        if (delta.arguments) {
            partial.arguments += delta.arguments;
        }
    }

    #finalizePartials(): ToolCall[] {
        const calls: ToolCall[] = [];
        for (const [index, partial] of this.#partials) {
            calls.push(
                createToolCall(
                    partial.id || `call_${index}`,
                    partial.name,
                    parseToolArguments(partial.arguments),
                ),
            );
        }
        return calls;
    }
}

/** Drain a chunk stream into a single response. */
export async function aggregateStream(chunks: AsyncIterable<StreamChunk>): Promise<LLMResponse> {
    const aggregator = new StreamAggregator();
    for await (const chunk of chunks) {
        aggregator.push(chunk);
    }
    return aggregator.toResponse();
}
