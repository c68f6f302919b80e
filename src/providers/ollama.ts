import { ApiError, ModelNotFoundError } from '../core/errors.js';
import { createToolCall, parseToolArguments } from '../core/messages.js';
import type { LLMResponse, StreamChunk, ToolCall, ToolSchema, WireMessage } from '../core/types.js';
import {
  errorFromTransport,
  isRecord,
  parseJsonRecord,
  postJson,
  readJsonBody,
  readNdjsonLines,
  readRecord,
  readRecords,
  readString,
  requestWithRetry,
  type JsonRecord,
} from './http.js';
import { BaseModelAdapter, type ChatRequestOptions, type ProviderOptions } from './types.js';

export const DEFAULT_OLLAMA_HOST = 'http://localhost:11434';

interface OllamaWireMessage {
  role: string;
  content: string;
  tool_calls?: Array<{ function: { name: string; arguments: Record<string, unknown> } }>;
}

function toOllamaMessages(messages: WireMessage[]): OllamaWireMessage[] {
  return messages.map((message) => {
    const wire: OllamaWireMessage = { role: message.role, content: message.content ?? '' };
    if (message.tool_calls && message.tool_calls.length > 0) {
      wire.tool_calls = message.tool_calls.map((call) => ({
        function: { name: call.function.name, arguments: { ...call.function.arguments } },
      }));
    }
    return wire;
  });
}

function parseOllamaToolCalls(message: JsonRecord | undefined, offset: number): ToolCall[] {
  return readRecords(message, 'tool_calls').map((raw, idx) => {
    const fn = readRecord(raw, 'function');
    return createToolCall(
      readString(raw, 'id') || `call_${offset + idx}`,
      readString(fn, 'name') ?? '',
      parseToolArguments(fn?.arguments),
    );
  });
}

/**
 * Local inference through an Ollama server.
 * No credentials; streaming is newline-delimited JSON and tool calls arrive whole.
 */
export class OllamaAdapter extends BaseModelAdapter {
  static readonly DEFAULT_MODEL = 'qwen2.5-coder:7b';
  static readonly RECOMMENDED_MODELS = [
    'qwen2.5-coder:7b',
    'qwen2.5-coder:14b',
    'qwen2.5-coder:32b',
    'qwen2.5:7b',
    'qwen2.5:14b',
    'llama3.1:8b',
    'llama3.1:70b',
    'mistral:7b',
    'mixtral:8x7b',
    'deepseek-coder-v2:16b',
    'codellama:7b',
    'codellama:13b',
  ];

  readonly name = 'ollama';
  readonly supportsStreaming = true;

  readonly #host: string;

  constructor(options: ProviderOptions = {}) {
    super(options.model, OllamaAdapter.DEFAULT_MODEL, options);
    this.#host = (options.host?.trim() || DEFAULT_OLLAMA_HOST).replace(/\/+$/, '');
  }

  get host(): string {
    return this.#host;
  }

  defaultModel(): string {
    return OllamaAdapter.DEFAULT_MODEL;
  }

  listModels(): string[] {
    return [...OllamaAdapter.RECOMMENDED_MODELS];
  }

  /** Models already pulled on the server. Returns an empty list when it cannot be reached. */
  async listLocalModels(): Promise<string[]> {
    try {
      const response = await fetch(`${this.#host}/api/tags`, { signal: AbortSignal.timeout(this.timeoutMs) });
      if (!response.ok) {
        console.warn(`[Ollama] Failed to list local models: HTTP ${response.status}`);
        return [];
      }
      const body = await readJsonBody(this.name, response);
      return readRecords(body, 'models')
        .map((model) => readString(model, 'name'))
        .filter((name): name is string => typeof name === 'string');
    } catch (error) {
      console.warn(`[Ollama] Failed to list local models: ${error instanceof Error ? error.message : String(error)}`);
      return [];
    }
  }

  async chat(messages: WireMessage[], tools: ToolSchema[], options: ChatRequestOptions = {}): Promise<LLMResponse> {
    const body = await requestWithRetry(
      this.name,
      'chat',
      async () => {
        const response = await postJson({
          provider: this.name,
          model: this.model,
          url: `${this.#host}/api/chat`,
          body: this.#payload(messages, tools, false),
          signal: this.requestSignal(options),
        });
        return readJsonBody(this.name, response);
      },
      this.retryOptions,
      options.signal,
    );

    this.#raiseEmbeddedError(body);
    const message = readRecord(body, 'message');
    const toolCalls = parseOllamaToolCalls(message, 0);
    const content = readString(message, 'content');
    return {
      content: content || undefined,
      toolCalls,
      finishReason: toolCalls.length > 0 ? 'tool_calls' : 'stop',
    };
  }

  async *stream(
    messages: WireMessage[],
    tools: ToolSchema[],
    options: ChatRequestOptions = {},
  ): AsyncGenerator<StreamChunk> {
    const response = await requestWithRetry(
      this.name,
      'stream',
      () =>
        postJson({
          provider: this.name,
          model: this.model,
          url: `${this.#host}/api/chat`,
          body: this.#payload(messages, tools, true),
          signal: this.requestSignal(options),
        }),
      this.retryOptions,
      options.signal,
    );
    if (!response.body) {
      throw new ApiError(this.name, 'Streaming response had no body.', response.status);
    }

    const toolCalls: ToolCall[] = [];
    try {
      for await (const line of readNdjsonLines(response.body)) {
        const chunk = parseJsonRecord(line);
        if (!chunk) {
          continue;
        }
        this.#raiseEmbeddedError(chunk);

        const message = readRecord(chunk, 'message');
        toolCalls.push(...parseOllamaToolCalls(message, toolCalls.length));
        const content = readString(message, 'content');
        if (content) {
          yield { content, toolCalls: [], toolCallDeltas: [], isComplete: false };
        }
        if (chunk.done === true) {
          break;
        }
      }
    } catch (error) {
      throw errorFromTransport(this.name, error);
    }

    yield {
      content: '',
      toolCalls,
      toolCallDeltas: [],
      isComplete: true,
      finishReason: toolCalls.length > 0 ? 'tool_calls' : 'stop',
    };
  }

  #payload(messages: WireMessage[], tools: ToolSchema[], stream: boolean): JsonRecord {
    return {
      model: this.model,
      messages: toOllamaMessages(messages),
      stream,
      ...(tools.length > 0 ? { tools } : {}),
    };
  }

  /** Ollama reports some failures inside a 200 body as `{"error": "..."}`. */
  #raiseEmbeddedError(body: JsonRecord): void {
    const error = body.error;
    if (typeof error !== 'string' && !isRecord(error)) {
      return;
    }
    const text = typeof error === 'string' ? error : (readString(error, 'message') ?? 'Unknown error');
    if (/model/i.test(text) && /not found/i.test(text)) {
      throw new ModelNotFoundError(this.model, this.name);
    }
    throw new ApiError(this.name, text);
  }
}
