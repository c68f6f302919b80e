import Groq from 'groq-sdk';
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionCreateParamsStreaming,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from 'groq-sdk/resources/chat/completions';
import { ApiError, ModelNotFoundError, ProviderConfigError, ProviderError, errorMessage } from '../core/errors.js';
import { createToolCall, parseToolArguments } from '../core/messages.js';
import type { LLMResponse, StreamChunk, ToolCallDelta, ToolSchema, WireMessage } from '../core/types.js';
import { scrubSensitiveText } from '../utils/logger.js';
import { requestWithRetry } from './http.js';
import { BaseModelAdapter, type ChatRequestOptions, type ProviderOptions } from './types.js';

const KEYS_URL = 'https://console.groq.com/keys';

function toGroqMessages(messages: WireMessage[]): ChatCompletionMessageParam[] {
  return messages.map((message): ChatCompletionMessageParam => {
    const content = message.content ?? '';
    switch (message.role) {
      case 'system':
        return { role: 'system', content };
      case 'user':
        return { role: 'user', content };
      case 'tool':
        return { role: 'tool', content, tool_call_id: message.tool_call_id ?? '' };
      case 'assistant':
        if (message.tool_calls && message.tool_calls.length > 0) {
          return {
            role: 'assistant',
            content: message.content ?? null,
            tool_calls: message.tool_calls.map((call) => ({
              id: call.id,
              type: 'function',
              function: { name: call.function.name, arguments: JSON.stringify(call.function.arguments) },
            })),
          };
        }
        return { role: 'assistant', content };
    }
  });
}

function toGroqTools(tools: ToolSchema[]): ChatCompletionTool[] {
  return tools.map((tool) => ({
    type: 'function',
    function: {
      name: tool.function.name,
      description: tool.function.description,
      parameters: { ...tool.function.parameters },
    },
  }));
}

/** Translate SDK failures into the provider error hierarchy. */
function mapGroqError(model: string, error: unknown): unknown {
  if (error instanceof ProviderError) {
    return error;
  }
  if (error instanceof Groq.APIUserAbortError) {
    return error;
  }
  if (error instanceof Groq.APIConnectionTimeoutError) {
    return new ApiError('groq', 'Request timed out. The model may be overloaded.');
  }
  if (error instanceof Groq.APIConnectionError) {
    return new ApiError('groq', `Connection failed: ${scrubSensitiveText(error.message)}`);
  }
  if (error instanceof Groq.APIError) {
    if (error.status === 404) {
      return new ModelNotFoundError(model, 'groq');
    }
    return new ApiError('groq', scrubSensitiveText(error.message), error.status);
  }
  return new ApiError('groq', scrubSensitiveText(errorMessage(error)));
}

/**
 * Groq chat completions through groq-sdk, with native tools and streaming.
 * The SDK's own retries are disabled so the shared provider policy applies.
 */
export class GroqAdapter extends BaseModelAdapter {
  static readonly DEFAULT_MODEL = 'llama-3.3-70b-versatile';
  static readonly RECOMMENDED_MODELS = [
    'llama-3.3-70b-versatile',
    'llama-3.1-8b-instant',
    'qwen-2.5-coder-32b',
    'deepseek-r1-distill-llama-70b',
    'mixtral-8x7b-32768',
    'gemma2-9b-it',
  ];

  readonly name = 'groq';
  readonly supportsStreaming = true;

  readonly #client: Groq;

  constructor(options: ProviderOptions = {}) {
    super(options.model, GroqAdapter.DEFAULT_MODEL, options);
    const apiKey = options.apiKey?.trim();
    if (!apiKey) {
      throw new ProviderConfigError('groq', `API key is required. Get one at ${KEYS_URL}`);
    }
    this.#client = new Groq({
      apiKey,
      maxRetries: 0,
      timeout: this.timeoutMs,
      ...(options.host?.trim() ? { baseURL: options.host.trim() } : {}),
    });
  }

  defaultModel(): string {
    return GroqAdapter.DEFAULT_MODEL;
  }

  listModels(): string[] {
    return [...GroqAdapter.RECOMMENDED_MODELS];
  }

  async chat(messages: WireMessage[], tools: ToolSchema[], options: ChatRequestOptions = {}): Promise<LLMResponse> {
    const params: ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: toGroqMessages(messages),
      ...(tools.length > 0 ? { tools: toGroqTools(tools) } : {}),
    };

    const completion = await requestWithRetry(
      this.name,
      'chat',
      async () => {
        try {
          return await this.#client.chat.completions.create(params, { signal: options.signal });
        } catch (error) {
          throw mapGroqError(this.model, error);
        }
      },
      this.retryOptions,
      options.signal,
    );

    const choice = completion.choices[0];
    if (!choice) {
      throw new ApiError(this.name, 'Response contained no choices.');
    }
    return {
      content: choice.message.content ?? undefined,
      toolCalls: (choice.message.tool_calls ?? []).map((call, idx) =>
        createToolCall(call.id || `call_${idx}`, call.function.name, parseToolArguments(call.function.arguments)),
      ),
      finishReason: choice.finish_reason ?? undefined,
    };
  }

  async *stream(
    messages: WireMessage[],
    tools: ToolSchema[],
    options: ChatRequestOptions = {},
  ): AsyncGenerator<StreamChunk> {
    const params: ChatCompletionCreateParamsStreaming = {
      model: this.model,
      messages: toGroqMessages(messages),
      stream: true,
      ...(tools.length > 0 ? { tools: toGroqTools(tools) } : {}),
    };

    const stream = await requestWithRetry(
      this.name,
      'stream',
      async () => {
        try {
          return await this.#client.chat.completions.create(params, { signal: options.signal });
        } catch (error) {
          throw mapGroqError(this.model, error);
        }
      },
      this.retryOptions,
      options.signal,
    );

    let finishReason: string | undefined;
    try {
      for await (const chunk of stream) {
        const choice = chunk.choices[0];
        if (!choice) {
          continue;
        }
        const toolCallDeltas = (choice.delta.tool_calls ?? []).map(
          (call): ToolCallDelta => ({
            index: call.index,
            id: call.id ?? undefined,
            name: call.function?.name ?? undefined,
            arguments: call.function?.arguments ?? undefined,
          }),
        );
        const content = choice.delta.content ?? '';
        if (choice.finish_reason) {
          finishReason = choice.finish_reason;
        }
        if (content || toolCallDeltas.length > 0) {
          yield { content, toolCalls: [], toolCallDeltas, isComplete: false };
        }
      }
    } catch (error) {
      throw mapGroqError(this.model, error);
    }

    yield { content: '', toolCalls: [], toolCallDeltas: [], isComplete: true, finishReason: finishReason ?? 'stop' };
  }
}
