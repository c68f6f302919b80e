import { ApiError, ProviderConfigError, errorMessage } from '../core/errors.js';
import type { LLMResponse, StreamChunk, ToolSchema, WireMessage } from '../core/types.js';
import { logThought } from '../utils/logger.js';
import {
  errorFromResponse,
  errorFromTransport,
  openAIToolPayload,
  parseOpenAIStreamEvent,
  parseOpenAIToolCalls,
  parseOpenAIUsage,
  postJson,
  readJsonBody,
  readRecord,
  readRecords,
  readSseData,
  readString,
  requestWithRetry,
  toOpenAIMessages,
  type OpenAIUsage,
} from './http.js';
import { BaseModelAdapter, type ChatRequestOptions, type ProviderOptions } from './types.js';

const BASE_URL = 'https://openrouter.ai/api/v1';
const KEYS_URL = 'https://openrouter.ai/keys';
const APP_REFERER = 'https://github.com/tooldrive/tooldrive';
const APP_TITLE = 'tooldrive';

/**
 * OpenRouter adapter over its OpenAI-compatible chat-completions API.
 * Native tool calling; streamed tool calls are forwarded as positional deltas.
 */
export class OpenRouterAdapter extends BaseModelAdapter {
  static readonly DEFAULT_MODEL = 'deepseek/deepseek-chat';
  static readonly RECOMMENDED_MODELS = [
    'deepseek/deepseek-chat',
    'anthropic/claude-3.5-sonnet',
    'anthropic/claude-3-haiku',
    'openai/gpt-4o',
    'openai/gpt-4o-mini',
    'google/gemini-pro-1.5',
    'meta-llama/llama-3.1-70b-instruct',
    'meta-llama/llama-3.1-8b-instruct',
    'mistralai/mistral-large',
    'qwen/qwen-2.5-coder-32b-instruct',
  ];
  static readonly FREE_MODELS = [
    'meta-llama/llama-3.1-8b-instruct:free',
    'google/gemma-2-9b-it:free',
    'mistralai/mistral-7b-instruct:free',
    'qwen/qwen-2.5-7b-instruct:free',
  ];

  readonly name = 'openrouter';
  readonly supportsStreaming = true;

  readonly #apiKey: string;
  readonly #baseUrl: string;
  #promptTokens = 0;
  #completionTokens = 0;

  constructor(options: ProviderOptions = {}) {
    super(options.model, OpenRouterAdapter.DEFAULT_MODEL, options);
    const apiKey = options.apiKey?.trim();
    if (!apiKey) {
      throw new ProviderConfigError('openrouter', `API key is required. Get one at ${KEYS_URL}`);
    }
    this.#apiKey = apiKey;
    this.#baseUrl = (options.host?.trim() || BASE_URL).replace(/\/+$/, '');
  }

  defaultModel(): string {
    return OpenRouterAdapter.DEFAULT_MODEL;
  }

  listModels(): string[] {
    return [...OpenRouterAdapter.RECOMMENDED_MODELS];
  }

  freeModels(): string[] {
    return [...OpenRouterAdapter.FREE_MODELS];
  }

  /** Running token tally for every request this adapter has completed. */
  get totalTokensUsed(): number {
    return this.#promptTokens + this.#completionTokens;
  }

  get tokenUsage(): OpenAIUsage {
    return {
      promptTokens: this.#promptTokens,
      completionTokens: this.#completionTokens,
      totalTokens: this.totalTokensUsed,
    };
  }

  async chat(messages: WireMessage[], tools: ToolSchema[], options: ChatRequestOptions = {}): Promise<LLMResponse> {
    const body = await requestWithRetry(
      this.name,
      'chat',
      async () => {
        const response = await postJson({
          provider: this.name,
          model: this.model,
          url: `${this.#baseUrl}/chat/completions`,
          headers: this.#headers(),
          body: {
            model: this.model,
            messages: toOpenAIMessages(messages),
            ...openAIToolPayload(tools),
          },
          signal: this.requestSignal(options),
        });
        return readJsonBody(this.name, response);
      },
      this.retryOptions,
      options.signal,
    );

    const choice = readRecords(body, 'choices')[0];
    if (!choice) {
      throw new ApiError(this.name, 'Response contained no choices.');
    }
    const message = readRecord(choice, 'message');
    this.#recordUsage(parseOpenAIUsage(body));

    return {
      content: readString(message, 'content'),
      toolCalls: parseOpenAIToolCalls(message),
      finishReason: readString(choice, 'finish_reason'),
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
          url: `${this.#baseUrl}/chat/completions`,
          headers: this.#headers(),
          body: {
            model: this.model,
            messages: toOpenAIMessages(messages),
            stream: true,
            stream_options: { include_usage: true },
            ...openAIToolPayload(tools),
          },
          signal: this.requestSignal(options),
        }),
      this.retryOptions,
      options.signal,
    );
    if (!response.body) {
      throw new ApiError(this.name, 'Streaming response had no body.', response.status);
    }

    let finishReason: string | undefined;
    try {
      for await (const data of readSseData(response.body)) {
        if (data === '[DONE]') {
          break;
        }
        const event = parseOpenAIStreamEvent(data);
        if (!event) {
          continue;
        }
        if (event.error) {
          throw new ApiError(this.name, `Streaming error: ${event.error}`);
        }
        this.#recordUsage(event.usage);
        if (event.finishReason) {
          finishReason = event.finishReason;
        }
        if (event.content || event.toolCallDeltas.length > 0) {
          yield { content: event.content, toolCalls: [], toolCallDeltas: event.toolCallDeltas, isComplete: false };
        }
      }
    } catch (error) {
      throw errorFromTransport(this.name, error);
    }

    yield { content: '', toolCalls: [], toolCallDeltas: [], isComplete: true, finishReason: finishReason ?? 'stop' };
  }

  /**
   * Check the key against the key-info endpoint. Rejected keys raise
   * `ProviderConfigError`; other failures are logged and treated as valid.
   */
  async validateApiKey(): Promise<boolean> {
    let response: Response;
    try {
      response = await fetch(`${this.#baseUrl}/auth/key`, {
        headers: this.#headers(),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      void logThought(`[OpenRouter] Key validation skipped: ${errorMessage(errorFromTransport(this.name, error))}`);
      return true;
    }

    if (response.status === 401 || response.status === 403) {
      throw new ProviderConfigError(this.name, `Invalid API key. Check your key at ${KEYS_URL}`);
    }
    if (!response.ok) {
      const error = await errorFromResponse(this.name, this.model, response);
      void logThought(`[OpenRouter] Key validation inconclusive: ${error.message}`);
    }
    return true;
  }

  #headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.#apiKey}`,
      'HTTP-Referer': APP_REFERER,
      'X-Title': APP_TITLE,
    };
  }

  #recordUsage(usage: OpenAIUsage | undefined): void {
    if (!usage) {
      return;
    }
    this.#promptTokens += usage.promptTokens;
    this.#completionTokens += usage.completionTokens;
  }
}
