import { terminalChunk } from '../core/messages.js';
import type { LLMResponse, StreamChunk, ToolSchema, WireMessage } from '../core/types.js';
import type { RetryOptions } from '../utils/retry.js';

export type ProviderId = 'ollama' | 'openrouter' | 'huggingface' | 'groq';

export interface ChatRequestOptions {
  /** Aborts the in-flight request; the adapter rejects with the abort reason. */
  signal?: AbortSignal;
}

/**
 * A backend that turns a wire-format conversation into a model reply.
 *
 * Adapters translate to and from their vendor format, apply the shared retry
 * policy and raise `ProviderError` subclasses on failure.
 */
export interface ModelAdapter {
  readonly name: string;
  readonly model: string;
  readonly supportsStreaming: boolean;
  readonly supportsTools: boolean;

  chat(messages: WireMessage[], tools: ToolSchema[], options?: ChatRequestOptions): Promise<LLMResponse>;
  stream(messages: WireMessage[], tools: ToolSchema[], options?: ChatRequestOptions): AsyncIterable<StreamChunk>;
  defaultModel(): string;
  listModels(): string[];
}

export interface ProviderOptions {
  model?: string;
  apiKey?: string;
  /** Base URL override, used for a non-default Ollama host. */
  host?: string;
  /** Per-request timeout. @default 120000 */
  timeoutMs?: number;
  retry?: RetryOptions;
}

/**
 * Shared adapter plumbing. Subclasses implement `chat`; streaming falls back
 * to a single terminal chunk built from one `chat` call.
 */
export abstract class BaseModelAdapter implements ModelAdapter {
  abstract readonly name: string;
  readonly model: string;
  readonly supportsStreaming: boolean = false;
  readonly supportsTools: boolean = true;

  protected readonly timeoutMs: number;
  protected readonly retryOptions: RetryOptions;

  protected constructor(model: string | undefined, fallbackModel: string, options: ProviderOptions = {}) {
    this.model = model?.trim() || fallbackModel;
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this.retryOptions = options.retry ?? {};
  }

  abstract chat(messages: WireMessage[], tools: ToolSchema[], options?: ChatRequestOptions): Promise<LLMResponse>;
  abstract defaultModel(): string;
  abstract listModels(): string[];

  async *stream(
    messages: WireMessage[],
    tools: ToolSchema[],
    options: ChatRequestOptions = {},
  ): AsyncGenerator<StreamChunk> {
    const response = await this.chat(messages, tools, options);
    yield terminalChunk(response);
  }

  /** Combines the caller's abort signal with the adapter's request timeout. */
  protected requestSignal(options: ChatRequestOptions): AbortSignal {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    return options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;
  }
}
