import { defaultExecutionContext, type ToolRegistry } from '../services/tool-registry.js';
import type { ModelAdapter } from '../providers/types.js';
import type { ToolExecutionContext } from '../tools/types.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';
import { AgentCancelledError, ConfigError, MaxIterationsError, errorMessage } from './errors.js';
import {
  assistantMessage,
  createToolCall,
  hasToolCalls,
  plainMessage,
  systemMessage,
  toWireMessage,
  toolResponseMessage,
  userMessage,
} from './messages.js';
import { buildSystemPrompt } from './prompts.js';
import { StreamAggregator } from './stream-aggregator.js';
import type { LLMResponse, Message, Role, ToolCall, ToolResult } from './types.js';

export const DEFAULT_MAX_ITERATIONS = 25;
const CANCELLED_TOOL_CONTENT = 'Error: Cancelled before execution.';

/** Tool messages must reference a call id, so calls an adapter left unnamed get a positional one. */
function withCallIds(calls: readonly ToolCall[], iteration: number): ToolCall[] {
  return calls.map((call, idx) => (call.id ? call : createToolCall(`call_${iteration}_${idx}`, call.name, call.arguments)));
}

/** Notified around every tool execution, in call order. */
export interface AgentObserver {
  onToolStart?(call: ToolCall): void;
  onToolEnd?(result: ToolResult): void;
}

export interface AgentLoopOptions {
  provider: ModelAdapter;
  tools: ToolRegistry;
  workingDir: string;
  maxIterations?: number;
  observer?: AgentObserver;
  /** Replaces the generated system prompt. */
  systemPrompt?: string;
  toolTimeoutMs?: number;
}

export interface TurnOptions {
  signal?: AbortSignal;
}

/**
 * Drives one conversation: alternates model calls and tool executions until
 * the model answers without requesting tools.
 *
 * The history is append-only within a turn. Tool failures are fed back to the
 * model as tool messages; only provider, configuration, iteration-limit and
 * cancellation errors reach the caller, and none of them roll the history back.
 */
export class AgentLoop {
  readonly #provider: ModelAdapter;
  readonly #tools: ToolRegistry;
  readonly #workingDir: string;
  readonly #maxIterations: number;
  readonly #observer: AgentObserver | undefined;
  readonly #systemPrompt: string;
  readonly #toolTimeoutMs: number;
  #messages: Message[];

  constructor(options: AgentLoopOptions) {
    const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    if (!Number.isInteger(maxIterations) || maxIterations < 1) {
      throw new ConfigError(`maxIterations must be a positive integer, received ${maxIterations}.`);
    }

    this.#provider = options.provider;
    this.#tools = options.tools;
    this.#workingDir = options.workingDir;
    this.#maxIterations = maxIterations;
    this.#observer = options.observer;
    this.#systemPrompt = options.systemPrompt ?? buildSystemPrompt(options.workingDir);
    this.#toolTimeoutMs = options.toolTimeoutMs ?? defaultExecutionContext().timeoutMs;
    this.#messages = [systemMessage(this.#systemPrompt)];
  }

  get provider(): ModelAdapter {
    return this.#provider;
  }

  get tools(): ToolRegistry {
    return this.#tools;
  }

  get workingDir(): string {
    return this.#workingDir;
  }

  get maxIterations(): number {
    return this.#maxIterations;
  }

  /** A copy of the conversation, system message first. */
  get messages(): Message[] {
    return [...this.#messages];
  }

  /** Drop everything except the system message. */
  reset(): void {
    this.#messages = [systemMessage(this.#systemPrompt)];
    void logThought('[AgentLoop] Conversation reset.');
  }

  addMessage(role: Exclude<Role, 'tool'>, content: string): void {
    this.#messages.push(plainMessage(role, content));
  }

  /** The conversation in wire format, for export. */
  conversationJson(): string {
    return JSON.stringify(this.#messages.map(toWireMessage), null, 2);
  }

  /** Process one user input and resolve with the final assistant text. */
  async run(input: string, options: TurnOptions = {}): Promise<string> {
    const turn = this.#turn(input, options.signal, false);
    let step = await turn.next();
    while (!step.done) {
      step = await turn.next();
    }
    return step.value;
  }

  /**
   * Same algorithm as {@link AgentLoop.run}, but yields every non-empty text
   * fragment as it arrives. The generator's return value is the final text.
   */
  async *stream(input: string, options: TurnOptions = {}): AsyncGenerator<string, string> {
    return yield* this.#turn(input, options.signal, true);
  }

  async *#turn(input: string, signal: AbortSignal | undefined, streaming: boolean): AsyncGenerator<string, string> {
    this.#messages.push(userMessage(input));

    for (let iteration = 1; iteration <= this.#maxIterations; iteration++) {
      this.#throwIfCancelled(signal);

      let response: LLMResponse;
      if (streaming) {
        response = yield* this.#streamResponse(signal);
      } else {
        response = await this.#chatResponse(signal);
      }

      if (!hasToolCalls(response)) {
        this.#messages.push(assistantMessage(response.content));
        void logThought(`[AgentLoop] Finished after ${iteration} iteration(s).`);
        return response.content ?? '';
      }

      const toolCalls = withCallIds(response.toolCalls, iteration);
      this.#messages.push(assistantMessage(response.content, toolCalls));
      void logThought(
        `[AgentLoop] Iteration ${iteration}/${this.#maxIterations}: ` +
          `${toolCalls.map((call) => call.name).join(', ')}`,
      );
      await this.#executeToolCalls(toolCalls, signal);
    }

    void logThought(`[AgentLoop] Stopped at the iteration limit (${this.#maxIterations}).`);
    throw new MaxIterationsError(this.#maxIterations);
  }

  async #chatResponse(signal: AbortSignal | undefined): Promise<LLMResponse> {
    try {
      return await this.#provider.chat(this.#wireMessages(), this.#tools.schemasForAllTools(), { signal });
    } catch (error) {
      throw this.#translateModelError(error, signal);
    }
  }

  async *#streamResponse(signal: AbortSignal | undefined): AsyncGenerator<string, LLMResponse> {
    const aggregator = new StreamAggregator();
    try {
      for await (const chunk of this.#provider.stream(this.#wireMessages(), this.#tools.schemasForAllTools(), {
        signal,
      })) {
        aggregator.push(chunk);
        if (chunk.content) {
          yield chunk.content;
        }
      }
    } catch (error) {
      throw this.#translateModelError(error, signal);
    }
    return aggregator.toResponse();
  }

  async #executeToolCalls(calls: readonly ToolCall[], signal: AbortSignal | undefined): Promise<void> {
    const context: ToolExecutionContext = {
      workingDir: this.#workingDir,
      timeoutMs: this.#toolTimeoutMs,
      signal,
    };

    for (const [index, call] of calls.entries()) {
      if (signal?.aborted) {
        for (const pending of calls.slice(index)) {
          this.#messages.push(toolResponseMessage(pending.id, CANCELLED_TOOL_CONTENT));
        }
        void logThought(`[AgentLoop] Cancelled with ${calls.length - index} tool call(s) pending.`);
        throw new AgentCancelledError();
      }

      this.#notify('onToolStart', () => this.#observer?.onToolStart?.(call));
      const result = await this.#tools.executeSafely(call.name, call.id, { ...call.arguments }, context);
      this.#notify('onToolEnd', () => this.#observer?.onToolEnd?.(result));

      this.#messages.push(toolResponseMessage(result.toolCallId, result.content));
    }
  }

  #notify(hook: string, callback: () => void): void {
    try {
      callback();
    } catch (error) {
      console.warn(`[AgentLoop] Observer ${hook} threw: ${scrubSensitiveText(errorMessage(error))}`);
    }
  }

  #throwIfCancelled(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new AgentCancelledError();
    }
  }

  /** A request that died because the caller aborted is a cancellation, not a provider failure. */
  #translateModelError(error: unknown, signal: AbortSignal | undefined): unknown {
    return signal?.aborted ? new AgentCancelledError() : error;
  }

  #wireMessages() {
    return this.#messages.map(toWireMessage);
  }
}
