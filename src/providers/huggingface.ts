import { ApiError, ProviderConfigError } from '../core/errors.js';
import { createToolCall, parseToolArguments } from '../core/messages.js';
import type { LLMResponse, StreamChunk, ToolCall, ToolSchema, WireMessage } from '../core/types.js';
import { logThought } from '../utils/logger.js';
import {
  errorFromTransport,
  parseJsonRecord,
  parseOpenAIStreamEvent,
  postJson,
  readJsonBody,
  readRecord,
  readRecords,
  readSseData,
  readString,
  requestWithRetry,
} from './http.js';
import { BaseModelAdapter, type ChatRequestOptions, type ProviderOptions } from './types.js';

const BASE_URL = 'https://router.huggingface.co/v1';
const TOKENS_URL = 'https://huggingface.co/settings/tokens';
const MAX_NEW_TOKENS = 4096;
const TOOL_CALL_BLOCK = /```tool_call\s*\n?(\{[\s\S]*?\})\s*\n?```/g;

interface TextMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export function formatToolsPrompt(tools: ToolSchema[]): string {
  const descriptions = tools.map((tool) => {
    const params = JSON.stringify(tool.function.parameters, null, 2);
    return `### ${tool.function.name}\n${tool.function.description}\n\nParameters:\n\`\`\`json\n${params}\n\`\`\``;
  });

  return [
    'You have access to the following tools. To use a tool, respond with a JSON block in this exact format:',
    '```tool_call',
    '{"name": "tool_name", "arguments": {"arg1": "value1"}}',
    '```',
    '',
    'Available tools:',
    '',
    descriptions.join('\n\n'),
    '',
    'Important: When you need to use a tool, output ONLY the tool_call block without any other text before it. ' +
      'After you receive the tool result, you can continue your response.',
  ].join('\n');
}

/**
 * Pull ```tool_call``` blocks out of a completion. Blocks that are not valid
 * JSON are skipped; ids are positional.
 */
export function extractToolCalls(content: string): { content: string; toolCalls: ToolCall[] } {
  const toolCalls: ToolCall[] = [];
  for (const match of content.matchAll(TOOL_CALL_BLOCK)) {
    const data = parseJsonRecord(match[1] ?? '');
    if (!data) {
      void logThought(`[HuggingFace] Skipped unparseable tool_call block: ${match[1] ?? ''}`);
      continue;
    }
    toolCalls.push(
      createToolCall(`call_${toolCalls.length}`, readString(data, 'name') ?? '', parseToolArguments(data.arguments)),
    );
  }
  return { content: content.replace(TOOL_CALL_BLOCK, '').trim(), toolCalls };
}

/**
 * Flatten tool traffic into plain text turns, since the model only sees
 * prompt-based tools: assistant calls become tool_call blocks again and tool
 * results become user turns.
 */
export function toTextMessages(messages: WireMessage[], tools: ToolSchema[]): TextMessage[] {
  const converted: TextMessage[] = messages.map((message): TextMessage => {
    if (message.role === 'tool') {
      return { role: 'user', content: `Tool result (${message.tool_call_id ?? 'unknown'}):\n${message.content ?? ''}` };
    }
    // Streamed replies keep their blocks in the content already.
    if (
      message.role === 'assistant' &&
      message.tool_calls &&
      message.tool_calls.length > 0 &&
      !(message.content ?? '').includes('```tool_call')
    ) {
      const blocks = message.tool_calls.map(
        (call) =>
          `\`\`\`tool_call\n${JSON.stringify({ name: call.function.name, arguments: call.function.arguments })}\n\`\`\``,
      );
      return { role: 'assistant', content: [message.content ?? '', ...blocks].filter(Boolean).join('\n') };
    }
    return { role: message.role, content: message.content ?? '' };
  });

  if (tools.length === 0) {
    return converted;
  }
  const toolPrompt = formatToolsPrompt(tools);
  const [first, ...rest] = converted;
  if (first?.role === 'system') {
    return [{ role: 'system', content: `${first.content}\n\n${toolPrompt}` }, ...rest];
  }
  return [{ role: 'system', content: toolPrompt }, ...converted];
}

/**
 * Hugging Face inference router. Tools are described in the system prompt and
 * calls are parsed back out of the reply text.
 */
export class HuggingFaceAdapter extends BaseModelAdapter {
  static readonly DEFAULT_MODEL = 'Qwen/Qwen2.5-Coder-32B-Instruct';
  static readonly RECOMMENDED_MODELS = [
    'Qwen/Qwen2.5-Coder-32B-Instruct',
    'deepseek-ai/DeepSeek-Coder-V2-Instruct',
    'codellama/CodeLlama-34b-Instruct-hf',
    'bigcode/starcoder2-15b-instruct-v0.1',
    'meta-llama/Meta-Llama-3.1-70B-Instruct',
    'mistralai/Mixtral-8x7B-Instruct-v0.1',
    'meta-llama/Meta-Llama-3.1-8B-Instruct',
  ];

  readonly name = 'huggingface';
  readonly supportsStreaming = true;

  readonly #apiKey: string;
  readonly #baseUrl: string;

  constructor(options: ProviderOptions = {}) {
    super(options.model, HuggingFaceAdapter.DEFAULT_MODEL, options);
    const apiKey = options.apiKey?.trim();
    if (!apiKey) {
      throw new ProviderConfigError('huggingface', `API token required. Get one at ${TOKENS_URL}`);
    }
    this.#apiKey = apiKey;
    this.#baseUrl = (options.host?.trim() || BASE_URL).replace(/\/+$/, '');
  }

  defaultModel(): string {
    return HuggingFaceAdapter.DEFAULT_MODEL;
  }

  listModels(): string[] {
    return [...HuggingFaceAdapter.RECOMMENDED_MODELS];
  }

  async chat(messages: WireMessage[], tools: ToolSchema[], options: ChatRequestOptions = {}): Promise<LLMResponse> {
    const body = await requestWithRetry(
      this.name,
      'chat',
      async () => {
        const response = await this.#post(messages, tools, false, options);
        return readJsonBody(this.name, response);
      },
      this.retryOptions,
      options.signal,
    );

    const choice = readRecords(body, 'choices')[0];
    if (!choice) {
      throw new ApiError(this.name, 'Response contained no choices.');
    }
    const extracted = extractToolCalls(readString(readRecord(choice, 'message'), 'content') ?? '');
    return {
      content: extracted.content || undefined,
      toolCalls: extracted.toolCalls,
      finishReason: extracted.toolCalls.length > 0 ? 'tool_calls' : 'stop',
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
      () => this.#post(messages, tools, true, options),
      this.retryOptions,
      options.signal,
    );
    if (!response.body) {
      throw new ApiError(this.name, 'Streaming response had no body.', response.status);
    }

    let fullContent = '';
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
        if (event.content) {
          fullContent += event.content;
          yield { content: event.content, toolCalls: [], toolCallDeltas: [], isComplete: false };
        }
        if (event.finishReason) {
          finishReason = event.finishReason;
        }
      }
    } catch (error) {
      throw errorFromTransport(this.name, error);
    }

    const { toolCalls } = extractToolCalls(fullContent);
    yield {
      content: '',
      toolCalls,
      toolCallDeltas: [],
      isComplete: true,
      finishReason: toolCalls.length > 0 ? 'tool_calls' : (finishReason ?? 'stop'),
    };
  }

  #post(messages: WireMessage[], tools: ToolSchema[], stream: boolean, options: ChatRequestOptions): Promise<Response> {
    return postJson({
      provider: this.name,
      model: this.model,
      url: `${this.#baseUrl}/chat/completions`,
      headers: { Authorization: `Bearer ${this.#apiKey}` },
      body: {
        model: this.model,
        messages: toTextMessages(messages, tools),
        max_tokens: MAX_NEW_TOKENS,
        stream,
      },
      signal: this.requestSignal(options),
    });
  }
}
