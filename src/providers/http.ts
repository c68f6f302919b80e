import { createParser, type EventSourceMessage } from 'eventsource-parser';
import { ApiError, ModelNotFoundError, ProviderConfigError, ProviderError, errorMessage } from '../core/errors.js';
import { createToolCall, parseToolArguments } from '../core/messages.js';
import type { ToolCall, ToolCallDelta, ToolSchema, WireMessage } from '../core/types.js';
import { scrubSensitiveText } from '../utils/logger.js';
import { withRetry, type RetryOptions } from '../utils/retry.js';

const MAX_ERROR_DETAIL_LENGTH = 500;
const NON_RETRYABLE_STATUSES = new Set([400, 401, 403, 404, 422]);

// ── JSON narrowing ───────────────────────────────────────────────────────────

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(record: JsonRecord | undefined, key: string): string | undefined {
  const value = record?.[key];
  return typeof value === 'string' ? value : undefined;
}

export function readNumber(record: JsonRecord | undefined, key: string): number | undefined {
  const value = record?.[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function readRecord(record: JsonRecord | undefined, key: string): JsonRecord | undefined {
  const value = record?.[key];
  return isRecord(value) ? value : undefined;
}

export function readRecords(record: JsonRecord | undefined, key: string): JsonRecord[] {
  const value = record?.[key];
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

export function parseJsonRecord(raw: string): JsonRecord | undefined {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

// ── Error classification ─────────────────────────────────────────────────────

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

/**
 * Everything is worth another attempt except credential, request-shape and
 * model-not-found failures.
 */
export function isRetryableProviderError(error: unknown): boolean {
  if (error instanceof ModelNotFoundError || error instanceof ProviderConfigError) {
    return false;
  }
  if (error instanceof ApiError) {
    if (error.statusCode === undefined) {
      return true;
    }
    return !NON_RETRYABLE_STATUSES.has(error.statusCode);
  }
  return !isAbortError(error);
}

function extractErrorDetail(bodyText: string): string {
  const parsed = parseJsonRecord(bodyText);
  const nested = readRecord(parsed, 'error');
  const detail = readString(nested, 'message') ?? readString(parsed, 'error') ?? readString(parsed, 'message');
  const text = (detail ?? bodyText).trim();
  return text.length > MAX_ERROR_DETAIL_LENGTH ? `${text.slice(0, MAX_ERROR_DETAIL_LENGTH)}...` : text;
}

function describeStatus(status: number, detail: string): string {
  if (status === 401 || status === 403) {
    return `Authentication failed (HTTP ${status}). Check your API key.${detail ? ` ${detail}` : ''}`;
  }
  if (status === 429) {
    return `Rate limit exceeded (HTTP 429). Please wait a moment and try again.${detail ? ` ${detail}` : ''}`;
  }
  return `HTTP ${status}${detail ? `: ${detail}` : ''}`;
}

/** Map a non-2xx response onto the provider error hierarchy. */
export async function errorFromResponse(provider: string, model: string, response: Response): Promise<ProviderError> {
  const bodyText = await response.text().catch(() => '');
  const detail = scrubSensitiveText(extractErrorDetail(bodyText));

  if (response.status === 404 || /model.*not found|not found.*model/i.test(detail)) {
    return new ModelNotFoundError(model, provider);
  }
  return new ApiError(provider, describeStatus(response.status, detail), response.status);
}

/** Wrap transport-level failures (DNS, refused connections, timeouts). */
export function errorFromTransport(provider: string, error: unknown): unknown {
  if (error instanceof ProviderError) {
    return error;
  }
  if (error instanceof Error && error.name === 'TimeoutError') {
    return new ApiError(provider, 'Request timed out. The model may be overloaded.');
  }
  if (isAbortError(error)) {
    return error;
  }
  return new ApiError(provider, `Connection failed: ${scrubSensitiveText(errorMessage(error))}`);
}

// ── Requests ─────────────────────────────────────────────────────────────────

/**
 * Run `fn` under the shared provider retry policy and surface the final error
 * unchanged. Non-provider failures are wrapped in `ApiError` unless `signal`
 * has aborted, in which case nothing is retried and the failure passes through.
 */
export async function requestWithRetry<T>(
  provider: string,
  label: string,
  fn: () => Promise<T>,
  options: RetryOptions = {},
  signal?: AbortSignal,
): Promise<T> {
  const result = await withRetry(fn, {
    maxAttempts: 3,
    baseDelayMs: 1_000,
    backoffFactor: 2,
    ...options,
    label: `${provider}:${label}`,
    shouldRetry: (error) => !signal?.aborted && isRetryableProviderError(error),
  });

  if (result.ok) {
    return result.value;
  }
  if (result.cause instanceof ProviderError || isAbortError(result.cause) || signal?.aborted) {
    throw result.cause;
  }
  throw new ApiError(provider, result.error);
}

export interface PostRequest {
  provider: string;
  model: string;
  url: string;
  headers?: Record<string, string>;
  body: unknown;
  signal: AbortSignal;
}

/** POST a JSON body and return the response once its status is 2xx. */
export async function postJson(request: PostRequest): Promise<Response> {
  let response: Response;
  try {
    response = await fetch(request.url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...request.headers,
      },
      body: JSON.stringify(request.body),
      signal: request.signal,
    });
  } catch (error) {
    throw errorFromTransport(request.provider, error);
  }

  if (!response.ok) {
    throw await errorFromResponse(request.provider, request.model, response);
  }
  return response;
}

export async function readJsonBody(provider: string, response: Response): Promise<JsonRecord> {
  const text = await response.text();
  const parsed = parseJsonRecord(text);
  if (!parsed) {
    throw new ApiError(provider, 'Response body was not a JSON object.', response.status);
  }
  return parsed;
}

// ── Stream framing ───────────────────────────────────────────────────────────

async function* decodeBody(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }
      yield decoder.decode(value, { stream: true });
    }
    const tail = decoder.decode();
    if (tail) {
      yield tail;
    }
  } finally {
    reader.releaseLock();
  }
}

/** Yield the `data` field of every server-sent event in the body. */
export async function* readSseData(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const queue: EventSourceMessage[] = [];
  const parser = createParser({
    onEvent(event) {
      queue.push(event);
    },
  });

  for await (const text of decodeBody(body)) {
    parser.feed(text);
    while (queue.length > 0) {
      const event = queue.shift();
      if (event) {
        yield event.data;
      }
    }
  }
}

/** Yield every non-empty line of a newline-delimited JSON body. */
export async function* readNdjsonLines(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  let buffer = '';
  for await (const text of decodeBody(body)) {
    buffer += text;
    let newline = buffer.indexOf('\n');
    while (newline !== -1) {
      const line = buffer.slice(0, newline).trim();
      buffer = buffer.slice(newline + 1);
      if (line) {
        yield line;
      }
      newline = buffer.indexOf('\n');
    }
  }
  const rest = buffer.trim();
  if (rest) {
    yield rest;
  }
}

// ── OpenAI chat-completions format ───────────────────────────────────────────

export interface OpenAIWireMessage {
  role: string;
  content: string | null;
  tool_calls?: Array<{ id: string; type: 'function'; function: { name: string; arguments: string } }>;
  tool_call_id?: string;
  name?: string;
}

/** OpenAI-compatible backends expect tool-call arguments as a JSON string. */
export function toOpenAIMessages(messages: WireMessage[]): OpenAIWireMessage[] {
  return messages.map((message) => {
    const wire: OpenAIWireMessage = { role: message.role, content: message.content ?? null };
    if (message.tool_calls && message.tool_calls.length > 0) {
      wire.tool_calls = message.tool_calls.map((call) => ({
        id: call.id,
        type: 'function',
        function: { name: call.function.name, arguments: JSON.stringify(call.function.arguments) },
      }));
    } else if (wire.content === null) {
      wire.content = '';
    }
    if (message.tool_call_id) {
      wire.tool_call_id = message.tool_call_id;
    }
    if (message.name) {
      wire.name = message.name;
    }
    return wire;
  });
}

export function openAIToolPayload(tools: ToolSchema[]): { tools?: ToolSchema[] } {
  return tools.length > 0 ? { tools } : {};
}

export function parseOpenAIToolCalls(message: JsonRecord | undefined): ToolCall[] {
  return readRecords(message, 'tool_calls').map((raw, idx) => {
    const fn = readRecord(raw, 'function');
    return createToolCall(
      readString(raw, 'id') || `call_${idx}`,
      readString(fn, 'name') ?? '',
      parseToolArguments(fn?.arguments),
    );
  });
}

export interface OpenAIUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export function parseOpenAIUsage(body: JsonRecord | undefined): OpenAIUsage | undefined {
  const usage = readRecord(body, 'usage');
  if (!usage) {
    return undefined;
  }
  const promptTokens = readNumber(usage, 'prompt_tokens') ?? 0;
  const completionTokens = readNumber(usage, 'completion_tokens') ?? 0;
  return {
    promptTokens,
    completionTokens,
    totalTokens: readNumber(usage, 'total_tokens') ?? promptTokens + completionTokens,
  };
}

export interface OpenAIStreamEvent {
  content: string;
  toolCallDeltas: ToolCallDelta[];
  finishReason?: string;
  usage?: OpenAIUsage;
  error?: string;
}

/** Decode one `data:` payload of an OpenAI-compatible completion stream. */
export function parseOpenAIStreamEvent(data: string): OpenAIStreamEvent | undefined {
  const body = parseJsonRecord(data);
  if (!body) {
    return undefined;
  }

  const error = readRecord(body, 'error');
  if (error || typeof body.error === 'string') {
    return {
      content: '',
      toolCallDeltas: [],
      error: readString(error, 'message') ?? readString(body, 'error') ?? 'Provider error',
    };
  }

  const choice = readRecords(body, 'choices')[0];
  const delta = readRecord(choice, 'delta');
  const toolCallDeltas = readRecords(delta, 'tool_calls').map((raw, position): ToolCallDelta => {
    const fn = readRecord(raw, 'function');
    return {
      index: readNumber(raw, 'index') ?? position,
      id: readString(raw, 'id'),
      name: readString(fn, 'name'),
      arguments: readString(fn, 'arguments'),
    };
  });

  return {
    content: readString(delta, 'content') ?? '',
    toolCallDeltas,
    finishReason: readString(choice, 'finish_reason'),
    usage: parseOpenAIUsage(body),
  };
}
