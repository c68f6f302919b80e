import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ApiError, ModelNotFoundError, ProviderConfigError } from '../../src/core/errors.js';
import { createToolCall } from '../../src/core/messages.js';
import { aggregateStream } from '../../src/core/stream-aggregator.js';
import type { ToolSchema } from '../../src/core/types.js';
import { GroqAdapter } from '../../src/providers/groq.js';
import { collect, noSleep } from '../harness/http.js';

const sdk = vi.hoisted(() => {
  class APIError extends Error {
    readonly status: number | undefined;

    constructor(status: number | undefined, message: string) {
      super(message);
      this.status = status;
    }
  }
  class APIConnectionError extends APIError {
    constructor(message = 'Connection error.') {
      super(undefined, message);
    }
  }
  class APIConnectionTimeoutError extends APIConnectionError {
    constructor() {
      super('Request timed out.');
    }
  }
  class APIUserAbortError extends APIError {
    constructor() {
      super(undefined, 'Request was aborted.');
    }
  }

  const create = vi.fn();
  const clientOptions: unknown[] = [];

  class MockGroq {
    static APIError = APIError;
    static APIConnectionError = APIConnectionError;
    static APIConnectionTimeoutError = APIConnectionTimeoutError;
    static APIUserAbortError = APIUserAbortError;

    chat = { completions: { create } };

    constructor(options: unknown) {
      clientOptions.push(options);
    }
  }

  return { MockGroq, APIError, APIConnectionError, APIConnectionTimeoutError, APIUserAbortError, create, clientOptions };
});

vi.mock('groq-sdk', () => ({ default: sdk.MockGroq }));

const grepTool: ToolSchema = {
  type: 'function',
  function: {
    name: 'grep',
    description: 'Search files',
    parameters: { type: 'object', properties: { pattern: { type: 'string', description: 'Regex' } }, required: ['pattern'] },
  },
};

async function* chunksOf<T>(...items: T[]): AsyncGenerator<T> {
  yield* items;
}

function adapter(): GroqAdapter {
  return new GroqAdapter({ apiKey: 'test-secret', retry: noSleep });
}

beforeEach(() => {
  sdk.create.mockReset();
  sdk.clientOptions.length = 0;
});

describe('GroqAdapter', () => {
  it('requires an API key', () => {
    expect(() => new GroqAdapter({})).toThrow(ProviderConfigError);
  });

  it('configures the client without SDK retries', () => {
    adapter();
    expect(sdk.clientOptions).toEqual([{ apiKey: 'test-secret', maxRetries: 0, timeout: 120_000 }]);
  });

  it('converts the conversation and parses tool calls', async () => {
    sdk.create.mockResolvedValueOnce({
      choices: [
        {
          message: { content: null, tool_calls: [{ id: '', function: { name: 'grep', arguments: '{"pattern":"TODO"}' } }] },
          finish_reason: 'tool_calls',
        },
      ],
    });

    const response = await adapter().chat(
      [
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'find todos' },
        {
          role: 'assistant',
          tool_calls: [{ id: 'c1', type: 'function', function: { name: 'grep', arguments: { pattern: 'x' } } }],
        },
        { role: 'tool', content: 'no matches', tool_call_id: 'c1' },
      ],
      [grepTool],
    );

    expect(response).toEqual({
      content: undefined,
      toolCalls: [createToolCall('call_0', 'grep', { pattern: 'TODO' })],
      finishReason: 'tool_calls',
    });
    expect(sdk.create).toHaveBeenCalledWith(
      {
        model: 'llama-3.3-70b-versatile',
        messages: [
          { role: 'system', content: 'Be brief.' },
          { role: 'user', content: 'find todos' },
          {
            role: 'assistant',
            content: null,
            tool_calls: [{ id: 'c1', type: 'function', function: { name: 'grep', arguments: '{"pattern":"x"}' } }],
          },
          { role: 'tool', content: 'no matches', tool_call_id: 'c1' },
        ],
        tools: [grepTool],
      },
      { signal: undefined },
    );
  });

  it('maps a 404 to a missing model without retrying', async () => {
    sdk.create.mockRejectedValueOnce(new sdk.APIError(404, 'model does not exist'));

    await expect(adapter().chat([{ role: 'user', content: 'x' }], [])).rejects.toBeInstanceOf(ModelNotFoundError);
    expect(sdk.create).toHaveBeenCalledTimes(1);
  });

  it('keeps the status of other API errors', async () => {
    sdk.create.mockRejectedValueOnce(new sdk.APIError(401, 'Invalid API Key'));

    const failure = adapter().chat([{ role: 'user', content: 'x' }], []);

    await expect(failure).rejects.toThrow(new ApiError('groq', 'Invalid API Key', 401));
    expect(sdk.create).toHaveBeenCalledTimes(1);
  });

  it('retries server errors', async () => {
    sdk.create
      .mockRejectedValueOnce(new sdk.APIError(500, 'internal'))
      .mockResolvedValueOnce({ choices: [{ message: { content: 'ok' }, finish_reason: 'stop' }] });

    await expect(adapter().chat([{ role: 'user', content: 'x' }], [])).resolves.toEqual({
      content: 'ok',
      toolCalls: [],
      finishReason: 'stop',
    });
    expect(sdk.create).toHaveBeenCalledTimes(2);
  });

  it('describes connection failures and timeouts', async () => {
    sdk.create.mockRejectedValue(new sdk.APIConnectionError());
    await expect(adapter().chat([{ role: 'user', content: 'x' }], [])).rejects.toThrow(
      "API error from 'groq': Connection failed: Connection error.",
    );
    expect(sdk.create).toHaveBeenCalledTimes(3);

    sdk.create.mockReset();
    sdk.create.mockRejectedValue(new sdk.APIConnectionTimeoutError());
    await expect(adapter().chat([{ role: 'user', content: 'x' }], [])).rejects.toThrow(
      "API error from 'groq': Request timed out. The model may be overloaded.",
    );
  });

  it('passes a user abort through unchanged', async () => {
    const controller = new AbortController();
    controller.abort();
    const abort = new sdk.APIUserAbortError();
    sdk.create.mockRejectedValueOnce(abort);

    await expect(adapter().chat([{ role: 'user', content: 'x' }], [], { signal: controller.signal })).rejects.toBe(abort);
    expect(sdk.create).toHaveBeenCalledTimes(1);
  });

  it('streams content and tool-call deltas', async () => {
    sdk.create.mockResolvedValueOnce(
      chunksOf(
        { choices: [{ index: 0, delta: { content: 'Hel' }, finish_reason: null }] },
        { choices: [{ index: 0, delta: { content: 'lo' }, finish_reason: null }] },
        {
          choices: [
            {
              index: 0,
              delta: { tool_calls: [{ index: 0, id: 'call_g', function: { name: 'grep', arguments: '{"pattern":' } }] },
              finish_reason: null,
            },
          ],
        },
        {
          choices: [
            { index: 0, delta: { tool_calls: [{ index: 0, function: { arguments: '"TODO"}' } }] }, finish_reason: 'tool_calls' },
          ],
        },
        { choices: [] },
      ),
    );

    const chunks = await collect(adapter().stream([{ role: 'user', content: 'x' }], [grepTool]));

    expect(chunks).toHaveLength(5);
    expect(chunks[4]).toEqual({ content: '', toolCalls: [], toolCallDeltas: [], isComplete: true, finishReason: 'tool_calls' });
    expect(await aggregateStream(chunksOf(...chunks))).toEqual({
      content: 'Hello',
      toolCalls: [createToolCall('call_g', 'grep', { pattern: 'TODO' })],
      finishReason: 'tool_calls',
    });
    expect(sdk.create).toHaveBeenCalledWith(expect.objectContaining({ stream: true }), { signal: undefined });
  });
});
