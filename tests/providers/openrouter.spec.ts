import { afterEach, describe, expect, it, vi } from 'vitest';
import { ApiError, ModelNotFoundError, ProviderConfigError } from '../../src/core/errors.js';
import { createToolCall } from '../../src/core/messages.js';
import { aggregateStream } from '../../src/core/stream-aggregator.js';
import type { ToolSchema } from '../../src/core/types.js';
import { OpenRouterAdapter } from '../../src/providers/openrouter.js';
import { collect, jsonResponse, noSleep, sentBody, sentHeaders, sse, streamResponse, stubFetch } from '../harness/http.js';

const globTool: ToolSchema = {
  type: 'function',
  function: {
    name: 'glob',
    description: 'Find files',
    parameters: { type: 'object', properties: { pattern: { type: 'string', description: 'Pattern' } }, required: ['pattern'] },
  },
};

function adapter(): OpenRouterAdapter {
  return new OpenRouterAdapter({ apiKey: 'test-secret', retry: noSleep });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('OpenRouterAdapter', () => {
  it('requires an API key', () => {
    expect(() => new OpenRouterAdapter({ apiKey: '  ' })).toThrow(ProviderConfigError);
  });

  it('defaults the model and lists recommendations', () => {
    const provider = adapter();
    expect(provider.model).toBe('deepseek/deepseek-chat');
    expect(provider.listModels()).toContain('openai/gpt-4o');
    expect(provider.freeModels().every((model) => model.endsWith(':free'))).toBe(true);
  });

  it('posts the conversation and parses tool calls and usage', async () => {
    const { calls } = stubFetch(() =>
      jsonResponse({
        choices: [
          {
            message: {
              content: null,
              tool_calls: [{ id: 'call_a', type: 'function', function: { name: 'glob', arguments: '{"pattern":"*.ts"}' } }],
            },
            finish_reason: 'tool_calls',
          },
        ],
        usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
      }),
    );
    const provider = adapter();

    const response = await provider.chat([{ role: 'user', content: 'list files' }], [globTool]);

    expect(response).toEqual({
      content: undefined,
      toolCalls: [createToolCall('call_a', 'glob', { pattern: '*.ts' })],
      finishReason: 'tool_calls',
    });
    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe('https://openrouter.ai/api/v1/chat/completions');
    expect(sentHeaders(calls[0])).toEqual({
      'content-type': 'application/json',
      authorization: 'Bearer test-secret',
      'http-referer': 'https://github.com/tooldrive/tooldrive',
      'x-title': 'tooldrive',
    });
    expect(sentBody(calls[0])).toEqual({
      model: 'deepseek/deepseek-chat',
      messages: [{ role: 'user', content: 'list files' }],
      tools: [globTool],
    });
    expect(provider.tokenUsage).toEqual({ promptTokens: 10, completionTokens: 5, totalTokens: 15 });
  });

  it('omits the tools field when no tools are offered', async () => {
    const { calls } = stubFetch(() => jsonResponse({ choices: [{ message: { content: 'hi' }, finish_reason: 'stop' }] }));

    const response = await adapter().chat([{ role: 'user', content: 'hello' }], []);

    expect(response.content).toBe('hi');
    expect(sentBody(calls[0])).toEqual({ model: 'deepseek/deepseek-chat', messages: [{ role: 'user', content: 'hello' }] });
  });

  it('retries a server error', async () => {
    const { calls } = stubFetch(
      () => new Response('busy', { status: 503 }),
      () => jsonResponse({ choices: [{ message: { content: 'done' }, finish_reason: 'stop' }] }),
    );

    await expect(adapter().chat([{ role: 'user', content: 'x' }], [])).resolves.toMatchObject({ content: 'done' });
    expect(calls).toHaveLength(2);
  });

  it('does not retry a rejected key', async () => {
    const { calls } = stubFetch(() => jsonResponse({ error: { message: 'User not found' } }, 401));

    const failure = adapter().chat([{ role: 'user', content: 'x' }], []);

    await expect(failure).rejects.toThrow(
      new ApiError('openrouter', 'Authentication failed (HTTP 401). Check your API key. User not found', 401),
    );
    expect(calls).toHaveLength(1);
  });

  it('maps 404 to a missing model', async () => {
    stubFetch(() => new Response('', { status: 404 }));

    await expect(adapter().chat([{ role: 'user', content: 'x' }], [])).rejects.toBeInstanceOf(ModelNotFoundError);
  });

  it('rejects a response without choices', async () => {
    stubFetch(() => jsonResponse({ choices: [] }));

    await expect(adapter().chat([{ role: 'user', content: 'x' }], [])).rejects.toThrow(
      "API error from 'openrouter': Response contained no choices.",
    );
  });

  it('streams content and positional tool-call deltas', async () => {
    const { calls } = stubFetch(() =>
      streamResponse(
        ': OPENROUTER PROCESSING\n\n',
        sse({ choices: [{ delta: { content: 'Hel' } }] }),
        sse({ choices: [{ delta: { content: 'lo' } }] }),
        sse({ choices: [{ delta: { tool_calls: [{ index: 0, id: 'call_a', function: { name: 'glob', arguments: '' } }] } }] }),
        sse({
          choices: [{ delta: { tool_calls: [{ index: 0, function: { arguments: '{"pattern":"*.ts"}' } }] }, finish_reason: 'tool_calls' }],
        }),
        sse({ choices: [], usage: { prompt_tokens: 4, completion_tokens: 6 } }),
        'data: [DONE]\n\n',
      ),
    );
    const provider = adapter();

    const chunks = await collect(provider.stream([{ role: 'user', content: 'x' }], [globTool]));

    expect(chunks).toHaveLength(5);
    expect(chunks.map((chunk) => chunk.content)).toEqual(['Hel', 'lo', '', '', '']);
    expect(chunks[4]).toEqual({ content: '', toolCalls: [], toolCallDeltas: [], isComplete: true, finishReason: 'tool_calls' });
    expect(await aggregateStream(toAsync(chunks))).toEqual({
      content: 'Hello',
      toolCalls: [createToolCall('call_a', 'glob', { pattern: '*.ts' })],
      finishReason: 'tool_calls',
    });
    expect(sentBody(calls[0])).toMatchObject({ stream: true, stream_options: { include_usage: true } });
    expect(provider.tokenUsage).toEqual({ promptTokens: 4, completionTokens: 6, totalTokens: 10 });
  });

  it('surfaces an error event in the stream', async () => {
    stubFetch(() => streamResponse(sse({ choices: [{ delta: { content: 'par' } }] }), sse({ error: { message: 'overloaded' } })));

    await expect(collect(adapter().stream([{ role: 'user', content: 'x' }], []))).rejects.toThrow(
      "API error from 'openrouter': Streaming error: overloaded",
    );
  });

  describe('validateApiKey', () => {
    it('accepts a key the service recognizes', async () => {
      const { calls } = stubFetch(() => jsonResponse({ data: { label: 'test' } }));

      await expect(adapter().validateApiKey()).resolves.toBe(true);
      expect(calls[0]?.url).toBe('https://openrouter.ai/api/v1/auth/key');
    });

    it('rejects a key the service refuses', async () => {
      stubFetch(() => new Response('', { status: 401 }));

      await expect(adapter().validateApiKey()).rejects.toThrow(
        "Invalid configuration for 'openrouter': Invalid API key. Check your key at https://openrouter.ai/keys",
      );
    });

    it('treats an unreachable service as inconclusive', async () => {
      stubFetch(() => new TypeError('fetch failed'));

      await expect(adapter().validateApiKey()).resolves.toBe(true);
    });
  });
});

async function* toAsync<T>(items: T[]): AsyncGenerator<T> {
  yield* items;
}
