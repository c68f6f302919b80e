import { afterEach, describe, expect, it, vi } from 'vitest';
import { ToolExecutionError } from '../../src/core/errors.js';
import type { ToolArguments } from '../../src/core/types.js';
import { createWebTools, htmlToText, normalizeUrl } from '../../src/tools/web.js';
import { jsonResponse, sentHeaders, stubFetch } from '../harness/http.js';

const tools = new Map(createWebTools().map((tool) => [tool.name, tool]));

async function run(name: string, args: ToolArguments): Promise<string> {
  const tool = tools.get(name);
  if (!tool) {
    throw new Error(`unknown tool ${name}`);
  }
  return tool.execute(args, { workingDir: '/w', timeoutMs: 10_000 });
}

async function failure(name: string, args: ToolArguments): Promise<string> {
  try {
    await run(name, args);
  } catch (error) {
    if (error instanceof ToolExecutionError) {
      return error.reason;
    }
    throw error;
  }
  throw new Error(`${name} did not fail`);
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('normalizeUrl', () => {
  it('assumes https for bare hosts', () => {
    expect(normalizeUrl('web_fetch', 'example.com/docs').href).toBe('https://example.com/docs');
    expect(normalizeUrl('web_fetch', 'http://localhost:3000/').href).toBe('http://localhost:3000/');
  });

  it('refuses other schemes', () => {
    expect(() => normalizeUrl('web_fetch', 'file:///etc/hosts')).toThrow(
      new ToolExecutionError('web_fetch', 'Invalid URL: Only HTTP(S) URLs are supported'),
    );
  });
});

describe('htmlToText', () => {
  it('drops scripts and tags and decodes entities', () => {
    const html = '<html><script>alert(1)</script><h1>Title</h1><p>Fish &amp; chips&nbsp;&lt;3</p></html>';
    expect(htmlToText(html)).toBe('Title\n\nFish & chips <3');
  });
});

describe('web_fetch', () => {
  it('returns readable text for HTML pages', async () => {
    const { calls } = stubFetch(
      () => new Response('<p>Hello <b>docs</b></p>', { status: 200, headers: { 'Content-Type': 'text/html; charset=utf-8' } }),
    );

    expect(await run('web_fetch', { url: 'example.com' })).toBe('URL: https://example.com/\nStatus: 200\n\nHello docs');
    expect(calls[0]?.url).toBe('https://example.com/');
    expect(sentHeaders(calls[0])['user-agent']).toBe('tooldrive/0.1');
  });

  it('pretty-prints JSON', async () => {
    stubFetch(() => jsonResponse({ ok: true }));
    expect(await run('web_fetch', { url: 'https://api.example.com/health' })).toBe(
      'URL: https://api.example.com/health\nStatus: 200\n\n{\n  "ok": true\n}',
    );
  });

  it('reports HTTP and transport failures', async () => {
    stubFetch(
      () => new Response('gone', { status: 404, statusText: 'Not Found' }),
      () => new TypeError('fetch failed'),
    );
    expect(await failure('web_fetch', { url: 'https://example.com/a' })).toBe('HTTP error 404: Not Found');
    expect(await failure('web_fetch', { url: 'https://example.com/b' })).toBe('Request failed: fetch failed');
  });
});

describe('http_request', () => {
  it('sends a JSON body and formats the response', async () => {
    const { calls } = stubFetch(
      () => new Response('{"id":7}', { status: 201, statusText: 'Created', headers: { 'Content-Type': 'application/json' } }),
    );

    const output = await run('http_request', {
      url: 'https://api.example.com/items',
      method: 'post',
      headers: { Authorization: 'Bearer test-secret' },
      body: '{"name":"widget"}',
    });

    expect(output).toBe(
      [
        'Status: 201 Created',
        'URL: https://api.example.com/items',
        '',
        'Response Headers:',
        '  content-type: application/json',
        '',
        'Response Body:',
        '{\n  "id": 7\n}',
      ].join('\n'),
    );
    expect(calls[0]?.init?.method).toBe('POST');
    expect(calls[0]?.init?.body).toBe('{"name":"widget"}');
    expect(sentHeaders(calls[0])).toEqual({
      authorization: 'Bearer test-secret',
      'content-type': 'application/json',
      'user-agent': 'tooldrive/0.1',
    });
  });

  it('leaves plain-text bodies without a content type', async () => {
    const { calls } = stubFetch(() => new Response(null, { status: 204, statusText: 'No Content' }));
    const output = await run('http_request', { url: 'https://api.example.com/ping', method: 'PUT', body: 'hello' });

    expect(output.endsWith('Response Body:\n(empty body)')).toBe(true);
    expect(sentHeaders(calls[0])['content-type']).toBeUndefined();
  });

  it('rejects unsupported methods before sending anything', async () => {
    const { fetchMock } = stubFetch();
    expect(await failure('http_request', { url: 'https://example.com', method: 'TRACE' })).toBe(
      'Unsupported HTTP method: TRACE',
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
