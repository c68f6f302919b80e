import { ToolExecutionError, errorMessage } from '../core/errors.js';
import type { ToolArguments } from '../core/types.js';
import { optionalInteger, optionalString, requireString } from './arguments.js';
import type { Tool, ToolExecutionContext } from './types.js';

const DEFAULT_TIMEOUT_SECONDS = 30;
const MAX_TIMEOUT_SECONDS = 120;
const MAX_CONTENT_LENGTH = 50_000;
const USER_AGENT = 'tooldrive/0.1';
const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'] as const;
type HttpMethod = (typeof HTTP_METHODS)[number];

function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some((method) => method === value);
}

/** Accepts bare hosts by assuming https; anything but http(s) is refused. */
export function normalizeUrl(toolName: string, raw: string): URL {
  const candidate = /^[a-z][a-z0-9+.-]*:/i.test(raw) ? raw : `https://${raw}`;
  let url: URL;
  try {
    url = new URL(candidate);
  } catch (error) {
    throw new ToolExecutionError(toolName, `Invalid URL: ${errorMessage(error)}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ToolExecutionError(toolName, 'Invalid URL: Only HTTP(S) URLs are supported');
  }
  return url;
}

/** Reduce an HTML page to readable text. */
export function htmlToText(html: string): string {
  return html
    .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, '')
    .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, '')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/?(p|div|h[1-6]|li|tr)(\s[^>]*)?>/gi, '\n')
    .replace(/<[^>]+>/g, '')
    .replace(/&nbsp;/g, ' ')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, '&')
    .replace(/\n\s*\n/g, '\n\n')
    .replace(/ +/g, ' ')
    .trim();
}

function truncateContent(content: string, marker: string): string {
  return content.length > MAX_CONTENT_LENGTH ? `${content.slice(0, MAX_CONTENT_LENGTH)}\n\n... (${marker} truncated)` : content;
}

function isJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

function prettyJson(text: string): string {
  try {
    return JSON.stringify(JSON.parse(text), null, 2);
  } catch {
    return text;
  }
}

function requestSignal(args: ToolArguments, context: ToolExecutionContext) {
  const seconds = Math.min(
    MAX_TIMEOUT_SECONDS,
    Math.max(1, optionalInteger(args, 'timeout', DEFAULT_TIMEOUT_SECONDS)),
  );
  const timeout = AbortSignal.timeout(seconds * 1000);
  return { seconds, signal: context.signal ? AbortSignal.any([context.signal, timeout]) : timeout };
}

function transportFailure(toolName: string, error: unknown, seconds: number): Error {
  if (error instanceof Error && error.name === 'TimeoutError') {
    return new ToolExecutionError(toolName, `Request timed out after ${seconds} seconds`);
  }
  if (error instanceof Error && error.name === 'AbortError') {
    return error;
  }
  return new ToolExecutionError(toolName, `Request failed: ${errorMessage(error)}`);
}

function buildWebFetchTool(): Tool {
  return {
    name: 'web_fetch',
    description:
      'Fetch a URL and return its text. HTML is reduced to readable text and JSON is pretty-printed. ' +
      'Useful for documentation and API responses.',
    parameters: [
      { name: 'url', type: 'string', description: 'The URL to fetch' },
      {
        name: 'timeout',
        type: 'integer',
        description: `Timeout in seconds (max ${MAX_TIMEOUT_SECONDS})`,
        required: false,
        default: DEFAULT_TIMEOUT_SECONDS,
      },
    ],
    async execute(args, context) {
      const url = normalizeUrl('web_fetch', requireString('web_fetch', args, 'url'));
      const { seconds, signal } = requestSignal(args, context);

      let response: Response;
      let body: string;
      try {
        response = await fetch(url, { headers: { 'User-Agent': USER_AGENT }, redirect: 'follow', signal });
        body = await response.text();
      } catch (error) {
        throw transportFailure('web_fetch', error, seconds);
      }
      if (!response.ok) {
        throw new ToolExecutionError('web_fetch', `HTTP error ${response.status}: ${response.statusText}`);
      }

      const contentType = (response.headers.get('content-type') ?? '').toLowerCase();
      if (contentType.includes('application/json')) {
        body = prettyJson(body);
      } else if (contentType.includes('text/html')) {
        body = htmlToText(body);
      }
      return `URL: ${url.href}\nStatus: ${response.status}\n\n${truncateContent(body, 'content')}`;
    },
  };
}

function readHeaders(toolName: string, args: ToolArguments): Record<string, string> {
  const value = args.headers;
  if (value === undefined || value === null) {
    return {};
  }
  if (typeof value !== 'object' || Array.isArray(value)) {
    throw new ToolExecutionError(toolName, 'headers must be an object of strings.');
  }
  const headers: Record<string, string> = {};
  for (const [key, header] of Object.entries(value)) {
    headers[key] = String(header);
  }
  return headers;
}

function buildHttpRequestTool(): Tool {
  return {
    name: 'http_request',
    description:
      'Send an HTTP request to an API endpoint and return the status, response headers and body. ' +
      'A JSON body is sent as application/json unless a Content-Type header is given.',
    parameters: [
      { name: 'url', type: 'string', description: 'The URL to send the request to' },
      {
        name: 'method',
        type: 'string',
        description: 'HTTP method',
        required: false,
        default: 'GET',
        enum: [...HTTP_METHODS],
      },
      { name: 'headers', type: 'object', description: 'Request headers as key-value pairs', required: false },
      { name: 'body', type: 'string', description: 'Request body, JSON or plain text', required: false },
      {
        name: 'timeout',
        type: 'integer',
        description: `Timeout in seconds (max ${MAX_TIMEOUT_SECONDS})`,
        required: false,
        default: DEFAULT_TIMEOUT_SECONDS,
      },
    ],
    async execute(args, context) {
      const method = (optionalString(args, 'method') ?? 'GET').toUpperCase();
      if (!isHttpMethod(method)) {
        throw new ToolExecutionError('http_request', `Unsupported HTTP method: ${method}`);
      }
      const url = normalizeUrl('http_request', requireString('http_request', args, 'url'));
      const headers: Record<string, string> = { 'User-Agent': USER_AGENT, ...readHeaders('http_request', args) };

      const body = optionalString(args, 'body');
      const hasContentType = Object.keys(headers).some((key) => key.toLowerCase() === 'content-type');
      if (body !== undefined && !hasContentType && isJson(body)) {
        headers['Content-Type'] = 'application/json';
      }

      const { seconds, signal } = requestSignal(args, context);
      let response: Response;
      let text: string;
      try {
        response = await fetch(url, { method, headers, body, redirect: 'follow', signal });
        text = await response.text();
      } catch (error) {
        throw transportFailure('http_request', error, seconds);
      }

      if ((response.headers.get('content-type') ?? '').includes('application/json')) {
        text = prettyJson(text);
      }
      const lines = [`Status: ${response.status} ${response.statusText}`, `URL: ${response.url || url.href}`, '', 'Response Headers:'];
      response.headers.forEach((value, key) => {
        lines.push(`  ${key}: ${value}`);
      });
      lines.push('', 'Response Body:', text ? truncateContent(text, 'body') : '(empty body)');
      return lines.join('\n');
    },
  };
}

export function createWebTools(): Tool[] {
  return [buildWebFetchTool(), buildHttpRequestTool()];
}
