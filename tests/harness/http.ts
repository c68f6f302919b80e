import { vi } from 'vitest';

type FetchInput = string | URL | Request;

export interface FetchCall {
  url: string;
  init: RequestInit | undefined;
}

/** A body that arrives in the given pieces, so framing across chunk boundaries is exercised. */
export function streamOf(...parts: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const part of parts) {
        controller.enqueue(encoder.encode(part));
      }
      controller.close();
    },
  });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

export function sse(payload: unknown): string {
  return `data: ${typeof payload === 'string' ? payload : JSON.stringify(payload)}\n\n`;
}

export function streamResponse(...parts: string[]): Response {
  return new Response(streamOf(...parts), { status: 200 });
}

/**
 * Replace global fetch with a queue of canned responses. Each entry is a
 * factory so a retried request gets a fresh, unread body; an Error entry
 * rejects that call.
 */
export function stubFetch(...queue: Array<() => Response | Error>) {
  const calls: FetchCall[] = [];
  const pending = [...queue];
  const fetchMock = vi.fn(async (input: FetchInput, init?: RequestInit): Promise<Response> => {
    calls.push({ url: input instanceof Request ? input.url : String(input), init });
    const next = pending.shift();
    if (!next) {
      throw new Error('stubFetch: no response queued');
    }
    const outcome = next();
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome;
  });
  vi.stubGlobal('fetch', fetchMock);
  return { calls, fetchMock };
}

/** The JSON body sent with a recorded call. */
export function sentBody(call: FetchCall | undefined): unknown {
  const body = call?.init?.body;
  return typeof body === 'string' ? JSON.parse(body) : undefined;
}

export function sentHeaders(call: FetchCall | undefined): Record<string, string> {
  const headers = call?.init?.headers;
  return Object.fromEntries(new Headers(headers).entries());
}

export async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of items) {
    out.push(item);
  }
  return out;
}

export const noSleep = { sleep: async (): Promise<void> => undefined };
