import { describe, expect, it } from 'vitest';
import { MessageValidationError } from '../../src/core/errors.js';
import {
  assistantMessage,
  createToolCall,
  hasToolCalls,
  parseToolArguments,
  parseWireToolCall,
  plainMessage,
  systemMessage,
  terminalChunk,
  toWireMessage,
  toolResponseMessage,
  toolResultToWireMessage,
  userMessage,
} from '../../src/core/messages.js';

describe('parseToolArguments', () => {
  it('passes objects through as a copy', () => {
    const raw = { path: 'a.txt' };
    const parsed = parseToolArguments(raw);
    expect(parsed).toEqual({ path: 'a.txt' });
    expect(parsed).not.toBe(raw);
  });

  it('parses JSON object strings', () => {
    expect(parseToolArguments('{"limit": 5}')).toEqual({ limit: 5 });
  });

  it('falls back to an empty mapping for malformed or non-object input', () => {
    expect(parseToolArguments('{"limit": ')).toEqual({});
    expect(parseToolArguments('[1, 2]')).toEqual({});
    expect(parseToolArguments('   ')).toEqual({});
    expect(parseToolArguments(42)).toEqual({});
    expect(parseToolArguments(null)).toEqual({});
  });
});

describe('createToolCall', () => {
  it('freezes the call and its arguments', () => {
    const call = createToolCall('call_1', 'read_file', { file_path: 'x.ts' });
    expect(Object.isFrozen(call)).toBe(true);
    expect(Object.isFrozen(call.arguments)).toBe(true);
  });

  it('defaults to empty arguments', () => {
    expect(createToolCall('call_1', 'list_dir').arguments).toEqual({});
  });
});

describe('role constructors', () => {
  it('builds messages without tool calls', () => {
    expect(systemMessage('sys')).toEqual({ role: 'system', content: 'sys', toolCalls: [] });
    expect(userMessage('hi')).toEqual({ role: 'user', content: 'hi', toolCalls: [] });
    expect(plainMessage('assistant', 'ok')).toEqual({ role: 'assistant', content: 'ok', toolCalls: [] });
  });

  it('omits absent assistant content', () => {
    const message = assistantMessage(undefined, [createToolCall('c1', 'glob', { pattern: '*.ts' })]);
    expect('content' in message).toBe(false);
    expect(message.toolCalls).toHaveLength(1);
    expect('content' in assistantMessage(null)).toBe(false);
  });

  it('rejects tool responses without an id', () => {
    expect(() => toolResponseMessage('  ', 'out')).toThrow(MessageValidationError);
  });
});

describe('toWireMessage', () => {
  it('serializes tool calls in the function-calling shape', () => {
    const message = assistantMessage('Looking', [createToolCall('c1', 'read_file', { file_path: 'a.ts' })]);
    expect(toWireMessage(message)).toEqual({
      role: 'assistant',
      content: 'Looking',
      tool_calls: [{ id: 'c1', type: 'function', function: { name: 'read_file', arguments: { file_path: 'a.ts' } } }],
    });
  });

  it('includes the tool call id on tool messages', () => {
    expect(toWireMessage(toolResponseMessage('c1', 'done'))).toEqual({
      role: 'tool',
      content: 'done',
      tool_call_id: 'c1',
    });
  });

  it('leaves out empty fields', () => {
    expect(toWireMessage(assistantMessage())).toEqual({ role: 'assistant' });
  });

  it('converts results to tool messages', () => {
    expect(toolResultToWireMessage({ toolCallId: 'c9', content: 'Error: nope', isError: true })).toEqual({
      role: 'tool',
      content: 'Error: nope',
      tool_call_id: 'c9',
    });
  });
});

describe('parseWireToolCall', () => {
  it('accepts string and mapping arguments alike', () => {
    const fromString = parseWireToolCall({ id: 'a', function: { name: 'grep', arguments: '{"pattern":"x"}' } });
    const fromObject = parseWireToolCall({ id: 'a', function: { name: 'grep', arguments: { pattern: 'x' } } });
    expect(fromString).toEqual(fromObject);
    expect(fromString.arguments).toEqual({ pattern: 'x' });
  });

  it('treats missing arguments as empty', () => {
    expect(parseWireToolCall({ id: 'a', function: { name: 'list_dir' } }).arguments).toEqual({});
  });
});

describe('responses', () => {
  it('reports whether a response requests tools', () => {
    expect(hasToolCalls({ content: 'hi', toolCalls: [] })).toBe(false);
    expect(hasToolCalls({ toolCalls: [createToolCall('c', 'bash', { command: 'ls' })] })).toBe(true);
  });

  it('wraps a full response as a terminal chunk', () => {
    expect(terminalChunk({ toolCalls: [], finishReason: 'stop' })).toEqual({
      content: '',
      toolCalls: [],
      toolCallDeltas: [],
      isComplete: true,
      finishReason: 'stop',
    });
  });
});
