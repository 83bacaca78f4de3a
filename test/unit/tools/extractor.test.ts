import { describe, it, expect } from 'vitest';
import { extractToolCalls } from '../../../src/tools/extractor.js';
import { ChatCompletionSchema, type ChatCompletion } from '../../../src/protocol/messages.js';

function responseWith(message: Record<string, unknown>): ChatCompletion {
  return ChatCompletionSchema.parse({
    choices: [{ index: 0, message: { role: 'assistant', content: null, ...message } }],
  });
}

describe('extractToolCalls', () => {
  it('should return calls in emitted order with raw arguments', () => {
    const response = responseWith({
      tool_calls: [
        { id: 'call_a', type: 'function', function: { name: 'validate_architecture', arguments: '{"x":1}' } },
        { id: 'call_b', type: 'function', function: { name: 'plan_sprint', arguments: '{}' } },
      ],
    });

    expect(extractToolCalls(response)).toEqual([
      { id: 'call_a', name: 'validate_architecture', rawArguments: '{"x":1}' },
      { id: 'call_b', name: 'plan_sprint', rawArguments: '{}' },
    ]);
  });

  it('should return an empty list when there are no tool calls', () => {
    expect(extractToolCalls(responseWith({ content: 'Done' }))).toEqual([]);
  });

  it('should return an empty list for a response without choices', () => {
    expect(extractToolCalls(ChatCompletionSchema.parse({ choices: [] }))).toEqual([]);
  });

  it('should return an empty list when tool_calls is not an array', () => {
    expect(extractToolCalls(responseWith({ tool_calls: 'nope' }))).toEqual([]);
  });

  it('should synthesize ids from the position when missing or empty', () => {
    const response = responseWith({
      tool_calls: [
        { type: 'function', function: { name: 'a', arguments: '{}' } },
        { id: '', type: 'function', function: { name: 'b', arguments: '{}' } },
      ],
    });

    expect(extractToolCalls(response).map((call) => call.id)).toEqual(['call_0', 'call_1']);
  });

  it('should keep malformed argument strings undecoded', () => {
    const response = responseWith({
      tool_calls: [{ id: 'c1', type: 'function', function: { name: 'a', arguments: '{"broken' } }],
    });

    expect(extractToolCalls(response)[0]?.rawArguments).toBe('{"broken');
  });

  it('should serialize arguments that arrive already decoded', () => {
    const response = responseWith({
      tool_calls: [{ id: 'c1', type: 'function', function: { name: 'a', arguments: { scope: 'full' } } }],
    });

    expect(extractToolCalls(response)[0]?.rawArguments).toBe('{"scope":"full"}');
  });

  it('should leave absent arguments undefined', () => {
    const response = responseWith({
      tool_calls: [
        { id: 'c1', type: 'function', function: { name: 'a' } },
        { id: 'c2', type: 'function', function: { name: 'b', arguments: null } },
      ],
    });

    expect(extractToolCalls(response).map((call) => call.rawArguments)).toEqual([undefined, undefined]);
  });

  it('should tolerate entries that are not objects', () => {
    const response = responseWith({ tool_calls: [null, { id: 'c1', function: 'x' }] });

    expect(extractToolCalls(response)).toEqual([
      { id: 'call_0', name: '', rawArguments: undefined },
      { id: 'c1', name: '', rawArguments: undefined },
    ]);
  });
});
