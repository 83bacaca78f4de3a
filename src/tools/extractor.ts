/**
 * Tool call extraction from chat completion responses.
 */

import type { ChatCompletion } from '../protocol/messages.js';

/**
 * A tool invocation requested by the model. `rawArguments` is left undecoded;
 * decoding happens in the executor so a malformed payload becomes a failed
 * tool result rather than an exception.
 */
export interface ToolCallRequest {
  id: string;
  name: string;
  rawArguments: string | undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function rawArgumentsOf(fn: Record<string, unknown>): string | undefined {
  const value = fn['arguments'];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'string') {
    return value;
  }
  // Some servers send the arguments already decoded
  return JSON.stringify(value);
}

/**
 * Tool calls of the first choice, in the order the model emitted them.
 * Returns an empty list when there are none; never throws.
 */
export function extractToolCalls(response: ChatCompletion): ToolCallRequest[] {
  const toolCalls = response.choices[0]?.message.tool_calls;
  if (!Array.isArray(toolCalls)) {
    return [];
  }

  return toolCalls.map((entry: unknown, index): ToolCallRequest => {
    const call = isRecord(entry) ? entry : {};
    const fn = isRecord(call['function']) ? call['function'] : {};
    const id = call['id'];
    const name = fn['name'];

    return {
      id: typeof id === 'string' && id !== '' ? id : `call_${index}`,
      name: typeof name === 'string' ? name : '',
      rawArguments: rawArgumentsOf(fn),
    };
  });
}
