/**
 * Folds streamed chunks back into a complete chat completion, so the rest of
 * the pipeline sees the same shape whether or not the response was streamed.
 */

import type {
  ChatCompletion,
  ChatCompletionChunk,
  ToolCallDelta,
  Usage,
  WireToolCall,
} from '../protocol/messages.js';

interface PartialToolCall {
  id: string;
  name: string;
  arguments: string;
}

export class StreamAccumulator {
  private id: string | undefined;
  private model: string | undefined;
  private created: number | undefined;
  private role = 'assistant';
  private content = '';
  private sawContent = false;
  private finishReason: string | null = null;
  private usage: Usage | undefined;
  private readonly toolCalls = new Map<number, PartialToolCall>();
  private chunkCount = 0;

  push(chunk: ChatCompletionChunk): void {
    this.chunkCount++;
    this.id ??= chunk.id;
    this.model ??= chunk.model;
    this.created ??= chunk.created;
    if (chunk.usage) {
      this.usage = chunk.usage;
    }

    const choice = chunk.choices[0];
    if (!choice) {
      return;
    }

    const { delta } = choice;
    if (delta.role) {
      this.role = delta.role;
    }
    if (typeof delta.content === 'string') {
      this.content += delta.content;
      this.sawContent = true;
    }
    for (const [position, toolDelta] of (delta.tool_calls ?? []).entries()) {
      this.mergeToolCall(toolDelta.index ?? position, toolDelta);
    }
    if (choice.finish_reason) {
      this.finishReason = choice.finish_reason;
    }
  }

  /**
   * Number of chunks seen so far
   */
  getChunkCount(): number {
    return this.chunkCount;
  }

  toCompletion(): ChatCompletion {
    const toolCalls: WireToolCall[] = [...this.toolCalls.entries()]
      .sort(([a], [b]) => a - b)
      .map(([index, call]) => ({
        id: call.id || `call_${index}`,
        type: 'function',
        function: { name: call.name, arguments: call.arguments },
      }));

    const message: ChatCompletion['choices'][number]['message'] = {
      role: this.role,
      content: this.sawContent ? this.content : null,
    };
    if (toolCalls.length > 0) {
      message.tool_calls = toolCalls;
    }

    const completion: ChatCompletion = {
      object: 'chat.completion',
      choices: [{ index: 0, message, finish_reason: this.finishReason }],
    };
    if (this.id !== undefined) completion.id = this.id;
    if (this.model !== undefined) completion.model = this.model;
    if (this.created !== undefined) completion.created = this.created;
    if (this.usage !== undefined) completion.usage = this.usage;

    return completion;
  }

  private mergeToolCall(index: number, delta: ToolCallDelta): void {
    const existing = this.toolCalls.get(index) ?? { id: '', name: '', arguments: '' };
    if (delta.id && !existing.id) {
      existing.id = delta.id;
    }
    if (delta.function?.name && !existing.name) {
      existing.name = delta.function.name;
    }
    if (delta.function?.arguments) {
      existing.arguments += delta.function.arguments;
    }
    this.toolCalls.set(index, existing);
  }
}

/**
 * Drain a chunk sequence into one completion.
 *
 * @param onChunk - Called with every chunk as it arrives
 */
export async function assembleStream(
  chunks: AsyncIterable<ChatCompletionChunk>,
  onChunk?: (chunk: ChatCompletionChunk) => void
): Promise<ChatCompletion> {
  const accumulator = new StreamAccumulator();
  for await (const chunk of chunks) {
    accumulator.push(chunk);
    onChunk?.(chunk);
  }
  return accumulator.toCompletion();
}
