/**
 * Server-Sent Events decoding for streamed chat completions.
 *
 * Each event line is `data: <json>`; the stream ends with `data: [DONE]`.
 */

import { ChatCompletionChunkSchema, type ChatCompletionChunk } from '../protocol/messages.js';
import { createSilentLogger, type StructuredLogger } from '../observability/logger.js';

export const SSE_DATA_PREFIX = 'data: ';
export const SSE_DONE_SENTINEL = '[DONE]';

type LineResult =
  | { kind: 'chunk'; chunk: ChatCompletionChunk }
  | { kind: 'done' }
  | { kind: 'skip' };

/**
 * Interpret a single event line.
 */
export function parseEventLine(line: string): LineResult {
  const trimmed = line.trim();
  if (!trimmed.startsWith(SSE_DATA_PREFIX)) {
    return { kind: 'skip' };
  }

  const data = trimmed.slice(SSE_DATA_PREFIX.length).trim();
  if (data === SSE_DONE_SENTINEL) {
    return { kind: 'done' };
  }

  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch {
    return { kind: 'skip' };
  }

  const parsed = ChatCompletionChunkSchema.safeParse(json);
  return parsed.success ? { kind: 'chunk', chunk: parsed.data } : { kind: 'skip' };
}

/**
 * Decode a byte stream into chat completion chunks.
 *
 * Partial lines are carried across reads. Lines without the `data: ` prefix
 * and prefixed lines that are not JSON chunks are skipped. The sequence ends
 * at the `[DONE]` sentinel or when the source is exhausted.
 */
export async function* decodeEventStream(
  source: AsyncIterable<Uint8Array | string>,
  logger: StructuredLogger = createSilentLogger()
): AsyncGenerator<ChatCompletionChunk, void, undefined> {
  const decoder = new TextDecoder();
  let buffer = '';

  for await (const piece of source) {
    buffer += typeof piece === 'string' ? piece : decoder.decode(piece, { stream: true });

    const lines = buffer.split('\n');
    buffer = lines.pop() ?? '';

    for (const line of lines) {
      const result = parseEventLine(line);
      if (result.kind === 'done') {
        return;
      }
      if (result.kind === 'chunk') {
        yield result.chunk;
      } else if (line.trim() !== '') {
        logger.debug('Skipping unparseable stream line', { line: line.slice(0, 200) });
      }
    }
  }

  buffer += decoder.decode();
  if (buffer.trim() !== '') {
    const result = parseEventLine(buffer);
    if (result.kind === 'chunk') {
      yield result.chunk;
    }
  }
}
