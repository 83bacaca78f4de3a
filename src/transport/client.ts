/**
 * Chat Completions Transport
 *
 * Issues `/chat/completions` requests against one agent endpoint, either as a
 * single blocking call or as a lazily consumed event stream, and translates
 * transport failures into typed errors.
 */

import type { AgentEndpoint } from '../agent/endpoint.js';
import {
  AgentProtocolError,
  AgentRemoteError,
  AgentRequestError,
  AgentTimeoutError,
  AgentUnreachableError,
  errorMessage,
} from '../protocol/errors.js';
import {
  ChatCompletionSchema,
  ModelListSchema,
  toWireToolChoice,
  type ChatCompletion,
  type ChatCompletionChunk,
  type ChatCompletionRequest,
  type Message,
  type ToolChoice,
  type ToolDescriptor,
} from '../protocol/messages.js';
import { decodeEventStream } from './sse-decoder.js';
import { createSilentLogger, type StructuredLogger } from '../observability/logger.js';
import type { MetricsCollector } from '../observability/metrics.js';

// =============================================================================
// Types
// =============================================================================

export const DEFAULT_REQUEST_TIMEOUT_MS = 300000;
export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_TOKENS = 2048;

export interface ChatClientOptions {
  /** Per-call network budget (default: 300000) */
  timeoutMs?: number | undefined;
  logger?: StructuredLogger | undefined;
  metrics?: MetricsCollector | undefined;
  /** Replaceable for tests; defaults to the global fetch */
  fetch?: typeof fetch | undefined;
}

export interface CompletionOptions {
  tools?: ToolDescriptor[] | undefined;
  /** Only sent when tools are offered (default: 'auto') */
  toolChoice?: ToolChoice | undefined;
  temperature?: number | undefined;
  maxTokens?: number | undefined;
  /** Additional body fields such as `top_p` or `stop` */
  extra?: Record<string, unknown> | undefined;
}

/**
 * Anything that can answer chat completions; the orchestrator depends on
 * this rather than on the HTTP client.
 */
export interface ChatTransport {
  complete(messages: Message[], options?: CompletionOptions): Promise<ChatCompletion>;
  stream(messages: Message[], options?: CompletionOptions): AsyncGenerator<ChatCompletionChunk, void, undefined>;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Runs a request under a timer-driven abort controller. `timedOut()` tells
 * an abort caused by the timer apart from any other failure.
 */
class RequestDeadline {
  private readonly controller = new AbortController();
  private readonly timer: NodeJS.Timeout;
  private expired = false;

  constructor(timeoutMs: number) {
    this.timer = setTimeout(() => {
      this.expired = true;
      this.controller.abort();
    }, timeoutMs);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  timedOut(): boolean {
    return this.expired;
  }

  clear(): void {
    clearTimeout(this.timer);
  }
}

async function* readBody(
  body: ReadableStream<Uint8Array>
): AsyncGenerator<Uint8Array, void, undefined> {
  const reader = body.getReader();
  let finished = false;
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        return;
      }
      yield value;
    }
  } finally {
    if (!finished) {
      // Consumer stopped early or the read failed: drop the connection
      await reader.cancel().catch(() => undefined);
    }
    reader.releaseLock();
  }
}

// =============================================================================
// ChatClient
// =============================================================================

/**
 * HTTP client for one OpenAI-compatible agent endpoint.
 *
 * @example
 * ```typescript
 * const client = new ChatClient(presetEndpoint('architect'));
 * const response = await client.complete([{ role: 'user', content: 'Hello' }]);
 *
 * for await (const chunk of client.stream(messages)) {
 *   process.stdout.write(chunk.choices[0]?.delta.content ?? '');
 * }
 * ```
 */
export class ChatClient implements ChatTransport {
  private readonly endpoint: AgentEndpoint;
  private readonly timeoutMs: number;
  private readonly logger: StructuredLogger;
  private readonly metrics: MetricsCollector | undefined;
  private readonly fetchImpl: typeof fetch;

  constructor(endpoint: AgentEndpoint, options: ChatClientOptions = {}) {
    this.endpoint = endpoint;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.logger = options.logger ?? createSilentLogger();
    this.metrics = options.metrics;
    this.fetchImpl = options.fetch ?? fetch;
  }

  getEndpoint(): AgentEndpoint {
    return this.endpoint;
  }

  /**
   * Single blocking completion.
   *
   * @throws AgentRequestError, AgentTimeoutError, AgentUnreachableError,
   *   AgentRemoteError or AgentProtocolError
   */
  async complete(messages: Message[], options: CompletionOptions = {}): Promise<ChatCompletion> {
    const body = this.buildRequest(messages, options, false);
    const startTime = Date.now();
    const deadline = new RequestDeadline(this.timeoutMs);

    try {
      const response = await this.post(body, deadline);
      const text = await response.text();

      let json: unknown;
      try {
        json = JSON.parse(text);
      } catch {
        throw new AgentProtocolError(this.endpoint.name, 'Agent response is not valid JSON', {
          body: text.slice(0, 500),
        });
      }

      const parsed = ChatCompletionSchema.safeParse(json);
      if (!parsed.success) {
        throw new AgentProtocolError(
          this.endpoint.name,
          'Agent response is not a chat completion',
          parsed.error.issues
        );
      }

      this.metrics?.recordCompletion(this.endpoint.name, Date.now() - startTime, 'success', false);
      this.logger.debug('Completion received', {
        agent: this.endpoint.name,
        durationMs: Date.now() - startTime,
        finishReason: parsed.data.choices[0]?.finish_reason,
      });
      return parsed.data;
    } catch (error) {
      this.metrics?.recordCompletion(this.endpoint.name, Date.now() - startTime, 'error', false);
      throw this.translateError(error, deadline);
    } finally {
      deadline.clear();
    }
  }

  /**
   * Streamed completion. The request is sent when iteration starts; the
   * connection is closed when the stream is exhausted, when the consumer
   * stops iterating, or on error.
   */
  async *stream(
    messages: Message[],
    options: CompletionOptions = {}
  ): AsyncGenerator<ChatCompletionChunk, void, undefined> {
    const body = this.buildRequest(messages, options, true);
    const startTime = Date.now();
    const deadline = new RequestDeadline(this.timeoutMs);
    let status: 'success' | 'error' = 'error';

    try {
      const response = await this.post(body, deadline);
      if (!response.body) {
        throw new AgentProtocolError(this.endpoint.name, 'Streaming response has no body');
      }

      yield* decodeEventStream(readBody(response.body), this.logger);
      status = 'success';
    } catch (error) {
      throw this.translateError(error, deadline);
    } finally {
      deadline.clear();
      this.metrics?.recordCompletion(this.endpoint.name, Date.now() - startTime, status, true);
    }
  }

  /**
   * Model ids served by the endpoint (`GET /models`); doubles as a
   * reachability probe.
   */
  async listModels(): Promise<string[]> {
    const url = `${this.endpoint.baseUrl}/models`;
    const deadline = new RequestDeadline(this.timeoutMs);

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method: 'GET',
          headers: this.buildHeaders(),
          signal: deadline.signal,
        });
      } catch (error) {
        throw this.translateFetchFailure(error, deadline, url);
      }

      if (!response.ok) {
        throw new AgentRemoteError(this.endpoint.name, response.status, await response.text());
      }

      const parsed = ModelListSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new AgentProtocolError(this.endpoint.name, 'Unexpected /models response', parsed.error.issues);
      }
      return parsed.data.data.map((model) => model.id);
    } catch (error) {
      throw this.translateError(error, deadline);
    } finally {
      deadline.clear();
    }
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private buildRequest(
    messages: Message[],
    options: CompletionOptions,
    stream: boolean
  ): ChatCompletionRequest {
    if (messages.length === 0) {
      throw new AgentRequestError(this.endpoint.name, 'At least one message is required');
    }

    const request: ChatCompletionRequest = {
      ...options.extra,
      model: this.endpoint.model,
      messages,
      temperature: options.temperature ?? DEFAULT_TEMPERATURE,
      max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      stream,
    };

    const tools = options.tools ?? [];
    if (tools.length > 0) {
      const toolChoice = options.toolChoice ?? 'auto';
      if (typeof toolChoice === 'object' && !tools.some((t) => t.function.name === toolChoice.name)) {
        throw new AgentRequestError(
          this.endpoint.name,
          `tool_choice names '${toolChoice.name}', which is not among the offered tools`
        );
      }
      request.tools = tools;
      request.tool_choice = toWireToolChoice(toolChoice);
    }

    return request;
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json, text/event-stream',
    };
    if (this.endpoint.apiKey) {
      headers['Authorization'] = `Bearer ${this.endpoint.apiKey}`;
    }
    return headers;
  }

  private async post(body: ChatCompletionRequest, deadline: RequestDeadline): Promise<Response> {
    const url = `${this.endpoint.baseUrl}/chat/completions`;
    this.logger.debug('Sending chat completion', {
      agent: this.endpoint.name,
      url,
      messages: body.messages.length,
      tools: body.tools?.length ?? 0,
      stream: body.stream,
    });

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: this.buildHeaders(),
        body: JSON.stringify(body),
        signal: deadline.signal,
      });
    } catch (error) {
      throw this.translateFetchFailure(error, deadline, url);
    }

    if (!response.ok) {
      const errorBody = await response.text().catch(() => '');
      throw new AgentRemoteError(this.endpoint.name, response.status, errorBody);
    }

    return response;
  }

  private translateFetchFailure(error: unknown, deadline: RequestDeadline, url: string): Error {
    if (deadline.timedOut()) {
      return new AgentTimeoutError(this.endpoint.name, this.timeoutMs);
    }
    return new AgentUnreachableError(this.endpoint.name, url, error);
  }

  /**
   * Map anything thrown after the request started onto the error taxonomy.
   */
  private translateError(error: unknown, deadline: RequestDeadline): Error {
    if (
      error instanceof AgentTimeoutError ||
      error instanceof AgentUnreachableError ||
      error instanceof AgentRemoteError ||
      error instanceof AgentProtocolError ||
      error instanceof AgentRequestError
    ) {
      return error;
    }
    if (deadline.timedOut()) {
      return new AgentTimeoutError(this.endpoint.name, this.timeoutMs);
    }
    // A reset while reading the body
    this.logger.warning('Connection failed mid-response', {
      agent: this.endpoint.name,
      error: errorMessage(error),
    });
    return new AgentUnreachableError(this.endpoint.name, this.endpoint.baseUrl, error);
  }
}
