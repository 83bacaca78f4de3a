/**
 * Conversation Orchestrator
 *
 * Drives one tool-calling exchange with an agent:
 *
 *   sending -> extracting_calls -> executing -> sending ... -> done
 *
 * The loop ends when the model answers without tool calls or when the
 * iteration ceiling is reached. Tool failures are folded back into the
 * conversation; transport failures propagate to the caller.
 */

import type { AgentEndpoint } from './endpoint.js';
import type { ChatTransport, CompletionOptions } from '../transport/client.js';
import { assembleStream } from '../transport/stream-assembler.js';
import {
  firstMessage,
  type AssistantMessage,
  type ChatCompletion,
  type ChatCompletionChunk,
  type Message,
  type ToolChoice,
  type ToolDescriptor,
  type ToolMessage,
  type WireToolCall,
} from '../protocol/messages.js';
import { toWireToolResult, type ToolResult } from '../protocol/errors.js';
import { extractToolCalls, type ToolCallRequest } from '../tools/extractor.js';
import { DEFAULT_MAX_RETRIES, ToolExecutor } from '../tools/executor.js';
import type { ToolRegistry } from '../tools/registry.js';
import { withSpan } from '../observability/tracing.js';
import { createSilentLogger, type StructuredLogger } from '../observability/logger.js';
import type { MetricsCollector } from '../observability/metrics.js';

// =============================================================================
// Types
// =============================================================================

export const DEFAULT_MAX_ITERATIONS = 5;

export type ConversationPhase = 'sending' | 'extracting_calls' | 'executing' | 'done';

export type StopReason = 'completed' | 'max_iterations';

export interface OrchestratorOptions {
  endpoint: AgentEndpoint;
  client: ChatTransport;
  registry: ToolRegistry;
  /** Defaults to an executor over `registry` for the endpoint's agent */
  executor?: ToolExecutor | undefined;
  logger?: StructuredLogger | undefined;
  metrics?: MetricsCollector | undefined;
}

export interface ChatWithToolsOptions {
  systemPrompt?: string | undefined;
  /** Prior turns; copied, never modified */
  history?: Message[] | undefined;
  /** Defaults to the schemas loaded for the endpoint's agent */
  tools?: ToolDescriptor[] | undefined;
  toolChoice?: ToolChoice | undefined;
  /** Send ceiling (default: 5) */
  maxIterations?: number | undefined;
  /** Handler attempts per tool call (default: 3) */
  maxRetries?: number | undefined;
  temperature?: number | undefined;
  maxTokens?: number | undefined;
  extra?: Record<string, unknown> | undefined;
  /** Request streamed responses and assemble them */
  stream?: boolean | undefined;
  /** Receives each chunk while streaming */
  onDelta?: ((chunk: ChatCompletionChunk) => void) | undefined;
}

export interface ConversationResult {
  finalResponse: ChatCompletion;
  /** Text content of the final response, '' when there is none */
  text: string;
  iterations: number;
  transcript: Message[];
  toolResults: ToolResult[];
  stopReason: StopReason;
}

/**
 * Mutable state of one conversation; lives for a single chatWithTools call.
 */
interface ConversationState {
  phase: ConversationPhase;
  messages: Message[];
  iteration: number;
  lastResponse: ChatCompletion | undefined;
  pendingCalls: ToolCallRequest[];
  toolResults: ToolResult[];
  stopReason: StopReason;
}

// =============================================================================
// Message helpers
// =============================================================================

/**
 * Initial message sequence: optional system prompt, prior history, then the
 * new user message.
 */
export function buildInitialMessages(
  userMessage: string,
  systemPrompt?: string,
  history: Message[] = []
): Message[] {
  const messages: Message[] = [];
  if (systemPrompt) {
    messages.push({ role: 'system', content: systemPrompt });
  }
  messages.push(...history);
  messages.push({ role: 'user', content: userMessage });
  return messages;
}

export function toAssistantMessage(response: ChatCompletion, calls: ToolCallRequest[]): AssistantMessage {
  const content = firstMessage(response)?.content ?? null;
  const message: AssistantMessage = { role: 'assistant', content };
  if (calls.length > 0) {
    message.tool_calls = calls.map(
      (call): WireToolCall => ({
        id: call.id,
        type: 'function',
        function: { name: call.name, arguments: call.rawArguments ?? '{}' },
      })
    );
  }
  return message;
}

export function toToolMessage(result: ToolResult): ToolMessage {
  return {
    role: 'tool',
    tool_call_id: result.callId,
    name: result.toolName,
    content: JSON.stringify(toWireToolResult(result)),
  };
}

// =============================================================================
// ConversationOrchestrator
// =============================================================================

/**
 * @example
 * ```typescript
 * const orchestrator = new ConversationOrchestrator({ endpoint, client, registry });
 * const result = await orchestrator.chatWithTools('Design a login API', {
 *   systemPrompt: 'You are a software architect.',
 * });
 * console.log(result.text, result.iterations);
 * ```
 */
export class ConversationOrchestrator {
  private readonly endpoint: AgentEndpoint;
  private readonly client: ChatTransport;
  private readonly registry: ToolRegistry;
  private readonly executor: ToolExecutor;
  private readonly logger: StructuredLogger;
  private readonly metrics: MetricsCollector | undefined;

  constructor(options: OrchestratorOptions) {
    this.endpoint = options.endpoint;
    this.client = options.client;
    this.registry = options.registry;
    this.logger = options.logger ?? createSilentLogger();
    this.metrics = options.metrics;
    this.executor =
      options.executor ??
      new ToolExecutor(options.registry, {
        agent: options.endpoint.name,
        logger: this.logger.child('executor'),
        metrics: options.metrics,
      });
  }

  async chatWithTools(userMessage: string, options: ChatWithToolsOptions = {}): Promise<ConversationResult> {
    const maxIterations = Math.max(1, options.maxIterations ?? DEFAULT_MAX_ITERATIONS);
    const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    const tools = options.tools ?? this.registry.getToolsForAgent(this.endpoint.name);

    const completionOptions: CompletionOptions = {
      tools,
      toolChoice: options.toolChoice,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      extra: options.extra,
    };

    return withSpan(
      'agent.conversation',
      { 'agent.name': this.endpoint.name, 'conversation.max_iterations': maxIterations },
      async (span) => {
        const state: ConversationState = {
          phase: 'sending',
          messages: buildInitialMessages(userMessage, options.systemPrompt, options.history),
          iteration: 0,
          lastResponse: undefined,
          pendingCalls: [],
          toolResults: [],
          stopReason: 'completed',
        };

        while (state.phase !== 'done') {
          switch (state.phase) {
            case 'sending': {
              state.iteration++;
              this.logger.debug('Sending turn', {
                agent: this.endpoint.name,
                iteration: state.iteration,
                messages: state.messages.length,
              });
              state.lastResponse = await this.send(state.messages, completionOptions, options);
              state.phase = 'extracting_calls';
              break;
            }

            case 'extracting_calls': {
              const response = this.requireResponse(state);
              state.pendingCalls = extractToolCalls(response);
              state.messages.push(toAssistantMessage(response, state.pendingCalls));
              if (state.pendingCalls.length === 0) {
                state.stopReason = 'completed';
                state.phase = 'done';
              } else {
                state.phase = 'executing';
              }
              break;
            }

            case 'executing': {
              for (const call of state.pendingCalls) {
                const result = await this.executor.execute(call, maxRetries);
                state.toolResults.push(result);
                state.messages.push(toToolMessage(result));
              }
              state.pendingCalls = [];

              if (state.iteration >= maxIterations) {
                this.logger.warning('Iteration ceiling reached', {
                  agent: this.endpoint.name,
                  maxIterations,
                });
                state.stopReason = 'max_iterations';
                state.phase = 'done';
              } else {
                state.phase = 'sending';
              }
              break;
            }
          }
        }

        const finalResponse = this.requireResponse(state);
        span.setAttribute('conversation.iterations', state.iteration);
        span.setAttribute('conversation.stop_reason', state.stopReason);
        this.metrics?.recordConversation(this.endpoint.name, state.iteration, state.stopReason);
        this.logger.info('Conversation finished', {
          agent: this.endpoint.name,
          iterations: state.iteration,
          toolCalls: state.toolResults.length,
          stopReason: state.stopReason,
        });

        return {
          finalResponse,
          text: firstMessage(finalResponse)?.content ?? '',
          iterations: state.iteration,
          transcript: state.messages,
          toolResults: state.toolResults,
          stopReason: state.stopReason,
        };
      }
    );
  }

  private async send(
    messages: Message[],
    completionOptions: CompletionOptions,
    options: ChatWithToolsOptions
  ): Promise<ChatCompletion> {
    // The client may hold on to the array; give it a snapshot
    const snapshot = [...messages];
    if (options.stream) {
      return assembleStream(this.client.stream(snapshot, completionOptions), options.onDelta);
    }
    return this.client.complete(snapshot, completionOptions);
  }

  private requireResponse(state: ConversationState): ChatCompletion {
    if (!state.lastResponse) {
      throw new Error(`No response recorded in phase ${state.phase}`);
    }
    return state.lastResponse;
  }
}
