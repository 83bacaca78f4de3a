/**
 * Tool Execution with Retry
 *
 * Decodes a model-requested tool call, dispatches it to the registered
 * handler and retries failed attempts with exponential backoff. Every
 * failure is returned as a ToolResult; nothing is thrown to the caller.
 */

import { setTimeout as sleepFor } from 'node:timers/promises';
import {
  createToolErrorResult,
  createToolSuccessResult,
  errorMessage,
  type ToolResult,
} from '../protocol/errors.js';
import { attempt, err, ok, type Result } from '../protocol/result.js';
import { withSpan } from '../observability/tracing.js';
import { createSilentLogger, type StructuredLogger } from '../observability/logger.js';
import type { MetricsCollector } from '../observability/metrics.js';
import type { ToolCallRequest } from './extractor.js';
import type { ToolArguments, ToolRegistry } from './registry.js';

// =============================================================================
// Types
// =============================================================================

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_BACKOFF_BASE_MS = 1000;

export interface ToolExecutorOptions {
  /** Agent whose handlers are dispatched to */
  agent: string;
  /** Attempts per call, including the first (default: 3) */
  maxRetries?: number | undefined;
  /** Delay after the first failed attempt; doubles each time (default: 1000) */
  backoffBaseMs?: number | undefined;
  /** Replaceable for tests */
  sleep?: ((ms: number) => Promise<void>) | undefined;
  logger?: StructuredLogger | undefined;
  metrics?: MetricsCollector | undefined;
}

const defaultSleep = async (ms: number): Promise<void> => {
  await sleepFor(ms);
};

// =============================================================================
// Argument decoding
// =============================================================================

function isPlainObject(value: unknown): value is ToolArguments {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decode a raw argument payload. Absent or blank payloads decode to `{}`;
 * anything that is not a JSON object is rejected.
 */
export function decodeArguments(raw: string | undefined): Result<ToolArguments, string> {
  if (raw === undefined || raw.trim() === '') {
    return ok({});
  }

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    return err(`Arguments are not valid JSON: ${errorMessage(error)}`);
  }

  if (!isPlainObject(value)) {
    return err(`Arguments must be a JSON object, got ${Array.isArray(value) ? 'array' : typeof value}`);
  }
  return ok(value);
}

/**
 * Delay after failed attempt `n` (0-based)
 */
export function backoffDelay(baseMs: number, attemptIndex: number): number {
  return baseMs * 2 ** attemptIndex;
}

// =============================================================================
// Tool Executor
// =============================================================================

export class ToolExecutor {
  private readonly registry: ToolRegistry;
  private readonly agent: string;
  private readonly maxRetries: number;
  private readonly backoffBaseMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: StructuredLogger;
  private readonly metrics: MetricsCollector | undefined;

  constructor(registry: ToolRegistry, options: ToolExecutorOptions) {
    this.registry = registry;
    this.agent = options.agent;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.backoffBaseMs = options.backoffBaseMs ?? DEFAULT_BACKOFF_BASE_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? createSilentLogger();
    this.metrics = options.metrics;
  }

  getAgent(): string {
    return this.agent;
  }

  /**
   * Execute one tool call.
   *
   * Malformed arguments, an unknown tool and schema validation failures are
   * reported immediately. Handler failures are retried up to `maxRetries`
   * attempts in total; a value below 1 means a single attempt.
   */
  async execute(request: ToolCallRequest, maxRetries: number = this.maxRetries): Promise<ToolResult> {
    return withSpan(
      'tool.execute',
      { 'agent.name': this.agent, 'tool.name': request.name, 'tool.call_id': request.id },
      async (span) => {
        const result = await this.run(request, Math.max(1, maxRetries));
        span.setAttribute('tool.attempts', result.attempts);
        span.setAttribute('tool.success', result.success);

        const outcome = result.success ? 'success' : result.errorKind;
        this.metrics?.recordToolCall(this.agent, request.name, outcome, result.attempts);
        return result;
      }
    );
  }

  private async run(request: ToolCallRequest, attempts: number): Promise<ToolResult> {
    const decoded = decodeArguments(request.rawArguments);
    if (!decoded.ok) {
      this.logger.warning('Rejected tool call arguments', {
        tool: request.name,
        callId: request.id,
        error: decoded.error,
      });
      return createToolErrorResult(request.id, request.name, 'invalid_arguments', decoded.error);
    }

    const entry = this.registry.lookup(this.agent, request.name);
    if (!entry) {
      this.logger.warning('No handler for tool', { agent: this.agent, tool: request.name });
      return createToolErrorResult(
        request.id,
        request.name,
        'unknown_tool',
        `No handler registered for ${this.agent}:${request.name}`
      );
    }

    const prepared = entry.prepare(decoded.value);
    if (!prepared.ok) {
      return createToolErrorResult(request.id, request.name, 'invalid_arguments', prepared.error);
    }

    let lastError = 'Tool execution failed';
    for (let n = 0; n < attempts; n++) {
      const outcome = await attempt(prepared.value);
      if (outcome.ok) {
        this.logger.debug('Tool call succeeded', { tool: request.name, attempt: n + 1 });
        return createToolSuccessResult(request.id, request.name, outcome.value, n + 1);
      }

      lastError = errorMessage(outcome.error);
      this.logger.warning('Tool call attempt failed', {
        tool: request.name,
        attempt: n + 1,
        of: attempts,
        error: lastError,
      });

      if (n < attempts - 1) {
        await this.sleep(backoffDelay(this.backoffBaseMs, n));
      }
    }

    return createToolErrorResult(request.id, request.name, 'handler_failed', lastError, attempts);
  }
}
