/**
 * Client Metrics Collection
 *
 * Counts model round trips, tool executions and retries:
 * - Completion requests and latency
 * - Tool call outcomes by error kind
 * - Conversation lengths and stop reasons
 */

import { metrics, type Meter, type Counter, type Histogram, type Attributes } from '@opentelemetry/api';

// =============================================================================
// Types
// =============================================================================

export interface MetricsSummary {
  completions: {
    total: number;
    byStatus: Record<string, number>;
  };
  toolCalls: {
    total: number;
    byTool: Record<string, number>;
    byOutcome: Record<string, number>;
    retries: number;
  };
  conversations: {
    total: number;
    byStopReason: Record<string, number>;
    iterations: number;
  };
}

export type CompletionStatus = 'success' | 'error';

// =============================================================================
// Constants
// =============================================================================

/** Histogram bucket boundaries for completion duration in milliseconds */
export const DURATION_BUCKETS = [50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000, 60000, 120000];

export const METRIC_NAMES = {
  COMPLETIONS_TOTAL: 'agent.completions.total',
  COMPLETIONS_DURATION: 'agent.completions.duration',
  TOOL_CALLS_TOTAL: 'agent.tool_calls.total',
  TOOL_RETRIES_TOTAL: 'agent.tool_calls.retries',
  CONVERSATIONS_TOTAL: 'agent.conversations.total',
  CONVERSATION_ITERATIONS: 'agent.conversations.iterations',
} as const;

// =============================================================================
// MetricsCollector
// =============================================================================

/**
 * Records client metrics through an OpenTelemetry meter.
 *
 * @example
 * ```typescript
 * const collector = createMetricsCollector();
 * collector.recordCompletion('architect', 420, 'success', false);
 * collector.recordToolCall('architect', 'validate_architecture', 'success', 1);
 * ```
 */
export class MetricsCollector {
  private readonly completionsCounter: Counter;
  private readonly completionsDuration: Histogram;
  private readonly toolCallsCounter: Counter;
  private readonly retriesCounter: Counter;
  private readonly conversationsCounter: Counter;
  private readonly iterationsHistogram: Histogram;

  // Internal tracking for getMetrics() (testing/debugging)
  private completionsTotal = 0;
  private completionsByStatus: Record<string, number> = {};
  private toolCallsTotal = 0;
  private toolCallsByTool: Record<string, number> = {};
  private toolCallsByOutcome: Record<string, number> = {};
  private retriesTotal = 0;
  private conversationsTotal = 0;
  private conversationsByStopReason: Record<string, number> = {};
  private iterationsTotal = 0;

  constructor(meter: Meter) {
    this.completionsCounter = meter.createCounter(METRIC_NAMES.COMPLETIONS_TOTAL, {
      description: 'Total number of chat completion requests',
      unit: '1',
    });

    this.completionsDuration = meter.createHistogram(METRIC_NAMES.COMPLETIONS_DURATION, {
      description: 'Duration of chat completion requests in milliseconds',
      unit: 'ms',
      advice: {
        explicitBucketBoundaries: DURATION_BUCKETS,
      },
    });

    this.toolCallsCounter = meter.createCounter(METRIC_NAMES.TOOL_CALLS_TOTAL, {
      description: 'Total number of tool calls executed',
      unit: '1',
    });

    this.retriesCounter = meter.createCounter(METRIC_NAMES.TOOL_RETRIES_TOTAL, {
      description: 'Handler attempts beyond the first',
      unit: '1',
    });

    this.conversationsCounter = meter.createCounter(METRIC_NAMES.CONVERSATIONS_TOTAL, {
      description: 'Total number of tool-calling conversations',
      unit: '1',
    });

    this.iterationsHistogram = meter.createHistogram(METRIC_NAMES.CONVERSATION_ITERATIONS, {
      description: 'Model round trips per conversation',
      unit: '1',
    });
  }

  /**
   * Records one chat completion round trip.
   */
  recordCompletion(
    agent: string,
    durationMs: number,
    status: CompletionStatus,
    streamed: boolean
  ): void {
    const attributes: Attributes = { agent, status, streamed };

    this.completionsCounter.add(1, attributes);
    this.completionsDuration.record(durationMs, attributes);

    this.completionsTotal++;
    this.completionsByStatus[status] = (this.completionsByStatus[status] ?? 0) + 1;
  }

  /**
   * Records a finished tool call.
   *
   * @param outcome - 'success' or the failure's error kind
   * @param attempts - handler attempts made (0 when the call never reached a handler)
   */
  recordToolCall(agent: string, tool: string, outcome: string, attempts: number): void {
    const attributes: Attributes = { agent, tool, outcome };
    this.toolCallsCounter.add(1, attributes);

    const retries = Math.max(0, attempts - 1);
    if (retries > 0) {
      this.retriesCounter.add(retries, { agent, tool });
    }

    this.toolCallsTotal++;
    this.toolCallsByTool[tool] = (this.toolCallsByTool[tool] ?? 0) + 1;
    this.toolCallsByOutcome[outcome] = (this.toolCallsByOutcome[outcome] ?? 0) + 1;
    this.retriesTotal += retries;
  }

  recordConversation(agent: string, iterations: number, stopReason: string): void {
    const attributes: Attributes = { agent, stop_reason: stopReason };
    this.conversationsCounter.add(1, attributes);
    this.iterationsHistogram.record(iterations, attributes);

    this.conversationsTotal++;
    this.conversationsByStopReason[stopReason] =
      (this.conversationsByStopReason[stopReason] ?? 0) + 1;
    this.iterationsTotal += iterations;
  }

  /**
   * Gets a summary of current metrics (for testing/debugging).
   * Note: This returns internally tracked values, not actual OpenTelemetry values.
   */
  getMetrics(): MetricsSummary {
    return {
      completions: {
        total: this.completionsTotal,
        byStatus: { ...this.completionsByStatus },
      },
      toolCalls: {
        total: this.toolCallsTotal,
        byTool: { ...this.toolCallsByTool },
        byOutcome: { ...this.toolCallsByOutcome },
        retries: this.retriesTotal,
      },
      conversations: {
        total: this.conversationsTotal,
        byStopReason: { ...this.conversationsByStopReason },
        iterations: this.iterationsTotal,
      },
    };
  }

  resetMetrics(): void {
    this.completionsTotal = 0;
    this.completionsByStatus = {};
    this.toolCallsTotal = 0;
    this.toolCallsByTool = {};
    this.toolCallsByOutcome = {};
    this.retriesTotal = 0;
    this.conversationsTotal = 0;
    this.conversationsByStopReason = {};
    this.iterationsTotal = 0;
  }
}

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Creates a MetricsCollector on the global meter provider.
 *
 * @param meterName - Optional meter name (default: 'agent-tool-client')
 */
export function createMetricsCollector(meterName = 'agent-tool-client'): MetricsCollector {
  return new MetricsCollector(metrics.getMeter(meterName));
}
