/**
 * Span helpers over the OpenTelemetry API.
 *
 * Without a registered SDK the tracer is a no-op; hosts that install one get
 * a span per conversation, per model turn and per tool call.
 */

import { trace, SpanStatusCode, type Attributes, type Span } from '@opentelemetry/api';

export const TRACER_NAME = 'agent-tool-client';

/**
 * Run `fn` inside an active span. The span is ended when `fn` settles and
 * marked as errored if it rejects; the rejection is rethrown unchanged.
 */
export async function withSpan<T>(
  name: string,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      if (error instanceof Error) {
        span.recordException(error);
      }
      throw error;
    } finally {
      span.end();
    }
  });
}
