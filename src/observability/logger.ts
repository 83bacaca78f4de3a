/**
 * Structured JSON logging with OpenTelemetry correlation
 *
 * Emits NDJSON log lines with RFC 5424 levels and, when a span is active,
 * the trace and span ids of the current OpenTelemetry context.
 */

import { trace, context } from '@opentelemetry/api';
import { z } from 'zod';

// =============================================================================
// Log Levels (RFC 5424)
// =============================================================================

/**
 * RFC 5424 log levels with numeric priorities.
 * Lower number = higher priority (more severe).
 */
export const LOG_LEVEL_PRIORITY = {
  emergency: 0,
  alert: 1,
  critical: 2,
  error: 3,
  warning: 4,
  notice: 5,
  info: 6,
  debug: 7,
} as const;

export const LogLevelSchema = z.enum([
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'critical',
  'alert',
  'emergency',
]);

export type LogLevel = z.infer<typeof LogLevelSchema>;

// =============================================================================
// Types
// =============================================================================

/**
 * Structured log entry format
 */
export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Logger name/component */
  logger?: string;
  traceId?: string;
  spanId?: string;
  data?: unknown;
}

export interface StructuredLoggerOptions {
  /** Logger name/component identifier */
  name?: string | undefined;
  /** Minimum log level (default: from AGENT_LOG_LEVEL env or 'info') */
  minLevel?: LogLevel | undefined;
  /** Output function (default: console.error, keeping stdout for answers) */
  output?: ((json: string) => void) | undefined;
}

// =============================================================================
// Helper Functions
// =============================================================================

function getDefaultLogLevel(): LogLevel {
  const envLevel = process.env['AGENT_LOG_LEVEL'];
  if (envLevel) {
    const result = LogLevelSchema.safeParse(envLevel);
    if (result.success) {
      return result.data;
    }
  }
  return 'info';
}

/**
 * Extracts trace context from the current OpenTelemetry span
 */
function getTraceContext(): { traceId?: string; spanId?: string } {
  const span = trace.getSpan(context.active());
  if (!span) {
    return {};
  }

  const spanContext = span.spanContext();
  if (!trace.isSpanContextValid(spanContext)) {
    return {};
  }

  return {
    traceId: spanContext.traceId,
    spanId: spanContext.spanId,
  };
}

// =============================================================================
// StructuredLogger Class
// =============================================================================

/**
 * Structured JSON logger with OpenTelemetry trace correlation.
 *
 * @example
 * ```typescript
 * const logger = new StructuredLogger({ name: 'orchestrator' });
 *
 * logger.info('Conversation finished', { iterations: 2 });
 * // {"timestamp":"...","level":"info","message":"Conversation finished","logger":"orchestrator","data":{"iterations":2}}
 *
 * const executorLogger = logger.child('executor');
 * // executorLogger.getName() === 'orchestrator.executor'
 * ```
 */
export class StructuredLogger {
  private readonly name?: string;
  private readonly minLevel: LogLevel;
  private readonly output: (json: string) => void;

  constructor(options: StructuredLoggerOptions = {}) {
    if (options.name !== undefined) {
      this.name = options.name;
    }
    this.minLevel = options.minLevel ?? getDefaultLogLevel();
    this.output = options.output ?? ((json: string) => console.error(json));
  }

  shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[this.minLevel];
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  getName(): string | undefined {
    return this.name;
  }

  /**
   * Log a message at the specified level.
   */
  log(level: LogLevel, message: string, data?: unknown): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    if (this.name !== undefined) {
      entry.logger = this.name;
    }

    const traceContext = getTraceContext();
    if (traceContext.traceId) {
      entry.traceId = traceContext.traceId;
    }
    if (traceContext.spanId) {
      entry.spanId = traceContext.spanId;
    }

    if (data !== undefined) {
      entry.data = data;
    }

    this.output(JSON.stringify(entry));
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  notice(message: string, data?: unknown): void {
    this.log('notice', message, data);
  }

  warning(message: string, data?: unknown): void {
    this.log('warning', message, data);
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  critical(message: string, data?: unknown): void {
    this.log('critical', message, data);
  }

  /**
   * Create a child logger whose name is `parent.child`.
   *
   * The child inherits the parent's min level and output function.
   */
  child(childName: string): StructuredLogger {
    const newName = this.name ? `${this.name}.${childName}` : childName;
    return new StructuredLogger({
      name: newName,
      minLevel: this.minLevel,
      output: this.output,
    });
  }
}

/**
 * Logger that drops everything; the default for library classes
 * constructed without one.
 */
export function createSilentLogger(): StructuredLogger {
  return new StructuredLogger({ minLevel: 'emergency', output: () => {} });
}
