import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { trace, TraceFlags, type SpanContext } from '@opentelemetry/api';
import {
  StructuredLogger,
  createSilentLogger,
  LOG_LEVEL_PRIORITY,
  type LogEntry,
} from '../../../src/observability/logger.js';

// =============================================================================
// Test Setup
// =============================================================================

const originalEnv = { ...process.env };

function createOutput() {
  const lines: string[] = [];
  const output = vi.fn((json: string) => {
    lines.push(json);
  });
  const entries = (): LogEntry[] => lines.map((line) => JSON.parse(line));
  return { output, lines, entries };
}

// =============================================================================
// StructuredLogger Tests
// =============================================================================

describe('StructuredLogger', () => {
  beforeEach(() => {
    delete process.env['AGENT_LOG_LEVEL'];
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  describe('constructor', () => {
    it('should create with default options', () => {
      const logger = new StructuredLogger();
      expect(logger.getName()).toBeUndefined();
      expect(logger.getLevel()).toBe('info');
    });

    it('should read AGENT_LOG_LEVEL from environment', () => {
      process.env['AGENT_LOG_LEVEL'] = 'warning';
      expect(new StructuredLogger().getLevel()).toBe('warning');
    });

    it('should prefer options.minLevel over environment', () => {
      process.env['AGENT_LOG_LEVEL'] = 'warning';
      expect(new StructuredLogger({ minLevel: 'debug' }).getLevel()).toBe('debug');
    });

    it('should ignore an invalid AGENT_LOG_LEVEL', () => {
      process.env['AGENT_LOG_LEVEL'] = 'chatty';
      expect(new StructuredLogger().getLevel()).toBe('info');
    });

    it('should write to stderr by default', () => {
      const logger = new StructuredLogger({ name: 'stderr-check' });
      logger.info('hello');
      expect(console.error).toHaveBeenCalledTimes(1);
      expect(console.log).not.toHaveBeenCalled();
    });
  });

  describe('JSON output format', () => {
    it('should include level, message, logger and data', () => {
      const { output, entries } = createOutput();
      const logger = new StructuredLogger({ name: 'executor', output });

      logger.info('Tool call succeeded', { tool: 'plan_sprint', attempt: 1 });

      const [entry] = entries();
      expect(entry?.level).toBe('info');
      expect(entry?.message).toBe('Tool call succeeded');
      expect(entry?.logger).toBe('executor');
      expect(entry?.data).toEqual({ tool: 'plan_sprint', attempt: 1 });
      expect(entry?.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    });

    it('should omit logger and data when absent', () => {
      const { output, entries } = createOutput();
      new StructuredLogger({ output }).notice('bare');

      const [entry] = entries();
      expect(entry).not.toHaveProperty('logger');
      expect(entry).not.toHaveProperty('data');
    });

    it('should emit one line per entry', () => {
      const { output, lines } = createOutput();
      const logger = new StructuredLogger({ output });
      logger.info('first', { text: 'multi\nline' });
      logger.info('second');

      expect(lines).toHaveLength(2);
      expect(lines[0]).not.toContain('\n');
    });
  });

  describe('level filtering', () => {
    it('should drop entries less severe than the minimum', () => {
      const { output, entries } = createOutput();
      const logger = new StructuredLogger({ minLevel: 'warning', output });

      logger.debug('d');
      logger.info('i');
      logger.notice('n');
      logger.warning('w');
      logger.error('e');
      logger.critical('c');

      expect(entries().map((e) => e.level)).toEqual(['warning', 'error', 'critical']);
    });

    it('should order priorities by severity', () => {
      expect(LOG_LEVEL_PRIORITY.emergency).toBeLessThan(LOG_LEVEL_PRIORITY.error);
      expect(LOG_LEVEL_PRIORITY.error).toBeLessThan(LOG_LEVEL_PRIORITY.debug);
    });

    it('should report shouldLog consistently with filtering', () => {
      const logger = new StructuredLogger({ minLevel: 'notice', output: () => {} });
      expect(logger.shouldLog('notice')).toBe(true);
      expect(logger.shouldLog('error')).toBe(true);
      expect(logger.shouldLog('info')).toBe(false);
    });
  });

  describe('child loggers', () => {
    it('should join names with a dot and share level and output', () => {
      const { output, entries } = createOutput();
      const parent = new StructuredLogger({ name: 'agent-client', minLevel: 'debug', output });
      const child = parent.child('executor');

      child.debug('from child');

      expect(child.getName()).toBe('agent-client.executor');
      expect(child.getLevel()).toBe('debug');
      expect(entries()[0]?.logger).toBe('agent-client.executor');
    });

    it('should use the child name alone when the parent is unnamed', () => {
      expect(new StructuredLogger({ output: () => {} }).child('registry').getName()).toBe('registry');
    });
  });

  describe('trace correlation', () => {
    it('should attach trace and span ids of the active span', () => {
      const { output, entries } = createOutput();
      const logger = new StructuredLogger({ output });
      const spanContext: SpanContext = {
        traceId: '0af7651916cd43dd8448eb211c80319c',
        spanId: 'b7ad6b7169203331',
        traceFlags: TraceFlags.SAMPLED,
      };

      vi.spyOn(trace, 'getSpan').mockReturnValue(trace.wrapSpanContext(spanContext));
      logger.info('inside span');

      const [entry] = entries();
      expect(entry?.traceId).toBe('0af7651916cd43dd8448eb211c80319c');
      expect(entry?.spanId).toBe('b7ad6b7169203331');
    });

    it('should omit ids when the span context is invalid', () => {
      const { output, entries } = createOutput();
      vi.spyOn(trace, 'getSpan').mockReturnValue(
        trace.wrapSpanContext({ traceId: '0'.repeat(32), spanId: '0'.repeat(16), traceFlags: TraceFlags.NONE })
      );
      new StructuredLogger({ output }).info('invalid span');
      expect(entries()[0]).not.toHaveProperty('spanId');
    });

    it('should omit ids when no span is active', () => {
      const { output, entries } = createOutput();
      new StructuredLogger({ output }).info('outside span');
      expect(entries()[0]).not.toHaveProperty('traceId');
    });
  });
});

describe('createSilentLogger', () => {
  it('should not write anything', () => {
    const logger = createSilentLogger();
    logger.critical('ignored');
    expect(console.error).not.toHaveBeenCalled();
  });
});
