import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import { ToolRegistry } from '../../../src/tools/registry.js';
import { ToolExecutor, backoffDelay, decodeArguments } from '../../../src/tools/executor.js';
import { createMetricsCollector } from '../../../src/observability/metrics.js';
import type { ToolCallRequest } from '../../../src/tools/extractor.js';

function call(name: string, rawArguments: string | undefined = '{}'): ToolCallRequest {
  return { id: 'call_1', name, rawArguments };
}

// =============================================================================
// decodeArguments
// =============================================================================

describe('decodeArguments', () => {
  it('should decode a JSON object', () => {
    expect(decodeArguments('{"scope":"full","n":2}')).toEqual({ ok: true, value: { scope: 'full', n: 2 } });
  });

  it('should treat absent and blank payloads as an empty object', () => {
    expect(decodeArguments(undefined)).toEqual({ ok: true, value: {} });
    expect(decodeArguments('   ')).toEqual({ ok: true, value: {} });
  });

  it('should reject malformed JSON', () => {
    const result = decodeArguments('{"scope":');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.startsWith('Arguments are not valid JSON: ')).toBe(true);
    }
  });

  it('should reject JSON that is not an object', () => {
    expect(decodeArguments('[1,2]')).toEqual({ ok: false, error: 'Arguments must be a JSON object, got array' });
    expect(decodeArguments('42')).toEqual({ ok: false, error: 'Arguments must be a JSON object, got number' });
    expect(decodeArguments('null')).toEqual({ ok: false, error: 'Arguments must be a JSON object, got object' });
  });
});

describe('backoffDelay', () => {
  it('should double from the base', () => {
    expect([0, 1, 2].map((n) => backoffDelay(1000, n))).toEqual([1000, 2000, 4000]);
  });
});

// =============================================================================
// ToolExecutor
// =============================================================================

describe('ToolExecutor', () => {
  let registry: ToolRegistry;
  let sleeps: number[];

  const recordSleep = async (ms: number): Promise<void> => {
    sleeps.push(ms);
  };

  beforeEach(() => {
    registry = new ToolRegistry();
    sleeps = [];
  });

  it('should return the handler value on success', async () => {
    registry.register('architect', 'echo', (args) => ({ echoed: args }));
    const executor = new ToolExecutor(registry, { agent: 'architect', sleep: recordSleep });

    const result = await executor.execute(call('echo', '{"a":1}'));

    expect(result).toEqual({
      callId: 'call_1',
      toolName: 'echo',
      success: true,
      result: { echoed: { a: 1 } },
      attempts: 1,
    });
    expect(sleeps).toEqual([]);
  });

  it('should await async handlers', async () => {
    registry.register('architect', 'later', async () => 'done');
    const executor = new ToolExecutor(registry, { agent: 'architect', sleep: recordSleep });

    const result = await executor.execute(call('later'));

    expect(result.success && result.result).toBe('done');
  });

  it('should retry with exponential backoff until an attempt succeeds', async () => {
    let calls = 0;
    registry.register('dev', 'flaky', () => {
      calls++;
      if (calls < 3) {
        throw new Error(`failure ${calls}`);
      }
      return 'ok';
    });
    const executor = new ToolExecutor(registry, { agent: 'dev', sleep: recordSleep });

    const result = await executor.execute(call('flaky'));

    expect(result).toMatchObject({ success: true, result: 'ok', attempts: 3 });
    expect(sleeps).toEqual([1000, 2000]);
  });

  it('should report the last error after exhausting attempts', async () => {
    let calls = 0;
    registry.register('dev', 'broken', () => {
      calls++;
      throw new Error(`failure ${calls}`);
    });
    const executor = new ToolExecutor(registry, { agent: 'dev', sleep: recordSleep, backoffBaseMs: 10 });

    const result = await executor.execute(call('broken'));

    expect(result).toEqual({
      callId: 'call_1',
      toolName: 'broken',
      success: false,
      error: 'failure 3',
      errorKind: 'handler_failed',
      attempts: 3,
    });
    expect(sleeps).toEqual([10, 20]);
  });

  it('should make a single attempt without sleeping when maxRetries is 1', async () => {
    let calls = 0;
    registry.register('dev', 'broken', () => {
      calls++;
      throw new Error('boom');
    });
    const executor = new ToolExecutor(registry, { agent: 'dev', sleep: recordSleep });

    const result = await executor.execute(call('broken'), 1);

    expect(result).toMatchObject({ success: false, error: 'boom', attempts: 1 });
    expect(calls).toBe(1);
    expect(sleeps).toEqual([]);
  });

  it('should treat a non-positive retry count as one attempt', async () => {
    let calls = 0;
    registry.register('dev', 'broken', () => {
      calls++;
      throw new Error('boom');
    });
    const executor = new ToolExecutor(registry, { agent: 'dev', sleep: recordSleep, maxRetries: 0 });

    await executor.execute(call('broken'));

    expect(calls).toBe(1);
  });

  it('should reject malformed arguments without calling the handler', async () => {
    let calls = 0;
    registry.register('dev', 'echo', () => {
      calls++;
    });
    const executor = new ToolExecutor(registry, { agent: 'dev', sleep: recordSleep });

    const result = await executor.execute(call('echo', '{oops'));

    expect(result).toMatchObject({ success: false, errorKind: 'invalid_arguments', attempts: 0 });
    expect(calls).toBe(0);
    expect(sleeps).toEqual([]);
  });

  it('should report an unknown tool', async () => {
    registry.register('po', 'plan_sprint', () => null);
    const executor = new ToolExecutor(registry, { agent: 'architect', sleep: recordSleep });

    const result = await executor.execute(call('plan_sprint'));

    expect(result).toEqual({
      callId: 'call_1',
      toolName: 'plan_sprint',
      success: false,
      error: 'No handler registered for architect:plan_sprint',
      errorKind: 'unknown_tool',
      attempts: 0,
    });
  });

  it('should report schema validation failures without retrying', async () => {
    registry.registerTyped('po', 'sized', z.object({ size: z.number() }), (args) => args.size);
    const executor = new ToolExecutor(registry, { agent: 'po', sleep: recordSleep });

    const result = await executor.execute(call('sized', '{}'));

    expect(result).toEqual({
      callId: 'call_1',
      toolName: 'sized',
      success: false,
      error: 'Invalid arguments for sized: size: Required',
      errorKind: 'invalid_arguments',
      attempts: 0,
    });
    expect(sleeps).toEqual([]);
  });

  it('should record tool call metrics by outcome', async () => {
    const metrics = createMetricsCollector();
    registry.register('dev', 'ok_tool', () => true);
    const executor = new ToolExecutor(registry, { agent: 'dev', sleep: recordSleep, metrics });

    await executor.execute(call('ok_tool'));
    await executor.execute(call('missing'));

    const summary = metrics.getMetrics().toolCalls;
    expect(summary.total).toBe(2);
    expect(summary.byOutcome).toEqual({ success: 1, unknown_tool: 1 });
  });

  it('should expose the agent it dispatches for', () => {
    expect(new ToolExecutor(registry, { agent: 'po' }).getAgent()).toBe('po');
  });
});
