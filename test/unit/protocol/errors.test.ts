import { describe, it, expect } from 'vitest';
import {
  AGENT_ERROR_CODES,
  AgentClientError,
  AgentProtocolError,
  AgentRemoteError,
  AgentRequestError,
  AgentTimeoutError,
  AgentUnreachableError,
  createToolErrorResult,
  createToolSuccessResult,
  errorMessage,
  formatToolError,
  isAgentClientError,
  isAgentRemoteError,
  isAgentTimeoutError,
  isAgentUnreachableError,
  toWireToolResult,
} from '../../../src/protocol/errors.js';

describe('Agent client errors', () => {
  it('should describe timeouts with the budget', () => {
    const error = new AgentTimeoutError('architect', 300000);
    expect(error.message).toBe('Request to architect agent timed out after 300000ms');
    expect(error.code).toBe(AGENT_ERROR_CODES.TIMEOUT);
    expect(error.name).toBe('AgentTimeoutError');
    expect(error).toBeInstanceOf(AgentClientError);
    expect(error).toBeInstanceOf(Error);
  });

  it('should keep the cause of connection failures', () => {
    const cause = new Error('ECONNREFUSED');
    const error = new AgentUnreachableError('dev', 'http://localhost:8001/v1', cause);
    expect(error.message).toBe('Failed to connect to dev agent at http://localhost:8001/v1');
    expect(error.cause).toBe(cause);
  });

  it('should carry status and body of remote errors', () => {
    const error = new AgentRemoteError('po', 503, 'overloaded');
    expect(error.message).toBe('Agent returned error 503: overloaded');
    expect(error.status).toBe(503);
    expect(error.body).toBe('overloaded');
    expect(error.toJSON()).toEqual({
      code: 'remote_error',
      agent: 'po',
      message: 'Agent returned error 503: overloaded',
      status: 503,
    });
  });

  it('should serialise without a stack', () => {
    const json = JSON.parse(JSON.stringify(new AgentRequestError('architect', 'bad request')));
    expect(json).toEqual({ code: 'invalid_request', agent: 'architect', message: 'bad request' });
  });

  it('should keep protocol error details', () => {
    const error = new AgentProtocolError('dev', 'not JSON', { body: '<html>' });
    expect(error.code).toBe('protocol_error');
    expect(error.details).toEqual({ body: '<html>' });
  });

  describe('type guards', () => {
    it('should narrow by class', () => {
      const timeout = new AgentTimeoutError('a', 1);
      const remote = new AgentRemoteError('a', 500, '');
      const unreachable = new AgentUnreachableError('a', 'http://x');

      expect(isAgentTimeoutError(timeout)).toBe(true);
      expect(isAgentTimeoutError(remote)).toBe(false);
      expect(isAgentRemoteError(remote)).toBe(true);
      expect(isAgentUnreachableError(unreachable)).toBe(true);
      expect(isAgentClientError(unreachable)).toBe(true);
      expect(isAgentClientError(new Error('plain'))).toBe(false);
    });
  });
});

describe('Tool results', () => {
  it('should create success results', () => {
    expect(createToolSuccessResult('call_1', 'plan_sprint', { ok: 1 }, 2)).toEqual({
      callId: 'call_1',
      toolName: 'plan_sprint',
      success: true,
      result: { ok: 1 },
      attempts: 2,
    });
  });

  it('should default failure attempts to zero', () => {
    expect(createToolErrorResult('call_2', 'nope', 'unknown_tool', 'No handler')).toEqual({
      callId: 'call_2',
      toolName: 'nope',
      success: false,
      error: 'No handler',
      errorKind: 'unknown_tool',
      attempts: 0,
    });
  });

  it('should convert results to their wire form', () => {
    expect(toWireToolResult(createToolSuccessResult('c1', 't', undefined, 1))).toEqual({
      tool_call_id: 'c1',
      tool_name: 't',
      success: true,
      result: null,
    });
    expect(toWireToolResult(createToolErrorResult('c2', 't', 'handler_failed', 'boom', 3))).toEqual({
      tool_call_id: 'c2',
      tool_name: 't',
      success: false,
      error: 'boom',
      error_kind: 'handler_failed',
    });
  });

  it('should format failures for humans', () => {
    const failure = createToolErrorResult('c', 'plan_sprint', 'invalid_arguments', 'bad JSON');
    expect(formatToolError(failure)).toBe('plan_sprint failed (invalid_arguments): bad JSON');
  });
});

describe('errorMessage', () => {
  it('should extract messages from any thrown value', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage({ code: 1 })).toBe('{"code":1}');
    expect(errorMessage(undefined)).toBe('undefined');
  });
});
