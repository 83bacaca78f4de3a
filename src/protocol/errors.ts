/**
 * Error Handling
 *
 * Two families of failure:
 * - Transport errors (timeout, unreachable, remote HTTP error, unreadable
 *   response) are thrown and abort the conversation.
 * - Tool errors (undecodable arguments, unknown tool, failing handler) are
 *   never thrown; they become ToolResults reported back to the model.
 */

// =============================================================================
// Transport Error Codes
// =============================================================================

export const AGENT_ERROR_CODES = {
  TIMEOUT: 'timeout',
  UNREACHABLE: 'unreachable',
  REMOTE_ERROR: 'remote_error',
  PROTOCOL_ERROR: 'protocol_error',
  INVALID_REQUEST: 'invalid_request',
} as const;

export type AgentErrorCode = (typeof AGENT_ERROR_CODES)[keyof typeof AGENT_ERROR_CODES];

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base class for failures talking to an agent endpoint.
 */
export class AgentClientError extends Error {
  constructor(
    public readonly code: AgentErrorCode,
    public readonly agent: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AgentClientError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Plain-object form for logs and CLI output. Never includes the stack.
   */
  toJSON(): { code: AgentErrorCode; agent: string; message: string } {
    return {
      code: this.code,
      agent: this.agent,
      message: this.message,
    };
  }
}

// =============================================================================
// Specific Error Classes
// =============================================================================

/**
 * The request exceeded the per-call time budget
 */
export class AgentTimeoutError extends AgentClientError {
  constructor(
    agent: string,
    public readonly timeoutMs: number
  ) {
    super(AGENT_ERROR_CODES.TIMEOUT, agent, `Request to ${agent} agent timed out after ${timeoutMs}ms`);
    this.name = 'AgentTimeoutError';
  }
}

/**
 * The connection could not be established or was reset
 */
export class AgentUnreachableError extends AgentClientError {
  constructor(agent: string, url: string, cause?: unknown) {
    super(
      AGENT_ERROR_CODES.UNREACHABLE,
      agent,
      `Failed to connect to ${agent} agent at ${url}`,
      cause !== undefined ? { cause } : undefined
    );
    this.name = 'AgentUnreachableError';
  }
}

/**
 * The server answered with a non-2xx status
 */
export class AgentRemoteError extends AgentClientError {
  constructor(
    agent: string,
    public readonly status: number,
    public readonly body: string
  ) {
    super(AGENT_ERROR_CODES.REMOTE_ERROR, agent, `Agent returned error ${status}: ${body}`);
    this.name = 'AgentRemoteError';
  }

  override toJSON(): { code: AgentErrorCode; agent: string; message: string; status: number } {
    return { ...super.toJSON(), status: this.status };
  }
}

/**
 * The server answered 2xx but the body is not a chat completion
 */
export class AgentProtocolError extends AgentClientError {
  constructor(agent: string, message: string, public readonly details?: unknown) {
    super(AGENT_ERROR_CODES.PROTOCOL_ERROR, agent, message);
    this.name = 'AgentProtocolError';
  }
}

/**
 * The request was rejected locally before anything was sent
 */
export class AgentRequestError extends AgentClientError {
  constructor(agent: string, message: string) {
    super(AGENT_ERROR_CODES.INVALID_REQUEST, agent, message);
    this.name = 'AgentRequestError';
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isAgentClientError(error: unknown): error is AgentClientError {
  return error instanceof AgentClientError;
}

export function isAgentTimeoutError(error: unknown): error is AgentTimeoutError {
  return error instanceof AgentTimeoutError;
}

export function isAgentUnreachableError(error: unknown): error is AgentUnreachableError {
  return error instanceof AgentUnreachableError;
}

export function isAgentRemoteError(error: unknown): error is AgentRemoteError {
  return error instanceof AgentRemoteError;
}

// =============================================================================
// Tool Results
// =============================================================================

export const TOOL_ERROR_KINDS = ['invalid_arguments', 'unknown_tool', 'handler_failed'] as const;

/**
 * Machine-readable reason a tool call failed
 */
export type ToolErrorKind = (typeof TOOL_ERROR_KINDS)[number];

export interface ToolSuccess {
  callId: string;
  toolName: string;
  success: true;
  result: unknown;
  /** Handler attempts made */
  attempts: number;
}

export interface ToolFailure {
  callId: string;
  toolName: string;
  success: false;
  error: string;
  errorKind: ToolErrorKind;
  /** Handler attempts made; 0 when the call never reached a handler */
  attempts: number;
}

/**
 * Outcome of one tool call. Exactly one of `result` / `error` is present.
 */
export type ToolResult = ToolSuccess | ToolFailure;

export function createToolSuccessResult(
  callId: string,
  toolName: string,
  result: unknown,
  attempts: number
): ToolSuccess {
  return { callId, toolName, success: true, result, attempts };
}

export function createToolErrorResult(
  callId: string,
  toolName: string,
  errorKind: ToolErrorKind,
  error: string,
  attempts = 0
): ToolFailure {
  return { callId, toolName, success: false, error, errorKind, attempts };
}

/**
 * Message text of any thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

/**
 * JSON shape of a tool result as sent back to the model in a tool message
 */
export type WireToolResult =
  | { tool_call_id: string; tool_name: string; success: true; result: unknown }
  | { tool_call_id: string; tool_name: string; success: false; error: string; error_kind: ToolErrorKind };

export function toWireToolResult(result: ToolResult): WireToolResult {
  if (result.success) {
    return {
      tool_call_id: result.callId,
      tool_name: result.toolName,
      success: true,
      result: result.result ?? null,
    };
  }
  return {
    tool_call_id: result.callId,
    tool_name: result.toolName,
    success: false,
    error: result.error,
    error_kind: result.errorKind,
  };
}

/**
 * Human-readable one-liner for a failed tool call
 */
export function formatToolError(result: ToolFailure): string {
  return `${result.toolName} failed (${result.errorKind}): ${result.error}`;
}
