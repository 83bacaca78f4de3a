/**
 * Chat Completions Wire Format
 *
 * Zod schemas and types for the OpenAI-compatible `/chat/completions`
 * protocol spoken by vLLM, Ollama and similar local model servers.
 * Conversation messages are strict; server responses are parsed leniently
 * so that a malformed tool call surfaces as a failed tool result rather than
 * as a transport failure.
 */

import { z } from 'zod';

// =============================================================================
// Tool Calls
// =============================================================================

/**
 * A tool call as carried on an assistant message. `arguments` is the raw,
 * undecoded JSON string produced by the model.
 */
export const WireToolCallSchema = z.object({
  id: z.string(),
  type: z.literal('function'),
  function: z.object({
    name: z.string(),
    arguments: z.string(),
  }),
});

export type WireToolCall = z.infer<typeof WireToolCallSchema>;

// =============================================================================
// Conversation Messages
// =============================================================================

export const SystemMessageSchema = z.object({
  role: z.literal('system'),
  content: z.string(),
});

export const UserMessageSchema = z.object({
  role: z.literal('user'),
  content: z.string(),
});

export const AssistantMessageSchema = z.object({
  role: z.literal('assistant'),
  content: z.string().nullable(),
  tool_calls: z.array(WireToolCallSchema).optional(),
});

export const ToolMessageSchema = z.object({
  role: z.literal('tool'),
  content: z.string(),
  tool_call_id: z.string(),
  name: z.string(),
});

export const MessageSchema = z.discriminatedUnion('role', [
  SystemMessageSchema,
  UserMessageSchema,
  AssistantMessageSchema,
  ToolMessageSchema,
]);

export const ConversationSchema = z.array(MessageSchema);

export type SystemMessage = z.infer<typeof SystemMessageSchema>;
export type UserMessage = z.infer<typeof UserMessageSchema>;
export type AssistantMessage = z.infer<typeof AssistantMessageSchema>;
export type ToolMessage = z.infer<typeof ToolMessageSchema>;
export type Message = z.infer<typeof MessageSchema>;
export type MessageRole = Message['role'];

// =============================================================================
// Tool Descriptors
// =============================================================================

/**
 * Function names accepted by OpenAI-compatible servers
 */
export const ToolNamePattern = /^[a-zA-Z0-9_-]{1,64}$/;

export const ToolNameSchema = z.string().regex(
  ToolNamePattern,
  'Tool name must be 1-64 letters, digits, underscores or dashes'
);

export const ToolParametersSchema = z
  .object({
    type: z.literal('object'),
    properties: z.record(z.string(), z.record(z.string(), z.unknown())),
    required: z.array(z.string()).optional(),
  })
  .passthrough();

/**
 * Static tool schema advertised to the model
 */
export const ToolDescriptorSchema = z.object({
  type: z.literal('function'),
  function: z.object({
    name: ToolNameSchema,
    description: z.string().min(1),
    parameters: ToolParametersSchema,
  }),
});

export type ToolParameters = z.infer<typeof ToolParametersSchema>;
export type ToolDescriptor = z.infer<typeof ToolDescriptorSchema>;

// =============================================================================
// Tool Choice
// =============================================================================

/**
 * `auto` lets the model decide, `none` forbids calls, `required` forces a
 * call, and `{ name }` forces that particular tool.
 */
export const ToolChoiceSchema = z.union([
  z.enum(['auto', 'none', 'required']),
  z.object({ name: ToolNameSchema }),
]);

export type ToolChoice = z.infer<typeof ToolChoiceSchema>;

export type WireToolChoice =
  | 'auto'
  | 'none'
  | 'required'
  | { type: 'function'; function: { name: string } };

export function toWireToolChoice(choice: ToolChoice): WireToolChoice {
  if (typeof choice === 'string') {
    return choice;
  }
  return { type: 'function', function: { name: choice.name } };
}

// =============================================================================
// Requests
// =============================================================================

export interface ChatCompletionRequest {
  model: string;
  messages: Message[];
  temperature: number;
  max_tokens: number;
  stream: boolean;
  tools?: ToolDescriptor[];
  tool_choice?: WireToolChoice;
  [key: string]: unknown;
}

// =============================================================================
// Responses
// =============================================================================

export const UsageSchema = z
  .object({
    prompt_tokens: z.number(),
    completion_tokens: z.number(),
    total_tokens: z.number(),
  })
  .partial()
  .passthrough();

export const ResponseMessageSchema = z
  .object({
    role: z.string().default('assistant'),
    content: z.string().nullable().optional(),
    // Left unvalidated here; entries are checked one by one during extraction
    tool_calls: z.unknown().optional(),
  })
  .passthrough();

export const ChoiceSchema = z
  .object({
    index: z.number().optional(),
    message: ResponseMessageSchema,
    finish_reason: z.string().nullable().optional(),
  })
  .passthrough();

export const ChatCompletionSchema = z
  .object({
    id: z.string().optional(),
    object: z.string().optional(),
    created: z.number().optional(),
    model: z.string().optional(),
    choices: z.array(ChoiceSchema),
    usage: UsageSchema.nullable().optional(),
  })
  .passthrough();

export type Usage = z.infer<typeof UsageSchema>;
export type ResponseMessage = z.infer<typeof ResponseMessageSchema>;
export type ChatCompletion = z.infer<typeof ChatCompletionSchema>;

// =============================================================================
// Streaming Chunks
// =============================================================================

export const ToolCallDeltaSchema = z
  .object({
    index: z.number().optional(),
    id: z.string().nullable().optional(),
    type: z.string().nullable().optional(),
    function: z
      .object({
        name: z.string().nullable().optional(),
        arguments: z.string().nullable().optional(),
      })
      .optional(),
  })
  .passthrough();

export const DeltaSchema = z
  .object({
    role: z.string().nullable().optional(),
    content: z.string().nullable().optional(),
    tool_calls: z.array(ToolCallDeltaSchema).nullable().optional(),
  })
  .passthrough();

export const ChunkChoiceSchema = z
  .object({
    index: z.number().optional(),
    delta: DeltaSchema.default({}),
    finish_reason: z.string().nullable().optional(),
  })
  .passthrough();

export const ChatCompletionChunkSchema = z
  .object({
    id: z.string().optional(),
    object: z.string().optional(),
    created: z.number().optional(),
    model: z.string().optional(),
    choices: z.array(ChunkChoiceSchema).default([]),
    usage: UsageSchema.nullable().optional(),
  })
  .passthrough();

export type ToolCallDelta = z.infer<typeof ToolCallDeltaSchema>;
export type ChatCompletionChunk = z.infer<typeof ChatCompletionChunkSchema>;

// =============================================================================
// Models listing
// =============================================================================

export const ModelListSchema = z.object({
  data: z.array(z.object({ id: z.string() }).passthrough()),
});

// =============================================================================
// Helpers
// =============================================================================

/**
 * The first choice's message, or undefined when the response has no choices.
 */
export function firstMessage(response: ChatCompletion): ResponseMessage | undefined {
  return response.choices[0]?.message;
}
