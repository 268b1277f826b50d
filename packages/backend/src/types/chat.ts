import { z } from 'zod';
import { jsonValueSchema } from './json';

// ============================================================================
// Chat Completions API (inbound) request schemas
// ============================================================================

export const CHAT_ROLES = ['system', 'user', 'assistant', 'tool'] as const;
export type ChatRole = (typeof CHAT_ROLES)[number];

/** Empty roles default to user; `developer` is the newer spelling of system. */
const roleSchema = z.preprocess((value) => {
  if (value === undefined || value === null || value === '') return 'user';
  if (value === 'developer') return 'system';
  return value;
}, z.enum(CHAT_ROLES));

const imageUrlSchema = z.union([
  z.string().transform((url) => ({ url })),
  z.object({ url: z.string(), detail: z.string().optional() }),
]);

export const chatContentPartSchema = z
  .object({
    type: z.string(),
    text: z.string().nullish(),
    image_url: imageUrlSchema.optional(),
  })
  .passthrough();

export type ChatContentPart = z.infer<typeof chatContentPartSchema>;

export const chatContentSchema = z.union([z.string(), z.array(chatContentPartSchema), z.null()]);

export type ChatContent = z.infer<typeof chatContentSchema>;

const toolCallSchema = z.object({
  id: z
    .string()
    .nullish()
    .transform((id) => id ?? ''),
  type: z.string().nullish(),
  function: z.object({
    name: z.string(),
    // Some clients send the arguments value itself instead of its serialization
    arguments: jsonValueSchema
      .nullish()
      .transform((args) =>
        args === null || args === undefined ? '' : typeof args === 'string' ? args : JSON.stringify(args)
      ),
  }),
});

export type ChatToolCallParam = z.infer<typeof toolCallSchema>;

export const chatMessageSchema = z.object({
  role: roleSchema,
  content: chatContentSchema.optional(),
  tool_calls: z.array(toolCallSchema).nullish(),
  tool_call_id: z.string().nullish(),
});

export type ChatMessage = z.infer<typeof chatMessageSchema>;

const chatToolSchema = z.object({
  type: z.string().optional(),
  function: z.object({
    name: z.string(),
    description: z.string().optional(),
    parameters: jsonValueSchema.optional(),
  }),
});

export type ChatTool = z.infer<typeof chatToolSchema>;

export const chatCompletionRequestSchema = z.object({
  model: z.string(),
  messages: z.array(chatMessageSchema).default([]),
  max_tokens: z.number().nullish(),
  max_completion_tokens: z.number().nullish(),
  temperature: z.number().nullish(),
  top_p: z.number().nullish(),
  stream: z.boolean().nullish(),
  tools: z.array(chatToolSchema).nullish(),
  tool_choice: jsonValueSchema.optional(),
  user: z.string().nullish(),
});

export type ChatCompletionRequest = z.infer<typeof chatCompletionRequestSchema>;

// ============================================================================
// Chat Completions API (inbound) response shapes
// ============================================================================

export interface ChatToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string;
  };
}

export interface ChatUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
  prompt_tokens_details: {
    cached_tokens: number;
  };
  completion_tokens_details?: {
    reasoning_tokens: number;
  };
  cache_creation_input_tokens?: number;
  cache_read_input_tokens?: number;
}

export interface ChatCompletionResponse {
  id: string;
  object: 'chat.completion';
  created: number;
  model: string;
  choices: Array<{
    index: number;
    message: {
      role: 'assistant';
      content: string | null;
      tool_calls?: ChatToolCall[];
    };
    finish_reason: string;
  }>;
  usage: ChatUsage;
}

export interface ChatToolCallDelta {
  index: number;
  id?: string;
  type?: 'function';
  function: {
    name?: string;
    arguments: string;
  };
}

export interface ChatChunkDelta {
  role?: 'assistant';
  content?: string;
  tool_calls?: ChatToolCallDelta[];
}

export interface ChatCompletionChunk {
  id: string;
  object: 'chat.completion.chunk';
  created: number;
  model: string;
  choices: Array<{
    index: number;
    delta: ChatChunkDelta;
    finish_reason: string | null;
  }>;
  usage?: ChatUsage;
}
