import { z } from 'zod';
import { jsonValueSchema } from './json';
import type { JsonObject } from './json';

// ============================================================================
// Messages API (outbound) request types
// ============================================================================

export interface CacheControl {
  type: 'ephemeral';
  ttl?: '5m' | '1h';
}

export interface TextBlock {
  type: 'text';
  text: string;
  cache_control?: CacheControl;
}

export interface ImageBlock {
  type: 'image';
  source: { type: 'url'; url: string } | { type: 'base64'; media_type: string; data: string };
  cache_control?: CacheControl;
}

export interface ToolUseBlock {
  type: 'tool_use';
  id: string;
  name: string;
  input: JsonObject;
  cache_control?: CacheControl;
}

export interface ToolResultBlock {
  type: 'tool_result';
  tool_use_id: string;
  content: string | Array<TextBlock | ImageBlock>;
  cache_control?: CacheControl;
}

export type ContentBlock = TextBlock | ImageBlock | ToolUseBlock | ToolResultBlock;

export interface MessageParam {
  role: 'user' | 'assistant';
  content: string | ContentBlock[];
}

export interface SystemBlock {
  type: 'text';
  text: string;
  cache_control?: CacheControl;
}

export interface MessagesTool {
  name: string;
  description?: string;
  input_schema: JsonObject;
}

export type MessagesToolChoice =
  | { type: 'auto' }
  | { type: 'any' }
  | { type: 'none' }
  | { type: 'tool'; name: string };

export interface MessagesRequest {
  model: string;
  max_tokens: number;
  messages: MessageParam[];
  system?: SystemBlock[];
  temperature?: number;
  top_p?: number;
  stream?: boolean;
  tools?: MessagesTool[];
  tool_choice?: MessagesToolChoice;
  metadata?: { user_id: string };
}

// ============================================================================
// Messages API (outbound) response schemas
// ============================================================================

export const messagesUsageSchema = z.object({
  input_tokens: z.number().nullish(),
  output_tokens: z.number().nullish(),
  cache_creation_input_tokens: z.number().nullish(),
  cache_read_input_tokens: z.number().nullish(),
});

export type MessagesUsage = z.infer<typeof messagesUsageSchema>;

const responseTextBlockSchema = z.object({
  type: z.literal('text'),
  text: z.string(),
});

const responseToolUseBlockSchema = z.object({
  type: z.literal('tool_use'),
  id: z.string(),
  name: z.string(),
  input: jsonValueSchema.default({}),
});

// Blocks the chat format has no room for (thinking, server tools) parse to null
const responseBlockSchema = z.union([
  responseTextBlockSchema,
  responseToolUseBlockSchema,
  z
    .object({ type: z.string() })
    .passthrough()
    .transform(() => null),
]);

export const messagesResponseSchema = z.object({
  id: z.string(),
  model: z.string().default(''),
  role: z.string().default('assistant'),
  content: z.array(responseBlockSchema).default([]),
  stop_reason: z.string().nullish(),
  usage: messagesUsageSchema.default({}),
});

export type MessagesResponse = z.infer<typeof messagesResponseSchema>;

// ============================================================================
// Messages API streaming event schemas
// ============================================================================

export const messagesStreamEventSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('message_start'),
    message: z.object({
      id: z.string(),
      model: z.string().optional(),
      usage: messagesUsageSchema.optional(),
    }),
  }),
  z.object({
    type: z.literal('content_block_start'),
    index: z.number().optional(),
    content_block: z.object({
      type: z.string(),
      id: z.string().optional(),
      name: z.string().optional(),
    }),
  }),
  z.object({
    type: z.literal('content_block_delta'),
    index: z.number().optional(),
    delta: z.object({
      type: z.string(),
      text: z.string().optional(),
      partial_json: z.string().optional(),
    }),
  }),
  z.object({
    type: z.literal('content_block_stop'),
    index: z.number().optional(),
  }),
  z.object({
    type: z.literal('message_delta'),
    delta: z.object({
      stop_reason: z.string().nullish(),
    }),
    usage: messagesUsageSchema.optional(),
  }),
  z.object({ type: z.literal('message_stop') }),
  z.object({ type: z.literal('ping') }),
  z.object({
    type: z.literal('error'),
    error: jsonValueSchema.optional(),
  }),
]);

export type MessagesStreamEvent = z.infer<typeof messagesStreamEventSchema>;
