import { logger } from '../../utils/logger';
import { parseJsonObject } from '../../types/json';
import type { JsonObject } from '../../types/json';
import type { ChatCompletionRequest, ChatContentPart, ChatToolCallParam } from '../../types/chat';
import type {
  ContentBlock,
  MessageParam,
  MessagesRequest,
  SystemBlock,
  ToolResultBlock,
  ToolUseBlock,
} from '../../types/messages';
import { collectTextParts, convertChatContentParts } from './content-mapper';
import { convertChatToolsToAnthropic, convertToolChoice } from './tool-mapper';
import { resolveMaxTokens } from './max-tokens';
import type { MaxTokensOptions } from './max-tokens';
import { markConversationCache, markSystemCache } from './cache-control';
import { PLACEHOLDER_TEXT, normalizeMessages } from './message-normalizer';
import type { NormalizedMessage } from './message-normalizer';

export type BuildRequestOptions = MaxTokensOptions;

type ConversationMessage = NormalizedMessage & { role: 'user' | 'assistant' | 'tool' };

function assertNever(value: never): never {
  throw new Error(`Unhandled message role: ${String(value)}`);
}

/**
 * Parses serialized tool arguments. Arguments that are empty, unparseable or
 * not an object become an empty input so the tool_use block is kept: later
 * tool_result blocks must find their tool_use.
 */
function parseToolArguments(call: ChatToolCallParam): JsonObject {
  const args = call.function.arguments.trim();
  if (!args || args === '{}') return {};

  const input = parseJsonObject(args);
  if (!input) {
    logger.error(
      `Failed to parse tool call arguments: ID=${call.id}, Name=${call.function.name}`
    );
    return {};
  }
  return input;
}

function toToolUseBlock(call: ChatToolCallParam): ToolUseBlock {
  return {
    type: 'tool_use',
    id: call.id,
    name: call.function.name,
    input: parseToolArguments(call),
  };
}

function toToolResultContent(
  content: string | ChatContentPart[] | null
): ToolResultBlock['content'] {
  if (content === null) return PLACEHOLDER_TEXT;
  if (typeof content === 'string') return content;
  return convertChatContentParts(content);
}

/**
 * Adds a tool result to the conversation. Results following a user turn join
 * that turn, so parallel tool results travel in a single message.
 */
function appendToolResult(messages: MessageParam[], block: ToolResultBlock): void {
  const last = messages[messages.length - 1];
  if (last && last.role === 'user') {
    const existing: ContentBlock[] =
      typeof last.content === 'string'
        ? last.content
          ? [{ type: 'text', text: last.content }]
          : []
        : last.content;
    last.content = [...existing, block];
    logger.debug('Merged tool_result into previous user message');
    return;
  }
  messages.push({ role: 'user', content: [block] });
}

function appendConversationMessage(messages: MessageParam[], message: ConversationMessage): void {
  if (message.role === 'tool' && message.toolCallId) {
    appendToolResult(messages, {
      type: 'tool_result',
      tool_use_id: message.toolCallId,
      content: toToolResultContent(message.content),
    });
    return;
  }

  // A tool message without a correlation id can only travel as user text
  const role = message.role === 'assistant' ? 'assistant' : 'user';

  if (typeof message.content === 'string' && message.toolCalls.length === 0) {
    messages.push({ role, content: message.content });
    return;
  }

  const blocks: ContentBlock[] = [];
  if (typeof message.content === 'string') {
    if (message.content) {
      blocks.push({ type: 'text', text: message.content });
    }
  } else if (message.content) {
    blocks.push(...convertChatContentParts(message.content));
  }
  for (const call of message.toolCalls) {
    blocks.push(toToolUseBlock(call));
  }

  if (blocks.length === 0) {
    logger.warn('Skipping empty message after content conversion');
    return;
  }
  messages.push({ role, content: blocks });
}

/**
 * Transforms a chat completion request into Messages API format.
 *
 * Key transformations:
 * - System message extraction into system blocks
 * - Message normalization (merging, placeholders) and a leading user turn
 * - Role rewriting (tool -> user with tool_result blocks)
 * - Tool call reconstruction from serialized arguments
 * - Prompt-cache breakpoints on the system prompt and conversation history
 */
export function buildAnthropicRequest(
  request: ChatCompletionRequest,
  options: BuildRequestOptions = {}
): MessagesRequest {
  const system: SystemBlock[] = [];
  const messages: MessageParam[] = [];
  let conversationStarted = false;

  for (const message of normalizeMessages(request.messages)) {
    switch (message.role) {
      case 'system': {
        const content = message.content ?? PLACEHOLDER_TEXT;
        for (const text of collectTextParts(content)) {
          system.push({ type: 'text', text });
        }
        break;
      }
      case 'user':
      case 'assistant':
      case 'tool': {
        if (!conversationStarted) {
          conversationStarted = true;
          if (message.role !== 'user') {
            logger.debug('First message is not user, adding placeholder user message');
            messages.push({ role: 'user', content: [{ type: 'text', text: PLACEHOLDER_TEXT }] });
          }
        }
        appendConversationMessage(messages, { ...message, role: message.role });
        break;
      }
      default:
        assertNever(message.role);
    }
  }

  const payload: MessagesRequest = {
    model: request.model,
    max_tokens: resolveMaxTokens(
      request.model,
      request.max_tokens || request.max_completion_tokens,
      options
    ),
    messages,
  };

  if (markSystemCache(system)) {
    logger.debug('Added cache_control to system (1h TTL)');
  }
  if (system.length > 0) {
    payload.system = system;
  }
  if (markConversationCache(messages)) {
    logger.debug('Added cache_control to second-to-last assistant message (1h TTL)');
  }

  if (request.temperature) {
    payload.temperature = request.temperature;
  }
  if (request.top_p) {
    payload.top_p = request.top_p;
  }
  if (request.stream) {
    payload.stream = true;
  }

  const tools = request.tools ? convertChatToolsToAnthropic(request.tools) : [];
  if (tools.length > 0) {
    payload.tools = tools;
    const toolChoice = convertToolChoice(request.tool_choice);
    if (toolChoice) {
      payload.tool_choice = toolChoice;
    }
  }

  if (request.user) {
    payload.metadata = { user_id: request.user };
  }

  return payload;
}
