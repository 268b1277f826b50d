import type { ChatCompletionResponse, ChatToolCall } from '../../types/chat';
import type { MessagesResponse } from '../../types/messages';
import { mapStopReason, toChatUsage } from './usage-mapper';

/**
 * Transforms a complete Messages API response into a chat completion.
 *
 * Key transformations:
 * - Concatenates text blocks into a single content string
 * - Rebuilds tool calls with re-serialized arguments
 * - finish_reason is tool_calls whenever a tool was called
 */
export function transformAnthropicResponse(response: MessagesResponse): ChatCompletionResponse {
  let text = '';
  const toolCalls: ChatToolCall[] = [];

  for (const block of response.content) {
    if (!block) continue;
    if (block.type === 'text') {
      text += block.text;
    } else {
      toolCalls.push({
        id: block.id,
        type: 'function',
        function: {
          name: block.name,
          arguments: JSON.stringify(block.input),
        },
      });
    }
  }

  const message: ChatCompletionResponse['choices'][number]['message'] = {
    role: 'assistant',
    content: text || null,
  };
  if (toolCalls.length > 0) {
    message.tool_calls = toolCalls;
  }

  return {
    id: response.id,
    object: 'chat.completion',
    created: Math.floor(Date.now() / 1000),
    model: response.model,
    choices: [
      {
        index: 0,
        message,
        finish_reason: toolCalls.length > 0 ? 'tool_calls' : mapStopReason(response.stop_reason),
      },
    ],
    usage: toChatUsage(response.usage),
  };
}
