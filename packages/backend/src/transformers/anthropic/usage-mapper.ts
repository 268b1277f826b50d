import type { ChatUsage } from '../../types/chat';
import type { MessagesUsage } from '../../types/messages';

/**
 * Maps a Messages stop_reason to a chat finish_reason.
 */
export function mapStopReason(reason: string | null | undefined): string {
  switch (reason) {
    case 'end_turn':
    case 'stop_sequence':
      return 'stop';
    case 'max_tokens':
      return 'length';
    case 'tool_use':
      return 'tool_calls';
    case null:
    case undefined:
    case '':
      return 'stop';
    default:
      return reason;
  }
}

/**
 * Converts Messages usage counters to chat usage. Cache reads are reported as
 * cached prompt tokens; both cache counters are also copied through.
 */
export function toChatUsage(usage: MessagesUsage): ChatUsage {
  const inputTokens = usage.input_tokens ?? 0;
  const outputTokens = usage.output_tokens ?? 0;
  const cacheReadTokens = usage.cache_read_input_tokens ?? 0;
  const cacheCreationTokens = usage.cache_creation_input_tokens ?? 0;

  return {
    prompt_tokens: inputTokens,
    completion_tokens: outputTokens,
    total_tokens: inputTokens + outputTokens,
    prompt_tokens_details: {
      cached_tokens: cacheReadTokens,
    },
    completion_tokens_details: {
      reasoning_tokens: 0,
    },
    cache_creation_input_tokens: cacheCreationTokens,
    cache_read_input_tokens: cacheReadTokens,
  };
}
