import type { ChatContentPart, ChatMessage, ChatRole, ChatToolCallParam } from '../../types/chat';

export const PLACEHOLDER_TEXT = '...';

export interface NormalizedMessage {
  role: ChatRole;
  /** Null only for tool-call-only turns. */
  content: string | ChatContentPart[] | null;
  toolCalls: ChatToolCallParam[];
  toolCallId?: string;
}

/**
 * Joins two plain-text turns with a space and trims surrounding double quotes.
 */
export function mergeText(previous: string, current: string): string {
  return `${previous} ${current}`.replace(/^"+|"+$/g, '');
}

/**
 * Normalizes the chat message list before conversion.
 *
 * - Consecutive plain-text messages sharing a role (other than tool) are merged.
 * - Contentless messages without tool calls get a placeholder text.
 */
export function normalizeMessages(messages: ChatMessage[]): NormalizedMessage[] {
  const normalized: NormalizedMessage[] = [];

  for (const message of messages) {
    let content = message.content ?? null;
    let toolCalls = message.tool_calls ?? [];

    const previous = normalized[normalized.length - 1];
    if (
      previous &&
      previous.role === message.role &&
      message.role !== 'tool' &&
      typeof previous.content === 'string' &&
      typeof content === 'string'
    ) {
      content = mergeText(previous.content, content);
      toolCalls = [...previous.toolCalls, ...toolCalls];
      normalized.pop();
    }

    if (content === null && toolCalls.length === 0) {
      content = PLACEHOLDER_TEXT;
    }

    const entry: NormalizedMessage = { role: message.role, content, toolCalls };
    if (message.tool_call_id) {
      entry.toolCallId = message.tool_call_id;
    }
    normalized.push(entry);
  }

  return normalized;
}
