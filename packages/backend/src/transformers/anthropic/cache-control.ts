import type { CacheControl, MessageParam, SystemBlock } from '../../types/messages';

/** Prompt-cache breakpoint kept for one hour. */
export function cacheControl(): CacheControl {
  return { type: 'ephemeral', ttl: '1h' };
}

/**
 * Marks the last system block as a cache breakpoint.
 */
export function markSystemCache(system: SystemBlock[]): boolean {
  const last = system[system.length - 1];
  if (!last) return false;
  system[system.length - 1] = { ...last, cache_control: cacheControl() };
  return true;
}

/**
 * Marks the end of the second-to-last message when it is an assistant turn,
 * so everything before the latest exchange can be read back from the cache.
 * String content is promoted to a single text block to carry the marker.
 */
export function markConversationCache(messages: MessageParam[]): boolean {
  if (messages.length < 2) return false;

  const index = messages.length - 2;
  const target = messages[index];
  if (!target || target.role !== 'assistant') return false;

  if (typeof target.content === 'string') {
    if (!target.content) return false;
    messages[index] = {
      role: target.role,
      content: [{ type: 'text', text: target.content, cache_control: cacheControl() }],
    };
    return true;
  }

  const lastBlock = target.content[target.content.length - 1];
  if (!lastBlock) return false;
  messages[index] = {
    role: target.role,
    content: [...target.content.slice(0, -1), { ...lastBlock, cache_control: cacheControl() }],
  };
  return true;
}
