import { describe, it, expect } from 'vitest';
import { transformAnthropicResponse } from '../response-transformer';
import { messagesResponseSchema } from '../../../types/messages';

function transform(body: unknown) {
  return transformAnthropicResponse(messagesResponseSchema.parse(body));
}

describe('transformAnthropicResponse', () => {
  it('should concatenate text blocks into the message content', () => {
    const result = transform({
      id: 'msg_1',
      type: 'message',
      role: 'assistant',
      model: 'claude-3-5-sonnet-20241022',
      content: [
        { type: 'text', text: 'Hello' },
        { type: 'text', text: ' world' },
      ],
      stop_reason: 'end_turn',
      usage: { input_tokens: 10, output_tokens: 5 },
    });

    expect(result).toMatchObject({
      id: 'msg_1',
      object: 'chat.completion',
      model: 'claude-3-5-sonnet-20241022',
      choices: [
        {
          index: 0,
          message: { role: 'assistant', content: 'Hello world' },
          finish_reason: 'stop',
        },
      ],
    });
    expect(result.choices[0]?.message.tool_calls).toBeUndefined();
    expect(result.usage).toEqual({
      prompt_tokens: 10,
      completion_tokens: 5,
      total_tokens: 15,
      prompt_tokens_details: { cached_tokens: 0 },
      completion_tokens_details: { reasoning_tokens: 0 },
      cache_creation_input_tokens: 0,
      cache_read_input_tokens: 0,
    });
    expect(Number.isInteger(result.created)).toBe(true);
  });

  it('should rebuild tool calls with serialized arguments', () => {
    const result = transform({
      id: 'msg_2',
      model: 'claude-3-5-sonnet-20241022',
      content: [
        { type: 'text', text: 'Let me check.' },
        { type: 'tool_use', id: 'toolu_1', name: 'get_weather', input: { city: 'Paris' } },
      ],
      stop_reason: 'tool_use',
      usage: { input_tokens: 20, output_tokens: 8 },
    });

    expect(result.choices[0]?.message).toEqual({
      role: 'assistant',
      content: 'Let me check.',
      tool_calls: [
        {
          id: 'toolu_1',
          type: 'function',
          function: { name: 'get_weather', arguments: '{"city":"Paris"}' },
        },
      ],
    });
    expect(result.choices[0]?.finish_reason).toBe('tool_calls');
  });

  it('should report tool_calls even when the stop reason says otherwise', () => {
    const result = transform({
      id: 'msg_3',
      content: [{ type: 'tool_use', id: 'toolu_1', name: 'noop', input: {} }],
      stop_reason: 'end_turn',
    });

    expect(result.choices[0]?.message.content).toBeNull();
    expect(result.choices[0]?.finish_reason).toBe('tool_calls');
  });

  it('should map max_tokens to length', () => {
    const result = transform({
      id: 'msg_4',
      content: [{ type: 'text', text: 'Truncated' }],
      stop_reason: 'max_tokens',
    });

    expect(result.choices[0]?.finish_reason).toBe('length');
  });

  it('should skip blocks the chat format cannot carry', () => {
    const result = transform({
      id: 'msg_5',
      content: [
        { type: 'thinking', thinking: 'hmm', signature: 'sig' },
        { type: 'text', text: 'Answer' },
      ],
      stop_reason: 'end_turn',
    });

    expect(result.choices[0]?.message.content).toBe('Answer');
  });

  it('should report cache reads as cached prompt tokens', () => {
    const result = transform({
      id: 'msg_6',
      content: [{ type: 'text', text: 'Hi' }],
      stop_reason: 'end_turn',
      usage: {
        input_tokens: 4,
        output_tokens: 2,
        cache_creation_input_tokens: 100,
        cache_read_input_tokens: 50,
      },
    });

    expect(result.usage.prompt_tokens_details).toEqual({ cached_tokens: 50 });
    expect(result.usage.cache_creation_input_tokens).toBe(100);
    expect(result.usage.cache_read_input_tokens).toBe(50);
    expect(result.usage.total_tokens).toBe(6);
  });
});
