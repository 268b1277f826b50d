import { describe, it, expect, vi } from 'vitest';
import { transformAnthropicStream } from '../stream-transformer';

const encoder = new TextEncoder();

function sse(event: { type: string } & Record<string, unknown>): string {
  return `event: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`;
}

function upstreamStream(frames: string[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const frame of frames) {
        controller.enqueue(encoder.encode(frame));
      }
      controller.close();
    },
  });
}

async function collect(stream: ReadableStream<Uint8Array>): Promise<string[]> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();
  let output = '';
  while (true) {
    const { done, value } = await reader.read();
    if (done) break;
    output += decoder.decode(value, { stream: true });
  }
  return output
    .split('\n\n')
    .filter(Boolean)
    .map((frame) => frame.replace(/^data: /, ''));
}

function chunks(frames: string[]) {
  return frames.filter((frame) => frame !== '[DONE]').map((frame) => JSON.parse(frame));
}

const messageStart = (usage?: Record<string, number>) =>
  sse({
    type: 'message_start',
    message: { id: 'msg_1', type: 'message', role: 'assistant', model: 'claude-upstream', usage },
  });

describe('transformAnthropicStream', () => {
  it('should relay a text reply and finish with usage and the terminator', async () => {
    const frames = await collect(
      transformAnthropicStream(
        upstreamStream([
          messageStart({ input_tokens: 10, output_tokens: 1 }),
          sse({ type: 'content_block_start', index: 0, content_block: { type: 'text', text: '' } }),
          sse({ type: 'ping' }),
          sse({ type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: 'Hello' } }),
          sse({ type: 'content_block_stop', index: 0 }),
          sse({ type: 'message_delta', delta: { stop_reason: 'end_turn' }, usage: { output_tokens: 3 } }),
          sse({ type: 'message_stop' }),
        ]),
        { model: 'gpt-4o' }
      )
    );

    expect(frames).toHaveLength(4);
    expect(frames[3]).toBe('[DONE]');

    const [first, second, last] = chunks(frames);
    expect(first).toMatchObject({
      id: 'msg_1',
      object: 'chat.completion.chunk',
      model: 'gpt-4o',
      choices: [{ index: 0, delta: { role: 'assistant', content: '' }, finish_reason: null }],
    });
    expect(second.choices).toEqual([{ index: 0, delta: { content: 'Hello' }, finish_reason: null }]);
    expect(last.choices).toEqual([{ index: 0, delta: {}, finish_reason: 'stop' }]);
    expect(last.usage).toEqual({
      prompt_tokens: 10,
      completion_tokens: 3,
      total_tokens: 13,
      prompt_tokens_details: { cached_tokens: 0 },
      completion_tokens_details: { reasoning_tokens: 0 },
      cache_creation_input_tokens: 0,
      cache_read_input_tokens: 0,
    });
  });

  it('should emit tool call fragments at the positional block index', async () => {
    const frames = await collect(
      transformAnthropicStream(
        upstreamStream([
          messageStart(),
          sse({ type: 'content_block_start', index: 0, content_block: { type: 'text', text: '' } }),
          sse({ type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: 'Sure' } }),
          sse({ type: 'content_block_stop', index: 0 }),
          sse({
            type: 'content_block_start',
            index: 1,
            content_block: { type: 'tool_use', id: 'toolu_1', name: 'get_weather', input: {} },
          }),
          sse({
            type: 'content_block_delta',
            index: 1,
            delta: { type: 'input_json_delta', partial_json: '{"city":' },
          }),
          sse({
            type: 'content_block_delta',
            index: 1,
            delta: { type: 'input_json_delta', partial_json: '"Paris"}' },
          }),
          sse({ type: 'content_block_stop', index: 1 }),
          sse({ type: 'message_delta', delta: { stop_reason: 'tool_use' } }),
          sse({ type: 'message_stop' }),
        ]),
        { model: 'gpt-4o' }
      )
    );

    const deltas = chunks(frames).map((chunk) => chunk.choices[0].delta);
    expect(deltas).toEqual([
      { role: 'assistant', content: '' },
      { content: 'Sure' },
      {
        tool_calls: [
          { index: 1, id: 'toolu_1', type: 'function', function: { name: 'get_weather', arguments: '' } },
        ],
      },
      { tool_calls: [{ index: 1, function: { arguments: '{"city":' } }] },
      { tool_calls: [{ index: 1, function: { arguments: '"Paris"}' } }] },
      {},
    ]);

    const last = chunks(frames).at(-1);
    expect(last.choices[0].finish_reason).toBe('tool_calls');
    expect(last.usage).toBeUndefined();
    expect(frames.at(-1)).toBe('[DONE]');
  });

  it('should report tool_calls as the finish reason once a tool block started', async () => {
    const frames = await collect(
      transformAnthropicStream(
        upstreamStream([
          messageStart(),
          sse({
            type: 'content_block_start',
            index: 0,
            content_block: { type: 'tool_use', id: 'toolu_1', name: 'noop', input: {} },
          }),
          sse({ type: 'content_block_stop', index: 0 }),
          sse({ type: 'message_delta', delta: { stop_reason: 'end_turn' } }),
        ]),
        { model: 'gpt-4o' }
      )
    );

    expect(chunks(frames).at(-1).choices[0].finish_reason).toBe('tool_calls');
  });

  it('should skip malformed events without aborting the stream', async () => {
    const frames = await collect(
      transformAnthropicStream(
        upstreamStream([
          messageStart(),
          'data: {not valid json\n\n',
          'data: {"type":"unknown_event"}\n\n',
          sse({ type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: 'Still here' } }),
          sse({ type: 'message_delta', delta: { stop_reason: 'max_tokens' } }),
        ]),
        { model: 'gpt-4o' }
      )
    );

    const deltas = chunks(frames).map((chunk) => chunk.choices[0]);
    expect(deltas).toEqual([
      { index: 0, delta: { role: 'assistant', content: '' }, finish_reason: null },
      { index: 0, delta: { content: 'Still here' }, finish_reason: null },
      { index: 0, delta: {}, finish_reason: 'length' },
    ]);
    expect(frames.at(-1)).toBe('[DONE]');
  });

  it('should reassemble events split across network reads', async () => {
    const event = sse({
      type: 'content_block_delta',
      index: 0,
      delta: { type: 'text_delta', text: 'split' },
    });
    const frames = await collect(
      transformAnthropicStream(
        upstreamStream([messageStart(), event.slice(0, 20), event.slice(20)]),
        { model: 'gpt-4o' }
      )
    );

    expect(chunks(frames)[1].choices[0].delta).toEqual({ content: 'split' });
  });

  it('should still terminate the stream when the upstream read fails', async () => {
    let pulls = 0;
    const failing = new ReadableStream<Uint8Array>({
      pull(controller) {
        pulls++;
        if (pulls === 1) {
          controller.enqueue(encoder.encode(messageStart()));
        } else {
          controller.error(new Error('connection reset'));
        }
      },
    });

    const frames = await collect(transformAnthropicStream(failing, { model: 'gpt-4o' }));

    expect(frames).toHaveLength(2);
    expect(chunks(frames)[0].choices[0].delta).toEqual({ role: 'assistant', content: '' });
    expect(frames[1]).toBe('[DONE]');
  });

  describe('flow control', () => {
    function endlessTextStream(onCancel: (reason: unknown) => void) {
      let pulls = 0;
      const source = new ReadableStream<Uint8Array>({
        pull(controller) {
          pulls++;
          if (pulls > 1000) {
            controller.close();
            return;
          }
          const frame =
            pulls === 1
              ? messageStart()
              : sse({ type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: `t${pulls}` } });
          controller.enqueue(encoder.encode(frame));
        },
        cancel: onCancel,
      });
      return { source, pulls: () => pulls };
    }

    it('should only read upstream as fast as the output is consumed', async () => {
      const upstream = endlessTextStream(() => {});
      const output = transformAnthropicStream(upstream.source, { model: 'gpt-4o' });

      await new Promise((resolve) => setTimeout(resolve, 20));
      expect(upstream.pulls()).toBeLessThan(10);

      const reader = output.getReader();
      const { value } = await reader.read();
      expect(new TextDecoder().decode(value)).toContain('"role":"assistant"');
      await reader.cancel();
    });

    it('should cancel the upstream body when the output is cancelled', async () => {
      const onCancel = vi.fn();
      const upstream = endlessTextStream(onCancel);
      const reader = transformAnthropicStream(upstream.source, { model: 'gpt-4o' }).getReader();

      await reader.read();
      await reader.cancel('client went away');

      await vi.waitFor(() => expect(onCancel).toHaveBeenCalledTimes(1));
      const pullsAtCancel = upstream.pulls();
      await new Promise((resolve) => setTimeout(resolve, 20));
      expect(upstream.pulls()).toBe(pullsAtCancel);
    });
  });
});
